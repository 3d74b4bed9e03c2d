/**
 * AuditService Tests
 *
 * Null Object Pattern, failure-only mode and overflow handling.
 */

import { describe, it, expect, vi } from 'vitest';
import { AuditService, InMemoryAuditStorage } from '../../../src/core/audit-service.js';
import type { AuditEntry } from '../../../src/core/types.js';
import { createMockAuditEntry } from '../../../src/testing/index.js';

function entry(overrides: Partial<AuditEntry> = {}): AuditEntry {
  return createMockAuditEntry({ source: 'auth:service', action: 'authenticate', ...overrides });
}

describe('AuditService', () => {
  describe('Null Object Pattern', () => {
    it('should work without configuration (disabled by default)', async () => {
      const audit = new AuditService();

      await expect(audit.log(entry())).resolves.toBeUndefined();
      expect(audit.isEnabled()).toBe(false);
    });

    it('should not store entries when disabled', async () => {
      const storage = new InMemoryAuditStorage();
      const audit = new AuditService({ enabled: false, storage });

      await audit.log(entry());

      expect(storage.entries()).toHaveLength(0);
    });

    it('should not validate entries when disabled', async () => {
      const audit = new AuditService();

      await expect(audit.log(entry({ source: '' }))).resolves.toBeUndefined();
    });
  });

  describe('Enabled Audit Logging', () => {
    it('should store entries in order', async () => {
      const storage = new InMemoryAuditStorage();
      const audit = new AuditService({ enabled: true, storage });

      await audit.log(entry({ userId: 'alice' }));
      await audit.log(entry({ userId: 'bob', success: false, reason: 'Access denied.' }));

      expect(storage.entries().map((e) => e.userId)).toEqual(['alice', 'bob']);
      expect(storage.entries()[1]).toMatchObject({ success: false, reason: 'Access denied.' });
    });

    it('should use the default storage when none is given', async () => {
      const audit = new AuditService({ enabled: true });

      expect(audit.storage).toBeInstanceOf(InMemoryAuditStorage);
    });

    it('should require a source', async () => {
      const audit = new AuditService({ enabled: true });

      await expect(audit.log(entry({ source: '' }))).rejects.toThrow(
        'AuditEntry missing required field: source. All audit entries must include a source field.'
      );
    });
  });

  describe('Failure-only mode', () => {
    it('should skip successful entries when logAllAttempts is false', async () => {
      const storage = new InMemoryAuditStorage();
      const audit = new AuditService({ enabled: true, logAllAttempts: false, storage });

      await audit.log(entry({ success: true, action: 'authenticate' }));
      await audit.log(entry({ success: false, action: 'masquerade' }));

      expect(storage.entries().map((e) => e.action)).toEqual(['masquerade']);
    });
  });

  describe('Overflow Handling', () => {
    it('should call onOverflow with every held entry before discarding the oldest', async () => {
      const onOverflow = vi.fn();
      const storage = new InMemoryAuditStorage({ maxEntries: 3, onOverflow });
      const audit = new AuditService({ enabled: true, storage });

      for (let i = 0; i < 3; i++) {
        await audit.log(entry({ action: `action_${i}` }));
      }
      expect(onOverflow).not.toHaveBeenCalled();

      await audit.log(entry({ action: 'overflow_action' }));

      expect(onOverflow).toHaveBeenCalledTimes(1);
      expect(onOverflow.mock.calls[0]?.[0]).toHaveLength(4);

      const remaining = storage.entries().map((e) => e.action);
      expect(remaining).toEqual(['action_1', 'action_2', 'overflow_action']);
    });

    it('should pass maxEntries and onOverflow to the default storage', async () => {
      const onOverflow = vi.fn();
      const audit = new AuditService({ enabled: true, maxEntries: 2, onOverflow });

      for (let i = 0; i < 4; i++) {
        await audit.log(entry({ action: `action_${i}` }));
      }

      expect(onOverflow).toHaveBeenCalledTimes(2);
    });

    it('should report its size and hand out copies', async () => {
      const storage = new InMemoryAuditStorage({ maxEntries: 2 });
      storage.log(entry({ action: 'a' }));

      const snapshot = storage.entries();
      storage.log(entry({ action: 'b' }));

      expect(snapshot.map((e) => e.action)).toEqual(['a']);
      expect(storage.size).toBe(2);
    });
  });

  describe('Custom Storage', () => {
    it('should accept async storage implementations', async () => {
      const customStorage = { log: vi.fn().mockResolvedValue(undefined) };
      const audit = new AuditService({ enabled: true, storage: customStorage });
      const logged = entry();

      await audit.log(logged);

      expect(customStorage.log).toHaveBeenCalledWith(logged);
    });
  });

  describe('Write-Only API Design', () => {
    it('should not expose query methods', () => {
      const audit = new AuditService({ enabled: true });

      expect(audit).not.toHaveProperty('query');
      expect(audit).not.toHaveProperty('getEntries');
    });
  });
});
