/**
 * Audit Service - Trail of authentication and masquerade decisions
 *
 * Every call to AuthenticationService.authenticate/masquerade produces one
 * entry. The service is a Null Object until enabled, so callers never check
 * whether auditing is configured.
 */

import type { AuditEntry } from './types.js';

export interface AuditServiceConfig {
  /** default: false */
  enabled?: boolean;

  /** Record successful decisions too; false keeps failures and skips only (default: true) */
  logAllAttempts?: boolean;

  /** Capacity of the default in-memory trail (default: 10000) */
  maxEntries?: number;

  /** Where entries go (default: InMemoryAuditStorage) */
  storage?: AuditStorage;

  /** Receives the full trail when the default storage runs over capacity */
  onOverflow?: (entries: AuditEntry[]) => void;
}

/**
 * Write-only sink for audit entries
 */
export interface AuditStorage {
  log(entry: AuditEntry): Promise<void> | void;
}

export const DEFAULT_MAX_AUDIT_ENTRIES = 10000;

export interface InMemoryAuditStorageOptions {
  maxEntries?: number;
  onOverflow?: (entries: AuditEntry[]) => void;
}

/**
 * Bounded in-memory trail holding the newest `maxEntries` decisions.
 *
 * When an entry pushes the trail over capacity, `onOverflow` gets a copy of
 * the whole trail (new entry included) and the oldest entries are dropped.
 */
export class InMemoryAuditStorage implements AuditStorage {
  private readonly trail: AuditEntry[] = [];
  private readonly maxEntries: number;
  private readonly onOverflow?: (entries: AuditEntry[]) => void;

  constructor(options: InMemoryAuditStorageOptions = {}) {
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_AUDIT_ENTRIES;
    this.onOverflow = options.onOverflow;
  }

  log(entry: AuditEntry): void {
    this.trail.push(entry);

    const excess = this.trail.length - this.maxEntries;
    if (excess > 0) {
      this.onOverflow?.(this.trail.slice());
      this.trail.splice(0, excess);
    }
  }

  /**
   * Entries oldest first
   */
  entries(): readonly AuditEntry[] {
    return this.trail.slice();
  }

  get size(): number {
    return this.trail.length;
  }
}

/**
 * Usage:
 * ```typescript
 * // Failures only, archived when the in-memory trail fills up
 * const audit = new AuditService({
 *   enabled: true,
 *   logAllAttempts: false,
 *   onOverflow: (entries) => archive.write(entries),
 * });
 * const auth = new AuthenticationService(config, audit);
 * ```
 */
export class AuditService {
  readonly storage: AuditStorage;
  private readonly enabled: boolean;
  private readonly logAllAttempts: boolean;

  constructor(config: AuditServiceConfig = {}) {
    this.enabled = config.enabled ?? false;
    this.logAllAttempts = config.logAllAttempts ?? true;
    this.storage =
      config.storage ??
      new InMemoryAuditStorage({ maxEntries: config.maxEntries, onOverflow: config.onOverflow });
  }

  /**
   * Record one decision
   *
   * @throws Error if the entry has no source
   */
  async log(entry: AuditEntry): Promise<void> {
    if (!this.enabled) {
      return;
    }

    if (!entry.source) {
      throw new Error(
        'AuditEntry missing required field: source. ' +
          'All audit entries must include a source field.'
      );
    }

    if (this.shouldRecord(entry)) {
      await this.storage.log(entry.timestamp ? entry : { ...entry, timestamp: new Date() });
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  private shouldRecord(entry: AuditEntry): boolean {
    return this.logAllAttempts || !entry.success;
  }
}
