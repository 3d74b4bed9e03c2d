/**
 * AuthenticationResult Tests
 *
 * Outcome invariants, factories and value equality.
 */

import { describe, it, expect } from 'vitest';
import {
  AuthenticationResult,
  ACCESS_DENIED_MESSAGE,
  INVALID_MASQUERADE_TARGET_MESSAGE,
  type AuthenticationResultInit,
} from '../../../src/core/authentication-result.js';
import { Identity } from '../../../src/core/identity.js';
import { AuthError } from '../../../src/utils/errors.js';

// Exposes the protected constructor to exercise the invariant checks
class RawResult extends AuthenticationResult {
  constructor(init: AuthenticationResultInit) {
    super(init);
  }
}

describe('AuthenticationResult', () => {
  describe('factories', () => {
    it('should create a success carrying the identity and no errors', () => {
      const identity = new Identity('alice');
      const result = AuthenticationResult.success(identity);

      expect(result.successful).toBe(true);
      expect(result.skipped).toBe(false);
      expect(result.failed).toBe(false);
      expect(result.identity).toBe(identity);
      expect(result.errors.size).toBe(0);
    });

    it('should expose a single Skip value', () => {
      expect(AuthenticationResult.Skip.skipped).toBe(true);
      expect(AuthenticationResult.Skip.successful).toBe(false);
      expect(AuthenticationResult.Skip.identity).toBeNull();
      expect(AuthenticationResult.Skip.errors.size).toBe(0);
    });

    it('should create a failure from one message', () => {
      const result = AuthenticationResult.failure('Bad password');

      expect(result.failed).toBe(true);
      expect([...result.errors]).toEqual(['Bad password']);
    });

    it('should de-duplicate failure messages', () => {
      const result = AuthenticationResult.failure(['x', 'y', 'x']);

      expect([...result.errors]).toEqual(['x', 'y']);
    });

    it('should provide the fixed access-denied and invalid-target failures', () => {
      expect([...AuthenticationResult.AccessDenied.errors]).toEqual([ACCESS_DENIED_MESSAGE]);
      expect([...AuthenticationResult.InvalidMasqueradeTarget.errors]).toEqual([
        INVALID_MASQUERADE_TARGET_MESSAGE,
      ]);
      expect(ACCESS_DENIED_MESSAGE).toBe('Access denied.');
      expect(INVALID_MASQUERADE_TARGET_MESSAGE).toBe('Invalid masquerade target.');
    });
  });

  describe('invariants', () => {
    it('should reject a failure without errors', () => {
      expect(() => AuthenticationResult.failure([])).toThrow(AuthError);
      expect(() => AuthenticationResult.failure([])).toThrow(
        'Invalid authentication result: a failure requires at least one error'
      );
    });

    it('should reject a result that is both successful and skipped', () => {
      expect(
        () =>
          new RawResult({
            successful: true,
            skipped: true,
            identity: new Identity('alice'),
            errors: [],
          })
      ).toThrow('a result cannot be both successful and skipped');
    });

    it('should reject a success without identity', () => {
      expect(
        () => new RawResult({ successful: true, skipped: false, identity: null, errors: [] })
      ).toThrow('identity must be present exactly when successful');
    });

    it('should reject an identity on a non-success', () => {
      expect(
        () =>
          new RawResult({
            successful: false,
            skipped: true,
            identity: new Identity('alice'),
            errors: [],
          })
      ).toThrow('identity must be present exactly when successful');
    });

    it('should reject errors on a skip', () => {
      expect(
        () => new RawResult({ successful: false, skipped: true, identity: null, errors: ['x'] })
      ).toThrow('only failures may carry errors');
    });

    it('should report the INVALID_RESULT code', () => {
      try {
        AuthenticationResult.failure([]);
        expect.fail('should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(AuthError);
        if (error instanceof AuthError) {
          expect(error.code).toBe('INVALID_RESULT');
        }
      }
    });
  });

  describe('equals', () => {
    it('should treat failures with the same error set as equal', () => {
      const a = AuthenticationResult.failure(['x', 'y']);
      const b = AuthenticationResult.failure(['y', 'x']);

      expect(a.equals(b)).toBe(true);
    });

    it('should distinguish failures with different errors', () => {
      expect(AuthenticationResult.failure('x').equals(AuthenticationResult.failure('y'))).toBe(
        false
      );
    });

    it('should compare identities by reference', () => {
      const identity = new Identity('alice');

      expect(
        AuthenticationResult.success(identity).equals(AuthenticationResult.success(identity))
      ).toBe(true);
      expect(
        AuthenticationResult.success(identity).equals(
          AuthenticationResult.success(new Identity('alice'))
        )
      ).toBe(false);
    });

    it('should never equal null or undefined', () => {
      expect(AuthenticationResult.Skip.equals(null)).toBe(false);
      expect(AuthenticationResult.Skip.equals(undefined)).toBe(false);
    });
  });

  describe('toJSON', () => {
    it('should serialize the identity by name', () => {
      const result = AuthenticationResult.success(new Identity('alice'));

      expect(result.toJSON()).toEqual({
        successful: true,
        skipped: false,
        identity: 'alice',
        errors: [],
      });
    });

    it('should serialize failures with their errors', () => {
      expect(AuthenticationResult.failure('x').toJSON()).toEqual({
        successful: false,
        skipped: false,
        identity: null,
        errors: ['x'],
      });
    });
  });
});
