/**
 * Authentication Result - Immutable decision value
 *
 * Exactly one of three outcomes holds:
 * - success: `identity` is set, `errors` is empty
 * - skip: the provider (or aggregation) expressed no opinion
 * - failure: one or more human-readable error messages
 *
 * Results are compared by value (flags, identity reference, error set) so
 * equal failures from different providers collapse into one.
 */

import type { Identity } from './identity.js';
import { AuthErrors } from '../utils/errors.js';

export const ACCESS_DENIED_MESSAGE = 'Access denied.';
export const INVALID_MASQUERADE_TARGET_MESSAGE = 'Invalid masquerade target.';

export interface AuthenticationResultInit {
  successful: boolean;
  skipped: boolean;
  identity: Identity | null;
  errors: Iterable<string>;
}

export class AuthenticationResult {
  readonly successful: boolean;
  readonly skipped: boolean;
  readonly identity: Identity | null;
  readonly errors: ReadonlySet<string>;

  /**
   * Protected so providers can subclass to attach their own metadata.
   * Use the static factories otherwise.
   *
   * @throws AuthError (INVALID_RESULT) if the fields describe no single outcome
   */
  protected constructor(init: AuthenticationResultInit) {
    const errors = new Set(init.errors);

    if (init.successful && init.skipped) {
      throw AuthErrors.INVALID_RESULT('a result cannot be both successful and skipped');
    }
    if (init.successful !== (init.identity !== null)) {
      throw AuthErrors.INVALID_RESULT('identity must be present exactly when successful');
    }
    if ((init.successful || init.skipped) && errors.size > 0) {
      throw AuthErrors.INVALID_RESULT('only failures may carry errors');
    }
    if (!init.successful && !init.skipped && errors.size === 0) {
      throw AuthErrors.INVALID_RESULT('a failure requires at least one error');
    }

    this.successful = init.successful;
    this.skipped = init.skipped;
    this.identity = init.identity;
    this.errors = errors;
  }

  // ==========================================================================
  // Factories
  // ==========================================================================

  /** No opinion: the provider declined to answer */
  static readonly Skip: AuthenticationResult = new AuthenticationResult({
    successful: false,
    skipped: true,
    identity: null,
    errors: [],
  });

  static readonly AccessDenied: AuthenticationResult = AuthenticationResult.failure(
    ACCESS_DENIED_MESSAGE
  );

  static readonly InvalidMasqueradeTarget: AuthenticationResult = AuthenticationResult.failure(
    INVALID_MASQUERADE_TARGET_MESSAGE
  );

  static success(identity: Identity): AuthenticationResult {
    return new AuthenticationResult({
      successful: true,
      skipped: false,
      identity,
      errors: [],
    });
  }

  static failure(messages: string | Iterable<string>): AuthenticationResult {
    return new AuthenticationResult({
      successful: false,
      skipped: false,
      identity: null,
      errors: typeof messages === 'string' ? [messages] : messages,
    });
  }

  // ==========================================================================
  // Value semantics
  // ==========================================================================

  /**
   * True if the outcome is a failure (neither successful nor skipped)
   */
  get failed(): boolean {
    return !this.successful && !this.skipped;
  }

  equals(other: AuthenticationResult | null | undefined): boolean {
    if (!other) {
      return false;
    }
    if (other === this) {
      return true;
    }
    return (
      this.successful === other.successful &&
      this.skipped === other.skipped &&
      this.identity === other.identity &&
      this.errors.size === other.errors.size &&
      [...this.errors].every((error) => other.errors.has(error))
    );
  }

  toJSON(): Record<string, unknown> {
    return {
      successful: this.successful,
      skipped: this.skipped,
      identity: this.identity?.name ?? null,
      errors: [...this.errors],
    };
  }
}
