/**
 * Authentication Service - Orchestrates providers and masquerade gates
 *
 * Coordinates:
 * - Authentication providers (credential verification)
 * - Masquerade providers (target identity resolution)
 * - Masquerade permission and privilege-containment gates
 * - Audit logging (AuditService)
 *
 * CRITICAL POLICIES:
 * - Business failures are returned as AuthenticationResult, never thrown
 * - A null principal is a caller error and throws (AuthError ARGUMENT_NULL)
 * - Provider exceptions are audited and rethrown, not turned into failures
 * - Source field is 'auth:service' for all audit entries
 */

import { AuthenticationResult } from './authentication-result.js';
import type { Principal } from './identity.js';
import {
  hasMasqueradePermission,
  isAccessibleMasqueradeTarget,
  describeMasqueradePolicy,
  MasqueradePermissions,
  MasqueradeRestrictions,
  type MasqueradePermission,
  type MasqueradeRestriction,
} from './masquerade-policy.js';
import { ProviderAggregator } from './provider-aggregator.js';
import type { AuthenticationProvider, MasqueradeProvider } from './providers.js';
import { AuditService } from './audit-service.js';
import type { AuditEntry, ExecutionEnvironment } from './types.js';
import { AuthErrors, sanitizeError } from '../utils/errors.js';

export const NO_MASQUERADE_PROVIDERS_MESSAGE =
  'No masquerade providers configured in the application.';
export const INSUFFICIENT_PRIVILEGES_MESSAGE =
  'Insufficient privileges to masquerade as target user.';

const AUDIT_SOURCE = 'auth:service';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Authentication service configuration
 *
 * Read once at construction; the service keeps a frozen copy.
 */
export interface AuthServiceConfig {
  /** Default environment credentials are verified against */
  environment: ExecutionEnvironment;

  /** Authentication providers, in the order they are tried */
  authenticationProviders?: readonly AuthenticationProvider[];

  /** Masquerade providers, in the order they are tried */
  masqueradeProviders?: readonly MasqueradeProvider[];

  /** Who may masquerade (default: disabled) */
  masqueradePermission?: MasqueradePermission;

  /** Which targets are off limits (default: none) */
  masqueradeRestriction?: MasqueradeRestriction;
}

interface ResolvedAuthServiceConfig {
  readonly environment: ExecutionEnvironment;
  readonly authenticationProviders: readonly AuthenticationProvider[];
  readonly masqueradeProviders: readonly MasqueradeProvider[];
  readonly masqueradePermission: MasqueradePermission;
  readonly masqueradeRestriction: MasqueradeRestriction;
}

/** Which step of the masquerade flow produced the result */
type MasqueradeGate = 'providers' | 'permission' | 'target' | 'aggregation' | 'privileges';

function outcomeOf(result: AuthenticationResult): 'success' | 'skip' | 'failure' {
  if (result.successful) {
    return 'success';
  }
  return result.skipped ? 'skip' : 'failure';
}

// ============================================================================
// Authentication Service Class
// ============================================================================

/**
 * Usage:
 * ```typescript
 * const auth = new AuthenticationService({
 *   environment: 'production',
 *   authenticationProviders: [jwtProvider],
 *   masqueradeProviders: [directoryProvider],
 *   masqueradePermission: MasqueradePermissions.restrictedTo(['support']),
 *   masqueradeRestriction: MasqueradeRestrictions.deny(['admin']),
 * });
 *
 * const result = await auth.authenticate('alice', token);
 * if (result.successful) {
 *   // result.identity is set
 * } else if (result.skipped) {
 *   // no provider could answer
 * } else {
 *   // result.errors explains why
 * }
 * ```
 */
export class AuthenticationService {
  private readonly config: ResolvedAuthServiceConfig;
  private readonly auditService: AuditService;
  private readonly authenticationAggregator = new ProviderAggregator('authentication');
  private readonly masqueradeAggregator = new ProviderAggregator('masquerade');

  /**
   * @param config - Service configuration
   * @param auditService - Optional audit service (Null Object Pattern if not provided)
   */
  constructor(config: AuthServiceConfig, auditService?: AuditService) {
    this.config = Object.freeze({
      environment: config.environment,
      authenticationProviders: Object.freeze([...(config.authenticationProviders ?? [])]),
      masqueradeProviders: Object.freeze([...(config.masqueradeProviders ?? [])]),
      masqueradePermission: config.masqueradePermission ?? MasqueradePermissions.disabled(),
      masqueradeRestriction: config.masqueradeRestriction ?? MasqueradeRestrictions.none(),
    });
    this.auditService = auditService ?? new AuditService(); // Null Object Pattern
  }

  /**
   * Authenticate a user by their credentials
   *
   * @param userName - Identifier of the user being authenticated
   * @param password - Credential presented by the user
   * @param environment - Target environment (defaults to the configured one)
   * @returns The first provider success, the merged provider failures, or Skip
   */
  async authenticate(
    userName: string,
    password: string,
    environment?: ExecutionEnvironment
  ): Promise<AuthenticationResult> {
    const targetEnvironment = environment ?? this.config.environment;
    const metadata = { environment: targetEnvironment };

    let result: AuthenticationResult;
    try {
      result = await this.authenticationAggregator.resolve(
        this.config.authenticationProviders,
        (provider) => provider.resolve(userName, password, targetEnvironment)
      );
    } catch (error) {
      console.error('[AuthenticationService] Authentication provider error:', sanitizeError(error));
      await this.auditError(error, { userId: userName, action: 'authenticate', metadata });
      throw error;
    }

    console.log('[AuthenticationService] Authentication decided:', {
      userName,
      environment: targetEnvironment,
      outcome: outcomeOf(result),
    });
    await this.audit(result, { userId: userName, action: 'authenticate', metadata });

    return result;
  }

  /**
   * Attempt to obtain a masqueraded identity for a target user
   *
   * Gates are evaluated in order and the first one that triggers decides:
   * providers configured → permission → target name → providers → privileges.
   *
   * @param currentPrincipal - The principal attempting to masquerade
   * @param targetUserName - The user to masquerade as
   * @throws AuthError (ARGUMENT_NULL) if currentPrincipal is null or undefined
   */
  async masquerade(
    currentPrincipal: Principal | null | undefined,
    targetUserName: string | null | undefined
  ): Promise<AuthenticationResult> {
    if (currentPrincipal === null || currentPrincipal === undefined) {
      throw AuthErrors.ARGUMENT_NULL('currentPrincipal');
    }

    const principal = currentPrincipal;
    const metadata = { targetUserName: targetUserName ?? null };

    const decide = async (
      result: AuthenticationResult,
      gate: MasqueradeGate
    ): Promise<AuthenticationResult> => {
      console.log('[AuthenticationService] Masquerade decided:', {
        principal: principal.name,
        targetUserName,
        gate,
        outcome: outcomeOf(result),
      });
      await this.audit(result, {
        userId: principal.name,
        action: 'masquerade',
        metadata: { ...metadata, gate },
      });
      return result;
    };

    if (this.config.masqueradeProviders.length === 0) {
      return decide(AuthenticationResult.failure(NO_MASQUERADE_PROVIDERS_MESSAGE), 'providers');
    }

    if (!hasMasqueradePermission(this.config.masqueradePermission, principal)) {
      return decide(AuthenticationResult.AccessDenied, 'permission');
    }

    if (!targetUserName) {
      return decide(AuthenticationResult.InvalidMasqueradeTarget, 'target');
    }
    const target = targetUserName;

    let result: AuthenticationResult;
    try {
      result = await this.masqueradeAggregator.resolve(this.config.masqueradeProviders, (provider) =>
        provider.resolve(principal, target)
      );
    } catch (error) {
      console.error('[AuthenticationService] Masquerade provider error:', sanitizeError(error));
      await this.auditError(error, {
        userId: principal.name,
        action: 'masquerade',
        metadata: { ...metadata, gate: 'aggregation' },
      });
      throw error;
    }

    if (
      result.successful &&
      result.identity !== null &&
      !isAccessibleMasqueradeTarget(this.config.masqueradeRestriction, principal, result.identity)
    ) {
      return decide(AuthenticationResult.failure(INSUFFICIENT_PRIVILEGES_MESSAGE), 'privileges');
    }

    return decide(result, 'aggregation');
  }

  /**
   * Default environment used when authenticate() is called without one
   */
  getEnvironment(): ExecutionEnvironment {
    return this.config.environment;
  }

  /**
   * Snapshot of the configuration, for status display
   */
  describe(): Record<string, unknown> {
    return {
      environment: this.config.environment,
      authenticationProviders: this.config.authenticationProviders.map((p) => p.name),
      masqueradeProviders: this.config.masqueradeProviders.map((p) => p.name),
      masqueradePermission: describeMasqueradePolicy(this.config.masqueradePermission),
      masqueradeRestriction: describeMasqueradePolicy(this.config.masqueradeRestriction),
    };
  }

  // ==========================================================================
  // Audit helpers
  // ==========================================================================

  private async audit(
    result: AuthenticationResult,
    entry: Pick<AuditEntry, 'userId' | 'action' | 'metadata'>
  ): Promise<void> {
    await this.auditService.log({
      timestamp: new Date(),
      source: AUDIT_SOURCE,
      userId: entry.userId,
      action: entry.action,
      success: result.successful,
      reason: result.failed ? [...result.errors].join('; ') : undefined,
      metadata: { ...entry.metadata, outcome: outcomeOf(result) },
    });
  }

  /**
   * Audit a provider exception. Called just before the exception is rethrown,
   * so a failing audit write is logged here and must not replace it.
   */
  private async auditError(
    error: unknown,
    entry: Pick<AuditEntry, 'userId' | 'action' | 'metadata'>
  ): Promise<void> {
    try {
      await this.auditService.log({
        timestamp: new Date(),
        source: AUDIT_SOURCE,
        userId: entry.userId,
        action: entry.action,
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error',
        metadata: entry.metadata,
      });
    } catch (auditFailure) {
      console.error(
        '[AuthenticationService] Failed to audit provider error:',
        sanitizeError(auditFailure)
      );
    }
  }
}
