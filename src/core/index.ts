/**
 * Core Module Public API
 *
 * All exports follow one-way dependency: Core → Providers → Config
 */

// ============================================================================
// Services
// ============================================================================

export { AuthenticationService } from './authentication-service.js';
export type { AuthServiceConfig } from './authentication-service.js';
export {
  NO_MASQUERADE_PROVIDERS_MESSAGE,
  INSUFFICIENT_PRIVILEGES_MESSAGE,
} from './authentication-service.js';

export { AuthenticationBuilder } from './authentication-builder.js';

export { ProviderAggregator } from './provider-aggregator.js';
export type { ProviderResolver } from './provider-aggregator.js';

export { AuditService, InMemoryAuditStorage, DEFAULT_MAX_AUDIT_ENTRIES } from './audit-service.js';
export type {
  AuditServiceConfig,
  AuditStorage,
  InMemoryAuditStorageOptions,
} from './audit-service.js';

// ============================================================================
// Results, identities and providers
// ============================================================================

export {
  AuthenticationResult,
  ACCESS_DENIED_MESSAGE,
  INVALID_MASQUERADE_TARGET_MESSAGE,
} from './authentication-result.js';
export type { AuthenticationResultInit } from './authentication-result.js';

export { Identity, Principal } from './identity.js';
export type { IdentityOptions } from './identity.js';

export { RoleSet, foldCase, equalsIgnoreCase } from './roles.js';

export { isAuthenticationProvider, isMasqueradeProvider } from './providers.js';
export type {
  AuthenticationProvider,
  MasqueradeProvider,
  ProviderResolution,
} from './providers.js';

// ============================================================================
// Masquerade policy
// ============================================================================

export {
  MasqueradePermissions,
  MasqueradeRestrictions,
  masqueradePermissionFromRoles,
  masqueradeRestrictionFromRoles,
  hasMasqueradePermission,
  isAccessibleMasqueradeTarget,
  describeMasqueradePolicy,
} from './masquerade-policy.js';
export type { MasqueradePermission, MasqueradeRestriction } from './masquerade-policy.js';

// ============================================================================
// Types
// ============================================================================

export { EXECUTION_ENVIRONMENTS, isExecutionEnvironment } from './types.js';
export type { ExecutionEnvironment, ProviderFamily, AuditEntry } from './types.js';

export { AuthError, AuthErrors, createAuthError, sanitizeError } from '../utils/errors.js';
