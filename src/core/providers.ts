/**
 * Provider Interfaces
 *
 * A provider is a pluggable backend that attempts to resolve one
 * authentication or masquerade request. Providers are registered in order at
 * startup and tried in that order by the ProviderAggregator.
 *
 * Design Principles:
 * - Return AuthenticationResult.Skip when the request is not for this provider
 * - Return a failure result for expected negative outcomes (bad credentials,
 *   unknown user) - do NOT throw for those
 * - Throw only for unexpected failures (directory unreachable, etc.); such
 *   errors propagate to the caller and are not masked as failures
 */

import type { AuthenticationResult } from './authentication-result.js';
import type { Principal } from './identity.js';
import type { ExecutionEnvironment } from './types.js';

/**
 * What a provider may hand back. null/undefined is treated like Skip.
 */
export type ProviderResolution = AuthenticationResult | null | undefined;

/**
 * Verifies user credentials against a backend.
 *
 * @example
 * ```typescript
 * class DirectoryProvider implements AuthenticationProvider {
 *   readonly name = 'directory';
 *
 *   async resolve(userName, password, environment) {
 *     const user = await this.directory.bind(userName, password, environment);
 *     return user
 *       ? AuthenticationResult.success(new Identity(user.name, { roles: user.groups }))
 *       : AuthenticationResult.failure('Invalid user name or password.');
 *   }
 * }
 * ```
 */
export interface AuthenticationProvider {
  /** Unique provider name (used for logging and duplicate detection) */
  readonly name: string;

  resolve(
    userName: string,
    password: string,
    environment: ExecutionEnvironment
  ): Promise<ProviderResolution>;
}

/**
 * Produces the identity of a target user for an already authenticated principal.
 */
export interface MasqueradeProvider {
  /** Unique provider name (used for logging and duplicate detection) */
  readonly name: string;

  resolve(currentPrincipal: Principal, targetUserName: string): Promise<ProviderResolution>;
}

function hasProviderShape(obj: unknown): obj is { name: unknown; resolve: unknown } {
  return typeof obj === 'object' && obj !== null && 'name' in obj && 'resolve' in obj;
}

/**
 * Type guard to check if an object implements AuthenticationProvider
 */
export function isAuthenticationProvider(obj: unknown): obj is AuthenticationProvider {
  return (
    hasProviderShape(obj) &&
    typeof obj.name === 'string' &&
    obj.name.length > 0 &&
    typeof obj.resolve === 'function'
  );
}

/**
 * Type guard to check if an object implements MasqueradeProvider
 *
 * Both families share a shape; the distinction is made by the registration
 * method used, not at runtime.
 */
export function isMasqueradeProvider(obj: unknown): obj is MasqueradeProvider {
  return isAuthenticationProvider(obj);
}
