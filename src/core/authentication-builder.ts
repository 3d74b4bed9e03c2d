/**
 * Authentication Builder - Startup-time provider registration
 *
 * Collects providers into ordered lists and builds an AuthenticationService.
 * Extensions that add providers (JWT, directory, ...) build on this class, so
 * every registration goes through the same duplicate and shape checks.
 *
 * Usage:
 * ```typescript
 * const service = new AuthenticationBuilder('production')
 *   .addAuthenticationProvider(new JwtAuthenticationProvider(jwtConfig))
 *   .addMasqueradeProvider(new DirectoryMasqueradeProvider(directory))
 *   .allowMasquerade(MasqueradePermissions.restrictedTo(['support']))
 *   .restrictMasqueradeTargets(MasqueradeRestrictions.deny(['admin']))
 *   .build();
 * ```
 */

import { AuthenticationService } from './authentication-service.js';
import { AuditService } from './audit-service.js';
import {
  MasqueradePermissions,
  MasqueradeRestrictions,
  type MasqueradePermission,
  type MasqueradeRestriction,
} from './masquerade-policy.js';
import {
  isAuthenticationProvider,
  isMasqueradeProvider,
  type AuthenticationProvider,
  type MasqueradeProvider,
} from './providers.js';
import type { ExecutionEnvironment, ProviderFamily } from './types.js';
import { AuthErrors } from '../utils/errors.js';

export class AuthenticationBuilder {
  private readonly authenticationProviders: AuthenticationProvider[] = [];
  private readonly masqueradeProviders: MasqueradeProvider[] = [];
  private masqueradePermission: MasqueradePermission = MasqueradePermissions.disabled();
  private masqueradeRestriction: MasqueradeRestriction = MasqueradeRestrictions.none();
  private auditService?: AuditService;

  constructor(private readonly environment: ExecutionEnvironment) {}

  /**
   * Append an authentication provider (tried after those already added)
   *
   * @throws AuthError if the object is not a provider or the name is taken
   */
  addAuthenticationProvider(provider: AuthenticationProvider): this {
    if (!isAuthenticationProvider(provider)) {
      throw AuthErrors.INVALID_PROVIDER('authentication');
    }
    this.assertUniqueName('authentication', this.authenticationProviders, provider.name);
    this.authenticationProviders.push(provider);
    return this;
  }

  /**
   * Append a masquerade provider (tried after those already added)
   *
   * @throws AuthError if the object is not a provider or the name is taken
   */
  addMasqueradeProvider(provider: MasqueradeProvider): this {
    if (!isMasqueradeProvider(provider)) {
      throw AuthErrors.INVALID_PROVIDER('masquerade');
    }
    this.assertUniqueName('masquerade', this.masqueradeProviders, provider.name);
    this.masqueradeProviders.push(provider);
    return this;
  }

  allowMasquerade(permission: MasqueradePermission): this {
    this.masqueradePermission = permission;
    return this;
  }

  restrictMasqueradeTargets(restriction: MasqueradeRestriction): this {
    this.masqueradeRestriction = restriction;
    return this;
  }

  withAuditService(auditService: AuditService): this {
    this.auditService = auditService;
    return this;
  }

  /**
   * Build the service. Later changes to this builder do not affect it.
   */
  build(): AuthenticationService {
    return new AuthenticationService(
      {
        environment: this.environment,
        authenticationProviders: [...this.authenticationProviders],
        masqueradeProviders: [...this.masqueradeProviders],
        masqueradePermission: this.masqueradePermission,
        masqueradeRestriction: this.masqueradeRestriction,
      },
      this.auditService
    );
  }

  private assertUniqueName(
    family: ProviderFamily,
    registered: readonly { readonly name: string }[],
    name: string
  ): void {
    if (registered.some((provider) => provider.name === name)) {
      throw AuthErrors.DUPLICATE_PROVIDER(family, name);
    }
  }
}
