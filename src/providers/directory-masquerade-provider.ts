/**
 * Directory Masquerade Provider
 *
 * Resolves a masquerade target by looking it up in a UserDirectory. The
 * resolved identity carries the directory's roles for the target, which the
 * service then checks against the privilege-containment gate.
 *
 * Unknown targets are skipped rather than failed, so a later provider (another
 * directory, another realm) may still resolve them.
 */

import {
  AuthenticationResult,
  Identity,
  type MasqueradeProvider,
  type Principal,
} from '../core/index.js';
import type { UserDirectory } from './user-directory.js';

export interface DirectoryMasqueradeProviderOptions {
  /** Provider name (default: 'directory') */
  name?: string;

  /** authenticationType stamped on resolved identities (default: 'masquerade') */
  authenticationType?: string;
}

export class DirectoryMasqueradeProvider implements MasqueradeProvider {
  readonly name: string;
  private readonly authenticationType: string;

  constructor(
    private readonly directory: UserDirectory,
    options: DirectoryMasqueradeProviderOptions = {}
  ) {
    this.name = options.name ?? 'directory';
    this.authenticationType = options.authenticationType ?? 'masquerade';
  }

  async resolve(currentPrincipal: Principal, targetUserName: string): Promise<AuthenticationResult> {
    const user = await this.directory.findUser(targetUserName);

    if (!user) {
      console.log(`[DirectoryMasqueradeProvider:${this.name}] Target not found:`, {
        principal: currentPrincipal.name,
        targetUserName,
      });
      return AuthenticationResult.Skip;
    }

    return AuthenticationResult.success(
      new Identity(user.name, {
        roles: user.roles,
        authenticationType: this.authenticationType,
        claims: {
          ...user.attributes,
          masqueradedBy: currentPrincipal.name,
        },
      })
    );
  }
}
