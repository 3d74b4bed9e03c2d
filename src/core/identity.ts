/**
 * Identity and Principal
 *
 * The orchestration core inspects only role membership. Everything else an
 * identity carries (authentication type, claims) is passed through untouched
 * for the caller.
 */

import { RoleSet } from './roles.js';

export interface IdentityOptions {
  /** Roles held by the identity (compared case-insensitively) */
  roles?: Iterable<string>;

  /** Name of the mechanism that produced the identity (e.g. 'jwt', 'directory') */
  authenticationType?: string;

  /** Opaque claims for the caller; never read by this core */
  claims?: Record<string, unknown>;
}

/**
 * A single resolved identity
 */
export class Identity {
  readonly name: string;
  readonly authenticationType?: string;
  readonly claims: Readonly<Record<string, unknown>>;
  private readonly roleSet: RoleSet;

  constructor(name: string, options: IdentityOptions = {}) {
    this.name = name;
    this.authenticationType = options.authenticationType;
    this.claims = Object.freeze({ ...(options.claims ?? {}) });
    this.roleSet = new RoleSet(options.roles ?? []);
  }

  get roles(): RoleSet {
    return this.roleSet;
  }

  isInRole(role: string): boolean {
    return this.roleSet.has(role);
  }
}

/**
 * The principal on whose behalf a request runs.
 *
 * A principal may hold several identities (e.g. a primary login plus an
 * identity added by a second factor); its roles are the union of theirs.
 */
export class Principal {
  readonly identities: readonly Identity[];

  constructor(identities: readonly Identity[]) {
    this.identities = Object.freeze([...identities]);
  }

  static of(identity: Identity): Principal {
    return new Principal([identity]);
  }

  /**
   * Primary identity (first one), if any
   */
  get identity(): Identity | undefined {
    return this.identities[0];
  }

  get name(): string | undefined {
    return this.identity?.name;
  }

  getRoles(): RoleSet {
    return new RoleSet(this.identities.flatMap((identity) => identity.roles.values()));
  }

  isInRole(role: string): boolean {
    return this.identities.some((identity) => identity.isInRole(role));
  }
}
