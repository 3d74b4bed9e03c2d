/**
 * Masquerade Policy - Permission and privilege-containment gates
 *
 * Two independent checks guard every masquerade:
 *
 * - Permission: may this principal masquerade at all?
 * - Containment: does the target hold a restricted role the principal does
 *   not already hold? If so the masquerade is refused, even when a provider
 *   resolved the target.
 *
 * Both gates compare role names case-insensitively (ASCII folding).
 */

import type { Identity, Principal } from './identity.js';
import { RoleSet } from './roles.js';

// ============================================================================
// Policy Values
// ============================================================================

/**
 * Who may initiate a masquerade
 *
 * - disabled: nobody
 * - unrestricted: any authenticated principal
 * - restricted: principals holding at least one of `roles`
 */
export type MasqueradePermission =
  | { readonly kind: 'disabled' }
  | { readonly kind: 'unrestricted' }
  | { readonly kind: 'restricted'; readonly roles: RoleSet };

/**
 * Which target roles a principal must already hold to masquerade as the target
 *
 * - none: any resolved target is accessible
 * - restricted: target roles the principal lacks must not appear in `roles`
 */
export type MasqueradeRestriction =
  | { readonly kind: 'none' }
  | { readonly kind: 'restricted'; readonly roles: RoleSet };

export const MasqueradePermissions = {
  disabled: (): MasqueradePermission => ({ kind: 'disabled' }),
  unrestricted: (): MasqueradePermission => ({ kind: 'unrestricted' }),
  /** An empty role list permits every principal, as in the list form */
  restrictedTo: (roles: Iterable<string>): MasqueradePermission => {
    const roleSet = new RoleSet(roles);
    return roleSet.size === 0 ? { kind: 'unrestricted' } : { kind: 'restricted', roles: roleSet };
  },
} as const;

export const MasqueradeRestrictions = {
  none: (): MasqueradeRestriction => ({ kind: 'none' }),
  deny: (roles: Iterable<string>): MasqueradeRestriction => ({
    kind: 'restricted',
    roles: new RoleSet(roles),
  }),
} as const;

/**
 * Map an optional role list to a permission
 *
 * null/undefined → disabled, [] → unrestricted, [...] → restricted
 */
export function masqueradePermissionFromRoles(
  roles: readonly string[] | null | undefined
): MasqueradePermission {
  if (roles === null || roles === undefined) {
    return MasqueradePermissions.disabled();
  }
  return MasqueradePermissions.restrictedTo(roles);
}

/**
 * Map an optional role list to a restriction
 *
 * null/undefined → none, otherwise → restricted (an empty list restricts nothing)
 */
export function masqueradeRestrictionFromRoles(
  roles: readonly string[] | null | undefined
): MasqueradeRestriction {
  if (roles === null || roles === undefined) {
    return MasqueradeRestrictions.none();
  }
  return MasqueradeRestrictions.deny(roles);
}

// ============================================================================
// Gates
// ============================================================================

/**
 * Permission gate: may `principal` masquerade?
 */
export function hasMasqueradePermission(
  permission: MasqueradePermission,
  principal: Principal
): boolean {
  switch (permission.kind) {
    case 'disabled':
      return false;
    case 'unrestricted':
      return true;
    case 'restricted':
      return permission.roles.intersects(principal.getRoles());
  }
}

/**
 * Privilege-containment gate: may `principal` act as `target`?
 *
 * Stops a principal from gaining roles through masquerade: every restricted
 * role the target holds must already be held by the principal.
 */
export function isAccessibleMasqueradeTarget(
  restriction: MasqueradeRestriction,
  principal: Principal,
  target: Identity
): boolean {
  if (restriction.kind === 'none') {
    return true;
  }

  const gained = target.roles.except(principal.getRoles());
  return !restriction.roles.intersects(gained);
}

/**
 * Plain-data view of a policy value (for logs and audit metadata)
 */
export function describeMasqueradePolicy(
  policy: MasqueradePermission | MasqueradeRestriction
): Record<string, unknown> {
  return 'roles' in policy ? { kind: policy.kind, roles: policy.roles.values() } : { kind: policy.kind };
}
