/**
 * Case-insensitive role names.
 *
 * Role comparison folds ASCII letters only (A-Z → a-z). Locale-aware or full
 * Unicode folding is not used, so authorization decisions do not depend on
 * the host's locale.
 */

const ASCII_UPPER = /[A-Z]/g;

/**
 * Fold a role or user name for ordinal, case-insensitive comparison
 */
export function foldCase(role: string): string {
  return role.replace(ASCII_UPPER, (c) => String.fromCharCode(c.charCodeAt(0) + 32));
}

/**
 * Ordinal case-insensitive string equality
 */
export function equalsIgnoreCase(a: string, b: string): boolean {
  return a.length === b.length && foldCase(a) === foldCase(b);
}

/**
 * Set of role names with case-insensitive membership.
 *
 * The first spelling seen for a role is the one reported by values().
 */
export class RoleSet implements Iterable<string> {
  private readonly roles = new Map<string, string>();

  constructor(roles: Iterable<string> = []) {
    for (const role of roles) {
      if (typeof role === 'string' && role.length > 0) {
        const key = foldCase(role);
        if (!this.roles.has(key)) {
          this.roles.set(key, role);
        }
      }
    }
  }

  get size(): number {
    return this.roles.size;
  }

  has(role: string): boolean {
    return this.roles.has(foldCase(role));
  }

  /**
   * True if any of the given roles is a member of this set
   */
  intersects(roles: Iterable<string>): boolean {
    for (const role of roles) {
      if (this.has(role)) {
        return true;
      }
    }
    return false;
  }

  /**
   * Roles of this set that are not in `other`
   */
  except(other: Iterable<string>): RoleSet {
    const excluded = other instanceof RoleSet ? other : new RoleSet(other);
    return new RoleSet(this.values().filter((role) => !excluded.has(role)));
  }

  values(): string[] {
    return Array.from(this.roles.values());
  }

  [Symbol.iterator](): Iterator<string> {
    return this.roles.values();
  }
}
