/**
 * User Directory
 *
 * Read-only lookup of users and their roles, used by the directory masquerade
 * provider. Holds no credentials.
 */

import { foldCase } from '../core/index.js';

export interface DirectoryUser {
  /** Canonical user name as stored in the directory */
  name: string;

  /** Roles held by the user */
  roles: string[];

  /** Extra attributes handed to the resolved identity as claims */
  attributes?: Record<string, unknown>;
}

export interface UserDirectory {
  /**
   * Look up a user by name
   *
   * @returns The user, or undefined if the directory does not know them
   */
  findUser(userName: string): Promise<DirectoryUser | undefined>;
}

/**
 * In-memory directory keyed by case-insensitive user name
 *
 * Useful for development, tests and small static deployments.
 */
export class InMemoryUserDirectory implements UserDirectory {
  private readonly users = new Map<string, DirectoryUser>();

  constructor(users: DirectoryUser[] = []) {
    for (const user of users) {
      this.add(user);
    }
  }

  /**
   * Add or replace a user
   */
  add(user: DirectoryUser): void {
    this.users.set(foldCase(user.name), {
      name: user.name,
      roles: [...user.roles],
      attributes: user.attributes ? { ...user.attributes } : undefined,
    });
  }

  remove(userName: string): boolean {
    return this.users.delete(foldCase(userName));
  }

  /**
   * Returns a copy; changing it does not change the directory
   */
  async findUser(userName: string): Promise<DirectoryUser | undefined> {
    const user = this.users.get(foldCase(userName));
    if (!user) {
      return undefined;
    }
    return {
      name: user.name,
      roles: [...user.roles],
      attributes: user.attributes ? { ...user.attributes } : undefined,
    };
  }

  get size(): number {
    return this.users.size;
  }
}
