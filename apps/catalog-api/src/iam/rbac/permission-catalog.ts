// Import error raised for invalid policy configuration
import { ConfigurationError } from '../../common/errors/catalog-errors';
// Import permission key helpers
import { isPermissionKey } from './permission.parser';
// Import PermissionKey type
import type { PermissionKey } from './permission.types';

/**
 * PermissionCatalog - The closed universe of permission tokens
 * Fixed at startup; tokens outside it are never granted to anyone but a superuser
 */
export class PermissionCatalog {
  private readonly keys = new Set<string>();
  private readonly sorted: readonly PermissionKey[];

  /**
   * @param keys - Every known permission key
   * @throws ConfigurationError if a key is malformed
   */
  constructor(keys: readonly string[]) {
    const valid: PermissionKey[] = [];
    for (const key of keys) {
      if (!isPermissionKey(key)) {
        throw new ConfigurationError(`Malformed permission key "${key}"; expected <resource>:<action>.`);
      }
      if (!this.keys.has(key)) valid.push(key);
      this.keys.add(key);
    }
    this.sorted = valid.sort();
  }

  /** True when `permission` belongs to the universe */
  has(permission: string): permission is PermissionKey {
    return this.keys.has(permission);
  }

  /** Every known key, sorted */
  list(): PermissionKey[] {
    return [...this.sorted];
  }

  /** Keys from `permissions` that are not in the universe, in input order */
  unknown(permissions: readonly string[]): string[] {
    return permissions.filter((p) => !this.has(p));
  }
}
