// Import principal record shape
import type { PrincipalRecord } from './principal.types';

/**
 * PrincipalDirectory - In-memory principal records keyed by ID
 *
 * Records are replaced whole on every change, so a reader never observes a
 * half-applied role assignment.
 */
export class PrincipalDirectory {
  private readonly records = new Map<string, PrincipalRecord>();

  constructor(seed: readonly PrincipalRecord[] = []) {
    for (const record of seed) this.upsert(record);
  }

  /** Record for `id`, or null */
  find(id: string): PrincipalRecord | null {
    return this.records.get(id) ?? null;
  }

  has(id: string): boolean {
    return this.records.has(id);
  }

  /** Insert or replace a record */
  upsert(record: PrincipalRecord): void {
    this.records.set(
      record.id,
      Object.freeze({ ...record, roles: Object.freeze(Array.from(new Set(record.roles)).sort()) })
    );
  }

  /**
   * Add `role` to the principal's roles
   * @returns false when the principal is unknown or already holds the role
   */
  addRole(id: string, role: string): boolean {
    const record = this.records.get(id);
    if (!record || record.roles.includes(role)) return false;
    this.upsert({ ...record, roles: [...record.roles, role] });
    return true;
  }
}
