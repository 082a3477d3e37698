// Import resource access map type
import type { ResourceAccessMap } from '../rbac/permission.parser';

/**
 * AccessContextPrincipal - Identity part of the snapshot
 */
export type AccessContextPrincipal =
  | { kind: 'anonymous' }
  | { kind: 'user'; id: string; email: string; isSuperuser: boolean };

/**
 * AccessContext - Authorization snapshot returned by GET /me
 * Lets a client decide what to show without probing every endpoint
 */
export interface AccessContext {
  principal: AccessContextPrincipal;
  /** Role names held (sorted) */
  roles: readonly string[];
  /** Effective permission keys (sorted) */
  permissions: readonly string[];
  /** Per-resource action map */
  resources: ResourceAccessMap;
}
