// Import PermissionKey type
import type { PermissionKey } from './permission.types';

/**
 * ParsedPermission - Decomposed permission key
 * Breaks 'resource:action' format into components for processing
 */
export interface ParsedPermission {
  /** Resource name (e.g., 'book', 'role') */
  resource: string;
  /** Action on the resource (e.g., 'view', 'create', 'edit', 'delete') */
  action: string;
}

/**
 * Parses a permission key in the standard form: <resource>:<action>
 *
 * Returns null for malformed inputs:
 * - Empty strings
 * - Missing colon
 * - Multiple colons
 * - Empty resource or action
 * - Whitespace inside either part
 *
 * @param value - Permission key string (e.g., 'book:create')
 * @returns Parsed components or null if invalid
 */
export function parsePermissionKey(value: string): ParsedPermission | null {
  const raw = value.trim();
  if (raw.length === 0) return null;

  const firstColon = raw.indexOf(':');
  // Colon must exist and not be at start or end
  if (firstColon <= 0 || firstColon === raw.length - 1) return null;
  // Only one ':' is allowed (no 'resource:sub:action')
  if (raw.indexOf(':', firstColon + 1) !== -1) return null;

  const resource = raw.slice(0, firstColon);
  const action = raw.slice(firstColon + 1);
  if (/\s/.test(resource) || /\s/.test(action)) return null;

  return { resource, action };
}

/**
 * Type guard for well-formed permission keys (exact, untrimmed form)
 */
export function isPermissionKey(value: string): value is PermissionKey {
  const parsed = parsePermissionKey(value);
  return parsed !== null && value === `${parsed.resource}:${parsed.action}`;
}

/** Resource access map: resource -> action -> granted */
export type ResourceAccessMap = Record<string, Record<string, boolean>>;

// Action that gates whether a resource is visible at all
const VISIBILITY_ACTION = 'view';

/**
 * Builds the per-resource access snapshot returned by GET /me.
 *
 * - `allPermissionKeys` defines the universe of resource/action pairs
 * - `grantedPermissionKeys` are the principal's effective permissions
 * - Every resource in the universe reports `view`, defaulting to false
 * - Resources and actions are sorted for deterministic output
 */
export function buildResourceAccessMap(options: {
  allPermissionKeys: readonly string[];
  grantedPermissionKeys: readonly string[];
}): ResourceAccessMap {
  const universe = new Map<string, Set<string>>();
  for (const key of options.allPermissionKeys) {
    const parsed = parsePermissionKey(key);
    if (!parsed) continue;
    const actions = universe.get(parsed.resource) ?? new Set<string>([VISIBILITY_ACTION]);
    actions.add(parsed.action);
    universe.set(parsed.resource, actions);
  }

  const granted = new Set(options.grantedPermissionKeys.map((k) => k.trim()));

  const result: ResourceAccessMap = {};
  for (const resource of Array.from(universe.keys()).sort()) {
    const actions = universe.get(resource) ?? new Set<string>();
    const resourceMap: Record<string, boolean> = {};
    for (const action of Array.from(actions).sort()) {
      resourceMap[action] = granted.has(`${resource}:${action}`);
    }
    result[resource] = resourceMap;
  }

  return result;
}
