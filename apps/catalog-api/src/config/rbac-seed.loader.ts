// Import fs to read the seed file at startup
import { readFileSync } from 'node:fs';
// Import zod for runtime validation of the seed document
import { z } from 'zod';
// Import error raised for invalid policy configuration
import { ConfigurationError } from '../common/errors/catalog-errors';
// Import principal record shape
import type { PrincipalRecord } from '../iam/principals/principal.types';
// Import permission key type guard
import { isPermissionKey } from '../iam/rbac/permission.parser';
// Import role definition shape
import type { RoleDefinition } from '../iam/rbac/permission.types';

/**
 * Seed document schema
 * {
 *   "permissions": ["book:view", ...],
 *   "roles": { "Viewers": ["book:view"], ... },
 *   "principals": [{ "id": "viewer", "email": "...", "roles": ["Viewers"] }]
 * }
 */
const seedSchema = z.object({
  permissions: z.array(z.string().refine(isPermissionKey, 'expected <resource>:<action>')).min(1),
  roles: z.record(z.string().trim().min(1), z.array(z.string())),
  principals: z
    .array(
      z.object({
        id: z.string().trim().min(1),
        email: z.string().trim().min(1),
        superuser: z.boolean().default(false),
        roles: z.array(z.string()).default([])
      })
    )
    .default([])
});

/**
 * RbacSeed - Validated, cross-checked policy loaded at startup
 */
export interface RbacSeed {
  readonly permissions: readonly string[];
  readonly roles: readonly RoleDefinition[];
  readonly principals: readonly PrincipalRecord[];
}

/**
 * Validate a parsed seed document
 * @param raw - Parsed JSON
 * @param publicRole - Configured public role, which must be one of the seeded roles
 * @throws ConfigurationError when the document is malformed or inconsistent
 */
export function parseRbacSeed(raw: unknown, publicRole: string | null = null): RbacSeed {
  const result = seedSchema.safeParse(raw);
  if (!result.success) {
    const paths = Array.from(new Set(result.error.issues.map((issue) => issue.path.join('.') || '(root)')));
    throw new ConfigurationError(`Invalid RBAC seed. Missing/invalid: ${paths.join(', ')}.`);
  }

  const seed = result.data;
  const knownPermissions = new Set<string>(seed.permissions);
  const problems: string[] = [];

  const roles: RoleDefinition[] = [];
  for (const [name, permissions] of Object.entries(seed.roles)) {
    const unknown = permissions.filter((p) => !knownPermissions.has(p));
    if (unknown.length > 0) problems.push(`role "${name}" references unknown permissions ${unknown.join(', ')}`);
    roles.push({
      name,
      permissions: Array.from(new Set(permissions.filter(isPermissionKey))).sort()
    });
  }

  const roleNames = new Set(Object.keys(seed.roles));
  const seenIds = new Set<string>();
  for (const principal of seed.principals) {
    if (seenIds.has(principal.id)) problems.push(`principal "${principal.id}" is listed twice`);
    seenIds.add(principal.id);
    const unknown = principal.roles.filter((r) => !roleNames.has(r));
    if (unknown.length > 0) problems.push(`principal "${principal.id}" references unknown roles ${unknown.join(', ')}`);
  }

  if (publicRole !== null && !roleNames.has(publicRole)) {
    problems.push(`public role "${publicRole}" is not defined`);
  }

  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid RBAC seed: ${problems.join('; ')}.`);
  }

  return {
    permissions: seed.permissions,
    roles,
    principals: seed.principals
  };
}

/**
 * Read and validate the seed file
 * @param path - Absolute path of the JSON seed file
 * @param publicRole - Configured public role, if any
 */
export function loadRbacSeed(path: string, publicRole: string | null = null): RbacSeed {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Cannot read RBAC seed file ${path}: ${reason}`);
  }
  return parseRbacSeed(raw, publicRole);
}
