// Import Express Request type
import type { Request } from 'express';
// Import principal variant
import type { Principal } from '../../iam/principals/principal.types';

/**
 * Per-request values attached by middleware and guards
 */
export interface RequestContext {
  /** Correlation ID set by requestIdMiddleware */
  requestId?: string;
  /** Principal resolved by PermissionGuard, cached for the rest of the request */
  principal?: Principal;
}

/**
 * Express request carrying the catalog's request context
 */
export type CatalogRequest = Request & RequestContext;

/**
 * Read the bearer token from the Authorization header
 * Anything other than a well-formed `Bearer <token>` header means "no token"
 * @param request - Incoming request
 * @returns Raw token or null
 */
export function extractBearerToken(request: Request): string | null {
  const header = request.header('authorization');
  if (!header) return null;

  const [scheme, token, ...rest] = header.trim().split(/\s+/);
  if (rest.length > 0) return null;
  if (!scheme || scheme.toLowerCase() !== 'bearer') return null;
  if (!token) return null;

  return token;
}

/**
 * Request path without the query string, safe for logs and error bodies
 */
export function safePath(request: Request): string {
  return (request.originalUrl ?? request.url ?? '').split('?')[0] ?? '';
}
