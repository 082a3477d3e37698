// Import Express middleware types
import type { NextFunction, Response } from 'express';
// Import Node.js crypto module for UUID generation
import { randomUUID } from 'node:crypto';
// Import request type carrying the request context
import type { CatalogRequest } from './request-context';

// Longest client-supplied request ID that is echoed back
const MAX_REQUEST_ID_LENGTH = 128;

/**
 * Request ID middleware - Assigns a correlation identifier to each HTTP request
 *
 * - If the client sends a usable 'x-request-id' header, reuse it
 * - Otherwise generate a UUID v4
 * - Attach it to req.requestId and echo it via the 'x-request-id' response header
 */
export function requestIdMiddleware(req: CatalogRequest, res: Response, next: NextFunction): void {
  // Try to read existing request ID from client's x-request-id header
  const incoming = req.header('x-request-id')?.trim();
  // Only printable ASCII of a bounded length is reused; anything else is replaced
  const requestId =
    incoming && incoming.length <= MAX_REQUEST_ID_LENGTH && /^[\x21-\x7e]+$/.test(incoming) ? incoming : randomUUID();
  req.requestId = requestId;
  res.setHeader('x-request-id', requestId);
  next();
}
