// Import Express middleware types
import type { NextFunction, Request, Response } from 'express';
// Import on-headers to run just before the status line and headers are written
import onHeaders from 'on-headers';
// Import the configuration snapshot holder
import type { SecurityConfigService, SecuritySnapshot } from '../../config/security-config.service';
// Import the header policy
import { applyHardening } from './header-policy';

/**
 * Decide whether a request arrived over a secure transport
 * X-Forwarded-Proto is only honoured when the proxy is trusted
 */
export function isSecureRequest(req: Request, snapshot: SecuritySnapshot): boolean {
  if (snapshot.httpsEnabled) return true;
  if (req.secure) return true;
  if (!snapshot.trustProxy) return false;
  const forwarded = req.header('x-forwarded-proto');
  return forwarded?.split(',')[0]?.trim().toLowerCase() === 'https';
}

/**
 * Create the response hardening middleware
 *
 * The snapshot is read once per request. Headers are applied from the on-headers
 * hook, after every handler and exception filter has run, so error responses are
 * hardened too and handlers cannot drop a header.
 *
 * @param security - Holder of the current configuration snapshot
 */
export function createHardeningMiddleware(security: SecurityConfigService) {
  return function hardeningMiddleware(req: Request, res: Response, next: NextFunction): void {
    const snapshot = security.current();
    const secure = isSecureRequest(req, snapshot);
    onHeaders(res, function applySecurityHeaders() {
      applyHardening(this, snapshot.headers, secure);
    });
    next();
  };
}
