// Import NestJS Injectable decorator
import { Injectable } from '@nestjs/common';
// Import ConfigService to read the token verification settings
import { ConfigService } from '@nestjs/config';
// Import jose for JWT verification
import { errors, jwtVerify } from 'jose';
// Import validated environment type
import type { AppEnv } from '../../config/env.validation';
// Import permission model (known role names)
import { PermissionService } from '../rbac/permission.service';
// Import principal records
import { PrincipalDirectory } from './principal-directory';
// Import lookup contract
import { PrincipalLookup } from './principal-lookup';
// Import principal variant and builders
import { ANONYMOUS, type Principal, toUserPrincipal } from './principal.types';

/**
 * Type guard for non-empty strings
 */
function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * JwtPrincipalLookup - Verifies HS256 bearer tokens and loads the subject's record
 *
 * Issuer, audience, signature and expiry are all checked. Claims other than `sub`
 * are ignored; roles and superuser status come only from the directory.
 */
@Injectable()
export class JwtPrincipalLookup extends PrincipalLookup {
  private readonly key: Uint8Array;
  private readonly issuer: string;
  private readonly audience: string;

  /**
   * @param config - Validated environment (secret, issuer, audience)
   * @param directory - Principal records
   * @param permissions - Permission model, to filter role names
   */
  constructor(
    config: ConfigService<AppEnv, true>,
    private readonly directory: PrincipalDirectory,
    private readonly permissions: PermissionService
  ) {
    super();
    this.key = new TextEncoder().encode(config.get('AUTH_JWT_SECRET', { infer: true }));
    this.issuer = config.get('AUTH_JWT_ISSUER', { infer: true });
    this.audience = config.get('AUTH_JWT_AUDIENCE', { infer: true });
  }

  async resolve(token: string | null): Promise<Principal> {
    if (!isNonEmptyString(token)) return ANONYMOUS;

    let subject: string;
    try {
      const { payload } = await jwtVerify(token, this.key, {
        issuer: this.issuer,
        audience: this.audience,
        algorithms: ['HS256']
      });
      if (!isNonEmptyString(payload.sub)) return ANONYMOUS;
      subject = payload.sub;
    } catch (err: unknown) {
      // Malformed, expired or mis-signed: the caller is simply not authenticated.
      if (err instanceof errors.JOSEError) return ANONYMOUS;
      throw err;
    }

    const record = this.directory.find(subject);
    if (!record) return ANONYMOUS;

    return toUserPrincipal(record, (name) => this.permissions.hasRole(name));
  }
}
