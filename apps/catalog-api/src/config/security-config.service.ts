// Import NestJS Injectable decorator
import { Injectable } from '@nestjs/common';
// Import ConfigService to read the validated environment
import { ConfigService } from '@nestjs/config';
// Import header policy configuration shape
import type { CspDirective, HeaderPolicyConfig } from '../security/headers/header-policy';
// Import validated environment type
import type { AppEnv } from './env.validation';

/** Lowest publication year any book may carry */
export const PUBLICATION_YEAR_MIN = 1000;

/**
 * Settings the sanitizing validator reads
 */
export interface ValidationSettings {
  readonly publicationYearMin: number;
  readonly publicationYearMax: number;
}

/**
 * Immutable security configuration in effect for a request
 *
 * Consumers read the whole snapshot once per request; a reload swaps in a new
 * snapshot and never edits fields of the current one.
 */
export interface SecuritySnapshot {
  readonly headers: HeaderPolicyConfig;
  /** Every response counts as served over HTTPS */
  readonly httpsEnabled: boolean;
  /** Honour X-Forwarded-Proto when deciding if a request is secure */
  readonly trustProxy: boolean;
  readonly validation: ValidationSettings;
  readonly rbac: {
    /** Role held by anonymous principals, if any */
    readonly publicRole: string | null;
  };
}

/** Environment keys the snapshot is built from */
export type SecurityEnv = Pick<
  AppEnv,
  | 'HTTPS_ENABLED'
  | 'TRUST_PROXY'
  | 'CSP_DEFAULT_SRC'
  | 'CSP_SCRIPT_SRC'
  | 'CSP_STYLE_SRC'
  | 'CSP_IMG_SRC'
  | 'CSP_FONT_SRC'
  | 'CSP_CONNECT_SRC'
  | 'CSP_FRAME_ANCESTORS'
  | 'SECURE_REFERRER_POLICY'
  | 'SECURE_HSTS_SECONDS'
  | 'SECURE_HSTS_INCLUDE_SUBDOMAINS'
  | 'SECURE_HSTS_PRELOAD'
  | 'PUBLICATION_YEAR_MAX'
  | 'RBAC_PUBLIC_ROLE'
>;

/**
 * Deep-freeze a snapshot so no consumer can edit it in place
 */
export function freezeSnapshot(snapshot: SecuritySnapshot): SecuritySnapshot {
  Object.freeze(snapshot.headers.contentSecurityPolicy);
  Object.freeze(snapshot.headers.hsts);
  Object.freeze(snapshot.headers);
  Object.freeze(snapshot.validation);
  Object.freeze(snapshot.rbac);
  return Object.freeze(snapshot);
}

/**
 * Build a frozen SecuritySnapshot from validated environment values
 */
export function buildSecuritySnapshot(env: SecurityEnv): SecuritySnapshot {
  const csp: Partial<Record<CspDirective, string>> = {};
  const directives: ReadonlyArray<readonly [CspDirective, string | undefined]> = [
    ['default-src', env.CSP_DEFAULT_SRC],
    ['script-src', env.CSP_SCRIPT_SRC],
    ['style-src', env.CSP_STYLE_SRC],
    ['img-src', env.CSP_IMG_SRC],
    ['font-src', env.CSP_FONT_SRC],
    ['connect-src', env.CSP_CONNECT_SRC],
    ['frame-ancestors', env.CSP_FRAME_ANCESTORS]
  ];
  for (const [directive, sources] of directives) {
    if (sources) csp[directive] = sources;
  }

  return freezeSnapshot({
    headers: {
      contentSecurityPolicy: csp,
      referrerPolicy: env.SECURE_REFERRER_POLICY,
      hsts: {
        maxAgeSeconds: env.SECURE_HSTS_SECONDS,
        includeSubDomains: env.SECURE_HSTS_INCLUDE_SUBDOMAINS,
        preload: env.SECURE_HSTS_PRELOAD
      }
    },
    httpsEnabled: env.HTTPS_ENABLED,
    trustProxy: env.TRUST_PROXY,
    validation: {
      publicationYearMin: PUBLICATION_YEAR_MIN,
      publicationYearMax: env.PUBLICATION_YEAR_MAX
    },
    rbac: {
      publicRole: env.RBAC_PUBLIC_ROLE ?? null
    }
  });
}

/**
 * SecurityConfigService - Holds the current SecuritySnapshot
 * Built once from the validated environment; replace() installs a whole new snapshot
 */
@Injectable()
export class SecurityConfigService {
  private snapshot: SecuritySnapshot;

  /**
   * @param config - Validated environment
   */
  constructor(config: ConfigService<AppEnv, true>) {
    this.snapshot = buildSecuritySnapshot({
      HTTPS_ENABLED: config.get('HTTPS_ENABLED', { infer: true }),
      TRUST_PROXY: config.get('TRUST_PROXY', { infer: true }),
      CSP_DEFAULT_SRC: config.get('CSP_DEFAULT_SRC', { infer: true }),
      CSP_SCRIPT_SRC: config.get('CSP_SCRIPT_SRC', { infer: true }),
      CSP_STYLE_SRC: config.get('CSP_STYLE_SRC', { infer: true }),
      CSP_IMG_SRC: config.get('CSP_IMG_SRC', { infer: true }),
      CSP_FONT_SRC: config.get('CSP_FONT_SRC', { infer: true }),
      CSP_CONNECT_SRC: config.get('CSP_CONNECT_SRC', { infer: true }),
      CSP_FRAME_ANCESTORS: config.get('CSP_FRAME_ANCESTORS', { infer: true }),
      SECURE_REFERRER_POLICY: config.get('SECURE_REFERRER_POLICY', { infer: true }),
      SECURE_HSTS_SECONDS: config.get('SECURE_HSTS_SECONDS', { infer: true }),
      SECURE_HSTS_INCLUDE_SUBDOMAINS: config.get('SECURE_HSTS_INCLUDE_SUBDOMAINS', { infer: true }),
      SECURE_HSTS_PRELOAD: config.get('SECURE_HSTS_PRELOAD', { infer: true }),
      PUBLICATION_YEAR_MAX: config.get('PUBLICATION_YEAR_MAX', { infer: true }),
      RBAC_PUBLIC_ROLE: config.get('RBAC_PUBLIC_ROLE', { infer: true })
    });
  }

  /** Snapshot in effect right now */
  current(): SecuritySnapshot {
    return this.snapshot;
  }

  /**
   * Swap in a new snapshot; requests already holding the old one keep it
   */
  replace(next: SecuritySnapshot): void {
    this.snapshot = Object.isFrozen(next) ? next : freezeSnapshot(next);
  }
}
