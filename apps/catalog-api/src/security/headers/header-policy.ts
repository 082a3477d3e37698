/**
 * Content-Security-Policy directives, in the order they are emitted
 */
export const CSP_DIRECTIVES = [
  'default-src',
  'script-src',
  'style-src',
  'img-src',
  'font-src',
  'connect-src',
  'frame-ancestors'
] as const;

export type CspDirective = (typeof CSP_DIRECTIVES)[number];

/**
 * Strict-Transport-Security options; unset fields take the defaults below
 */
export interface HstsOptions {
  readonly maxAgeSeconds?: number;
  readonly includeSubDomains?: boolean;
  readonly preload?: boolean;
}

/**
 * Everything that shapes the hardening headers of a response
 */
export interface HeaderPolicyConfig {
  /** Directive sources; a directive that is absent or blank is omitted */
  readonly contentSecurityPolicy?: Readonly<Partial<Record<CspDirective, string>>>;
  readonly referrerPolicy?: string;
  readonly hsts?: HstsOptions;
}

/** Ordered [header name, value] pairs */
export type SecurityHeaderList = ReadonlyArray<readonly [string, string]>;

/**
 * Anything headers can be set on (Express Response, Node ServerResponse)
 */
export interface HeaderTarget {
  setHeader(name: string, value: string): unknown;
}

export const DEFAULT_REFERRER_POLICY = 'strict-origin-when-cross-origin';
export const DEFAULT_HSTS_MAX_AGE_SECONDS = 31_536_000;
const PERMISSIONS_POLICY = 'geolocation=(), microphone=(), camera=()';

/**
 * Serialize the configured CSP directives
 * @returns Header value, or null when no directive is configured
 */
export function buildContentSecurityPolicy(csp: HeaderPolicyConfig['contentSecurityPolicy']): string | null {
  if (!csp) return null;

  const parts: string[] = [];
  for (const directive of CSP_DIRECTIVES) {
    const sources = csp[directive]?.trim();
    if (sources) parts.push(`${directive} ${sources}`);
  }

  return parts.length > 0 ? parts.join('; ') : null;
}

/**
 * Serialize Strict-Transport-Security
 */
export function formatHsts(options: HstsOptions = {}): string {
  const maxAge = options.maxAgeSeconds ?? DEFAULT_HSTS_MAX_AGE_SECONDS;
  let value = `max-age=${maxAge}`;
  if (options.includeSubDomains ?? true) value += '; includeSubDomains';
  if (options.preload ?? true) value += '; preload';
  return value;
}

/**
 * Build the hardening headers for one response.
 *
 * The list is a pure function of its inputs and always comes out in the same
 * order. Strict-Transport-Security is present only on secure transport.
 */
export function buildSecurityHeaders(config: HeaderPolicyConfig, isSecureTransport: boolean): SecurityHeaderList {
  const headers: Array<readonly [string, string]> = [];

  const csp = buildContentSecurityPolicy(config.contentSecurityPolicy);
  if (csp !== null) headers.push(['Content-Security-Policy', csp]);

  headers.push(['X-Content-Type-Options', 'nosniff']);
  headers.push(['X-Frame-Options', 'DENY']);
  headers.push(['X-XSS-Protection', '1; mode=block']);
  headers.push(['Referrer-Policy', config.referrerPolicy?.trim() || DEFAULT_REFERRER_POLICY]);

  if (isSecureTransport) headers.push(['Strict-Transport-Security', formatHsts(config.hsts)]);

  headers.push(['X-Permitted-Cross-Domain-Policies', 'none']);
  headers.push(['Permissions-Policy', PERMISSIONS_POLICY]);

  return headers;
}

/**
 * Set every hardening header on `response`, overwriting same-named values
 * @returns The same response
 */
export function applyHardening<T extends HeaderTarget>(
  response: T,
  config: HeaderPolicyConfig,
  isSecureTransport: boolean
): T {
  for (const [name, value] of buildSecurityHeaders(config, isSecureTransport)) {
    response.setHeader(name, value);
  }
  return response;
}
