import { ConfigurationError } from '../../src/common/errors/catalog-errors';
import { validateEnv } from '../../src/config/env.validation';
import { TEST_JWT_SECRET } from '../support/fixtures';

describe('validateEnv', () => {
  it('applies defaults when only the secret is set', () => {
    const env = validateEnv({ AUTH_JWT_SECRET: TEST_JWT_SECRET });

    expect(env.PORT).toBe(3000);
    expect(env.LOG_LEVEL).toBe('info');
    expect(env.TRUST_PROXY).toBe(false);
    expect(env.HTTPS_ENABLED).toBe(false);
    expect(env.SECURE_REFERRER_POLICY).toBe('strict-origin-when-cross-origin');
    expect(env.SECURE_HSTS_SECONDS).toBe(31536000);
    expect(env.SECURE_HSTS_INCLUDE_SUBDOMAINS).toBe(true);
    expect(env.SECURE_HSTS_PRELOAD).toBe(true);
    expect(env.PUBLICATION_YEAR_MAX).toBe(2030);
    expect(env.RBAC_SEED_FILE).toBe('config/rbac.seed.json');
    expect(env.RBAC_PUBLIC_ROLE).toBeUndefined();
    expect(env.AUTH_JWT_ISSUER).toBe('library-catalog');
    expect(env.AUTH_JWT_AUDIENCE).toBe('catalog-api');
  });

  it('reads boolean flags as words, not as truthy strings', () => {
    const env = validateEnv({
      AUTH_JWT_SECRET: TEST_JWT_SECRET,
      TRUST_PROXY: 'YES',
      HTTPS_ENABLED: '1',
      SECURE_HSTS_PRELOAD: 'false',
      SECURE_HSTS_INCLUDE_SUBDOMAINS: 'no'
    });

    expect(env.TRUST_PROXY).toBe(true);
    expect(env.HTTPS_ENABLED).toBe(true);
    expect(env.SECURE_HSTS_PRELOAD).toBe(false);
    expect(env.SECURE_HSTS_INCLUDE_SUBDOMAINS).toBe(false);
  });

  it('treats blank optional values as unset', () => {
    const env = validateEnv({ AUTH_JWT_SECRET: TEST_JWT_SECRET, CSP_DEFAULT_SRC: '   ', RBAC_PUBLIC_ROLE: '' });

    expect(env.CSP_DEFAULT_SRC).toBeUndefined();
    expect(env.RBAC_PUBLIC_ROLE).toBeUndefined();
  });

  it('coerces numeric values', () => {
    const env = validateEnv({ AUTH_JWT_SECRET: TEST_JWT_SECRET, PORT: '8080', PUBLICATION_YEAR_MAX: '2026' });

    expect(env.PORT).toBe(8080);
    expect(env.PUBLICATION_YEAR_MAX).toBe(2026);
  });

  it('names the offending keys without echoing their values', () => {
    const attempt = () => validateEnv({ AUTH_JWT_SECRET: 'tiny-secret', TRUST_PROXY: 'maybe' });

    expect(attempt).toThrow(ConfigurationError);
    expect(attempt).toThrow(
      'Invalid environment configuration. Missing/invalid: TRUST_PROXY, AUTH_JWT_SECRET. ' +
        'Create apps/catalog-api/.env.local from apps/catalog-api/.env.example.'
    );
  });

  it('rejects a missing secret', () => {
    expect(() => validateEnv({})).toThrow('Missing/invalid: AUTH_JWT_SECRET.');
  });
});
