// Import zod for runtime type validation and schema definition
import { z } from 'zod';
// Import error raised for invalid startup configuration
import { ConfigurationError } from '../common/errors/catalog-errors';

/**
 * Boolean flag accepted as 'true'/'false'/'1'/'0'/'yes'/'no' (any case) or a real boolean
 * z.coerce.boolean() would read the string 'false' as true
 */
const BoolFromString = z
  .union([z.boolean(), z.string().trim().toLowerCase().pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))])
  .transform((value) => value === true || value === 'true' || value === '1' || value === 'yes');

/**
 * Optional string where an empty value counts as unset
 */
const OptionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value && value.length > 0 ? value : undefined));

/**
 * Environment variable schema using Zod for validation
 * Defines expected types, constraints, defaults and optionality for all env vars
 */
const envSchema = z.object({
  // Node environment (development, production, test)
  NODE_ENV: z.string().optional(),
  // HTTP server port (must be positive integer)
  PORT: z.coerce.number().int().positive().default(3000),
  // Minimum level written by JsonLogger
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  // Honour X-Forwarded-* from a reverse proxy when deciding if a request is secure
  TRUST_PROXY: BoolFromString.default(false),
  // Treat every response as served over HTTPS (adds Strict-Transport-Security)
  HTTPS_ENABLED: BoolFromString.default(false),

  // Content-Security-Policy directives; unset directives are omitted
  CSP_DEFAULT_SRC: OptionalText,
  CSP_SCRIPT_SRC: OptionalText,
  CSP_STYLE_SRC: OptionalText,
  CSP_IMG_SRC: OptionalText,
  CSP_FONT_SRC: OptionalText,
  CSP_CONNECT_SRC: OptionalText,
  CSP_FRAME_ANCESTORS: OptionalText,

  // Referrer-Policy value
  SECURE_REFERRER_POLICY: z.string().trim().min(1).default('strict-origin-when-cross-origin'),
  // Strict-Transport-Security options
  SECURE_HSTS_SECONDS: z.coerce.number().int().nonnegative().default(31_536_000),
  SECURE_HSTS_INCLUDE_SUBDOMAINS: BoolFromString.default(true),
  SECURE_HSTS_PRELOAD: BoolFromString.default(true),

  // Upper bound accepted for a book's publication year
  PUBLICATION_YEAR_MAX: z.coerce.number().int().min(1000).default(2030),

  // Role granted to anonymous callers; unset means anonymous callers hold nothing
  RBAC_PUBLIC_ROLE: OptionalText,
  // Permission universe, roles and principals (relative to the working directory)
  RBAC_SEED_FILE: z.string().trim().min(1).default('config/rbac.seed.json'),
  // Load config/sample-books.json into the in-memory catalog at startup
  CATALOG_SEED_SAMPLE_BOOKS: BoolFromString.default(false),
  // Sample books file (relative to the working directory)
  CATALOG_SAMPLE_BOOKS_FILE: z.string().trim().min(1).default('config/sample-books.json'),

  // HS256 secret used to verify bearer tokens
  AUTH_JWT_SECRET: z.string().min(16),
  // Expected token issuer and audience
  AUTH_JWT_ISSUER: z.string().trim().min(1).default('library-catalog'),
  AUTH_JWT_AUDIENCE: z.string().trim().min(1).default('catalog-api'),

  // Comma-separated list of allowed CORS origins; unset disables CORS
  CORS_ORIGINS: OptionalText
});

// Export inferred TypeScript type from the schema
export type AppEnv = z.infer<typeof envSchema>;

/**
 * Validate environment variables at application startup
 * Fails fast with a message naming the offending keys, never their values
 * @param config - Raw environment variable object from process.env
 * @returns Validated and typed environment configuration
 * @throws ConfigurationError if validation fails
 */
export function validateEnv(config: Record<string, unknown>): AppEnv {
  const result = envSchema.safeParse(config);
  if (result.success) return result.data;

  // Extract top-level field names from validation errors
  const keys = Array.from(
    new Set(
      result.error.issues
        .map((issue) => issue.path[0])
        .filter((k): k is string => typeof k === 'string' && k.length > 0)
    )
  );

  const keyList = keys.length > 0 ? keys.join(', ') : 'unknown keys';
  throw new ConfigurationError(
    `Invalid environment configuration. Missing/invalid: ${keyList}. ` +
      `Create apps/catalog-api/.env.local from apps/catalog-api/.env.example.`
  );
}
