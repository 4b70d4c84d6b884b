/**
 * gatehouse - Configuration
 *
 * Zod schemas for every adapter configuration, the validation entry points
 * adapters call from their constructors, and an environment loader used by
 * the CLI and by applications that keep their settings in `process.env`.
 *
 * Validation is about shape and type only: values are handed to the driver
 * or transport untouched.
 */

import { z } from 'zod';
import type { ZodIssue, ZodTypeAny } from 'zod';
import { config as loadDotenv } from 'dotenv';
import { ConfigurationError } from '../types';

// ============================================================================
// IDENTITY PROVIDER
// ============================================================================

export const identityConfigSchema = z.object({
  /** Base URL of the identity provider, e.g. `https://id.example.com`. */
  serverUrl: z.string().url(),
  /** Realm (tenant) name. */
  realmName: z.string().min(1),
  /** Client identifier used for OpenID requests and the admin lease. */
  clientId: z.string().min(1),
  /** Client secret. Without it every administrative operation is refused. */
  clientSecret: z.string().min(1).optional(),
  /** Verify the provider's TLS certificate. */
  verifySsl: z.boolean().default(true),
  /** Per-request timeout enforced by the transport. */
  timeoutSeconds: z.number().positive().default(10),
  /** Subtracted from the admin token lifetime so renewal happens before expiry. */
  leaseMarginSeconds: z.number().nonnegative().default(30),
});

export type IdentityConfig = z.output<typeof identityConfigSchema>;
export type IdentityConfigInput = z.input<typeof identityConfigSchema>;

// ============================================================================
// DATABASE
// ============================================================================

const poolOptions = {
  /** Connections kept in the pool. */
  poolSize: z.number().int().positive().default(20),
  /** Extra connections allowed above `poolSize` under load. */
  poolMaxOverflow: z.number().int().nonnegative().default(0),
  /** Connections older than this are closed and replaced; `-1` disables recycling. */
  poolRecycleSeconds: z.number().int().min(-1).default(600),
  /** Test each connection with `SELECT 1` on checkout. */
  poolPrePing: z.boolean().default(true),
  /** How long a checkout waits for a free connection. */
  poolTimeoutSeconds: z.number().positive().default(30),
  /** Hand out the most recently returned connection first. */
  poolUseLifo: z.boolean().default(true),
  /** Log every statement at debug level. */
  echo: z.boolean().default(false),
};

export const postgresConfigSchema = z.object({
  kind: z.literal('postgres'),
  host: z.string().min(1).default('localhost'),
  port: z.number().int().min(1).max(65535).default(5432),
  database: z.string().min(1),
  username: z.string().min(1),
  password: z.string().optional(),
  ...poolOptions,
});

export const sqliteConfigSchema = z.object({
  kind: z.literal('sqlite'),
  /** File path, or `:memory:` for a private in-memory database. */
  database: z.string().min(1).default(':memory:'),
  ...poolOptions,
});

export const starrocksConfigSchema = z.object({
  kind: z.literal('starrocks'),
  host: z.string().min(1).default('localhost'),
  port: z.number().int().min(1).max(65535).default(9030),
  database: z.string().min(1),
  username: z.string().min(1),
  password: z.string().optional(),
  /** External catalog; queries run against `<catalog>.<database>` when set. */
  catalog: z.string().min(1).optional(),
  ...poolOptions,
});

export const databaseConfigSchema = z.discriminatedUnion('kind', [
  postgresConfigSchema,
  sqliteConfigSchema,
  starrocksConfigSchema,
]);

export type PostgresConfig = z.output<typeof postgresConfigSchema>;
export type SqliteConfig = z.output<typeof sqliteConfigSchema>;
export type StarrocksConfig = z.output<typeof starrocksConfigSchema>;
export type DatabaseConfig = z.output<typeof databaseConfigSchema>;
export type DatabaseConfigInput = z.input<typeof databaseConfigSchema>;
export type DatabaseKind = DatabaseConfig['kind'];

/**
 * Name of the configuration type each database kind expects.
 */
export const DATABASE_CONFIG_TYPE_NAMES: Record<DatabaseKind, string> = {
  postgres: 'PostgresConfig',
  sqlite: 'SqliteConfig',
  starrocks: 'StarrocksConfig',
};

// ============================================================================
// VALIDATION
// ============================================================================

export function isDatabaseKind(value: unknown): value is DatabaseKind {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(DATABASE_CONFIG_TYPE_NAMES, value);
}

/**
 * Describes a runtime value for "expected X, got Y" messages.
 */
export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'object') {
    const kind: unknown = Reflect.get(value, 'kind');
    if (isDatabaseKind(kind)) {
      return DATABASE_CONFIG_TYPE_NAMES[kind];
    }
    return 'object';
  }
  return typeof value;
}

function issueToError(typeName: string, issue: ZodIssue): ConfigurationError {
  const field = issue.path.length > 0 ? issue.path.join('.') : typeName;

  switch (issue.code) {
    case 'invalid_type':
      return new ConfigurationError(
        issue.expected,
        issue.received,
        `Invalid ${typeName}: ${field}: expected ${issue.expected}, got ${issue.received}`
      );
    case 'invalid_literal':
      return new ConfigurationError(
        String(issue.expected),
        String(issue.received),
        `Invalid ${typeName}: ${field}: expected ${String(issue.expected)}, got ${String(issue.received)}`
      );
    default:
      return new ConfigurationError(typeName, 'invalid value', `Invalid ${typeName}: ${field}: ${issue.message}`);
  }
}

/**
 * Parses `value` with `schema`, raising a `ConfigurationError` for the first
 * problem found.
 */
export function parseConfig<S extends ZodTypeAny>(schema: S, typeName: string, value: unknown): z.output<S> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    throw new ConfigurationError(typeName, describeValue(value));
  }

  const result = schema.safeParse(value);
  if (!result.success) {
    throw issueToError(typeName, result.error.issues[0]);
  }
  return result.data;
}

export function parseIdentityConfig(value: unknown): IdentityConfig {
  return parseConfig(identityConfigSchema, 'IdentityConfig', value);
}

export function parseDatabaseConfig(value: unknown): DatabaseConfig {
  return parseConfig(databaseConfigSchema, 'DatabaseConfig', value);
}

// ============================================================================
// ENVIRONMENT
// ============================================================================

type RawEnv = Record<string, string | undefined>;

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const envFlag = z.enum(['true', 'false']).transform((value) => value === 'true');

const envSchema = z.object({
  LOG_LEVEL: logLevelSchema.optional().default('info'),

  IDENTITY_SERVER_URL: z.string().optional(),
  IDENTITY_REALM: z.string().optional(),
  IDENTITY_CLIENT_ID: z.string().optional(),
  IDENTITY_CLIENT_SECRET: z.string().optional(),
  IDENTITY_VERIFY_SSL: envFlag.optional(),
  IDENTITY_TIMEOUT_SECONDS: z.coerce.number({ invalid_type_error: 'IDENTITY_TIMEOUT_SECONDS must be a number' }).optional(),

  DATABASE_KIND: z.enum(['postgres', 'sqlite', 'starrocks']).optional(),
  DATABASE_HOST: z.string().optional(),
  DATABASE_PORT: z.coerce.number({ invalid_type_error: 'DATABASE_PORT must be a number' }).optional(),
  DATABASE_NAME: z.string().optional(),
  DATABASE_USER: z.string().optional(),
  DATABASE_PASSWORD: z.string().optional(),
  DATABASE_CATALOG: z.string().optional(),
  DATABASE_POOL_SIZE: z.coerce.number().optional(),
  DATABASE_POOL_MAX_OVERFLOW: z.coerce.number().optional(),
  DATABASE_POOL_RECYCLE_SECONDS: z.coerce.number().optional(),
  DATABASE_POOL_PRE_PING: envFlag.optional(),
  DATABASE_POOL_TIMEOUT_SECONDS: z.coerce.number().optional(),
  DATABASE_POOL_USE_LIFO: envFlag.optional(),
  DATABASE_ECHO: envFlag.optional(),
});

export interface GatehouseConfig {
  logLevel: z.infer<typeof logLevelSchema>;
  /** Present when `IDENTITY_SERVER_URL` is set. */
  identity?: IdentityConfig;
  /** Present when `DATABASE_KIND` is set. */
  database?: DatabaseConfig;
}

/**
 * Loads a `.env` file from the working directory into `process.env`, if one exists.
 */
export function loadEnvironment(path?: string): void {
  loadDotenv(path ? { path } : undefined);
}

/**
 * Builds the full configuration from environment variables.
 */
export function loadConfig(env: RawEnv = process.env): GatehouseConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw issueToError('environment', parsed.error.issues[0]);
  }
  const vars = parsed.data;

  const config: GatehouseConfig = { logLevel: vars.LOG_LEVEL };

  if (vars.IDENTITY_SERVER_URL) {
    config.identity = parseIdentityConfig(
      withoutUndefined({
        serverUrl: vars.IDENTITY_SERVER_URL,
        realmName: vars.IDENTITY_REALM,
        clientId: vars.IDENTITY_CLIENT_ID,
        clientSecret: vars.IDENTITY_CLIENT_SECRET || undefined,
        verifySsl: vars.IDENTITY_VERIFY_SSL,
        timeoutSeconds: vars.IDENTITY_TIMEOUT_SECONDS,
      })
    );
  }

  if (vars.DATABASE_KIND) {
    config.database = parseDatabaseConfig(
      withoutUndefined({
        kind: vars.DATABASE_KIND,
        host: vars.DATABASE_HOST,
        port: vars.DATABASE_PORT,
        database: vars.DATABASE_NAME,
        username: vars.DATABASE_USER,
        password: vars.DATABASE_PASSWORD,
        catalog: vars.DATABASE_KIND === 'starrocks' ? vars.DATABASE_CATALOG : undefined,
        poolSize: vars.DATABASE_POOL_SIZE,
        poolMaxOverflow: vars.DATABASE_POOL_MAX_OVERFLOW,
        poolRecycleSeconds: vars.DATABASE_POOL_RECYCLE_SECONDS,
        poolPrePing: vars.DATABASE_POOL_PRE_PING,
        poolTimeoutSeconds: vars.DATABASE_POOL_TIMEOUT_SECONDS,
        poolUseLifo: vars.DATABASE_POOL_USE_LIFO,
        echo: vars.DATABASE_ECHO,
      })
    );
  }

  return config;
}

function withoutUndefined(record: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(record).filter(([, value]) => value !== undefined));
}
