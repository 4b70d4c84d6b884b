/**
 * @fileoverview gatehouse
 * @description Identity-provider and relational-database adapters behind
 * stable ports.
 *
 * - **Identity**: `IdentityAdapter` implements `IdentityPort` over an OpenID
 *   Connect provider and its admin REST API, with per-operation TTL caches and
 *   a self-renewing admin credential.
 * - **Database**: `SessionManager` hands out async-context-scoped sessions on
 *   PostgreSQL, SQLite or StarRocks.
 * - **Middleware**: Express guards built on the identity port.
 *
 * @example
 * ```typescript
 * import { IdentityAdapter, createQueuedExecution } from 'gatehouse';
 *
 * const identity = new IdentityAdapter({
 *   config: { serverUrl: 'https://id.example.com', realmName: 'demo', clientId: 'backend' },
 *   execution: createQueuedExecution({ concurrency: 20 }),
 * });
 * const user = await identity.getUserByUsername('ada');
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// TYPES & ERRORS
// ============================================================================

export * from './types';

// ============================================================================
// CONFIGURATION & LOGGING
// ============================================================================

export {
  loadConfig,
  loadEnvironment,
  parseConfig,
  parseDatabaseConfig,
  parseIdentityConfig,
  describeValue,
  DATABASE_CONFIG_TYPE_NAMES,
} from './config';
export type {
  DatabaseConfig,
  DatabaseConfigInput,
  DatabaseKind,
  GatehouseConfig,
  IdentityConfig,
  IdentityConfigInput,
  PostgresConfig,
  SqliteConfig,
  StarrocksConfig,
} from './config';
export { getLogger, createChildLogger, createSilentLogger } from './logging/logger';
export type { Logger } from './logging/logger';

// ============================================================================
// BUILDING BLOCKS
// ============================================================================

export * from './cache';
export * from './execution';
export {
  CredentialLeaseManager,
  DEFAULT_LEASE_MARGIN_SECONDS,
  DEFAULT_REPORTED_TTL_SECONDS,
} from './lease/credential-lease';
export type { CredentialIssuer, CredentialLease, CredentialLeaseOptions, LeaseState } from './lease/credential-lease';
export * from './tokens';
export { publicKeyToPem, pemToPublicKey, sha256Hex } from './crypto';

// ============================================================================
// ADAPTERS
// ============================================================================

export * from './identity';
export * from './database';

// ============================================================================
// MIDDLEWARE
// ============================================================================

export { requireAuthentication, requireRoles, requirePermission } from './middleware/express';
export type {
  AdapterErrorHandler,
  AuthenticationOptions,
  PermissionOptions,
  RoleOptions,
} from './middleware/express';
