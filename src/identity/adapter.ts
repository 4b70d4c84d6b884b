/**
 * gatehouse - Identity Adapter
 *
 * `IdentityAdapter` implements `IdentityPort` on top of the OpenID Connect and
 * admin clients. It owns:
 *
 * - one `TtlCache` per cached read, registered in a `CacheRegistry`
 * - the admin `CredentialLeaseManager`
 * - an `ExecutionStrategy` every upstream call runs through
 *
 * Reads are served from cache when fresh; cache hits never reach the
 * execution strategy. Writes invalidate the cache entries they affect, and
 * only after the upstream call succeeded.
 *
 * @example
 * ```typescript
 * const identity = new IdentityAdapter({
 *   config: {
 *     serverUrl: 'https://id.example.com',
 *     realmName: 'main',
 *     clientId: 'backend',
 *     clientSecret: process.env.IDENTITY_CLIENT_SECRET,
 *   },
 *   execution: createQueuedExecution({ concurrency: 8 }),
 * });
 *
 * const user = await identity.getUserByEmail('ada@example.com');
 * ```
 */

import { CacheRegistry, CachePolicy, TtlCache } from '../cache';
import { parseIdentityConfig, IdentityConfig } from '../config';
import { publicKeyToPem, sha256Hex } from '../crypto';
import { createDirectExecution, ExecutionStrategy } from '../execution';
import { CredentialLeaseManager, LeaseState } from '../lease/credential-lease';
import { createChildLogger, Logger } from '../logging/logger';
import { collectRoles, verifyJwt } from '../tokens/jwt';
import {
  AdapterError,
  InternalError,
  InvalidTokenError,
  NotFoundError,
  TokenClaims,
  UnauthenticatedError,
  UnavailableError,
} from '../types';
import { AdminClient, UserQuery } from './admin-client';
import { FetchTransport, HttpTransport, HttpUnreachableError, isHttpStatus } from './http';
import { OpenIdClient } from './openid-client';
import type { IdentityPort } from './port';
import type {
  IdentityRole,
  IdentityUser,
  JsonWebKeySet,
  OpenIdConfiguration,
  TokenIntrospection,
  TokenResponse,
  UserInfo,
  UserInput,
} from './schemas';

// ============================================================================
// CACHE POLICIES
// ============================================================================

export const CACHE_POLICIES = {
  publicKey: { ttlSeconds: 3600, maxEntries: 1 },
  userinfo: { ttlSeconds: 30, maxEntries: 100 },
  userById: { ttlSeconds: 300, maxEntries: 100 },
  userByUsername: { ttlSeconds: 300, maxEntries: 100 },
  userByEmail: { ttlSeconds: 300, maxEntries: 100 },
  userRoles: { ttlSeconds: 300, maxEntries: 100 },
  clientRolesForUser: { ttlSeconds: 300, maxEntries: 100 },
  serviceAccountId: { ttlSeconds: 3600, maxEntries: 1 },
  wellKnown: { ttlSeconds: 3600, maxEntries: 1 },
  certs: { ttlSeconds: 3600, maxEntries: 1 },
  searchUsers: { ttlSeconds: 30, maxEntries: 50 },
  clientSecret: { ttlSeconds: 3600, maxEntries: 50 },
  clientId: { ttlSeconds: 3600, maxEntries: 50 },
  realmRoles: { ttlSeconds: 300, maxEntries: 1 },
  realmRole: { ttlSeconds: 300, maxEntries: 100 },
} as const satisfies Record<string, CachePolicy>;

export type CachedOperation = keyof typeof CACHE_POLICIES;

/** Maximum results of `searchUsers` when the caller gives none. */
export const DEFAULT_SEARCH_MAX = 100;

const SERVICE_NAME = 'identity provider';

// ============================================================================
// ERROR TRANSLATION
// ============================================================================

type ErrorMapper = (error: unknown) => AdapterError;

const asInternal: ErrorMapper = (error) => new InternalError(undefined, { cause: error });
const asUnauthenticated: ErrorMapper = (error) => new UnauthenticatedError(undefined, { cause: error });
const asInvalidToken: ErrorMapper = (error) => new InvalidTokenError(undefined, { cause: error });

/**
 * Adapter errors pass through; an unreachable provider is always
 * `UnavailableError`; everything else goes through the operation's mapper.
 */
function translate(error: unknown, mapper: ErrorMapper): AdapterError {
  if (error instanceof AdapterError) {
    return error;
  }
  if (error instanceof HttpUnreachableError) {
    return new UnavailableError(SERVICE_NAME, { cause: error });
  }
  return mapper(error);
}

// ============================================================================
// ADAPTER
// ============================================================================

export interface IdentityAdapterOptions {
  /** Validated with `parseIdentityConfig`. */
  config: unknown;
  /** Defaults to a `FetchTransport` built from the config. */
  transport?: HttpTransport;
  /** Defaults to `createDirectExecution()`. */
  execution?: ExecutionStrategy;
  logger?: Logger;
}

export class IdentityAdapter implements IdentityPort {
  public readonly config: IdentityConfig;
  public readonly caches: CacheRegistry;
  private readonly transport: HttpTransport;
  private readonly execution: ExecutionStrategy;
  private readonly logger: Logger;
  private readonly openid: OpenIdClient;
  private readonly admin: AdminClient;
  private readonly lease: CredentialLeaseManager;

  private readonly publicKeyCache: TtlCache<[], string>;
  private readonly userinfoCache: TtlCache<[string], UserInfo>;
  private readonly userByIdCache: TtlCache<[string], IdentityUser | null>;
  private readonly userByUsernameCache: TtlCache<[string], IdentityUser | null>;
  private readonly userByEmailCache: TtlCache<[string], IdentityUser | null>;
  private readonly userRolesCache: TtlCache<[string], IdentityRole[]>;
  private readonly clientRolesForUserCache: TtlCache<[string, string], IdentityRole[]>;
  private readonly serviceAccountIdCache: TtlCache<[], string>;
  private readonly wellKnownCache: TtlCache<[], OpenIdConfiguration>;
  private readonly certsCache: TtlCache<[], JsonWebKeySet>;
  private readonly searchUsersCache: TtlCache<[string, number], IdentityUser[]>;
  private readonly clientSecretCache: TtlCache<[string], string>;
  private readonly clientIdCache: TtlCache<[string], string>;
  private readonly realmRolesCache: TtlCache<[], IdentityRole[]>;
  private readonly realmRoleCache: TtlCache<[string], IdentityRole>;

  constructor(options: IdentityAdapterOptions) {
    this.config = parseIdentityConfig(options.config);
    this.logger = options.logger ?? createChildLogger({ component: 'identity' });
    this.execution = options.execution ?? createDirectExecution();
    this.transport =
      options.transport ??
      new FetchTransport({
        timeoutSeconds: this.config.timeoutSeconds,
        verifySsl: this.config.verifySsl,
        logger: this.logger,
      });

    this.openid = new OpenIdClient({
      transport: this.transport,
      serverUrl: this.config.serverUrl,
      realmName: this.config.realmName,
      clientId: this.config.clientId,
      clientSecret: this.config.clientSecret,
    });

    this.caches = new CacheRegistry({ logger: this.logger });
    const policies = CACHE_POLICIES;
    this.publicKeyCache = this.caches.create<[], string>('publicKey', policies.publicKey);
    this.userinfoCache = this.caches.create<[string], UserInfo>('userinfo', policies.userinfo, {
      keyOf: ([token]) => sha256Hex(token),
    });
    this.userByIdCache = this.caches.create<[string], IdentityUser | null>('userById', policies.userById);
    this.userByUsernameCache = this.caches.create<[string], IdentityUser | null>('userByUsername', policies.userByUsername);
    this.userByEmailCache = this.caches.create<[string], IdentityUser | null>('userByEmail', policies.userByEmail);
    this.userRolesCache = this.caches.create<[string], IdentityRole[]>('userRoles', policies.userRoles);
    this.clientRolesForUserCache = this.caches.create<[string, string], IdentityRole[]>('clientRolesForUser', policies.clientRolesForUser);
    this.serviceAccountIdCache = this.caches.create<[], string>('serviceAccountId', policies.serviceAccountId);
    this.wellKnownCache = this.caches.create<[], OpenIdConfiguration>('wellKnown', policies.wellKnown);
    this.certsCache = this.caches.create<[], JsonWebKeySet>('certs', policies.certs);
    this.searchUsersCache = this.caches.create<[string, number], IdentityUser[]>('searchUsers', policies.searchUsers);
    this.clientSecretCache = this.caches.create<[string], string>('clientSecret', policies.clientSecret);
    this.clientIdCache = this.caches.create<[string], string>('clientId', policies.clientId);
    this.realmRolesCache = this.caches.create<[], IdentityRole[]>('realmRoles', policies.realmRoles);
    this.realmRoleCache = this.caches.create<[string], IdentityRole>('realmRole', policies.realmRole);

    this.lease = new CredentialLeaseManager({
      issuer: () => this.openid.clientCredentialsGrant(),
      secretConfigured: this.config.clientSecret !== undefined,
      marginSeconds: this.config.leaseMarginSeconds,
      onReset: () => this.caches.invalidateAll(),
      logger: this.logger,
    });

    this.admin = new AdminClient({
      transport: this.transport,
      serverUrl: this.config.serverUrl,
      realmName: this.config.realmName,
      getToken: () => this.lease.acquire(),
    });
  }

  /**
   * Issues the first admin credential ahead of use. Without a client secret
   * there is nothing to warm up.
   *
   * @throws {UnavailableError} the provider refused the client-credentials grant
   */
  async initialize(): Promise<void> {
    if (this.adminEnabled) {
      await this.lease.acquire();
    }
  }

  /** True when a client secret is configured. */
  get adminEnabled(): boolean {
    return this.config.clientSecret !== undefined;
  }

  get leaseState(): LeaseState {
    return this.lease.state;
  }

  async close(): Promise<void> {
    await this.transport.close?.();
  }

  /**
   * Runs one upstream call through the execution strategy and translates
   * whatever it throws.
   */
  private async upstream<T>(task: () => Promise<T>, mapper: ErrorMapper = asInternal): Promise<T> {
    try {
      return await this.execution.run(task);
    } catch (error) {
      throw translate(error, mapper);
    }
  }

  // ==========================================================================
  // TOKENS
  // ==========================================================================

  getPublicKey(): Promise<string> {
    return this.publicKeyCache.getOrCompute([], async () => {
      const key = await this.upstream(() => this.openid.publicKey());
      return publicKeyToPem(key);
    });
  }

  getToken(username: string, password: string): Promise<TokenResponse> {
    return this.upstream(() => this.openid.passwordGrant(username, password), asUnauthenticated);
  }

  refreshToken(refreshToken: string): Promise<TokenResponse> {
    return this.upstream(() => this.openid.refreshGrant(refreshToken), asInvalidToken);
  }

  getTokenFromCode(code: string, redirectUri: string): Promise<TokenResponse> {
    return this.upstream(() => this.openid.authorizationCodeGrant(code, redirectUri), asInvalidToken);
  }

  getClientCredentialsToken(): Promise<TokenResponse> {
    return this.upstream(() => this.openid.clientCredentialsGrant(), asUnauthenticated);
  }

  async validateToken(token: string): Promise<boolean> {
    try {
      await this.getTokenInfo(token);
      return true;
    } catch (error) {
      this.logger.debug({ err: error }, 'token validation failed');
      return false;
    }
  }

  introspectToken(token: string): Promise<TokenIntrospection> {
    return this.upstream(() => this.openid.introspect(token), asInvalidToken);
  }

  async getTokenInfo(token: string): Promise<TokenClaims> {
    const publicKey = await this.getPublicKey();
    return verifyJwt(token, publicKey);
  }

  async getUserinfo(token: string): Promise<UserInfo> {
    if (!(await this.validateToken(token))) {
      throw new InvalidTokenError();
    }
    return this.userinfoCache.getOrCompute([token], () => this.upstream(() => this.openid.userinfo(token)));
  }

  logout(refreshToken: string): Promise<void> {
    return this.upstream(() => this.openid.logout(refreshToken));
  }

  // ==========================================================================
  // USERS
  // ==========================================================================

  getUserById(userId: string): Promise<IdentityUser | null> {
    return this.userByIdCache.getOrCompute([userId], () =>
      this.upstream(async () => {
        try {
          return await this.admin.getUser(userId);
        } catch (error) {
          if (isHttpStatus(error, 404)) {
            return null;
          }
          throw error;
        }
      })
    );
  }

  getUserByUsername(username: string): Promise<IdentityUser | null> {
    return this.userByUsernameCache.getOrCompute([username], async () => {
      const users = await this.upstream(() => this.admin.findUsers({ username, exact: true }));
      return users[0] ?? null;
    });
  }

  getUserByEmail(email: string): Promise<IdentityUser | null> {
    return this.userByEmailCache.getOrCompute([email], async () => {
      const users = await this.upstream(() => this.admin.findUsers({ email, exact: true }));
      return users[0] ?? null;
    });
  }

  /**
   * Matches `query` against username, then email, first name and last name,
   * filling up to `maxResults` without duplicates.
   */
  searchUsers(query: string, maxResults: number = DEFAULT_SEARCH_MAX): Promise<IdentityUser[]> {
    return this.searchUsersCache.getOrCompute([query, maxResults], () =>
      this.upstream(async () => {
        const found = new Map<string, IdentityUser>();
        const lookups: Array<(max: number) => UserQuery> = [
          (max) => ({ username: query, max }),
          (max) => ({ email: query, max }),
          (max) => ({ firstName: query, max }),
          (max) => ({ lastName: query, max }),
        ];

        for (const lookup of lookups) {
          const remaining = maxResults - found.size;
          if (remaining <= 0) break;

          const users = await this.admin.findUsers(lookup(remaining));
          for (const user of users) {
            if (!found.has(user.id)) {
              found.set(user.id, user);
            }
          }
        }

        return [...found.values()].slice(0, maxResults);
      })
    );
  }

  async createUser(data: UserInput): Promise<string> {
    const userId = await this.upstream(() => this.admin.createUser(data));
    this.userByUsernameCache.invalidate();
    this.userByEmailCache.invalidate();
    this.searchUsersCache.invalidate();
    return userId;
  }

  async updateUser(userId: string, data: UserInput): Promise<void> {
    await this.upstream(() => this.admin.updateUser(userId, data));
    this.userByIdCache.invalidate([userId]);
    this.userByUsernameCache.invalidate();
    this.userByEmailCache.invalidate();
    this.searchUsersCache.invalidate();
  }

  async deleteUser(userId: string): Promise<void> {
    await this.upstream(() => this.admin.deleteUser(userId));
    this.userByIdCache.invalidate([userId]);
    this.userByUsernameCache.invalidate();
    this.userByEmailCache.invalidate();
    this.searchUsersCache.invalidate();
    this.userRolesCache.invalidate([userId]);
    this.clientRolesForUserCache.invalidateWhere(([cachedUserId]) => cachedUserId === userId);
    this.logger.info({ userId }, 'user deleted');
  }

  async resetPassword(userId: string, password: string, temporary: boolean = false): Promise<void> {
    await this.upstream(() => this.admin.resetPassword(userId, password, temporary));
  }

  async clearUserSessions(userId: string): Promise<void> {
    await this.upstream(() => this.admin.logoutUser(userId));
  }

  // ==========================================================================
  // ROLES
  // ==========================================================================

  getUserRoles(userId: string): Promise<IdentityRole[]> {
    return this.userRolesCache.getOrCompute([userId], () =>
      this.upstream(() => this.admin.getUserRealmRoles(userId))
    );
  }

  getClientRolesForUser(userId: string, clientId: string): Promise<IdentityRole[]> {
    return this.clientRolesForUserCache.getOrCompute([userId, clientId], async () => {
      const clientUuid = await this.getClientId(clientId);
      return this.upstream(() => this.admin.getUserClientRoles(userId, clientUuid));
    });
  }

  async assignRealmRole(userId: string, roleName: string): Promise<void> {
    await this.upstream(async () => {
      const role = await this.admin.getRealmRole(roleName);
      await this.admin.addUserRealmRoles(userId, [role]);
    });
    this.userRolesCache.invalidate([userId]);
  }

  async removeRealmRole(userId: string, roleName: string): Promise<void> {
    await this.upstream(async () => {
      const role = await this.admin.getRealmRole(roleName);
      await this.admin.removeUserRealmRoles(userId, [role]);
    });
    this.userRolesCache.invalidate([userId]);
  }

  async assignClientRole(userId: string, clientId: string, roleName: string): Promise<void> {
    const clientUuid = await this.getClientId(clientId);
    await this.upstream(async () => {
      const role = await this.admin.getClientRole(clientUuid, roleName);
      await this.admin.addUserClientRoles(userId, clientUuid, [role]);
    });
    this.clientRolesForUserCache.invalidate([userId, clientId]);
  }

  async removeClientRole(userId: string, clientId: string, roleName: string): Promise<void> {
    const clientUuid = await this.getClientId(clientId);
    await this.upstream(async () => {
      const role = await this.admin.getClientRole(clientUuid, roleName);
      await this.admin.removeUserClientRoles(userId, clientUuid, [role]);
    });
    this.clientRolesForUserCache.invalidate([userId, clientId]);
  }

  getRealmRoles(): Promise<IdentityRole[]> {
    return this.realmRolesCache.getOrCompute([], () => this.upstream(() => this.admin.getRealmRoles()));
  }

  getRealmRole(roleName: string): Promise<IdentityRole> {
    return this.realmRoleCache.getOrCompute([roleName], () =>
      this.upstream(
        () => this.admin.getRealmRole(roleName),
        (error) => (isHttpStatus(error, 404) ? new NotFoundError('role', { cause: error }) : asInternal(error))
      )
    );
  }

  async createRealmRole(roleName: string, description?: string): Promise<IdentityRole> {
    const role = await this.upstream(async () => {
      await this.admin.createRealmRole(description ? { name: roleName, description } : { name: roleName });
      return this.admin.getRealmRole(roleName);
    });
    this.realmRolesCache.invalidate();
    this.realmRoleCache.invalidate([roleName]);
    return role;
  }

  /**
   * Deletes a realm role. Every cached user-role list is dropped, since any
   * of them may have contained the role.
   */
  async deleteRealmRole(roleName: string): Promise<void> {
    await this.upstream(() => this.admin.deleteRealmRole(roleName));
    this.realmRolesCache.invalidate();
    this.realmRoleCache.invalidate([roleName]);
    this.userRolesCache.invalidate();
  }

  // ==========================================================================
  // CLIENTS & REALM
  // ==========================================================================

  getServiceAccountId(): Promise<string> {
    return this.serviceAccountIdCache.getOrCompute([], async () => {
      const clientUuid = await this.getClientId(this.config.clientId);
      const user = await this.upstream(() => this.admin.getServiceAccountUser(clientUuid));
      return user.id;
    });
  }

  getClientSecret(clientId: string): Promise<string> {
    return this.clientSecretCache.getOrCompute([clientId], async () => {
      const clientUuid = await this.getClientId(clientId);
      const client = await this.upstream(() => this.admin.getClient(clientUuid));
      return client.secret ?? '';
    });
  }

  getClientId(clientName: string): Promise<string> {
    return this.clientIdCache.getOrCompute([clientName], async () => {
      const clients = await this.upstream(
        () => this.admin.findClients(clientName),
        (error) => (isHttpStatus(error, 404) ? new NotFoundError('client', { cause: error }) : asInternal(error))
      );
      const client = clients.find((candidate) => candidate.clientId === clientName);
      if (!client) {
        throw new NotFoundError('client');
      }
      return client.id;
    });
  }

  getWellKnownConfig(): Promise<OpenIdConfiguration> {
    return this.wellKnownCache.getOrCompute([], () => this.upstream(() => this.openid.wellKnown()));
  }

  getCerts(): Promise<JsonWebKeySet> {
    return this.certsCache.getOrCompute([], () => this.upstream(() => this.openid.certs()));
  }

  // ==========================================================================
  // CHECKS
  // ==========================================================================

  private async rolesOf(token: string): Promise<Set<string>> {
    return collectRoles(await this.getUserinfo(token));
  }

  async hasRole(token: string, roleName: string): Promise<boolean> {
    try {
      return (await this.rolesOf(token)).has(roleName);
    } catch (error) {
      this.logger.debug({ err: error }, 'role check failed');
      return false;
    }
  }

  async hasAnyOfRoles(token: string, roleNames: Iterable<string>): Promise<boolean> {
    try {
      const roles = await this.rolesOf(token);
      return [...roleNames].some((role) => roles.has(role));
    } catch (error) {
      this.logger.debug({ err: error }, 'role check failed');
      return false;
    }
  }

  async hasAllRoles(token: string, roleNames: Iterable<string>): Promise<boolean> {
    try {
      const roles = await this.rolesOf(token);
      return [...roleNames].every((role) => roles.has(role));
    } catch (error) {
      this.logger.debug({ err: error }, 'role check failed');
      return false;
    }
  }

  /**
   * Asks the provider whether the token grants `scope` on `resource`.
   */
  async checkPermissions(token: string, resource: string, scope: string): Promise<boolean> {
    try {
      const permissions = await this.upstream(() => this.openid.umaPermissions(token, [`${resource}#${scope}`]));
      return permissions.some(
        (permission) => permission.rsname === resource && (permission.scopes ?? []).includes(scope)
      );
    } catch (error) {
      this.logger.debug({ err: error, resource, scope }, 'permission check failed');
      return false;
    }
  }

  // ==========================================================================
  // MAINTENANCE
  // ==========================================================================

  clearAllCaches(): void {
    this.caches.invalidateAll();
  }

  /**
   * Drops the admin credential and, with it, every cached read made under it.
   */
  resetAdminCredential(): void {
    this.lease.reset();
  }
}
