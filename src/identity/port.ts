/**
 * gatehouse - Identity Port
 *
 * Contract of the identity operation façade. Application code depends on this
 * interface; `IdentityAdapter` is the implementation backed by the provider's
 * OpenID Connect and admin REST APIs.
 *
 * Every method rejects only with an `AdapterError` subclass. The role and
 * permission checks never reject.
 */

import type { TokenClaims } from '../types';
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

export interface IdentityPort {
  // ==========================================================================
  // TOKENS
  // ==========================================================================

  /** PEM public key of the realm signing key. */
  getPublicKey(): Promise<string>;
  getToken(username: string, password: string): Promise<TokenResponse>;
  refreshToken(refreshToken: string): Promise<TokenResponse>;
  getTokenFromCode(code: string, redirectUri: string): Promise<TokenResponse>;
  getClientCredentialsToken(): Promise<TokenResponse>;
  validateToken(token: string): Promise<boolean>;
  introspectToken(token: string): Promise<TokenIntrospection>;
  /** Verified claims of an access token. */
  getTokenInfo(token: string): Promise<TokenClaims>;
  getUserinfo(token: string): Promise<UserInfo>;
  logout(refreshToken: string): Promise<void>;

  // ==========================================================================
  // USERS
  // ==========================================================================

  getUserById(userId: string): Promise<IdentityUser | null>;
  getUserByUsername(username: string): Promise<IdentityUser | null>;
  getUserByEmail(email: string): Promise<IdentityUser | null>;
  searchUsers(query: string, maxResults?: number): Promise<IdentityUser[]>;
  /** @returns id of the created user */
  createUser(data: UserInput): Promise<string>;
  updateUser(userId: string, data: UserInput): Promise<void>;
  deleteUser(userId: string): Promise<void>;
  resetPassword(userId: string, password: string, temporary?: boolean): Promise<void>;
  clearUserSessions(userId: string): Promise<void>;

  // ==========================================================================
  // ROLES
  // ==========================================================================

  getUserRoles(userId: string): Promise<IdentityRole[]>;
  getClientRolesForUser(userId: string, clientId: string): Promise<IdentityRole[]>;
  assignRealmRole(userId: string, roleName: string): Promise<void>;
  removeRealmRole(userId: string, roleName: string): Promise<void>;
  assignClientRole(userId: string, clientId: string, roleName: string): Promise<void>;
  removeClientRole(userId: string, clientId: string, roleName: string): Promise<void>;
  getRealmRoles(): Promise<IdentityRole[]>;
  getRealmRole(roleName: string): Promise<IdentityRole>;
  createRealmRole(roleName: string, description?: string): Promise<IdentityRole>;
  deleteRealmRole(roleName: string): Promise<void>;

  // ==========================================================================
  // CLIENTS & REALM
  // ==========================================================================

  getServiceAccountId(): Promise<string>;
  getClientSecret(clientId: string): Promise<string>;
  /** Resolves a human client id to the provider's internal client UUID. */
  getClientId(clientName: string): Promise<string>;
  getWellKnownConfig(): Promise<OpenIdConfiguration>;
  getCerts(): Promise<JsonWebKeySet>;

  // ==========================================================================
  // CHECKS
  // ==========================================================================

  hasRole(token: string, roleName: string): Promise<boolean>;
  hasAnyOfRoles(token: string, roleNames: Iterable<string>): Promise<boolean>;
  hasAllRoles(token: string, roleNames: Iterable<string>): Promise<boolean>;
  checkPermissions(token: string, resource: string, scope: string): Promise<boolean>;

  // ==========================================================================
  // MAINTENANCE
  // ==========================================================================

  clearAllCaches(): void;
  resetAdminCredential(): void;
}
