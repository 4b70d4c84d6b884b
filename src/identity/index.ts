/**
 * gatehouse - Identity Module
 */

export { IdentityAdapter, CACHE_POLICIES, DEFAULT_SEARCH_MAX } from './adapter';
export type { CachedOperation, IdentityAdapterOptions } from './adapter';
export type { IdentityPort } from './port';
export { OpenIdClient, UMA_TICKET_GRANT } from './openid-client';
export type { OpenIdClientOptions } from './openid-client';
export { AdminClient } from './admin-client';
export type { AdminClientOptions, RoleInput, UserQuery } from './admin-client';
export { FetchTransport, HttpStatusError, HttpUnreachableError, buildUrl, isHttpStatus } from './http';
export type { FetchTransportOptions, HttpMethod, HttpRequest, HttpResponse, HttpTransport } from './http';
export type {
  IdentityClient,
  IdentityRole,
  IdentityUser,
  JsonWebKeySet,
  OpenIdConfiguration,
  TokenIntrospection,
  TokenResponse,
  UmaPermission,
  UserInfo,
  UserInput,
} from './schemas';
