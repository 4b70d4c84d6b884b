/**
 * gatehouse - Identity Provider Payload Schemas
 *
 * Everything the identity provider sends back is parsed through one of these
 * schemas before it reaches adapter code. Unknown fields are preserved
 * (`passthrough`) so callers see the full upstream representation.
 */

import { z } from 'zod';
import type { RoleAccess, TokenClaims } from '../types';

// ============================================================================
// TOKENS
// ============================================================================

const roleAccessSchema: z.ZodType<RoleAccess> = z.object({
  roles: z.array(z.string()).optional(),
});

export const tokenClaimsSchema: z.ZodType<TokenClaims> = z
  .object({
    sub: z.string().optional(),
    exp: z.number().optional(),
    iat: z.number().optional(),
    nbf: z.number().optional(),
    iss: z.string().optional(),
    aud: z.union([z.string(), z.array(z.string())]).optional(),
    azp: z.string().optional(),
    realm_access: roleAccessSchema.optional(),
    resource_access: z.record(roleAccessSchema).optional(),
  })
  .passthrough();

export const tokenResponseSchema = z
  .object({
    access_token: z.string(),
    /** Lifetime of the access token in seconds. */
    expires_in: z.number().optional(),
    refresh_token: z.string().optional(),
    refresh_expires_in: z.number().optional(),
    token_type: z.string().optional(),
    id_token: z.string().optional(),
    scope: z.string().optional(),
    session_state: z.string().optional(),
  })
  .passthrough();

export type TokenResponse = z.infer<typeof tokenResponseSchema>;

export const introspectionSchema = z
  .object({
    active: z.boolean(),
  })
  .passthrough();

export type TokenIntrospection = z.infer<typeof introspectionSchema>;

// ============================================================================
// USERS
// ============================================================================

export const userInfoSchema = z
  .object({
    sub: z.string(),
    preferred_username: z.string().optional(),
    email: z.string().optional(),
    email_verified: z.boolean().optional(),
    name: z.string().optional(),
    realm_access: roleAccessSchema.optional(),
    resource_access: z.record(roleAccessSchema).optional(),
  })
  .passthrough();

export type UserInfo = z.infer<typeof userInfoSchema>;

export const userSchema = z
  .object({
    id: z.string(),
    username: z.string().optional(),
    email: z.string().optional(),
    firstName: z.string().optional(),
    lastName: z.string().optional(),
    enabled: z.boolean().optional(),
    emailVerified: z.boolean().optional(),
    createdTimestamp: z.number().optional(),
    attributes: z.record(z.array(z.string())).optional(),
  })
  .passthrough();

export const userListSchema = z.array(userSchema);

export type IdentityUser = z.infer<typeof userSchema>;

/**
 * Body accepted by user create/update. Passwords go through `resetPassword`
 * or `credentials`.
 */
export interface UserInput {
  username?: string;
  email?: string;
  firstName?: string;
  lastName?: string;
  enabled?: boolean;
  emailVerified?: boolean;
  attributes?: Record<string, string[]>;
  credentials?: Array<{ type: 'password'; value: string; temporary?: boolean }>;
  [field: string]: unknown;
}

// ============================================================================
// ROLES & CLIENTS
// ============================================================================

export const roleSchema = z
  .object({
    id: z.string().optional(),
    name: z.string(),
    description: z.string().optional(),
    composite: z.boolean().optional(),
    clientRole: z.boolean().optional(),
    containerId: z.string().optional(),
  })
  .passthrough();

export const roleListSchema = z.array(roleSchema);

export type IdentityRole = z.infer<typeof roleSchema>;

export const clientSchema = z
  .object({
    id: z.string(),
    clientId: z.string(),
    secret: z.string().optional(),
    enabled: z.boolean().optional(),
  })
  .passthrough();

export const clientListSchema = z.array(clientSchema);

export type IdentityClient = z.infer<typeof clientSchema>;

// ============================================================================
// REALM METADATA
// ============================================================================

export const realmInfoSchema = z
  .object({
    realm: z.string().optional(),
    /** Base64 SPKI body of the realm signing key. */
    public_key: z.string(),
  })
  .passthrough();

export const wellKnownSchema = z
  .object({
    issuer: z.string(),
    authorization_endpoint: z.string().optional(),
    token_endpoint: z.string().optional(),
    userinfo_endpoint: z.string().optional(),
    jwks_uri: z.string().optional(),
  })
  .passthrough();

export type OpenIdConfiguration = z.infer<typeof wellKnownSchema>;

export const jwksSchema = z
  .object({
    keys: z.array(
      z
        .object({
          kid: z.string().optional(),
          kty: z.string(),
          alg: z.string().optional(),
          use: z.string().optional(),
        })
        .passthrough()
    ),
  })
  .passthrough();

export type JsonWebKeySet = z.infer<typeof jwksSchema>;

export const umaPermissionListSchema = z.array(
  z
    .object({
      rsid: z.string().optional(),
      rsname: z.string().optional(),
      scopes: z.array(z.string()).optional(),
    })
    .passthrough()
);

export type UmaPermission = z.infer<typeof umaPermissionListSchema>[number];
