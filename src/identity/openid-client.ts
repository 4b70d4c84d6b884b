/**
 * gatehouse - OpenID Connect Client
 *
 * Thin client for the realm's OpenID Connect endpoints. Each method issues a
 * single request and returns the schema-validated body; transport and status
 * errors propagate unchanged so the adapter can decide how to report them.
 */

import type { z } from 'zod';
import type { HttpTransport } from './http';
import {
  introspectionSchema,
  jwksSchema,
  realmInfoSchema,
  tokenResponseSchema,
  umaPermissionListSchema,
  userInfoSchema,
  wellKnownSchema,
  JsonWebKeySet,
  OpenIdConfiguration,
  TokenIntrospection,
  TokenResponse,
  UmaPermission,
  UserInfo,
} from './schemas';

export interface OpenIdClientOptions {
  transport: HttpTransport;
  serverUrl: string;
  realmName: string;
  clientId: string;
  clientSecret?: string;
}

export const UMA_TICKET_GRANT = 'urn:ietf:params:oauth:grant-type:uma-ticket';

export class OpenIdClient {
  private readonly transport: HttpTransport;
  private readonly realmUrl: string;
  private readonly clientId: string;
  private readonly clientSecret?: string;

  constructor(options: OpenIdClientOptions) {
    this.transport = options.transport;
    this.realmUrl = `${options.serverUrl.replace(/\/+$/, '')}/realms/${encodeURIComponent(options.realmName)}`;
    this.clientId = options.clientId;
    this.clientSecret = options.clientSecret;
  }

  private endpoint(path: string): string {
    return `${this.realmUrl}/protocol/openid-connect/${path}`;
  }

  /** Client authentication fields sent with every form post. */
  private clientFields(): Record<string, string> {
    return this.clientSecret
      ? { client_id: this.clientId, client_secret: this.clientSecret }
      : { client_id: this.clientId };
  }

  private async get<S extends z.ZodTypeAny>(url: string, schema: S, token?: string): Promise<z.output<S>> {
    const response = await this.transport.request({
      method: 'GET',
      url,
      headers: token ? { authorization: `Bearer ${token}` } : undefined,
    });
    return schema.parse(response.body);
  }

  private async post<S extends z.ZodTypeAny>(
    path: string,
    form: Record<string, string>,
    schema: S,
    token?: string
  ): Promise<z.output<S>> {
    const response = await this.transport.request({
      method: 'POST',
      url: this.endpoint(path),
      headers: token ? { authorization: `Bearer ${token}` } : undefined,
      form,
    });
    return schema.parse(response.body);
  }

  // ==========================================================================
  // GRANTS
  // ==========================================================================

  passwordGrant(username: string, password: string): Promise<TokenResponse> {
    return this.post(
      'token',
      { ...this.clientFields(), grant_type: 'password', username, password },
      tokenResponseSchema
    );
  }

  refreshGrant(refreshToken: string): Promise<TokenResponse> {
    return this.post(
      'token',
      { ...this.clientFields(), grant_type: 'refresh_token', refresh_token: refreshToken },
      tokenResponseSchema
    );
  }

  authorizationCodeGrant(code: string, redirectUri: string): Promise<TokenResponse> {
    return this.post(
      'token',
      { ...this.clientFields(), grant_type: 'authorization_code', code, redirect_uri: redirectUri },
      tokenResponseSchema
    );
  }

  clientCredentialsGrant(): Promise<TokenResponse> {
    return this.post('token', { ...this.clientFields(), grant_type: 'client_credentials' }, tokenResponseSchema);
  }

  /**
   * UMA permission request in `permissions` response mode: the provider
   * answers with the list of granted resource/scope pairs.
   */
  umaPermissions(token: string, permissions: string[]): Promise<UmaPermission[]> {
    const form: Record<string, string> = {
      grant_type: UMA_TICKET_GRANT,
      audience: this.clientId,
      response_mode: 'permissions',
      permission: permissions.join(','),
    };
    return this.post('token', form, umaPermissionListSchema, token);
  }

  // ==========================================================================
  // TOKENS & SESSIONS
  // ==========================================================================

  userinfo(token: string): Promise<UserInfo> {
    return this.get(this.endpoint('userinfo'), userInfoSchema, token);
  }

  introspect(token: string): Promise<TokenIntrospection> {
    return this.post('token/introspect', { ...this.clientFields(), token }, introspectionSchema);
  }

  async logout(refreshToken: string): Promise<void> {
    await this.transport.request({
      method: 'POST',
      url: this.endpoint('logout'),
      form: { ...this.clientFields(), refresh_token: refreshToken },
    });
  }

  // ==========================================================================
  // REALM METADATA
  // ==========================================================================

  /** Base64 SPKI body of the realm signing key. */
  async publicKey(): Promise<string> {
    const info = await this.get(this.realmUrl, realmInfoSchema);
    return info.public_key;
  }

  wellKnown(): Promise<OpenIdConfiguration> {
    return this.get(`${this.realmUrl}/.well-known/openid-configuration`, wellKnownSchema);
  }

  certs(): Promise<JsonWebKeySet> {
    return this.get(this.endpoint('certs'), jwksSchema);
  }
}
