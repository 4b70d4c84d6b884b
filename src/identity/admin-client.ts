/**
 * gatehouse - Admin REST Client
 *
 * Client for the realm admin API. Every request carries the bearer token
 * returned by `getToken`, which the adapter wires to the credential lease.
 * Client parameters are the internal client UUID, not the human `clientId`.
 */

import type { z } from 'zod';
import type { HttpMethod, HttpRequest, HttpTransport } from './http';
import {
  clientListSchema,
  clientSchema,
  roleListSchema,
  roleSchema,
  userListSchema,
  userSchema,
  IdentityClient,
  IdentityRole,
  IdentityUser,
  UserInput,
} from './schemas';
import { ADAPTER_ERROR_MESSAGES } from '../types';

export interface AdminClientOptions {
  transport: HttpTransport;
  serverUrl: string;
  realmName: string;
  getToken: () => Promise<string>;
}

export interface UserQuery {
  username?: string;
  email?: string;
  firstName?: string;
  lastName?: string;
  /** Match the given fields exactly instead of by substring. */
  exact?: boolean;
  max?: number;
}

export interface RoleInput {
  name: string;
  description?: string;
}

export class AdminClient {
  private readonly transport: HttpTransport;
  private readonly baseUrl: string;
  private readonly getToken: () => Promise<string>;

  constructor(options: AdminClientOptions) {
    this.transport = options.transport;
    this.baseUrl = `${options.serverUrl.replace(/\/+$/, '')}/admin/realms/${encodeURIComponent(options.realmName)}`;
    this.getToken = options.getToken;
  }

  private async send(
    method: HttpMethod,
    path: string,
    extra: Pick<HttpRequest, 'query' | 'json'> = {}
  ): Promise<{ headers: Record<string, string>; body: unknown }> {
    const token = await this.getToken();
    return this.transport.request({
      method,
      url: `${this.baseUrl}/${path}`,
      headers: { authorization: `Bearer ${token}` },
      ...extra,
    });
  }

  private async read<S extends z.ZodTypeAny>(
    path: string,
    schema: S,
    query?: HttpRequest['query']
  ): Promise<z.output<S>> {
    const response = await this.send('GET', path, { query });
    return schema.parse(response.body);
  }

  // ==========================================================================
  // USERS
  // ==========================================================================

  getUser(userId: string): Promise<IdentityUser> {
    return this.read(`users/${encodeURIComponent(userId)}`, userSchema);
  }

  findUsers(query: UserQuery): Promise<IdentityUser[]> {
    return this.read('users', userListSchema, { ...query });
  }

  /**
   * @returns id of the new user, read from the `Location` header
   */
  async createUser(input: UserInput): Promise<string> {
    const response = await this.send('POST', 'users', { json: input });
    const location = response.headers['location'];
    const id = location?.split('/').filter(Boolean).pop();
    if (!id) {
      throw new Error(ADAPTER_ERROR_MESSAGES.MISSING_LOCATION_HEADER);
    }
    return decodeURIComponent(id);
  }

  async updateUser(userId: string, input: UserInput): Promise<void> {
    await this.send('PUT', `users/${encodeURIComponent(userId)}`, { json: input });
  }

  async deleteUser(userId: string): Promise<void> {
    await this.send('DELETE', `users/${encodeURIComponent(userId)}`);
  }

  async resetPassword(userId: string, password: string, temporary: boolean): Promise<void> {
    await this.send('PUT', `users/${encodeURIComponent(userId)}/reset-password`, {
      json: { type: 'password', value: password, temporary },
    });
  }

  /** Ends every session of the user. */
  async logoutUser(userId: string): Promise<void> {
    await this.send('POST', `users/${encodeURIComponent(userId)}/logout`);
  }

  // ==========================================================================
  // ROLE MAPPINGS
  // ==========================================================================

  getUserRealmRoles(userId: string): Promise<IdentityRole[]> {
    return this.read(`users/${encodeURIComponent(userId)}/role-mappings/realm`, roleListSchema);
  }

  async addUserRealmRoles(userId: string, roles: IdentityRole[]): Promise<void> {
    await this.send('POST', `users/${encodeURIComponent(userId)}/role-mappings/realm`, { json: roles });
  }

  async removeUserRealmRoles(userId: string, roles: IdentityRole[]): Promise<void> {
    await this.send('DELETE', `users/${encodeURIComponent(userId)}/role-mappings/realm`, { json: roles });
  }

  getUserClientRoles(userId: string, clientUuid: string): Promise<IdentityRole[]> {
    return this.read(
      `users/${encodeURIComponent(userId)}/role-mappings/clients/${encodeURIComponent(clientUuid)}`,
      roleListSchema
    );
  }

  async addUserClientRoles(userId: string, clientUuid: string, roles: IdentityRole[]): Promise<void> {
    await this.send(
      'POST',
      `users/${encodeURIComponent(userId)}/role-mappings/clients/${encodeURIComponent(clientUuid)}`,
      { json: roles }
    );
  }

  async removeUserClientRoles(userId: string, clientUuid: string, roles: IdentityRole[]): Promise<void> {
    await this.send(
      'DELETE',
      `users/${encodeURIComponent(userId)}/role-mappings/clients/${encodeURIComponent(clientUuid)}`,
      { json: roles }
    );
  }

  // ==========================================================================
  // REALM ROLES
  // ==========================================================================

  getRealmRoles(): Promise<IdentityRole[]> {
    return this.read('roles', roleListSchema);
  }

  getRealmRole(name: string): Promise<IdentityRole> {
    return this.read(`roles/${encodeURIComponent(name)}`, roleSchema);
  }

  async createRealmRole(role: RoleInput): Promise<void> {
    await this.send('POST', 'roles', { json: role });
  }

  async deleteRealmRole(name: string): Promise<void> {
    await this.send('DELETE', `roles/${encodeURIComponent(name)}`);
  }

  // ==========================================================================
  // CLIENTS
  // ==========================================================================

  findClients(clientId: string): Promise<IdentityClient[]> {
    return this.read('clients', clientListSchema, { clientId });
  }

  getClient(clientUuid: string): Promise<IdentityClient> {
    return this.read(`clients/${encodeURIComponent(clientUuid)}`, clientSchema);
  }

  getClientRole(clientUuid: string, roleName: string): Promise<IdentityRole> {
    return this.read(
      `clients/${encodeURIComponent(clientUuid)}/roles/${encodeURIComponent(roleName)}`,
      roleSchema
    );
  }

  getServiceAccountUser(clientUuid: string): Promise<IdentityUser> {
    return this.read(`clients/${encodeURIComponent(clientUuid)}/service-account-user`, userSchema);
  }
}
