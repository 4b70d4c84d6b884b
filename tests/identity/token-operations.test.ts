/**
 * gatehouse - Token Operations and Role Check Tests
 */

import { describe, it, expect, beforeAll } from 'vitest';
import { generateKeyPair, SigningKeyPair } from '../../src/crypto';
import { HttpUnreachableError } from '../../src/identity/http';
import {
  InternalError,
  InvalidTokenError,
  UnauthenticatedError,
  UnavailableError,
} from '../../src/types';
import {
  OIDC,
  createIdentityFixture,
  createRealmKeys,
  signToken,
} from '../helpers/identity-fixture';

let keys: SigningKeyPair;
let foreignKeys: SigningKeyPair;

beforeAll(async () => {
  keys = await createRealmKeys();
  foreignKeys = await generateKeyPair('foreign-key');
});

const USERINFO = {
  sub: 'u1',
  preferred_username: 'ada',
  realm_access: { roles: ['user'] },
  resource_access: { web: { roles: ['editor'] }, api: { roles: ['writer'] } },
};

function setupWithUserinfo() {
  const fixture = createIdentityFixture(keys);
  fixture.transport.on('GET', `${OIDC}/userinfo`, { body: USERINFO });
  return fixture;
}

describe('token validation', () => {
  it('should accept a token signed by the realm key', async () => {
    const { adapter } = createIdentityFixture(keys);

    expect(await adapter.validateToken(signToken(keys))).toBe(true);
  });

  it('should reject an expired token', async () => {
    const { adapter } = createIdentityFixture(keys);
    const expired = signToken(keys, { exp: Math.floor(Date.now() / 1000) - 10 });

    expect(await adapter.validateToken(expired)).toBe(false);
  });

  it('should reject a token signed by another key', async () => {
    const { adapter } = createIdentityFixture(keys);

    expect(await adapter.validateToken(signToken(foreignKeys))).toBe(false);
  });

  it('should reject garbage', async () => {
    const { adapter } = createIdentityFixture(keys);

    expect(await adapter.validateToken('not-a-token')).toBe(false);
  });

  it('should return verified claims', async () => {
    const { adapter } = createIdentityFixture(keys);

    const claims = await adapter.getTokenInfo(signToken(keys, { sub: 'u42', azp: 'web' }));

    expect(claims.sub).toBe('u42');
    expect(claims.azp).toBe('web');
  });

  it('should raise InvalidTokenError for an expired token', async () => {
    const { adapter } = createIdentityFixture(keys);
    const expired = signToken(keys, { exp: Math.floor(Date.now() / 1000) - 10 });

    await expect(adapter.getTokenInfo(expired)).rejects.toBeInstanceOf(InvalidTokenError);
  });
});

describe('getUserinfo', () => {
  it('should return user info and cache it per token', async () => {
    const { adapter, transport } = setupWithUserinfo();
    const token = signToken(keys);

    const info = await adapter.getUserinfo(token);
    await adapter.getUserinfo(token);

    expect(info.preferred_username).toBe('ada');
    expect(transport.count('GET', `${OIDC}/userinfo`)).toBe(1);
    expect(transport.callsTo('GET', `${OIDC}/userinfo`)[0].request.headers).toEqual({
      authorization: `Bearer ${token}`,
    });
  });

  it('should raise InvalidTokenError without calling the provider', async () => {
    const { adapter, transport } = setupWithUserinfo();

    await expect(adapter.getUserinfo(signToken(foreignKeys))).rejects.toBeInstanceOf(InvalidTokenError);
    expect(transport.count('GET', `${OIDC}/userinfo`)).toBe(0);
  });
});

describe('role checks', () => {
  it('should find realm and client roles', async () => {
    const { adapter } = setupWithUserinfo();
    const token = signToken(keys);

    expect(await adapter.hasRole(token, 'user')).toBe(true);
    expect(await adapter.hasRole(token, 'writer')).toBe(true);
    expect(await adapter.hasRole(token, 'admin')).toBe(false);
  });

  it('should match any role across realm and client roles', async () => {
    const { adapter } = setupWithUserinfo();
    const token = signToken(keys);

    expect(await adapter.hasAnyOfRoles(token, new Set(['admin', 'editor']))).toBe(true);
    expect(await adapter.hasAnyOfRoles(token, ['admin', 'owner'])).toBe(false);
  });

  it('should require every role for hasAllRoles', async () => {
    const { adapter } = setupWithUserinfo();
    const token = signToken(keys);

    expect(await adapter.hasAllRoles(token, ['user', 'editor', 'writer'])).toBe(true);
    expect(await adapter.hasAllRoles(token, ['user', 'admin'])).toBe(false);
  });

  it('should return false instead of throwing for an invalid token', async () => {
    const { adapter } = setupWithUserinfo();
    const forged = signToken(foreignKeys);

    expect(await adapter.hasRole(forged, 'user')).toBe(false);
    expect(await adapter.hasAnyOfRoles(forged, ['user', 'editor'])).toBe(false);
    expect(await adapter.hasAllRoles(forged, ['user'])).toBe(false);
  });

  it('should return false when the provider fails', async () => {
    const { adapter, transport } = setupWithUserinfo();
    transport.on('GET', `${OIDC}/userinfo`, { status: 500 });

    expect(await adapter.hasRole(signToken(keys), 'user')).toBe(false);
  });
});

describe('checkPermissions', () => {
  it('should grant when the resource is listed with the scope', async () => {
    const { adapter, transport } = createIdentityFixture(keys);
    transport.on('POST', `${OIDC}/token`, { body: [{ rsname: 'docs', scopes: ['read'] }] });

    expect(await adapter.checkPermissions('user-token', 'docs', 'read')).toBe(true);

    const [call] = transport.callsTo('POST', `${OIDC}/token`);
    expect(call.request.headers).toEqual({ authorization: 'Bearer user-token' });
    expect(call.request.form).toEqual({
      grant_type: 'urn:ietf:params:oauth:grant-type:uma-ticket',
      audience: 'backend',
      response_mode: 'permissions',
      permission: 'docs#read',
    });
  });

  it('should deny when the scope is missing', async () => {
    const { adapter, transport } = createIdentityFixture(keys);
    transport.on('POST', `${OIDC}/token`, { body: [{ rsname: 'docs', scopes: ['read'] }] });

    expect(await adapter.checkPermissions('user-token', 'docs', 'write')).toBe(false);
  });

  it('should deny when the provider refuses', async () => {
    const { adapter, transport } = createIdentityFixture(keys);
    transport.on('POST', `${OIDC}/token`, { status: 403, body: { error: 'access_denied' } });

    expect(await adapter.checkPermissions('user-token', 'docs', 'read')).toBe(false);
  });
});

describe('token grants', () => {
  it('should exchange user credentials for tokens', async () => {
    const { adapter, transport } = createIdentityFixture(keys);
    transport.on('POST', `${OIDC}/token`, {
      body: { access_token: 'user-access', refresh_token: 'user-refresh', expires_in: 300 },
    });

    const tokens = await adapter.getToken('ada', 'placeholder-password');

    expect(tokens.access_token).toBe('user-access');
    expect(transport.callsTo('POST', `${OIDC}/token`)[0].request.form).toEqual({
      client_id: 'backend',
      client_secret: 'test-secret',
      grant_type: 'password',
      username: 'ada',
      password: 'placeholder-password',
    });
  });

  it('should report rejected user credentials as unauthenticated', async () => {
    const { adapter } = createIdentityFixture(keys);

    await expect(adapter.getToken('ada', 'wrong')).rejects.toBeInstanceOf(UnauthenticatedError);
  });

  it('should report a rejected client credentials grant as unauthenticated', async () => {
    const { adapter, transport } = createIdentityFixture(keys);
    transport.on('POST', `${OIDC}/token`, { status: 401 });

    await expect(adapter.getClientCredentialsToken()).rejects.toBeInstanceOf(UnauthenticatedError);
  });

  it('should report a rejected refresh token as invalid', async () => {
    const { adapter } = createIdentityFixture(keys);

    await expect(adapter.refreshToken('stale-refresh')).rejects.toBeInstanceOf(InvalidTokenError);
  });

  it('should report a rejected authorization code as invalid', async () => {
    const { adapter } = createIdentityFixture(keys);

    await expect(adapter.getTokenFromCode('code-1', 'https://app.test/cb')).rejects.toBeInstanceOf(
      InvalidTokenError
    );
  });

  it('should send the redirect uri with the authorization code', async () => {
    const { adapter, transport } = createIdentityFixture(keys);
    transport.on('POST', `${OIDC}/token`, { body: { access_token: 'from-code' } });

    await adapter.getTokenFromCode('code-1', 'https://app.test/cb');

    expect(transport.callsTo('POST', `${OIDC}/token`)[0].request.form).toMatchObject({
      grant_type: 'authorization_code',
      code: 'code-1',
      redirect_uri: 'https://app.test/cb',
    });
  });

  it('should report an unreachable provider as unavailable', async () => {
    const { adapter, transport } = createIdentityFixture(keys);
    transport.on('POST', `${OIDC}/token`, () => {
      throw new HttpUnreachableError('https://id.test/token');
    });

    await expect(adapter.getToken('ada', 'placeholder-password')).rejects.toBeInstanceOf(UnavailableError);
  });
});

describe('introspection and logout', () => {
  it('should introspect a token', async () => {
    const { adapter, transport } = createIdentityFixture(keys);
    transport.on('POST', `${OIDC}/token/introspect`, { body: { active: true, sub: 'u1' } });

    expect(await adapter.introspectToken('some-token')).toEqual({ active: true, sub: 'u1' });
  });

  it('should report a failed introspection as an invalid token', async () => {
    const { adapter, transport } = createIdentityFixture(keys);
    transport.on('POST', `${OIDC}/token/introspect`, { status: 401 });

    await expect(adapter.introspectToken('some-token')).rejects.toBeInstanceOf(InvalidTokenError);
  });

  it('should log out with the refresh token', async () => {
    const { adapter, transport } = createIdentityFixture(keys);
    transport.on('POST', `${OIDC}/logout`, { status: 204 });

    await adapter.logout('user-refresh');

    expect(transport.callsTo('POST', `${OIDC}/logout`)[0].request.form).toEqual({
      client_id: 'backend',
      client_secret: 'test-secret',
      refresh_token: 'user-refresh',
    });
  });

  it('should report a failed logout as internal', async () => {
    const { adapter, transport } = createIdentityFixture(keys);
    transport.on('POST', `${OIDC}/logout`, { status: 500 });

    await expect(adapter.logout('user-refresh')).rejects.toBeInstanceOf(InternalError);
  });
});
