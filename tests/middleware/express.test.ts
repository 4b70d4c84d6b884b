/**
 * gatehouse - Express Middleware Tests
 */

import { describe, it, expect, beforeAll, vi } from 'vitest';
import type { Request, Response } from 'express';
import { requireAuthentication, requirePermission, requireRoles } from '../../src/middleware/express';
import type { SigningKeyPair } from '../../src/crypto';
import { AdapterError, InvalidTokenError } from '../../src/types';
import { createIdentityFixture, createRealmKeys, OIDC, signToken } from '../helpers/identity-fixture';

// Mock Express request/response
function createMockRequest(options: {
  headers?: Record<string, string>;
  identity?: Request['identity'];
}): Request {
  return {
    headers: options.headers ?? {},
    identity: options.identity,
  } as unknown as Request;
}

interface RecordedResponse {
  statusCode: number;
  body: unknown;
}

interface MockResponse {
  status(code: number): MockResponse;
  json(body: unknown): MockResponse;
}

function createMockResponse(): { res: Response; recorded: RecordedResponse } {
  const recorded: RecordedResponse = { statusCode: 200, body: undefined };
  const res: MockResponse = {
    status(code: number) {
      recorded.statusCode = code;
      return res;
    },
    json(body: unknown) {
      recorded.body = body;
      return res;
    },
  };
  return { res: res as unknown as Response, recorded };
}

const USERINFO = {
  sub: 'u1',
  realm_access: { roles: ['user'] },
  resource_access: { web: { roles: ['editor'] } },
};

describe('Express Middleware', () => {
  let keys: SigningKeyPair;

  beforeAll(async () => {
    keys = await createRealmKeys();
  });

  function setup() {
    const fixture = createIdentityFixture(keys);
    fixture.transport.on('GET', `${OIDC}/userinfo`, { body: USERINFO });
    return fixture;
  }

  describe('requireAuthentication', () => {
    it('should reject a request without a bearer token', async () => {
      const { adapter } = setup();
      const req = createMockRequest({ headers: { authorization: 'Basic abc' } });
      const { res, recorded } = createMockResponse();
      const next = vi.fn();

      await requireAuthentication({ identity: adapter })(req, res, next);

      expect(next).not.toHaveBeenCalled();
      expect(recorded.statusCode).toBe(401);
      expect(recorded.body).toMatchObject({
        error: 'unauthenticated',
        error_code: 'GH-401-01',
        message: 'No token provided',
        action: 'reauth',
      });
    });

    it('should attach verified claims and continue', async () => {
      const { adapter } = setup();
      const token = signToken(keys, { preferred_username: 'ada' });
      const req = createMockRequest({ headers: { authorization: `Bearer ${token}` } });
      const { res } = createMockResponse();
      const next = vi.fn();

      await requireAuthentication({ identity: adapter })(req, res, next);

      expect(next).toHaveBeenCalledTimes(1);
      expect(req.identity?.token).toBe(token);
      expect(req.identity?.claims).toMatchObject({ sub: 'u1', preferred_username: 'ada' });
    });

    it('should answer an expired token with invalid_token', async () => {
      const { adapter } = setup();
      const token = signToken(keys, { exp: Math.floor(Date.now() / 1000) - 60 });
      const req = createMockRequest({ headers: { authorization: `Bearer ${token}` } });
      const { res, recorded } = createMockResponse();

      await requireAuthentication({ identity: adapter })(req, res, vi.fn());

      expect(recorded.statusCode).toBe(401);
      expect(recorded.body).toMatchObject({ error: 'invalid_token', action: 'renew' });
      expect(req.identity).toBeUndefined();
    });

    it('should hand failures to a custom error handler', async () => {
      const { adapter } = setup();
      const errors: AdapterError[] = [];
      const req = createMockRequest({ headers: { authorization: 'Bearer not-a-jwt' } });
      const { res } = createMockResponse();

      await requireAuthentication({
        identity: adapter,
        onError: (error) => {
          errors.push(error);
        },
      })(req, res, vi.fn());

      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(InvalidTokenError);
    });

    it('should use a custom token extractor', async () => {
      const { adapter } = setup();
      const token = signToken(keys);
      const req = createMockRequest({ headers: { 'x-access-token': token } });
      const next = vi.fn();

      await requireAuthentication({
        identity: adapter,
        extractToken: (r) => {
          const value = r.headers['x-access-token'];
          return typeof value === 'string' ? value : null;
        },
      })(req, createMockResponse().res, next);

      expect(next).toHaveBeenCalledTimes(1);
    });
  });

  describe('requireRoles', () => {
    it('should require an authenticated request', async () => {
      const { adapter } = setup();
      const { res, recorded } = createMockResponse();
      const next = vi.fn();

      await requireRoles({ identity: adapter, any: ['user'] })(createMockRequest({}), res, next);

      expect(next).not.toHaveBeenCalled();
      expect(recorded.statusCode).toBe(401);
    });

    it('should pass when any listed role is held', async () => {
      const { adapter } = setup();
      const token = signToken(keys);
      const req = createMockRequest({ identity: { token, claims: { sub: 'u1' } } });
      const next = vi.fn();

      await requireRoles({ identity: adapter, any: ['admin', 'editor'] })(req, createMockResponse().res, next);

      expect(next).toHaveBeenCalledTimes(1);
    });

    it('should deny when a required role is missing', async () => {
      const { adapter } = setup();
      const token = signToken(keys);
      const req = createMockRequest({ identity: { token, claims: { sub: 'u1' } } });
      const { res, recorded } = createMockResponse();
      const next = vi.fn();

      await requireRoles({ identity: adapter, all: ['user', 'admin'] })(req, res, next);

      expect(next).not.toHaveBeenCalled();
      expect(recorded.statusCode).toBe(403);
      expect(recorded.body).toMatchObject({
        error: 'permission_denied',
        error_code: 'GH-403-01',
        message: 'Missing required roles: user, admin',
      });
    });

    it('should deny when none of the alternatives is held', async () => {
      const { adapter } = setup();
      const token = signToken(keys);
      const req = createMockRequest({ identity: { token, claims: { sub: 'u1' } } });
      const { res, recorded } = createMockResponse();

      await requireRoles({ identity: adapter, all: ['user'], any: ['admin', 'auditor'] })(req, res, vi.fn());

      expect(recorded.statusCode).toBe(403);
      expect(recorded.body).toMatchObject({ message: 'Requires one of: admin, auditor' });
    });
  });

  describe('requirePermission', () => {
    it('should pass when the provider grants the scope', async () => {
      const { adapter, transport } = setup();
      transport.on('POST', `${OIDC}/token`, { body: [{ rsname: 'docs', scopes: ['read', 'write'] }] });
      const req = createMockRequest({ identity: { token: 'user-token', claims: {} } });
      const next = vi.fn();

      await requirePermission({ identity: adapter, resource: 'docs', scope: 'write' })(
        req,
        createMockResponse().res,
        next
      );

      expect(next).toHaveBeenCalledTimes(1);
    });

    it('should answer 403 when the provider refuses', async () => {
      const { adapter, transport } = setup();
      transport.on('POST', `${OIDC}/token`, { status: 403, body: { error: 'access_denied' } });
      const req = createMockRequest({ identity: { token: 'user-token', claims: {} } });
      const { res, recorded } = createMockResponse();
      const next = vi.fn();

      await requirePermission({ identity: adapter, resource: 'docs', scope: 'write' })(req, res, next);

      expect(next).not.toHaveBeenCalled();
      expect(recorded.statusCode).toBe(403);
      expect(recorded.body).toMatchObject({ error: 'permission_denied', message: 'Permission denied' });
    });
  });
});
