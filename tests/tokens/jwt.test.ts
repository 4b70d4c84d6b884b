/**
 * gatehouse - Access Token Tests
 */

import { describe, it, expect, beforeAll, afterEach, vi } from 'vitest';
import { base64urlEncode, generateKeyPair, SigningKeyPair } from '../../src/crypto';
import { collectRoles, createJwt, decodeJwt, getTimeUntilExpiration, verifyJwt } from '../../src/tokens/jwt';
import { InvalidTokenError, JwtAlgorithm } from '../../src/types';

const NOW = new Date('2026-01-01T00:00:00Z');
const NOW_SECONDS = Math.floor(NOW.getTime() / 1000);

describe('access tokens', () => {
  let rsaKey: SigningKeyPair;
  let ecKey: SigningKeyPair;

  beforeAll(async () => {
    rsaKey = await generateKeyPair('rsa-key');
    ecKey = await generateKeyPair('ec-key', JwtAlgorithm.ES256);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('decodeJwt', () => {
    it('should split a token into header and claims', () => {
      const token = createJwt({ claims: { sub: 'u1', azp: 'web' }, privateKey: rsaKey.privateKey, kid: 'rsa-key' });

      const decoded = decodeJwt(token);

      expect(decoded.header).toEqual({ alg: 'RS256', typ: 'JWT', kid: 'rsa-key' });
      expect(decoded.claims).toEqual({ sub: 'u1', azp: 'web' });
    });

    it('should reject tokens without three parts', () => {
      expect(() => decodeJwt('a.b')).toThrow('Token must have 3 parts');
    });

    it('should reject unsupported algorithms', () => {
      const token = `${base64urlEncode('{"alg":"HS256"}')}.${base64urlEncode('{}')}.sig`;

      expect(() => decodeJwt(token)).toThrow('Unsupported token algorithm');
    });

    it('should reject unreadable segments', () => {
      const token = `${base64urlEncode('not json')}.${base64urlEncode('{}')}.sig`;

      expect(() => decodeJwt(token)).toThrow(InvalidTokenError);
    });

    it('should reject claims of the wrong type', () => {
      const token = `${base64urlEncode('{"alg":"RS256"}')}.${base64urlEncode('{"exp":"soon"}')}.sig`;

      expect(() => decodeJwt(token)).toThrow('Failed to decode token');
    });
  });

  describe('verifyJwt', () => {
    it('should return the claims of a valid RS256 token', () => {
      vi.useFakeTimers();
      vi.setSystemTime(NOW);
      const token = createJwt({ claims: { sub: 'u1', exp: NOW_SECONDS + 60 }, privateKey: rsaKey.privateKey });

      expect(verifyJwt(token, rsaKey.publicKey)).toEqual({ sub: 'u1', exp: NOW_SECONDS + 60 });
    });

    it('should verify ES256 tokens', () => {
      const token = createJwt({ claims: { sub: 'u1' }, privateKey: ecKey.privateKey, algorithm: JwtAlgorithm.ES256 });

      expect(verifyJwt(token, ecKey.publicKey).sub).toBe('u1');
    });

    it('should reject a tampered payload', () => {
      const token = createJwt({ claims: { sub: 'u1' }, privateKey: rsaKey.privateKey });
      const [header, , signature] = token.split('.');
      const forged = `${header}.${base64urlEncode('{"sub":"admin"}')}.${signature}`;

      expect(() => verifyJwt(forged, rsaKey.publicKey)).toThrow('Signature verification failed');
    });

    it('should treat a token as expired at its exp second', () => {
      vi.useFakeTimers();
      vi.setSystemTime(NOW);
      const token = createJwt({ claims: { exp: NOW_SECONDS }, privateKey: rsaKey.privateKey });

      expect(() => verifyJwt(token, rsaKey.publicKey)).toThrow('Token has expired');
    });

    it('should honour clock skew tolerance', () => {
      vi.useFakeTimers();
      vi.setSystemTime(NOW);
      const token = createJwt({ claims: { exp: NOW_SECONDS - 5 }, privateKey: rsaKey.privateKey });

      expect(verifyJwt(token, rsaKey.publicKey, { clockSkewTolerance: 10 }).exp).toBe(NOW_SECONDS - 5);
    });

    it('should reject tokens used before nbf', () => {
      vi.useFakeTimers();
      vi.setSystemTime(NOW);
      const token = createJwt({ claims: { nbf: NOW_SECONDS + 30 }, privateKey: rsaKey.privateKey });

      expect(() => verifyJwt(token, rsaKey.publicKey)).toThrow('Token is not yet valid');
    });
  });

  describe('getTimeUntilExpiration', () => {
    it('should count down to exp', () => {
      vi.useFakeTimers();
      vi.setSystemTime(NOW);
      const token = createJwt({ claims: { exp: NOW_SECONDS + 90 }, privateKey: rsaKey.privateKey });

      expect(getTimeUntilExpiration(token)).toBe(90);
    });

    it('should return 0 for unreadable tokens', () => {
      expect(getTimeUntilExpiration('garbage')).toBe(0);
    });
  });

  describe('collectRoles', () => {
    it('should merge realm and client roles', () => {
      const roles = collectRoles({
        realm_access: { roles: ['user'] },
        resource_access: { web: { roles: ['editor'] }, api: { roles: ['user', 'writer'] } },
      });

      expect([...roles].sort()).toEqual(['editor', 'user', 'writer']);
    });

    it('should tolerate missing sections', () => {
      expect(collectRoles({}).size).toBe(0);
    });
  });
});
