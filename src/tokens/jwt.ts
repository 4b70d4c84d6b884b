/**
 * gatehouse - Access Token Handling
 * Decode and verify identity-provider access tokens (JWS)
 */

import {
  base64urlEncode,
  base64urlDecode,
  encodeJSON,
  decodeJSON,
  sign,
  verify,
} from '../crypto';
import {
  ADAPTER_ERROR_MESSAGES,
  DecodedJwt,
  InvalidTokenError,
  JwtAlgorithm,
  JwtHeader,
  TokenClaims,
  isJwtAlgorithm,
} from '../types';
import { tokenClaimsSchema } from '../identity/schemas';

// ============================================================================
// DECODING
// ============================================================================

function parseHeader(value: unknown): JwtHeader {
  if (value === null || typeof value !== 'object') {
    throw new InvalidTokenError(ADAPTER_ERROR_MESSAGES.FAILED_TO_DECODE_TOKEN);
  }
  const alg: unknown = Reflect.get(value, 'alg');
  if (!isJwtAlgorithm(alg)) {
    throw new InvalidTokenError(ADAPTER_ERROR_MESSAGES.UNSUPPORTED_ALGORITHM);
  }
  const typ: unknown = Reflect.get(value, 'typ');
  const kid: unknown = Reflect.get(value, 'kid');
  return {
    alg,
    typ: typeof typ === 'string' ? typ : undefined,
    kid: typeof kid === 'string' ? kid : undefined,
  };
}

/**
 * Decode a token without verification
 * Useful for inspecting token contents
 */
export function decodeJwt(token: string): DecodedJwt {
  const parts = token.split('.');
  if (parts.length !== 3) {
    throw new InvalidTokenError(ADAPTER_ERROR_MESSAGES.TOKEN_MUST_HAVE_3_PARTS);
  }

  let rawHeader: unknown;
  let rawClaims: unknown;
  try {
    rawHeader = decodeJSON(parts[0]);
    rawClaims = decodeJSON(parts[1]);
  } catch (error) {
    throw new InvalidTokenError(ADAPTER_ERROR_MESSAGES.FAILED_TO_DECODE_TOKEN, { cause: error });
  }

  const header = parseHeader(rawHeader);
  const claims = tokenClaimsSchema.safeParse(rawClaims);
  if (!claims.success) {
    throw new InvalidTokenError(ADAPTER_ERROR_MESSAGES.FAILED_TO_DECODE_TOKEN, { cause: claims.error });
  }

  return {
    header,
    claims: claims.data,
    signature: parts[2],
  };
}

// ============================================================================
// VERIFICATION
// ============================================================================

export interface VerifyJwtOptions {
  /** Clock skew tolerance in seconds (default: 0) */
  clockSkewTolerance?: number;
}

/**
 * Verify a token's signature and time claims against a PEM public key.
 *
 * @returns the verified claims
 * @throws {InvalidTokenError} when the token is malformed, the signature does
 *   not match, or `exp` / `nbf` put it outside its validity window
 */
export function verifyJwt(token: string, publicKey: string, options: VerifyJwtOptions = {}): TokenClaims {
  const { clockSkewTolerance = 0 } = options;

  const { header, claims, signature } = decodeJwt(token);

  const signingInput = token.slice(0, token.lastIndexOf('.'));
  if (!verify(signingInput, base64urlDecode(signature), publicKey, header.alg)) {
    throw new InvalidTokenError(ADAPTER_ERROR_MESSAGES.SIGNATURE_VERIFICATION_FAILED);
  }

  const now = Math.floor(Date.now() / 1000);
  if (claims.exp !== undefined && now >= claims.exp + clockSkewTolerance) {
    throw new InvalidTokenError(ADAPTER_ERROR_MESSAGES.TOKEN_HAS_EXPIRED);
  }
  if (claims.nbf !== undefined && now + clockSkewTolerance < claims.nbf) {
    throw new InvalidTokenError(ADAPTER_ERROR_MESSAGES.TOKEN_NOT_YET_VALID);
  }

  return claims;
}

// ============================================================================
// CREATION
// ============================================================================

export interface CreateJwtOptions {
  claims: TokenClaims;
  privateKey: string;
  algorithm?: JwtAlgorithm;
  kid?: string;
}

/**
 * Sign a token. Used by tests and local tooling; production tokens come from
 * the identity provider.
 */
export function createJwt(options: CreateJwtOptions): string {
  const { claims, privateKey, algorithm = JwtAlgorithm.RS256, kid } = options;

  const header: JwtHeader = { alg: algorithm, typ: 'JWT' };
  if (kid) header.kid = kid;

  const signingInput = `${encodeJSON(header)}.${encodeJSON(claims)}`;
  const signature = base64urlEncode(sign(signingInput, privateKey, algorithm));

  return `${signingInput}.${signature}`;
}

// ============================================================================
// UTILITY FUNCTIONS
// ============================================================================

/**
 * Get time until token expires (in seconds); 0 for expired or unreadable tokens
 */
export function getTimeUntilExpiration(token: string): number {
  try {
    const { claims } = decodeJwt(token);
    if (claims.exp === undefined) return 0;
    return Math.max(0, claims.exp - Math.floor(Date.now() / 1000));
  } catch {
    return 0;
  }
}

/**
 * Collect every role a token grants: realm roles plus the roles of every client.
 */
export function collectRoles(source: Pick<TokenClaims, 'realm_access' | 'resource_access'>): Set<string> {
  const roles = new Set<string>(source.realm_access?.roles ?? []);
  for (const access of Object.values(source.resource_access ?? {})) {
    for (const role of access.roles ?? []) {
      roles.add(role);
    }
  }
  return roles;
}
