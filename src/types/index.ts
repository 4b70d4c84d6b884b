/**
 * gatehouse - Shared Types
 *
 * This module defines the types and error helpers shared by every adapter in
 * the package. It is the canonical source of truth for:
 *
 * - Signing algorithms and decoded JWT structures
 * - The adapter error taxonomy (codes, keys, HTTP statuses, actions)
 * - The structured `AdapterError` class and its subclasses
 *
 * Upstream payload shapes (users, roles, token responses) live beside the
 * schemas that validate them in `identity/schemas`.
 */

// ============================================================================
// ALGORITHM TYPES
// ============================================================================

/**
 * Asymmetric signing algorithms accepted when verifying access tokens.
 *
 * @enum {string}
 * @property {string} RS256 - RSA using SHA-256 hash algorithm (PKCS#1 v1.5)
 * @property {string} RS384 - RSA using SHA-384 hash algorithm (PKCS#1 v1.5)
 * @property {string} RS512 - RSA using SHA-512 hash algorithm (PKCS#1 v1.5)
 * @property {string} ES256 - ECDSA using P-256 curve and SHA-256 hash algorithm
 * @property {string} ES384 - ECDSA using P-384 curve and SHA-384 hash algorithm
 * @property {string} ES512 - ECDSA using P-521 curve and SHA-512 hash algorithm
 * @property {string} PS256 - RSA-PSS using SHA-256 hash algorithm
 * @property {string} PS384 - RSA-PSS using SHA-384 hash algorithm
 * @property {string} PS512 - RSA-PSS using SHA-512 hash algorithm
 */
export enum JwtAlgorithm {
  // RSA (PKCS#1 v1.5)
  RS256 = 'RS256',
  RS384 = 'RS384',
  RS512 = 'RS512',
  // ECDSA
  ES256 = 'ES256',
  ES384 = 'ES384',
  ES512 = 'ES512',
  // RSA-PSS
  PS256 = 'PS256',
  PS384 = 'PS384',
  PS512 = 'PS512',
}

const JWT_ALGORITHMS: ReadonlySet<string> = new Set<string>(Object.values(JwtAlgorithm));

/**
 * Type guard for algorithm names read from an untrusted token header.
 */
export function isJwtAlgorithm(value: unknown): value is JwtAlgorithm {
  return typeof value === 'string' && JWT_ALGORITHMS.has(value);
}

// ============================================================================
// TOKEN TYPES
// ============================================================================

/**
 * JOSE header of a signed access token.
 */
export interface JwtHeader {
  /** Signing algorithm. */
  alg: JwtAlgorithm;
  /** Media type, usually `JWT`. */
  typ?: string;
  /** Identifier of the realm key that signed the token. */
  kid?: string;
}

/**
 * Role container used by both `realm_access` and every `resource_access` entry.
 */
export interface RoleAccess {
  roles?: string[];
}

/**
 * Claims carried by an identity-provider access token.
 *
 * Only the claims the adapters read are typed; everything else is kept as
 * `unknown` and handed back to the caller untouched.
 */
export interface TokenClaims {
  /** Subject (user id). */
  sub?: string;
  /** Expiration time (Unix seconds). */
  exp?: number;
  /** Issued-at time (Unix seconds). */
  iat?: number;
  /** Not-before time (Unix seconds). */
  nbf?: number;
  /** Issuer URL (`<server>/realms/<realm>`). */
  iss?: string;
  /** Audience. */
  aud?: string | string[];
  /** Authorized party (client id that requested the token). */
  azp?: string;
  /** Realm-level roles. */
  realm_access?: RoleAccess;
  /** Client-level roles keyed by client id. */
  resource_access?: Record<string, RoleAccess>;
  [claim: string]: unknown;
}

/**
 * Token split into its decoded parts.
 */
export interface DecodedJwt {
  header: JwtHeader;
  claims: TokenClaims;
  /** Base64url-encoded signature. */
  signature: string;
}

// ============================================================================
// ERROR CODES
// ============================================================================

/**
 * Adapter error codes.
 *
 * Format: `GH-<http status>-<sequence>`. The HTTP status portion is the
 * status a request handler should answer with when the error reaches it.
 */
export type AdapterErrorCode =
  | 'GH-400-01' // invalid_configuration
  | 'GH-401-01' // unauthenticated
  | 'GH-401-02' // invalid_token
  | 'GH-403-01' // permission_denied
  | 'GH-404-01' // not_found
  | 'GH-500-01' // internal
  | 'GH-503-01'; // unavailable

/**
 * Constant helpers for adapter error codes.
 */
export const ADAPTER_ERRORS = {
  INVALID_CONFIGURATION: 'GH-400-01' as const,
  UNAUTHENTICATED: 'GH-401-01' as const,
  INVALID_TOKEN: 'GH-401-02' as const,
  PERMISSION_DENIED: 'GH-403-01' as const,
  NOT_FOUND: 'GH-404-01' as const,
  INTERNAL: 'GH-500-01' as const,
  UNAVAILABLE: 'GH-503-01' as const,
} as const;

/**
 * Constant error messages.
 */
export const ADAPTER_ERROR_MESSAGES = {
  // Credentials
  ADMIN_SECRET_NOT_CONFIGURED: 'Client secret is not configured; administrative operations are disabled',
  INVALID_CREDENTIALS: 'Invalid user credentials',
  CLIENT_CREDENTIALS_REJECTED: 'Client credentials were rejected',

  // Tokens
  TOKEN_MUST_HAVE_3_PARTS: 'Token must have 3 parts',
  FAILED_TO_DECODE_TOKEN: 'Failed to decode token',
  UNSUPPORTED_ALGORITHM: 'Unsupported token algorithm',
  SIGNATURE_VERIFICATION_FAILED: 'Signature verification failed',
  TOKEN_HAS_EXPIRED: 'Token has expired',
  TOKEN_NOT_YET_VALID: 'Token is not yet valid',
  TOKEN_REJECTED: 'Token was rejected by the identity provider',
  NO_TOKEN_PROVIDED: 'No token provided',

  // Upstream
  UPSTREAM_REQUEST_FAILED: 'Upstream request failed',
  PUBLIC_KEY_UNAVAILABLE: 'Realm public key is unavailable',
  MISSING_LOCATION_HEADER: 'Created resource did not report its location',

  // Authorization
  PERMISSION_DENIED: 'Permission denied',
} as const;

/**
 * Helper functions for dynamic error messages.
 */
export const ADAPTER_ERROR_MESSAGE_HELPERS = {
  notFound: (resourceType: string): string => `${resourceType} not found`,
  unavailable: (service: string): string => `${service} is unavailable`,
  typeMismatch: (expected: string, received: string): string => `Expected ${expected}, got ${received}`,
  requiresOneOf: (roles: string[]): string => `Requires one of: ${roles.join(', ')}`,
  missingRequiredRoles: (roles: string[]): string => `Missing required roles: ${roles.join(', ')}`,
} as const;

/**
 * Recommended caller action for a given error.
 *
 * - `renew`: obtain a fresh access token and try again.
 * - `reauth`: require the principal to authenticate again.
 * - `retry`: retry later with the caller's own backoff policy.
 * - `none`: no automated action is recommended.
 */
export type AdapterErrorAction = 'renew' | 'reauth' | 'retry' | 'none';

export const ADAPTER_ERROR_KEYS: Record<AdapterErrorCode, string> = {
  'GH-400-01': 'invalid_configuration',
  'GH-401-01': 'unauthenticated',
  'GH-401-02': 'invalid_token',
  'GH-403-01': 'permission_denied',
  'GH-404-01': 'not_found',
  'GH-500-01': 'internal',
  'GH-503-01': 'unavailable',
};

export const ADAPTER_ERROR_STATUS: Record<AdapterErrorCode, number> = {
  'GH-400-01': 400,
  'GH-401-01': 401,
  'GH-401-02': 401,
  'GH-403-01': 403,
  'GH-404-01': 404,
  'GH-500-01': 500,
  'GH-503-01': 503,
};

export const ADAPTER_ERROR_ACTIONS: Record<AdapterErrorCode, AdapterErrorAction> = {
  'GH-400-01': 'none',
  'GH-401-01': 'reauth',
  'GH-401-02': 'renew',
  'GH-403-01': 'none',
  'GH-404-01': 'none',
  'GH-500-01': 'none',
  'GH-503-01': 'retry',
};

// ============================================================================
// ERROR CLASSES
// ============================================================================

/**
 * Structured adapter error.
 *
 * Every failure that leaves an adapter is an `AdapterError`. Driver and
 * transport errors are never rethrown as-is; they are attached as `cause`.
 */
export class AdapterError extends Error {
  public readonly code: AdapterErrorCode;
  public readonly errorKey: string;
  public readonly httpStatus: number;
  public readonly action: AdapterErrorAction;
  public readonly timestamp: number;

  constructor(code: AdapterErrorCode, message?: string, options?: { cause?: unknown }) {
    super(message || ADAPTER_ERROR_KEYS[code], options);
    this.name = 'AdapterError';
    this.code = code;
    this.errorKey = ADAPTER_ERROR_KEYS[code];
    this.httpStatus = ADAPTER_ERROR_STATUS[code];
    this.action = ADAPTER_ERROR_ACTIONS[code];
    this.timestamp = Math.floor(Date.now() / 1000);
  }

  toJSON() {
    return {
      error: this.errorKey,
      error_code: this.code,
      message: this.message,
      action: this.action,
      timestamp: this.timestamp,
    };
  }
}

/**
 * Configuration did not have the expected shape or type.
 */
export class ConfigurationError extends AdapterError {
  public readonly expected: string;
  public readonly received: string;

  constructor(expected: string, received: string, message?: string) {
    super(
      ADAPTER_ERRORS.INVALID_CONFIGURATION,
      message ?? ADAPTER_ERROR_MESSAGE_HELPERS.typeMismatch(expected, received)
    );
    this.name = 'ConfigurationError';
    this.expected = expected;
    this.received = received;
  }
}

/**
 * Requested resource does not exist.
 */
export class NotFoundError extends AdapterError {
  public readonly resourceType: string;

  constructor(resourceType: string, options?: { cause?: unknown }) {
    super(ADAPTER_ERRORS.NOT_FOUND, ADAPTER_ERROR_MESSAGE_HELPERS.notFound(resourceType), options);
    this.name = 'NotFoundError';
    this.resourceType = resourceType;
  }
}

/**
 * Missing or rejected credentials.
 */
export class UnauthenticatedError extends AdapterError {
  constructor(message?: string, options?: { cause?: unknown }) {
    super(ADAPTER_ERRORS.UNAUTHENTICATED, message, options);
    this.name = 'UnauthenticatedError';
  }
}

/**
 * Token is malformed, expired or its signature does not match.
 */
export class InvalidTokenError extends AdapterError {
  constructor(message?: string, options?: { cause?: unknown }) {
    super(ADAPTER_ERRORS.INVALID_TOKEN, message, options);
    this.name = 'InvalidTokenError';
  }
}

/**
 * Authenticated principal lacks a role or permission.
 */
export class PermissionDeniedError extends AdapterError {
  constructor(message?: string, options?: { cause?: unknown }) {
    super(ADAPTER_ERRORS.PERMISSION_DENIED, message ?? ADAPTER_ERROR_MESSAGES.PERMISSION_DENIED, options);
    this.name = 'PermissionDeniedError';
  }
}

/**
 * Upstream service could not be reached or refused to issue a credential.
 */
export class UnavailableError extends AdapterError {
  public readonly service: string;

  constructor(service: string, options?: { cause?: unknown }) {
    super(ADAPTER_ERRORS.UNAVAILABLE, ADAPTER_ERROR_MESSAGE_HELPERS.unavailable(service), options);
    this.name = 'UnavailableError';
    this.service = service;
  }
}

/**
 * Unexpected upstream failure.
 */
export class InternalError extends AdapterError {
  constructor(message?: string, options?: { cause?: unknown }) {
    super(ADAPTER_ERRORS.INTERNAL, message, options);
    this.name = 'InternalError';
  }
}
