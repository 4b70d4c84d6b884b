/**
 * @fileoverview Access token decoding and verification
 * @description Decodes realm-issued JWTs, verifies them against the realm
 * public key, and reads the role claims they carry.
 */

export { decodeJwt, verifyJwt, createJwt, getTimeUntilExpiration, collectRoles } from './jwt';
export type { VerifyJwtOptions, CreateJwtOptions } from './jwt';
