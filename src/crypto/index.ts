/**
 * gatehouse - Crypto Utilities
 * Native Node.js crypto helpers for verifying identity-provider tokens
 */

import * as crypto from 'crypto';
import { JwtAlgorithm } from '../types';

// ============================================================================
// CONSTANTS
// ============================================================================

const ALGORITHM_CONFIG: Record<JwtAlgorithm, {
  type: 'rsa' | 'ec' | 'rsa-pss';
  hash: string;
  curve?: string;
  padding?: number;
  saltLength?: number;
  signatureSize?: number;
}> = {
  RS256: { type: 'rsa', hash: 'sha256', padding: crypto.constants.RSA_PKCS1_PADDING },
  RS384: { type: 'rsa', hash: 'sha384', padding: crypto.constants.RSA_PKCS1_PADDING },
  RS512: { type: 'rsa', hash: 'sha512', padding: crypto.constants.RSA_PKCS1_PADDING },
  ES256: { type: 'ec', hash: 'sha256', curve: 'prime256v1', signatureSize: 32 },
  ES384: { type: 'ec', hash: 'sha384', curve: 'secp384r1', signatureSize: 48 },
  ES512: { type: 'ec', hash: 'sha512', curve: 'secp521r1', signatureSize: 66 },
  PS256: { type: 'rsa-pss', hash: 'sha256', padding: crypto.constants.RSA_PKCS1_PSS_PADDING, saltLength: 32 },
  PS384: { type: 'rsa-pss', hash: 'sha384', padding: crypto.constants.RSA_PKCS1_PSS_PADDING, saltLength: 48 },
  PS512: { type: 'rsa-pss', hash: 'sha512', padding: crypto.constants.RSA_PKCS1_PSS_PADDING, saltLength: 64 },
};

/**
 * PEM-encoded key pair. Only tests and tooling hold private keys; the
 * adapters verify with public keys exclusively.
 */
export interface SigningKeyPair {
  kid: string;
  algorithm: JwtAlgorithm;
  publicKey: string;
  privateKey: string;
}

// ============================================================================
// BASE64URL UTILITIES
// ============================================================================

/**
 * Encode buffer to base64url
 */
export function base64urlEncode(data: Buffer | string): string {
  const buffer = typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
  return buffer
    .toString('base64')
    .replace(/\+/g, '-')
    .replace(/\//g, '_')
    .replace(/=/g, '');
}

/**
 * Decode base64url to buffer
 */
export function base64urlDecode(str: string): Buffer {
  // Add padding if needed
  let padded = str.replace(/-/g, '+').replace(/_/g, '/');
  const padding = padded.length % 4;
  if (padding === 2) {
    padded += '==';
  } else if (padding === 3) {
    padded += '=';
  }
  return Buffer.from(padded, 'base64');
}

/**
 * Encode object to base64url JSON
 */
export function encodeJSON(obj: unknown): string {
  return base64urlEncode(JSON.stringify(obj));
}

/**
 * Decode base64url JSON. The result is untyped; callers validate it.
 */
export function decodeJSON(str: string): unknown {
  return JSON.parse(base64urlDecode(str).toString('utf8'));
}

// ============================================================================
// KEY HANDLING
// ============================================================================

/**
 * Wrap the bare base64 SPKI key published on the realm endpoint in PEM armour.
 * Keys that are already PEM pass through unchanged.
 */
export function publicKeyToPem(key: string): string {
  const trimmed = key.trim();
  if (trimmed.startsWith('-----BEGIN')) {
    return trimmed;
  }
  const body = trimmed.replace(/\s+/g, '').match(/.{1,64}/g) ?? [];
  return `-----BEGIN PUBLIC KEY-----\n${body.join('\n')}\n-----END PUBLIC KEY-----`;
}

/**
 * Strip PEM armour, returning the base64 body the realm endpoint publishes.
 */
export function pemToPublicKey(pem: string): string {
  return pem
    .replace(/-----BEGIN PUBLIC KEY-----/, '')
    .replace(/-----END PUBLIC KEY-----/, '')
    .replace(/\s+/g, '');
}

/**
 * Generate a key pair for the given algorithm
 */
export async function generateKeyPair(
  kid: string,
  algorithm: JwtAlgorithm = JwtAlgorithm.RS256
): Promise<SigningKeyPair> {
  const config = ALGORITHM_CONFIG[algorithm];

  return new Promise((resolve, reject) => {
    const done = (err: Error | null, publicKey: string, privateKey: string) => {
      if (err) {
        reject(err);
      } else {
        resolve({ kid, algorithm, publicKey, privateKey });
      }
    };

    if (config.type === 'ec' && config.curve) {
      crypto.generateKeyPair(
        'ec',
        {
          namedCurve: config.curve,
          publicKeyEncoding: { type: 'spki', format: 'pem' },
          privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
        },
        done
      );
    } else {
      crypto.generateKeyPair(
        'rsa',
        {
          modulusLength: 2048,
          publicKeyEncoding: { type: 'spki', format: 'pem' },
          privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
        },
        done
      );
    }
  });
}

// ============================================================================
// SIGNING
// ============================================================================

/**
 * Sign data with private key
 */
export function sign(
  data: string | Buffer,
  privateKey: string,
  algorithm: JwtAlgorithm
): Buffer {
  const config = ALGORITHM_CONFIG[algorithm];

  const signer = crypto.createSign(config.hash);
  signer.update(data);
  signer.end();

  if (config.type === 'rsa-pss') {
    return signer.sign({
      key: privateKey,
      padding: config.padding,
      saltLength: config.saltLength,
    });
  } else if (config.type === 'rsa') {
    return signer.sign({
      key: privateKey,
      padding: config.padding,
    });
  } else {
    // EC signature needs to be converted from DER to R||S format
    const derSignature = signer.sign(privateKey);
    return derToRS(derSignature, signatureSize(algorithm));
  }
}

/**
 * Verify signature with public key
 */
export function verify(
  data: string | Buffer,
  signature: Buffer,
  publicKey: string,
  algorithm: JwtAlgorithm
): boolean {
  const config = ALGORITHM_CONFIG[algorithm];

  const verifier = crypto.createVerify(config.hash);
  verifier.update(data);
  verifier.end();

  try {
    if (config.type === 'rsa-pss') {
      return verifier.verify(
        {
          key: publicKey,
          padding: config.padding,
          saltLength: config.saltLength,
        },
        signature
      );
    } else if (config.type === 'rsa') {
      return verifier.verify(
        {
          key: publicKey,
          padding: config.padding,
        },
        signature
      );
    } else {
      // EC signature needs to be converted from R||S to DER format
      const derSignature = rsToDer(signature, signatureSize(algorithm));
      return verifier.verify(publicKey, derSignature);
    }
  } catch {
    // wrong key type or truncated signature
    return false;
  }
}

// ============================================================================
// EC SIGNATURE FORMAT CONVERSION
// ============================================================================

function signatureSize(algorithm: JwtAlgorithm): number {
  const size = ALGORITHM_CONFIG[algorithm].signatureSize;
  if (!size) {
    throw new Error(`Not an EC algorithm: ${algorithm}`);
  }
  return size;
}

/**
 * Convert DER-encoded signature to R||S format (for JWT)
 */
function derToRS(derSignature: Buffer, size: number): Buffer {
  let offset = 0;
  if (derSignature[offset++] !== 0x30) {
    throw new Error('Invalid DER signature');
  }

  // Skip length byte(s)
  const length = derSignature[offset++];
  if (length & 0x80) {
    offset += length & 0x7f;
  }

  if (derSignature[offset++] !== 0x02) {
    throw new Error('Invalid DER signature: expected INTEGER for R');
  }
  const rLen = derSignature[offset++];
  const rStart = offset;
  offset += rLen;

  if (derSignature[offset++] !== 0x02) {
    throw new Error('Invalid DER signature: expected INTEGER for S');
  }
  const sLen = derSignature[offset++];
  const sStart = offset;

  let r = derSignature.subarray(rStart, rStart + rLen);
  let s = derSignature.subarray(sStart, sStart + sLen);

  while (r.length > size && r[0] === 0) {
    r = r.subarray(1);
  }
  while (s.length > size && s[0] === 0) {
    s = s.subarray(1);
  }

  const result = Buffer.alloc(size * 2);
  r.copy(result, size - r.length);
  s.copy(result, size * 2 - s.length);

  return result;
}

/**
 * Convert R||S format to DER-encoded signature
 */
function rsToDer(rsSignature: Buffer, size: number): Buffer {
  if (rsSignature.length !== size * 2) {
    throw new Error('Invalid EC signature length');
  }

  let r = rsSignature.subarray(0, size);
  let s = rsSignature.subarray(size);

  while (r.length > 1 && r[0] === 0 && !(r[1] & 0x80)) {
    r = r.subarray(1);
  }
  while (s.length > 1 && s[0] === 0 && !(s[1] & 0x80)) {
    s = s.subarray(1);
  }

  // Leading zero keeps the INTEGER positive
  if (r[0] & 0x80) {
    r = Buffer.concat([Buffer.from([0]), r]);
  }
  if (s[0] & 0x80) {
    s = Buffer.concat([Buffer.from([0]), s]);
  }

  const contentLen = 2 + r.length + 2 + s.length;
  const lengthBytes = contentLen > 127 ? 2 : 1;
  const der = Buffer.alloc(1 + lengthBytes + contentLen);
  let offset = 0;

  der[offset++] = 0x30; // SEQUENCE
  if (contentLen > 127) {
    der[offset++] = 0x81;
  }
  der[offset++] = contentLen;
  der[offset++] = 0x02; // INTEGER
  der[offset++] = r.length;
  r.copy(der, offset);
  offset += r.length;
  der[offset++] = 0x02; // INTEGER
  der[offset++] = s.length;
  s.copy(der, offset);

  return der;
}

// ============================================================================
// HASH UTILITIES
// ============================================================================

/**
 * Create SHA-256 hash as hex string
 */
export function sha256Hex(data: string | Buffer): string {
  return crypto.createHash('sha256').update(data).digest('hex');
}
