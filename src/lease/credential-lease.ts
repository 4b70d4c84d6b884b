/**
 * gatehouse - Credential Lease Manager
 *
 * Holds the short-lived administrative access token obtained with the
 * client-credentials grant and renews it lazily. The lease is treated as
 * expired `marginSeconds` before the provider says it is, so renewal always
 * happens ahead of the real expiry.
 *
 * Concurrent callers racing past an expired lease may both renew; the last
 * renewal to finish wins. A renewal that finishes after `reset()` hands its
 * token to its caller but is not stored.
 */

import type { Logger } from '../logging/logger';
import type { TokenResponse } from '../identity/schemas';
import { ADAPTER_ERROR_MESSAGES, UnauthenticatedError, UnavailableError } from '../types';

// ============================================================================
// TYPES
// ============================================================================

/**
 * - `uninitialized`: no lease has been issued yet
 * - `active`: a lease is held and has not reached its renewal time
 * - `expiring`: a lease is held but the next `acquire()` will renew it
 * - `failed`: the last issuance attempt failed and the lease was dropped
 */
export type LeaseState = 'uninitialized' | 'active' | 'expiring' | 'failed';

export interface CredentialLease {
  /** Opaque bearer credential. */
  token: string;
  /** Epoch milliseconds. */
  issuedAt: number;
  /** Epoch milliseconds; the lease is renewed at or after this instant. */
  expiresAt: number;
}

/**
 * Performs the client-credentials grant.
 */
export type CredentialIssuer = () => Promise<TokenResponse>;

export interface CredentialLeaseOptions {
  issuer: CredentialIssuer;
  /** False when no client secret is configured; `acquire()` then refuses. */
  secretConfigured: boolean;
  /** Seconds subtracted from the reported lifetime (default: 30). */
  marginSeconds?: number;
  /** Called after `reset()` drops the lease. */
  onReset?: () => void;
  logger?: Logger;
}

/** Lifetime assumed when the provider omits `expires_in`. */
export const DEFAULT_REPORTED_TTL_SECONDS = 60;

export const DEFAULT_LEASE_MARGIN_SECONDS = 30;

// ============================================================================
// MANAGER
// ============================================================================

export class CredentialLeaseManager {
  private lease: CredentialLease | null = null;
  private failed = false;
  // Bumped by reset(); a renewal started under an older generation is discarded.
  private generation = 0;
  private readonly issuer: CredentialIssuer;
  private readonly secretConfigured: boolean;
  private readonly marginSeconds: number;
  private readonly onReset?: () => void;
  private readonly logger?: Logger;

  constructor(options: CredentialLeaseOptions) {
    this.issuer = options.issuer;
    this.secretConfigured = options.secretConfigured;
    this.marginSeconds = options.marginSeconds ?? DEFAULT_LEASE_MARGIN_SECONDS;
    this.onReset = options.onReset;
    this.logger = options.logger;
  }

  get state(): LeaseState {
    if (this.lease) {
      return Date.now() >= this.lease.expiresAt ? 'expiring' : 'active';
    }
    return this.failed ? 'failed' : 'uninitialized';
  }

  /** Snapshot of the current lease, if any. */
  get current(): Readonly<CredentialLease> | null {
    return this.lease ? { ...this.lease } : null;
  }

  /**
   * Returns a valid credential, renewing first when none is held or the held
   * one has reached its renewal time.
   *
   * @throws {UnauthenticatedError} no client secret is configured
   * @throws {UnavailableError} the provider did not issue a credential
   */
  async acquire(): Promise<string> {
    if (!this.secretConfigured) {
      throw new UnauthenticatedError(ADAPTER_ERROR_MESSAGES.ADMIN_SECRET_NOT_CONFIGURED);
    }

    const lease = this.lease;
    if (lease && Date.now() < lease.expiresAt) {
      return lease.token;
    }

    return this.renew();
  }

  /**
   * Drops the lease unconditionally. The next `acquire()` issues a new one.
   */
  reset(): void {
    this.generation++;
    this.lease = null;
    this.failed = false;
    this.logger?.debug('admin credential lease reset');
    this.onReset?.();
  }

  private async renew(): Promise<string> {
    const generation = this.generation;
    let response: TokenResponse;
    try {
      response = await this.issuer();
    } catch (error) {
      if (generation === this.generation) {
        this.lease = null;
        this.failed = true;
      }
      this.logger?.warn({ err: error }, 'admin credential issuance failed');
      throw new UnavailableError('identity provider', { cause: error });
    }

    if (generation !== this.generation) {
      this.logger?.debug('admin credential issued before a reset; not stored');
      return response.access_token;
    }

    const issuedAt = Date.now();
    const ttlSeconds = response.expires_in ?? DEFAULT_REPORTED_TTL_SECONDS;
    this.lease = {
      token: response.access_token,
      issuedAt,
      expiresAt: issuedAt + (ttlSeconds - this.marginSeconds) * 1000,
    };
    this.failed = false;

    this.logger?.debug({ ttlSeconds, marginSeconds: this.marginSeconds }, 'admin credential renewed');
    return response.access_token;
  }
}
