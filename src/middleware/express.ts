/**
 * gatehouse - Express Middleware
 *
 * Guards Express routes with the identity port:
 * - `requireAuthentication` verifies the bearer token and attaches its claims
 * - `requireRoles` checks realm and client roles of the caller
 * - `requirePermission` asks the provider's authorization service
 *
 * Failures are answered with `AdapterError.toJSON()` and the error's HTTP
 * status, unless an `onError` handler is supplied.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { IdentityPort } from '../identity/port';
import {
  AdapterError,
  ADAPTER_ERROR_MESSAGES,
  ADAPTER_ERROR_MESSAGE_HELPERS,
  InternalError,
  PermissionDeniedError,
  TokenClaims,
  UnauthenticatedError,
} from '../types';
import { BEARER_PREFIX } from './constants';

declare global {
  namespace Express {
    interface Request {
      /**
       * Verified caller, set by `requireAuthentication`.
       */
      identity?: {
        /** Raw access token, reused by the role and permission checks. */
        token: string;
        claims: TokenClaims;
      };
    }
  }
}

export type AdapterErrorHandler = (error: AdapterError, req: Request, res: Response, next: NextFunction) => void;

interface GuardOptions {
  identity: IdentityPort;
  /** Defaults to answering with the error's status and JSON body. */
  onError?: AdapterErrorHandler;
}

export interface AuthenticationOptions extends GuardOptions {
  /** Defaults to the `Authorization: Bearer` header. */
  extractToken?: (req: Request) => string | null;
}

export interface RoleOptions extends GuardOptions {
  /** Caller must hold at least one of these roles. */
  any?: string[];
  /** Caller must hold every one of these roles. */
  all?: string[];
}

export interface PermissionOptions extends GuardOptions {
  resource: string;
  scope: string;
}

function defaultExtractToken(req: Request): string | null {
  const header = req.headers.authorization;
  if (!header || !header.startsWith(BEARER_PREFIX)) {
    return null;
  }
  const token = header.substring(BEARER_PREFIX.length).trim();
  return token.length > 0 ? token : null;
}

function defaultOnError(error: AdapterError, _req: Request, res: Response): void {
  res.status(error.httpStatus).json(error.toJSON());
}

function toAdapterError(error: unknown): AdapterError {
  return error instanceof AdapterError ? error : new InternalError(undefined, { cause: error });
}

/**
 * Rejects requests without a valid access token.
 *
 * @example
 * ```typescript
 * app.use('/api', requireAuthentication({ identity }));
 * ```
 */
export function requireAuthentication(options: AuthenticationOptions): RequestHandler {
  const { identity, extractToken = defaultExtractToken, onError = defaultOnError } = options;

  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const token = extractToken(req);
    if (!token) {
      onError(new UnauthenticatedError(ADAPTER_ERROR_MESSAGES.NO_TOKEN_PROVIDED), req, res, next);
      return;
    }

    try {
      const claims = await identity.getTokenInfo(token);
      req.identity = { token, claims };
    } catch (error) {
      onError(toAdapterError(error), req, res, next);
      return;
    }
    next();
  };
}

/**
 * Requires roles of an authenticated caller. `all` is evaluated before `any`.
 *
 * @example
 * ```typescript
 * app.delete('/api/users/:id',
 *   requireAuthentication({ identity }),
 *   requireRoles({ identity, any: ['admin', 'user-manager'] }),
 *   handler
 * );
 * ```
 */
export function requireRoles(options: RoleOptions): RequestHandler {
  const { identity, any, all, onError = defaultOnError } = options;

  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    if (!req.identity) {
      onError(new UnauthenticatedError(ADAPTER_ERROR_MESSAGES.NO_TOKEN_PROVIDED), req, res, next);
      return;
    }
    const { token } = req.identity;

    try {
      if (all && all.length > 0 && !(await identity.hasAllRoles(token, all))) {
        onError(new PermissionDeniedError(ADAPTER_ERROR_MESSAGE_HELPERS.missingRequiredRoles(all)), req, res, next);
        return;
      }
      if (any && any.length > 0 && !(await identity.hasAnyOfRoles(token, any))) {
        onError(new PermissionDeniedError(ADAPTER_ERROR_MESSAGE_HELPERS.requiresOneOf(any)), req, res, next);
        return;
      }
    } catch (error) {
      onError(toAdapterError(error), req, res, next);
      return;
    }
    next();
  };
}

/**
 * Requires the provider to grant `scope` on `resource` to the caller.
 */
export function requirePermission(options: PermissionOptions): RequestHandler {
  const { identity, resource, scope, onError = defaultOnError } = options;

  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    if (!req.identity) {
      onError(new UnauthenticatedError(ADAPTER_ERROR_MESSAGES.NO_TOKEN_PROVIDED), req, res, next);
      return;
    }

    try {
      if (!(await identity.checkPermissions(req.identity.token, resource, scope))) {
        onError(new PermissionDeniedError(), req, res, next);
        return;
      }
    } catch (error) {
      onError(toAdapterError(error), req, res, next);
      return;
    }
    next();
  };
}
