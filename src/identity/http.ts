/**
 * gatehouse - HTTP Transport
 *
 * The identity clients speak to the provider through `HttpTransport`. The
 * production implementation wraps undici's `fetch` with an `Agent` so the TLS
 * verification flag and the request timeout from `IdentityConfig` apply to
 * every call. Tests substitute an in-process fake.
 */

import { Agent, fetch } from 'undici';
import type { Logger } from '../logging/logger';

// ============================================================================
// TYPES
// ============================================================================

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  /** Appended to the URL; `undefined` values are skipped. */
  query?: Record<string, string | number | boolean | undefined>;
  headers?: Record<string, string>;
  /** Sent as `application/x-www-form-urlencoded`. */
  form?: Record<string, string>;
  /** Sent as `application/json`. */
  json?: unknown;
}

export interface HttpResponse {
  status: number;
  /** Header names in lower case. */
  headers: Record<string, string>;
  /** Parsed JSON, raw text for other content types, `null` when empty. */
  body: unknown;
}

/**
 * Sends one request. Resolves only for 2xx responses.
 *
 * @throws {HttpStatusError} the provider answered with a non-2xx status
 * @throws {HttpUnreachableError} the request could not be completed
 */
export interface HttpTransport {
  request(request: HttpRequest): Promise<HttpResponse>;
  close?(): Promise<void>;
}

// ============================================================================
// ERRORS
// ============================================================================

export class HttpStatusError extends Error {
  public readonly status: number;
  public readonly url: string;
  public readonly body: unknown;

  constructor(status: number, url: string, body: unknown) {
    super(`HTTP ${status} from ${url}`);
    this.name = 'HttpStatusError';
    this.status = status;
    this.url = url;
    this.body = body;
  }
}

export class HttpUnreachableError extends Error {
  public readonly url: string;

  constructor(url: string, options?: { cause?: unknown }) {
    super(`Request to ${url} did not complete`, options);
    this.name = 'HttpUnreachableError';
    this.url = url;
  }
}

export function isHttpStatus(error: unknown, status: number): boolean {
  return error instanceof HttpStatusError && error.status === status;
}

// ============================================================================
// HELPERS
// ============================================================================

export function buildUrl(base: string, query?: HttpRequest['query']): URL {
  const url = new URL(base);
  for (const [key, value] of Object.entries(query ?? {})) {
    if (value !== undefined) {
      url.searchParams.set(key, String(value));
    }
  }
  return url;
}

function parseBody(text: string, contentType: string | undefined): unknown {
  if (text.length === 0) {
    return null;
  }
  if (contentType?.includes('json')) {
    try {
      return JSON.parse(text);
    } catch {
      return text;
    }
  }
  return text;
}

// ============================================================================
// FETCH TRANSPORT
// ============================================================================

export interface FetchTransportOptions {
  /** Per-request timeout (default: 10). */
  timeoutSeconds?: number;
  /** Verify the server certificate (default: true). */
  verifySsl?: boolean;
  logger?: Logger;
}

export class FetchTransport implements HttpTransport {
  private readonly dispatcher: Agent;
  private readonly timeoutMs: number;
  private readonly logger?: Logger;

  constructor(options: FetchTransportOptions = {}) {
    this.timeoutMs = (options.timeoutSeconds ?? 10) * 1000;
    this.dispatcher = new Agent({
      connect: { rejectUnauthorized: options.verifySsl ?? true },
    });
    this.logger = options.logger;
  }

  async request(request: HttpRequest): Promise<HttpResponse> {
    const url = buildUrl(request.url, request.query);
    const target = `${url.origin}${url.pathname}`;
    const headers: Record<string, string> = { accept: 'application/json', ...request.headers };

    let body: string | undefined;
    if (request.form) {
      body = new URLSearchParams(request.form).toString();
      headers['content-type'] = 'application/x-www-form-urlencoded';
    } else if (request.json !== undefined) {
      body = JSON.stringify(request.json);
      headers['content-type'] = 'application/json';
    }

    let status: number;
    let responseHeaders: Record<string, string>;
    let text: string;
    try {
      const response = await fetch(url, {
        method: request.method,
        headers,
        body,
        dispatcher: this.dispatcher,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      status = response.status;
      responseHeaders = {};
      response.headers.forEach((value, name) => {
        responseHeaders[name.toLowerCase()] = value;
      });
      text = await response.text();
    } catch (error) {
      this.logger?.debug({ err: error, method: request.method, url: target }, 'identity request failed');
      throw new HttpUnreachableError(target, { cause: error });
    }

    const parsed = parseBody(text, responseHeaders['content-type']);
    this.logger?.trace({ method: request.method, url: target, status }, 'identity request');

    if (status < 200 || status >= 300) {
      throw new HttpStatusError(status, target, parsed);
    }
    return { status, headers: responseHeaders, body: parsed };
  }

  async close(): Promise<void> {
    await this.dispatcher.close();
  }
}
