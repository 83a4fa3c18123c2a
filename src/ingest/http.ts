/**
 * HTTP helpers shared by the embedding providers and the network sinks.
 *
 * Every call carries its own timeout. Failures are mapped onto the error
 * taxonomy here so adapters only deal with successful bodies:
 * - network error, timeout, 408, 429, 5xx  → TransientIOError
 * - any other non-2xx from a sink          → SinkRejectedError
 * - any other non-2xx from a provider      → TransientIOError
 */

import { request, type Dispatcher } from 'undici';
import type { ZodType, ZodTypeDef } from 'zod';
import { SinkRejectedError, TransientIOError, toError } from '../errors/index.js';

/** Timeout for sink calls that have no timeout of their own */
export const DEFAULT_SINK_TIMEOUT_MS = 30_000;

/** Longest response excerpt carried in an error message */
const MAX_BODY_EXCERPT = 300;

export interface HttpRequestOptions {
  method: Dispatcher.HttpMethod;
  body?: string;
  headers?: Record<string, string>;
  timeoutMs: number;
  /** Custom dispatcher (tests pass a MockAgent) */
  dispatcher?: Dispatcher;
}

export interface HttpResponse {
  status: number;
  body: string;
}

/**
 * How non-2xx answers are classified.
 * - `sink`:      only 408/429/5xx are transient
 * - `embedding`: every failure is transient
 */
export type StatusPolicy = 'sink' | 'embedding';

/**
 * Join a base URL and a path without doubling slashes.
 */
export function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

function excerpt(body: string): string {
  const trimmed = body.trim();
  return trimmed.length > MAX_BODY_EXCERPT ? `${trimmed.slice(0, MAX_BODY_EXCERPT)}...` : trimmed;
}

export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Send a request and read the whole body. Never returns on a network failure.
 *
 * @throws TransientIOError on connection errors and timeouts
 */
export async function sendRequest(
  service: string,
  url: string,
  options: HttpRequestOptions
): Promise<HttpResponse> {
  try {
    const response = await request(url, {
      method: options.method,
      body: options.body,
      headers: options.headers,
      dispatcher: options.dispatcher,
      signal: AbortSignal.timeout(options.timeoutMs),
    });
    const body = await response.body.text();
    return { status: response.statusCode, body };
  } catch (thrown) {
    const cause = toError(thrown);
    const reason =
      cause.name === 'TimeoutError' || cause.name === 'AbortError'
        ? `timed out after ${options.timeoutMs}ms`
        : cause.message;
    throw new TransientIOError(`${service} request to ${url} failed: ${reason}`, { cause });
  }
}

/**
 * Throw the mapped error for a non-2xx response.
 */
export function assertOk(service: string, response: HttpResponse, policy: StatusPolicy): void {
  const { status, body } = response;
  if (status >= 200 && status < 300) {
    return;
  }
  if (policy === 'embedding' || isTransientStatus(status)) {
    throw new TransientIOError(
      `${service} answered with status ${status}${body.trim() ? `: ${excerpt(body)}` : ''}`,
      { status }
    );
  }
  throw new SinkRejectedError(service, status, excerpt(body));
}

/**
 * Send a request and require a 2xx answer.
 */
export async function requestOk(
  service: string,
  url: string,
  options: HttpRequestOptions,
  policy: StatusPolicy = 'sink'
): Promise<HttpResponse> {
  const response = await sendRequest(service, url, options);
  assertOk(service, response, policy);
  return response;
}

/**
 * Parse a JSON body against a schema. A body that is not JSON or does not
 * match is treated as a transient failure of the service.
 */
export function parseJsonBody<T>(
  service: string,
  body: string,
  schema: ZodType<T, ZodTypeDef, unknown>
): T {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch (thrown) {
    throw new TransientIOError(`${service} returned a body that is not JSON`, {
      cause: toError(thrown),
    });
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new TransientIOError(`${service} returned a malformed response (${issues.join('; ')})`);
  }
  return parsed.data;
}
