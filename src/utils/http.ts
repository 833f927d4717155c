/**
 * HTTP Requests with Typed Failures
 *
 * Single-attempt GET requests that never throw: every outcome is an
 * HttpResult carrying either the body or a failure reason.
 * - Hard per-request timeout, no retries
 * - Failure classification by error shape (status, code, message)
 * - Fixed pacing between requests
 */

import axios from 'axios';
import { logVerbose } from './logger.js';

// ============================================
// Types
// ============================================

/**
 * Why a request produced no usable body
 */
export type HttpFailureReason = 'timeout' | 'http_status' | 'network' | 'parse';

/**
 * Result of a single request
 */
export type HttpResult<T> =
  | { success: true; data: T; status: number }
  | { success: false; reason: HttpFailureReason; message: string; status?: number };

/**
 * Options for a single GET request
 */
export interface HttpGetOptions {
  /** Query parameters, undefined values are omitted */
  params?: Record<string, string | number | undefined>;

  /** Hard timeout in milliseconds */
  timeoutMs: number;

  headers?: Record<string, string>;
}

/**
 * Browser-like User-Agent; some publishers refuse unknown clients
 */
export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

// ============================================
// Error Detection
// ============================================

/**
 * Read the HTTP status of a failed response, if the error carries one
 */
export function getErrorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }

  if ('response' in error) {
    const response = error.response;
    if (
      typeof response === 'object' &&
      response !== null &&
      'status' in response &&
      typeof response.status === 'number'
    ) {
      return response.status;
    }
  }

  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }

  return undefined;
}

/**
 * Check if an error is a client-side timeout
 */
export function isTimeoutError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) {
    return false;
  }

  // axios reports its own timeout as ECONNABORTED (ETIMEDOUT with clarifyTimeoutError)
  if ('code' in error && (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT')) {
    return true;
  }

  return error instanceof Error && /timeout|timed out/i.test(error.message);
}

/**
 * Classify a thrown request error into a failure result
 */
export function classifyRequestError(error: unknown): {
  reason: HttpFailureReason;
  message: string;
  status?: number;
} {
  const message = error instanceof Error ? error.message : String(error);

  const status = getErrorStatus(error);
  if (status !== undefined) {
    return { reason: 'http_status', message: `HTTP ${status}`, status };
  }

  if (isTimeoutError(error)) {
    return { reason: 'timeout', message };
  }

  return { reason: 'network', message };
}

// ============================================
// Requests
// ============================================

function compactParams(
  params: HttpGetOptions['params']
): Record<string, string | number> | undefined {
  if (params === undefined) {
    return undefined;
  }

  const compact: Record<string, string | number> = {};
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      compact[key] = value;
    }
  }
  return compact;
}

async function request(
  url: string,
  options: HttpGetOptions,
  responseType: 'json' | 'text'
): Promise<HttpResult<unknown>> {
  try {
    const response = await axios.get<unknown>(url, {
      params: compactParams(options.params),
      timeout: options.timeoutMs,
      headers: options.headers,
      responseType,
    });
    return { success: true, data: response.data, status: response.status };
  } catch (error) {
    const failure = classifyRequestError(error);
    logVerbose(`GET ${url} failed (${failure.reason}): ${failure.message}`);
    return { success: false, ...failure };
  }
}

/**
 * GET a JSON document. The body is returned unvalidated.
 *
 * @param url - Endpoint URL
 * @param options - Query, timeout and headers
 * @returns Parsed body or a typed failure
 */
export async function httpGetJson(
  url: string,
  options: HttpGetOptions
): Promise<HttpResult<unknown>> {
  return request(url, options, 'json');
}

/**
 * GET a document as text.
 * A body that is not a string (e.g. already parsed) is a parse failure.
 *
 * @param url - Document URL
 * @param options - Query, timeout and headers
 */
export async function httpGetText(
  url: string,
  options: HttpGetOptions
): Promise<HttpResult<string>> {
  const result = await request(url, options, 'text');
  if (!result.success) {
    return result;
  }

  if (typeof result.data !== 'string') {
    return {
      success: false,
      reason: 'parse',
      message: `Expected a text body, got ${typeof result.data}`,
      status: result.status,
    };
  }
  return { success: true, data: result.data, status: result.status };
}

// ============================================
// Pacing
// ============================================

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => setTimeout(resolve, ms));
}
