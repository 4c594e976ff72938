/**
 * API Request Cases
 *
 * HTTP collaborator interface, the fetch-backed implementation and the
 * api_request case executor.
 *
 * @module packages/core/tester/api
 */

import { ErrorCodes, ExecutionError } from '../errors.js';
import { assertHeaderValue, assertJsonValue } from './assertions.js';
import type { ApiRequestCase } from './schemas.js';
import type { AssertionReport } from './types.js';

// ============================================================================
// HTTP Collaborator
// ============================================================================

export interface HttpRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  /** JSON-serialized when present */
  body?: unknown;
  timeoutMs: number;
}

export interface HttpResponse {
  status: number;
  /** Lower-cased header names */
  headers: Record<string, string>;
  bodyText: string;
}

export interface HttpClient {
  request(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * HttpClient over global fetch with an abort-based timeout
 */
export class FetchHttpClient implements HttpClient {
  async request(request: HttpRequest): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);

    const headers: Record<string, string> = { ...request.headers };
    let body: string | undefined;
    if (request.body !== undefined) {
      body = JSON.stringify(request.body);
      if (!Object.keys(headers).some((key) => key.toLowerCase() === 'content-type')) {
        headers['content-type'] = 'application/json';
      }
    }

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers,
        body,
        signal: controller.signal,
      });
      const responseHeaders: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        responseHeaders[key.toLowerCase()] = value;
      });
      return {
        status: response.status,
        headers: responseHeaders,
        bodyText: await response.text(),
      };
    } catch (error) {
      const reason = controller.signal.aborted ? `timed out after ${request.timeoutMs}ms` : 'failed';
      throw new ExecutionError(`Request to ${request.url} ${reason}`, {
        code: ErrorCodes.EXEC_REQUEST_FAILED,
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }
  }
}

// ============================================================================
// Case Execution
// ============================================================================

export interface ApiCaseResult {
  status: number;
  assertions: AssertionReport[];
}

/**
 * Join a base URL and a case path with exactly one `/` between them
 *
 * @throws ExecutionError for an empty path
 */
export function joinUrl(baseUrl: string, rawPath: string): string {
  const path = rawPath.trim();
  if (path === '') {
    throw new ExecutionError('api_request case path cannot be empty', {
      code: ErrorCodes.EXEC_CASE_FAILED,
    });
  }
  const base = baseUrl.replace(/\/+$/, '');
  return `${base}${path.startsWith('/') ? '' : '/'}${path}`;
}

function parseJsonBody(text: string): { ok: true; value: unknown } | { ok: false } {
  if (text.trim() === '') {
    return { ok: false };
  }
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Issue the request and evaluate status, header and body assertions
 *
 * @throws ExecutionError when the request fails, or body assertions are
 *   requested against an empty or non-JSON body
 */
export async function executeApiCase(
  http: HttpClient,
  baseUrl: string,
  testCase: ApiRequestCase,
  actorHeaders: Record<string, string>,
  defaultTimeoutMs: number
): Promise<ApiCaseResult> {
  const url = joinUrl(baseUrl, testCase.path);

  // Case headers win over actor headers, whatever the casing.
  const headers: Record<string, string> = {};
  for (const [key, value] of [...Object.entries(actorHeaders), ...Object.entries(testCase.headers)]) {
    headers[key.toLowerCase()] = value;
  }

  const response = await http.request({
    method: testCase.method.toUpperCase(),
    url,
    headers,
    body: testCase.body,
    timeoutMs: testCase.timeoutMs ?? defaultTimeoutMs,
  });

  const assertions: AssertionReport[] = [
    {
      name: 'status',
      passed: response.status === testCase.expectedStatus,
      message: `expected status ${testCase.expectedStatus}, got ${response.status}`,
    },
  ];

  testCase.headerAssertions.forEach((assertion, i) => {
    assertions.push(assertHeaderValue(response.headers, assertion, i));
  });

  if (testCase.bodyAssertions.length > 0) {
    const body = parseJsonBody(response.bodyText);
    if (!body.ok) {
      throw new ExecutionError('body assertions requested but response body is not valid JSON', {
        code: ErrorCodes.EXEC_CASE_FAILED,
      });
    }
    testCase.bodyAssertions.forEach((assertion, i) => {
      assertions.push(assertJsonValue(body.value, assertion, i));
    });
  }

  return { status: response.status, assertions };
}
