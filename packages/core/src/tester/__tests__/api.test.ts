/**
 * API Request Case Tests
 *
 * @module packages/core/tester/__tests__/api.test
 */

import { describe, it, expect } from 'vitest';

import { ExecutionError } from '../../errors.js';
import { executeApiCase, joinUrl, type HttpClient, type HttpRequest, type HttpResponse } from '../api.js';
import { ApiRequestCaseSchema } from '../schemas.js';

class RecordingHttpClient implements HttpClient {
  readonly requests: HttpRequest[] = [];

  constructor(private readonly response: HttpResponse) {}

  async request(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);
    return this.response;
  }
}

describe('joinUrl', () => {
  it('puts exactly one slash between base and path', () => {
    expect(joinUrl('http://localhost:8000', 'api/app/hello')).toBe('http://localhost:8000/api/app/hello');
    expect(joinUrl('http://localhost:8000//', '/health')).toBe('http://localhost:8000/health');
  });

  it('rejects an empty path', () => {
    expect(() => joinUrl('http://localhost:8000', '  ')).toThrow(ExecutionError);
  });
});

describe('executeApiCase', () => {
  it('merges headers with case headers winning and checks the status', async () => {
    const http = new RecordingHttpClient({ status: 201, headers: {}, bodyText: '' });
    const testCase = ApiRequestCaseSchema.parse({
      name: 'create',
      kind: 'api_request',
      method: 'post',
      path: '/items',
      expectedStatus: 201,
      headers: { 'x-env': 'case' },
      body: { name: 'widget' },
    });

    const result = await executeApiCase(
      http,
      'http://localhost:8000',
      testCase,
      { Authorization: 'Bearer test-token', 'X-Env': 'actor' },
      5000
    );

    expect(http.requests).toEqual([
      {
        method: 'POST',
        url: 'http://localhost:8000/items',
        headers: { authorization: 'Bearer test-token', 'x-env': 'case' },
        body: { name: 'widget' },
        timeoutMs: 5000,
      },
    ]);
    expect(result.assertions).toEqual([
      { name: 'status', passed: true, message: 'expected status 201, got 201' },
    ]);
  });

  it('evaluates header and body assertions', async () => {
    const http = new RecordingHttpClient({
      status: 200,
      headers: { 'content-type': 'application/json' },
      bodyText: '{"items":[{"id":7}]}',
    });
    const testCase = ApiRequestCaseSchema.parse({
      name: 'list',
      kind: 'api_request',
      path: '/items',
      expectedStatus: 404,
      timeoutMs: 250,
      headerAssertions: [{ name: 'Content-Type', contains: 'json' }],
      bodyAssertions: [{ path: 'items.0.id', equals: 7 }],
    });

    const result = await executeApiCase(http, 'http://localhost:8000', testCase, {}, 5000);

    expect(http.requests[0]?.timeoutMs).toBe(250);
    expect(result.status).toBe(200);
    expect(result.assertions.map((a) => [a.name, a.passed])).toEqual([
      ['status', false],
      ['header_assertion_1', true],
      ['json_assertion_1', true],
    ]);
  });

  it('fails when body assertions meet a non-JSON body', async () => {
    const http = new RecordingHttpClient({ status: 200, headers: {}, bodyText: 'ok' });
    const testCase = ApiRequestCaseSchema.parse({
      name: 'text',
      kind: 'api_request',
      path: '/health',
      expectedStatus: 200,
      bodyAssertions: [{ path: 'status' }],
    });

    await expect(executeApiCase(http, 'http://localhost:8000', testCase, {}, 5000)).rejects.toThrow(
      'body assertions requested but response body is not valid JSON'
    );
  });
});
