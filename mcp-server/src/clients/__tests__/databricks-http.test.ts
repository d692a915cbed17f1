import { AxiosError } from 'axios';
import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { PersonalAccessTokenProvider, type CredentialsProvider } from '../../auth/credentials-provider.js';
import { TransportError } from '../../errors/warehouse-errors.js';
import { createDatabricksAxios, DatabricksHttpClient, toTransportError } from '../databricks-http.js';
import { HttpStatementApi } from '../statement-api.js';
import { createFakeAdapter, type FakeReply, type RecordedRequest } from './fakes.js';

const HOST = 'https://example.cloud.databricks.com';

function connect(responder: (request: RecordedRequest) => FakeReply, credentials?: CredentialsProvider) {
  const { adapter, requests } = createFakeAdapter(responder);
  const http = new DatabricksHttpClient(
    createDatabricksAxios({ host: HOST, timeoutMs: 1000, adapter }),
    credentials ?? new PersonalAccessTokenProvider('test-token')
  );
  return { http, api: new HttpStatementApi(http), requests };
}

describe('HttpStatementApi', () => {
  it('submits statements for asynchronous inline JSON execution', async () => {
    const { api, requests } = connect(() => ({
      status: 200,
      data: { statement_id: 'abc', status: { state: 'PENDING' } }
    }));

    const response = await api.submitStatement({ statement: 'SELECT 1', warehouseId: 'wh-1' });

    expect(response).toEqual({ statement_id: 'abc', status: { state: 'PENDING' } });
    expect(requests).toHaveLength(1);
    expect(requests[0]).toMatchObject({
      method: 'POST',
      url: '/api/2.0/sql/statements',
      authorization: 'Bearer test-token'
    });
    expect(JSON.parse(String(requests[0]?.data))).toEqual({
      statement: 'SELECT 1',
      warehouse_id: 'wh-1',
      wait_timeout: '0s',
      disposition: 'INLINE',
      format: 'JSON_ARRAY'
    });
  });

  it('polls and fetches chunks by statement id', async () => {
    const { api, requests } = connect(request =>
      request.url.includes('/result/chunks/')
        ? { status: 200, data: { chunk_index: 2, data_array: [['x']] } }
        : { status: 200, data: { statement_id: 'a/b', status: { state: 'RUNNING' } } }
    );

    await api.getStatement('a/b');
    const chunk = await api.getResultChunk('a/b', 2);

    expect(requests.map(request => `${request.method} ${request.url}`)).toEqual([
      'GET /api/2.0/sql/statements/a%2Fb',
      'GET /api/2.0/sql/statements/a%2Fb/result/chunks/2'
    ]);
    expect(chunk).toEqual({ chunk_index: 2, data_array: [['x']] });
  });
});

describe('DatabricksHttpClient', () => {
  it('turns an error response into a TransportError with the service message', async () => {
    const { api } = connect(() => ({
      status: 404,
      statusText: 'Not Found',
      data: { error_code: 'NOT_FOUND', message: 'Statement abc not found' }
    }));

    const error = await api.getStatement('abc').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      message: 'GET /api/2.0/sql/statements/abc failed with HTTP 404: Statement abc not found',
      httpStatus: 404,
      upstream: { errorCode: 'NOT_FOUND', message: 'Statement abc not found' }
    });
  });

  it('falls back to the status text when the body carries no error', async () => {
    const { api } = connect(() => ({ status: 500, statusText: 'Internal Server Error', data: '' }));

    await expect(api.getStatement('abc')).rejects.toThrow(
      'GET /api/2.0/sql/statements/abc failed with HTTP 500: Internal Server Error'
    );
  });

  it('reports network failures', async () => {
    const { api } = connect(() => {
      throw new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED');
    });

    await expect(api.getStatement('abc')).rejects.toThrow(
      'GET /api/2.0/sql/statements/abc failed: connect ECONNREFUSED'
    );
  });

  it('rejects bodies that do not match the expected shape', async () => {
    const { api } = connect(() => ({ status: 200, data: { status: { state: 'RUNNING' } } }));

    const error = await api.getStatement('abc').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      message: 'Malformed response from GET /api/2.0/sql/statements/abc: statement_id: Required',
      httpStatus: 200
    });
  });

  it('passes query parameters through', async () => {
    const { http, requests } = connect(() => ({ status: 200, data: { ok: true } }));

    await http.get('/api/2.1/unity-catalog/schemas', z.object({ ok: z.boolean() }), {
      params: { catalog_name: 'main' }
    });

    expect(requests[0]?.params).toEqual({ catalog_name: 'main' });
  });

  it('does not send a request when credentials fail', async () => {
    const failure = new TransportError('POST /oidc/v1/token failed with HTTP 401: Unauthorized', { httpStatus: 401 });
    const credentials: CredentialsProvider = {
      type: 'oauth-m2m',
      getAuthorizationHeader: () => Promise.reject(failure)
    };
    const { api, requests } = connect(() => ({ status: 200, data: {} }), credentials);

    await expect(api.getStatement('abc')).rejects.toBe(failure);
    expect(requests).toEqual([]);
  });
});

describe('toTransportError', () => {
  it('wraps arbitrary errors with the request target', () => {
    const error = toTransportError(new Error('boom'), 'GET /x');

    expect(error.message).toBe('GET /x failed: boom');
    expect(error.cause).toBeInstanceOf(Error);
  });

  it('leaves transport errors alone', () => {
    const original = new TransportError('already wrapped');
    expect(toTransportError(original, 'GET /x')).toBe(original);
  });
});
