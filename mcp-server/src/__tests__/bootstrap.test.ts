import { describe, expect, it } from 'vitest';
import { createDependencies } from '../bootstrap.js';
import { createFakeAdapter, recordingSleeper, type RecordedRequest } from '../clients/__tests__/fakes.js';
import type { ServerConfig } from '../config/server-config.js';
import { formatOutcome } from '../formatters/result-formatter.js';

const BASE_CONFIG: ServerConfig = {
  host: 'https://example.cloud.databricks.com',
  auth: { type: 'pat', token: 'test-token' },
  warehouseId: 'wh-1',
  profile: 'DEFAULT',
  pollIntervalMs: 500,
  maxPollAttempts: 2,
  httpTimeoutMs: 1000,
  guard: { mode: 'leading', denylist: ['DROP'] }
};

function warehouse(request: RecordedRequest) {
  if (request.url === '/oidc/v1/token') {
    return { status: 200, data: { access_token: 'oauth-token', expires_in: 3600 } };
  }
  if (request.method === 'POST') {
    return { status: 200, data: { statement_id: 'stmt-7', status: { state: 'PENDING' } } };
  }
  return {
    status: 200,
    data: {
      statement_id: 'stmt-7',
      status: { state: 'SUCCEEDED' },
      manifest: { schema: { columns: [{ name: 'answer', type_text: 'INT' }] } },
      result: { chunk_index: 0, data_array: [['42']] }
    }
  };
}

describe('createDependencies', () => {
  it('wires a statement client that talks to the workspace with the configured token', async () => {
    const { adapter, requests } = createFakeAdapter(warehouse);
    const { sleep, waits } = recordingSleeper();
    const { statements } = createDependencies(BASE_CONFIG, { adapter, sleep });

    const outcome = await statements.execute('SELECT 42 AS answer');

    expect(formatOutcome(outcome)).toBe('answer\n------\n42\n\nTotal rows: 1');
    expect(waits).toEqual([500]);
    expect(requests.map(request => `${request.method} ${request.url} ${String(request.authorization)}`)).toEqual([
      'POST /api/2.0/sql/statements Bearer test-token',
      'GET /api/2.0/sql/statements/stmt-7 Bearer test-token'
    ]);
  });

  it('fetches an OAuth token before the first API call', async () => {
    const { adapter, requests } = createFakeAdapter(warehouse);
    const { sleep } = recordingSleeper();
    const { statements } = createDependencies(
      { ...BASE_CONFIG, auth: { type: 'oauth-m2m', clientId: 'client-id', clientSecret: 'test-secret' } },
      { adapter, sleep }
    );

    await statements.execute('SELECT 42 AS answer');

    expect(requests.map(request => request.url)).toEqual([
      '/oidc/v1/token',
      '/api/2.0/sql/statements',
      '/api/2.0/sql/statements/stmt-7'
    ]);
    expect(requests[1]?.authorization).toBe('Bearer oauth-token');
  });

  it('applies the configured statement guard', async () => {
    const { adapter, requests } = createFakeAdapter(warehouse);
    const { statements } = createDependencies(BASE_CONFIG, { adapter });

    const outcome = await statements.execute('DROP TABLE t');

    expect(formatOutcome(outcome)).toBe("Error: Blocked: 'DROP' statements are not allowed.");
    expect(requests).toEqual([]);
  });
});
