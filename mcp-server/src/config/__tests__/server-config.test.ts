import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../../errors/warehouse-errors.js';
import { DEFAULT_DENYLIST } from '../../validators/statement-guard.js';
import type { DatabricksProfile } from '../databrickscfg.js';
import { loadServerConfig, normalizeHost, parseDenylist } from '../server-config.js';

const CONFIG_FILE = '/tmp/test.databrickscfg';

function load(env: Record<string, string>, profile: DatabricksProfile = {}) {
  const reads: [string, string][] = [];
  const config = loadServerConfig({
    env: { DATABRICKS_CONFIG_FILE: CONFIG_FILE, ...env },
    readProfile: async (path, name) => {
      reads.push([path, name]);
      return profile;
    }
  });
  return { config, reads };
}

describe('loadServerConfig', () => {
  it('reads everything from the environment with defaults for the rest', async () => {
    const { config, reads } = load({
      DATABRICKS_HOST: 'adb-123.azuredatabricks.net/',
      DATABRICKS_TOKEN: 'test-token',
      DATABRICKS_SQL_WAREHOUSE_ID: 'wh-1'
    });

    await expect(config).resolves.toEqual({
      host: 'https://adb-123.azuredatabricks.net',
      auth: { type: 'pat', token: 'test-token' },
      warehouseId: 'wh-1',
      profile: 'DEFAULT',
      pollIntervalMs: 10_000,
      maxPollAttempts: 60,
      httpTimeoutMs: 30_000,
      guard: { mode: 'leading', denylist: DEFAULT_DENYLIST }
    });
    expect(reads).toEqual([[CONFIG_FILE, 'DEFAULT']]);
  });

  it('falls back to the selected profile', async () => {
    const { config, reads } = load(
      { DATABRICKS_CONFIG_PROFILE: 'dev' },
      { host: 'https://dev.example.com', token: 'profile-token', warehouse_id: 'wh-dev' }
    );

    await expect(config).resolves.toMatchObject({
      host: 'https://dev.example.com',
      auth: { type: 'pat', token: 'profile-token' },
      warehouseId: 'wh-dev',
      profile: 'dev'
    });
    expect(reads).toEqual([[CONFIG_FILE, 'dev']]);
  });

  it('lets the environment override the profile and ignores blank values', async () => {
    const { config } = load(
      { DATABRICKS_HOST: 'https://env.example.com', DATABRICKS_TOKEN: '  ', DATABRICKS_SQL_WAREHOUSE_ID: 'wh-env' },
      { host: 'https://profile.example.com', token: 'profile-token', warehouse_id: 'wh-profile' }
    );

    await expect(config).resolves.toMatchObject({
      host: 'https://env.example.com',
      auth: { type: 'pat', token: 'profile-token' },
      warehouseId: 'wh-env'
    });
  });

  it('selects OAuth when only client credentials are present', async () => {
    const { config } = load({
      DATABRICKS_HOST: 'https://example.cloud.databricks.com',
      DATABRICKS_CLIENT_ID: 'client-id',
      DATABRICKS_CLIENT_SECRET: 'test-secret'
    });

    await expect(config).resolves.toMatchObject({
      auth: { type: 'oauth-m2m', clientId: 'client-id', clientSecret: 'test-secret' }
    });
  });

  it('honours an explicit auth type from the profile', async () => {
    const { config } = load(
      { DATABRICKS_HOST: 'https://example.cloud.databricks.com' },
      { token: 'profile-token', client_id: 'client-id', client_secret: 'test-secret', auth_type: 'oauth-m2m' }
    );

    await expect(config).resolves.toMatchObject({ auth: { type: 'oauth-m2m', clientId: 'client-id' } });
  });

  it('accepts oauth as the profile auth type', async () => {
    const { config } = load(
      { DATABRICKS_HOST: 'https://example.cloud.databricks.com' },
      { token: 'profile-token', client_id: 'client-id', client_secret: 'test-secret', auth_type: 'oauth' }
    );

    await expect(config).resolves.toMatchObject({ auth: { type: 'oauth-m2m', clientId: 'client-id' } });
  });

  it('infers the auth type when the environment names one it does not handle', async () => {
    const { config } = load({
      DATABRICKS_HOST: 'https://example.cloud.databricks.com',
      DATABRICKS_AUTH_TYPE: 'databricks-cli',
      DATABRICKS_TOKEN: 'test-token'
    });

    await expect(config).resolves.toMatchObject({ auth: { type: 'pat', token: 'test-token' } });
  });

  it('requires both client credentials for OAuth', async () => {
    const { config } = load({
      DATABRICKS_HOST: 'https://example.cloud.databricks.com',
      DATABRICKS_AUTH_TYPE: 'OAuth-M2M',
      DATABRICKS_CLIENT_ID: 'client-id'
    });

    await expect(config).rejects.toThrow(
      'OAuth authentication needs DATABRICKS_CLIENT_ID and DATABRICKS_CLIENT_SECRET (or client_id and client_secret in the profile).'
    );
  });

  it('requires a host', async () => {
    const { config } = load({ DATABRICKS_TOKEN: 'test-token' });

    await expect(config).rejects.toBeInstanceOf(ConfigurationError);
    await expect(config).rejects.toThrow(
      `No Databricks host configured. Set DATABRICKS_HOST or add host to profile [DEFAULT] in ${CONFIG_FILE}.`
    );
  });

  it('requires credentials', async () => {
    const { config } = load({ DATABRICKS_HOST: 'https://example.cloud.databricks.com' });

    await expect(config).rejects.toThrow(
      'No Databricks credentials configured. Set DATABRICKS_TOKEN, or DATABRICKS_CLIENT_ID and DATABRICKS_CLIENT_SECRET.'
    );
  });

  it('parses polling, timeout and guard settings', async () => {
    const { config } = load({
      DATABRICKS_HOST: 'https://example.cloud.databricks.com',
      DATABRICKS_TOKEN: 'test-token',
      DATABRICKS_POLL_INTERVAL_SECONDS: '2',
      DATABRICKS_MAX_POLL_ATTEMPTS: '5',
      DATABRICKS_HTTP_TIMEOUT_SECONDS: '15',
      DATABRICKS_STATEMENT_GUARD: 'ANYWHERE',
      DATABRICKS_STATEMENT_DENYLIST: 'drop, delete,,'
    });

    await expect(config).resolves.toMatchObject({
      pollIntervalMs: 2000,
      maxPollAttempts: 5,
      httpTimeoutMs: 15_000,
      guard: { mode: 'anywhere', denylist: ['DROP', 'DELETE'] }
    });
  });

  it('rejects malformed numeric settings', async () => {
    const { config } = load({
      DATABRICKS_HOST: 'https://example.cloud.databricks.com',
      DATABRICKS_TOKEN: 'test-token',
      DATABRICKS_MAX_POLL_ATTEMPTS: 'many'
    });

    await expect(config).rejects.toThrow(/^Invalid environment: DATABRICKS_MAX_POLL_ATTEMPTS /);
  });
});

describe('normalizeHost', () => {
  it.each([
    ['example.cloud.databricks.com', 'https://example.cloud.databricks.com'],
    ['https://example.cloud.databricks.com///', 'https://example.cloud.databricks.com'],
    ['  http://localhost:8080 ', 'http://localhost:8080']
  ])('normalizes %j', (input, expected) => {
    expect(normalizeHost(input)).toBe(expected);
  });
});

describe('parseDenylist', () => {
  it('upper-cases entries and drops empty ones', () => {
    expect(parseDenylist(' drop ,Delete,, vacuum')).toEqual(['DROP', 'DELETE', 'VACUUM']);
  });
});
