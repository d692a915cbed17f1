import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '../errors/warehouse-errors.js';
import { DEFAULT_DENYLIST, type StatementGuardMode } from '../validators/statement-guard.js';
import { readDatabricksProfile, type ProfileReader } from './databrickscfg.js';

export type AuthConfig =
  | { type: 'pat'; token: string }
  | { type: 'oauth-m2m'; clientId: string; clientSecret: string };

export interface ServerConfig {
  host: string;
  auth: AuthConfig;
  warehouseId?: string;
  profile: string;
  pollIntervalMs: number;
  maxPollAttempts: number;
  httpTimeoutMs: number;
  guard: {
    mode: StatementGuardMode;
    denylist: readonly string[];
  };
}

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const AuthTypeSchema = z.enum(['pat', 'oauth', 'oauth-m2m']);

type AuthType = z.infer<typeof AuthTypeSchema>;

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());

const EnvSchema = z.object({
  DATABRICKS_HOST: optionalString,
  DATABRICKS_TOKEN: optionalString,
  DATABRICKS_CLIENT_ID: optionalString,
  DATABRICKS_CLIENT_SECRET: optionalString,
  // Other SDK auth types (databricks-cli, azure-cli, ...) fall back to inference.
  DATABRICKS_AUTH_TYPE: z.preprocess(knownAuthType, AuthTypeSchema.optional()),
  DATABRICKS_SQL_WAREHOUSE_ID: optionalString,
  DATABRICKS_CONFIG_PROFILE: z.preprocess(blankToUndefined, z.string().default('DEFAULT')),
  DATABRICKS_CONFIG_FILE: optionalString,
  DATABRICKS_POLL_INTERVAL_SECONDS: z.preprocess(blankToUndefined, z.coerce.number().positive().default(10)),
  DATABRICKS_MAX_POLL_ATTEMPTS: z.preprocess(blankToUndefined, z.coerce.number().int().nonnegative().default(60)),
  DATABRICKS_HTTP_TIMEOUT_SECONDS: z.preprocess(blankToUndefined, z.coerce.number().positive().default(30)),
  DATABRICKS_STATEMENT_GUARD: z.preprocess(
    value => (typeof blankToUndefined(value) === 'string' ? String(value).trim().toLowerCase() : undefined),
    z.enum(['leading', 'anywhere', 'off']).default('leading')
  ),
  DATABRICKS_STATEMENT_DENYLIST: optionalString
});

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  readProfile?: ProfileReader;
}

/**
 * Resolves connection settings from the environment first, then from the
 * selected `.databrickscfg` profile.
 */
export async function loadServerConfig(options: LoadConfigOptions = {}): Promise<ServerConfig> {
  const parsedEnv = EnvSchema.safeParse(options.env ?? process.env);
  if (!parsedEnv.success) {
    const issue = parsedEnv.error.issues[0];
    throw new ConfigurationError(
      `Invalid environment: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown problem'}`
    );
  }
  const env = parsedEnv.data;

  const profileName = env.DATABRICKS_CONFIG_PROFILE;
  const profilePath = env.DATABRICKS_CONFIG_FILE ?? join(homedir(), '.databrickscfg');
  const profile = await (options.readProfile ?? readDatabricksProfile)(profilePath, profileName);

  const host = env.DATABRICKS_HOST ?? profile.host;
  if (!host) {
    throw new ConfigurationError(
      `No Databricks host configured. Set DATABRICKS_HOST or add host to profile [${profileName}] in ${profilePath}.`
    );
  }

  const auth = resolveAuth({
    token: env.DATABRICKS_TOKEN ?? profile.token,
    clientId: env.DATABRICKS_CLIENT_ID ?? profile.client_id,
    clientSecret: env.DATABRICKS_CLIENT_SECRET ?? profile.client_secret,
    authType: env.DATABRICKS_AUTH_TYPE ?? knownAuthType(profile.auth_type)
  });

  return {
    host: normalizeHost(host),
    auth,
    warehouseId: env.DATABRICKS_SQL_WAREHOUSE_ID ?? (profile.warehouse_id || undefined),
    profile: profileName,
    pollIntervalMs: env.DATABRICKS_POLL_INTERVAL_SECONDS * 1000,
    maxPollAttempts: env.DATABRICKS_MAX_POLL_ATTEMPTS,
    httpTimeoutMs: env.DATABRICKS_HTTP_TIMEOUT_SECONDS * 1000,
    guard: {
      mode: env.DATABRICKS_STATEMENT_GUARD,
      denylist: env.DATABRICKS_STATEMENT_DENYLIST
        ? parseDenylist(env.DATABRICKS_STATEMENT_DENYLIST)
        : DEFAULT_DENYLIST
    }
  };
}

interface AuthInputs {
  token?: string;
  clientId?: string;
  clientSecret?: string;
  authType?: AuthType;
}

function resolveAuth(inputs: AuthInputs): AuthConfig {
  const { token, clientId, clientSecret, authType } = inputs;
  const wantsOAuth = authType === 'oauth' || authType === 'oauth-m2m';

  if (wantsOAuth || (authType === undefined && !token && clientId && clientSecret)) {
    if (!clientId || !clientSecret) {
      throw new ConfigurationError(
        'OAuth authentication needs DATABRICKS_CLIENT_ID and DATABRICKS_CLIENT_SECRET (or client_id and client_secret in the profile).'
      );
    }
    return { type: 'oauth-m2m', clientId, clientSecret };
  }

  if (!token) {
    throw new ConfigurationError(
      'No Databricks credentials configured. Set DATABRICKS_TOKEN, or DATABRICKS_CLIENT_ID and DATABRICKS_CLIENT_SECRET.'
    );
  }
  return { type: 'pat', token };
}

function knownAuthType(value: unknown): AuthType | undefined {
  const parsed = AuthTypeSchema.safeParse(typeof value === 'string' ? value.trim().toLowerCase() : value);
  return parsed.success ? parsed.data : undefined;
}

export function normalizeHost(host: string): string {
  const trimmed = host.trim().replace(/\/+$/, '');
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

export function parseDenylist(value: string): string[] {
  return value
    .split(',')
    .map(keyword => keyword.trim().toUpperCase())
    .filter(keyword => keyword.length > 0);
}
