import type { AxiosAdapter } from 'axios';
import {
  OAuthClientCredentialsProvider,
  PersonalAccessTokenProvider,
  type CredentialsProvider
} from './auth/credentials-provider.js';
import { UnityCatalogClient } from './clients/catalog-client.js';
import { createDatabricksAxios, DatabricksHttpClient } from './clients/databricks-http.js';
import { HttpStatementApi } from './clients/statement-api.js';
import { StatementExecutionClient, type Sleeper } from './clients/statement-client.js';
import { DatabricksWorkspaceClient } from './clients/workspace-client.js';
import type { ServerConfig } from './config/server-config.js';
import type { ServerDependencies } from './server.js';
import { StatementGuard } from './validators/statement-guard.js';

export interface WiringOverrides {
  adapter?: AxiosAdapter;
  sleep?: Sleeper;
}

/**
 * Builds the clients one server instance shares across tool calls.
 */
export function createDependencies(config: ServerConfig, overrides: WiringOverrides = {}): ServerDependencies {
  const http = createDatabricksAxios({
    host: config.host,
    timeoutMs: config.httpTimeoutMs,
    adapter: overrides.adapter
  });

  const credentials: CredentialsProvider = config.auth.type === 'oauth-m2m'
    ? new OAuthClientCredentialsProvider({
        http,
        clientId: config.auth.clientId,
        clientSecret: config.auth.clientSecret
      })
    : new PersonalAccessTokenProvider(config.auth.token);

  const databricks = new DatabricksHttpClient(http, credentials);

  const statements = new StatementExecutionClient({
    api: new HttpStatementApi(databricks),
    defaultWarehouseId: config.warehouseId,
    pollIntervalMs: config.pollIntervalMs,
    maxPollAttempts: config.maxPollAttempts,
    guard: new StatementGuard({ mode: config.guard.mode, denylist: config.guard.denylist }),
    sleep: overrides.sleep
  });

  return {
    statements,
    catalog: new UnityCatalogClient(databricks),
    workspace: new DatabricksWorkspaceClient(databricks)
  };
}
