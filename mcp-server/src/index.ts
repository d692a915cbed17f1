#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Command } from 'commander';
import * as dotenv from 'dotenv';
import { createDependencies } from './bootstrap.js';
import { loadServerConfig } from './config/server-config.js';
import { formatOutcome } from './formatters/result-formatter.js';
import { createServer, SERVER_NAME, SERVER_VERSION } from './server.js';

interface CommonOptions {
  envFile?: string;
}

interface QueryOptions extends CommonOptions {
  warehouse?: string;
}

function loadEnvironment(options: CommonOptions): void {
  const result = dotenv.config(options.envFile ? { path: options.envFile } : {});
  if (options.envFile && result.error) {
    throw result.error;
  }
}

async function serve(options: CommonOptions): Promise<void> {
  loadEnvironment(options);
  const config = await loadServerConfig();
  const server = createServer(createDependencies(config));

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(
    `MCP Server started on stdio (host ${config.host}, warehouse ${config.warehouseId ?? 'not set'}, auth ${config.auth.type})`
  );

  process.on('SIGINT', () => {
    server.close().then(
      () => process.exit(0),
      error => {
        console.error('Server shutdown error:', error);
        process.exit(1);
      }
    );
  });
}

async function query(sql: string, options: QueryOptions): Promise<void> {
  loadEnvironment(options);
  const config = await loadServerConfig();
  const { statements } = createDependencies(config);

  const outcome = await statements.execute(sql, { warehouseId: options.warehouse });
  console.log(formatOutcome(outcome));
  if (!outcome.ok) {
    process.exitCode = 1;
  }
}

const program = new Command()
  .name('databricks-sql-mcp')
  .description('MCP server exposing Databricks SQL warehouses and Unity Catalog metadata')
  .version(SERVER_VERSION);

program
  .command('serve', { isDefault: true })
  .description(`Start ${SERVER_NAME} on stdio`)
  .option('--env-file <path>', 'load environment variables from this file')
  .action(serve);

program
  .command('query')
  .description('Run one SQL statement and print the formatted result')
  .argument('<sql>', 'statement to execute')
  .option('--warehouse <id>', 'SQL warehouse id; defaults to DATABRICKS_SQL_WAREHOUSE_ID')
  .option('--env-file <path>', 'load environment variables from this file')
  .action(query);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error('Server error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
