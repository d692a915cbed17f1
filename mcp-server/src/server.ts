import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError
} from '@modelcontextprotocol/sdk/types.js';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { CatalogApi } from './clients/catalog-client.js';
import type { StatementExecutionClient } from './clients/statement-client.js';
import type { WorkspaceApi } from './clients/workspace-client.js';
import { tools as defaultTools } from './tools/index.js';
import type { WarehouseTool } from './tools/types.js';

export const SERVER_NAME = 'databricks-sql-mcp-server';
export const SERVER_VERSION = '1.0.0';

export interface ServerDependencies {
  statements: StatementExecutionClient;
  catalog: CatalogApi;
  workspace: WorkspaceApi;
  tools?: Readonly<Record<string, WarehouseTool>>;
}

export function createServer(dependencies: ServerDependencies): Server {
  const tools: Readonly<Record<string, WarehouseTool>> = dependencies.tools ?? defaultTools;

  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION
    },
    {
      capabilities: {
        tools: {}
      }
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: Object.entries(tools).map(([name, tool]) => ({
        name,
        description: tool.description,
        inputSchema: { ...zodToJsonSchema(tool.inputSchema), type: 'object' as const }
      }))
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args } = request.params;

    const tool = Object.hasOwn(tools, name) ? tools[name] : undefined;
    if (!tool) {
      throw new McpError(ErrorCode.MethodNotFound, `Tool ${name} not found`);
    }

    try {
      const output = await tool.run(args, {
        statements: dependencies.statements,
        catalog: dependencies.catalog,
        workspace: dependencies.workspace,
        signal: extra.signal
      });

      return {
        content: [
          {
            type: 'text' as const,
            text: output.text
          }
        ],
        isError: output.isError
      };
    } catch (error) {
      if (error instanceof McpError) {
        throw error;
      }

      console.error(`Tool ${name} error:`, error);
      throw new McpError(
        ErrorCode.InternalError,
        `Tool execution failed: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }
  });

  return server;
}
