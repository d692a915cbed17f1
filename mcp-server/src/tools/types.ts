import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { CatalogApi } from '../clients/catalog-client.js';
import type { StatementExecutionClient } from '../clients/statement-client.js';
import type { WorkspaceApi } from '../clients/workspace-client.js';
import { WarehouseError } from '../errors/warehouse-errors.js';
import { formatOutcome } from '../formatters/result-formatter.js';
import { renderCatalogError } from '../renderers/catalog-markdown.js';
import { splitQualifiedName } from '../utils/sql-identifiers.js';

export interface ToolContext {
  statements: StatementExecutionClient;
  catalog: CatalogApi;
  workspace: WorkspaceApi;
  signal?: AbortSignal;
}

export interface ToolOutput {
  text: string;
  isError: boolean;
}

export interface WarehouseTool {
  description: string;
  inputSchema: z.ZodTypeAny;
  run(args: unknown, context: ToolContext): Promise<ToolOutput>;
}

interface ToolDefinition<S extends z.ZodTypeAny> {
  description: string;
  inputSchema: S;
  execute(args: z.infer<S>, context: ToolContext): Promise<ToolOutput>;
}

export function defineTool<S extends z.ZodTypeAny>(definition: ToolDefinition<S>): WarehouseTool {
  return {
    description: definition.description,
    inputSchema: definition.inputSchema,

    async run(args, context) {
      const parsed = definition.inputSchema.safeParse(args ?? {});
      if (!parsed.success) {
        const detail = parsed.error.issues
          .map(issue => `${issue.path.join('.') || 'arguments'}: ${issue.message}`)
          .join('; ');
        throw new McpError(ErrorCode.InvalidParams, `Invalid arguments: ${detail}`);
      }
      return definition.execute(parsed.data, context);
    }
  };
}

/**
 * Runs one statement and renders its outcome as tool output.
 */
export async function runStatement(sql: string, context: ToolContext, warehouseId?: string): Promise<ToolOutput> {
  const outcome = await context.statements.execute(sql, { warehouseId, signal: context.signal });
  return { text: formatOutcome(outcome), isError: !outcome.ok };
}

/**
 * Renders a failed catalog lookup as tool output. Anything that is not a
 * domain error propagates to the server.
 */
export function catalogFailure(
  error: unknown,
  title: string,
  subject: string | undefined,
  problem: string
): ToolOutput {
  if (error instanceof WarehouseError) {
    return { text: renderCatalogError(title, subject, problem, error), isError: true };
  }
  throw error;
}

export const WarehouseIdSchema = z
  .string()
  .min(1)
  .optional()
  .describe('SQL warehouse id; defaults to the configured warehouse');

export function qualifiedName(description: string, minParts: number, maxParts: number) {
  return z
    .string()
    .min(1)
    .refine(
      value => {
        const parts = splitQualifiedName(value).length;
        return parts >= minParts && parts <= maxParts;
      },
      {
        message: minParts === maxParts
          ? `must have ${minParts} name part(s)`
          : `must have ${minParts} to ${maxParts} dot-separated name parts`
      }
    )
    .describe(description);
}
