import { z } from 'zod';
import { quoteQualifiedName } from '../utils/sql-identifiers.js';
import { defineTool, qualifiedName, runStatement, WarehouseIdSchema } from './types.js';

const ListTablesInputSchema = z.object({
  schema: qualifiedName('Schema to list, as schema or catalog.schema', 1, 2),
  warehouse_id: WarehouseIdSchema
});

export const listTablesTool = defineTool({
  description: 'List the tables in a Databricks schema',
  inputSchema: ListTablesInputSchema.strict(),

  async execute(args, context) {
    return runStatement(`SHOW TABLES IN ${quoteQualifiedName(args.schema)}`, context, args.warehouse_id);
  }
});
