import { z } from 'zod';
import { defineTool, runStatement, WarehouseIdSchema } from './types.js';

const ExecuteSqlInputSchema = z.object({
  sql: z.string().trim().min(1).describe('SQL statement to run on the warehouse'),
  warehouse_id: WarehouseIdSchema
});

export const executeSqlQueryTool = defineTool({
  description:
    'Execute a SQL statement on a Databricks SQL warehouse and return the result as a text table. ' +
    'Data-modifying statements are blocked by the server.',
  inputSchema: ExecuteSqlInputSchema.strict(),

  async execute(args, context) {
    return runStatement(args.sql, context, args.warehouse_id);
  }
});
