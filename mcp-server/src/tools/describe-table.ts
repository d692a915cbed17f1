import { z } from 'zod';
import { quoteQualifiedName } from '../utils/sql-identifiers.js';
import { defineTool, qualifiedName, runStatement, WarehouseIdSchema } from './types.js';

const DescribeTableInputSchema = z.object({
  table_name: qualifiedName('Table to describe, as schema.table or catalog.schema.table', 1, 3),
  warehouse_id: WarehouseIdSchema
});

export const describeTableTool = defineTool({
  description: 'Describe the columns of a Databricks table',
  inputSchema: DescribeTableInputSchema.strict(),

  async execute(args, context) {
    return runStatement(`DESCRIBE TABLE ${quoteQualifiedName(args.table_name)}`, context, args.warehouse_id);
  }
});
