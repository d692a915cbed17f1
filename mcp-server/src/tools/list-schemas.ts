import { z } from 'zod';
import { quoteQualifiedName } from '../utils/sql-identifiers.js';
import { defineTool, qualifiedName, runStatement, WarehouseIdSchema } from './types.js';

const ListSchemasInputSchema = z.object({
  catalog: qualifiedName('Catalog whose schemas are listed', 1, 1),
  warehouse_id: WarehouseIdSchema
});

export const listSchemasTool = defineTool({
  description: 'List the schemas in a Databricks catalog',
  inputSchema: ListSchemasInputSchema.strict(),

  async execute(args, context) {
    return runStatement(`SHOW SCHEMAS IN ${quoteQualifiedName(args.catalog)}`, context, args.warehouse_id);
  }
});
