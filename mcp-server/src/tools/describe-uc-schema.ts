import { z } from 'zod';
import { renderSchemaDetails } from '../renderers/catalog-markdown.js';
import { catalogFailure, defineTool } from './types.js';

const DescribeSchemaInputSchema = z.object({
  catalog_name: z.string().trim().min(1).describe('Catalog that holds the schema'),
  schema_name: z.string().trim().min(1).describe('Schema name within the catalog'),
  include_columns: z.boolean().default(false).describe('Include column details for every table')
});

export const describeUcSchemaTool = defineTool({
  description: 'Describe a Unity Catalog schema and the tables it contains, optionally with their columns',
  inputSchema: DescribeSchemaInputSchema.strict(),

  async execute(args, context) {
    const fullName = `${args.catalog_name}.${args.schema_name}`;
    try {
      const schema = await context.catalog.getSchema(fullName, context.signal);
      const tables = await context.catalog.listTables(args.catalog_name, args.schema_name, context.signal);
      return { text: renderSchemaDetails(schema, fullName, tables, args.include_columns), isError: false };
    } catch (error) {
      return catalogFailure(
        error,
        'Could not describe schema',
        `Schema: \`${fullName}\``,
        'Failed to read the schema or its tables.'
      );
    }
  }
});
