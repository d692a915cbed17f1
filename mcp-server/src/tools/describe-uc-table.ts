import { z } from 'zod';
import type { TableInfo } from '../clients/catalog-client.js';
import { renderTableDetails } from '../renderers/catalog-markdown.js';
import { fetchTableLineage, type LineageSection } from './lineage.js';
import { catalogFailure, defineTool, qualifiedName } from './types.js';

const DescribeTableInputSchema = z.object({
  full_table_name: qualifiedName('Table as catalog.schema.table', 3, 3),
  include_lineage: z.boolean().default(false).describe('Look up upstream and downstream lineage')
});

export const describeUcTableTool = defineTool({
  description:
    'Describe a Unity Catalog table: description, partition columns and columns, ' +
    'with optional lineage from system.access.table_lineage',
  inputSchema: DescribeTableInputSchema.strict(),

  async execute(args, context) {
    let table: TableInfo;
    try {
      table = await context.catalog.getTable(args.full_table_name, context.signal);
    } catch (error) {
      return catalogFailure(
        error,
        'Could not describe table',
        `Table: \`${args.full_table_name}\``,
        'Failed to read the table metadata.'
      );
    }

    const lineage: LineageSection = args.include_lineage
      ? await fetchTableLineage(context, table.full_name ?? args.full_table_name)
      : { status: 'skipped' };

    return { text: renderTableDetails(table, lineage), isError: false };
  }
});
