import { z } from 'zod';
import { renderCatalogSummary } from '../renderers/catalog-markdown.js';
import { catalogFailure, defineTool } from './types.js';

const DescribeCatalogInputSchema = z.object({
  catalog_name: z.string().trim().min(1).describe('Unity Catalog catalog name')
});

export const describeUcCatalogTool = defineTool({
  description: 'Summarize a Unity Catalog catalog and list its schemas with their descriptions',
  inputSchema: DescribeCatalogInputSchema.strict(),

  async execute(args, context) {
    try {
      const schemas = await context.catalog.listSchemas(args.catalog_name, context.signal);
      return { text: renderCatalogSummary(args.catalog_name, schemas), isError: false };
    } catch (error) {
      return catalogFailure(
        error,
        'Could not describe catalog',
        `Catalog: \`${args.catalog_name}\``,
        'Failed to list the schemas of this catalog.'
      );
    }
  }
});
