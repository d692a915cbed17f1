import { z } from 'zod';
import { renderCatalogList } from '../renderers/catalog-markdown.js';
import { catalogFailure, defineTool } from './types.js';

const ListCatalogsInputSchema = z.object({});

export const listUcCatalogsTool = defineTool({
  description: 'List the Unity Catalog catalogs visible to the configured credentials',
  inputSchema: ListCatalogsInputSchema.strict(),

  async execute(_args, context) {
    try {
      const catalogs = await context.catalog.listCatalogs(context.signal);
      return { text: renderCatalogList(catalogs), isError: false };
    } catch (error) {
      return catalogFailure(error, 'Listing catalogs failed', undefined, 'The Unity Catalog API request failed.');
    }
  }
});
