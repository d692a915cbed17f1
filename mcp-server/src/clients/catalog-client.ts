import { z } from 'zod';
import type { DatabricksHttpClient } from './databricks-http.js';

const UC_API = '/api/2.1/unity-catalog';

export const CatalogInfoSchema = z.object({
  name: z.string(),
  comment: z.string().optional(),
  catalog_type: z.string().optional()
});

export const SchemaInfoSchema = z.object({
  name: z.string(),
  full_name: z.string().optional(),
  catalog_name: z.string().optional(),
  comment: z.string().optional()
});

export const ColumnInfoSchema = z.object({
  name: z.string(),
  type_text: z.string().optional(),
  type_name: z.string().optional(),
  nullable: z.boolean().optional(),
  comment: z.string().optional(),
  partition_index: z.number().int().optional(),
  position: z.number().int().optional()
});

export const TableInfoSchema = z.object({
  name: z.string(),
  full_name: z.string().optional(),
  catalog_name: z.string().optional(),
  schema_name: z.string().optional(),
  table_type: z.string().optional(),
  comment: z.string().optional(),
  columns: z.array(ColumnInfoSchema).optional()
});

export type CatalogInfo = z.infer<typeof CatalogInfoSchema>;
export type SchemaInfo = z.infer<typeof SchemaInfoSchema>;
export type ColumnInfo = z.infer<typeof ColumnInfoSchema>;
export type TableInfo = z.infer<typeof TableInfoSchema>;

interface Page<T> {
  items: T[];
  nextPageToken?: string;
}

const CatalogPageSchema = z
  .object({
    catalogs: z.array(CatalogInfoSchema).default([]),
    next_page_token: z.string().optional()
  })
  .transform(page => ({ items: page.catalogs, nextPageToken: page.next_page_token }));

const SchemaPageSchema = z
  .object({
    schemas: z.array(SchemaInfoSchema).default([]),
    next_page_token: z.string().optional()
  })
  .transform(page => ({ items: page.schemas, nextPageToken: page.next_page_token }));

const TablePageSchema = z
  .object({
    tables: z.array(TableInfoSchema).default([]),
    next_page_token: z.string().optional()
  })
  .transform(page => ({ items: page.tables, nextPageToken: page.next_page_token }));

/**
 * Read-only access to Unity Catalog metadata.
 */
export interface CatalogApi {
  listCatalogs(signal?: AbortSignal): Promise<CatalogInfo[]>;
  listSchemas(catalogName: string, signal?: AbortSignal): Promise<SchemaInfo[]>;
  getSchema(fullName: string, signal?: AbortSignal): Promise<SchemaInfo>;
  listTables(catalogName: string, schemaName: string, signal?: AbortSignal): Promise<TableInfo[]>;
  getTable(fullName: string, signal?: AbortSignal): Promise<TableInfo>;
}

export class UnityCatalogClient implements CatalogApi {
  constructor(private readonly http: DatabricksHttpClient) {}

  listCatalogs(signal?: AbortSignal): Promise<CatalogInfo[]> {
    return this.collect(`${UC_API}/catalogs`, {}, CatalogPageSchema, signal);
  }

  listSchemas(catalogName: string, signal?: AbortSignal): Promise<SchemaInfo[]> {
    return this.collect(`${UC_API}/schemas`, { catalog_name: catalogName }, SchemaPageSchema, signal);
  }

  getSchema(fullName: string, signal?: AbortSignal): Promise<SchemaInfo> {
    return this.http.get(`${UC_API}/schemas/${encodeURIComponent(fullName)}`, SchemaInfoSchema, { signal });
  }

  listTables(catalogName: string, schemaName: string, signal?: AbortSignal): Promise<TableInfo[]> {
    return this.collect(
      `${UC_API}/tables`,
      { catalog_name: catalogName, schema_name: schemaName },
      TablePageSchema,
      signal
    );
  }

  getTable(fullName: string, signal?: AbortSignal): Promise<TableInfo> {
    return this.http.get(`${UC_API}/tables/${encodeURIComponent(fullName)}`, TableInfoSchema, { signal });
  }

  private async collect<T>(
    path: string,
    params: Record<string, string>,
    schema: z.ZodType<Page<T>, z.ZodTypeDef, unknown>,
    signal?: AbortSignal
  ): Promise<T[]> {
    const items: T[] = [];
    let pageToken: string | undefined;

    do {
      const page = await this.http.get(
        path,
        schema,
        { params: pageToken ? { ...params, page_token: pageToken } : params, signal }
      );
      items.push(...page.items);
      pageToken = page.nextPageToken || undefined;
    } while (pageToken);

    return items;
  }
}
