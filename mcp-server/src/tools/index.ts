import { describeTableTool } from './describe-table.js';
import { describeUcCatalogTool } from './describe-uc-catalog.js';
import { describeUcSchemaTool } from './describe-uc-schema.js';
import { describeUcTableTool } from './describe-uc-table.js';
import { executeSqlQueryTool } from './execute-sql.js';
import { listSchemasTool } from './list-schemas.js';
import { listTablesTool } from './list-tables.js';
import { listUcCatalogsTool } from './list-uc-catalogs.js';
import type { WarehouseTool } from './types.js';

export const tools = {
  execute_sql_query: executeSqlQueryTool,
  list_schemas: listSchemasTool,
  list_tables: listTablesTool,
  describe_table: describeTableTool,
  list_uc_catalogs: listUcCatalogsTool,
  describe_uc_catalog: describeUcCatalogTool,
  describe_uc_schema: describeUcSchemaTool,
  describe_uc_table: describeUcTableTool
} satisfies Record<string, WarehouseTool>;
