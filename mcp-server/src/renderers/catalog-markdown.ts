import type { CatalogInfo, ColumnInfo, SchemaInfo, TableInfo } from '../clients/catalog-client.js';
import type { LineageSection, NotebookDetails } from '../tools/lineage.js';

const NO_DESCRIPTION = 'No description provided.';

export function renderCatalogList(catalogs: readonly CatalogInfo[]): string {
  const lines = ['# Available Unity Catalogs', ''];

  if (catalogs.length === 0) {
    lines.push('- *No catalogs found or accessible.*');
    return lines.join('\n');
  }

  lines.push(`Found ${catalogs.length} catalog(s):`, '');
  for (const catalog of catalogs) {
    lines.push(
      `- **\`${catalog.name}\`**`,
      `  - **Description**: ${catalog.comment || NO_DESCRIPTION}`,
      `  - **Type**: \`${catalog.catalog_type ?? 'N/A'}\``,
      ''
    );
  }
  return lines.join('\n');
}

export function renderCatalogSummary(catalogName: string, schemas: readonly SchemaInfo[]): string {
  const lines = [`# Catalog Summary: **${catalogName}**`, ''];

  if (schemas.length === 0) {
    lines.push(`No schemas found in catalog \`${catalogName}\`.`);
    return lines.join('\n');
  }

  lines.push(`Found ${schemas.length} schemas in catalog \`${catalogName}\`:`, '');
  for (const schema of schemas) {
    lines.push(`## ${schema.full_name ?? `${catalogName}.${schema.name}`}`);
    if (schema.comment) {
      lines.push(`**Description**: ${schema.comment}`);
    }
    lines.push('');
  }
  lines.push(`**Total Schemas Found in \`${catalogName}\`**: ${schemas.length}`);
  return lines.join('\n');
}

export function renderSchemaDetails(
  schema: SchemaInfo,
  fullSchemaName: string,
  tables: readonly TableInfo[],
  includeColumns: boolean
): string {
  const lines = [
    `# Schema Details: **${fullSchemaName}**`,
    `**Description**: ${schema.comment || NO_DESCRIPTION}`,
    '',
    `## Tables in Schema \`${schema.name}\``
  ];

  if (tables.length === 0) {
    lines.push('- *No tables found in this schema.*');
    return lines.join('\n');
  }

  tables.forEach((table, index) => {
    lines.push(...renderTableSection(table, 3, includeColumns));
    lines.push(index < tables.length - 1 ? '\n=============\n' : '');
  });
  return lines.join('\n');
}

export function renderTableDetails(table: TableInfo, lineage: LineageSection): string {
  const lines = renderTableSection(table, 1, true);
  lines.push('', '## Lineage Information');

  switch (lineage.status) {
    case 'skipped':
      lines.push('- *Lineage fetching skipped as per request.*');
      break;
    case 'no-warehouse':
      lines.push('- *Lineage skipped: no SQL warehouse configured.*');
      break;
    case 'error':
      lines.push(
        '',
        '*Note: Could not retrieve complete lineage information.*',
        `> *Lineage fetch error: ${lineage.message}*`
      );
      break;
    case 'ok': {
      const { upstreamTables, downstreamTables, notebooksReading, notebooksWriting } = lineage.lineage;
      if (upstreamTables.length > 0) {
        lines.push('', '### Upstream Tables (tables this table reads from):');
        lines.push(...upstreamTables.map(name => `- \`${name}\``));
      }
      if (downstreamTables.length > 0) {
        lines.push('', '### Downstream Tables (tables that read from this table):');
        lines.push(...downstreamTables.map(name => `- \`${name}\``));
      }
      if (notebooksReading.length > 0) {
        lines.push('', '### Notebooks Reading from this Table:');
        lines.push(...notebooksReading.flatMap(renderNotebook));
      }
      if (notebooksWriting.length > 0) {
        lines.push('', '### Notebooks Writing to this Table:');
        lines.push(...notebooksWriting.flatMap(renderNotebook));
      }
      if (
        upstreamTables.length + downstreamTables.length +
        notebooksReading.length + notebooksWriting.length === 0
      ) {
        lines.push('- *No table, notebook, or job dependencies found.*');
      }
      break;
    }
  }

  return lines.join('\n');
}

export function renderTableSection(table: TableInfo, headingLevel: number, displayColumns: boolean): string[] {
  const heading = '#'.repeat(headingLevel);
  const subHeading = '#'.repeat(headingLevel + 1);
  const topLevel = headingLevel === 1;
  const lines = [`${heading} Table: **${table.full_name ?? table.name}**`];

  if (table.comment) {
    lines.push('', `**Description**: ${table.comment}`);
  } else if (topLevel) {
    lines.push('', `**Description**: ${NO_DESCRIPTION}`);
  }

  const partitionColumns = (table.columns ?? [])
    .filter((column): column is ColumnInfo & { partition_index: number } => column.partition_index !== undefined)
    .sort((a, b) => a.partition_index - b.partition_index)
    .map(column => column.name);

  if (partitionColumns.length > 0) {
    lines.push('', `${subHeading} Partition Columns`, ...partitionColumns.map(name => `- \`${name}\``));
  } else if (topLevel) {
    lines.push(
      '',
      `${subHeading} Partition Columns`,
      '- *This table is not partitioned or partition key info is unavailable.*'
    );
  }

  if (displayColumns) {
    lines.push('', `${subHeading} Table Columns`, ...renderColumns(table.columns ?? []));
  }

  return lines;
}

function renderColumns(columns: readonly ColumnInfo[]): string[] {
  if (columns.length === 0) {
    return ['  - *No column information available.*'];
  }

  return columns.map(column => {
    const type = column.type_text ?? column.type_name ?? 'N/A';
    const nullability = column.nullable ? 'nullable' : 'not nullable';
    const description = column.comment ? `: ${column.comment}` : '';
    return `  - **${column.name}** (\`${type}\`, ${nullability})${description}`;
  });
}

function renderNotebook(notebook: NotebookDetails): string[] {
  const path = notebook.notebookPath;
  const lines = path?.startsWith('/')
    ? [`- **\`${path.split('/').at(-1) ?? path}\`**`, `  - **Path**: \`${path}\``]
    : [`- **notebook_id:${notebook.notebookId}**`];

  lines.push(`  - **Job**: ${notebook.jobName} (ID: ${notebook.jobId})`);
  if (notebook.taskKey) {
    lines.push(`  - **Task**: ${notebook.taskKey}`);
  }
  lines.push('');
  return lines;
}

export function renderCatalogError(title: string, subject: string | undefined, problem: string, error: Error): string {
  const lines = [`# Error: ${title}`];
  if (subject) {
    lines.push(subject);
  }
  lines.push(`**Problem:** ${problem}`, '**Details:**', '```', error.message, '```');
  return lines.join('\n');
}
