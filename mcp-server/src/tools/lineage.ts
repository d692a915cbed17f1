import { z } from 'zod';
import type { ResultEnvelope, StatementExecutionClient } from '../clients/statement-client.js';
import type { WorkspaceApi } from '../clients/workspace-client.js';
import { ConfigurationError, WarehouseError } from '../errors/warehouse-errors.js';
import { quoteLiteral } from '../utils/sql-identifiers.js';

export interface NotebookReference {
  notebookId: string;
  jobId: string;
}

/**
 * A notebook reference named through the Jobs API. `notebookPath` and
 * `taskKey` are set only when a notebook task of the job matches the id.
 */
export interface NotebookDetails extends NotebookReference {
  jobName: string;
  notebookPath?: string;
  taskKey?: string;
}

export interface LineageSummary<N extends NotebookReference = NotebookReference> {
  upstreamTables: string[];
  downstreamTables: string[];
  notebooksReading: N[];
  notebooksWriting: N[];
}

export type TableLineage = LineageSummary<NotebookDetails>;

export interface LineageSources {
  statements: StatementExecutionClient;
  workspace: WorkspaceApi;
  signal?: AbortSignal;
}

export type LineageSection =
  | { status: 'skipped' }
  | { status: 'no-warehouse' }
  | { status: 'error'; message: string }
  | { status: 'ok'; lineage: TableLineage };

const IdSchema = z.union([z.string(), z.number()]).transform(String);

const EntityMetadataSchema = z.object({
  notebook_id: IdSchema.nullish(),
  job_info: z.object({ job_id: IdSchema.nullish() }).nullish()
});

export function buildLineageQuery(fullTableName: string): string {
  const name = quoteLiteral(fullTableName);
  return [
    'SELECT source_table_full_name, target_table_full_name, entity_type, entity_id,',
    '       entity_run_id, entity_metadata, created_by, event_time',
    'FROM system.access.table_lineage',
    `WHERE source_table_full_name = ${name}`,
    `   OR target_table_full_name = ${name}`,
    'ORDER BY event_time DESC LIMIT 100'
  ].join('\n');
}

export async function fetchTableLineage(sources: LineageSources, fullTableName: string): Promise<LineageSection> {
  const { statements, workspace, signal } = sources;
  const outcome = await statements.execute(buildLineageQuery(fullTableName), { signal });
  if (!outcome.ok) {
    if (outcome.fault instanceof ConfigurationError) {
      return { status: 'no-warehouse' };
    }
    return { status: 'error', message: outcome.fault.message };
  }

  const summary = summarizeLineage(outcome.envelope, fullTableName);
  const resolver = new NotebookResolver(workspace, signal);
  const [notebooksReading, notebooksWriting] = await Promise.all([
    Promise.all(summary.notebooksReading.map(notebook => resolver.resolve(notebook))),
    Promise.all(summary.notebooksWriting.map(notebook => resolver.resolve(notebook)))
  ]);

  return { status: 'ok', lineage: { ...summary, notebooksReading, notebooksWriting } };
}

interface JobSummary {
  name: string;
  notebookTasks: { taskKey: string; notebookPath: string }[];
}

/**
 * Names notebooks through their jobs. Job and path lookups are cached for the
 * lifetime of one resolver, so each job and each notebook path is fetched once.
 */
export class NotebookResolver {
  private readonly jobs = new Map<string, Promise<JobSummary>>();
  private readonly notebookIds = new Map<string, Promise<string | undefined>>();

  constructor(
    private readonly workspace: WorkspaceApi,
    private readonly signal?: AbortSignal
  ) {}

  async resolve(notebook: NotebookReference): Promise<NotebookDetails> {
    const job = await this.job(notebook.jobId);

    for (const task of job.notebookTasks) {
      if ((await this.notebookId(task.notebookPath)) === notebook.notebookId) {
        return { ...notebook, jobName: job.name, notebookPath: task.notebookPath, taskKey: task.taskKey };
      }
    }
    return { ...notebook, jobName: job.name };
  }

  private job(jobId: string): Promise<JobSummary> {
    let pending = this.jobs.get(jobId);
    if (!pending) {
      pending = this.fetchJob(jobId);
      this.jobs.set(jobId, pending);
    }
    return pending;
  }

  private notebookId(path: string): Promise<string | undefined> {
    let pending = this.notebookIds.get(path);
    if (!pending) {
      pending = this.fetchNotebookId(path);
      this.notebookIds.set(path, pending);
    }
    return pending;
  }

  private async fetchJob(jobId: string): Promise<JobSummary> {
    try {
      const job = await this.workspace.getJob(jobId, this.signal);
      const notebookTasks = (job.settings?.tasks ?? []).flatMap(task =>
        task.notebook_task ? [{ taskKey: task.task_key, notebookPath: task.notebook_task.notebook_path }] : []
      );
      return { name: job.settings?.name ?? `Job ${jobId}`, notebookTasks };
    } catch (error) {
      if (!(error instanceof WarehouseError)) {
        throw error;
      }
      console.error(`Job ${jobId} lookup failed: ${error.message}`);
      return { name: `Job ${jobId}`, notebookTasks: [] };
    }
  }

  private async fetchNotebookId(path: string): Promise<string | undefined> {
    try {
      const status = await this.workspace.getNotebookStatus(path, this.signal);
      return status.object_id;
    } catch (error) {
      if (!(error instanceof WarehouseError)) {
        throw error;
      }
      console.error(`Notebook ${path} lookup failed: ${error.message}`);
      return undefined;
    }
  }
}

export function summarizeLineage(envelope: ResultEnvelope, fullTableName: string): LineageSummary {
  const column = (name: string) => envelope.columns.findIndex(c => c.name === name);
  const sourceIndex = column('source_table_full_name');
  const targetIndex = column('target_table_full_name');
  const metadataIndex = column('entity_metadata');

  const upstream = new Set<string>();
  const downstream = new Set<string>();
  const reading = new Map<string, NotebookReference>();
  const writing = new Map<string, NotebookReference>();

  for (const row of envelope.rows) {
    const source = textAt(row, sourceIndex);
    const target = textAt(row, targetIndex);

    if (source === fullTableName && target && target !== fullTableName) {
      downstream.add(target);
    } else if (target === fullTableName && source && source !== fullTableName) {
      upstream.add(source);
    }

    const notebook = parseNotebookReference(textAt(row, metadataIndex));
    if (!notebook) {
      continue;
    }
    if (source === fullTableName) {
      reading.set(notebook.notebookId, notebook);
    } else if (target === fullTableName) {
      writing.set(notebook.notebookId, notebook);
    }
  }

  return {
    upstreamTables: [...upstream].sort(),
    downstreamTables: [...downstream].sort(),
    notebooksReading: sortNotebooks(reading),
    notebooksWriting: sortNotebooks(writing)
  };
}

function textAt(row: readonly (string | number | boolean | null)[], index: number): string | undefined {
  if (index < 0) {
    return undefined;
  }
  const value = row[index];
  return value === null || value === undefined ? undefined : String(value);
}

function parseNotebookReference(metadata: string | undefined): NotebookReference | undefined {
  if (!metadata) {
    return undefined;
  }

  let json: unknown;
  try {
    json = JSON.parse(metadata);
  } catch {
    return undefined;
  }

  const parsed = EntityMetadataSchema.safeParse(json);
  const notebookId = parsed.success ? parsed.data.notebook_id : undefined;
  const jobId = parsed.success ? parsed.data.job_info?.job_id : undefined;
  return notebookId && jobId ? { notebookId, jobId } : undefined;
}

function sortNotebooks(notebooks: Map<string, NotebookReference>): NotebookReference[] {
  return [...notebooks.values()].sort((a, b) => a.notebookId.localeCompare(b.notebookId));
}
