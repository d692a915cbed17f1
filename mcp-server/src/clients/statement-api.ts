import { z } from 'zod';
import type { DatabricksHttpClient } from './databricks-http.js';

// Statement Execution API 2.0 wire contract.

export const StatementStateSchema = z.enum([
  'PENDING',
  'RUNNING',
  'SUCCEEDED',
  'FAILED',
  'CANCELED',
  'CLOSED'
]);

export type StatementState = z.infer<typeof StatementStateSchema>;

export const TERMINAL_STATES: ReadonlySet<StatementState> = new Set<StatementState>([
  'SUCCEEDED',
  'FAILED',
  'CANCELED',
  'CLOSED'
]);

export const ServiceErrorSchema = z.object({
  error_code: z.string().optional(),
  message: z.string().optional()
});

const ScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const ResultDataSchema = z.object({
  chunk_index: z.number().int().nonnegative().optional(),
  row_offset: z.number().int().optional(),
  row_count: z.number().int().optional(),
  data_array: z.array(z.array(ScalarSchema)).optional(),
  next_chunk_index: z.number().int().nonnegative().optional()
});

export type ResultData = z.infer<typeof ResultDataSchema>;

const ColumnInfoSchema = z.object({
  name: z.string(),
  type_name: z.string().optional(),
  type_text: z.string().optional(),
  position: z.number().int().optional()
});

const ResultManifestSchema = z.object({
  schema: z
    .object({
      column_count: z.number().int().optional(),
      columns: z.array(ColumnInfoSchema).optional()
    })
    .optional(),
  total_chunk_count: z.number().int().optional(),
  total_row_count: z.number().int().optional(),
  truncated: z.boolean().optional()
});

export type ResultManifest = z.infer<typeof ResultManifestSchema>;

export const StatementResponseSchema = z.object({
  statement_id: z.string().min(1),
  status: z.object({
    state: StatementStateSchema,
    error: ServiceErrorSchema.optional()
  }),
  manifest: ResultManifestSchema.optional(),
  result: ResultDataSchema.optional()
});

export type StatementResponse = z.infer<typeof StatementResponseSchema>;

export interface SubmitStatementRequest {
  statement: string;
  warehouseId: string;
}

/**
 * The three calls the execution client makes against the warehouse.
 */
export interface StatementApi {
  submitStatement(request: SubmitStatementRequest, signal?: AbortSignal): Promise<StatementResponse>;
  getStatement(statementId: string, signal?: AbortSignal): Promise<StatementResponse>;
  getResultChunk(statementId: string, chunkIndex: number, signal?: AbortSignal): Promise<ResultData>;
}

export class HttpStatementApi implements StatementApi {
  constructor(private readonly http: DatabricksHttpClient) {}

  submitStatement(request: SubmitStatementRequest, signal?: AbortSignal): Promise<StatementResponse> {
    return this.http.post(
      '/api/2.0/sql/statements',
      {
        statement: request.statement,
        warehouse_id: request.warehouseId,
        // Return immediately; completion is observed by polling.
        wait_timeout: '0s',
        disposition: 'INLINE',
        format: 'JSON_ARRAY'
      },
      StatementResponseSchema,
      { signal }
    );
  }

  getStatement(statementId: string, signal?: AbortSignal): Promise<StatementResponse> {
    return this.http.get(
      `/api/2.0/sql/statements/${encodeURIComponent(statementId)}`,
      StatementResponseSchema,
      { signal }
    );
  }

  getResultChunk(statementId: string, chunkIndex: number, signal?: AbortSignal): Promise<ResultData> {
    return this.http.get(
      `/api/2.0/sql/statements/${encodeURIComponent(statementId)}/result/chunks/${chunkIndex}`,
      ResultDataSchema,
      { signal }
    );
  }
}
