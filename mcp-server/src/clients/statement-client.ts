import { setTimeout as delay } from 'node:timers/promises';
import {
  ConfigurationError,
  ExecutionError,
  RejectedStatementError,
  TransportError,
  type ExecutionFailureReason,
  type StatementFault
} from '../errors/warehouse-errors.js';
import type { StatementGuard } from '../validators/statement-guard.js';
import {
  TERMINAL_STATES,
  type ResultData,
  type StatementApi,
  type StatementResponse
} from './statement-api.js';

export type ScalarValue = string | number | boolean | null;

export interface ColumnDescriptor {
  name: string;
  typeName: string;
  position: number;
}

export interface ResultEnvelope {
  readonly statementId: string;
  readonly columns: readonly ColumnDescriptor[];
  readonly rows: readonly (readonly ScalarValue[])[];
  readonly truncated: boolean;
}

export type StatementOutcome =
  | { ok: true; envelope: ResultEnvelope }
  | { ok: false; fault: StatementFault };

/**
 * SUBMITTED -> POLLING -> SUCCEEDED | FAILED | CANCELED | TIMED_OUT.
 * `attempts` counts completed status polls.
 */
export type ExecutionPhase =
  | { kind: 'SUBMITTED' | 'POLLING'; statement: StatementResponse; attempts: number }
  | { kind: 'SUCCEEDED' | 'FAILED' | 'CANCELED' | 'TIMED_OUT'; statement: StatementResponse; attempts: number };

type ActivePhase = Extract<ExecutionPhase, { kind: 'SUBMITTED' | 'POLLING' }>;
type FinalPhase = Exclude<ExecutionPhase, ActivePhase>;

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

const abortableSleep: Sleeper = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export const DEFAULT_POLL_INTERVAL_MS = 10_000;
export const DEFAULT_MAX_POLL_ATTEMPTS = 60;

export interface StatementClientOptions {
  api: StatementApi;
  defaultWarehouseId?: string;
  pollIntervalMs?: number;
  maxPollAttempts?: number;
  guard?: StatementGuard;
  sleep?: Sleeper;
}

export interface ExecuteOptions {
  warehouseId?: string;
  signal?: AbortSignal;
}

export class StatementExecutionClient {
  private readonly api: StatementApi;
  private readonly defaultWarehouseId?: string;
  private readonly pollIntervalMs: number;
  private readonly maxPollAttempts: number;
  private readonly guard?: StatementGuard;
  private readonly sleep: Sleeper;

  constructor(options: StatementClientOptions) {
    this.api = options.api;
    this.defaultWarehouseId = options.defaultWarehouseId;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.maxPollAttempts = options.maxPollAttempts ?? DEFAULT_MAX_POLL_ATTEMPTS;
    this.guard = options.guard;
    this.sleep = options.sleep ?? abortableSleep;
  }

  /** Upper bound on time spent waiting between polls for one statement. */
  get pollingCeilingMs(): number {
    return this.pollIntervalMs * this.maxPollAttempts;
  }

  async execute(sql: string, options: ExecuteOptions = {}): Promise<StatementOutcome> {
    const verdict = this.guard?.check(sql);
    if (verdict && !verdict.allowed) {
      return { ok: false, fault: new RejectedStatementError(verdict.keyword) };
    }

    const warehouseId = options.warehouseId || this.defaultWarehouseId;
    if (!warehouseId) {
      return {
        ok: false,
        fault: new ConfigurationError(
          'No SQL warehouse configured. Set DATABRICKS_SQL_WAREHOUSE_ID, add warehouse_id to the profile, or pass warehouse_id.'
        )
      };
    }

    const { signal } = options;
    let phase: ExecutionPhase | undefined;

    try {
      const submitted = await this.api.submitStatement({ statement: sql, warehouseId }, signal);
      phase = { kind: 'SUBMITTED', statement: submitted, attempts: 0 };

      while (isActive(phase)) {
        phase = await this.step(phase, signal);
      }

      return await this.conclude(phase, signal);
    } catch (error) {
      if (signal?.aborted) {
        return {
          ok: false,
          fault: new ExecutionError({
            reason: 'ABORTED',
            statementId: phase?.statement.statement_id,
            lastStatus: phase?.statement.status.state,
            attempts: phase?.attempts ?? 0
          })
        };
      }
      return { ok: false, fault: asStatementFault(error) };
    }
  }

  private async step(phase: ActivePhase, signal?: AbortSignal): Promise<ExecutionPhase> {
    if (phase.kind === 'SUBMITTED') {
      return classify(phase.statement, 0, this.maxPollAttempts);
    }

    await this.sleep(this.pollIntervalMs, signal);
    const statement = await this.api.getStatement(phase.statement.statement_id, signal);
    return classify(statement, phase.attempts + 1, this.maxPollAttempts);
  }

  private async conclude(phase: FinalPhase, signal?: AbortSignal): Promise<StatementOutcome> {
    const { statement, attempts } = phase;

    if (phase.kind === 'SUCCEEDED') {
      return { ok: true, envelope: await this.collectEnvelope(statement, signal) };
    }

    const reason: ExecutionFailureReason = phase.kind === 'TIMED_OUT'
      ? 'TIMEOUT'
      : terminalReason(statement);

    return {
      ok: false,
      fault: new ExecutionError({
        reason,
        statementId: statement.statement_id,
        lastStatus: statement.status.state,
        attempts,
        upstream: statement.status.error && {
          errorCode: statement.status.error.error_code,
          message: statement.status.error.message
        }
      })
    };
  }

  private async collectEnvelope(statement: StatementResponse, signal?: AbortSignal): Promise<ResultEnvelope> {
    const statementId = statement.statement_id;
    const manifest = statement.manifest;

    const columns = (manifest?.schema?.columns ?? []).map((column, index): ColumnDescriptor => ({
      name: column.name,
      typeName: column.type_text ?? column.type_name ?? 'UNKNOWN',
      position: column.position ?? index
    }));

    const rows: (readonly ScalarValue[])[] = [];
    let chunk: ResultData | undefined = statement.result;
    if (!chunk && (manifest?.total_chunk_count ?? 0) > 0) {
      chunk = await this.api.getResultChunk(statementId, 0, signal);
    }

    let expectedIndex = 0;
    while (chunk) {
      const index = chunk.chunk_index ?? expectedIndex;
      if (index !== expectedIndex) {
        throw new TransportError(
          `Result chunk ${index} of statement ${statementId} arrived out of order (expected ${expectedIndex})`
        );
      }
      for (const row of chunk.data_array ?? []) {
        rows.push(Object.freeze(row));
      }
      expectedIndex += 1;
      chunk = chunk.next_chunk_index === undefined
        ? undefined
        : await this.api.getResultChunk(statementId, chunk.next_chunk_index, signal);
    }

    return Object.freeze({
      statementId,
      columns: Object.freeze(columns),
      rows: Object.freeze(rows),
      truncated: manifest?.truncated ?? false
    });
  }
}

function isActive(phase: ExecutionPhase): phase is ActivePhase {
  return phase.kind === 'SUBMITTED' || phase.kind === 'POLLING';
}

export function classify(statement: StatementResponse, attempts: number, maxPollAttempts: number): ExecutionPhase {
  const state = statement.status.state;

  if (state === 'SUCCEEDED') {
    return { kind: 'SUCCEEDED', statement, attempts };
  }
  if (state === 'CANCELED') {
    return { kind: 'CANCELED', statement, attempts };
  }
  if (TERMINAL_STATES.has(state)) {
    return { kind: 'FAILED', statement, attempts };
  }
  if (attempts >= maxPollAttempts) {
    return { kind: 'TIMED_OUT', statement, attempts };
  }
  return { kind: 'POLLING', statement, attempts };
}

function terminalReason(statement: StatementResponse): ExecutionFailureReason {
  switch (statement.status.state) {
    case 'CANCELED':
      return 'CANCELED';
    case 'CLOSED':
      return 'CLOSED';
    default:
      return 'FAILED';
  }
}

function asStatementFault(error: unknown): StatementFault {
  if (
    error instanceof ConfigurationError ||
    error instanceof TransportError ||
    error instanceof ExecutionError ||
    error instanceof RejectedStatementError
  ) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(`Statement execution failed: ${message}`, { cause: error });
}
