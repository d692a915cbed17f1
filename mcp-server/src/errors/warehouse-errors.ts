import type { StatementState } from '../clients/statement-api.js';

export interface UpstreamError {
  errorCode?: string;
  message?: string;
}

export type WarehouseErrorKind = 'configuration' | 'transport' | 'execution' | 'rejected';

/**
 * Base class for every fault the warehouse client reports to the tool layer.
 */
export abstract class WarehouseError extends Error {
  abstract readonly kind: WarehouseErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Missing host, credentials or SQL warehouse.
 */
export class ConfigurationError extends WarehouseError {
  readonly kind = 'configuration';
}

/**
 * Network failure, non-2xx response or a body that does not match the API contract.
 */
export class TransportError extends WarehouseError {
  readonly kind = 'transport';
  readonly httpStatus?: number;
  readonly upstream?: UpstreamError;

  constructor(
    message: string,
    details: { httpStatus?: number; upstream?: UpstreamError; cause?: unknown } = {}
  ) {
    super(message, { cause: details.cause });
    this.httpStatus = details.httpStatus;
    this.upstream = details.upstream;
  }
}

export type ExecutionFailureReason = 'FAILED' | 'CANCELED' | 'CLOSED' | 'TIMEOUT' | 'ABORTED';

export interface ExecutionErrorDetails {
  reason: ExecutionFailureReason;
  statementId?: string;
  lastStatus?: StatementState;
  attempts: number;
  upstream?: UpstreamError;
}

/**
 * The statement reached a terminal non-success state, ran out of poll attempts,
 * or the caller stopped waiting for it.
 */
export class ExecutionError extends WarehouseError {
  readonly kind = 'execution';
  readonly reason: ExecutionFailureReason;
  readonly statementId?: string;
  readonly lastStatus?: StatementState;
  readonly attempts: number;
  readonly upstream?: UpstreamError;

  constructor(details: ExecutionErrorDetails) {
    super(describeExecutionFailure(details));
    this.reason = details.reason;
    this.statementId = details.statementId;
    this.lastStatus = details.lastStatus;
    this.attempts = details.attempts;
    this.upstream = details.upstream;
  }
}

/**
 * The statement guard refused the SQL before anything was sent.
 */
export class RejectedStatementError extends WarehouseError {
  readonly kind = 'rejected';

  constructor(readonly keyword: string) {
    super(`Blocked: '${keyword}' statements are not allowed.`);
  }
}

export type StatementFault =
  | ConfigurationError
  | TransportError
  | ExecutionError
  | RejectedStatementError;

function describeExecutionFailure(details: ExecutionErrorDetails): string {
  const subject = details.statementId ? `Statement ${details.statementId}` : 'Statement';
  const lastStatus = details.lastStatus ?? 'UNKNOWN';

  switch (details.reason) {
    case 'TIMEOUT':
      return `${subject} did not finish after ${details.attempts} status checks (last status: ${lastStatus})`;
    case 'ABORTED':
      return `${subject} was abandoned by the caller (last status: ${lastStatus})`;
    default: {
      const message = details.upstream?.message ?? 'No error details provided.';
      const code = details.upstream?.errorCode ? `[${details.upstream.errorCode}] ` : '';
      return `${subject} ended in state ${details.reason}: ${code}${message}`;
    }
  }
}
