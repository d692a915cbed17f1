import { WarehouseError } from '../errors/warehouse-errors.js';
import type { ResultEnvelope, ScalarValue, StatementOutcome } from '../clients/statement-client.js';

export const CELL_SEPARATOR = ' | ';
export const NULL_TOKEN = 'NULL';
export const NO_ROWS_MESSAGE = 'No data rows found.';
export const NO_COLUMNS_MESSAGE = 'Statement succeeded with no result columns.';

/**
 * Renders a result envelope as a pipe-delimited table, or a fault as a single
 * `Error:` line. Never throws.
 */
export function formatResult(input: ResultEnvelope | WarehouseError): string {
  if (input instanceof WarehouseError) {
    return formatFault(input);
  }
  return formatEnvelope(input);
}

export function formatOutcome(outcome: StatementOutcome): string {
  return outcome.ok ? formatEnvelope(outcome.envelope) : formatFault(outcome.fault);
}

export function formatFault(fault: Error): string {
  const message = fault.message.replace(/\s*[\r\n]+\s*/g, ' ').trim();
  return `Error: ${message || fault.name}`;
}

function formatEnvelope(envelope: ResultEnvelope): string {
  const { columns, rows } = envelope;

  if (columns.length === 0) {
    return NO_COLUMNS_MESSAGE;
  }

  const header = columns.map(column => column.name).join(CELL_SEPARATOR);
  const lines = [header, '-'.repeat(header.length)];

  if (rows.length === 0) {
    lines.push(NO_ROWS_MESSAGE);
  }

  for (const row of rows) {
    // One cell per column, whatever the row carries
    lines.push(columns.map((_, index) => renderScalar(row[index])).join(CELL_SEPARATOR));
  }

  lines.push('', `Total rows: ${rows.length}`);
  if (envelope.truncated) {
    lines.push('(Results truncated)');
  }

  return lines.join('\n');
}

export function renderScalar(value: ScalarValue | undefined): string {
  if (value === null || value === undefined) {
    return NULL_TOKEN;
  }
  // A cell stays on one line and never adds a separator.
  return String(value).replace(/\r\n|\r|\n/g, '\\n').replace(/\|/g, '\\|');
}
