import chalk from 'chalk';
import Table from 'cli-table3';
import { ROW_STATUS, ERROR_STATUS_PREFIX, isClaimableStatus, type QueueRow, type RunSummary } from '@sheetreel/shared';

export function parseLimit(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`--limit must be a positive integer, got "${value}"`);
  }
  return n;
}

function colorStatus(status: string): string {
  const s = status.trim();
  if (isClaimableStatus(s)) return chalk.yellow(s || ROW_STATUS.PENDING);
  if (s === ROW_STATUS.PROCESSING) return chalk.blue(s);
  if (s === ROW_STATUS.COMPLETED) return chalk.green(s);
  if (s === ROW_STATUS.UPLOAD_FAILED || s.startsWith(ERROR_STATUS_PREFIX)) return chalk.red(s);
  return chalk.dim(s);
}

export function renderQueueTable(rows: QueueRow[]): string {
  const table = new Table({
    head: [chalk.cyan('Row'), chalk.cyan('Title'), chalk.cyan('Status'), chalk.cyan('URL')],
    colWidths: [6, 36, 24, 40],
  });
  for (const row of rows) {
    table.push([String(row.rowNumber), row.title.slice(0, 34), colorStatus(row.status), row.resultUrl]);
  }
  return table.toString();
}

export function renderSummaryTable(summary: RunSummary): string {
  const table = new Table();
  table.push(
    { [chalk.cyan('Rows')]: String(summary.total) },
    { [chalk.cyan('Completed')]: chalk.green(String(summary.completed)) },
    { [chalk.cyan('Upload Failed')]: summary.uploadFailed > 0 ? chalk.red(String(summary.uploadFailed)) : '0' },
    { [chalk.cyan('Errors')]: summary.errored > 0 ? chalk.red(String(summary.errored)) : '0' },
    { [chalk.cyan('Skipped')]: String(summary.skipped) },
  );
  return table.toString();
}

export function renderOutcomeTable(summary: RunSummary): string {
  const table = new Table({
    head: [chalk.cyan('Row'), chalk.cyan('Title'), chalk.cyan('Result')],
    colWidths: [6, 36, 64],
  });
  for (const o of summary.outcomes) {
    const result =
      o.kind === 'completed' ? chalk.green(o.url ?? '')
      : o.kind === 'lost-claim' ? chalk.dim('claimed elsewhere')
      : colorStatus(o.status ?? `${ERROR_STATUS_PREFIX}${o.error ?? ''}`);
    table.push([String(o.rowNumber), o.title.slice(0, 34), result]);
  }
  return table.toString();
}
