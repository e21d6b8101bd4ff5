// ─── Queue Rows ───

/** Column headers the queue sheet must carry (the result-URL column name is configurable). */
export const REQUIRED_COLUMNS = ['Title', 'Script', 'Status'] as const;
export type RequiredColumn = (typeof REQUIRED_COLUMNS)[number];

export interface QueueRow {
  /** 1-based sheet row; row 1 is the header so data starts at 2. */
  rowNumber: number;
  title: string;
  script: string;
  status: string;
  resultUrl: string;
}

// ─── Row Status ───

export const ROW_STATUS = {
  PENDING: 'Pending',
  PROCESSING: 'Processing',
  COMPLETED: 'Completed',
  UPLOAD_FAILED: 'Upload Failed',
} as const;

export type FixedRowStatus = (typeof ROW_STATUS)[keyof typeof ROW_STATUS];

export const ERROR_STATUS_PREFIX = 'Error: ';
export const ERROR_MESSAGE_LIMIT = 50;

/** Statuses the driver itself writes after a row has been claimed. */
export type FinalRowStatus =
  | typeof ROW_STATUS.COMPLETED
  | typeof ROW_STATUS.UPLOAD_FAILED
  | `${typeof ERROR_STATUS_PREFIX}${string}`;

export function isClaimableStatus(status: string): boolean {
  const trimmed = status.trim();
  return trimmed === '' || trimmed === ROW_STATUS.PENDING;
}

export function formatErrorStatus(err: unknown): `${typeof ERROR_STATUS_PREFIX}${string}` {
  const message = err instanceof Error ? err.message : String(err);
  // Cut by code point, not UTF-16 unit
  return `${ERROR_STATUS_PREFIX}${Array.from(message).slice(0, ERROR_MESSAGE_LIMIT).join('')}`;
}

// ─── Row Outcomes ───

export type RowOutcomeKind = 'completed' | 'upload-failed' | 'error' | 'lost-claim';

export interface RowOutcome {
  rowNumber: number;
  title: string;
  kind: RowOutcomeKind;
  status?: FinalRowStatus;
  url?: string;
  error?: string;
}

export interface RunSummary {
  total: number;
  skipped: number;
  completed: number;
  uploadFailed: number;
  errored: number;
  outcomes: RowOutcome[];
}
