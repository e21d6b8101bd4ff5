import type { FinalRowStatus, QueueRow } from '@sheetreel/shared';

/** Where queue rows live. Writes address single rows by position. */
export interface QueueStore {
  listRows(): Promise<QueueRow[]>;
  /** Mark the row Processing if it is still claimable; false when another writer got there first. */
  claimRow(row: QueueRow): Promise<boolean>;
  markCompleted(row: QueueRow, url: string): Promise<void>;
  markStatus(row: QueueRow, status: FinalRowStatus): Promise<void>;
}

/** The queue cannot be read or its layout is unusable. Fatal for the whole run. */
export class QueueStoreError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'QueueStoreError';
  }
}
