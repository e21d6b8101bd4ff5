import {
  ROW_STATUS,
  formatErrorStatus,
  isClaimableStatus,
  rowLogger,
  type Logger,
  type QueueRow,
  type RowOutcome,
  type RunSummary,
} from '@sheetreel/shared';
import { NoImagesError, type AudioSynthesizer, type ImageCollector, type VideoAssembler } from '@sheetreel/media';
import type { Publisher } from '@sheetreel/publisher';
import type { QueueStore } from './queue-store.js';
import type { Workspace } from './workspace.js';

/** The per-row phases, in the order they run. */
export interface RowStages {
  synthesizer: Pick<AudioSynthesizer, 'synthesize'>;
  collector: Pick<ImageCollector, 'collect'>;
  assembler: Pick<VideoAssembler, 'assemble'>;
  publisher: Pick<Publisher, 'publish'>;
}

export interface QueueRunnerOptions {
  store: QueueStore;
  stages: RowStages;
  workspace: Pick<Workspace, 'layout' | 'prepare' | 'clean'>;
}

export interface RunOptions {
  /** Process at most this many claimable rows. */
  limit?: number;
}

/**
 * Processes the queue one row at a time: claim, narrate, collect images,
 * render, publish, record. A row's failure is written to its status cell
 * and never stops the run.
 */
export class QueueRunner {
  constructor(
    private options: QueueRunnerOptions,
    private logger: Logger,
  ) {}

  async run(runOptions: RunOptions = {}): Promise<RunSummary> {
    const { store, workspace } = this.options;

    const stale = await workspace.clean();
    if (stale.length > 0) {
      this.logger.warn({ stale }, 'Removed files left by a previous run');
    }
    await workspace.prepare();

    const rows = await store.listRows();
    const pending = rows.filter((r) => isClaimableStatus(r.status));
    const batch = runOptions.limit === undefined ? pending : pending.slice(0, runOptions.limit);
    this.logger.info({ rows: rows.length, pending: pending.length, batch: batch.length }, 'Starting run');

    const outcomes: RowOutcome[] = [];
    for (const row of batch) {
      outcomes.push(await this.processRow(row));
    }

    const summary = summarize(rows.length, outcomes);
    this.logger.info(
      {
        completed: summary.completed,
        uploadFailed: summary.uploadFailed,
        errored: summary.errored,
        skipped: summary.skipped,
      },
      'Run finished',
    );
    return summary;
  }

  private async processRow(row: QueueRow): Promise<RowOutcome> {
    const log = rowLogger(this.logger, row.rowNumber);
    const base = { rowNumber: row.rowNumber, title: row.title };

    try {
      if (!(await this.options.store.claimRow(row))) {
        return { ...base, kind: 'lost-claim' };
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.error({ error: message }, 'Could not claim row');
      return { ...base, kind: 'error', error: message };
    }

    try {
      const outcome = await this.produce(row, log);
      await this.record(row, outcome, log);
      return outcome;
    } finally {
      await this.cleanWorkspace(log);
    }
  }

  private async produce(row: QueueRow, log: Logger): Promise<RowOutcome> {
    const { synthesizer, collector, assembler, publisher } = this.options.stages;
    const { layout } = this.options.workspace;
    const base = { rowNumber: row.rowNumber, title: row.title };

    try {
      log.info({ title: row.title }, 'Processing row');
      await synthesizer.synthesize(row.script, layout.audioPath);

      const saved = await collector.collect(row.title);
      if (saved === 0) {
        throw new NoImagesError();
      }

      const render = await assembler.assemble(layout.audioPath, layout.videoPath);
      const url = await publisher.publish(render.outputPath);

      if (url) {
        log.info({ url }, 'Row completed');
        return { ...base, kind: 'completed', status: ROW_STATUS.COMPLETED, url };
      }
      log.warn('Every upload host failed');
      return { ...base, kind: 'upload-failed', status: ROW_STATUS.UPLOAD_FAILED };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.error({ error: message }, 'Row failed');
      return { ...base, kind: 'error', status: formatErrorStatus(err), error: message };
    }
  }

  private async record(row: QueueRow, outcome: RowOutcome, log: Logger): Promise<void> {
    const { store } = this.options;
    try {
      if (outcome.kind === 'completed' && outcome.url) {
        await store.markCompleted(row, outcome.url);
      } else if (outcome.status) {
        await store.markStatus(row, outcome.status);
      }
    } catch (err) {
      log.error(
        { status: outcome.status, error: err instanceof Error ? err.message : String(err) },
        'Could not record row status',
      );
    }
  }

  private async cleanWorkspace(log: Logger): Promise<void> {
    try {
      await this.options.workspace.clean();
    } catch (err) {
      log.error({ error: err instanceof Error ? err.message : String(err) }, 'Workspace cleanup failed');
    }
  }
}

function summarize(total: number, outcomes: RowOutcome[]): RunSummary {
  const count = (kind: RowOutcome['kind']) => outcomes.filter((o) => o.kind === kind).length;
  const completed = count('completed');
  const uploadFailed = count('upload-failed');
  const errored = count('error');
  return {
    total,
    skipped: total - completed - uploadFailed - errored,
    completed,
    uploadFailed,
    errored,
    outcomes,
  };
}
