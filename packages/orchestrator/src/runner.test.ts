import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { isClaimableStatus, ROW_STATUS, type FinalRowStatus, type Logger, type QueueRow } from '@sheetreel/shared';
import type { AudioSynthesizer, ImageCollector, VideoAssembler } from '@sheetreel/media';
import type { Publisher } from '@sheetreel/publisher';
import { QueueRunner } from './runner.js';
import { Workspace, workspaceLayout, type WorkspaceLayout } from './workspace.js';
import type { QueueStore } from './queue-store.js';

const mockLogger: Logger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
  child: vi.fn().mockReturnThis(),
} as unknown as Logger;

/** Sheet stand-in: statuses and URLs are kept per row number. */
class InMemoryQueueStore implements QueueStore {
  rows: QueueRow[];

  constructor(rows: Array<Partial<QueueRow> & Pick<QueueRow, 'title'>>) {
    this.rows = rows.map((r, i) => ({
      rowNumber: i + 2,
      script: 'Hello world',
      status: '',
      resultUrl: '',
      ...r,
    }));
  }

  async listRows(): Promise<QueueRow[]> {
    return this.rows.map((r) => ({ ...r }));
  }

  async claimRow(row: QueueRow): Promise<boolean> {
    const stored = this.get(row.rowNumber);
    if (!isClaimableStatus(stored.status)) return false;
    stored.status = ROW_STATUS.PROCESSING;
    return true;
  }

  async markCompleted(row: QueueRow, url: string): Promise<void> {
    const stored = this.get(row.rowNumber);
    stored.status = ROW_STATUS.COMPLETED;
    stored.resultUrl = url;
  }

  async markStatus(row: QueueRow, status: FinalRowStatus): Promise<void> {
    this.get(row.rowNumber).status = status;
  }

  get(rowNumber: number): QueueRow {
    const row = this.rows.find((r) => r.rowNumber === rowNumber);
    if (!row) throw new Error(`No row ${rowNumber}`);
    return row;
  }
}

function fakeStages(layout: WorkspaceLayout, imageCount = 3, url: string | null = 'https://gofile.io/d/abc') {
  return {
    synthesizer: {
      synthesize: vi.fn<AudioSynthesizer['synthesize']>(async (_script, outputPath) => {
        await writeFile(outputPath, 'mp3');
        return outputPath;
      }),
    },
    collector: {
      collect: vi.fn<ImageCollector['collect']>(async () => {
        await mkdir(layout.imageDir, { recursive: true });
        for (let i = 0; i < imageCount; i++) {
          await writeFile(join(layout.imageDir, `img_00${i}.jpg`), 'jpeg');
        }
        return imageCount;
      }),
    },
    assembler: {
      assemble: vi.fn<VideoAssembler['assemble']>(async (_audio, outputPath) => {
        await writeFile(layout.manifestPath, 'manifest');
        await writeFile(outputPath, 'mp4');
        return { outputPath, duration: 9, imageCount, secondsPerImage: 9 / imageCount };
      }),
    },
    publisher: {
      publish: vi.fn<Publisher['publish']>().mockResolvedValue(url),
    },
  };
}

let root: string;
let layout: WorkspaceLayout;
let workspace: Workspace;

beforeEach(async () => {
  vi.clearAllMocks();
  root = await mkdtemp(join(tmpdir(), 'sheetreel-run-'));
  layout = workspaceLayout(root);
  workspace = new Workspace(layout, mockLogger);
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

function runner(store: QueueStore, stages: ReturnType<typeof fakeStages>) {
  return new QueueRunner({ store, stages, workspace }, mockLogger);
}

describe('QueueRunner', () => {
  it('completes a pending row and leaves the working directory empty', async () => {
    const store = new InMemoryQueueStore([{ title: 'Test Show', script: 'Hello world', status: '' }]);
    const stages = fakeStages(layout);

    const summary = await runner(store, stages).run();

    expect(store.get(2)).toMatchObject({ status: 'Completed', resultUrl: 'https://gofile.io/d/abc' });
    expect(stages.synthesizer.synthesize).toHaveBeenCalledWith('Hello world', layout.audioPath);
    expect(stages.collector.collect).toHaveBeenCalledWith('Test Show');
    expect(stages.assembler.assemble).toHaveBeenCalledWith(layout.audioPath, layout.videoPath);
    expect(stages.publisher.publish).toHaveBeenCalledWith(layout.videoPath);
    expect(await readdir(root)).toEqual([]);
    expect(summary).toEqual({
      total: 1,
      skipped: 0,
      completed: 1,
      uploadFailed: 0,
      errored: 0,
      outcomes: [
        { rowNumber: 2, title: 'Test Show', kind: 'completed', status: 'Completed', url: 'https://gofile.io/d/abc' },
      ],
    });
  });

  it('fails a row with no images instead of rendering it', async () => {
    const store = new InMemoryQueueStore([{ title: 'Test Show' }]);
    const stages = fakeStages(layout, 0);

    const summary = await runner(store, stages).run();

    expect(store.get(2).status).toBe('Error: No images found for this title');
    expect(stages.assembler.assemble).not.toHaveBeenCalled();
    expect(stages.publisher.publish).not.toHaveBeenCalled();
    expect(summary.errored).toBe(1);
  });

  it('only processes rows whose status is blank or Pending', async () => {
    const store = new InMemoryQueueStore([
      { title: 'Done', status: 'Completed', resultUrl: 'https://gofile.io/d/old' },
      { title: 'Busy', status: 'Processing' },
      { title: 'Broken', status: 'Error: boom' },
      { title: 'Padded', status: '  Pending ' },
      { title: 'Lowercase', status: 'pending' },
    ]);
    const stages = fakeStages(layout);

    const summary = await runner(store, stages).run();

    expect(stages.collector.collect).toHaveBeenCalledTimes(1);
    expect(stages.collector.collect).toHaveBeenCalledWith('Padded');
    expect(store.rows.map((r) => r.status)).toEqual([
      'Completed',
      'Processing',
      'Error: boom',
      'Completed',
      'pending',
    ]);
    expect(store.get(2).resultUrl).toBe('https://gofile.io/d/old');
    expect(summary).toMatchObject({ total: 5, skipped: 4, completed: 1 });
  });

  it('truncates error messages in the status cell to 50 characters', async () => {
    const store = new InMemoryQueueStore([{ title: 'Test Show' }]);
    const stages = fakeStages(layout);
    const message = 'Speech service rejected the request because the script is far too long to narrate';
    stages.synthesizer.synthesize.mockRejectedValue(new Error(message));

    const summary = await runner(store, stages).run();

    expect(store.get(2).status).toBe(`Error: ${message.slice(0, 50)}`);
    expect(summary.outcomes[0]).toMatchObject({ kind: 'error', error: message });
  });

  it('marks the row Upload Failed and leaves its URL untouched when every host fails', async () => {
    const store = new InMemoryQueueStore([{ title: 'Test Show', resultUrl: 'keep-me' }]);
    const stages = fakeStages(layout, 3, null);

    const summary = await runner(store, stages).run();

    expect(store.get(2)).toMatchObject({ status: 'Upload Failed', resultUrl: 'keep-me' });
    expect(summary.uploadFailed).toBe(1);
    expect(await readdir(root)).toEqual([]);
  });

  it('keeps going after a failed row', async () => {
    const store = new InMemoryQueueStore([{ title: 'First' }, { title: 'Second' }]);
    const stages = fakeStages(layout);
    stages.assembler.assemble.mockRejectedValueOnce(new Error('Encoder failed: exit 1'));

    const summary = await runner(store, stages).run();

    expect(store.rows.map((r) => r.status)).toEqual(['Error: Encoder failed: exit 1', 'Completed']);
    expect(summary).toMatchObject({ completed: 1, errored: 1, skipped: 0 });
  });

  it('clears the working files after a row that failed midway', async () => {
    const store = new InMemoryQueueStore([{ title: 'Test Show' }]);
    const stages = fakeStages(layout);
    stages.assembler.assemble.mockImplementation(async () => {
      await writeFile(layout.manifestPath, 'manifest');
      throw new Error('Encoder failed');
    });

    await runner(store, stages).run();

    expect(await readdir(root)).toEqual([]);
  });

  it('stops after the limit', async () => {
    const store = new InMemoryQueueStore([{ title: 'A' }, { title: 'B' }, { title: 'C' }]);
    const stages = fakeStages(layout);

    const summary = await runner(store, stages).run({ limit: 2 });

    expect(store.rows.map((r) => r.status)).toEqual(['Completed', 'Completed', '']);
    expect(summary).toMatchObject({ total: 3, completed: 2, skipped: 1 });
  });

  it('skips a row another writer claimed first', async () => {
    const store = new InMemoryQueueStore([{ title: 'Test Show' }]);
    vi.spyOn(store, 'claimRow').mockResolvedValue(false);
    const stages = fakeStages(layout);

    const summary = await runner(store, stages).run();

    expect(stages.synthesizer.synthesize).not.toHaveBeenCalled();
    expect(store.get(2).status).toBe('');
    expect(summary.outcomes).toEqual([{ rowNumber: 2, title: 'Test Show', kind: 'lost-claim' }]);
    expect(summary.skipped).toBe(1);
  });

  it('logs a status write failure and moves on to the next row', async () => {
    const store = new InMemoryQueueStore([{ title: 'First' }, { title: 'Second' }]);
    vi.spyOn(store, 'markCompleted').mockRejectedValueOnce(new Error('quota exceeded'));
    const stages = fakeStages(layout);

    const summary = await runner(store, stages).run();

    expect(mockLogger.error).toHaveBeenCalledWith(
      { status: 'Completed', error: 'quota exceeded' },
      'Could not record row status',
    );
    expect(store.get(3).status).toBe('Completed');
    expect(summary.completed).toBe(2);
  });

  it('removes stale files before reading the queue', async () => {
    await mkdir(layout.imageDir, { recursive: true });
    await writeFile(join(layout.imageDir, 'img_000.jpg'), 'old');
    await writeFile(layout.videoPath, 'old');
    const store = new InMemoryQueueStore([]);

    const summary = await runner(store, fakeStages(layout)).run();

    expect(summary.total).toBe(0);
    expect(await readdir(root)).toEqual(['video_images']);
    expect(await readdir(layout.imageDir)).toEqual([]);
  });
});
