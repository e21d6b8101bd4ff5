import { mkdir, rm, stat } from 'fs/promises';
import { join, resolve } from 'path';
import type { Logger } from '@sheetreel/shared';

/** Fixed scratch paths reused by every row. */
export interface WorkspaceLayout {
  rootDir: string;
  imageDir: string;
  rawSpeechPath: string;
  audioPath: string;
  manifestPath: string;
  videoPath: string;
}

export function workspaceLayout(rootDir: string): WorkspaceLayout {
  const root = resolve(rootDir);
  return {
    rootDir: root,
    imageDir: join(root, 'video_images'),
    rawSpeechPath: join(root, 'speech_raw'),
    audioPath: join(root, 'voice.mp3'),
    manifestPath: join(root, 'list.txt'),
    videoPath: join(root, 'final_video.mp4'),
  };
}

export class Workspace {
  constructor(
    readonly layout: WorkspaceLayout,
    private logger: Logger,
  ) {}

  async prepare(): Promise<void> {
    await mkdir(this.layout.imageDir, { recursive: true });
  }

  /** Delete every per-row artifact. Returns the paths that existed. */
  async clean(): Promise<string[]> {
    const { imageDir, rawSpeechPath, audioPath, manifestPath, videoPath } = this.layout;
    const removed: string[] = [];

    for (const path of [imageDir, rawSpeechPath, audioPath, manifestPath, videoPath]) {
      if (!(await exists(path))) continue;
      await rm(path, { recursive: true, force: true });
      removed.push(path);
    }

    if (removed.length > 0) {
      this.logger.debug({ removed }, 'Workspace cleaned');
    }
    return removed;
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return false;
    throw err;
  }
}
