import { readdir, stat, writeFile } from 'fs/promises';
import { resolve } from 'path';
import type { Logger } from '@sheetreel/shared';
import type { FfmpegToolkit } from './ffmpeg.js';
import { NoImagesError, RenderError } from './errors.js';

export interface VideoAssemblerOptions {
  toolkit: Pick<FfmpegToolkit, 'probeDuration' | 'renderSlideshow'>;
  imageDir: string;
  manifestPath: string;
  width: number;
  height: number;
  fps: number;
  preset: string;
}

export interface RenderResult {
  outputPath: string;
  duration: number;
  imageCount: number;
  secondsPerImage: number;
}

function quoteConcatPath(path: string): string {
  return `'${path.replace(/'/g, "'\\''")}'`;
}

/**
 * Concat-demuxer manifest giving each image an equal share of the audio.
 * The last image is listed again without a duration; the demuxer needs it
 * to close the final segment.
 */
export function buildConcatManifest(imagePaths: readonly string[], totalDuration: number): string {
  const last = imagePaths[imagePaths.length - 1];
  if (last === undefined) {
    throw new NoImagesError();
  }

  const perImage = totalDuration / imagePaths.length;
  const lines: string[] = [];
  for (const path of imagePaths) {
    lines.push(`file ${quoteConcatPath(path)}`, `duration ${perImage}`);
  }
  lines.push(`file ${quoteConcatPath(last)}`);
  return lines.join('\n') + '\n';
}

export class VideoAssembler {
  constructor(
    private options: VideoAssemblerOptions,
    private logger: Logger,
  ) {}

  /** Sorted absolute paths of the slideshow images. */
  async listImages(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.options.imageDir);
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }
    return entries
      .filter((f) => f.toLowerCase().endsWith('.jpg'))
      .sort()
      .map((f) => resolve(this.options.imageDir, f));
  }

  async assemble(audioPath: string, outputPath: string): Promise<RenderResult> {
    const images = await this.listImages();
    if (images.length === 0) {
      throw new NoImagesError();
    }

    const { toolkit, manifestPath, width, height, fps, preset } = this.options;
    const duration = await toolkit.probeDuration(audioPath);
    const secondsPerImage = duration / images.length;

    await writeFile(manifestPath, buildConcatManifest(images, duration), 'utf-8');
    this.logger.info(
      { images: images.length, duration, secondsPerImage },
      'Concat manifest written',
    );

    await toolkit.renderSlideshow({ manifestPath, audioPath, outputPath, width, height, fps, preset });

    const size = await fileSize(outputPath);
    if (size === 0) {
      throw new RenderError(`Encoder produced no output at ${outputPath}`);
    }

    this.logger.info({ outputPath, bytes: size }, 'Video rendered');
    return { outputPath, duration, imageCount: images.length, secondsPerImage };
  }
}

async function fileSize(path: string): Promise<number> {
  try {
    return (await stat(path)).size;
  } catch (err) {
    if (isMissing(err)) return 0;
    throw err;
  }
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
