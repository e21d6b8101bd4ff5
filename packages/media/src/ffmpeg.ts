/**
 * FFmpeg/FFprobe operations used by the pipeline: duration probing, tempo
 * change for the narration, and slideshow rendering from a concat manifest.
 *
 * Every command goes through a CommandRunner so tests can stand in for the
 * executables. All methods throw on non-zero exit.
 */
import { execFile } from 'child_process';
import type { Logger } from '@sheetreel/shared';
import { CommandError, RenderError } from './errors.js';

// ── Command runner ─────────────────────────────────────────────────────────────

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (command: string, args: string[]) => Promise<CommandResult>;

const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

export const execCommand: CommandRunner = (command, args) =>
  new Promise((resolve, reject) => {
    execFile(command, args, { maxBuffer: MAX_OUTPUT_BYTES }, (err, stdout, stderr) => {
      if (err) {
        const exitCode = typeof err.code === 'number' ? err.code : null;
        const lastLine = String(stderr).trim().split('\n').pop() ?? '';
        reject(new CommandError(lastLine || err.message, command, exitCode, String(stderr)));
        return;
      }
      resolve({ stdout: String(stdout), stderr: String(stderr) });
    });
  });

// ── Toolkit ────────────────────────────────────────────────────────────────────

export interface FfmpegToolkitOptions {
  ffmpegPath?: string;
  ffprobePath?: string;
  runner?: CommandRunner;
}

export interface SlideshowRenderOptions {
  manifestPath: string;
  audioPath: string;
  outputPath: string;
  width: number;
  height: number;
  fps: number;
  preset: string;
}

export class FfmpegToolkit {
  private ffmpegPath: string;
  private ffprobePath: string;
  private run: CommandRunner;

  constructor(
    options: FfmpegToolkitOptions,
    private logger: Logger,
  ) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.ffprobePath = options.ffprobePath ?? 'ffprobe';
    this.run = options.runner ?? execCommand;
  }

  /** Duration of a media file in seconds, as reported by the container. */
  async probeDuration(filePath: string): Promise<number> {
    const args = ['-v', 'error', '-show_entries', 'format=duration', '-of', 'default=noprint_wrappers=1:nokey=1', filePath];
    this.logger.debug({ args }, 'FFprobe: probing duration');

    let stdout: string;
    try {
      ({ stdout } = await this.run(this.ffprobePath, args));
    } catch (err) {
      throw new RenderError(`Could not probe ${filePath}: ${messageOf(err)}`, { cause: err });
    }

    const duration = parseFloat(stdout.trim());
    if (!Number.isFinite(duration) || duration <= 0) {
      throw new RenderError(`Unusable duration "${stdout.trim()}" for ${filePath}`);
    }
    return duration;
  }

  /**
   * Re-encode audio at a different playback speed without changing pitch.
   * inputArgs describe raw input formats (e.g. PCM) that ffmpeg cannot sniff.
   */
  async changeTempo(
    inputPath: string,
    outputPath: string,
    factor: number,
    inputArgs: readonly string[] = [],
  ): Promise<void> {
    const args = ['-y', ...inputArgs, '-i', inputPath, '-filter:a', `atempo=${factor}`, '-vn', outputPath];
    this.logger.debug({ args }, 'FFmpeg: changing tempo');
    await this.run(this.ffmpegPath, args);
  }

  async renderSlideshow(options: SlideshowRenderOptions): Promise<void> {
    const { width, height } = options;
    const filter =
      `scale=${width}:${height}:force_original_aspect_ratio=decrease,` +
      `pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2,format=yuv420p`;

    const args = [
      '-y',
      '-f', 'concat', '-safe', '0', '-i', options.manifestPath,
      '-i', options.audioPath,
      '-c:v', 'libx264', '-preset', options.preset, '-tune', 'stillimage',
      '-vf', filter,
      '-r', String(options.fps),
      '-c:a', 'aac',
      '-shortest',
      options.outputPath,
    ];

    this.logger.info({ outputPath: options.outputPath }, 'FFmpeg: rendering slideshow');
    try {
      await this.run(this.ffmpegPath, args);
    } catch (err) {
      throw new RenderError(`Encoder failed: ${messageOf(err)}`, { cause: err });
    }
  }
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
