import { rm } from 'fs/promises';
import type { Logger } from '@sheetreel/shared';
import type { SpeechProvider } from './providers/speech.js';
import type { FfmpegToolkit } from './ffmpeg.js';
import { SpeechError } from './errors.js';

export interface AudioSynthesizerOptions {
  provider: SpeechProvider;
  toolkit: Pick<FfmpegToolkit, 'changeTempo'>;
  /** Where the provider's raw speech lands before the tempo change. */
  rawSpeechPath: string;
  /** Playback multiplier applied to the narration; must be > 1. */
  speedupFactor: number;
}

/** Script → narration track, sped up by a fixed factor to keep videos short. */
export class AudioSynthesizer {
  constructor(
    private options: AudioSynthesizerOptions,
    private logger: Logger,
  ) {
    if (!(options.speedupFactor > 1)) {
      throw new RangeError(`speedupFactor must be greater than 1, got ${options.speedupFactor}`);
    }
  }

  async synthesize(script: string, outputPath: string): Promise<string> {
    const text = script.trim();
    if (!text) {
      throw new SpeechError('Script is empty');
    }

    const { provider, toolkit, rawSpeechPath, speedupFactor } = this.options;
    this.logger.info(
      { provider: provider.name, characters: text.length, speed: speedupFactor },
      'Generating narration',
    );

    try {
      const clip = await provider.synthesize(text, rawSpeechPath);
      await toolkit.changeTempo(clip.path, outputPath, speedupFactor, clip.inputArgs);
    } finally {
      await rm(rawSpeechPath, { force: true });
    }

    return outputPath;
  }
}
