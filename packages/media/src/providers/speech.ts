import { writeFile } from 'fs/promises';
import * as googleTTS from 'google-tts-api';
import { GoogleGenAI, Modality } from '@google/genai';
import { withRetry, type Logger, type RetryOptions } from '@sheetreel/shared';
import { SpeechError } from '../errors.js';

/** A speech file on disk plus the ffmpeg input arguments needed to read it. */
export interface SpeechClip {
  path: string;
  inputArgs: string[];
}

export interface SpeechProvider {
  readonly name: string;
  synthesize(text: string, outputPath: string): Promise<SpeechClip>;
}

// ─── Google Translate TTS (Default) ───

export interface GoogleTranslateSpeechOptions {
  /** Spoken language, e.g. "hi" or "en". */
  language: string;
  host?: string;
  timeoutMs?: number;
  retry?: RetryOptions;
}

/** Free Google Translate voice. The library splits long text into ≤200-char chunks;
 * the MP3 chunks are concatenated into one file. */
export class GoogleTranslateSpeechProvider implements SpeechProvider {
  readonly name = 'google-translate';

  constructor(
    private options: GoogleTranslateSpeechOptions,
    private logger: Logger,
  ) {}

  async synthesize(text: string, outputPath: string): Promise<SpeechClip> {
    const chunks = await withRetry(
      () =>
        googleTTS.getAllAudioBase64(text, {
          lang: this.options.language,
          slow: false,
          host: this.options.host ?? 'https://translate.google.com',
          timeout: this.options.timeoutMs ?? 10_000,
          splitPunct: ',.?।',
        }),
      this.logger,
      'google-translate-tts',
      this.options.retry,
    );

    if (chunks.length === 0) {
      throw new SpeechError('Speech service returned no audio');
    }

    const audio = Buffer.concat(chunks.map((c) => Buffer.from(c.base64, 'base64')));
    await writeFile(outputPath, audio);

    this.logger.debug({ chunks: chunks.length, bytes: audio.length }, 'Speech written');
    return { path: outputPath, inputArgs: [] };
  }
}

// ─── OpenAI TTS ───

export const OPENAI_VOICES = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'] as const;
export type OpenAIVoiceId = (typeof OPENAI_VOICES)[number];

/** OpenAI TTS has no language parameter; it speaks the language of the input text. */
export interface OpenAISpeechOptions {
  apiKey: string;
  model?: 'tts-1' | 'tts-1-hd';
  voice?: OpenAIVoiceId;
  retry?: RetryOptions;
}

export class OpenAISpeechProvider implements SpeechProvider {
  readonly name = 'openai';
  private model: 'tts-1' | 'tts-1-hd';
  private voice: OpenAIVoiceId;

  constructor(
    private options: OpenAISpeechOptions,
    private logger: Logger,
  ) {
    this.model = options.model ?? 'tts-1';
    this.voice = options.voice ?? 'nova';
  }

  async synthesize(text: string, outputPath: string): Promise<SpeechClip> {
    const buffer = await withRetry(
      async () => {
        const response = await fetch('https://api.openai.com/v1/audio/speech', {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${this.options.apiKey}`,
          },
          body: JSON.stringify({
            model: this.model,
            input: text,
            voice: this.voice,
            response_format: 'mp3',
          }),
        });

        if (!response.ok) {
          const body = await response.text();
          throw new SpeechError(`OpenAI TTS API error ${response.status}: ${body}`);
        }

        return Buffer.from(await response.arrayBuffer());
      },
      this.logger,
      'openai-tts',
      this.options.retry,
    );

    await writeFile(outputPath, buffer);
    return { path: outputPath, inputArgs: [] };
  }
}

// ─── Google Gemini TTS ───

export interface GeminiSpeechOptions {
  apiKey: string;
  /** BCP-47 code, e.g. "hi" or "en-US"; Gemini detects the language when unset. */
  languageCode?: string;
  model?: string;
  voiceName?: string;
  retry?: RetryOptions;
}

/** Gemini returns raw 16-bit little-endian PCM at 24 kHz, mono. */
const GEMINI_PCM_INPUT = ['-f', 's16le', '-ar', '24000', '-ac', '1'];

export class GeminiSpeechProvider implements SpeechProvider {
  readonly name = 'gemini';
  private client: GoogleGenAI;
  private model: string;
  private voiceName: string;

  constructor(
    private options: GeminiSpeechOptions,
    private logger: Logger,
  ) {
    this.client = new GoogleGenAI({ apiKey: options.apiKey });
    this.model = options.model ?? 'gemini-2.5-flash-preview-tts';
    this.voiceName = options.voiceName ?? 'Kore';
  }

  async synthesize(text: string, outputPath: string): Promise<SpeechClip> {
    const response = await withRetry(
      () =>
        this.client.models.generateContent({
          model: this.model,
          contents: [{ parts: [{ text }] }],
          config: {
            responseModalities: [Modality.AUDIO],
            speechConfig: {
              ...(this.options.languageCode ? { languageCode: this.options.languageCode } : {}),
              voiceConfig: { prebuiltVoiceConfig: { voiceName: this.voiceName } },
            },
          },
        }),
      this.logger,
      'gemini-tts',
      this.options.retry,
    );

    const data = response.candidates?.[0]?.content?.parts?.find((p) => p.inlineData?.data)?.inlineData?.data;
    if (!data) {
      throw new SpeechError('Gemini TTS response contains no audio data');
    }

    await writeFile(outputPath, Buffer.from(data, 'base64'));
    return { path: outputPath, inputArgs: [...GEMINI_PCM_INPUT] };
  }
}

// ─── Factory ───

export type SpeechProviderName = 'google-translate' | 'openai' | 'gemini';

export interface SpeechProviderSettings {
  language: string;
  openaiApiKey?: string;
  googleApiKey?: string;
}

export function createSpeechProvider(
  provider: SpeechProviderName,
  settings: SpeechProviderSettings,
  logger: Logger,
): SpeechProvider {
  switch (provider) {
    case 'google-translate':
      return new GoogleTranslateSpeechProvider({ language: settings.language }, logger);
    case 'openai':
      return new OpenAISpeechProvider({ apiKey: settings.openaiApiKey ?? '' }, logger);
    case 'gemini':
      return new GeminiSpeechProvider(
        { apiKey: settings.googleApiKey ?? '', languageCode: settings.language },
        logger,
      );
  }
}
