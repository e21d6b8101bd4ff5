import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { resolve } from 'path';
import { LOG_LEVELS } from './logger.js';

dotenvConfig({ path: resolve(process.cwd(), '.env') });

// ─── Service Account ───

export const serviceAccountSchema = z
  .object({
    client_email: z.string().email(),
    private_key: z.string().min(1),
    project_id: z.string().optional(),
  })
  .passthrough();

export type ServiceAccountCredentials = z.infer<typeof serviceAccountSchema>;

/** The credential arrives as one JSON string in an env var. */
const serviceAccountJson = z.string().min(1).transform((raw, ctx) => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be valid JSON' });
    return z.NEVER;
  }
  const result = serviceAccountSchema.safeParse(parsed);
  if (!result.success) {
    for (const issue of result.error.issues) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${issue.path.join('.')}: ${issue.message}` });
    }
    return z.NEVER;
  }
  return result.data;
});

// ─── Schema ───

const configSchema = z
  .object({
    // Google (Sheets queue, Drive upload)
    serviceAccount: serviceAccountJson,
    spreadsheetId: z.string().min(1),
    resultUrlColumn: z.string().min(1).default('Result URL'),

    // Speech
    speechProvider: z.enum(['google-translate', 'openai', 'gemini']).default('google-translate'),
    speechLanguage: z.string().min(2).default('hi'),
    openaiApiKey: z.string().default(''),
    googleApiKey: z.string().default(''),
    audioSpeedupFactor: z.coerce.number().gt(1).lte(4).default(1.25),

    // Images
    imageProvider: z.enum(['duckduckgo', 'pexels']).default('duckduckgo'),
    pexelsApiKey: z.string().default(''),
    imageCount: z.coerce.number().int().positive().default(20),
    imageSearchMargin: z.coerce.number().int().nonnegative().default(10),
    imageWidth: z.coerce.number().int().positive().default(1920),
    imageHeight: z.coerce.number().int().positive().default(1080),
    imageDownloadTimeoutMs: z.coerce.number().int().positive().default(10_000),
    queryScriptRange: z.string().default('ऀ-ॿ'),

    // Rendering
    videoFps: z.coerce.number().int().positive().default(24),
    videoPreset: z.string().default('ultrafast'),
    ffmpegPath: z.string().default('ffmpeg'),
    ffprobePath: z.string().default('ffprobe'),
    workDir: z.string().default(process.cwd()),

    // Upload hosts
    gofileApiUrl: z.string().url().default('https://api.gofile.io'),
    secondaryUploadUrl: z.string().url().default('https://0x0.st'),
    secondaryUploadField: z.string().min(1).default('file'),
    driveFolderId: z.string().optional(),

    // Logging
    logLevel: z.enum(LOG_LEVELS).default('info'),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.speechProvider === 'openai' && !cfg.openaiApiKey) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['openaiApiKey'], message: 'required when SPEECH_PROVIDER=openai' });
    }
    if (cfg.speechProvider === 'gemini' && !cfg.googleApiKey) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['googleApiKey'], message: 'required when SPEECH_PROVIDER=gemini' });
    }
    if (cfg.imageProvider === 'pexels' && !cfg.pexelsApiKey) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['pexelsApiKey'], message: 'required when IMAGE_PROVIDER=pexels' });
    }
  });

export type Config = z.infer<typeof configSchema>;

/** Empty strings count as unset so that `FOO=` in .env falls back to the default. */
function read(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value.trim() === '' ? undefined : value;
}

export function parseConfig(env: NodeJS.ProcessEnv): Config {
  const result = configSchema.safeParse({
    serviceAccount: read(env, 'GCP_SERVICE_ACCOUNT'),
    spreadsheetId: read(env, 'SPREADSHEET_ID'),
    resultUrlColumn: read(env, 'RESULT_URL_COLUMN'),
    speechProvider: read(env, 'SPEECH_PROVIDER'),
    speechLanguage: read(env, 'SPEECH_LANGUAGE'),
    openaiApiKey: read(env, 'OPENAI_API_KEY'),
    googleApiKey: read(env, 'GOOGLE_API_KEY'),
    audioSpeedupFactor: read(env, 'AUDIO_SPEEDUP_FACTOR'),
    imageProvider: read(env, 'IMAGE_PROVIDER'),
    pexelsApiKey: read(env, 'PEXELS_API_KEY'),
    imageCount: read(env, 'IMAGE_COUNT'),
    imageSearchMargin: read(env, 'IMAGE_SEARCH_MARGIN'),
    imageWidth: read(env, 'IMAGE_WIDTH'),
    imageHeight: read(env, 'IMAGE_HEIGHT'),
    imageDownloadTimeoutMs: read(env, 'IMAGE_DOWNLOAD_TIMEOUT_MS'),
    queryScriptRange: read(env, 'QUERY_SCRIPT_RANGE'),
    videoFps: read(env, 'VIDEO_FPS'),
    videoPreset: read(env, 'VIDEO_PRESET'),
    ffmpegPath: read(env, 'FFMPEG_PATH'),
    ffprobePath: read(env, 'FFPROBE_PATH'),
    workDir: read(env, 'WORK_DIR'),
    gofileApiUrl: read(env, 'GOFILE_API_URL'),
    secondaryUploadUrl: read(env, 'SECONDARY_UPLOAD_URL'),
    secondaryUploadField: read(env, 'SECONDARY_UPLOAD_FIELD'),
    driveFolderId: read(env, 'DRIVE_FOLDER_ID'),
    logLevel: read(env, 'LOG_LEVEL'),
  });

  if (!result.success) {
    const errors = result.error.flatten().fieldErrors;
    const missing = Object.entries(errors)
      .map(([k, v]) => `  ${k}: ${v?.join(', ')}`)
      .join('\n');
    throw new Error(`Invalid configuration:\n${missing}`);
  }

  return result.data;
}

let cachedConfig: Config | null = null;

export function loadConfig(): Config {
  if (cachedConfig) return cachedConfig;
  cachedConfig = parseConfig(process.env);
  return cachedConfig;
}
