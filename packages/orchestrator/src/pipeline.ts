import type { Auth } from 'googleapis';
import { createServiceAccountAuth, type Config, type Logger } from '@sheetreel/shared';
import {
  AudioSynthesizer,
  FfmpegToolkit,
  ImageCollector,
  VideoAssembler,
  createImageSearchProvider,
  createSpeechProvider,
} from '@sheetreel/media';
import {
  DriveStrategy,
  GofileStrategy,
  PlainTextHostStrategy,
  Publisher,
  type UploadStrategy,
} from '@sheetreel/publisher';
import { SheetsQueueStore } from './sheets-store.js';
import { QueueRunner } from './runner.js';
import { Workspace, workspaceLayout } from './workspace.js';

export interface Pipeline {
  store: SheetsQueueStore;
  workspace: Workspace;
  publisher: Publisher;
  runner: QueueRunner;
}

/** Gofile first, then the plain-text host, then Drive when a folder is configured. */
export function buildUploadStrategies(config: Config, auth: Auth.GoogleAuth, logger: Logger): UploadStrategy[] {
  const strategies: UploadStrategy[] = [
    new GofileStrategy({ apiUrl: config.gofileApiUrl }, logger),
    new PlainTextHostStrategy({ url: config.secondaryUploadUrl, field: config.secondaryUploadField }, logger),
  ];
  if (config.driveFolderId) {
    strategies.push(new DriveStrategy({ auth, folderId: config.driveFolderId }, logger));
  }
  return strategies;
}

/** Wire every component from config. Nothing here touches the network. */
export function buildPipeline(config: Config, logger: Logger): Pipeline {
  const auth = createServiceAccountAuth(config.serviceAccount);
  const workspace = new Workspace(workspaceLayout(config.workDir), logger);
  const { layout } = workspace;

  const toolkit = new FfmpegToolkit({ ffmpegPath: config.ffmpegPath, ffprobePath: config.ffprobePath }, logger);

  const synthesizer = new AudioSynthesizer(
    {
      provider: createSpeechProvider(
        config.speechProvider,
        { language: config.speechLanguage, openaiApiKey: config.openaiApiKey, googleApiKey: config.googleApiKey },
        logger,
      ),
      toolkit,
      rawSpeechPath: layout.rawSpeechPath,
      speedupFactor: config.audioSpeedupFactor,
    },
    logger,
  );

  const collector = new ImageCollector(
    {
      provider: createImageSearchProvider(config.imageProvider, { pexelsApiKey: config.pexelsApiKey }, logger),
      imageDir: layout.imageDir,
      targetCount: config.imageCount,
      searchMargin: config.imageSearchMargin,
      width: config.imageWidth,
      height: config.imageHeight,
      downloadTimeoutMs: config.imageDownloadTimeoutMs,
      scriptRange: config.queryScriptRange,
    },
    logger,
  );

  const assembler = new VideoAssembler(
    {
      toolkit,
      imageDir: layout.imageDir,
      manifestPath: layout.manifestPath,
      width: config.imageWidth,
      height: config.imageHeight,
      fps: config.videoFps,
      preset: config.videoPreset,
    },
    logger,
  );

  const publisher = new Publisher(buildUploadStrategies(config, auth, logger), logger);

  const store = new SheetsQueueStore(
    { auth, spreadsheetId: config.spreadsheetId, resultUrlColumn: config.resultUrlColumn },
    logger,
  );

  const runner = new QueueRunner(
    { store, workspace, stages: { synthesizer, collector, assembler, publisher } },
    logger,
  );

  return { store, workspace, publisher, runner };
}
