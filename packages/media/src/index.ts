export { AudioSynthesizer, type AudioSynthesizerOptions } from './synthesizer.js';
export {
  ImageCollector,
  sanitizeQuery,
  imageFileName,
  type ImageCollectorOptions,
} from './image-collector.js';
export {
  VideoAssembler,
  buildConcatManifest,
  type VideoAssemblerOptions,
  type RenderResult,
} from './assembler.js';
export {
  FfmpegToolkit,
  execCommand,
  type CommandRunner,
  type CommandResult,
  type FfmpegToolkitOptions,
  type SlideshowRenderOptions,
} from './ffmpeg.js';
export { SpeechError, NoImagesError, RenderError, CommandError } from './errors.js';
export * from './providers/index.js';
