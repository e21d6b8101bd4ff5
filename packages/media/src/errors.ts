/** Speech could not be produced for a row's script. */
export class SpeechError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SpeechError';
  }
}

/** The image search left nothing to build a slideshow from. */
export class NoImagesError extends Error {
  constructor(message = 'No images found for this title') {
    super(message);
    this.name = 'NoImagesError';
  }
}

/** Probing or encoding failed, or the encoder left no usable output. */
export class RenderError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RenderError';
  }
}

/** An external command exited non-zero or could not be started. */
export class CommandError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode: number | null,
    public readonly stderr: string,
  ) {
    super(message);
    this.name = 'CommandError';
  }
}
