/** One upload strategy could not produce a link. */
export class UploadError extends Error {
  constructor(
    message: string,
    public readonly strategy: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'UploadError';
  }

  static from(strategy: string, err: unknown): UploadError {
    if (err instanceof UploadError) return err;
    const message = err instanceof Error ? err.message : String(err);
    return new UploadError(message, strategy, { cause: err });
  }
}
