import type { Logger } from '@sheetreel/shared';
import { UploadError } from './errors.js';
import type { UploadResult, UploadStrategy } from './strategies/strategy.js';

/**
 * Tries each upload strategy in order and returns the first link.
 * A later strategy is only contacted after every earlier one failed.
 * Exhausting the list is reported as `null`, never as an exception.
 */
export class Publisher {
  constructor(
    private strategies: readonly UploadStrategy[],
    private logger: Logger,
  ) {}

  get strategyNames(): string[] {
    return this.strategies.map((s) => s.name);
  }

  async publish(filePath: string): Promise<string | null> {
    for (const strategy of this.strategies) {
      const result = await this.tryStrategy(strategy, filePath);
      if (result.ok) {
        this.logger.info({ strategy: strategy.name, url: result.url }, 'Upload succeeded');
        return result.url;
      }
      this.logger.warn({ strategy: strategy.name, error: result.error.message }, 'Upload failed');
    }

    this.logger.error({ tried: this.strategyNames }, 'All upload strategies failed');
    return null;
  }

  private async tryStrategy(strategy: UploadStrategy, filePath: string): Promise<UploadResult> {
    try {
      return await strategy.upload(filePath);
    } catch (err) {
      return { ok: false, error: UploadError.from(strategy.name, err) };
    }
  }
}
