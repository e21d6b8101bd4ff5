import type { Logger } from '@sheetreel/shared';
import { UploadError } from '../errors.js';
import { attemptUpload, fileForm, type UploadResult, type UploadStrategy } from './strategy.js';

export interface PlainTextHostOptions {
  url: string;
  field: string;
}

/** Hosts like 0x0.st that answer a multipart POST with the link as the response body. */
export class PlainTextHostStrategy implements UploadStrategy {
  readonly name = 'plain-host';

  constructor(
    private options: PlainTextHostOptions,
    private logger: Logger,
  ) {}

  upload(filePath: string): Promise<UploadResult> {
    return attemptUpload(this.name, async () => {
      this.logger.info({ host: this.options.url, filePath }, 'Uploading to secondary host');
      const res = await fetch(this.options.url, {
        method: 'POST',
        body: await fileForm(filePath, this.options.field),
      });

      if (res.status !== 200) {
        const body = await res.text();
        throw new UploadError(`HTTP ${res.status}: ${body.trim().slice(0, 200)}`, this.name);
      }
      return res.text();
    });
  }
}
