import { z } from 'zod';
import type { Logger } from '@sheetreel/shared';
import { UploadError } from '../errors.js';
import { attemptUpload, fileForm, type UploadResult, type UploadStrategy } from './strategy.js';

export interface GofileOptions {
  /** Base of the server-selection endpoint, e.g. https://api.gofile.io */
  apiUrl: string;
  /** Upload hosts live at https://{server}.{uploadDomain}/uploadFile */
  uploadDomain?: string;
}

const serverResponseSchema = z.object({
  status: z.string(),
  data: z
    .object({
      server: z.string().optional(),
      serversAllZone: z.array(z.object({ name: z.string() })).optional(),
    })
    .optional(),
});

const uploadResponseSchema = z.object({
  status: z.string(),
  data: z.object({ downloadPage: z.string().optional() }).optional(),
});

/** Two-step Gofile upload: ask for a server, then post the file to it. */
export class GofileStrategy implements UploadStrategy {
  readonly name = 'gofile';
  private uploadDomain: string;

  constructor(
    private options: GofileOptions,
    private logger: Logger,
  ) {
    this.uploadDomain = options.uploadDomain ?? 'gofile.io';
  }

  upload(filePath: string): Promise<UploadResult> {
    return attemptUpload(this.name, async () => {
      const server = await this.pickServer();
      return this.send(server, filePath);
    });
  }

  /** The advertised server, or the first zone server when the API reports a non-ok status. */
  async pickServer(): Promise<string> {
    const res = await fetch(`${this.options.apiUrl.replace(/\/+$/, '')}/getServer`);
    if (!res.ok) {
      throw new UploadError(`getServer failed with HTTP ${res.status}`, this.name);
    }

    const parsed = serverResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new UploadError('getServer returned an unexpected body', this.name);
    }

    const { status, data } = parsed.data;
    if (status === 'ok' && data?.server) {
      return data.server;
    }

    const fallback = data?.serversAllZone?.[0]?.name;
    if (!fallback) {
      throw new UploadError(`getServer status "${status}" and no alternate server`, this.name);
    }
    this.logger.warn({ status, server: fallback }, 'Gofile server lookup not ok, using zone server');
    return fallback;
  }

  private async send(server: string, filePath: string): Promise<string> {
    const endpoint = `https://${server}.${this.uploadDomain}/uploadFile`;
    this.logger.info({ server, filePath }, 'Uploading to Gofile');

    const res = await fetch(endpoint, { method: 'POST', body: await fileForm(filePath, 'file') });
    if (!res.ok) {
      throw new UploadError(`Upload to ${server} failed with HTTP ${res.status}`, this.name);
    }

    const parsed = uploadResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new UploadError('Upload returned an unexpected body', this.name);
    }
    const { status, data } = parsed.data;
    if (status !== 'ok' || !data?.downloadPage) {
      throw new UploadError(`Upload status "${status}" without a download page`, this.name);
    }
    return data.downloadPage;
  }
}
