import { createReadStream } from 'fs';
import { basename } from 'path';
import { google, type Auth, type drive_v3 } from 'googleapis';
import type { Logger } from '@sheetreel/shared';
import { UploadError } from '../errors.js';
import { attemptUpload, type UploadResult, type UploadStrategy } from './strategy.js';

export interface DriveOptions {
  auth: Auth.GoogleAuth;
  folderId: string;
}

export function driveFileUrl(fileId: string): string {
  return `https://drive.google.com/file/d/${fileId}/view`;
}

/** Upload into a Drive folder the service account can write to. */
export class DriveStrategy implements UploadStrategy {
  readonly name = 'drive';
  private drive: drive_v3.Drive;

  constructor(
    private options: DriveOptions,
    private logger: Logger,
  ) {
    this.drive = google.drive({ version: 'v3', auth: options.auth });
  }

  upload(filePath: string): Promise<UploadResult> {
    return attemptUpload(this.name, async () => {
      this.logger.info({ folderId: this.options.folderId, filePath }, 'Uploading to Google Drive');
      const res = await this.drive.files.create({
        requestBody: { name: basename(filePath), parents: [this.options.folderId] },
        media: { mimeType: 'video/mp4', body: createReadStream(filePath) },
        fields: 'id',
        supportsAllDrives: true,
      });

      const fileId = res.data.id;
      if (!fileId) {
        throw new UploadError('Drive upload succeeded but returned no file ID', this.name);
      }
      return driveFileUrl(fileId);
    });
  }
}
