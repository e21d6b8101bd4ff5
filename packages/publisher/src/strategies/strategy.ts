import { readFile } from 'fs/promises';
import { basename } from 'path';
import { UploadError } from '../errors.js';

export type UploadResult =
  | { ok: true; url: string }
  | { ok: false; error: UploadError };

export interface UploadStrategy {
  readonly name: string;
  upload(filePath: string): Promise<UploadResult>;
}

/** Run an attempt and fold whatever it throws into a failed result. */
export async function attemptUpload(
  strategy: string,
  send: () => Promise<string>,
): Promise<UploadResult> {
  try {
    const url = (await send()).trim();
    if (!url) {
      return { ok: false, error: new UploadError('Host returned an empty link', strategy) };
    }
    return { ok: true, url };
  } catch (err) {
    return { ok: false, error: UploadError.from(strategy, err) };
  }
}

/** Multipart body carrying the file under `field`, named after its basename. */
export async function fileForm(filePath: string, field: string): Promise<FormData> {
  const form = new FormData();
  form.append(field, new Blob([await readFile(filePath)], { type: 'video/mp4' }), basename(filePath));
  return form;
}
