import { mkdir } from 'fs/promises';
import { join } from 'path';
import sharp from 'sharp';
import type { Logger } from '@sheetreel/shared';
import type { ImageSearchProvider } from './providers/image-search.js';

export interface ImageCollectorOptions {
  provider: ImageSearchProvider;
  imageDir: string;
  /** Images to keep; the slideshow never has more. */
  targetCount: number;
  /** Extra candidates requested to absorb failed downloads. */
  searchMargin: number;
  width: number;
  height: number;
  downloadTimeoutMs: number;
  /** Character-class range (e.g. "ऀ-ॿ") kept in queries besides word characters. */
  scriptRange: string;
}

/** Strip everything but word characters, whitespace and the target script from a search query. */
export function sanitizeQuery(query: string, scriptRange = ''): string {
  const disallowed = new RegExp(`[^\\w\\s${scriptRange}]`, 'gu');
  return query.replace(disallowed, '').replace(/\s+/g, ' ').trim();
}

/** img_000.jpg, img_001.jpg, … — zero-padded so name order is playback order. */
export function imageFileName(index: number, targetCount: number): string {
  const width = Math.max(3, String(Math.max(targetCount - 1, 0)).length);
  return `img_${String(index).padStart(width, '0')}.jpg`;
}

export class ImageCollector {
  constructor(
    private options: ImageCollectorOptions,
    private logger: Logger,
  ) {}

  /** Download and normalize images for a title. Returns how many were saved; zero is not an error here. */
  async collect(query: string): Promise<number> {
    const { provider, imageDir, targetCount, searchMargin } = this.options;
    const cleanQuery = sanitizeQuery(query, this.options.scriptRange);

    if (!cleanQuery) {
      this.logger.warn({ query }, 'Query is empty after sanitizing; skipping image search');
      return 0;
    }

    await mkdir(imageDir, { recursive: true });
    this.logger.info({ query: cleanQuery, target: targetCount, provider: provider.name }, 'Collecting images');

    const candidates = await provider.search(cleanQuery, targetCount + searchMargin);

    let saved = 0;
    for (const candidate of candidates) {
      if (saved >= targetCount) break;

      const dest = join(imageDir, imageFileName(saved, targetCount));
      try {
        const buffer = await this.download(candidate.url);
        await this.normalize(buffer, dest);
        saved++;
        this.logger.debug({ saved, target: targetCount }, 'Image saved');
      } catch (err) {
        this.logger.debug(
          { url: candidate.url, error: err instanceof Error ? err.message : String(err) },
          'Skipping image candidate',
        );
      }
    }

    this.logger.info({ saved, candidates: candidates.length }, 'Image collection finished');
    return saved;
  }

  private async download(url: string): Promise<Buffer> {
    const res = await fetch(url, { signal: AbortSignal.timeout(this.options.downloadTimeoutMs) });
    if (!res.ok) {
      throw new Error(`HTTP ${res.status}`);
    }
    return Buffer.from(await res.arrayBuffer());
  }

  /** Flatten to RGB on black and letterbox into the target frame with Lanczos resampling. */
  private async normalize(buffer: Buffer, dest: string): Promise<void> {
    await sharp(buffer)
      .rotate()
      .flatten({ background: '#000000' })
      .resize({
        width: this.options.width,
        height: this.options.height,
        fit: 'contain',
        background: '#000000',
        kernel: 'lanczos3',
      })
      .toColourspace('srgb')
      .jpeg({ quality: 90 })
      .toFile(dest);
  }
}
