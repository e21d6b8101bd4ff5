import * as DDG from 'duck-duck-scrape';
import type { Logger } from '@sheetreel/shared';

export interface ImageCandidate {
  url: string;
  width?: number;
  height?: number;
  source: string;
}

export interface ImageSearchProvider {
  readonly name: string;
  search(query: string, maxResults: number): Promise<ImageCandidate[]>;
}

// ─── DuckDuckGo (Default) ───

/** Region-neutral results; the library rejects a search without a locale. */
const DDG_DEFAULT_LOCALE = 'wt-wt';

export interface DuckDuckGoImageSearchOptions {
  locale?: string;
  safeSearch?: DDG.SafeSearchType;
}

/** DuckDuckGo image search; needs no API key. One results page holds ~100 images. */
export class DuckDuckGoImageSearch implements ImageSearchProvider {
  readonly name = 'duckduckgo';

  constructor(
    private options: DuckDuckGoImageSearchOptions,
    private logger: Logger,
  ) {}

  async search(query: string, maxResults: number): Promise<ImageCandidate[]> {
    const response = await DDG.searchImages(query, {
      safeSearch: this.options.safeSearch ?? DDG.SafeSearchType.MODERATE,
      locale: this.options.locale ?? DDG_DEFAULT_LOCALE,
    });

    if (response.noResults) {
      this.logger.info({ query }, 'DuckDuckGo: no image results');
      return [];
    }

    return response.results.slice(0, maxResults).map((r) => ({
      url: r.image,
      width: r.width,
      height: r.height,
      source: r.url,
    }));
  }
}

// ─── Pexels ───

export interface PexelsImageSearchOptions {
  apiKey: string;
  orientation?: 'landscape' | 'portrait' | 'square';
}

interface PexelsPhoto {
  id: number;
  width: number;
  height: number;
  url: string;
  src: { original: string; large2x?: string; large?: string };
}

const PEXELS_MAX_PER_PAGE = 80;

export class PexelsImageSearch implements ImageSearchProvider {
  readonly name = 'pexels';

  constructor(
    private options: PexelsImageSearchOptions,
    private logger: Logger,
  ) {}

  async search(query: string, maxResults: number): Promise<ImageCandidate[]> {
    const url = new URL('https://api.pexels.com/v1/search');
    url.searchParams.set('query', query);
    url.searchParams.set('orientation', this.options.orientation ?? 'landscape');
    url.searchParams.set('per_page', String(Math.min(maxResults, PEXELS_MAX_PER_PAGE)));

    const res = await fetch(url.toString(), {
      headers: { Authorization: this.options.apiKey },
    });
    if (!res.ok) {
      throw new Error(`Pexels search error ${res.status}: ${await res.text()}`);
    }

    const data = (await res.json()) as { photos?: PexelsPhoto[] };
    const photos = data.photos ?? [];
    this.logger.debug({ query, found: photos.length }, 'Pexels: search complete');

    return photos.slice(0, maxResults).map((p) => ({
      url: p.src.large2x ?? p.src.large ?? p.src.original,
      width: p.width,
      height: p.height,
      source: p.url,
    }));
  }
}

// ─── Factory ───

export type ImageSearchProviderName = 'duckduckgo' | 'pexels';

export function createImageSearchProvider(
  provider: ImageSearchProviderName,
  settings: { pexelsApiKey?: string },
  logger: Logger,
): ImageSearchProvider {
  switch (provider) {
    case 'duckduckgo':
      return new DuckDuckGoImageSearch({}, logger);
    case 'pexels':
      return new PexelsImageSearch({ apiKey: settings.pexelsApiKey ?? '' }, logger);
  }
}
