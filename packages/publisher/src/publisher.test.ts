import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { Publisher } from './publisher.js';
import { UploadError } from './errors.js';
import { GofileStrategy } from './strategies/gofile.js';
import { PlainTextHostStrategy } from './strategies/plain-host.js';
import type { UploadResult, UploadStrategy } from './strategies/strategy.js';
import type { Logger } from '@sheetreel/shared';

const mockLogger: Logger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
} as unknown as Logger;

function strategy(name: string, result: UploadResult | Error) {
  const upload = vi.fn<UploadStrategy['upload']>();
  if (result instanceof Error) upload.mockRejectedValue(result);
  else upload.mockResolvedValue(result);
  return { name, upload };
}

const failed = (name: string): UploadResult => ({ ok: false, error: new UploadError('host down', name) });

describe('Publisher', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('returns the primary link without touching the secondary', async () => {
    const primary = strategy('primary', { ok: true, url: 'https://host-a.example/v/1' });
    const secondary = strategy('secondary', { ok: true, url: 'https://host-b.example/v/1' });

    const url = await new Publisher([primary, secondary], mockLogger).publish('/work/final_video.mp4');

    expect(url).toBe('https://host-a.example/v/1');
    expect(primary.upload).toHaveBeenCalledWith('/work/final_video.mp4');
    expect(secondary.upload).not.toHaveBeenCalled();
  });

  it('tries the secondary when the primary fails', async () => {
    const primary = strategy('primary', failed('primary'));
    const secondary = strategy('secondary', { ok: true, url: 'https://host-b.example/v/1' });

    expect(await new Publisher([primary, secondary], mockLogger).publish('/work/v.mp4')).toBe(
      'https://host-b.example/v/1',
    );
    expect(secondary.upload).toHaveBeenCalledTimes(1);
  });

  it('treats a strategy that throws as a failure', async () => {
    const primary = strategy('primary', new Error('unexpected'));
    const secondary = strategy('secondary', { ok: true, url: 'https://host-b.example/v/1' });

    expect(await new Publisher([primary, secondary], mockLogger).publish('/work/v.mp4')).toBe(
      'https://host-b.example/v/1',
    );
    expect(mockLogger.warn).toHaveBeenCalledWith({ strategy: 'primary', error: 'unexpected' }, 'Upload failed');
  });

  it('returns null when every strategy fails', async () => {
    const publisher = new Publisher(
      [strategy('primary', failed('primary')), strategy('secondary', new Error('boom'))],
      mockLogger,
    );

    await expect(publisher.publish('/work/v.mp4')).resolves.toBeNull();
    expect(mockLogger.error).toHaveBeenCalledWith(
      { tried: ['primary', 'secondary'] },
      'All upload strategies failed',
    );
  });

  it('returns null with no strategies', async () => {
    expect(await new Publisher([], mockLogger).publish('/work/v.mp4')).toBeNull();
  });
});

describe('Publisher with the Gofile and plain-text hosts', () => {
  let dir: string;
  let videoPath: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    dir = await mkdtemp(join(tmpdir(), 'sheetreel-publish-'));
    videoPath = join(dir, 'final_video.mp4');
    await writeFile(videoPath, 'mp4-data');
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await rm(dir, { recursive: true, force: true });
  });

  function publisher() {
    return new Publisher(
      [
        new GofileStrategy({ apiUrl: 'https://api.gofile.io' }, mockLogger),
        new PlainTextHostStrategy({ url: 'https://0x0.st', field: 'file' }, mockLogger),
      ],
      mockLogger,
    );
  }

  function hostsContacted(calls: ReadonlyArray<readonly [string | URL | Request, ...unknown[]]>): string[] {
    return calls.map(([input]) => new URL(String(input)).host);
  }

  it('never contacts the secondary host when the primary succeeds', async () => {
    const mockFetch = vi.fn(async (input: string | URL | Request) => {
      const url = String(input);
      if (url.endsWith('/getServer')) {
        return Response.json({ status: 'ok', data: { server: 'store1' } });
      }
      return Response.json({ status: 'ok', data: { downloadPage: 'https://gofile.io/d/Zz9' } });
    });
    vi.stubGlobal('fetch', mockFetch);

    expect(await publisher().publish(videoPath)).toBe('https://gofile.io/d/Zz9');
    expect(hostsContacted(mockFetch.mock.calls)).toEqual(['api.gofile.io', 'store1.gofile.io']);
  });

  it('contacts the secondary host once the primary fails', async () => {
    const mockFetch = vi.fn(async (input: string | URL | Request) => {
      const url = String(input);
      if (url.endsWith('/getServer')) {
        return new Response('service unavailable', { status: 503 });
      }
      return new Response('https://0x0.st/Q1.mp4\n', { status: 200 });
    });
    vi.stubGlobal('fetch', mockFetch);

    expect(await publisher().publish(videoPath)).toBe('https://0x0.st/Q1.mp4');
    expect(hostsContacted(mockFetch.mock.calls)).toEqual(['api.gofile.io', '0x0.st']);
  });
});
