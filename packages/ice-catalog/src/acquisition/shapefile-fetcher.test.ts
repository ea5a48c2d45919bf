import { describe, it, expect, vi, afterEach, beforeEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ShapefileFetcher, partUrl } from './shapefile-fetcher.js';
import { HTTPClient, HTTPNetworkError } from '../core/http-client.js';

const BASE = 'https://archive.test/SIGRID3/';

describe('partUrl', () => {
  it('builds <base>/<year>/<folder>/<folder><ext>', () => {
    expect(partUrl(BASE, 2024, '20240101_A', '.shp')).toBe(
      'https://archive.test/SIGRID3/2024/20240101_A/20240101_A.shp'
    );
  });
});

describe('ShapefileFetcher', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ice-catalog-fetch-'));
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await rm(dir, { recursive: true, force: true });
  });

  it('writes every served part and records the missing ones', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async (url: string) =>
        url.endsWith('.cpg')
          ? new Response('', { status: 404 })
          : new Response(`bytes of ${url.slice(url.lastIndexOf('/') + 1)}`, { status: 200 })
      )
    );

    const fetcher = new ShapefileFetcher(BASE, 2024, new HTTPClient());
    const result = await fetcher.fetchParts('20240101_A', dir);

    expect(result.written).toEqual([
      join(dir, '20240101_A.shp'),
      join(dir, '20240101_A.shx'),
      join(dir, '20240101_A.dbf'),
      join(dir, '20240101_A.prj'),
    ]);
    expect(result.missing).toEqual(['https://archive.test/SIGRID3/2024/20240101_A/20240101_A.cpg']);
    await expect(readFile(join(dir, '20240101_A.dbf'), 'utf-8')).resolves.toBe('bytes of 20240101_A.dbf');
  });

  it('writes nothing when the folder is gone', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('', { status: 404 })));

    const result = await new ShapefileFetcher(BASE, 2024, new HTTPClient()).fetchParts('20240101_A', dir);

    expect(result.written).toEqual([]);
    expect(result.missing).toHaveLength(5);
  });

  it('discards the body of every missing part', async () => {
    const cancelled: string[] = [];
    vi.stubGlobal(
      'fetch',
      vi.fn(async (url: string) =>
        url.endsWith('.prj') || url.endsWith('.cpg')
          ? new Response(
              new ReadableStream<Uint8Array>({
                cancel() {
                  cancelled.push(url.slice(url.lastIndexOf('.')));
                },
              }),
              { status: 404 }
            )
          : new Response('part', { status: 200 })
      )
    );

    const result = await new ShapefileFetcher(BASE, 2024, new HTTPClient()).fetchParts('20240101_A', dir);

    expect(result.written).toHaveLength(3);
    expect(cancelled).toEqual(['.prj', '.cpg']);
  });

  it('propagates network failures', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      })
    );

    await expect(
      new ShapefileFetcher(BASE, 2024, new HTTPClient()).fetchParts('20240101_A', dir)
    ).rejects.toThrow(HTTPNetworkError);
  });
});
