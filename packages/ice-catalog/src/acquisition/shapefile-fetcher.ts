/**
 * Shapefile part download
 *
 * A release folder `<base>/<year>/<folder>/` holds `<folder>.shp`, `.shx`,
 * `.dbf`, `.prj` and `.cpg`. Parts are fetched one at a time; a part that
 * does not answer 200 is logged, its body discarded, and skipped.
 */

import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { SHAPEFILE_PARTS } from '../core/constants.js';
import type { HTTPClient } from '../core/http-client.js';
import { logger } from '../core/utils/logger.js';
import { yearUrl } from './folder-discovery.js';

export interface ShapefileFetchResult {
  /** Local paths of the parts written to the destination */
  readonly written: readonly string[];
  /** URLs that did not answer 200 */
  readonly missing: readonly string[];
}

export function partUrl(baseUrl: string, year: number, folderName: string, extension: string): string {
  return `${yearUrl(baseUrl, year)}${folderName}/${folderName}${extension}`;
}

export class ShapefileFetcher {
  constructor(
    private readonly baseUrl: string,
    private readonly year: number,
    private readonly http: HTTPClient
  ) {}

  /**
   * Download every part of `folderName` into `destination`
   *
   * Nothing written means the folder failed; the caller decides what to do.
   */
  async fetchParts(folderName: string, destination: string): Promise<ShapefileFetchResult> {
    const written: string[] = [];
    const missing: string[] = [];

    for (const extension of SHAPEFILE_PARTS) {
      const url = partUrl(this.baseUrl, this.year, folderName, extension);
      const response = await this.http.fetch(url);

      if (response.status !== 200) {
        logger.warn('Shapefile part missing', { url, statusCode: response.status });
        // Release the connection held by the unread body
        await response.body?.cancel();
        missing.push(url);
        continue;
      }

      const localPath = join(destination, `${folderName}${extension}`);
      await writeFile(localPath, Buffer.from(await response.arrayBuffer()));
      written.push(localPath);
    }

    logger.debug('Fetched shapefile parts', {
      folder: folderName,
      written: written.length,
      missing: missing.length,
    });

    return { written, missing };
  }
}
