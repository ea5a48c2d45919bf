/**
 * Per-folder processing: download, repackage, convert, envelope
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Polygon } from 'geojson';
import type { ShapefileFetcher } from '../acquisition/shapefile-fetcher.js';
import { envelopeOf } from '../catalog/envelope.js';
import { ConversionError } from '../core/errors.js';
import { HTTPError, HTTPNetworkError, HTTPTimeoutError } from '../core/http-client.js';
import { logger } from '../core/utils/logger.js';
import { convertShapefileToFlatGeobuf } from '../transformation/shapefile-to-flatgeobuf.js';
import { zipDirectory } from '../transformation/zip-archiver.js';

/**
 * Result of processing one release folder
 */
export type FolderOutcome =
  | { readonly status: 'processed'; readonly envelope: Polygon }
  | { readonly status: 'failed'; readonly reason: string };

export interface FolderProcessor {
  /**
   * Produce `<zipDir>/<folder>.zip` and `<fgbDir>/<folder>.fgb` and return
   * the envelope of the folder's features
   */
  process(folderName: string): Promise<FolderOutcome>;
}

export interface ShapefileFolderProcessorOptions {
  readonly fetcher: ShapefileFetcher;
  readonly zipDir: string;
  readonly flatgeobufDir: string;
}

function isDownloadError(error: unknown): error is Error {
  return (
    error instanceof HTTPError ||
    error instanceof HTTPTimeoutError ||
    error instanceof HTTPNetworkError
  );
}

export class ShapefileFolderProcessor implements FolderProcessor {
  constructor(private readonly options: ShapefileFolderProcessorOptions) {}

  async process(folderName: string): Promise<FolderOutcome> {
    const workDir = await mkdtemp(join(tmpdir(), `ice-catalog-${folderName}-`));

    try {
      const { written } = await this.options.fetcher.fetchParts(folderName, workDir);
      if (written.length === 0) {
        return { status: 'failed', reason: 'download failed' };
      }

      await zipDirectory(workDir, join(this.options.zipDir, `${folderName}.zip`));

      const converted = await convertShapefileToFlatGeobuf(
        join(workDir, `${folderName}.shp`),
        join(this.options.flatgeobufDir, `${folderName}.fgb`)
      );
      if (!converted) {
        return { status: 'failed', reason: 'no .shp file' };
      }
      if (converted.geometries.length === 0) {
        return { status: 'failed', reason: 'shapefile has no geometries' };
      }

      return { status: 'processed', envelope: envelopeOf(converted.geometries) };
    } catch (error) {
      if (isDownloadError(error) || error instanceof ConversionError) {
        logger.error('Folder processing failed', { folder: folderName, error: error.message });
        return { status: 'failed', reason: error.message };
      }
      throw error;
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }
}
