import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import JSZip from 'jszip';
import { logger } from '../core/utils/logger.js';

/**
 * Zip every regular file at the top level of `sourceDir` into `zipPath`
 *
 * Entries are stored flat (no folder prefix) in name order, DEFLATE
 * compressed. Overwrites an existing archive.
 *
 * @returns Number of files archived
 */
export async function zipDirectory(sourceDir: string, zipPath: string): Promise<number> {
    const entries = await readdir(sourceDir, { withFileTypes: true });
    const files = entries
        .filter(entry => entry.isFile())
        .map(entry => entry.name)
        .sort();

    const zip = new JSZip();
    for (const name of files) {
        zip.file(name, await readFile(join(sourceDir, name)));
    }

    const archive = await zip.generateAsync({
        type: 'nodebuffer',
        compression: 'DEFLATE',
        compressionOptions: { level: 6 },
    });

    await mkdir(dirname(zipPath), { recursive: true });
    await writeFile(zipPath, archive);

    logger.info('Wrote zip archive', {
        zipPath,
        fileCount: files.length,
        size: archive.length,
    });

    return files.length;
}
