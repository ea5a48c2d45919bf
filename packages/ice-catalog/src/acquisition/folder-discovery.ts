/**
 * Release Folder Discovery
 *
 * The archive publishes one folder per release under `<base>/<year>/`,
 * named with an 8-digit date prefix (`20240101_CapeFarewell_RIC`). Two
 * sources of folder names:
 *
 * - DirectoryListingDiscovery: scrapes the archive's HTML directory listing
 * - JsonListDiscovery: reads a `{"list": [...]}` file prepared elsewhere
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { HTTPClient } from '../core/http-client.js';
import type { CalendarDate } from '../core/types.js';
import { logger } from '../core/utils/logger.js';

/**
 * Source of release folder names, in publication order
 */
export interface FolderDiscovery {
  discover(): Promise<string[]>;
}

const DATED_FOLDER = /^\d{8}/;
const ANCHOR_HREF = /<a\s[^>]*href="([^"]+)"[^>]*>/gi;

/**
 * Release date encoded in a folder name's first 8 characters
 *
 * @returns `YYYY-MM-DD`, or null if the prefix is not a real calendar day
 *
 * @example
 * ```typescript
 * extractFolderDate('20240101_CapeFarewell_RIC'); // '2024-01-01'
 * extractFolderDate('20241301_X');                // null
 * ```
 */
export function extractFolderDate(folderName: string): CalendarDate | null {
  const prefix = folderName.slice(0, 8);
  if (!/^\d{8}$/.test(prefix)) {
    return null;
  }

  const year = Number(prefix.slice(0, 4));
  const month = Number(prefix.slice(4, 6));
  const day = Number(prefix.slice(6, 8));
  const date = new Date(Date.UTC(year, month - 1, day));

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }

  return `${prefix.slice(0, 4)}-${prefix.slice(4, 6)}-${prefix.slice(6, 8)}`;
}

/**
 * Folder names linked from an HTML directory listing
 *
 * Keeps anchors whose last path segment starts with 8 digits, strips the
 * trailing slash, drops repeats, keeps listing order.
 */
export function parseDirectoryListing(html: string): string[] {
  const folders: string[] = [];
  const seen = new Set<string>();

  for (const match of html.matchAll(ANCHOR_HREF)) {
    const href = match[1].split(/[?#]/)[0];
    const segments = href.split('/').filter(segment => segment.length > 0);
    const name = segments.length > 0 ? decodeURIComponent(segments[segments.length - 1]) : '';

    if (!DATED_FOLDER.test(name) || seen.has(name)) {
      continue;
    }
    seen.add(name);
    folders.push(name);
  }

  return folders;
}

/**
 * `<base>/<year>/` with exactly one slash between parts
 */
export function yearUrl(baseUrl: string, year: number): string {
  return `${baseUrl.replace(/\/+$/, '')}/${year}/`;
}

export class DirectoryListingDiscovery implements FolderDiscovery {
  constructor(
    private readonly baseUrl: string,
    private readonly year: number,
    private readonly http: HTTPClient
  ) {}

  async discover(): Promise<string[]> {
    const url = yearUrl(this.baseUrl, this.year);
    logger.info('Fetching release directory listing', { url });

    const html = await this.http.fetchText(url);
    const folders = parseDirectoryListing(html);

    logger.info('Discovered release folders', { url, count: folders.length });
    return folders;
  }
}

const folderListSchema = z.object({
  list: z.array(z.string()),
});

export class JsonListDiscovery implements FolderDiscovery {
  constructor(private readonly path: string) {}

  async discover(): Promise<string[]> {
    const content = await readFile(this.path, 'utf-8');
    const parsed = folderListSchema.safeParse(JSON.parse(content));

    if (!parsed.success) {
      throw new Error(
        `Invalid folder list ${this.path}: ${parsed.error.issues.map(i => i.message).join('; ')}`
      );
    }

    logger.info('Loaded release folder list', { path: this.path, count: parsed.data.list.length });
    return parsed.data.list;
  }
}
