import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { readdir, stat } from 'fs/promises';
import { basename, extname, join } from 'path';
import { parse as parseExif } from 'exifr';
import { getDb, type DB } from '../db/index.js';
import { DuplicateImageError } from '../errors.js';
import { formatTimestamp } from '../lib/timestamps.js';
import { insertImage } from './images.js';
import { DEFAULT_PIPELINE_VERSION, DEFAULT_RAW_EXTENSIONS } from '../../../shared/config.js';

export interface IngestOptions {
  /** Files or directories; directories are walked recursively. */
  paths: string[];
  /** Lowercase extensions including the dot, e.g. `.nef`. */
  extensions?: string[];
  pipelineVersion?: string;
}

export interface IngestStats {
  totalPaths: number;
  scanned: number;
  inserted: number;
  duplicates: number;
  invalidPaths: number;
}

export async function computeMd5(filePath: string): Promise<string> {
  const hash = createHash('md5');
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

/** EXIF DateTimeOriginal as an archive timestamp; null when absent or unreadable. */
export async function extractExifDate(filePath: string): Promise<string | null> {
  try {
    const tags: unknown = await parseExif(filePath, ['DateTimeOriginal']);
    if (typeof tags === 'object' && tags !== null && 'DateTimeOriginal' in tags) {
      const taken = tags.DateTimeOriginal;
      if (taken instanceof Date && !Number.isNaN(taken.getTime())) {
        return formatTimestamp(taken);
      }
    }
  } catch (e) {
    console.debug(`[Ingest] No EXIF date in ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return null;
}

async function* walk(dir: string): AsyncGenerator<string> {
  const entries = await readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));
  for (const entry of entries) {
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      yield* walk(full);
    } else if (entry.isFile()) {
      yield full;
    }
  }
}

async function kindOf(path: string): Promise<'file' | 'directory' | null> {
  try {
    const info = await stat(path);
    if (info.isFile()) return 'file';
    if (info.isDirectory()) return 'directory';
    return null;
  } catch {
    return null;
  }
}

export async function isDirectory(path: string): Promise<boolean> {
  return (await kindOf(path)) === 'directory';
}

/** Counts files under a folder that ingestion would pick up. */
export async function countIngestableFiles(folder: string, extensions: string[] = DEFAULT_RAW_EXTENSIONS): Promise<number> {
  if (!(await isDirectory(folder))) return 0;
  const wanted = extensions.map((e) => e.toLowerCase());
  let found = 0;
  for await (const file of walk(folder)) {
    if (wanted.includes(extname(file).toLowerCase())) found++;
  }
  return found;
}

/**
 * Registers every raw capture found under the given paths.
 * Files already in the archive (same MD5) are counted as duplicates and skipped.
 */
export async function ingestRawImages(options: IngestOptions, db: DB = getDb()): Promise<IngestStats> {
  const extensions = (options.extensions ?? DEFAULT_RAW_EXTENSIONS).map((e) => e.toLowerCase());
  const pipelineVersion = options.pipelineVersion ?? DEFAULT_PIPELINE_VERSION;
  const stats: IngestStats = {
    totalPaths: options.paths.length,
    scanned: 0,
    inserted: 0,
    duplicates: 0,
    invalidPaths: 0,
  };

  console.log(`[Ingest] Starting ingestion of ${options.paths.join(', ')}`);

  const processFile = async (filePath: string) => {
    if (!extensions.includes(extname(filePath).toLowerCase())) return;

    stats.scanned++;
    const md5Checksum = await computeMd5(filePath);
    const dateTaken = await extractExifDate(filePath);

    try {
      await insertImage(
        {
          filename: basename(filePath),
          filePath,
          md5Checksum,
          isRaw: true,
          parentImageId: null,
          dateTaken,
          orderInBatch: null,
          pipelineVersion,
          flashMissing: false,
          cropped: false,
          croppedDate: null,
          rotationDegrees: 0,
          rotatedDate: null,
          embeddedImages: 0,
        },
        db,
      );
      stats.inserted++;
    } catch (e) {
      if (!(e instanceof DuplicateImageError)) throw e;
      stats.duplicates++;
      console.warn(`[Ingest] Duplicate MD5 found for '${filePath}', skipping.`);
    }
  };

  for (const path of options.paths) {
    const kind = await kindOf(path);
    if (kind === 'file') {
      await processFile(path);
    } else if (kind === 'directory') {
      for await (const file of walk(path)) {
        await processFile(file);
      }
    } else {
      stats.invalidPaths++;
      console.error(`[Ingest] Invalid path: ${path}`);
    }
  }

  console.log(`[Ingest] Finished ingestion: ${JSON.stringify(stats)}`);
  return stats;
}
