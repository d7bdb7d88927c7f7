import { and, asc, count, eq, gte, lte, sql, type SQL } from 'drizzle-orm';
import { getDb, type DB } from '../db/index.js';
import { images, type ImageRecord } from '../db/schema.js';
import { DuplicateImageError, NotFoundError, ValidationError, toArchiveError } from '../errors.js';
import { formatTimestamp, toRangeBound } from '../lib/timestamps.js';
import type { ImageEdit, NewImageInput } from '../validation.js';

export interface ImageFilters {
  filename?: string;
  dateFrom?: string;
  dateTo?: string;
  isRaw?: boolean;
  cropped?: boolean;
  rotated?: boolean;
}

export interface PageRequest {
  page: number;
  perPage: number;
}

export interface ImagePage {
  images: ImageRecord[];
  page: number;
  perPage: number;
  totalCount: number;
  totalPages: number;
}

export interface ImageTotals {
  total: number;
  raw: number;
  processed: number;
}

export function hasActiveFilters(filters: ImageFilters): boolean {
  return Object.values(filters).some((v) => v !== undefined);
}

/** Escapes LIKE wildcards so the filename filter is a plain substring match. */
export function likeSubstring(text: string): string {
  return `%${text.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
}

function buildWhere(filters: ImageFilters): SQL | undefined {
  const rotation = sql`coalesce(${images.rotationDegrees}, 0) % 360`;

  return and(
    filters.filename !== undefined
      ? sql`${images.filename} like ${likeSubstring(filters.filename)} escape '\\'`
      : undefined,
    filters.dateFrom !== undefined ? gte(images.dateTaken, toRangeBound(filters.dateFrom, 'from')) : undefined,
    filters.dateTo !== undefined ? lte(images.dateTaken, toRangeBound(filters.dateTo, 'to')) : undefined,
    filters.isRaw !== undefined ? eq(images.isRaw, filters.isRaw) : undefined,
    filters.cropped !== undefined ? eq(images.cropped, filters.cropped) : undefined,
    filters.rotated === true ? sql`${rotation} != 0` : undefined,
    filters.rotated === false ? sql`${rotation} = 0` : undefined,
  );
}

/**
 * One page of images matching every given filter, ordered by id.
 * Pages past the end come back empty.
 */
export async function listImages(filters: ImageFilters, pageRequest: PageRequest, db: DB = getDb()): Promise<ImagePage> {
  const { page, perPage } = pageRequest;
  const where = buildWhere(filters);

  const totals = await db.select({ value: count() }).from(images).where(where).get();
  const totalCount = totals?.value ?? 0;

  // Offsets past the last row are never sent to SQLite
  const offset = (page - 1) * perPage;
  const rows =
    offset < totalCount
      ? await db.select().from(images).where(where).orderBy(asc(images.imageId)).limit(perPage).offset(offset).all()
      : [];

  return {
    images: rows,
    page,
    perPage,
    totalCount,
    totalPages: Math.ceil(totalCount / perPage),
  };
}

export async function getImage(imageId: number, db: DB = getDb()): Promise<ImageRecord | undefined> {
  return db.select().from(images).where(eq(images.imageId, imageId)).get();
}

export async function getImageByChecksum(md5Checksum: string, db: DB = getDb()): Promise<ImageRecord | undefined> {
  return db
    .select()
    .from(images)
    .where(sql`lower(${images.md5Checksum}) = ${md5Checksum.toLowerCase()}`)
    .get();
}

/** Images produced directly from the given one. */
export async function listDerivedImages(parentImageId: number, db: DB = getDb()): Promise<ImageRecord[]> {
  return db
    .select()
    .from(images)
    .where(eq(images.parentImageId, parentImageId))
    .orderBy(asc(images.imageId))
    .all();
}

export async function countImages(db: DB = getDb()): Promise<ImageTotals> {
  const row = await db
    .select({
      total: count(),
      raw: sql<number>`coalesce(sum(case when ${images.isRaw} = 1 then 1 else 0 end), 0)`,
    })
    .from(images)
    .get();
  const total = row?.total ?? 0;
  const raw = row?.raw ?? 0;
  return { total, raw, processed: total - raw };
}

function checkLineage(isRaw: boolean, parentImageId: number | null) {
  if (isRaw && parentImageId !== null) {
    throw new ValidationError('A raw image cannot have a parent image', {
      is_raw: 'A raw image cannot have a parent image',
    });
  }
  if (!isRaw && parentImageId === null) {
    throw new ValidationError('A processed image must reference a parent image', {
      is_raw: 'A processed image must reference a parent image',
    });
  }
}

/** Registers a raw capture or an image derived from another one. */
export async function insertImage(input: NewImageInput, db: DB = getDb()): Promise<ImageRecord> {
  if (await getImageByChecksum(input.md5Checksum, db)) {
    console.warn(`[Images] Duplicate MD5 ${input.md5Checksum} detected for '${input.filePath}'`);
    throw new DuplicateImageError(input.md5Checksum);
  }

  checkLineage(input.isRaw, input.parentImageId);
  if (input.parentImageId !== null && !(await getImage(input.parentImageId, db))) {
    throw new NotFoundError(`Parent image ${input.parentImageId} not found`);
  }

  try {
    const created = await db.insert(images).values(input).returning().get();
    console.log(`[Images] Inserted image ${created.imageId} ('${created.filename}')`);
    return created;
  } catch (e) {
    throw toArchiveError(e, `inserting image '${input.filename}'`);
  }
}

/**
 * Writes the allow-listed columns of an image and stamps `last_changed`.
 * A rejected edit leaves the stored row untouched.
 */
export async function updateImage(imageId: number, edit: ImageEdit, db: DB = getDb()): Promise<ImageRecord> {
  const existing = await getImage(imageId, db);
  if (!existing) throw new NotFoundError(`Image ${imageId} not found`);

  checkLineage(edit.isRaw ?? existing.isRaw ?? true, existing.parentImageId);

  const changes: ImageEdit = {
    isRaw: edit.isRaw,
    dateTaken: edit.dateTaken,
    orderInBatch: edit.orderInBatch,
    pipelineVersion: edit.pipelineVersion,
    flashMissing: edit.flashMissing,
    cropped: edit.cropped,
  };

  try {
    const updated = await db
      .update(images)
      .set({ ...changes, lastChanged: formatTimestamp(new Date()) })
      .where(eq(images.imageId, imageId))
      .returning()
      .get();
    console.log(`[Images] Updated image ${imageId}`);
    return updated;
  } catch (e) {
    throw toArchiveError(e, `updating image ${imageId}`);
  }
}
