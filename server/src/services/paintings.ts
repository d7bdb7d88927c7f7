import { and, asc, count, eq } from 'drizzle-orm';
import { getDb, type DB } from '../db/index.js';
import { images, paintingImages, paintings, ratings, type ImageRecord, type PaintingRecord, type RatingRecord } from '../db/schema.js';
import { ConflictError, NotFoundError, toArchiveError } from '../errors.js';
import { formatTimestamp } from '../lib/timestamps.js';
import type { NewPaintingInput, PaintingEdit } from '../validation.js';

export interface PaintingDetail extends PaintingRecord {
  images: ImageRecord[];
  ratings: RatingRecord[];
}

export async function listPaintings(db: DB = getDb()): Promise<PaintingRecord[]> {
  return db.select().from(paintings).orderBy(asc(paintings.paintingId)).all();
}

export async function getPainting(paintingId: number, db: DB = getDb()): Promise<PaintingDetail | undefined> {
  const painting = await db.select().from(paintings).where(eq(paintings.paintingId, paintingId)).get();
  if (!painting) return undefined;

  const linked = await db
    .select({ image: images })
    .from(paintingImages)
    .innerJoin(images, eq(paintingImages.imageId, images.imageId))
    .where(eq(paintingImages.paintingId, paintingId))
    .orderBy(asc(images.imageId))
    .all();

  const paintingRatings = await db
    .select()
    .from(ratings)
    .where(eq(ratings.paintingId, paintingId))
    .orderBy(asc(ratings.ratingId))
    .all();

  return { ...painting, images: linked.map((row) => row.image), ratings: paintingRatings };
}

export async function insertPainting(input: NewPaintingInput, db: DB = getDb()): Promise<PaintingRecord> {
  try {
    const created = await db
      .insert(paintings)
      .values({ ...input, lastChanged: formatTimestamp(new Date()) })
      .returning()
      .get();
    console.log(`[Paintings] Inserted painting ${created.paintingId} ('${created.name ?? ''}')`);
    return created;
  } catch (e) {
    throw toArchiveError(e, `inserting painting '${input.name ?? ''}'`);
  }
}

export async function updatePainting(paintingId: number, edit: PaintingEdit, db: DB = getDb()): Promise<PaintingRecord> {
  const existing = await db.select().from(paintings).where(eq(paintings.paintingId, paintingId)).get();
  if (!existing) throw new NotFoundError(`Painting ${paintingId} not found`);

  try {
    return await db
      .update(paintings)
      .set({ ...edit, lastChanged: formatTimestamp(new Date()) })
      .where(eq(paintings.paintingId, paintingId))
      .returning()
      .get();
  } catch (e) {
    throw toArchiveError(e, `updating painting ${paintingId}`);
  }
}

/**
 * Deletes a painting. Its image associations go with it; the images stay.
 * Refused while ratings still reference the painting.
 */
export async function deletePainting(paintingId: number, db: DB = getDb()): Promise<void> {
  const existing = await db.select().from(paintings).where(eq(paintings.paintingId, paintingId)).get();
  if (!existing) throw new NotFoundError(`Painting ${paintingId} not found`);

  const rated = await db.select().from(ratings).where(eq(ratings.paintingId, paintingId)).limit(1).get();
  if (rated) {
    throw new ConflictError(`Painting ${paintingId} still has ratings; delete them first`);
  }

  try {
    await db.delete(paintings).where(eq(paintings.paintingId, paintingId)).run();
    console.log(`[Paintings] Deleted painting ${paintingId}`);
  } catch (e) {
    throw toArchiveError(e, `deleting painting ${paintingId}`);
  }
}

export async function linkPaintingToImage(paintingId: number, imageId: number, db: DB = getDb()): Promise<void> {
  const painting = await db.select().from(paintings).where(eq(paintings.paintingId, paintingId)).get();
  if (!painting) throw new NotFoundError(`Painting ${paintingId} not found`);
  const image = await db.select().from(images).where(eq(images.imageId, imageId)).get();
  if (!image) throw new NotFoundError(`Image ${imageId} not found`);

  try {
    await db.insert(paintingImages).values({ paintingId, imageId }).run();
    console.log(`[Paintings] Linked painting ${paintingId} to image ${imageId}`);
  } catch (e) {
    throw toArchiveError(e, `linking painting ${paintingId} to image ${imageId}`);
  }
}

export async function unlinkPaintingFromImage(paintingId: number, imageId: number, db: DB = getDb()): Promise<void> {
  const result = await db
    .delete(paintingImages)
    .where(and(eq(paintingImages.paintingId, paintingId), eq(paintingImages.imageId, imageId)))
    .run();
  if (result.changes === 0) {
    throw new NotFoundError(`Painting ${paintingId} is not linked to image ${imageId}`);
  }
}

export async function countPaintings(db: DB = getDb()): Promise<number> {
  const row = await db.select({ value: count() }).from(paintings).get();
  return row?.value ?? 0;
}
