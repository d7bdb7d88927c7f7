import { and, asc, count, eq } from 'drizzle-orm';
import { getDb, type DB } from '../db/index.js';
import { images, paintings, ratings, type RatingRecord } from '../db/schema.js';
import { NotFoundError, toArchiveError } from '../errors.js';
import type { NewRatingInput } from '../validation.js';

export interface RatingFilters {
  paintingId?: number;
  imageId?: number;
}

export async function insertRating(input: NewRatingInput, db: DB = getDb()): Promise<RatingRecord> {
  const painting = await db.select().from(paintings).where(eq(paintings.paintingId, input.paintingId)).get();
  if (!painting) throw new NotFoundError(`Painting ${input.paintingId} not found`);
  const image = await db.select().from(images).where(eq(images.imageId, input.imageId)).get();
  if (!image) throw new NotFoundError(`Image ${input.imageId} not found`);

  try {
    const created = await db.insert(ratings).values(input).returning().get();
    console.log(
      `[Ratings] Inserted rating ${created.ratingId} for painting ${input.paintingId}, image ${input.imageId}, score ${input.score}`,
    );
    return created;
  } catch (e) {
    throw toArchiveError(e, `rating painting ${input.paintingId} / image ${input.imageId}`);
  }
}

export async function listRatings(filters: RatingFilters = {}, db: DB = getDb()): Promise<RatingRecord[]> {
  return db
    .select()
    .from(ratings)
    .where(
      and(
        filters.paintingId !== undefined ? eq(ratings.paintingId, filters.paintingId) : undefined,
        filters.imageId !== undefined ? eq(ratings.imageId, filters.imageId) : undefined,
      ),
    )
    .orderBy(asc(ratings.ratingId))
    .all();
}

export async function countRatings(db: DB = getDb()): Promise<number> {
  const row = await db.select({ value: count() }).from(ratings).get();
  return row?.value ?? 0;
}
