import { sql } from 'drizzle-orm';
import { sqliteTable, text, integer, primaryKey, type AnySQLiteColumn } from 'drizzle-orm/sqlite-core';

// Column definitions mirror schema.sql, which owns the CHECK constraints.

// Images Table
export const images = sqliteTable('images', {
  imageId: integer('image_id').primaryKey({ autoIncrement: true }),
  filename: text('filename').notNull(),
  filePath: text('file_path').notNull(),
  md5Checksum: text('md5_checksum').notNull(),
  isRaw: integer('is_raw', { mode: 'boolean' }).default(true),
  // Derived images point at the image they were produced from
  parentImageId: integer('parent_image_id').references((): AnySQLiteColumn => images.imageId, {
    onDelete: 'set null',
  }),
  dateTaken: text('date_taken'), // YYYY-MM-DDTHH:MM:SS
  orderInBatch: integer('order_in_batch'),
  pipelineVersion: text('pipeline_version'), // vMAJOR.MINOR.PATCH
  flashMissing: integer('flash_missing', { mode: 'boolean' }).default(false),
  cropped: integer('cropped', { mode: 'boolean' }).default(false),
  croppedDate: text('cropped_date'),
  rotationDegrees: integer('rotation_degrees').default(0), // 0..360
  rotatedDate: text('rotated_date'),
  lastChanged: text('last_changed'),
  embeddedImages: integer('embedded_images').default(0),
});

// Paintings Table
export const paintings = sqliteTable('paintings', {
  paintingId: integer('painting_id').primaryKey({ autoIncrement: true }),
  name: text('name'),
  description: text('description'),
  explicitYear: integer('explicit_year'), // 1900..2050
  inferredYear: integer('inferred_year'), // 1900..2050
  personalFavourite: integer('personal_favourite', { mode: 'boolean' }).default(false),
  lastChanged: text('last_changed'),
});

// Painting <-> Image association
export const paintingImages = sqliteTable(
  'painting_images',
  {
    paintingId: integer('painting_id')
      .notNull()
      .references(() => paintings.paintingId, { onDelete: 'cascade' }),
    imageId: integer('image_id')
      .notNull()
      .references(() => images.imageId, { onDelete: 'cascade' }),
  },
  (t) => ({
    pk: primaryKey({ columns: [t.paintingId, t.imageId] }),
  }),
);

// Ratings Table
export const ratings = sqliteTable('ratings', {
  ratingId: integer('rating_id').primaryKey({ autoIncrement: true }),
  paintingId: integer('painting_id')
    .notNull()
    .references(() => paintings.paintingId),
  imageId: integer('image_id')
    .notNull()
    .references(() => images.imageId),
  score: integer('score'), // 1..5
  ratingDate: text('rating_date').default(sql`(strftime('%Y-%m-%dT%H:%M:%S', 'now'))`),
  user: text('user'),
});

export type ImageRecord = typeof images.$inferSelect;
export type NewImageRecord = typeof images.$inferInsert;
export type PaintingRecord = typeof paintings.$inferSelect;
export type NewPaintingRecord = typeof paintings.$inferInsert;
export type RatingRecord = typeof ratings.$inferSelect;
