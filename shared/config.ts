/**
 * Painting Archive Shared Configuration
 */

/** Application title displayed in the admin panel. */
export const TITLE = 'Painting Archive';

/** Rows per page when the list view is opened without `per_page`. */
export const DEFAULT_PER_PAGE = 20;

/** Upper bound accepted for `per_page`. */
export const MAX_PER_PAGE = 100;

/** Literal shown in place of NULL values in the detail view. */
export const NULL_PLACEHOLDER = 'NULL';

/**
 * Image columns that may be changed through the edit form.
 * Everything else on an image is written by ingestion or processing only.
 */
export const EDITABLE_IMAGE_COLUMNS = [
  'is_raw',
  'date_taken',
  'order_in_batch',
  'pipeline_version',
  'flash_missing',
  'cropped',
] as const;

export type EditableImageColumn = (typeof EDITABLE_IMAGE_COLUMNS)[number];

/** File extensions picked up by ingestion when none are given. */
export const DEFAULT_RAW_EXTENSIONS = ['.nef'];

/** Pipeline version recorded on freshly ingested raw images. */
export const DEFAULT_PIPELINE_VERSION = 'v0.1.0';

/** Inclusive year range accepted for paintings. */
export const MIN_PAINTING_YEAR = 1900;
export const MAX_PAINTING_YEAR = 2050;

/** Inclusive rating score range. */
export const MIN_RATING_SCORE = 1;
export const MAX_RATING_SCORE = 5;

/** Name of the signed admin session cookie. */
export const SESSION_COOKIE = 'archive_session';
