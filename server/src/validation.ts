import { z } from 'zod';
import {
  DEFAULT_PER_PAGE,
  MAX_PER_PAGE,
  MAX_PAINTING_YEAR,
  MIN_PAINTING_YEAR,
  MAX_RATING_SCORE,
  MIN_RATING_SCORE,
} from '../../shared/config.js';
import { isArchiveDate, isArchiveTimestamp } from './lib/timestamps.js';
import { ValidationError, type FieldErrors } from './errors.js';
import type { ImageFilters } from './services/images.js';

export const PIPELINE_VERSION_PATTERN = /^v\d+\.\d+\.\d+$/;
export const MD5_PATTERN = /^[0-9a-fA-F]{32}$/;

const TIMESTAMP_MESSAGE = 'Expected a valid timestamp in the form YYYY-MM-DDTHH:MM:SS';
const VERSION_MESSAGE = 'Expected a pipeline version in the form vMAJOR.MINOR.PATCH';

/** Form and query strings arrive empty when the user leaves a field blank. */
const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const blankToNull = (value: unknown) =>
  value === undefined || (typeof value === 'string' && value.trim() === '') ? null : value;

const trimmed = (value: unknown) => (typeof value === 'string' ? value.trim() : value);

const timestamp = z.string().refine(isArchiveTimestamp, TIMESTAMP_MESSAGE);
const pipelineVersion = z.string().regex(PIPELINE_VERSION_PATTERN, VERSION_MESSAGE);
const paintingYear = z.number().int().min(MIN_PAINTING_YEAR).max(MAX_PAINTING_YEAR);
const id = z.coerce.number().int().positive();

// ----------------------------------------------------------------------------
// Image list query (?filename=&date_from=&date_to=&is_raw=&cropped=&rotated=&page=&per_page=)
// ----------------------------------------------------------------------------

const flagParam = z.preprocess(
  blankToUndefined,
  z
    .enum(['0', '1'])
    .transform((v) => v === '1')
    .optional(),
);

const dateBoundParam = z.preprocess(
  (v) => blankToUndefined(trimmed(v)),
  z
    .string()
    .refine((v) => isArchiveDate(v) || isArchiveTimestamp(v), 'Expected YYYY-MM-DD or YYYY-MM-DDTHH:MM:SS')
    .optional(),
);

export const imageListQuerySchema = z.object({
  filename: z.preprocess((v) => blankToUndefined(trimmed(v)), z.string().optional()),
  date_from: dateBoundParam,
  date_to: dateBoundParam,
  is_raw: flagParam,
  cropped: flagParam,
  rotated: flagParam,
  page: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).default(1)),
  per_page: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(1).max(MAX_PER_PAGE).default(DEFAULT_PER_PAGE),
  ),
});

export type ImageListQuery = z.infer<typeof imageListQuerySchema>;

export function toImageFilters(query: ImageListQuery): ImageFilters {
  return {
    filename: query.filename,
    dateFrom: query.date_from,
    dateTo: query.date_to,
    isRaw: query.is_raw,
    cropped: query.cropped,
    rotated: query.rotated,
  };
}

// ----------------------------------------------------------------------------
// Image edits
// ----------------------------------------------------------------------------

/** Unchecked checkboxes are simply missing from the submitted form. */
const checkbox = z.preprocess(
  (v) => v !== undefined && v !== '' && v !== '0' && v !== 'false',
  z.boolean(),
);

/** The edit form posts column names; fields outside the allow-list are dropped. */
export const imageEditFormSchema = z.object({
  is_raw: checkbox,
  date_taken: z.preprocess((v) => blankToNull(trimmed(v)), timestamp.nullable()),
  order_in_batch: z.preprocess((v) => blankToNull(trimmed(v)), z.coerce.number().int().min(0).nullable()),
  pipeline_version: z.preprocess((v) => blankToNull(trimmed(v)), pipelineVersion.nullable()),
  flash_missing: checkbox,
  cropped: checkbox,
});

/** JSON counterpart of the edit form; anything outside the allow-list is an error. */
export const imagePatchSchema = z
  .object({
    isRaw: z.boolean(),
    dateTaken: timestamp.nullable(),
    orderInBatch: z.number().int().min(0).nullable(),
    pipelineVersion: pipelineVersion.nullable(),
    flashMissing: z.boolean(),
    cropped: z.boolean(),
  })
  .partial()
  .strict();

export type ImageEdit = z.infer<typeof imagePatchSchema>;

export function formToImageEdit(form: z.infer<typeof imageEditFormSchema>): ImageEdit {
  return {
    isRaw: form.is_raw,
    dateTaken: form.date_taken,
    orderInBatch: form.order_in_batch,
    pipelineVersion: form.pipeline_version,
    flashMissing: form.flash_missing,
    cropped: form.cropped,
  };
}

// ----------------------------------------------------------------------------
// Image registration
// ----------------------------------------------------------------------------

export const newImageSchema = z
  .object({
    filename: z.string().min(1),
    filePath: z.string().min(1),
    md5Checksum: z.string().regex(MD5_PATTERN, 'Expected 32 hexadecimal characters'),
    isRaw: z.boolean().default(true),
    parentImageId: z.number().int().positive().nullable().default(null),
    dateTaken: timestamp.nullable().default(null),
    orderInBatch: z.number().int().min(0).nullable().default(null),
    pipelineVersion: pipelineVersion.nullable().default(null),
    flashMissing: z.boolean().default(false),
    cropped: z.boolean().default(false),
    croppedDate: timestamp.nullable().default(null),
    rotationDegrees: z.number().int().min(0).max(360).default(0),
    rotatedDate: timestamp.nullable().default(null),
    embeddedImages: z.number().int().min(0).default(0),
  })
  .strict()
  .superRefine((img, ctx) => {
    if (img.isRaw && img.parentImageId !== null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['parentImageId'], message: 'A raw image cannot have a parent image' });
    }
    if (!img.isRaw && img.parentImageId === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['parentImageId'], message: 'A processed image must reference a parent image' });
    }
  });

export type NewImageInput = z.infer<typeof newImageSchema>;

// ----------------------------------------------------------------------------
// Paintings & ratings
// ----------------------------------------------------------------------------

export const newPaintingSchema = z
  .object({
    name: z.string().nullable().default(null),
    description: z.string().nullable().default(null),
    explicitYear: paintingYear.nullable().default(null),
    inferredYear: paintingYear.nullable().default(null),
    personalFavourite: z.boolean().default(false),
  })
  .strict();

export type NewPaintingInput = z.infer<typeof newPaintingSchema>;

export const paintingPatchSchema = z
  .object({
    name: z.string().nullable(),
    description: z.string().nullable(),
    explicitYear: paintingYear.nullable(),
    inferredYear: paintingYear.nullable(),
    personalFavourite: z.boolean(),
  })
  .partial()
  .strict();

export type PaintingEdit = z.infer<typeof paintingPatchSchema>;

export const linkImageSchema = z.object({ imageId: z.number().int().positive() }).strict();

export const newRatingSchema = z
  .object({
    paintingId: z.number().int().positive(),
    imageId: z.number().int().positive(),
    score: z.number().int().min(MIN_RATING_SCORE).max(MAX_RATING_SCORE),
    user: z.string().nullable().default(null),
  })
  .strict();

export type NewRatingInput = z.infer<typeof newRatingSchema>;

export const ratingQuerySchema = z.object({
  paintingId: z.preprocess(blankToUndefined, id.optional()),
  imageId: z.preprocess(blankToUndefined, id.optional()),
});

export const ingestFormSchema = z.object({
  folder: z.preprocess(trimmed, z.string().min(1, 'A folder is required')),
});

/** Flattens zod issues to one message per field. */
export function toFieldErrors(error: z.ZodError): FieldErrors {
  const fields: FieldErrors = {};
  for (const issue of error.issues) {
    const key = issue.path.length > 0 ? issue.path.join('.') : '_';
    fields[key] ??= issue.message;
  }
  return fields;
}

/** Hook for zValidator: rejected bodies surface as a ValidationError. */
export function rejectInvalid(result: { success: true } | { success: false; error: z.ZodError }) {
  if (!result.success) {
    throw new ValidationError('Invalid request', toFieldErrors(result.error));
  }
}

/** Parses with a schema, raising a ValidationError on failure. */
export function parseOrReject<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError('Invalid request', toFieldErrors(parsed.error));
  }
  return parsed.data;
}
