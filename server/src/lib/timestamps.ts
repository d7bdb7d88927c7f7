import { format, isValid, parse } from 'date-fns';

// Archive timestamps are local wall-clock time without zone: 2024-05-01T09:30:00
const TIMESTAMP_FORMAT = "yyyy-MM-dd'T'HH:mm:ss";
const DATE_FORMAT = 'yyyy-MM-dd';

const TIMESTAMP_SHAPE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}$/;
const DATE_SHAPE = /^\d{4}-\d{2}-\d{2}$/;

export function formatTimestamp(date: Date): string {
  return format(date, TIMESTAMP_FORMAT);
}

/** True for a real calendar timestamp such as `2024-02-29T23:59:59`. */
export function isArchiveTimestamp(value: string): boolean {
  return TIMESTAMP_SHAPE.test(value) && isValid(parse(value, TIMESTAMP_FORMAT, new Date()));
}

export function isArchiveDate(value: string): boolean {
  return DATE_SHAPE.test(value) && isValid(parse(value, DATE_FORMAT, new Date()));
}

/**
 * Turns a date-range bound into a value comparable with stored timestamps.
 * A bare date as upper bound covers the whole day.
 */
export function toRangeBound(value: string, edge: 'from' | 'to'): string {
  if (!DATE_SHAPE.test(value)) return value;
  return edge === 'from' ? `${value}T00:00:00` : `${value}T23:59:59`;
}
