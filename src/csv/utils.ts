import { basename, extname } from 'node:path';

/**
 * Normalize a CSV header cell so `Date`, ` COURSE ` and a BOM-prefixed
 * first column all map onto the record field names.
 *
 * Shaped for csv-parser's `mapHeaders` option.
 *
 * @example
 * normalizeHeader({ header: '\uFEFFDate ' }); // => 'date'
 */
export function normalizeHeader({ header }: { header: string }): string {
  return header.replace(/^\uFEFF/, '').trim().toLowerCase();
}

/**
 * Derive the Kafka message key from the source file path
 *
 * Every message of a run shares this key so they land on one partition and
 * keep source row order.
 *
 * @example
 * messageKeyForSource('data/course_visits.csv'); // => 'course_visits'
 */
export function messageKeyForSource(filePath: string): string {
  return basename(filePath, extname(filePath));
}
