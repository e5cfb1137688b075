import type { ZodError } from 'zod';
import { csvRowSchema, visitRecordSchema, type VisitRecord } from './schema.js';
import { getErrorMessage, RecordValidationError } from '../shared/errors.js';

function describeIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const field = issue.path.map(String).join('.');
    return field ? `${field}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate a header-normalized CSV row
 *
 * @param row - Parsed CSV row, cells keyed by lower-cased header name
 * @throws RecordValidationError when a field is missing or malformed
 * @example
 * parseCsvRow({ date: '2024-01-01', course: 'Math', count: '3' });
 * // => { date: '2024-01-01', course: 'Math', count: 3 }
 */
export function parseCsvRow(row: unknown): VisitRecord {
  const parsed = csvRowSchema.safeParse(row);
  if (!parsed.success) {
    const issues = describeIssues(parsed.error);
    throw new RecordValidationError(
      `Invalid CSV row: ${issues.join('; ')}`,
      issues
    );
  }
  return parsed.data;
}

/**
 * Serialize a record to its wire form (JSON)
 */
export function serializeRecord(record: VisitRecord): string {
  return JSON.stringify({
    date: record.date,
    course: record.course,
    count: record.count,
  });
}

/**
 * Decode a channel message back into a record
 *
 * Fails closed: an empty value, invalid JSON, or any field of the wrong type
 * is rejected rather than coerced.
 *
 * @param value - Raw Kafka message value
 * @throws RecordValidationError
 */
export function deserializeRecord(
  value: Buffer | string | null | undefined
): VisitRecord {
  const text = typeof value === 'string' ? value : value?.toString('utf8');
  if (!text) {
    throw new RecordValidationError('Empty message');
  }

  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (err) {
    throw new RecordValidationError(
      `Message is not valid JSON: ${getErrorMessage(err)}`
    );
  }

  const parsed = visitRecordSchema.safeParse(payload);
  if (!parsed.success) {
    const issues = describeIssues(parsed.error);
    throw new RecordValidationError(
      `Invalid message: ${issues.join('; ')}`,
      issues
    );
  }
  return parsed.data;
}
