import { z } from 'zod';

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * True when a YYYY-MM-DD string names a real calendar day (rejects 2024-02-30)
 */
export function isCalendarDate(value: string): boolean {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) return false;

  const [, year, month, day] = match.map(Number);
  if (year === undefined || month === undefined || day === undefined) {
    return false;
  }

  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

const dateField = z
  .string()
  .trim()
  .regex(ISO_DATE_PATTERN, 'Expected a YYYY-MM-DD date')
  .refine(isCalendarDate, 'Not a calendar date');

const courseField = z.string().trim().min(1, 'Course is required');

/**
 * Visit record as carried on the channel. `count` must already be a number.
 */
export const visitRecordSchema = z.object({
  date: dateField,
  course: courseField,
  count: z.number().int().nonnegative(),
});

/**
 * Visit record as read from the CSV source, where every cell is text.
 */
export const csvRowSchema = z.object({
  date: dateField,
  course: courseField,
  count: z
    .string()
    .trim()
    .regex(/^\d+$/, 'Expected a non-negative integer')
    .transform(Number)
    .pipe(z.number().int().nonnegative()),
});

export type VisitRecord = z.infer<typeof visitRecordSchema>;
