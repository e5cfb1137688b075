import { createReadStream } from 'node:fs';
import { access } from 'node:fs/promises';
import type { Readable } from 'node:stream';
import csvParser from 'csv-parser';
import { parseCsvRow } from '../records/codec.js';
import type { VisitRecord } from '../records/schema.js';
import { normalizeHeader } from './utils.js';
import logger from '../logger.js';
import { getErrorMessage, RecordValidationError } from '../shared/errors.js';

export interface SourceRow {
  /** One-based data row number (the header is not counted) */
  rowNumber: number;
  record: VisitRecord;
}

export interface SkippedRow {
  rowNumber: number;
  reason: string;
}

export interface ReadVisitRecordsOptions {
  onSkip?: (skipped: SkippedRow) => void;
}

/**
 * Open the CSV source for one read pass
 *
 * @throws Error if the file does not exist or cannot be read
 */
export async function openSourceFile(filePath: string): Promise<Readable> {
  try {
    await access(filePath);
  } catch (err) {
    throw new Error(
      `Source file not readable: ${filePath} (${getErrorMessage(err)})`
    );
  }
  return createReadStream(filePath);
}

/**
 * Parse visit records from a CSV stream, in source order
 *
 * Malformed rows are logged and reported through `onSkip`, then skipped;
 * reading continues with the next row.
 *
 * @example
 * for await (const { record } of readVisitRecords(await openSourceFile(path))) {
 *   await publish(record);
 * }
 */
export async function* readVisitRecords(
  source: Readable,
  { onSkip }: ReadVisitRecordsOptions = {}
): AsyncGenerator<SourceRow> {
  const rows = source.pipe(csvParser({ mapHeaders: normalizeHeader }));
  let rowNumber = 0;

  try {
    for await (const row of rows) {
      rowNumber++;

      let record: VisitRecord;
      try {
        record = parseCsvRow(row);
      } catch (err) {
        if (!(err instanceof RecordValidationError)) throw err;

        logger.warn(
          { rowNumber, reason: err.message },
          'Skipping malformed row'
        );
        onSkip?.({ rowNumber, reason: err.message });
        continue;
      }

      yield { rowNumber, record };
    }
  } finally {
    // the parser only unpipes its source when torn down early
    source.destroy();
  }
}
