import type { Producer } from 'kafkajs';
import { serializeRecord } from '../records/codec.js';
import type { VisitRecord } from '../records/schema.js';
import { retryWithBackoff } from '../shared/retry.js';
import { getErrorMessage } from '../shared/errors.js';
import { MESSAGE_HEADERS } from '../shared/constants.js';
import logger from '../logger.js';
import { metrics } from '../metrics.js';

export interface PublishRecordOptions {
  producer: Producer;
  topic: string;
  record: VisitRecord;
  /** Partition key shared by every message of a run */
  key: string;
  runId: string;
  retries: number;
  retryBaseMs: number;
  signal?: AbortSignal;
}

/**
 * Publish one visit record, retrying with exponential backoff
 *
 * The record is sent as JSON with `run-id` and `produced-at` headers.
 * Failed sends are retried `retries` times, waiting retryBaseMs, 2x, 4x...
 *
 * @throws TransportError once every attempt has failed
 */
export async function publishRecord({
  producer,
  topic,
  record,
  key,
  runId,
  retries,
  retryBaseMs,
  signal,
}: PublishRecordOptions): Promise<void> {
  const value = serializeRecord(record);

  await retryWithBackoff(
    () =>
      producer.send({
        topic,
        messages: [
          {
            key,
            value,
            headers: {
              [MESSAGE_HEADERS.RUN_ID]: runId,
              [MESSAGE_HEADERS.PRODUCED_AT]: new Date().toISOString(),
            },
          },
        ],
      }),
    {
      label: 'Kafka publish',
      retries,
      initialDelayMs: retryBaseMs,
      backoff: 'exponential',
      signal,
      onRetry: (error, attempt, delayMs) => {
        metrics.publishRetriesTotal.inc();
        logger.warn(
          { topic, error: getErrorMessage(error), attempt, delayMs },
          'Kafka publish failed, retrying with exponential backoff'
        );
      },
    }
  );

  metrics.recordsPublishedTotal.inc();
  logger.debug({ topic, record }, 'Published record');
}
