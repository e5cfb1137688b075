import type { Producer } from 'kafkajs';
import { v4 as uuidv4 } from 'uuid';
import type { AppConfig } from '../config.js';
import type { ProducerStats } from '../types/index.js';
import { openSourceFile, readVisitRecords } from '../csv/csv-stream.js';
import { messageKeyForSource } from '../csv/utils.js';
import { connectProducer, disconnectProducer } from '../kafka/client.js';
import { publishRecord } from '../kafka/publisher.js';
import { delay } from '../shared/delay.js';
import { getErrorMessage } from '../shared/errors.js';
import { retryWithBackoff } from '../shared/retry.js';
import logger from '../logger.js';
import { metrics } from '../metrics.js';

export interface RunProducerOptions {
  signal?: AbortSignal;
}

/**
 * Stream the source file to the topic, one record per interval
 *
 * Rows are published in file order under a single message key. Malformed
 * rows are skipped. At end of file the run stops, or starts a new pass when
 * `producer.loop` is set. Aborting `signal` ends the run between rows and
 * resolves with the totals so far.
 *
 * @throws TransportError when a publish exhausts its retries
 * @throws Error when the source file cannot be opened
 */
export async function runProducer(
  config: AppConfig,
  producer: Producer,
  { signal }: RunProducerOptions = {}
): Promise<ProducerStats> {
  const { sourceFile, intervalMs, loop, publishRetries, publishRetryBaseMs } =
    config.producer;
  const runId = uuidv4();
  const key = messageKeyForSource(sourceFile);
  const stats: ProducerStats = {
    rowsRead: 0,
    published: 0,
    skipped: 0,
    passes: 0,
  };

  logger.info({ runId, sourceFile, topic: config.topic }, 'Producer run started');

  try {
    for (;;) {
      const publishedBefore = stats.published;
      const source = await openSourceFile(sourceFile);

      const rows = readVisitRecords(source, {
        onSkip: () => {
          stats.rowsRead++;
          stats.skipped++;
          metrics.rowsReadTotal.inc();
          metrics.recordsSkippedTotal.inc({ stage: 'source' });
        },
      });

      for await (const { rowNumber, record } of rows) {
        if (signal?.aborted) break;

        stats.rowsRead++;
        metrics.rowsReadTotal.inc();

        if (stats.published > 0 && intervalMs > 0) {
          await delay(intervalMs, signal);
        }

        await publishRecord({
          producer,
          topic: config.topic,
          record,
          key,
          runId,
          retries: publishRetries,
          retryBaseMs: publishRetryBaseMs,
          signal,
        });
        stats.published++;

        logger.info({ topic: config.topic, rowNumber, record }, 'Sent record');
      }

      if (signal?.aborted) break;
      stats.passes++;
      logger.info({ ...stats }, 'Reached end of source');

      if (!loop) break;
      if (stats.published === publishedBefore) {
        logger.warn({ sourceFile }, 'Source has no valid rows, not looping');
        break;
      }
    }
  } catch (err) {
    if (!signal?.aborted) throw err;
  }

  if (signal?.aborted) {
    logger.info({ reason: getErrorMessage(signal.reason) }, 'Producer stopped');
  }

  logger.info({ runId, ...stats }, 'Producer run finished');
  return stats;
}

/**
 * Connect to the broker, run the producer, and always disconnect afterwards
 *
 * The initial connection is retried with exponential backoff up to
 * `producer.connectRetries` times before giving up.
 *
 * @throws TransportError when the broker stays unreachable
 */
export async function startProducer(
  config: AppConfig,
  { signal }: RunProducerOptions = {}
): Promise<ProducerStats> {
  const producer = await retryWithBackoff(() => connectProducer(config.kafka), {
    label: 'Kafka producer connect',
    retries: config.producer.connectRetries,
    initialDelayMs: config.producer.publishRetryBaseMs,
    backoff: 'exponential',
    signal,
    onRetry: (error, attempt, delayMs) => {
      logger.warn(
        { brokers: config.kafka.brokers, error: getErrorMessage(error), attempt, delayMs },
        'Kafka unreachable, retrying connection'
      );
    },
  });

  logger.info({ brokers: config.kafka.brokers }, 'Producer connected');

  try {
    return await runProducer(config, producer, { signal });
  } finally {
    await disconnectProducer();
    logger.info('Kafka producer closed');
  }
}
