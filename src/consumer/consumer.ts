import { Cron } from 'croner';
import type {
  Consumer,
  ConsumerCrashEvent,
  EachMessagePayload,
} from 'kafkajs';
import type { AppConfig } from '../config.js';
import type { ConsumerState } from '../types/index.js';
import { createConsumer } from '../kafka/client.js';
import { deserializeRecord } from '../records/codec.js';
import type { VisitRecord } from '../records/schema.js';
import { dayOfWeek, VisitAggregate } from './aggregate.js';
import { writeHistogram, type HistogramData } from '../render/histogram.js';
import { retryWithBackoff } from '../shared/retry.js';
import { getErrorMessage, RecordValidationError } from '../shared/errors.js';
import logger from '../logger.js';
import { metrics } from '../metrics.js';

/**
 * Subscribes to the visits topic and keeps the weekday/course aggregate
 *
 * Lifecycle: connecting → streaming → (disconnected → reconnecting) →
 * streaming, and stopped after {@link stop}. The broker connection is
 * retried at a fixed interval for as long as it takes. Offsets are committed
 * by kafkajs after each processed message, so a reconnect resumes from the
 * last commit and may replay a few messages.
 */
export class CourseVisitConsumer {
  readonly aggregate = new VisitAggregate();

  private consumer: Consumer | null = null;
  private currentState: ConsumerState = 'idle';
  private readonly stopController = new AbortController();
  private renderJob: Cron | null = null;
  private changedSinceRender = false;

  constructor(private readonly config: AppConfig) {}

  get state(): ConsumerState {
    return this.currentState;
  }

  isStreaming(): boolean {
    return this.currentState === 'streaming';
  }

  histogramData(): HistogramData {
    return {
      snapshot: this.aggregate.snapshot(),
      courses: this.aggregate.courses(),
    };
  }

  /**
   * Connect, subscribe and start the render schedule
   *
   * Resolves once messages are flowing, or when {@link stop} is called
   * before the broker was reached.
   */
  async start(): Promise<void> {
    this.renderJob = new Cron(
      this.config.consumer.renderSchedule,
      { protect: true },
      () => this.renderIfChanged()
    );

    await this.connectAndRun('connecting');
  }

  /**
   * Stop consuming, render one last time and disconnect
   */
  async stop(): Promise<void> {
    if (this.currentState === 'stopped') return;

    this.stopController.abort(new Error('Consumer stopped'));
    this.renderJob?.stop();
    this.renderJob = null;

    const consumer = this.consumer;
    this.consumer = null;
    if (consumer) {
      await consumer.disconnect();
    }

    this.transition('stopped');
    await this.render();
  }

  /**
   * Decode one channel message and add it to the aggregate
   *
   * Malformed messages are logged and skipped.
   */
  async handleMessage({
    partition,
    message,
  }: EachMessagePayload): Promise<void> {
    let record: VisitRecord;
    try {
      record = deserializeRecord(message.value);
    } catch (err) {
      if (!(err instanceof RecordValidationError)) throw err;

      logger.warn(
        { partition, offset: message.offset, reason: err.message },
        'Skipping malformed message'
      );
      metrics.recordsSkippedTotal.inc({ stage: 'channel' });
      return;
    }

    this.ingest(record);
  }

  private ingest(record: VisitRecord): void {
    const day = dayOfWeek(record.date);
    const updated = this.aggregate.add(record);
    this.changedSinceRender = true;

    metrics.messagesConsumedTotal.inc();
    metrics.aggregateVisits.set({ day, course: record.course }, updated);
    logger.debug(
      { day, course: record.course, total: updated },
      'Aggregate updated'
    );
  }

  private transition(next: ConsumerState): void {
    if (next === this.currentState) return;
    logger.info(
      { from: this.currentState, to: next },
      'Consumer state changed'
    );
    this.currentState = next;
  }

  private async connectAndRun(
    phase: 'connecting' | 'reconnecting'
  ): Promise<void> {
    this.transition(phase);
    const consumer = createConsumer(this.config.kafka, this.config.groupId);
    const signal = this.stopController.signal;

    try {
      await retryWithBackoff(
        async () => {
          await consumer.connect();
          await consumer.subscribe({
            topic: this.config.topic,
            fromBeginning: true,
          });
        },
        {
          label: 'Kafka consumer connect',
          retries: Infinity,
          initialDelayMs: this.config.consumer.reconnectIntervalMs,
          backoff: 'fixed',
          signal,
          onRetry: (error, attempt, delayMs) => {
            logger.warn(
              {
                brokers: this.config.kafka.brokers,
                error: getErrorMessage(error),
                attempt,
                delayMs,
              },
              'Kafka unreachable, retrying connection'
            );
          },
        }
      );
    } catch (err) {
      if (signal.aborted) {
        await this.discard(consumer);
        return;
      }
      throw err;
    }

    // stop() ran while connect was in flight and never saw this consumer
    if (signal.aborted) {
      await this.discard(consumer);
      return;
    }

    this.consumer = consumer;
    consumer.on(consumer.events.CRASH, (event) => this.handleCrash(event));
    consumer.on(consumer.events.GROUP_JOIN, () => this.transition('streaming'));

    await consumer.run({
      eachMessage: (payload) => this.handleMessage(payload),
    });
    if (signal.aborted) return;

    logger.info(
      { topic: this.config.topic, groupId: this.config.groupId },
      'Consuming messages'
    );
    this.transition('streaming');
  }

  private async discard(consumer: Consumer): Promise<void> {
    await consumer.disconnect().catch((err: unknown) => {
      logger.warn(
        { error: getErrorMessage(err) },
        'Disconnect after stop failed'
      );
    });
  }

  private handleCrash({ payload }: ConsumerCrashEvent): void {
    if (this.stopController.signal.aborted) return;

    this.transition('disconnected');
    logger.error(
      { error: getErrorMessage(payload.error), restart: payload.restart },
      'Kafka consumer crashed'
    );

    if (payload.restart) {
      // kafkajs rejoins the group by itself; GROUP_JOIN marks us streaming again
      this.transition('reconnecting');
      return;
    }

    this.reconnect().catch((err: unknown) => {
      logger.error({ error: getErrorMessage(err) }, 'Consumer reconnect failed');
    });
  }

  private async reconnect(): Promise<void> {
    this.transition('reconnecting');
    metrics.consumerReconnectsTotal.inc();

    const crashed = this.consumer;
    this.consumer = null;
    if (crashed) {
      await crashed.disconnect().catch((err: unknown) => {
        logger.warn(
          { error: getErrorMessage(err) },
          'Disconnect after crash failed'
        );
      });
    }

    await this.connectAndRun('reconnecting');
  }

  private async renderIfChanged(): Promise<void> {
    if (!this.changedSinceRender) return;
    await this.render();
  }

  private async render(): Promise<void> {
    this.changedSinceRender = false;
    try {
      await writeHistogram(
        this.config.consumer.histogramPath,
        this.histogramData()
      );
    } catch (err) {
      this.changedSinceRender = true;
      logger.error(
        {
          filePath: this.config.consumer.histogramPath,
          error: getErrorMessage(err),
        },
        'Failed to write histogram'
      );
    }
  }
}
