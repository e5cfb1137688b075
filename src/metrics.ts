import {
  Counter,
  Gauge,
  Histogram,
  Registry,
  collectDefaultMetrics,
} from 'prom-client';

export const register = new Registry();

collectDefaultMetrics({ register });

const PREFIX = 'course_visits_';

export const metrics = {
  rowsReadTotal: new Counter({
    name: `${PREFIX}rows_read_total`,
    help: 'Total number of CSV rows read by the producer',
    registers: [register],
  }),

  recordsPublishedTotal: new Counter({
    name: `${PREFIX}records_published_total`,
    help: 'Total number of records published to Kafka',
    registers: [register],
  }),

  recordsSkippedTotal: new Counter({
    name: `${PREFIX}records_skipped_total`,
    help: 'Total number of malformed rows or messages skipped',
    labelNames: ['stage'] as const,
    registers: [register],
  }),

  publishRetriesTotal: new Counter({
    name: `${PREFIX}publish_retries_total`,
    help: 'Total number of Kafka publish retry attempts',
    registers: [register],
  }),

  messagesConsumedTotal: new Counter({
    name: `${PREFIX}messages_consumed_total`,
    help: 'Total number of records added to the aggregate',
    registers: [register],
  }),

  consumerReconnectsTotal: new Counter({
    name: `${PREFIX}consumer_reconnects_total`,
    help: 'Total number of consumer reconnects after a broker failure',
    registers: [register],
  }),

  aggregateVisits: new Gauge({
    name: `${PREFIX}aggregate_visits`,
    help: 'Current visit count per weekday and course',
    labelNames: ['day', 'course'] as const,
    registers: [register],
  }),

  renderDurationSeconds: new Histogram({
    name: `${PREFIX}render_duration_seconds`,
    help: 'Duration of histogram rendering in seconds',
    buckets: [0.005, 0.01, 0.05, 0.1, 0.5, 1],
    registers: [register],
  }),
} as const;
