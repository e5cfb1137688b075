// src/config.ts
import { z } from 'zod';
import { Cron } from 'croner';
import { ConfigError } from './shared/errors.js';

const LOG_LEVELS = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
] as const;

function isCronPattern(pattern: string): boolean {
  try {
    new Cron(pattern);
    return true;
  } catch {
    return false;
  }
}

// Settings schema; values come from .env (via dotenv) or the process environment
const envSchema = z.object({
  KAFKA_CLIENT_ID: z.string().min(1).default('course-visits'),
  KAFKA_BROKERS: z.string().min(1).default('localhost:9092'),
  KAFKA_TOPIC: z.string().min(1).default('course-visits'),
  KAFKA_GROUP_ID: z.string().min(1).default('course-visits-group'),
  SOURCE_FILE: z.string().min(1).default('data/course_visits.csv'),
  PRODUCER_INTERVAL_MS: z.coerce.number().int().nonnegative().default(1000),
  PRODUCER_LOOP: z.stringbool().default(false),
  PUBLISH_MAX_RETRIES: z.coerce.number().int().nonnegative().max(10).default(3),
  PUBLISH_RETRY_BASE_MS: z.coerce.number().int().positive().default(1000),
  CONNECT_MAX_RETRIES: z.coerce.number().int().nonnegative().max(20).default(5),
  CONSUMER_RECONNECT_INTERVAL_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(5000),
  RENDER_SCHEDULE: z
    .string()
    .refine(isCronPattern, 'Invalid cron pattern')
    .default('*/10 * * * * *'),
  HISTOGRAM_PATH: z
    .string()
    .min(1)
    .default('output/course_visits_histogram.svg'),
  HEALTH_PORT: z.coerce.number().int().min(0).max(65535).default(0),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Build the application configuration from key/value settings.
 *
 * Called once by each process entry point; the result is passed down
 * explicitly instead of being read from a module-level singleton.
 *
 * @param env - Raw settings, normally `process.env` after dotenv has run
 * @throws ConfigError listing every invalid setting
 */
export function loadConfig(env: Record<string, string | undefined>) {
  const parsed = envSchema.safeParse({
    KAFKA_CLIENT_ID: env.KAFKA_CLIENT_ID,
    KAFKA_BROKERS: env.KAFKA_BROKERS,
    KAFKA_TOPIC: env.KAFKA_TOPIC,
    KAFKA_GROUP_ID: env.KAFKA_GROUP_ID,
    SOURCE_FILE: env.SOURCE_FILE,
    PRODUCER_INTERVAL_MS: env.PRODUCER_INTERVAL_MS,
    PRODUCER_LOOP: env.PRODUCER_LOOP,
    PUBLISH_MAX_RETRIES: env.PUBLISH_MAX_RETRIES,
    PUBLISH_RETRY_BASE_MS: env.PUBLISH_RETRY_BASE_MS,
    CONNECT_MAX_RETRIES: env.CONNECT_MAX_RETRIES,
    CONSUMER_RECONNECT_INTERVAL_MS: env.CONSUMER_RECONNECT_INTERVAL_MS,
    RENDER_SCHEDULE: env.RENDER_SCHEDULE,
    HISTOGRAM_PATH: env.HISTOGRAM_PATH,
    HEALTH_PORT: env.HEALTH_PORT,
    LOG_LEVEL: env.LOG_LEVEL,
  });

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.map(String).join('.')}: ${issue.message}`
      )
    );
  }

  const settings = parsed.data;
  const brokers = settings.KAFKA_BROKERS.split(',')
    .map((broker) => broker.trim())
    .filter((broker) => broker.length > 0);

  if (brokers.length === 0) {
    throw new ConfigError(['KAFKA_BROKERS: No broker address given']);
  }

  return {
    kafka: {
      clientId: settings.KAFKA_CLIENT_ID,
      brokers,
    },
    topic: settings.KAFKA_TOPIC,
    groupId: settings.KAFKA_GROUP_ID,
    producer: {
      sourceFile: settings.SOURCE_FILE,
      intervalMs: settings.PRODUCER_INTERVAL_MS,
      loop: settings.PRODUCER_LOOP,
      publishRetries: settings.PUBLISH_MAX_RETRIES,
      publishRetryBaseMs: settings.PUBLISH_RETRY_BASE_MS,
      connectRetries: settings.CONNECT_MAX_RETRIES,
    },
    consumer: {
      reconnectIntervalMs: settings.CONSUMER_RECONNECT_INTERVAL_MS,
      renderSchedule: settings.RENDER_SCHEDULE,
      histogramPath: settings.HISTOGRAM_PATH,
    },
    healthPort: settings.HEALTH_PORT,
    logLevel: settings.LOG_LEVEL,
  };
}

export type AppConfig = ReturnType<typeof loadConfig>;
