#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig, type AppConfig } from '../config.js';
import { startHealthServer } from '../health.js';
import { CourseVisitConsumer } from './consumer.js';
import { renderHistogramText } from '../render/histogram.js';
import { getErrorMessage } from '../shared/errors.js';
import { TIMING } from '../shared/constants.js';
import logger, {
  printBlock,
  printConfig,
  printDivider,
  printHeader,
  printStartupError,
  printStartupSuccess,
  setLogLevel,
} from '../logger.js';

let config: AppConfig;
try {
  config = loadConfig(process.env);
} catch (err) {
  printStartupError(getErrorMessage(err));
  process.exit(1);
}
setLogLevel(config.logLevel);

printHeader('📊  Course Visits Consumer');

printConfig('Kafka Topic', config.topic);
printConfig('Consumer Group', config.groupId);
printConfig('Kafka Brokers', config.kafka.brokers.join(', '));

printDivider();

printConfig('Reconnect Interval (ms)', config.consumer.reconnectIntervalMs);
printConfig('Render Schedule', config.consumer.renderSchedule);
printConfig('Histogram Path', config.consumer.histogramPath);

printDivider();

const visits = new CourseVisitConsumer(config);

const healthServer =
  config.healthPort > 0
    ? startHealthServer(config.healthPort, {
        isReady: () => visits.isStreaming(),
        notReadyReason: 'kafka consumer not streaming',
      })
    : null;

const shutdown = async (signal: string) => {
  logger.info({ signal }, 'Received signal, shutting down gracefully...');

  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, TIMING.GRACEFUL_SHUTDOWN_TIMEOUT_MS).unref();

  try {
    await visits.stop();
    printBlock(
      `Course visits (${visits.aggregate.total()} total)`,
      renderHistogramText(visits.histogramData())
    );
    healthServer?.close();
    process.exit(0);
  } catch (err) {
    logger.error({ error: getErrorMessage(err) }, 'Error during shutdown');
    process.exit(1);
  }
};

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

visits
  .start()
  .then(() => {
    if (visits.isStreaming()) {
      printStartupSuccess('Course Visits Consumer is running');
    }
  })
  .catch((err: unknown) => {
    logger.fatal({ error: getErrorMessage(err) }, 'Consumer failed to start');
    printStartupError('Course Visits Consumer stopped with an error');
    process.exit(1);
  });
