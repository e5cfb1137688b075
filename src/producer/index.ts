#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig, type AppConfig } from '../config.js';
import { startHealthServer } from '../health.js';
import { isProducerConnected } from '../kafka/client.js';
import { startProducer } from './stream.js';
import { getErrorMessage } from '../shared/errors.js';
import { TIMING } from '../shared/constants.js';
import logger, {
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

printHeader('📚  Course Visits Producer');

printConfig('Source File', config.producer.sourceFile);
printConfig('Kafka Topic', config.topic);
printConfig('Kafka Client ID', config.kafka.clientId);
printConfig('Kafka Brokers', config.kafka.brokers.join(', '));

printDivider();

printConfig('Interval (ms)', config.producer.intervalMs);
printConfig('Loop At End Of File', config.producer.loop);
printConfig(
  'Retry Strategy',
  `${config.producer.publishRetryBaseMs}ms exponential backoff, ${config.producer.publishRetries} publish / ${config.producer.connectRetries} connect retries`
);

printDivider();

const healthServer =
  config.healthPort > 0
    ? startHealthServer(config.healthPort, {
        isReady: isProducerConnected,
        notReadyReason: 'kafka producer not connected',
      })
    : null;

const controller = new AbortController();

const shutdown = (signal: string) => {
  logger.info({ signal }, 'Received signal, stopping producer...');
  controller.abort(new Error(`Received ${signal}`));

  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, TIMING.GRACEFUL_SHUTDOWN_TIMEOUT_MS).unref();
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

startProducer(config, { signal: controller.signal })
  .then((stats) => {
    printStartupSuccess(
      `Producer finished: ${stats.published} published, ${stats.skipped} skipped`
    );
    process.exitCode = 0;
  })
  .catch((err: unknown) => {
    if (controller.signal.aborted) {
      logger.info('Producer interrupted before connecting');
      return;
    }
    logger.fatal({ error: getErrorMessage(err) }, 'Producer failed');
    printStartupError('Course Visits Producer stopped with an error');
    process.exitCode = 1;
  })
  .finally(() => {
    healthServer?.close();
  });
