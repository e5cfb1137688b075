import {
  Kafka,
  logLevel,
  type Consumer,
  type LogEntry,
  type Producer,
} from 'kafkajs';
import type { KafkaConfig } from '../types/index.js';
import logger from '../logger.js';

let producerInstance: Producer | null = null;
let producerConnected = false;
let connectPromise: Promise<Producer> | null = null;

/**
 * Route kafkajs log entries into the application logger
 */
export function kafkaLogCreator() {
  return ({ namespace, level, log }: LogEntry): void => {
    const { message, ...extra } = log;
    const context = { namespace, ...extra };

    switch (level) {
      case logLevel.ERROR:
        logger.error(context, message);
        break;
      case logLevel.WARN:
        logger.warn(context, message);
        break;
      case logLevel.INFO:
        logger.info(context, message);
        break;
      default:
        logger.debug(context, message);
    }
  };
}

/**
 * Create a kafkajs client for the configured brokers
 */
export function createKafkaClient(config: KafkaConfig): Kafka {
  return new Kafka({
    clientId: config.clientId,
    brokers: config.brokers,
    logLevel: logLevel.WARN,
    logCreator: kafkaLogCreator,
  });
}

/**
 * Get or create singleton Kafka producer.
 *
 * @param config - Kafka configuration with clientId and brokers
 * @returns Kafka producer instance
 */
function getOrCreateProducer(config: KafkaConfig): Producer {
  if (!producerInstance) {
    const producer = createKafkaClient(config).producer({
      allowAutoTopicCreation: true,
    });
    producer.on(producer.events.DISCONNECT, () => {
      producerConnected = false;
    });
    producerInstance = producer;
  }
  return producerInstance;
}

/**
 * Connect the singleton Kafka producer and return it for use.
 * Concurrent callers share one in-flight connect() call; a failed attempt
 * clears it so the next call starts over.
 *
 * @param config - Kafka configuration with clientId and brokers
 * @returns Connected Kafka producer instance
 */
export async function connectProducer(config: KafkaConfig): Promise<Producer> {
  if (producerConnected && producerInstance) return producerInstance;
  if (connectPromise) return connectPromise;

  connectPromise = (async () => {
    try {
      const producer = getOrCreateProducer(config);
      await producer.connect();
      producerConnected = true;
      return producer;
    } finally {
      connectPromise = null;
    }
  })();

  return connectPromise;
}

/**
 * Returns true if the Kafka producer has been created and connected.
 * Used by the /readyz endpoint to verify Kafka connectivity.
 */
export function isProducerConnected(): boolean {
  return producerConnected;
}

/**
 * Disconnect and drop the singleton Kafka producer.
 * Safe to call when no producer exists.
 */
export async function disconnectProducer(): Promise<void> {
  if (producerInstance) {
    const producer = producerInstance;
    producerInstance = null;
    producerConnected = false;
    await producer.disconnect();
  }
}

/**
 * Create a consumer that joins `groupId`. Connecting is left to the caller.
 */
export function createConsumer(config: KafkaConfig, groupId: string): Consumer {
  return createKafkaClient(config).consumer({ groupId });
}
