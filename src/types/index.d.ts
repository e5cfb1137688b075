/**
 * Kafka client configuration
 *
 * @property clientId - Unique client identifier for logging/monitoring
 * @property brokers - List of Kafka broker addresses (host:port format)
 */
export interface KafkaConfig {
  clientId: string;
  brokers: string[];
}

/**
 * Totals reported when a producer run ends
 *
 * @property passes - Completed reads of the source file (more than one when looping)
 */
export interface ProducerStats {
  rowsRead: number;
  published: number;
  skipped: number;
  passes: number;
}

/**
 * Consumer lifecycle: connecting → streaming → (disconnected → reconnecting) → streaming
 */
export type ConsumerState =
  | 'idle'
  | 'connecting'
  | 'streaming'
  | 'disconnected'
  | 'reconnecting'
  | 'stopped';
