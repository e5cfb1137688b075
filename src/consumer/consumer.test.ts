import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { EachMessagePayload } from 'kafkajs';
import { loadConfig } from '../config.js';

vi.mock('../logger.js', () => ({
  default: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

vi.mock('../metrics.js', () => ({
  metrics: {
    recordsSkippedTotal: { inc: vi.fn() },
    messagesConsumedTotal: { inc: vi.fn() },
    consumerReconnectsTotal: { inc: vi.fn() },
    aggregateVisits: { set: vi.fn() },
  },
}));

vi.mock('../render/histogram.js', () => ({
  writeHistogram: vi.fn(),
}));

// Mock Croner
let storedRenderCallback: (() => Promise<void>) | null = null;
const mockCronStop = vi.fn();

vi.mock('croner', () => ({
  Cron: class MockCron {
    constructor(
      _pattern: string,
      _options?: unknown,
      callback?: () => Promise<void>
    ) {
      if (callback) storedRenderCallback = callback;
    }
    stop() {
      mockCronStop();
    }
  },
}));

type Listener = (event: unknown) => void;

interface FakeConsumer {
  connect: ReturnType<typeof vi.fn>;
  subscribe: ReturnType<typeof vi.fn>;
  run: ReturnType<typeof vi.fn>;
  disconnect: ReturnType<typeof vi.fn>;
  on: (event: string, listener: Listener) => void;
  events: { CRASH: string; GROUP_JOIN: string };
  listeners: Map<string, Listener>;
  emit: (event: string, payload?: unknown) => void;
  eachMessage: (payload: EachMessagePayload) => Promise<void>;
}

const createdConsumers: FakeConsumer[] = [];

function fakeConsumer(): FakeConsumer {
  const listeners = new Map<string, Listener>();
  const consumer: FakeConsumer = {
    connect: vi.fn().mockResolvedValue(undefined),
    subscribe: vi.fn().mockResolvedValue(undefined),
    run: vi.fn(async (options: { eachMessage: FakeConsumer['eachMessage'] }) => {
      consumer.eachMessage = options.eachMessage;
    }),
    disconnect: vi.fn().mockResolvedValue(undefined),
    on: (event, listener) => {
      listeners.set(event, listener);
    },
    events: { CRASH: 'consumer.crash', GROUP_JOIN: 'consumer.group_join' },
    listeners,
    emit: (event, payload) => listeners.get(event)?.({ payload }),
    eachMessage: async () => {
      throw new Error('consumer is not running');
    },
  };
  return consumer;
}

let nextConsumerSetup: ((consumer: FakeConsumer) => void) | null = null;

vi.mock('../kafka/client.js', () => ({
  createConsumer: vi.fn(() => {
    const consumer = fakeConsumer();
    nextConsumerSetup?.(consumer);
    nextConsumerSetup = null;
    createdConsumers.push(consumer);
    return consumer;
  }),
}));

import { CourseVisitConsumer } from './consumer.js';
import { createConsumer } from '../kafka/client.js';
import { writeHistogram } from '../render/histogram.js';
import { metrics } from '../metrics.js';

function messageOf(value: string | null, offset = '0'): EachMessagePayload {
  return {
    topic: 'course-visits',
    partition: 0,
    message: {
      key: null,
      value: value === null ? null : Buffer.from(value),
      timestamp: '0',
      attributes: 0,
      offset,
      headers: {},
    },
    heartbeat: async () => {},
    pause: () => () => {},
  };
}

function latestConsumer(): FakeConsumer {
  const consumer = createdConsumers[createdConsumers.length - 1];
  if (!consumer) throw new Error('no consumer created');
  return consumer;
}

const config = loadConfig({
  KAFKA_TOPIC: 'course-visits',
  KAFKA_GROUP_ID: 'tutor_group',
  CONSUMER_RECONNECT_INTERVAL_MS: '5000',
  HISTOGRAM_PATH: 'output/visits.svg',
});

describe('CourseVisitConsumer', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    createdConsumers.length = 0;
    storedRenderCallback = null;
    nextConsumerSetup = null;
    vi.mocked(writeHistogram).mockResolvedValue(true);
  });

  it('subscribes under the consumer group from the beginning and streams', async () => {
    const visits = new CourseVisitConsumer(config);

    await visits.start();

    const consumer = latestConsumer();
    expect(createConsumer).toHaveBeenCalledWith(config.kafka, 'tutor_group');
    expect(consumer.subscribe).toHaveBeenCalledWith({
      topic: 'course-visits',
      fromBeginning: true,
    });
    expect(consumer.run).toHaveBeenCalledOnce();
    expect(visits.state).toBe('streaming');
    expect(visits.isStreaming()).toBe(true);
  });

  it('aggregates two Monday Math records into 5', async () => {
    const visits = new CourseVisitConsumer(config);
    await visits.start();
    const consumer = latestConsumer();

    await consumer.eachMessage(
      messageOf('{"date":"2024-01-01","course":"Math","count":3}', '0')
    );
    await consumer.eachMessage(
      messageOf('{"date":"2024-01-01","course":"Math","count":2}', '1')
    );

    expect(visits.aggregate.get('Mon', 'Math')).toBe(5);
    expect(metrics.messagesConsumedTotal.inc).toHaveBeenCalledTimes(2);
    expect(metrics.aggregateVisits.set).toHaveBeenLastCalledWith(
      { day: 'Mon', course: 'Math' },
      5
    );
  });

  it('skips malformed messages without touching the aggregate', async () => {
    const visits = new CourseVisitConsumer(config);
    await visits.start();
    const consumer = latestConsumer();
    await consumer.eachMessage(
      messageOf('{"date":"2024-01-01","course":"Math","count":3}')
    );

    await consumer.eachMessage(
      messageOf('{"date":"2024-01-01","course":"Math"}')
    );
    await consumer.eachMessage(messageOf('not json'));
    await consumer.eachMessage(messageOf(null));

    expect(visits.aggregate.get('Mon', 'Math')).toBe(3);
    expect(visits.aggregate.total()).toBe(3);
    expect(metrics.recordsSkippedTotal.inc).toHaveBeenCalledTimes(3);
    expect(metrics.recordsSkippedTotal.inc).toHaveBeenCalledWith({
      stage: 'channel',
    });
  });

  describe('with fake timers', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('retries an unreachable broker at a fixed interval, then consumes with no records lost', async () => {
      nextConsumerSetup = (consumer) => {
        consumer.connect
          .mockRejectedValueOnce(new Error('ECONNREFUSED'))
          .mockRejectedValueOnce(new Error('ECONNREFUSED'))
          .mockResolvedValueOnce(undefined);
      };
      const visits = new CourseVisitConsumer(config);

      const started = visits.start();
      await vi.advanceTimersByTimeAsync(0);
      const consumer = latestConsumer();
      expect(visits.state).toBe('connecting');
      expect(consumer.connect).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(4999);
      expect(consumer.connect).toHaveBeenCalledTimes(1);
      await vi.advanceTimersByTimeAsync(1);
      await vi.advanceTimersByTimeAsync(0);
      expect(consumer.connect).toHaveBeenCalledTimes(2);

      await vi.advanceTimersByTimeAsync(5000);
      await started;
      expect(consumer.connect).toHaveBeenCalledTimes(3);
      expect(visits.state).toBe('streaming');

      // Records published while the broker was down are delivered from the committed offset
      await consumer.eachMessage(
        messageOf('{"date":"2024-01-01","course":"Math","count":3}', '0')
      );
      await consumer.eachMessage(
        messageOf('{"date":"2024-01-02","course":"History","count":1}', '1')
      );

      expect(visits.aggregate.get('Mon', 'Math')).toBe(3);
      expect(visits.aggregate.get('Tue', 'History')).toBe(1);
    });

    it('stops retrying when stopped before the broker is reached', async () => {
      nextConsumerSetup = (consumer) => {
        consumer.connect.mockRejectedValue(new Error('ECONNREFUSED'));
      };
      const visits = new CourseVisitConsumer(config);

      const started = visits.start();
      await vi.advanceTimersByTimeAsync(0);
      await visits.stop();
      await started;

      expect(latestConsumer().run).not.toHaveBeenCalled();
      expect(visits.state).toBe('stopped');
    });
  });

  it('disconnects a consumer whose connect finishes after stop', async () => {
    let finishConnect: () => void = () => {};
    nextConsumerSetup = (consumer) => {
      consumer.connect.mockReturnValueOnce(
        new Promise<void>((resolve) => {
          finishConnect = resolve;
        })
      );
    };
    const visits = new CourseVisitConsumer(config);

    const started = visits.start();
    await visits.stop();
    finishConnect();
    await started;

    const consumer = latestConsumer();
    expect(consumer.run).not.toHaveBeenCalled();
    expect(consumer.disconnect).toHaveBeenCalledTimes(1);
    expect(visits.state).toBe('stopped');
  });

  it('disconnects a connected consumer whose subscribe fails after stop', async () => {
    let failSubscribe: (error: Error) => void = () => {};
    nextConsumerSetup = (consumer) => {
      consumer.subscribe.mockReturnValueOnce(
        new Promise<void>((_resolve, reject) => {
          failSubscribe = reject;
        })
      );
    };
    const visits = new CourseVisitConsumer(config);

    const started = visits.start();
    await vi.waitFor(() => {
      expect(latestConsumer().subscribe).toHaveBeenCalledTimes(1);
    });
    await visits.stop();
    failSubscribe(new Error('broker went away'));
    await started;

    const consumer = latestConsumer();
    expect(consumer.run).not.toHaveBeenCalled();
    expect(consumer.disconnect).toHaveBeenCalledTimes(1);
    expect(visits.state).toBe('stopped');
  });

  it('reconnects with a fresh consumer after a crash kafkajs will not restart', async () => {
    const visits = new CourseVisitConsumer(config);
    await visits.start();
    const crashed = latestConsumer();

    crashed.emit('consumer.crash', {
      error: new Error('Connection lost'),
      groupId: 'tutor_group',
      restart: false,
    });
    expect(visits.state).toBe('reconnecting');

    await vi.waitFor(() => expect(visits.state).toBe('streaming'));

    expect(crashed.disconnect).toHaveBeenCalledOnce();
    expect(createdConsumers).toHaveLength(2);
    expect(latestConsumer().run).toHaveBeenCalledOnce();
    expect(metrics.consumerReconnectsTotal.inc).toHaveBeenCalledOnce();
  });

  it('keeps the aggregate across a reconnect', async () => {
    const visits = new CourseVisitConsumer(config);
    await visits.start();
    await latestConsumer().eachMessage(
      messageOf('{"date":"2024-01-03","course":"Math","count":2}')
    );

    latestConsumer().emit('consumer.crash', {
      error: new Error('Connection lost'),
      groupId: 'tutor_group',
      restart: false,
    });
    await vi.waitFor(() => expect(visits.state).toBe('streaming'));
    await latestConsumer().eachMessage(
      messageOf('{"date":"2024-01-03","course":"Math","count":4}')
    );

    expect(visits.aggregate.get('Wed', 'Math')).toBe(6);
  });

  it('waits for kafkajs to rejoin the group after a restartable crash', async () => {
    const visits = new CourseVisitConsumer(config);
    await visits.start();
    const consumer = latestConsumer();

    consumer.emit('consumer.crash', {
      error: new Error('Request timed out'),
      groupId: 'tutor_group',
      restart: true,
    });
    expect(visits.state).toBe('reconnecting');
    expect(createdConsumers).toHaveLength(1);

    consumer.emit('consumer.group_join');
    expect(visits.state).toBe('streaming');
  });

  it('renders on schedule only when the aggregate changed', async () => {
    const visits = new CourseVisitConsumer(config);
    await visits.start();
    expect(storedRenderCallback).not.toBeNull();

    await storedRenderCallback?.();
    expect(writeHistogram).not.toHaveBeenCalled();

    await latestConsumer().eachMessage(
      messageOf('{"date":"2024-01-01","course":"Math","count":3}')
    );
    await storedRenderCallback?.();
    await storedRenderCallback?.();

    expect(writeHistogram).toHaveBeenCalledOnce();
    expect(writeHistogram).toHaveBeenCalledWith('output/visits.svg', {
      snapshot: {
        Mon: { Math: 3 },
        Tue: {},
        Wed: {},
        Thu: {},
        Fri: {},
        Sat: {},
        Sun: {},
      },
      courses: ['Math'],
    });
  });

  it('retries a failed render on the next cycle', async () => {
    vi.mocked(writeHistogram)
      .mockRejectedValueOnce(new Error('EACCES'))
      .mockResolvedValueOnce(true);
    const visits = new CourseVisitConsumer(config);
    await visits.start();
    await latestConsumer().eachMessage(
      messageOf('{"date":"2024-01-01","course":"Math","count":3}')
    );

    await storedRenderCallback?.();
    await storedRenderCallback?.();

    expect(writeHistogram).toHaveBeenCalledTimes(2);
  });

  it('renders once more and disconnects on stop', async () => {
    const visits = new CourseVisitConsumer(config);
    await visits.start();
    const consumer = latestConsumer();
    await consumer.eachMessage(
      messageOf('{"date":"2024-01-05","course":"Chemistry","count":2}')
    );

    await visits.stop();

    expect(mockCronStop).toHaveBeenCalledOnce();
    expect(consumer.disconnect).toHaveBeenCalledOnce();
    expect(writeHistogram).toHaveBeenCalledOnce();
    expect(visits.state).toBe('stopped');

    await visits.stop();
    expect(consumer.disconnect).toHaveBeenCalledOnce();
  });

  it('ignores crashes reported while stopping', async () => {
    const visits = new CourseVisitConsumer(config);
    await visits.start();
    const consumer = latestConsumer();
    await visits.stop();

    consumer.emit('consumer.crash', {
      error: new Error('Connection closed'),
      groupId: 'tutor_group',
      restart: false,
    });

    expect(visits.state).toBe('stopped');
    expect(createdConsumers).toHaveLength(1);
  });
});
