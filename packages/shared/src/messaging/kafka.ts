import { Kafka, Producer } from 'kafkajs';
import { Logger } from '../observability';
import { EventEnvelope } from '../events';
import { toError } from '../errors';

export interface KafkaConfig {
  brokers: string[];
  clientId: string;
  retry?: {
    initialRetryTime?: number;
    retries?: number;
  };
}

/**
 * Idempotent producer for event envelopes. The record key keeps every event
 * of one subject on one partition, so consumers see them in order.
 */
export class KafkaProducer {
  private readonly producer: Producer;
  private readonly logger: Logger;
  private connected = false;

  constructor(config: KafkaConfig, logger: Logger) {
    const kafka = new Kafka({
      clientId: config.clientId,
      brokers: config.brokers,
      retry: config.retry,
    });
    this.producer = kafka.producer({ idempotent: true, maxInFlightRequests: 1 });
    this.logger = logger.child({ component: 'KafkaProducer' });
  }

  async connect(): Promise<void> {
    await this.producer.connect();
    this.connected = true;
    this.logger.info('Kafka producer connected');
  }

  async disconnect(): Promise<void> {
    if (!this.connected) return;
    await this.producer.disconnect();
    this.connected = false;
    this.logger.info('Kafka producer disconnected');
  }

  async publish<T>(topic: string, key: string, envelope: EventEnvelope<T>): Promise<void> {
    try {
      await this.producer.send({
        topic,
        messages: [
          {
            key,
            value: JSON.stringify(envelope),
            headers: {
              'event-type': envelope.eventType,
              'correlation-id': envelope.correlationId,
            },
          },
        ],
      });
      this.logger.debug('Event published', { topic, eventId: envelope.eventId });
    } catch (error) {
      this.logger.error('Failed to publish event', toError(error), { topic, eventId: envelope.eventId });
      throw error;
    }
  }
}
