import { Inject, Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { EventEnvelope, KafkaProducer, Logger, toError } from '@contractflow/shared';
import { WORKFLOW_CONFIG, WorkflowConfig } from '../config';
import { ContractDocument, DocumentState } from '../domain/document';
import { LOGGER } from '../logger.provider';

export const DOCUMENT_EVENTS = Symbol('DOCUMENT_EVENTS');

export interface DocumentTransitionPayload {
  documentId: string;
  role: string;
  templateId: string;
  from: DocumentState;
  to: DocumentState;
  envelopeId: string | null;
  failureKind: string | null;
}

export interface DocumentEvents {
  transitioned(doc: ContractDocument, from: DocumentState, correlationId: string): Promise<void>;
}

export const transitionTopic = (state: DocumentState): string => `contract.document.${state.toLowerCase()}`;

/**
 * Publishes one event per lifecycle transition when Kafka is configured.
 * The transition is already persisted when this runs, so a publish failure
 * is logged rather than unwinding the workflow.
 */
@Injectable()
export class KafkaDocumentEvents implements DocumentEvents, OnModuleInit, OnModuleDestroy {
  private kafkaProducer?: KafkaProducer;

  constructor(
    @Inject(WORKFLOW_CONFIG) private readonly config: WorkflowConfig,
    @Inject(LOGGER) private readonly logger: Logger
  ) {}

  async onModuleInit(): Promise<void> {
    if (!this.config.kafka) return;
    this.kafkaProducer = new KafkaProducer(this.config.kafka, this.logger);
    await this.kafkaProducer.connect();
  }

  async onModuleDestroy(): Promise<void> {
    await this.kafkaProducer?.disconnect();
  }

  async transitioned(doc: ContractDocument, from: DocumentState, correlationId: string): Promise<void> {
    if (!this.kafkaProducer) return;

    const envelope: EventEnvelope<DocumentTransitionPayload> = {
      eventId: uuidv4(),
      eventType: 'DocumentTransitioned',
      eventVersion: 1,
      occurredAt: doc.updatedAt.toISOString(),
      producer: this.config.serviceName,
      correlationId,
      subject: { documentId: doc.id, envelopeId: doc.envelopeId || undefined },
      payload: {
        documentId: doc.id,
        role: doc.role,
        templateId: doc.templateId,
        from,
        to: doc.state,
        envelopeId: doc.envelopeId,
        failureKind: doc.failure?.kind || null,
      },
    };

    try {
      await this.kafkaProducer.publish(transitionTopic(doc.state), doc.id, envelope);
    } catch (err) {
      this.logger.error('Failed to publish document transition', toError(err), {
        documentId: doc.id,
        state: doc.state,
      });
    }
  }
}
