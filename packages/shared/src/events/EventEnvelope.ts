export interface EventSubject {
  [key: string]: string | undefined;
  documentId?: string;
  envelopeId?: string;
}

export interface EventEnvelope<T = unknown> {
  eventId: string;
  eventType: string;
  eventVersion: number;
  occurredAt: string;
  producer: string;
  correlationId: string;
  subject: EventSubject;
  payload: T;
}
