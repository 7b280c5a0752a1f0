import { Injectable, OnModuleInit } from '@nestjs/common';
import { Counter, Registry, collectDefaultMetrics } from 'prom-client';
import { DocumentState } from '../domain/document';
import { ReconcileDecision, StatusSource } from '../workflow/workflow.types';

/** Prometheus counters for document transitions, status events and exhausted retries. */
@Injectable()
export class WorkflowMetrics implements OnModuleInit {
  readonly register: Registry;
  private readonly transitions: Counter<'from' | 'to'>;
  private readonly failures: Counter<'kind'>;
  private readonly statusEvents: Counter<'source' | 'decision'>;
  private readonly exhausted: Counter<'operation'>;

  constructor() {
    this.register = new Registry();
    this.transitions = new Counter({
      name: 'contract_document_transitions_total',
      help: 'Document state transitions',
      labelNames: ['from', 'to'],
      registers: [this.register],
    });
    this.failures = new Counter({
      name: 'contract_document_failures_total',
      help: 'Documents moved to FAILED, by failure kind',
      labelNames: ['kind'],
      registers: [this.register],
    });
    this.statusEvents = new Counter({
      name: 'contract_status_events_total',
      help: 'Envelope status events, by source and reconcile decision',
      labelNames: ['source', 'decision'],
      registers: [this.register],
    });
    this.exhausted = new Counter({
      name: 'contract_adapter_retries_exhausted_total',
      help: 'Adapter calls that ran out of retry attempts',
      labelNames: ['operation'],
      registers: [this.register],
    });
  }

  onModuleInit(): void {
    collectDefaultMetrics({ register: this.register });
  }

  transitioned(from: DocumentState, to: DocumentState, failureKind?: string): void {
    this.transitions.inc({ from, to });
    if (to === 'FAILED') {
      this.failures.inc({ kind: failureKind || 'UNKNOWN' });
    }
  }

  statusEvent(source: StatusSource, decision: ReconcileDecision): void {
    this.statusEvents.inc({ source, decision });
  }

  retriesExhausted(operation: string): void {
    this.exhausted.inc({ operation });
  }

  metrics(): Promise<string> {
    return this.register.metrics();
  }
}
