import { Inject, Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { v4 as uuidv4 } from 'uuid';
import pLimit from 'p-limit';
import { Logger, asAppError } from '@contractflow/shared';
import { WORKFLOW_CONFIG, WorkflowConfig } from '../config';
import { ContractDocument, DocumentState } from '../domain/document';
import { LOGGER } from '../logger.provider';
import { WorkflowOrchestrator } from './orchestrator.service';

const INTERVAL_NAME = 'envelope-status-poll';

type SweptState = Extract<DocumentState, 'SENT' | 'SIGNED'>;
type Limit = ReturnType<typeof pLimit>;

export interface SweepSummary {
  polled: number;
  applied: number;
  indexed: number;
  failed: number;
}

/**
 * Polls the signature provider for documents waiting on signers and retries
 * indexing of signed documents whose upsert did not go through. Sweeps do
 * not overlap; a tick that lands while one is running is skipped.
 */
@Injectable()
export class StatusPollerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger: Logger;
  private running = false;

  constructor(
    private readonly orchestrator: WorkflowOrchestrator,
    private readonly scheduler: SchedulerRegistry,
    @Inject(WORKFLOW_CONFIG) private readonly config: WorkflowConfig,
    @Inject(LOGGER) logger: Logger
  ) {
    this.logger = logger.child({ component: 'StatusPoller' });
  }

  onModuleInit(): void {
    const { intervalMs } = this.config.statusPoll;
    if (intervalMs <= 0) {
      this.logger.info('Envelope status polling disabled');
      return;
    }

    const handle = setInterval(() => {
      this.tick().catch((err) => this.logger.error('Status sweep crashed', asAppError(err)));
    }, intervalMs);
    this.scheduler.addInterval(INTERVAL_NAME, handle);
    this.logger.info('Envelope status polling started', { intervalMs });
  }

  onModuleDestroy(): void {
    if (this.scheduler.doesExist('interval', INTERVAL_NAME)) {
      this.scheduler.deleteInterval(INTERVAL_NAME);
    }
  }

  private async tick(): Promise<void> {
    if (this.running) {
      this.logger.debug('Previous sweep still running, skipping');
      return;
    }
    this.running = true;
    try {
      await this.sweep();
    } finally {
      this.running = false;
    }
  }

  async sweep(): Promise<SweepSummary> {
    const correlationId = uuidv4();
    const summary: SweepSummary = { polled: 0, applied: 0, indexed: 0, failed: 0 };
    const limit = pLimit(this.config.statusPoll.concurrency);

    const onFailure = (doc: ContractDocument, reason: unknown) => {
      summary.failed++;
      this.logger.warn('Sweep step failed', { documentId: doc.id, code: asAppError(reason).code, correlationId });
    };

    const sent = await this.drain('SENT', limit, onFailure, async (doc) => {
      const outcome = await this.orchestrator.pollStatus(doc.id, correlationId);
      summary.polled++;
      if (outcome && outcome.decision === 'applied') summary.applied++;
      return outcome ? outcome.document.state : 'SENT';
    });

    const signed = await this.drain('SIGNED', limit, onFailure, async (doc) => {
      const indexed = await this.orchestrator.reindex(doc.id, correlationId);
      summary.indexed++;
      return indexed.state;
    });

    if (sent + signed > 0) {
      this.logger.info('Status sweep finished', { ...summary, correlationId });
    }
    return summary;
  }

  /**
   * Visits every document in `state`, a page at a time. Documents that leave
   * the state drop out of the listing, so the offset only moves past the
   * ones still in it. Returns the number of documents visited.
   */
  private async drain(
    state: SweptState,
    limit: Limit,
    onFailure: (doc: ContractDocument, reason: unknown) => void,
    visit: (doc: ContractDocument) => Promise<DocumentState>
  ): Promise<number> {
    const { batchSize } = this.config.statusPoll;
    let offset = 0;
    let visited = 0;

    for (;;) {
      const page = await this.orchestrator.listDocuments({ state, limit: batchSize, offset });
      visited += page.length;

      const results = await Promise.allSettled(page.map((doc) => limit(() => visit(doc))));
      for (const [i, result] of results.entries()) {
        let after: DocumentState | null;
        if (result.status === 'fulfilled') {
          after = result.value;
        } else {
          onFailure(page[i], result.reason);
          after = await this.currentState(page[i].id);
        }
        if (after === state) offset++;
      }

      if (page.length < batchSize) return visited;
    }
  }

  private async currentState(id: string): Promise<DocumentState | null> {
    try {
      return (await this.orchestrator.getDocument(id)).state;
    } catch (err) {
      this.logger.warn('Could not re-read document after a failed sweep step', {
        documentId: id,
        code: asAppError(err).code,
      });
      return null;
    }
  }
}
