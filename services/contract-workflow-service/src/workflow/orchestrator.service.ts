import { Inject, Injectable } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  AppError,
  ConcurrentUpdateError,
  ConflictError,
  IndexUnavailable,
  InvalidQueryError,
  InvalidTransitionError,
  Logger,
  NotFoundError,
  RetriesExhausted,
  RetryPolicy,
  TemplateInputError,
  asAppError,
  toError,
  withRetry,
} from '@contractflow/shared';
import { WORKFLOW_CONFIG, WorkflowConfig } from '../config';
import { ContractDocument, DocumentPatch, DocumentState, Signer } from '../domain/document';
import { assertTransition, checkInvariants, isTerminal } from '../domain/state-machine';
import { GenerationAdapter } from '../generation/generation.adapter';
import { EMBEDDER, Embedder } from '../generation/text-generator';
import { LOGGER } from '../logger.provider';
import { WorkflowMetrics } from '../metrics/workflow-metrics';
import { RenderAdapter } from '../render/render.adapter';
import { EnvelopeStatus, SigningUrl } from '../signature/signature-provider';
import { SignatureAdapter, parseEnvelopeStatus } from '../signature/signature.adapter';
import { DOCUMENT_STORE, DocumentFilter, DocumentMutator, DocumentStore } from '../store/document-store';
import { TemplateCatalog } from '../templates/template-catalog';
import {
  COMPARISON_INDEX,
  ComparisonIndex,
  ComparisonMatch,
  documentRecordId,
  planRecordId,
} from '../comparison/comparison-index';
import { ReferencePlan, planEmbeddingText, planMetadata } from '../comparison/reference-plans';
import { DOCUMENT_EVENTS, DocumentEvents } from './document-events.publisher';
import {
  ComparisonRequest,
  DocumentRequest,
  ReconcileDecision,
  ReconcileOutcome,
  ReindexSummary,
  StatusEvent,
} from './workflow.types';

interface TransitionResult {
  document: ContractDocument;
  applied: boolean;
}

interface StepClaimResult {
  document: ContractDocument;
  token: string | null;
}

const targetStateFor = (status: EnvelopeStatus): DocumentState => {
  switch (status) {
    case 'signed':
      return 'SIGNED';
    case 'declined':
    case 'voided':
      return 'DECLINED';
    default:
      return 'SENT';
  }
};

// SENT is the only state a provider status can move a document out of.
const decide = (current: DocumentState, target: DocumentState): ReconcileDecision => {
  if (current === 'SENT' && target !== 'SENT') return 'applied';
  if (current === target || (target === 'SIGNED' && current === 'INDEXED')) return 'duplicate';
  if (current === 'FAILED') return 'discarded';
  return 'stale';
};

/**
 * Drives contract documents through their lifecycle. This is the only place
 * that decides between retrying, failing the document, and surfacing an
 * error; every state change goes through the store's versioned update.
 */
@Injectable()
export class WorkflowOrchestrator {
  private readonly logger: Logger;

  constructor(
    @Inject(DOCUMENT_STORE) private readonly store: DocumentStore,
    private readonly catalog: TemplateCatalog,
    private readonly generation: GenerationAdapter,
    private readonly renderer: RenderAdapter,
    private readonly signature: SignatureAdapter,
    @Inject(COMPARISON_INDEX) private readonly index: ComparisonIndex,
    @Inject(EMBEDDER) private readonly embedder: Embedder,
    @Inject(DOCUMENT_EVENTS) private readonly events: DocumentEvents,
    @Inject(WORKFLOW_CONFIG) private readonly config: WorkflowConfig,
    @Inject(LOGGER) logger: Logger,
    private readonly metrics: WorkflowMetrics
  ) {
    this.logger = logger.child({ component: 'WorkflowOrchestrator' });
  }

  // ---------------------------------------------------------------------------
  // Requests

  async createDocument(request: DocumentRequest, correlationId: string = uuidv4()): Promise<ContractDocument> {
    const { role, template } = this.catalog.resolve(request.role, request.templateId);
    const inputs = request.inputs || {};
    this.generation.validateInputs(template, inputs);

    if (!request.signers || request.signers.length === 0) {
      throw new TemplateInputError('At least one signer is required');
    }
    const signers: Signer[] = request.signers.map((s) => ({
      name: s.name,
      email: s.email,
      clientUserId: s.clientUserId || s.email,
    }));

    const doc = await this.store.create({
      role,
      templateId: template.id,
      inputs,
      signers,
      metadata: request.metadata || {},
    });

    this.logger.info('Document requested', { documentId: doc.id, role, templateId: template.id, correlationId });
    return doc;
  }

  /** Creates the document and runs it up to the point where it waits for signers. */
  async requestDocument(request: DocumentRequest, correlationId: string = uuidv4()): Promise<ContractDocument> {
    const doc = await this.createDocument(request, correlationId);
    return this.advance(doc.id, correlationId);
  }

  async getDocument(id: string): Promise<ContractDocument> {
    return this.store.get(id);
  }

  async listDocuments(filter: DocumentFilter = {}): Promise<ContractDocument[]> {
    return this.store.list(filter);
  }

  /**
   * Resumes the workflow from the document's current state. Stops when the
   * document waits on an external party, reaches a terminal state, or
   * another caller is already driving it.
   */
  async advance(id: string, correlationId: string = uuidv4()): Promise<ContractDocument> {
    let doc = await this.store.get(id);

    for (;;) {
      let step: TransitionResult;
      switch (doc.state) {
        case 'REQUESTED':
          step = await this.draft(doc, correlationId);
          break;
        case 'DRAFTED':
          step = await this.render(doc, correlationId);
          break;
        case 'RENDERED':
          step = await this.send(doc, correlationId);
          break;
        case 'SIGNED':
          return this.indexDocument(doc, correlationId);
        default:
          return doc;
      }
      if (!step.applied) {
        return step.document;
      }
      doc = step.document;
    }
  }

  async cancel(id: string, reason: string, correlationId: string = uuidv4()): Promise<ContractDocument> {
    const seen: { from: DocumentState } = { from: 'REQUESTED' };
    const doc = await this.mutate(id, (current) => {
      if (isTerminal(current.state)) {
        throw new InvalidTransitionError(`Document ${id} is already ${current.state}`);
      }
      seen.from = current.state;
      return this.failurePatch(current, 'CANCELLED', reason);
    });

    this.logger.warn('Document cancelled', { documentId: id, from: seen.from, reason, correlationId });
    await this.announce(doc, seen.from, correlationId);
    return doc;
  }

  async getSigningUrl(id: string, email?: string): Promise<SigningUrl> {
    const doc = await this.store.get(id);
    if (doc.state !== 'SENT' || !doc.envelopeId) {
      throw new InvalidTransitionError(`Document ${id} is not awaiting signature (state ${doc.state})`);
    }
    const envelopeId = doc.envelopeId;

    const signer = email ? doc.signers.find((s) => s.email.toLowerCase() === email.toLowerCase()) : doc.signers[0];
    if (!signer) {
      throw new NotFoundError(`No signer ${email} on document ${id}`);
    }

    return this.retrying('getSigningUrl', this.config.retry.signature, () =>
      this.signature.getSigningUrl(envelopeId, signer)
    );
  }

  // ---------------------------------------------------------------------------
  // Lifecycle steps

  private async draft(doc: ContractDocument, correlationId: string): Promise<TransitionResult> {
    const claim = await this.claimStep(doc.id, 'REQUESTED', correlationId);
    if (!claim.token) return { document: claim.document, applied: false };
    const token = claim.token;

    let content: string;
    try {
      content = await this.retrying('generate', this.config.retry.generation, () =>
        this.generation.generate(doc.role, doc.templateId, doc.inputs)
      );
    } catch (err) {
      throw await this.failStep(doc, err, correlationId, token);
    }
    return this.transition(doc.id, 'REQUESTED', 'DRAFTED', { content }, correlationId, token);
  }

  private async render(doc: ContractDocument, correlationId: string): Promise<TransitionResult> {
    const claim = await this.claimStep(doc.id, 'DRAFTED', correlationId);
    if (!claim.token) return { document: claim.document, applied: false };
    const token = claim.token;

    let renderedBlobRef: string;
    try {
      if (!doc.content) {
        throw new InvalidTransitionError(`Document ${doc.id} has no content to render`);
      }
      renderedBlobRef = await this.renderer.render({
        content: doc.content,
        templateId: doc.templateId,
        role: doc.role,
        metadata: doc.metadata,
        signers: doc.signers,
      });
    } catch (err) {
      throw await this.failStep(doc, err, correlationId, token);
    }
    return this.transition(doc.id, 'DRAFTED', 'RENDERED', { renderedBlobRef }, correlationId, token);
  }

  private async send(doc: ContractDocument, correlationId: string): Promise<TransitionResult> {
    const claim = await this.claimStep(doc.id, 'RENDERED', correlationId);
    if (!claim.token) return { document: claim.document, applied: false };
    const token = claim.token;

    let envelopeId: string;
    try {
      envelopeId = await this.retrying('createEnvelope', this.config.retry.signature, () =>
        this.signature.createEnvelope(doc, doc.signers)
      );
    } catch (err) {
      throw await this.failStep(doc, err, correlationId, token);
    }

    const result = await this.transition(doc.id, 'RENDERED', 'SENT', { envelopeId }, correlationId, token);
    if (!result.applied) {
      await this.voidOrphan(doc.id, envelopeId, result.document.state, correlationId);
    }
    return result;
  }

  /** Withdraws an envelope whose document moved on while it was being created. */
  private async voidOrphan(id: string, envelopeId: string, state: DocumentState, correlationId: string): Promise<void> {
    const context = { documentId: id, envelopeId, state, correlationId };
    try {
      await this.retrying('voidEnvelope', this.config.retry.signature, () =>
        this.signature.voidEnvelope(envelopeId, `Document ${id} is ${state}; this envelope is no longer tracked`)
      );
      this.logger.warn('Voided envelope created for a document that has moved on', context);
    } catch (err) {
      this.logger.error('Could not void untracked envelope', asAppError(err), context);
    }
  }

  /**
   * Embeds and upserts a SIGNED document. SIGNED is terminal for the
   * signature lifecycle, so an indexing failure leaves the document SIGNED
   * for a later re-index instead of failing it.
   */
  private async indexDocument(doc: ContractDocument, correlationId: string): Promise<ContractDocument> {
    try {
      await this.upsertDocument(doc);
    } catch (err) {
      const error = asAppError(err).forDocument(doc.id, doc.state);
      this.logger.error('Indexing failed', error, { documentId: doc.id, correlationId });
      throw error;
    }
    return (await this.transition(doc.id, 'SIGNED', 'INDEXED', {}, correlationId)).document;
  }

  private async upsertDocument(doc: ContractDocument): Promise<void> {
    if (!doc.content) {
      throw new InvalidTransitionError(`Document ${doc.id} has no content to index`);
    }
    const content = doc.content;
    const vector = await this.embed(content);
    const template = this.catalog.get(doc.templateId);
    await this.retrying('indexUpsert', this.config.retry.index, () =>
      this.index.upsert(documentRecordId(doc.id), vector, {
        ...doc.metadata,
        documentId: doc.id,
        role: doc.role,
        templateId: doc.templateId,
        documentType: template.documentType,
        title: template.title,
      })
    );
  }

  // ---------------------------------------------------------------------------
  // Signature status reconciliation

  /**
   * Merges a status event into the document. Events may repeat or arrive out
   * of order; a document never moves backwards and a repeated event is a
   * no-op.
   */
  async reconcile(event: StatusEvent, correlationId: string = uuidv4()): Promise<ReconcileOutcome> {
    const status = parseEnvelopeStatus(event.status);
    if (!status) {
      throw new InvalidQueryError(`Unknown envelope status: ${event.status}`);
    }

    const [doc] = await this.store.list({ envelopeId: event.envelopeId, limit: 1 });
    if (!doc) {
      throw new NotFoundError(`No document for envelope ${event.envelopeId}`);
    }
    return this.applyStatus(doc.id, status, event, correlationId);
  }

  /**
   * Polls the provider for one SENT document. Returns null when there was
   * nothing to apply: the document is no longer SENT, or the provider stayed
   * unreachable past the retry budget and the next sweep tries again. A
   * permanent provider error fails the document.
   */
  async pollStatus(id: string, correlationId: string = uuidv4()): Promise<ReconcileOutcome | null> {
    const doc = await this.store.get(id);
    if (doc.state !== 'SENT' || !doc.envelopeId) {
      return null;
    }
    const envelopeId = doc.envelopeId;

    let status: EnvelopeStatus;
    try {
      status = await this.retrying('getEnvelopeStatus', this.config.retry.signature, () =>
        this.signature.getEnvelopeStatus(envelopeId)
      );
    } catch (err) {
      if (err instanceof RetriesExhausted) {
        this.logger.warn('Status poll exhausted its retries; document stays SENT', {
          documentId: id,
          envelopeId,
          error: err.message,
        });
        return null;
      }
      throw await this.failStep(doc, err, correlationId);
    }

    return this.applyStatus(id, status, { envelopeId, status, source: 'poll' }, correlationId);
  }

  private async applyStatus(
    id: string,
    status: EnvelopeStatus,
    event: StatusEvent,
    correlationId: string
  ): Promise<ReconcileOutcome> {
    const target = targetStateFor(status);
    const seen: { decision: ReconcileDecision; previousState: DocumentState } = {
      decision: 'stale',
      previousState: 'SENT',
    };

    const doc = await this.mutate(id, (current) => {
      seen.previousState = current.state;
      seen.decision = decide(current.state, target);
      if (seen.decision !== 'applied') return null;
      assertTransition(current.state, target);
      return { state: target };
    });
    const { decision, previousState } = seen;
    this.metrics.statusEvent(event.source, decision);

    const context = {
      documentId: id,
      envelopeId: event.envelopeId,
      status,
      source: event.source,
      state: doc.state,
      correlationId,
    };

    if (decision === 'applied') {
      await this.announce(doc, previousState, correlationId);
    } else if (decision === 'duplicate') {
      this.logger.debug('Status already recorded', context);
    } else {
      this.logger.warn(decision === 'stale' ? 'Ignoring stale envelope status' : 'Discarding status for failed document', context);
    }

    if (decision === 'applied' && doc.state === 'SIGNED') {
      try {
        return { document: await this.indexDocument(doc, correlationId), decision, previousState };
      } catch (err) {
        // Already logged by indexDocument; the signature outcome itself is recorded.
        this.logger.warn('Document signed but not yet indexed', { documentId: id, code: asAppError(err).code });
      }
    }

    return { document: doc, decision, previousState };
  }

  // ---------------------------------------------------------------------------
  // Comparison index

  async reindex(id: string, correlationId: string = uuidv4()): Promise<ContractDocument> {
    const doc = await this.store.get(id);
    if (doc.state === 'SIGNED') {
      return this.indexDocument(doc, correlationId);
    }
    if (doc.state === 'INDEXED') {
      await this.upsertDocument(doc);
      this.logger.info('Document re-indexed', { documentId: id, correlationId });
      return doc;
    }
    throw new InvalidTransitionError(`Document ${id} cannot be indexed in state ${doc.state}`);
  }

  async reindexAll(correlationId: string = uuidv4()): Promise<ReindexSummary> {
    const summary: ReindexSummary = { reindexed: [], failed: [] };
    const pageSize = 100;

    for (const state of ['INDEXED', 'SIGNED'] as const) {
      const docs: ContractDocument[] = [];
      for (let offset = 0; ; offset += pageSize) {
        const page = await this.store.list({ state, limit: pageSize, offset });
        docs.push(...page);
        if (page.length < pageSize) break;
      }

      for (const doc of docs) {
        try {
          await this.reindex(doc.id, correlationId);
          summary.reindexed.push(doc.id);
        } catch (err) {
          const error = asAppError(err);
          this.logger.error('Re-index failed', error, { documentId: doc.id, correlationId });
          summary.failed.push({ documentId: doc.id, code: error.code });
        }
      }
    }

    return summary;
  }

  async loadReferencePlans(plans: ReferencePlan[]): Promise<number> {
    for (const plan of plans) {
      const vector = await this.embed(planEmbeddingText(plan));
      await this.retrying('indexUpsert', this.config.retry.index, () =>
        this.index.upsert(planRecordId(plan.planId), vector, planMetadata(plan))
      );
    }
    this.logger.info('Reference plans indexed', { count: plans.length });
    return plans.length;
  }

  async compare(request: ComparisonRequest): Promise<ComparisonMatch[]> {
    if (!Number.isInteger(request.k) || request.k <= 0) {
      throw new InvalidQueryError(`k must be a positive integer, got ${request.k}`);
    }

    const sources = [request.text, request.documentId, request.vector].filter((s) => s !== undefined);
    if (sources.length !== 1) {
      throw new InvalidQueryError('Provide exactly one of text, documentId or vector');
    }

    if (request.vector) {
      return this.index.query(request.vector, request.k, { kind: request.kind });
    }

    if (request.documentId !== undefined) {
      if (request.documentId.trim().length === 0) {
        throw new InvalidQueryError('documentId must not be empty');
      }
      const recordId = documentRecordId(request.documentId);
      const record = await this.index.get(recordId);
      if (!record) {
        throw new InvalidQueryError(`Document ${request.documentId} is not indexed`);
      }
      return this.index.query(record.vector, request.k, { kind: request.kind, excludeRecordId: recordId });
    }

    const text = (request.text || '').trim();
    if (text.length === 0) {
      throw new InvalidQueryError('Query text must not be empty');
    }
    return this.index.query(await this.embed(text), request.k, { kind: request.kind });
  }

  private async embed(text: string): Promise<number[]> {
    return this.retrying('embed', this.config.retry.index, async () => {
      try {
        return await this.embedder.embed(text);
      } catch (err) {
        if (err instanceof AppError) throw err;
        const error = toError(err);
        throw new IndexUnavailable(`Embedding failed: ${error.message}`, error);
      }
    });
  }

  // ---------------------------------------------------------------------------
  // Persistence helpers

  private retrying<T>(operation: string, policy: RetryPolicy, fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, policy, { operation, logger: this.logger }).catch((err: unknown) => {
      if (err instanceof RetriesExhausted) this.metrics.retriesExhausted(operation);
      throw err;
    });
  }

  /** Versioned read-modify-write, re-read and re-applied on conflict. */
  private async mutate(id: string, mutator: DocumentMutator): Promise<ContractDocument> {
    const maxAttempts = this.config.storeUpdateMaxAttempts;
    let lastConflict: ConflictError | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        return await this.store.update(id, mutator);
      } catch (err) {
        if (!(err instanceof ConflictError)) throw err;
        lastConflict = err;
        this.logger.debug('Concurrent update, retrying', { documentId: id, attempt });
      }
    }

    throw new ConcurrentUpdateError(id, maxAttempts, lastConflict || new ConflictError(id, -1));
  }

  /**
   * Takes the claim on the step leaving `from`, so that only one caller makes
   * its outbound call. Fails to claim when the document has left `from` or a
   * claim younger than the configured TTL is held by someone else.
   */
  private async claimStep(id: string, from: DocumentState, correlationId: string): Promise<StepClaimResult> {
    const token = uuidv4();
    const seen = { claimed: false };

    const document = await this.mutate(id, (current) => {
      seen.claimed = false;
      if (current.state !== from) return null;
      const held = current.claim;
      if (held && held.state === from && Date.now() - Date.parse(held.at) < this.config.stepClaimTtlMs) return null;
      seen.claimed = true;
      return { claim: { state: from, token, at: new Date().toISOString() } };
    });

    if (!seen.claimed) {
      this.logger.info('Step already in progress elsewhere; not advancing', {
        documentId: id,
        state: document.state,
        correlationId,
      });
      return { document, token: null };
    }
    return { document, token };
  }

  /**
   * Moves the document from `from` to `to` unless it has left `from` in the
   * meantime, or the step's claim passed to another caller. Either way the
   * step's result is discarded.
   */
  private async transition(
    id: string,
    from: DocumentState,
    to: DocumentState,
    patch: DocumentPatch,
    correlationId: string,
    token?: string
  ): Promise<TransitionResult> {
    assertTransition(from, to);
    const seen = { applied: false };

    const document = await this.mutate(id, (current) => {
      seen.applied = current.state === from && (token === undefined || current.claim?.token === token);
      return seen.applied ? { ...patch, state: to, claim: null } : null;
    });
    const applied = seen.applied;

    if (applied) {
      await this.announce(document, from, correlationId);
    } else {
      this.logger.warn('Discarding step result; document state changed', {
        documentId: id,
        expected: from,
        actual: document.state,
        correlationId,
      });
    }
    return { document, applied };
  }

  private failurePatch(current: ContractDocument, kind: string, message: string): DocumentPatch {
    return {
      state: 'FAILED',
      envelopeId: null,
      failure: {
        kind,
        message,
        lastStableState: current.state,
        envelopeId: current.envelopeId || undefined,
        at: new Date().toISOString(),
      },
      claim: null,
    };
  }

  /**
   * Fails the document after a step could not complete and returns the error
   * to surface, tagged with the document's last stable state.
   */
  private async failStep(doc: ContractDocument, err: unknown, correlationId: string, token?: string): Promise<AppError> {
    const error = asAppError(err).forDocument(doc.id, doc.state);

    const seen = { applied: false };
    const failed = await this.mutate(doc.id, (current) => {
      seen.applied = current.state === doc.state && (token === undefined || current.claim?.token === token);
      return seen.applied ? this.failurePatch(current, error.code, error.message) : null;
    });

    if (seen.applied) {
      this.logger.error('Document failed', error, { documentId: doc.id, from: doc.state, correlationId });
      await this.announce(failed, doc.state, correlationId);
    }
    return error;
  }

  private async announce(doc: ContractDocument, from: DocumentState, correlationId: string): Promise<void> {
    this.logger.info('Document transitioned', { documentId: doc.id, from, to: doc.state, correlationId });
    this.metrics.transitioned(from, doc.state, doc.failure?.kind);
    const violations = checkInvariants(doc);
    if (violations.length > 0) {
      this.logger.warn('Document invariants violated', { documentId: doc.id, violations, correlationId });
    }
    await this.events.transitioned(doc, from, correlationId);
  }
}
