import { createLogger } from '@contractflow/shared';
import { InMemoryComparisonIndex } from '../src/comparison/comparison-index';
import { WorkflowConfig, loadConfig } from '../src/config';
import { ContractDocument, DocumentState, Signer } from '../src/domain/document';
import { GenerationAdapter } from '../src/generation/generation.adapter';
import { Embedder, GenerationPrompt, TextGenerator } from '../src/generation/text-generator';
import { WorkflowMetrics } from '../src/metrics/workflow-metrics';
import { BlobStore } from '../src/render/blob-store';
import { RenderAdapter } from '../src/render/render.adapter';
import { EnvelopeRequest, SignatureProvider, SigningUrl } from '../src/signature/signature-provider';
import { SignatureAdapter } from '../src/signature/signature.adapter';
import { DocumentStore } from '../src/store/document-store';
import { InMemoryDocumentStore } from '../src/store/in-memory-document.store';
import { ContractTemplate } from '../src/templates/contract-templates';
import { TemplateCatalog } from '../src/templates/template-catalog';
import { DocumentEvents } from '../src/workflow/document-events.publisher';
import { WorkflowOrchestrator } from '../src/workflow/orchestrator.service';

export const silentLogger = createLogger({ serviceName: 'contract-workflow-service', level: 'silent' });

export const T1: ContractTemplate = {
  id: 'T1',
  role: 'patient',
  title: 'Patient Agreement',
  documentType: 'care_agreement',
  variables: ['name'],
  sections: ['Parties', 'Consent'],
  signatureLabel: 'Patient',
};

export const T2: ContractTemplate = {
  id: 'T2',
  role: 'provider',
  title: 'Provider Agreement',
  documentType: 'network_agreement',
  variables: ['providerName', 'npi'],
  sections: ['Parties', 'Reimbursement'],
  signatureLabel: 'Provider',
};

export const testCatalog = (): TemplateCatalog => new TemplateCatalog([T1, T2]);

export function testConfig(env: Record<string, string> = {}): WorkflowConfig {
  return loadConfig({
    STORE_DRIVER: 'memory',
    GENERATION_BASE_DELAY_MS: '0',
    SIGNATURE_BASE_DELAY_MS: '0',
    INDEX_BASE_DELAY_MS: '0',
    RETRY_JITTER: '0',
    STATUS_POLL_INTERVAL_MS: '0',
    ...env,
  });
}

export const jane = { name: 'Jane Doe', email: 'jane@example.com' };

type Scripted = string | Error;

export class FakeTextGenerator implements TextGenerator {
  readonly provider = 'fake';
  readonly prompts: GenerationPrompt[] = [];
  private readonly script: Scripted[] = [];

  constructor(private readonly fallback = '# Agreement\n\nThe parties agree to the terms below.') {}

  enqueue(...responses: Scripted[]): this {
    this.script.push(...responses);
    return this;
  }

  async complete(prompt: GenerationPrompt): Promise<string> {
    this.prompts.push(prompt);
    const next = this.script.shift();
    if (next instanceof Error) throw next;
    return next === undefined ? this.fallback : next;
  }
}

/** Vector of letter counts for a-e, plus one so no vector is all zeros. */
export const letterVector = (text: string): number[] =>
  ['a', 'b', 'c', 'd', 'e'].map((ch) => text.toLowerCase().split(ch).length - 1).concat(1);

export class FakeEmbedder implements Embedder {
  readonly texts: string[] = [];
  readonly fixed = new Map<string, number[]>();
  failures: Error[] = [];

  async embed(text: string): Promise<number[]> {
    this.texts.push(text);
    const failure = this.failures.shift();
    if (failure) throw failure;
    return this.fixed.get(text) || letterVector(text);
  }
}

export class MemoryBlobStore implements BlobStore {
  readonly blobs = new Map<string, Buffer>();
  puts = 0;

  async locate(name: string): Promise<string | null> {
    return this.blobs.has(name) ? `mem://${name}` : null;
  }

  async put(name: string, bytes: Buffer): Promise<string> {
    this.puts++;
    this.blobs.set(name, bytes);
    return `mem://${name}`;
  }

  async read(ref: string): Promise<Buffer> {
    const bytes = this.blobs.get(ref.replace('mem://', ''));
    if (!bytes) throw new Error(`no blob ${ref}`);
    return bytes;
  }
}

export class FakeSignatureProvider implements SignatureProvider {
  readonly envelopes: EnvelopeRequest[] = [];
  readonly statuses = new Map<string, string>();
  readonly envelopeIds: string[] = ['E1'];
  readonly voided: string[] = [];
  statusFailures: Error[] = [];
  createFailures: Error[] = [];
  /** When set, envelope creation waits for it after signalling `creating`. */
  hold: { creating: () => void; until: Promise<void> } | null = null;

  async createEnvelope(request: EnvelopeRequest): Promise<string> {
    const failure = this.createFailures.shift();
    if (failure) throw failure;
    if (this.hold) {
      this.hold.creating();
      await this.hold.until;
    }
    this.envelopes.push(request);
    const id = this.envelopeIds.shift() || `E${this.envelopes.length}`;
    this.statuses.set(id, 'sent');
    return id;
  }

  async getSigningUrl(envelopeId: string, signer: Signer): Promise<SigningUrl> {
    return {
      url: `https://sign.example.test/${envelopeId}/${signer.clientUserId}`,
      expiresAt: new Date('2030-01-01T00:05:00Z'),
    };
  }

  async getEnvelopeStatus(envelopeId: string): Promise<string> {
    const failure = this.statusFailures.shift();
    if (failure) throw failure;
    return this.statuses.get(envelopeId) || 'sent';
  }

  async voidEnvelope(envelopeId: string): Promise<void> {
    this.voided.push(envelopeId);
    this.statuses.set(envelopeId, 'voided');
  }
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export interface RecordedTransition {
  documentId: string;
  from: DocumentState;
  to: DocumentState;
}

export class RecordingEvents implements DocumentEvents {
  readonly transitions: RecordedTransition[] = [];

  async transitioned(doc: ContractDocument, from: DocumentState): Promise<void> {
    this.transitions.push({ documentId: doc.id, from, to: doc.state });
  }

  path(documentId: string): DocumentState[] {
    return this.transitions.filter((t) => t.documentId === documentId).map((t) => t.to);
  }
}

export interface WorkflowOptions {
  env?: Record<string, string>;
  store?: DocumentStore;
}

export function buildWorkflow(options: WorkflowOptions = {}) {
  const config = testConfig(options.env);
  const catalog = testCatalog();
  const store = options.store || new InMemoryDocumentStore();
  const index = new InMemoryComparisonIndex();
  const generator = new FakeTextGenerator();
  const embedder = new FakeEmbedder();
  const blobs = new MemoryBlobStore();
  const provider = new FakeSignatureProvider();
  const events = new RecordingEvents();

  const generation = new GenerationAdapter(catalog, generator);
  const renderer = new RenderAdapter(catalog, blobs);
  const signature = new SignatureAdapter(provider, blobs, catalog);

  const metrics = new WorkflowMetrics();
  const orchestrator = new WorkflowOrchestrator(
    store,
    catalog,
    generation,
    renderer,
    signature,
    index,
    embedder,
    events,
    config,
    silentLogger,
    metrics
  );

  return { config, catalog, store, index, generator, embedder, blobs, provider, events, renderer, metrics, orchestrator };
}
