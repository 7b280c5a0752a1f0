import { DynamicModule, Module, Provider } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Logger } from '@contractflow/shared';
import { InMemoryComparisonIndex, COMPARISON_INDEX } from './comparison/comparison-index';
import { ReferencePlansLoader } from './comparison/reference-plans.loader';
import { TypeOrmComparisonIndex } from './comparison/typeorm-comparison.index';
import { WORKFLOW_CONFIG, WorkflowConfig } from './config';
import { ComparisonsController } from './controllers/comparisons.controller';
import { DocumentsController } from './controllers/documents.controller';
import { HealthController } from './controllers/health.controller';
import { MetricsController } from './controllers/metrics.controller';
import { SignatureEventsController } from './controllers/signature-events.controller';
import { ComparisonRecordEntity } from './entities/ComparisonRecordEntity';
import { ContractDocumentEntity } from './entities/ContractDocumentEntity';
import { DeepSeekService } from './generation/deepseek.service';
import { GeminiService } from './generation/gemini.service';
import { GenerationAdapter } from './generation/generation.adapter';
import { EMBEDDER, TEXT_GENERATOR, TextGenerator } from './generation/text-generator';
import { LOGGER, loggerProvider } from './logger.provider';
import { WorkflowMetrics } from './metrics/workflow-metrics';
import { BLOB_STORE, LocalBlobStore } from './render/blob-store';
import { RenderAdapter } from './render/render.adapter';
import { DocuSignClient } from './signature/docusign.client';
import { SIGNATURE_PROVIDER } from './signature/signature-provider';
import { SignatureAdapter } from './signature/signature.adapter';
import { DOCUMENT_STORE } from './store/document-store';
import { InMemoryDocumentStore } from './store/in-memory-document.store';
import { TypeOrmDocumentStore } from './store/typeorm-document.store';
import { TemplateCatalog } from './templates/template-catalog';
import { KafkaDocumentEvents, DOCUMENT_EVENTS } from './workflow/document-events.publisher';
import { WorkflowOrchestrator } from './workflow/orchestrator.service';
import { StatusPollerService } from './workflow/status-poller.service';

const ENTITIES = [ContractDocumentEntity, ComparisonRecordEntity];

const providerFactories = (): Provider[] => [
  {
    provide: GeminiService,
    inject: [WORKFLOW_CONFIG],
    useFactory: (config: WorkflowConfig) =>
      new GeminiService({
        apiKey: config.llm.googleApiKey,
        model: config.llm.geminiModel,
        embeddingModel: config.llm.geminiEmbeddingModel,
      }),
  },
  {
    provide: TEXT_GENERATOR,
    inject: [WORKFLOW_CONFIG, GeminiService],
    useFactory: (config: WorkflowConfig, gemini: GeminiService): TextGenerator =>
      config.llm.provider === 'deepseek'
        ? new DeepSeekService({
            baseUrl: config.llm.deepseekBaseUrl,
            apiKey: config.llm.deepseekApiKey,
            model: config.llm.deepseekModel,
          })
        : gemini,
  },
  // DeepSeek has no embeddings endpoint, so vectors always come from Gemini.
  { provide: EMBEDDER, useExisting: GeminiService },
  {
    provide: BLOB_STORE,
    inject: [WORKFLOW_CONFIG],
    useFactory: (config: WorkflowConfig) => new LocalBlobStore(config.storageDir),
  },
  {
    provide: SIGNATURE_PROVIDER,
    inject: [WORKFLOW_CONFIG, LOGGER],
    useFactory: (config: WorkflowConfig, logger: Logger) => {
      const { clientId, impersonatedUserId, privateKey } = config.docusign;
      if (!clientId || !impersonatedUserId || !privateKey) {
        throw new Error('DS_CLIENT_ID, DS_IMPERSONATED_USER_ID and DS_PRIVATE_KEY (or DS_PRIVATE_KEY_FILE) are required');
      }
      return new DocuSignClient({ ...config.docusign, clientId, impersonatedUserId, privateKey, logger });
    },
  },
];

@Module({})
export class AppModule {
  static register(config: WorkflowConfig): DynamicModule {
    const postgres = config.storeDriver === 'postgres';

    const persistence = postgres
      ? [
          TypeOrmModule.forRoot({
            type: 'postgres',
            ...config.database,
            entities: ENTITIES,
          }),
          TypeOrmModule.forFeature(ENTITIES),
        ]
      : [];

    const stores: Provider[] = postgres
      ? [
          { provide: DOCUMENT_STORE, useClass: TypeOrmDocumentStore },
          { provide: COMPARISON_INDEX, useClass: TypeOrmComparisonIndex },
        ]
      : [
          { provide: DOCUMENT_STORE, useValue: new InMemoryDocumentStore() },
          { provide: COMPARISON_INDEX, useValue: new InMemoryComparisonIndex() },
        ];

    return {
      module: AppModule,
      imports: [ScheduleModule.forRoot(), ...persistence],
      controllers: [
        DocumentsController,
        ComparisonsController,
        SignatureEventsController,
        HealthController,
        MetricsController,
      ],
      providers: [
        { provide: WORKFLOW_CONFIG, useValue: config },
        loggerProvider,
        WorkflowMetrics,
        { provide: TemplateCatalog, useFactory: () => new TemplateCatalog() },
        ...providerFactories(),
        ...stores,
        { provide: DOCUMENT_EVENTS, useClass: KafkaDocumentEvents },
        GenerationAdapter,
        RenderAdapter,
        SignatureAdapter,
        WorkflowOrchestrator,
        StatusPollerService,
        ReferencePlansLoader,
      ],
    };
  }
}
