import { Controller, Get, Inject } from '@nestjs/common';
import { HealthCheckResponse, Logger, toError } from '@contractflow/shared';
import { WORKFLOW_CONFIG, WorkflowConfig } from '../config';
import { LOGGER } from '../logger.provider';
import { DOCUMENT_STORE, DocumentStore } from '../store/document-store';

@Controller()
export class HealthController {
  constructor(
    @Inject(DOCUMENT_STORE) private readonly store: DocumentStore,
    @Inject(WORKFLOW_CONFIG) private readonly config: WorkflowConfig,
    @Inject(LOGGER) private readonly logger: Logger
  ) {}

  @Get('/health')
  async health(): Promise<HealthCheckResponse> {
    let database = true;
    try {
      await this.store.list({ limit: 1 });
    } catch (err) {
      database = false;
      this.logger.warn('Health check: document store unreachable', { error: toError(err).message });
    }

    return {
      status: database ? 'healthy' : 'unhealthy',
      service: this.config.serviceName,
      timestamp: new Date().toISOString(),
      checks: { database },
    };
  }
}
