import { Inject, Injectable, OnApplicationBootstrap } from '@nestjs/common';
import { Logger, asAppError } from '@contractflow/shared';
import { WORKFLOW_CONFIG, WorkflowConfig } from '../config';
import { LOGGER } from '../logger.provider';
import { WorkflowOrchestrator } from '../workflow/orchestrator.service';
import { readReferencePlans } from './reference-plans';

/**
 * Seeds the comparison index with the bundled reference plans. The service
 * still starts when the embedder is unreachable; comparisons against plans
 * return nothing until a later load succeeds.
 */
@Injectable()
export class ReferencePlansLoader implements OnApplicationBootstrap {
  constructor(
    private readonly orchestrator: WorkflowOrchestrator,
    @Inject(WORKFLOW_CONFIG) private readonly config: WorkflowConfig,
    @Inject(LOGGER) private readonly logger: Logger
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    await this.load();
  }

  async load(): Promise<number> {
    try {
      const plans = await readReferencePlans(this.config.referencePlansFile);
      return await this.orchestrator.loadReferencePlans(plans);
    } catch (err) {
      this.logger.error('Reference plans not loaded', asAppError(err), { file: this.config.referencePlansFile });
      return 0;
    }
  }
}
