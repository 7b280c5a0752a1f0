import { Body, Controller, Headers, HttpCode, Inject, Post } from '@nestjs/common';
import { ApiResponse, Logger } from '@contractflow/shared';
import { ComparisonMatch } from '../comparison/comparison-index';
import { ComparisonQueryDto } from '../dto/comparison-query.dto';
import { RequestHeaders, failure, getCorrelationId, ok } from '../http/api-response';
import { LOGGER } from '../logger.provider';
import { WorkflowOrchestrator } from '../workflow/orchestrator.service';
import { ReindexSummary } from '../workflow/workflow.types';

@Controller('/comparisons')
export class ComparisonsController {
  constructor(
    private readonly orchestrator: WorkflowOrchestrator,
    @Inject(LOGGER) private readonly logger: Logger
  ) {}

  @Post('/query')
  @HttpCode(200)
  async query(
    @Headers() headers: RequestHeaders,
    @Body() body: ComparisonQueryDto
  ): Promise<ApiResponse<ComparisonMatch[]>> {
    const correlationId = getCorrelationId(headers);
    try {
      return ok(await this.orchestrator.compare(body), correlationId);
    } catch (err) {
      throw failure(err, correlationId, this.logger);
    }
  }

  @Post('/reindex')
  @HttpCode(200)
  async reindexAll(@Headers() headers: RequestHeaders): Promise<ApiResponse<ReindexSummary>> {
    const correlationId = getCorrelationId(headers);
    try {
      return ok(await this.orchestrator.reindexAll(correlationId), correlationId);
    } catch (err) {
      throw failure(err, correlationId, this.logger);
    }
  }
}
