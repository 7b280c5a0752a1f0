import { Body, Controller, Headers, HttpCode, Inject, Post } from '@nestjs/common';
import { ApiResponse, Logger } from '@contractflow/shared';
import { SignatureEventDto } from '../dto/signature-event.dto';
import { RequestHeaders, failure, getCorrelationId, ok } from '../http/api-response';
import { LOGGER } from '../logger.provider';
import { WorkflowOrchestrator } from '../workflow/orchestrator.service';
import { ReconcileDecision } from '../workflow/workflow.types';

interface SignatureEventAck {
  documentId: string;
  state: string;
  decision: ReconcileDecision;
}

/** Callback endpoint for the signature provider's envelope status notifications. */
@Controller('/signature')
export class SignatureEventsController {
  constructor(
    private readonly orchestrator: WorkflowOrchestrator,
    @Inject(LOGGER) private readonly logger: Logger
  ) {}

  @Post('/events')
  @HttpCode(200)
  async receive(
    @Headers() headers: RequestHeaders,
    @Body() body: SignatureEventDto
  ): Promise<ApiResponse<SignatureEventAck>> {
    const correlationId = getCorrelationId(headers);
    try {
      const outcome = await this.orchestrator.reconcile(
        { envelopeId: body.envelopeId, status: body.status, source: 'callback' },
        correlationId
      );
      return ok(
        { documentId: outcome.document.id, state: outcome.document.state, decision: outcome.decision },
        correlationId
      );
    } catch (err) {
      throw failure(err, correlationId, this.logger);
    }
  }
}
