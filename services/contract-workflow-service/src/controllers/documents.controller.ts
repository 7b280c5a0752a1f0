import { Body, Controller, Get, Headers, HttpCode, Inject, Param, Post, Query } from '@nestjs/common';
import { ApiResponse, Logger, PaginatedResponse } from '@contractflow/shared';
import { ContractDocument } from '../domain/document';
import { CancelDocumentDto } from '../dto/cancel-document.dto';
import { CreateDocumentDto } from '../dto/create-document.dto';
import { ListDocumentsDto } from '../dto/list-documents.dto';
import { RequestHeaders, failure, getCorrelationId, ok } from '../http/api-response';
import { LOGGER } from '../logger.provider';
import { SigningUrl } from '../signature/signature-provider';
import { WorkflowOrchestrator } from '../workflow/orchestrator.service';

const DEFAULT_PAGE_SIZE = 50;

@Controller('/documents')
export class DocumentsController {
  constructor(
    private readonly orchestrator: WorkflowOrchestrator,
    @Inject(LOGGER) private readonly logger: Logger
  ) {}

  @Post()
  @HttpCode(201)
  async create(
    @Headers() headers: RequestHeaders,
    @Body() body: CreateDocumentDto
  ): Promise<ApiResponse<ContractDocument>> {
    const correlationId = getCorrelationId(headers);
    try {
      const document = await this.orchestrator.requestDocument(body, correlationId);
      return ok(document, correlationId);
    } catch (err) {
      throw failure(err, correlationId, this.logger);
    }
  }

  @Get()
  async list(
    @Headers() headers: RequestHeaders,
    @Query() query: ListDocumentsDto
  ): Promise<PaginatedResponse<ContractDocument>> {
    const correlationId = getCorrelationId(headers);
    const limit = query.limit || DEFAULT_PAGE_SIZE;
    const offset = query.offset || 0;
    try {
      const documents = await this.orchestrator.listDocuments({ ...query, limit, offset });
      return {
        success: true,
        data: documents,
        correlationId,
        pagination: { limit, offset, count: documents.length },
      };
    } catch (err) {
      throw failure(err, correlationId, this.logger);
    }
  }

  @Get('/:id')
  async get(@Headers() headers: RequestHeaders, @Param('id') id: string): Promise<ApiResponse<ContractDocument>> {
    const correlationId = getCorrelationId(headers);
    try {
      return ok(await this.orchestrator.getDocument(id), correlationId);
    } catch (err) {
      throw failure(err, correlationId, this.logger);
    }
  }

  @Post('/:id/advance')
  @HttpCode(200)
  async advance(@Headers() headers: RequestHeaders, @Param('id') id: string): Promise<ApiResponse<ContractDocument>> {
    const correlationId = getCorrelationId(headers);
    try {
      return ok(await this.orchestrator.advance(id, correlationId), correlationId);
    } catch (err) {
      throw failure(err, correlationId, this.logger);
    }
  }

  @Post('/:id/cancel')
  @HttpCode(200)
  async cancel(
    @Headers() headers: RequestHeaders,
    @Param('id') id: string,
    @Body() body: CancelDocumentDto
  ): Promise<ApiResponse<ContractDocument>> {
    const correlationId = getCorrelationId(headers);
    try {
      const reason = body.reason || 'Cancelled by administrator';
      return ok(await this.orchestrator.cancel(id, reason, correlationId), correlationId);
    } catch (err) {
      throw failure(err, correlationId, this.logger);
    }
  }

  @Get('/:id/signing-url')
  async signingUrl(
    @Headers() headers: RequestHeaders,
    @Param('id') id: string,
    @Query('email') email?: string
  ): Promise<ApiResponse<SigningUrl>> {
    const correlationId = getCorrelationId(headers);
    try {
      return ok(await this.orchestrator.getSigningUrl(id, email), correlationId);
    } catch (err) {
      throw failure(err, correlationId, this.logger);
    }
  }

  @Post('/:id/reindex')
  @HttpCode(200)
  async reindex(@Headers() headers: RequestHeaders, @Param('id') id: string): Promise<ApiResponse<ContractDocument>> {
    const correlationId = getCorrelationId(headers);
    try {
      return ok(await this.orchestrator.reindex(id, correlationId), correlationId);
    } catch (err) {
      throw failure(err, correlationId, this.logger);
    }
  }
}
