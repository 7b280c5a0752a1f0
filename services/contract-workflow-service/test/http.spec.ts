import { ValidationPipe } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { ComparisonsController } from '../src/controllers/comparisons.controller';
import { SignatureEventsController } from '../src/controllers/signature-events.controller';
import { validationFailure } from '../src/http/api-response';
import { LOGGER } from '../src/logger.provider';
import { WorkflowOrchestrator } from '../src/workflow/orchestrator.service';
import { buildWorkflow, jane, silentLogger } from './support';

describe('HTTP surface', () => {
  let app: NestFastifyApplication;
  let workflow: ReturnType<typeof buildWorkflow>;

  beforeEach(async () => {
    workflow = buildWorkflow();
    const moduleRef = await Test.createTestingModule({
      controllers: [SignatureEventsController, ComparisonsController],
      providers: [
        { provide: WorkflowOrchestrator, useValue: workflow.orchestrator },
        { provide: LOGGER, useValue: silentLogger },
      ],
    }).compile();

    app = moduleRef.createNestApplication<NestFastifyApplication>(new FastifyAdapter(), { logger: false });
    app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true, exceptionFactory: validationFailure }));
    await app.init();
    await app.getHttpAdapter().getInstance().ready();
  });

  afterEach(async () => {
    await app.close();
  });

  it('acknowledges a signature callback with the resulting state', async () => {
    const doc = await workflow.orchestrator.requestDocument({
      role: 'patient',
      templateId: 'T1',
      inputs: { name: 'Jane Doe' },
      signers: [jane],
    });

    const res = await app.inject({
      method: 'POST',
      url: '/signature/events',
      headers: { 'x-correlation-id': 'cid-1' },
      payload: { envelopeId: 'E1', status: 'completed' },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      success: true,
      data: { documentId: doc.id, state: 'INDEXED', decision: 'applied' },
      correlationId: 'cid-1',
    });
  });

  it('answers 404 for a callback about an unknown envelope', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/signature/events',
      headers: { 'x-correlation-id': 'cid-2' },
      payload: { envelopeId: 'E404', status: 'completed' },
    });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({
      success: false,
      error: { code: 'NOT_FOUND', message: 'No document for envelope E404' },
      correlationId: 'cid-2',
    });
  });

  it('rejects a callback without an envelope id', async () => {
    const res = await app.inject({ method: 'POST', url: '/signature/events', payload: { status: 'completed' } });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ success: false, error: { code: 'VALIDATION_ERROR' } });
  });

  it('answers 400 for a comparison with k=0', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/comparisons/query',
      headers: { 'x-correlation-id': 'cid-3' },
      payload: { k: 0, text: 'coverage' },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      success: false,
      error: { code: 'INVALID_QUERY', message: 'k must be a positive integer, got 0' },
      correlationId: 'cid-3',
    });
  });

  it('returns ranked matches for a comparison query', async () => {
    await workflow.index.upsert('plan:gold', [1, 0, 0], { name: 'Gold' });

    const res = await app.inject({ method: 'POST', url: '/comparisons/query', payload: { k: 1, vector: [1, 0, 0] } });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ success: true, data: [{ recordId: 'plan:gold', metadata: { name: 'Gold' } }] });
  });
});
