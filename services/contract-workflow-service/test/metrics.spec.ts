import { DocumentRequest } from '../src/workflow/workflow.types';
import { buildWorkflow, jane } from './support';

const request: DocumentRequest = { role: 'patient', templateId: 'T1', inputs: { name: 'Jane Doe' }, signers: [jane] };

describe('WorkflowMetrics', () => {
  it('counts transitions and status decisions', async () => {
    const { orchestrator, provider, metrics } = buildWorkflow();

    const sent = await orchestrator.requestDocument(request);
    provider.statuses.set('E1', 'signed');
    await orchestrator.pollStatus(sent.id);
    await orchestrator.reconcile({ envelopeId: 'E1', status: 'signed', source: 'callback' });

    const text = await metrics.metrics();
    expect(text).toContain('contract_document_transitions_total{from="REQUESTED",to="DRAFTED"} 1');
    expect(text).toContain('contract_document_transitions_total{from="SIGNED",to="INDEXED"} 1');
    expect(text).toContain('contract_status_events_total{source="poll",decision="applied"} 1');
    expect(text).toContain('contract_status_events_total{source="callback",decision="duplicate"} 1');
  });

  it('counts failures by kind and exhausted retries by operation', async () => {
    const { orchestrator, generator, metrics } = buildWorkflow();
    generator.enqueue(new Error('down'), new Error('down'), new Error('down'));

    await expect(orchestrator.requestDocument(request)).rejects.toMatchObject({ code: 'RETRIES_EXHAUSTED' });

    const text = await metrics.metrics();
    expect(text).toContain('contract_document_failures_total{kind="RETRIES_EXHAUSTED"} 1');
    expect(text).toContain('contract_adapter_retries_exhausted_total{operation="generate"} 1');
  });
});
