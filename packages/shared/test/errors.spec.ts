import {
  ConflictError,
  GenerationUnavailable,
  InvalidQueryError,
  RetriesExhausted,
  TemplateInputError,
  isRetryable,
  toError,
} from '../src';

describe('error taxonomy', () => {
  it('classifies transient adapter errors as retryable', () => {
    expect(isRetryable(new GenerationUnavailable('down'))).toBe(true);
    expect(isRetryable(new InvalidQueryError('k must be positive'))).toBe(false);
    expect(isRetryable(new Error('plain'))).toBe(false);
  });

  it('renders a response with document context and no stack', () => {
    const error = new RetriesExhausted('generate', 3, new GenerationUnavailable('down')).forDocument(
      'doc-1',
      'REQUESTED'
    );

    expect(error.toResponse()).toEqual({
      code: 'RETRIES_EXHAUSTED',
      message: 'generate failed after 3 attempts: down',
      details: { documentId: 'doc-1', lastStableState: 'REQUESTED' },
    });
  });

  it('lists missing template variables', () => {
    const error = new TemplateInputError('Missing template inputs: name', ['name']);

    expect(error.toResponse()).toEqual({
      code: 'TEMPLATE_INPUT_ERROR',
      message: 'Missing template inputs: name',
      details: { missing: ['name'] },
    });
  });

  it('names errors after their class', () => {
    expect(new ConflictError('doc-1', 4).name).toBe('ConflictError');
    expect(toError('boom').message).toBe('boom');
  });
});
