import { HttpStatus } from '@nestjs/common';
import { NotFoundError, RetriesExhausted, SignatureUnavailable, TemplateInputError } from '@contractflow/shared';
import { failure, getCorrelationId, httpStatusFor, ok, validationFailure } from '../src/http/api-response';
import { silentLogger } from './support';

describe('api responses', () => {
  it('keeps a caller supplied correlation id', () => {
    expect(getCorrelationId({ 'x-correlation-id': 'cid-1' })).toBe('cid-1');
    expect(getCorrelationId({})).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('wraps data in a success envelope', () => {
    expect(ok({ id: 'doc-1' }, 'cid-1')).toEqual({ success: true, data: { id: 'doc-1' }, correlationId: 'cid-1' });
  });

  it('maps error codes to HTTP statuses', () => {
    expect(httpStatusFor(new TemplateInputError('bad'))).toBe(HttpStatus.BAD_REQUEST);
    expect(httpStatusFor(new NotFoundError('gone'))).toBe(HttpStatus.NOT_FOUND);
    expect(httpStatusFor(new RetriesExhausted('send', 4, new SignatureUnavailable('down')))).toBe(
      HttpStatus.BAD_GATEWAY
    );
  });

  it('turns thrown errors into an error envelope without internals', () => {
    const error = new TemplateInputError('Missing template inputs: name', ['name']).forDocument('doc-1', 'REQUESTED');
    const exception = failure(error, 'cid-2', silentLogger);

    expect(exception.getStatus()).toBe(400);
    expect(exception.getResponse()).toEqual({
      success: false,
      error: {
        code: 'TEMPLATE_INPUT_ERROR',
        message: 'Missing template inputs: name',
        details: { documentId: 'doc-1', lastStableState: 'REQUESTED', missing: ['name'] },
      },
      correlationId: 'cid-2',
    });
  });

  it('reports unexpected errors as internal', () => {
    const exception = failure(new TypeError('x is undefined'), 'cid-3', silentLogger);
    expect(exception.getStatus()).toBe(500);
    expect(exception.getResponse()).toMatchObject({ error: { code: 'INTERNAL_ERROR' } });
  });

  it('collects nested validation messages', () => {
    const exception = validationFailure([
      {
        property: 'signers',
        constraints: { arrayMinSize: 'signers must contain at least 1 elements' },
        children: [{ property: '0', children: [{ property: 'email', constraints: { isEmail: 'email must be an email' } }] }],
      },
    ]);

    expect(exception.getResponse()).toMatchObject({
      success: false,
      error: {
        code: 'VALIDATION_ERROR',
        details: { violations: ['signers must contain at least 1 elements', 'email must be an email'] },
      },
    });
  });
});
