import {
  CertificateError,
  apiError,
  assetExistsError,
  certificateNotFoundError,
  configurationError,
  createTypedError,
  isCertificateError,
  payloadTooLargeError,
  payloadValidationError,
  rateLimitError,
  renderEngineUnavailableError,
  storageNotConfiguredError,
  upstreamError,
  validationError,
} from '../../src/domain/errors';

describe('Typed Error Model', () => {
  test('createTypedError produces complete error object', () => {
    const error = createTypedError({
      code: 'TEST.ERROR',
      message: 'test error',
      retryable: true,
      details: { key: 'value' },
      suggestedFixes: [{ type: 'FIX', params: {} }],
    });

    expect(error.code).toBe('TEST.ERROR');
    expect(error.message).toBe('test error');
    expect(error.retryable).toBe(true);
    expect(error.details).toEqual({ key: 'value' });
    expect(error.suggestedFixes).toHaveLength(1);
  });

  test('defaults retryable to false', () => {
    const error = createTypedError({ code: 'TEST', message: 'test' });
    expect(error.retryable).toBe(false);
    expect(error.suggestedFixes).toEqual([]);
  });

  test('validationError factory', () => {
    const error = validationError('bad input');
    expect(error.code).toBe('VALIDATION.SCHEMA');
    expect(error.message).toBe('bad input');
    expect(error.retryable).toBe(false);
  });

  test('certificateNotFoundError keeps the slug in details', () => {
    const error = certificateNotFoundError('ana-perez');
    expect(error.code).toBe('DELIVERY.NOT_FOUND');
    expect(error.details).toEqual({ slug: 'ana-perez' });
  });

  test('configurationError records the rejection reason', () => {
    const error = configurationError('ana-perez', 'Asset host is not allow-listed: evil.test');
    expect(error.code).toBe('DELIVERY.CONFIGURATION');
    expect(error.message).toBe('Stored asset URL for "ana-perez" rejected: Asset host is not allow-listed: evil.test');
  });

  test('upstreamError is retryable only for transient statuses', () => {
    expect(upstreamError('x', 503).retryable).toBe(true);
    expect(upstreamError('x', 429).retryable).toBe(true);
    expect(upstreamError('x').retryable).toBe(true);
    expect(upstreamError('x', 404).retryable).toBe(false);
    expect(upstreamError('x', 404).details).toEqual({ statusCode: 404 });
    expect(upstreamError('x').details).toBeUndefined();
  });

  test('payloadTooLargeError carries limit and received size', () => {
    const error = payloadTooLargeError(1024, 2048);
    expect(error.code).toBe('FETCH.PAYLOAD_TOO_LARGE');
    expect(error.details).toEqual({ maxBytes: 1024, receivedBytes: 2048 });
  });

  test('renderEngineUnavailableError suggests waiting', () => {
    const error = renderEngineUnavailableError(2);
    expect(error.retryable).toBe(true);
    expect(error.message).toBe('All 2 render slots are busy');
    expect(error.suggestedFixes[0].type).toBe('WAIT_AND_RETRY');
  });

  test('rateLimitError rounds the wait up to whole seconds', () => {
    const error = rateLimitError(1500, 10, 60_000);
    expect(error.code).toBe('RATE_LIMIT.EXCEEDED');
    expect(error.message).toBe('Rate limit exceeded. Try again in 2 seconds.');
    expect(error.details).toEqual({ retryAfterMs: 1500, limit: 10, windowMs: 60_000 });
  });

  test('payloadValidationError lists field issues', () => {
    const error = payloadValidationError([{ field: 'participants.0.email', message: 'Invalid email address' }]);
    expect(error.code).toBe('VALIDATION.PAYLOAD');
    expect(error.details).toEqual({ issues: [{ field: 'participants.0.email', message: 'Invalid email address' }] });
  });

  test('storage errors', () => {
    expect(storageNotConfiguredError().code).toBe('STORAGE.NOT_CONFIGURED');
    expect(assetExistsError('certificates/ana').details).toEqual({ publicId: 'certificates/ana' });
  });

  test('apiError wraps error in response envelope', () => {
    const error = validationError('bad');
    const response = apiError(error);
    expect(response.error).toBe(error);
  });
});

describe('CertificateError', () => {
  it('carries the typed error and exposes its code', () => {
    const err = new CertificateError(certificateNotFoundError('ana'));
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('CertificateError');
    expect(err.code).toBe('DELIVERY.NOT_FOUND');
    expect(err.message).toBe('Certificate not found: ana');
  });

  it('is recognised by isCertificateError', () => {
    expect(isCertificateError(new CertificateError(validationError('x')))).toBe(true);
    expect(isCertificateError(new Error('x'))).toBe(false);
    expect(isCertificateError({ typedError: validationError('x') })).toBe(false);
  });
});
