import {
  classifyError,
  FatalError,
  isRetryable,
  RateLimitError,
  toError,
  toUserMessage,
  TransientError,
  ValidationError,
} from '../resilience/errors';

describe('classifyError', () => {
  it('trusts the category of our own errors', () => {
    expect(classifyError(new ValidationError(['Message content cannot be empty']))).toBe('validation');
    expect(classifyError(new TransientError('blip'))).toBe('transient');
    expect(classifyError(new FatalError('not-found', 'gone'))).toBe('fatal');
    expect(classifyError(new RateLimitError('slow down', 1000))).toBe('validation');
  });

  it('treats network and PostgreSQL connection codes as transient', () => {
    expect(classifyError(Object.assign(new Error('read ECONNRESET'), {code: 'ECONNRESET'}))).toBe('transient');
    expect(classifyError(Object.assign(new Error('terminating connection'), {code: '57P01'}))).toBe('transient');
    expect(classifyError(Object.assign(new Error('could not serialize access'), {code: '40001'}))).toBe('transient');
  });

  it('treats PostgreSQL constraint violations as fatal', () => {
    expect(classifyError(Object.assign(new Error('duplicate key value'), {code: '23505'}))).toBe('fatal');
  });

  it('reads the AWS SDK retry hint and error names', () => {
    expect(classifyError(Object.assign(new Error('boom'), {$retryable: {throttling: true}}))).toBe('transient');

    const throttled = new Error('Rate exceeded');
    throttled.name = 'ThrottlingException';
    expect(classifyError(throttled)).toBe('transient');

    const denied = new Error('User is not authorized');
    denied.name = 'AccessDeniedException';
    expect(classifyError(denied)).toBe('fatal');
  });

  it('falls back to the HTTP status in AWS metadata', () => {
    expect(classifyError(Object.assign(new Error('bad gateway'), {$metadata: {httpStatusCode: 502}}))).toBe('transient');
    expect(classifyError(Object.assign(new Error('too many'), {$metadata: {httpStatusCode: 429}}))).toBe('transient');
    expect(classifyError(Object.assign(new Error('bad request'), {$metadata: {httpStatusCode: 400}}))).toBe('fatal');
  });

  it('recognises transient wording in plain errors', () => {
    expect(classifyError(new Error('Connection timed out'))).toBe('transient');
    expect(classifyError(new Error('Service Unavailable'))).toBe('transient');
  });

  it('treats anything unrecognised as fatal', () => {
    expect(classifyError(new Error('Invalid argument'))).toBe('fatal');
    expect(classifyError('a string')).toBe('fatal');
    expect(classifyError(undefined)).toBe('fatal');
    expect(isRetryable(null)).toBe(false);
  });
});

describe('toUserMessage', () => {
  it('uses the fixed text for each fatal code', () => {
    expect(toUserMessage(new FatalError('permission-denied', 'row level security'))).toBe(
      "You don't have permission to access this data. Please sign in and try again."
    );
    expect(toUserMessage(new FatalError('not-found', 'no row'))).toBe('The requested data was not found.');
  });

  it('shows validation details as they are', () => {
    expect(toUserMessage(new ValidationError(['Sender is required', 'Recipient is required'])))
      .toBe('Sender is required; Recipient is required');
  });

  it('never leaks backend wording', () => {
    expect(toUserMessage(new Error('relation "scheduled_messages" does not exist')))
      .toBe('Something went wrong. Please try again later.');
    expect(toUserMessage(Object.assign(new Error('connect ECONNREFUSED 10.0.0.5:5432'), {code: 'ECONNREFUSED'})))
      .toBe('Service is temporarily unavailable. Please try again later.');
  });
});

describe('toError', () => {
  it('wraps non-errors', () => {
    const error = toError('plain');

    expect(error).toBeInstanceOf(Error);
    expect(error.message).toBe('plain');
  });

  it('keeps the name of subclasses', () => {
    expect(new FatalError('internal', 'x').name).toBe('FatalError');
  });
});
