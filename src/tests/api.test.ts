/**
 * HTTP API TESTS
 *
 * Request parsing and the mapping from thrown errors to responses.
 */

import {parseMediaFile, parseMessageRequest} from '../api/requests';
import {toHttpError} from '../api/server';
import {FatalError, RateLimitError, TransientError, ValidationError} from '../resilience/errors';

describe('parseMediaFile', () => {
  it('decodes base64 data', () => {
    const result = parseMediaFile({fileName: 'a.png', contentType: 'image/png', data: 'aGVsbG8='}, 'Attachment 1');

    result.ifRight(file => {
      expect(file.fileName).toBe('a.png');
      expect(file.contentType).toBe('image/png');
      expect(Buffer.from(file.data).toString('utf8')).toBe('hello');
    });
    expect(result.isRight()).toBe(true);
  });

  it('defaults the content type', () => {
    expect(parseMediaFile({fileName: 'a.png', data: 'aGk='}, 'Picture').map(file => file.contentType).extract())
      .toBe('application/octet-stream');
  });

  it('names the field that is wrong', () => {
    expect(parseMediaFile('nope', 'Picture').extract()).toBe('Picture must be an object');
    expect(parseMediaFile({data: 'aGk='}, 'Picture').extract()).toBe('Picture: fileName is required');
    expect(parseMediaFile({fileName: 'a.png'}, 'Picture').extract()).toBe('Picture: data must be a base64 string');
  });

  it('rejects data that is not base64', () => {
    expect(parseMediaFile({fileName: 'a.png', data: 'not base64!'}, 'Picture').extract())
      .toBe('Picture: data must be a base64 string');
    expect(parseMediaFile({fileName: 'a.png', data: 'aGk'}, 'Picture').extract())
      .toBe('Picture: data must be a base64 string');
  });
});

describe('parseMessageRequest', () => {
  it('builds a draft for the authenticated sender', () => {
    const result = parseMessageRequest({
      recipientId: 'user-2',
      textContent: 'hi',
      scheduledFor: '2025-03-01T13:00:00Z',
      attachments: [{fileName: 'a.png', data: 'aGk='}],
    }, 'user-1');

    result.ifRight(({draft, files}) => {
      expect(draft).toEqual({
        senderId: 'user-1',
        recipientId: 'user-2',
        textContent: 'hi',
        scheduledFor: '2025-03-01T13:00:00Z',
        imageUrls: [],
        videoUrl: null,
      });
      expect(files.map(file => file.fileName)).toEqual(['a.png']);
    });
    expect(result.isRight()).toBe(true);
  });

  it('collects every malformed field', () => {
    const result = parseMessageRequest({
      recipientId: 7,
      scheduledFor: 1700000000,
      imageUrls: ['ok', 3],
      attachments: [{fileName: 'a.png'}],
    }, 'user-1');

    expect(result.extract()).toEqual([
      'recipientId must be a string',
      'textContent must be a string',
      'scheduledFor must be an ISO-8601 string',
      'imageUrls must be an array of strings',
      'Attachment 1: data must be a base64 string',
    ]);
  });

  it('rejects a body that is not an object', () => {
    expect(parseMessageRequest([], 'user-1').extract()).toEqual(['Request body must be a JSON object']);
  });
});

describe('toHttpError', () => {
  it('answers 429 with the wait for rate limits', () => {
    const error = new RateLimitError('Too many scheduled messages.', 1500);

    expect(toHttpError(error)).toEqual({
      status: 429,
      body: {error: 'Too many scheduled messages.', retryAfterSeconds: 2},
    });
  });

  it('maps fatal codes to statuses without leaking the backend message', () => {
    expect(toHttpError(new FatalError('not-found', 'row 9 missing in scheduled_messages'))).toEqual({
      status: 404,
      body: {error: 'The requested data was not found.'},
    });
    expect(toHttpError(new FatalError('permission-denied', 'x')).status).toBe(403);
    expect(toHttpError(new FatalError('unauthenticated', 'x')).status).toBe(401);
  });

  it('answers 400 for validation and 503 for transient failures', () => {
    expect(toHttpError(new ValidationError(['bad input'])).status).toBe(400);
    expect(toHttpError(new TransientError('pool exhausted'))).toEqual({
      status: 503,
      body: {error: 'Service is temporarily unavailable. Please try again later.'},
    });
  });

  it('answers 500 for anything else', () => {
    expect(toHttpError(new Error('undefined is not a function'))).toEqual({
      status: 500,
      body: {error: 'Something went wrong. Please try again later.'},
    });
  });
});
