import { describe, expect, it } from 'vitest';
import {
  MalformedExtractionError,
  ProviderError,
  UnknownProviderError,
  describeError,
  statusOf,
  toProviderError,
} from '../../src/core/errors.js';

describe('toProviderError', () => {
  it('labels rate limits and authentication failures by status', () => {
    const rateLimited = toProviderError('openai', Object.assign(new Error('slow down'), { status: 429 }));
    const forbidden = toProviderError('claude', Object.assign(new Error('bad key'), { status: 403 }));

    expect(rateLimited).toBeInstanceOf(ProviderError);
    expect(rateLimited.message).toBe('Rate limited (429): slow down');
    expect(rateLimited.statusCode).toBe(429);
    expect(rateLimited.provider).toBe('openai');
    expect(forbidden.message).toBe('Authentication failed (403): bad key');
  });

  it('wraps errors without a status', () => {
    const cause = new Error('socket hang up');
    const error = toProviderError('gemini', cause);

    expect(error.message).toBe('Request failed: socket hang up');
    expect(error.statusCode).toBeUndefined();
    expect(error.cause).toBe(cause);
  });

  it('passes ProviderErrors through unchanged', () => {
    const original = new ProviderError('No content in response', 'openai');
    expect(toProviderError('openai', original)).toBe(original);
  });
});

describe('error helpers', () => {
  it('reads numeric statuses only', () => {
    expect(statusOf({ status: 500 })).toBe(500);
    expect(statusOf({ status: '500' })).toBeUndefined();
    expect(statusOf('boom')).toBeUndefined();
  });

  it('describes anything thrown', () => {
    expect(describeError(new Error('broken'))).toBe('broken');
    expect(describeError('plain')).toBe('plain');
  });

  it('names each error class', () => {
    expect(new UnknownProviderError('x', 'y').name).toBe('UnknownProviderError');
    expect(new MalformedExtractionError('bad', 'a.txt').file).toBe('a.txt');
  });
});
