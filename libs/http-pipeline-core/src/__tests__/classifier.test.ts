import { describe, expect, it } from 'vitest';
import { classifyResponse, extractErrorMessage, parseRetryAfter } from '../classifier';
import type { NetworkError } from '../errors';
import type { HttpHeaders } from '../types';

const encoder = new TextEncoder();

const failureOf = (status: number, headers: HttpHeaders = {}, body = new Uint8Array()): NetworkError => {
  const result = classifyResponse({ status, headers, body });
  if (result.outcome !== 'failure') {
    throw new Error(`expected status ${status} to fail`);
  }
  return result.error;
};

describe('classifyResponse', () => {
  it('lets 2xx responses proceed', () => {
    expect(classifyResponse({ status: 200, headers: {}, body: new Uint8Array() })).toEqual({ outcome: 'proceed' });
    expect(classifyResponse({ status: 204, headers: {}, body: new Uint8Array() })).toEqual({ outcome: 'proceed' });
  });

  it('maps 401 and 404 to dedicated reasons', () => {
    expect(failureOf(401).reason).toEqual({ kind: 'unauthorized' });
    expect(failureOf(404).reason).toEqual({ kind: 'notFound' });
  });

  it('reads Retry-After on 429 regardless of header case', () => {
    expect(failureOf(429, { 'Retry-After': '60' }).reason).toEqual({ kind: 'rateLimited', retryAfter: 60 });
    expect(failureOf(429, { 'retry-after': '5' }).reason).toEqual({ kind: 'rateLimited', retryAfter: 5 });
    expect(failureOf(429).reason).toEqual({ kind: 'rateLimited', retryAfter: undefined });
  });

  it('reports other statuses as server faults carrying the body', () => {
    const body = encoder.encode('{"message":"Maintenance"}');
    expect(failureOf(503, {}, body).reason).toEqual({
      kind: 'serverFault',
      statusCode: 503,
      message: 'Maintenance',
      body,
    });
    expect(failureOf(302).reason).toEqual({
      kind: 'serverFault',
      statusCode: 302,
      message: undefined,
      body: new Uint8Array(),
    });
  });
});

describe('extractErrorMessage', () => {
  it('joins message, field errors and details in a stable order', () => {
    const body = encoder.encode(
      JSON.stringify({
        message: 'Validation failed',
        errors: { name: ['is required', 'is too short'], email: ['is invalid'], phone: [] },
        details: { trace: 'abc', hint: '' },
      }),
    );

    expect(extractErrorMessage(body)).toBe(
      'Validation failed\nemail: is invalid\nname: is required is too short\nhint\ntrace: abc',
    );
  });

  it('returns undefined for bodies that are not an error envelope', () => {
    expect(extractErrorMessage(encoder.encode('<html>oops</html>'))).toBeUndefined();
    expect(extractErrorMessage(encoder.encode('{}'))).toBeUndefined();
    expect(extractErrorMessage(encoder.encode('{"message":42}'))).toBeUndefined();
    expect(extractErrorMessage(new Uint8Array())).toBeUndefined();
  });
});

describe('parseRetryAfter', () => {
  const now = Date.parse('2024-01-01T00:00:00Z');

  it('accepts delta seconds', () => {
    expect(parseRetryAfter('120', now)).toBe(120);
    expect(parseRetryAfter(' 5 ', now)).toBe(5);
    expect(parseRetryAfter('-1', now)).toBeUndefined();
  });

  it('converts HTTP dates to remaining seconds', () => {
    expect(parseRetryAfter('Mon, 01 Jan 2024 00:01:30 GMT', now)).toBe(90);
    expect(parseRetryAfter('Sun, 31 Dec 2023 23:59:00 GMT', now)).toBeUndefined();
  });

  it('ignores missing and unparseable values', () => {
    expect(parseRetryAfter(undefined, now)).toBeUndefined();
    expect(parseRetryAfter('', now)).toBeUndefined();
    expect(parseRetryAfter('soon', now)).toBeUndefined();
    expect(parseRetryAfter('Infinity', now)).toBeUndefined();
    expect(parseRetryAfter('1e3', now)).toBeUndefined();
    expect(parseRetryAfter('0x3C', now)).toBeUndefined();
    expect(parseRetryAfter('-5', now)).toBeUndefined();
  });
});
