import { describe, expect, it } from 'vitest';
import {
  ConfigurationError,
  NetworkError,
  RECOVERY_BUTTON_TITLES,
  TransportError,
  isNetworkError,
} from '../errors';

describe('NetworkError', () => {
  it('describes server faults with and without a message', () => {
    expect(NetworkError.serverFault(503).message).toBe('HTTP 503');
    expect(NetworkError.serverFault(400, 'Bad input').message).toBe('HTTP 400: Bad input');
    expect(NetworkError.retryExhausted(3).message).toBe('Request failed after 3 retries');
  });

  it('treats timeouts, offline, exhausted retries and 5xx as retryable', () => {
    expect(NetworkError.timeout().isRetryable).toBe(true);
    expect(NetworkError.offline().isRetryable).toBe(true);
    expect(NetworkError.retryExhausted(2).isRetryable).toBe(true);
    expect(NetworkError.serverFault(503).isRetryable).toBe(true);

    expect(NetworkError.serverFault(400).isRetryable).toBe(false);
    expect(NetworkError.unauthorized().isRetryable).toBe(false);
    expect(NetworkError.notFound().isRetryable).toBe(false);
    expect(NetworkError.rateLimited(10).isRetryable).toBe(false);
    expect(NetworkError.cancelled().isRetryable).toBe(false);
  });

  it('separates client and server errors', () => {
    expect(NetworkError.serverFault(422).isClientError).toBe(true);
    expect(NetworkError.unauthorized().isClientError).toBe(true);
    expect(NetworkError.serverFault(502).isServerError).toBe(true);
    expect(NetworkError.serverFault(502).isClientError).toBe(false);
    expect(NetworkError.notFound().isNotFound).toBe(true);
    expect(NetworkError.serverFault(404).isNotFound).toBe(true);
    expect(NetworkError.timeout().isNotFound).toBe(false);
  });

  it('suggests a recovery action and button title', () => {
    expect(NetworkError.offline().recoveryAction).toBe('retry');
    expect(NetworkError.serverFault(500).recoveryAction).toBe('retry');
    expect(NetworkError.serverFault(409).recoveryAction).toBe('none');
    expect(NetworkError.unauthorized().recoveryAction).toBe('reauthenticate');
    expect(NetworkError.decodingFailure('bad').recoveryAction).toBe('contactSupport');
    expect(RECOVERY_BUTTON_TITLES.retry).toBe('Try Again');
    expect(RECOVERY_BUTTON_TITLES.reauthenticate).toBe('Sign In');
    expect(RECOVERY_BUTTON_TITLES.none).toBeUndefined();
  });

  it('builds user-facing messages', () => {
    expect(NetworkError.rateLimited(30).userMessage).toBe('Too many requests. Please wait 30 seconds.');
    expect(NetworkError.rateLimited().userMessage).toBe(
      'Too many requests. Please wait a moment before trying again.',
    );
    expect(NetworkError.serverFault(400, 'Email is taken').userMessage).toBe('Email is taken');
    expect(NetworkError.serverFault(503).userMessage).toBe(
      'The server is temporarily unavailable. Please try again later.',
    );
  });

  it('maps transport failures onto the taxonomy', () => {
    const map = (kind: ConstructorParameters<typeof TransportError>[0]) =>
      NetworkError.fromTransportError(new TransportError(kind, 'failed')).kind;

    expect(map('timedOut')).toBe('timeout');
    expect(map('connectionLost')).toBe('offline');
    expect(map('offline')).toBe('offline');
    expect(map('cancelled')).toBe('cancelled');
    expect(map('tlsFailure')).toBe('tlsFailure');
    expect(map('other')).toBe('unknown');
  });

  it('normalizes arbitrary thrown values', () => {
    const existing = NetworkError.notFound();
    expect(NetworkError.from(existing)).toBe(existing);

    const abort = new Error('The operation was aborted');
    abort.name = 'AbortError';
    expect(NetworkError.from(abort).kind).toBe('cancelled');

    const unknown = NetworkError.from('boom');
    expect(unknown.reason).toEqual({ kind: 'unknown', detail: 'boom' });
    expect(unknown.message).toBe('Unknown network error: boom');
  });

  it('compares reasons structurally', () => {
    const body = new Uint8Array([1, 2]);
    expect(NetworkError.serverFault(500, 'x', body).equals(NetworkError.serverFault(500, 'x', new Uint8Array([1, 2])))).toBe(
      true,
    );
    expect(NetworkError.serverFault(500, 'x', body).equals(NetworkError.serverFault(500, 'x', new Uint8Array([1, 3])))).toBe(
      false,
    );
    expect(NetworkError.timeout().equals(NetworkError.timeout())).toBe(true);
    expect(NetworkError.timeout().equals(NetworkError.offline())).toBe(false);
    expect(NetworkError.rateLimited(5).equals(NetworkError.rateLimited(6))).toBe(false);
  });

  it('narrows with isNetworkError', () => {
    expect(isNetworkError(NetworkError.timeout())).toBe(true);
    expect(isNetworkError(NetworkError.timeout(), 'timeout')).toBe(true);
    expect(isNetworkError(NetworkError.timeout(), 'offline')).toBe(false);
    expect(isNetworkError(new Error('plain'))).toBe(false);
  });
});

describe('ConfigurationError', () => {
  it('lists every issue in its message', () => {
    const error = new ConfigurationError(['timeoutMs: too small', 'baseUrl: Invalid url']);
    expect(error.message).toBe('Invalid network configuration: timeoutMs: too small; baseUrl: Invalid url');
    expect(error.issues).toHaveLength(2);
  });
});
