import { TransportError, type TransportFailureKind } from '../errors';

const OFFLINE_CODES = new Set(['ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN', 'ENETUNREACH', 'EHOSTUNREACH', 'ERR_NETWORK']);
const CONNECTION_LOST_CODES = new Set(['ECONNRESET', 'EPIPE', 'UND_ERR_SOCKET', 'UND_ERR_CLOSED']);
const TIMEOUT_CODES = new Set([
  'ETIMEDOUT',
  'ECONNABORTED',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);
const CANCELLED_CODES = new Set(['ERR_CANCELED', 'ABORT_ERR']);
const TLS_CODES = new Set([
  'CERT_HAS_EXPIRED',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'ERR_TLS_CERT_ALTNAME_INVALID',
  'ERR_SSL_WRONG_VERSION_NUMBER',
]);

const readString = (value: unknown, key: 'code' | 'name'): string | undefined => {
  if (typeof value !== 'object' || value === null || !(key in value)) return undefined;
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'string' ? field : undefined;
};

const readCause = (value: unknown): unknown =>
  typeof value === 'object' && value !== null && 'cause' in value ? Reflect.get(value, 'cause') : undefined;

export function failureKindForCode(code: string | undefined): TransportFailureKind {
  if (code === undefined) return 'other';
  if (OFFLINE_CODES.has(code)) return 'offline';
  if (CONNECTION_LOST_CODES.has(code)) return 'connectionLost';
  if (TIMEOUT_CODES.has(code)) return 'timedOut';
  if (CANCELLED_CODES.has(code)) return 'cancelled';
  if (TLS_CODES.has(code) || code.startsWith('ERR_TLS_') || code.startsWith('ERR_SSL_')) return 'tlsFailure';
  return 'other';
}

/**
 * Wraps whatever a client library threw in a {@link TransportError}. The
 * error code is looked up on the error itself, then on its cause.
 */
export function toTransportError(error: unknown): TransportError {
  if (error instanceof TransportError) return error;

  const name = readString(error, 'name');
  const message = error instanceof Error ? error.message : String(error);
  if (name === 'AbortError' || name === 'CanceledError') {
    return new TransportError('cancelled', message, { cause: error });
  }

  const code = readString(error, 'code') ?? readString(readCause(error), 'code');
  return new TransportError(failureKindForCode(code), message, { cause: error, code });
}
