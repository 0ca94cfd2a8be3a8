export type NetworkErrorReason =
  | { kind: 'invalidEndpoint'; detail?: string }
  | { kind: 'noResponseBody' }
  | { kind: 'decodingFailure'; detail: string }
  | { kind: 'serverFault'; statusCode: number; message?: string; body?: Uint8Array }
  | { kind: 'timeout' }
  | { kind: 'offline' }
  | { kind: 'cancelled' }
  | { kind: 'tlsFailure' }
  | { kind: 'unknown'; detail?: string }
  | { kind: 'retryExhausted'; attempts: number }
  | { kind: 'rateLimited'; retryAfter?: number }
  | { kind: 'unauthorized' }
  | { kind: 'notFound' };

export type NetworkErrorKind = NetworkErrorReason['kind'];

export type RecoveryAction = 'retry' | 'reauthenticate' | 'contactSupport' | 'none';

export const RECOVERY_BUTTON_TITLES: Record<RecoveryAction, string | undefined> = {
  retry: 'Try Again',
  reauthenticate: 'Sign In',
  contactSupport: 'Contact Support',
  none: undefined,
};

const assertNever = (value: never): never => {
  throw new Error(`Unhandled network error reason: ${JSON.stringify(value)}`);
};

const isServerStatus = (status: number) => status >= 500 && status <= 599;
const isClientStatus = (status: number) => status >= 400 && status <= 499;

function describe(reason: NetworkErrorReason): string {
  switch (reason.kind) {
    case 'invalidEndpoint':
      return reason.detail ? `Invalid endpoint: ${reason.detail}` : 'Invalid endpoint';
    case 'noResponseBody':
      return 'No response body was returned';
    case 'decodingFailure':
      return `Failed to decode response: ${reason.detail}`;
    case 'serverFault':
      return reason.message
        ? `HTTP ${reason.statusCode}: ${reason.message}`
        : `HTTP ${reason.statusCode}`;
    case 'timeout':
      return 'Request timed out';
    case 'offline':
      return 'No network connection';
    case 'cancelled':
      return 'Request was cancelled';
    case 'tlsFailure':
      return 'Secure connection could not be established';
    case 'unknown':
      return reason.detail ? `Unknown network error: ${reason.detail}` : 'Unknown network error';
    case 'retryExhausted':
      return `Request failed after ${reason.attempts} retries`;
    case 'rateLimited':
      return reason.retryAfter !== undefined
        ? `Rate limited, retry after ${reason.retryAfter}s`
        : 'Rate limited';
    case 'unauthorized':
      return 'Authentication required or failed';
    case 'notFound':
      return 'Resource not found';
    default:
      return assertNever(reason);
  }
}

/**
 * The single error type surfaced by the pipeline. Every failed call rejects
 * with exactly one `NetworkError`; `reason` is a closed discriminated union.
 */
export class NetworkError extends Error {
  readonly reason: NetworkErrorReason;

  constructor(reason: NetworkErrorReason, options?: { cause?: unknown }) {
    super(describe(reason), options);
    this.name = 'NetworkError';
    this.reason = reason;
  }

  get kind(): NetworkErrorKind {
    return this.reason.kind;
  }

  static invalidEndpoint(detail?: string): NetworkError {
    return new NetworkError({ kind: 'invalidEndpoint', detail });
  }

  static noResponseBody(): NetworkError {
    return new NetworkError({ kind: 'noResponseBody' });
  }

  static decodingFailure(detail: string, cause?: unknown): NetworkError {
    return new NetworkError({ kind: 'decodingFailure', detail }, { cause });
  }

  static serverFault(statusCode: number, message?: string, body?: Uint8Array): NetworkError {
    return new NetworkError({ kind: 'serverFault', statusCode, message, body });
  }

  static timeout(cause?: unknown): NetworkError {
    return new NetworkError({ kind: 'timeout' }, { cause });
  }

  static offline(cause?: unknown): NetworkError {
    return new NetworkError({ kind: 'offline' }, { cause });
  }

  static cancelled(cause?: unknown): NetworkError {
    return new NetworkError({ kind: 'cancelled' }, { cause });
  }

  static tlsFailure(cause?: unknown): NetworkError {
    return new NetworkError({ kind: 'tlsFailure' }, { cause });
  }

  static unknown(detail?: string, cause?: unknown): NetworkError {
    return new NetworkError({ kind: 'unknown', detail }, { cause });
  }

  static retryExhausted(attempts: number, cause?: unknown): NetworkError {
    return new NetworkError({ kind: 'retryExhausted', attempts }, { cause });
  }

  static rateLimited(retryAfter?: number): NetworkError {
    return new NetworkError({ kind: 'rateLimited', retryAfter });
  }

  static unauthorized(cause?: unknown): NetworkError {
    return new NetworkError({ kind: 'unauthorized' }, { cause });
  }

  static notFound(): NetworkError {
    return new NetworkError({ kind: 'notFound' });
  }

  /** Maps a transport-level failure onto the taxonomy. */
  static fromTransportError(error: TransportError): NetworkError {
    switch (error.kind) {
      case 'timedOut':
        return NetworkError.timeout(error);
      case 'connectionLost':
      case 'offline':
        return NetworkError.offline(error);
      case 'cancelled':
        return NetworkError.cancelled(error);
      case 'tlsFailure':
        return NetworkError.tlsFailure(error);
      case 'other':
        return NetworkError.unknown(error.message, error);
      default:
        return assertNever(error.kind);
    }
  }

  /** Normalizes any thrown value into a `NetworkError`. */
  static from(error: unknown): NetworkError {
    if (error instanceof NetworkError) return error;
    if (error instanceof TransportError) return NetworkError.fromTransportError(error);
    if (error instanceof Error && error.name === 'AbortError') return NetworkError.cancelled(error);
    const detail = error instanceof Error ? error.message : String(error);
    return NetworkError.unknown(detail, error);
  }

  get isRetryable(): boolean {
    const reason = this.reason;
    switch (reason.kind) {
      case 'timeout':
      case 'offline':
      case 'retryExhausted':
        return true;
      case 'serverFault':
        return isServerStatus(reason.statusCode);
      default:
        return false;
    }
  }

  get isClientError(): boolean {
    const reason = this.reason;
    switch (reason.kind) {
      case 'unauthorized':
      case 'notFound':
        return true;
      case 'serverFault':
        return isClientStatus(reason.statusCode);
      default:
        return false;
    }
  }

  get isServerError(): boolean {
    const reason = this.reason;
    return reason.kind === 'serverFault' && isServerStatus(reason.statusCode);
  }

  get isNotFound(): boolean {
    const reason = this.reason;
    return reason.kind === 'notFound' || (reason.kind === 'serverFault' && reason.statusCode === 404);
  }

  get recoveryAction(): RecoveryAction {
    const reason = this.reason;
    switch (reason.kind) {
      case 'offline':
      case 'timeout':
      case 'retryExhausted':
      case 'rateLimited':
        return 'retry';
      case 'serverFault':
        return isServerStatus(reason.statusCode) ? 'retry' : 'none';
      case 'unauthorized':
        return 'reauthenticate';
      case 'decodingFailure':
      case 'tlsFailure':
        return 'contactSupport';
      case 'invalidEndpoint':
      case 'noResponseBody':
      case 'unknown':
      case 'cancelled':
      case 'notFound':
        return 'none';
      default:
        return assertNever(reason);
    }
  }

  /** Message suitable for showing to an end user. */
  get userMessage(): string {
    const reason = this.reason;
    switch (reason.kind) {
      case 'invalidEndpoint':
        return 'The request could not be completed. Please try again.';
      case 'noResponseBody':
        return 'No data was received. Please try again.';
      case 'decodingFailure':
        return "We couldn't process the server's response. Please contact support.";
      case 'serverFault':
        if (reason.message) return reason.message;
        return isServerStatus(reason.statusCode)
          ? 'The server is temporarily unavailable. Please try again later.'
          : 'Something went wrong. Please try again.';
      case 'timeout':
        return 'The request timed out. Please check your connection and try again.';
      case 'offline':
        return 'No internet connection. Please check your network settings.';
      case 'cancelled':
        return 'The request was cancelled.';
      case 'tlsFailure':
        return 'A secure connection could not be established. Please contact support.';
      case 'unknown':
        return 'An unknown error occurred. Please try again.';
      case 'retryExhausted':
        return 'The request failed after multiple attempts. Please try again later.';
      case 'rateLimited':
        return reason.retryAfter !== undefined
          ? `Too many requests. Please wait ${Math.trunc(reason.retryAfter)} seconds.`
          : 'Too many requests. Please wait a moment before trying again.';
      case 'unauthorized':
        return 'Your session has expired. Please sign in again.';
      case 'notFound':
        return 'The requested item could not be found.';
      default:
        return assertNever(reason);
    }
  }

  /** Structural comparison of reasons; bodies are compared byte by byte. */
  equals(other: NetworkError): boolean {
    const a = this.reason;
    const b = other.reason;
    if (a.kind !== b.kind) return false;
    if (a.kind === 'serverFault' && b.kind === 'serverFault') {
      return a.statusCode === b.statusCode && a.message === b.message && bytesEqual(a.body, b.body);
    }
    return JSON.stringify(a) === JSON.stringify(b);
  }
}

function bytesEqual(a?: Uint8Array, b?: Uint8Array): boolean {
  if (a === b) return true;
  if (!a || !b || a.length !== b.length) return false;
  return a.every((value, index) => value === b[index]);
}

export const isNetworkError = (value: unknown, kind?: NetworkErrorKind): value is NetworkError =>
  value instanceof NetworkError && (kind === undefined || value.kind === kind);

export type TransportFailureKind =
  | 'timedOut'
  | 'connectionLost'
  | 'offline'
  | 'cancelled'
  | 'tlsFailure'
  | 'other';

/** Raised by transports for failures below HTTP (no status was received). */
export class TransportError extends Error {
  readonly kind: TransportFailureKind;
  readonly code?: string;

  constructor(kind: TransportFailureKind, message: string, options?: { cause?: unknown; code?: string }) {
    super(message, { cause: options?.cause });
    this.name = 'TransportError';
    this.kind = kind;
    this.code = options?.code;
  }
}

/**
 * Thrown by a response interceptor after it refreshed the credential. The
 * client re-issues the original request instead of surfacing it.
 */
export class CredentialRefreshedSignal extends Error {
  constructor() {
    super('Credential refreshed, retry the original request');
    this.name = 'CredentialRefreshedSignal';
  }
}

export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid network configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}
