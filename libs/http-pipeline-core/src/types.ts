export type HttpMethod = 'GET' | 'HEAD' | 'OPTIONS' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type HttpHeaders = Record<string, string>;

/** A single `name=value` query pair. Order within a request is preserved. */
export type QueryItem = readonly [name: string, value: string];

export type LogLevel = 'none' | 'basic' | 'verbose';

/**
 * Caller-side description of a call. Produced by application code (or by
 * {@link RequestBuilder}) and turned into a {@link RequestDescriptor} by the client.
 */
export interface Endpoint {
  path: string;
  method: HttpMethod;
  headers?: HttpHeaders;
  query?: readonly QueryItem[];
  body?: Uint8Array | string;
  /** Overrides the configured transport timeout for this call only. */
  timeoutMs?: number;
  /** Overrides the logging interceptor's level for this call only. */
  logLevel?: LogLevel;
}

/**
 * Immutable request value that flows through the request interceptor chain.
 * Header names are unique under case-insensitive comparison.
 */
export interface RequestDescriptor {
  readonly method: HttpMethod;
  readonly baseUrl: string;
  readonly path: string;
  readonly headers: Readonly<HttpHeaders>;
  readonly query: readonly QueryItem[];
  readonly body?: Uint8Array;
  readonly timeoutMs: number;
  readonly logLevel?: LogLevel;
}

/** One transport exchange, as seen by response interceptors and the classifier. */
export interface ResponseEnvelope {
  readonly status: number;
  readonly headers: Readonly<HttpHeaders>;
  readonly body: Uint8Array;
  /** Final URL after redirects. */
  readonly url: string;
  readonly durationMs: number;
}

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: HttpHeaders;
  body?: Uint8Array;
}

export interface RawHttpResponse {
  status: number;
  headers: HttpHeaders;
  body: Uint8Array;
  /** Final URL after redirects; the request URL is used when absent. */
  url?: string;
}

/**
 * Performs one network exchange. Non-2xx statuses resolve normally; only
 * transport-level failures reject, preferably with a {@link TransportError}.
 */
export interface HttpTransport {
  (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse>;
}

/** Decoded body together with response metadata. */
export interface NetworkResult<T> {
  data: T;
  statusCode: number;
  headers: HttpHeaders;
  url: string;
  durationMs: number;
  /** Transport attempts made by the retry executor, including the successful one. */
  attempts: number;
}

export type LoggerMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LoggerMeta): void;
  info(message: string, meta?: LoggerMeta): void;
  warn(message: string, meta?: LoggerMeta): void;
  error(message: string, meta?: LoggerMeta): void;
}

export interface RequestInterceptorContext {
  /** Retry attempt index, starting at 0. */
  attempt: number;
  /** How many times this call has been re-issued after a credential refresh. */
  refreshAttempt: number;
  signal?: AbortSignal;
}

export interface ResponseInterceptorContext extends RequestInterceptorContext {
  /** The descriptor that was actually sent (after the request chain). */
  request: RequestDescriptor;
  /** False once the re-issue budget is spent; a refresh signal would then be ignored. */
  canRetryAfterRefresh: boolean;
}

export interface RequestInterceptor {
  interceptRequest(
    request: RequestDescriptor,
    ctx: RequestInterceptorContext,
  ): Promise<RequestDescriptor> | RequestDescriptor;
}

export interface ResponseInterceptor {
  interceptResponse(
    response: ResponseEnvelope,
    ctx: ResponseInterceptorContext,
  ): Promise<Uint8Array> | Uint8Array;
}

export type RetryPolicy =
  | { readonly kind: 'none' }
  | { readonly kind: 'exponential'; readonly maxAttempts: number; readonly baseDelayMs: number }
  | { readonly kind: 'fixed'; readonly maxAttempts: number; readonly delayMs: number };

export interface ResponseDecoder<T> {
  /** When true an empty body fails with `noResponseBody` before `decode` runs. */
  readonly requiresBody: boolean;
  decode(body: Uint8Array, response: ResponseEnvelope): T;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
}
