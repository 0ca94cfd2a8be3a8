// ============================================================================
// Interceptor chain and standard interceptors
// ============================================================================

import { ConsoleLogger } from './logger';
import { hasHeader, mergeHeaders, createRequestDescriptor, resolveUrl } from './requestDescriptor';
import type {
  HttpHeaders,
  LogLevel,
  Logger,
  RequestDescriptor,
  RequestInterceptor,
  RequestInterceptorContext,
  ResponseEnvelope,
  ResponseInterceptor,
  ResponseInterceptorContext,
} from './types';

/**
 * Two ordered interceptor lists.
 *
 * Request interceptors run in registration order, each receiving the previous
 * one's descriptor. Response interceptors run in registration order over the
 * response body. The first failure on either side aborts the rest of that
 * side and propagates unchanged (a `CredentialRefreshedSignal` included; the
 * client, not the chain, decides what it means).
 */
export class InterceptorChain {
  readonly requestInterceptors: readonly RequestInterceptor[];
  readonly responseInterceptors: readonly ResponseInterceptor[];

  constructor(
    requestInterceptors: readonly RequestInterceptor[] = [],
    responseInterceptors: readonly ResponseInterceptor[] = [],
  ) {
    this.requestInterceptors = [...requestInterceptors];
    this.responseInterceptors = [...responseInterceptors];
  }

  async interceptRequest(request: RequestDescriptor, ctx: RequestInterceptorContext): Promise<RequestDescriptor> {
    let current = request;
    for (const interceptor of this.requestInterceptors) {
      current = await interceptor.interceptRequest(current, ctx);
    }
    return current;
  }

  async interceptResponse(response: ResponseEnvelope, ctx: ResponseInterceptorContext): Promise<Uint8Array> {
    let body = response.body;
    for (const interceptor of this.responseInterceptors) {
      body = await interceptor.interceptResponse({ ...response, body }, ctx);
    }
    return body;
  }
}

// ============================================================================
// Headers Interceptor
// ============================================================================

/**
 * Adds static headers to every request unless the request already carries a
 * header of the same name (case-insensitive).
 *
 * @example
 * ```typescript
 * const client = new NetworkClient({
 *   baseUrl: 'https://api.example.com',
 *   requestInterceptors: [new HeadersInterceptor({ 'X-Client': 'mobile' })],
 * });
 * ```
 */
export class HeadersInterceptor implements RequestInterceptor {
  constructor(private readonly headers: HttpHeaders) {}

  interceptRequest(request: RequestDescriptor): RequestDescriptor {
    const missing: HttpHeaders = {};
    for (const [name, value] of Object.entries(this.headers)) {
      if (!hasHeader(request.headers, name)) {
        missing[name] = value;
      }
    }
    if (Object.keys(missing).length === 0) return request;
    return createRequestDescriptor({ ...request, headers: mergeHeaders(request.headers, missing) });
  }
}

// ============================================================================
// Logging Interceptor
// ============================================================================

export interface LoggingInterceptorOptions {
  level?: LogLevel; // default: "verbose"
  logger?: Logger;
  /** Header names whose values are masked in verbose output. */
  redactHeaders?: string[]; // default: ["authorization"]
}

const BODY_PREVIEW_LIMIT = 500;
const utf8 = new TextDecoder();

const previewBody = (body: Uint8Array | undefined): string | undefined => {
  if (!body || body.length === 0) return undefined;
  const text = utf8.decode(body);
  return text.length > BODY_PREVIEW_LIMIT ? `${text.slice(0, BODY_PREVIEW_LIMIT)}...` : text;
};

/**
 * Logs outgoing requests and incoming responses. A request's own `logLevel`
 * takes precedence over the interceptor's level. Register the same instance
 * as both a request and a response interceptor.
 */
export class LoggingInterceptor implements RequestInterceptor, ResponseInterceptor {
  private readonly level: LogLevel;
  private readonly logger: Logger;
  private readonly redacted: Set<string>;

  constructor(opts: LoggingInterceptorOptions = {}) {
    this.level = opts.level ?? 'verbose';
    this.logger = opts.logger ?? new ConsoleLogger();
    this.redacted = new Set((opts.redactHeaders ?? ['authorization']).map((name) => name.toLowerCase()));
  }

  interceptRequest(request: RequestDescriptor, ctx: RequestInterceptorContext): RequestDescriptor {
    const level = request.logLevel ?? this.level;
    if (level === 'none') return request;

    const meta: Record<string, unknown> = {
      method: request.method,
      url: this.safeUrl(request),
      attempt: ctx.attempt,
    };
    if (level === 'verbose') {
      meta.headers = this.redact(request.headers);
      const body = previewBody(request.body);
      if (body !== undefined) meta.body = body;
    }
    this.logger.info('http.request', meta);
    return request;
  }

  interceptResponse(response: ResponseEnvelope, ctx: ResponseInterceptorContext): Uint8Array {
    const level = ctx.request.logLevel ?? this.level;
    if (level === 'none') return response.body;

    const meta: Record<string, unknown> = {
      method: ctx.request.method,
      status: response.status,
      url: response.url,
      durationMs: response.durationMs,
    };
    if (level === 'verbose') {
      const body = previewBody(response.body);
      if (body !== undefined) meta.body = body;
    }
    if (response.status >= 200 && response.status <= 299) {
      this.logger.info('http.response', meta);
    } else {
      this.logger.error('http.response', meta);
    }
    return response.body;
  }

  private redact(headers: Readonly<HttpHeaders>): HttpHeaders {
    const result: HttpHeaders = {};
    for (const [name, value] of Object.entries(headers)) {
      result[name] = this.redacted.has(name.toLowerCase()) ? '<redacted>' : value;
    }
    return result;
  }

  private safeUrl(request: RequestDescriptor): string {
    try {
      return resolveUrl(request);
    } catch {
      return `${request.baseUrl}${request.path}`;
    }
  }
}
