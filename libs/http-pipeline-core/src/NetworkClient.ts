import { classifyResponse } from './classifier';
import { MAX_TIMEOUT_MS, defaultConfiguration, type NetworkConfiguration } from './configuration';
import { emptyDecoder, rawDecoder } from './decoders';
import { CredentialRefreshedSignal, NetworkError } from './errors';
import { InterceptorChain } from './interceptors';
import { errorMessage } from './logger';
import { createRequestDescriptor, mergeHeaders, resolveUrl } from './requestDescriptor';
import { RetryExecutor } from './retry';
import { fetchTransport } from './transport/fetchTransport';
import type {
  Endpoint,
  ExecuteOptions,
  HttpTransport,
  Logger,
  NetworkResult,
  RawHttpResponse,
  RequestDescriptor,
  RequestInterceptor,
  RequestInterceptorContext,
  ResponseDecoder,
  ResponseEnvelope,
  ResponseInterceptor,
} from './types';

export interface NetworkClientOptions {
  /** Overrides `configuration.baseUrl`. */
  baseUrl?: string;
  configuration?: NetworkConfiguration;
  transport?: HttpTransport;
  requestInterceptors?: RequestInterceptor[];
  responseInterceptors?: ResponseInterceptor[];
  logger?: Logger;
  retryExecutor?: RetryExecutor;
}

const utf8 = new TextEncoder();

/**
 * Composes request building, the interceptor chain, transport, response
 * classification, retry and decoding into one `execute` call.
 *
 * An attempt is: request chain → transport (bounded by the request timeout and
 * the caller's signal) → response chain → classifier. Attempts run under the
 * configured retry policy. When a response interceptor reports a refreshed
 * credential the built request is re-issued inside the same attempt, at most
 * `maxRefreshRetries` times. Decoding happens once, after the retry loop.
 *
 * The client holds no per-call state and can be shared freely.
 *
 * @example
 * ```typescript
 * const client = new NetworkClient({ baseUrl: 'https://api.example.com' });
 * const { data } = await client.execute(RequestBuilder.get('/users/1'), jsonDecoder(User));
 * ```
 */
export class NetworkClient {
  readonly configuration: NetworkConfiguration;
  private readonly baseUrl?: string;
  private readonly transport: HttpTransport;
  private readonly chain: InterceptorChain;
  private readonly logger?: Logger;
  private readonly retryExecutor: RetryExecutor;

  constructor(options: NetworkClientOptions = {}) {
    const configuration = options.configuration ?? defaultConfiguration;
    this.configuration = { ...configuration, defaultHeaders: { ...configuration.defaultHeaders } };
    this.baseUrl = options.baseUrl ?? this.configuration.baseUrl;
    this.transport = options.transport ?? fetchTransport;
    this.chain = new InterceptorChain(options.requestInterceptors, options.responseInterceptors);
    this.logger = options.logger;
    this.retryExecutor = options.retryExecutor ?? new RetryExecutor();
  }

  /** Turns an endpoint into the immutable descriptor the chain operates on. */
  buildRequest(endpoint: Endpoint): RequestDescriptor {
    if (!this.baseUrl) {
      throw NetworkError.invalidEndpoint('no base URL configured');
    }
    const timeoutMs = endpoint.timeoutMs ?? this.configuration.timeoutMs;
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0 || timeoutMs > MAX_TIMEOUT_MS) {
      throw NetworkError.invalidEndpoint(`timeout must be between 1 and ${MAX_TIMEOUT_MS} ms, got ${timeoutMs}`);
    }
    const body = typeof endpoint.body === 'string' ? utf8.encode(endpoint.body) : endpoint.body;
    const request = createRequestDescriptor({
      method: endpoint.method,
      baseUrl: this.baseUrl,
      path: endpoint.path,
      headers: mergeHeaders(this.configuration.defaultHeaders, endpoint.headers),
      query: endpoint.query ?? [],
      body,
      timeoutMs,
      logLevel: endpoint.logLevel,
    });
    resolveUrl(request);
    return request;
  }

  async execute<T>(endpoint: Endpoint, decoder: ResponseDecoder<T>, options: ExecuteOptions = {}): Promise<NetworkResult<T>> {
    const { signal } = options;
    const request = this.buildRequest(endpoint);
    const meta = { method: request.method, path: request.path };

    let attempts = 0;
    let response: ResponseEnvelope;
    try {
      if (signal?.aborted) {
        throw NetworkError.cancelled(signal.reason);
      }
      response = await this.retryExecutor.execute(
        this.configuration.retryPolicy,
        (attempt) => {
          attempts = attempt + 1;
          return this.runAttempt(request, attempt, signal);
        },
        {
          signal,
          onRetry: ({ attempt, delayMs, error }) => {
            this.logger?.warn('http.request.retry', { ...meta, attempt, delayMs, error: errorMessage(error) });
          },
        },
      );
    } catch (error) {
      const failure = NetworkError.from(error);
      this.logger?.error('http.request.failed', { ...meta, attempts, kind: failure.kind, error: failure.message });
      throw failure;
    }

    const data = this.decode(response, decoder);
    this.logger?.info('http.request.success', {
      ...meta,
      status: response.status,
      attempts,
      durationMs: response.durationMs,
    });

    return {
      data,
      statusCode: response.status,
      headers: { ...response.headers },
      url: response.url,
      durationMs: response.durationMs,
      attempts,
    };
  }

  /** Like {@link execute}, resolving with the decoded value only. */
  async request<T>(endpoint: Endpoint, decoder: ResponseDecoder<T>, options: ExecuteOptions = {}): Promise<T> {
    const result = await this.execute(endpoint, decoder, options);
    return result.data;
  }

  /** Executes without decoding; the body is returned as received. */
  requestRaw(endpoint: Endpoint, options: ExecuteOptions = {}): Promise<NetworkResult<Uint8Array>> {
    return this.execute(endpoint, rawDecoder(), options);
  }

  /** For calls whose response carries nothing of interest (e.g. 204). */
  async requestVoid(endpoint: Endpoint, options: ExecuteOptions = {}): Promise<void> {
    await this.execute(endpoint, emptyDecoder(), options);
  }

  private async runAttempt(request: RequestDescriptor, attempt: number, signal?: AbortSignal): Promise<ResponseEnvelope> {
    const maxReissues = this.configuration.maxRefreshRetries;
    for (let refreshAttempt = 0; ; refreshAttempt += 1) {
      try {
        return await this.send(request, { attempt, refreshAttempt, signal }, refreshAttempt < maxReissues);
      } catch (error) {
        if (!(error instanceof CredentialRefreshedSignal)) {
          throw NetworkError.from(error);
        }
        if (refreshAttempt >= maxReissues) {
          throw NetworkError.unauthorized(error);
        }
        this.logger?.info('http.refresh.reissue', {
          method: request.method,
          path: request.path,
          attempt,
          refreshAttempt: refreshAttempt + 1,
        });
      }
    }
  }

  private async send(
    request: RequestDescriptor,
    ctx: RequestInterceptorContext,
    canRetryAfterRefresh: boolean,
  ): Promise<ResponseEnvelope> {
    const intercepted = await this.chain.interceptRequest(request, ctx);
    const url = resolveUrl(intercepted);

    this.logger?.debug('http.request.attempt', {
      method: intercepted.method,
      url,
      attempt: ctx.attempt,
      refreshAttempt: ctx.refreshAttempt,
    });

    const startedAt = Date.now();
    const raw = await this.transmit(intercepted, url, ctx.signal);
    const received: ResponseEnvelope = {
      status: raw.status,
      headers: raw.headers,
      body: raw.body,
      url: raw.url ?? url,
      durationMs: Date.now() - startedAt,
    };

    const body = await this.chain.interceptResponse(received, { ...ctx, request: intercepted, canRetryAfterRefresh });
    const response: ResponseEnvelope = { ...received, body };

    const classification = classifyResponse(response);
    if (classification.outcome === 'failure') {
      throw classification.error;
    }
    return response;
  }

  private async transmit(request: RequestDescriptor, url: string, signal?: AbortSignal): Promise<RawHttpResponse> {
    if (signal?.aborted) {
      throw NetworkError.cancelled(signal.reason);
    }

    const controller = new AbortController();
    let didTimeout = false;
    const timeoutHandle = setTimeout(() => {
      didTimeout = true;
      controller.abort();
    }, request.timeoutMs);
    const onAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener('abort', onAbort, { once: true });

    // Settles the attempt even when a transport ignores its signal.
    const aborted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
    });

    try {
      return await Promise.race([
        this.transport(
          { method: request.method, url, headers: { ...request.headers }, body: request.body },
          controller.signal,
        ),
        aborted,
      ]);
    } catch (error) {
      if (didTimeout) {
        throw NetworkError.timeout(error);
      }
      if (signal?.aborted) {
        throw NetworkError.cancelled(error);
      }
      throw NetworkError.from(error);
    } finally {
      clearTimeout(timeoutHandle);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private decode<T>(response: ResponseEnvelope, decoder: ResponseDecoder<T>): T {
    if (decoder.requiresBody && response.body.length === 0) {
      throw NetworkError.noResponseBody();
    }
    try {
      return decoder.decode(response.body, response);
    } catch (error) {
      if (error instanceof NetworkError) throw error;
      throw NetworkError.decodingFailure(errorMessage(error), error);
    }
  }
}
