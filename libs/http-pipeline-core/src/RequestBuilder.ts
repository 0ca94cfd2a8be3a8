import { convertKeysToSnakeCase, type KeyEncodingStrategy } from './decoders';
import { mergeHeaders } from './requestDescriptor';
import type { Endpoint, HttpHeaders, HttpMethod, LogLevel, QueryItem } from './types';

interface RequestBuilderState {
  path: string;
  method: HttpMethod;
  headers: HttpHeaders;
  query: readonly QueryItem[];
  body?: Uint8Array | string;
  timeoutMs?: number;
  logLevel?: LogLevel;
}

const DEFAULT_HEADERS: HttpHeaders = {
  'Content-Type': 'application/json',
  Accept: 'application/json',
};

/**
 * Immutable fluent {@link Endpoint} for one-off calls. Every method returns a
 * new builder; the receiver is never modified.
 *
 * @example
 * ```typescript
 * const user = await client.request(
 *   RequestBuilder.post('/users')
 *     .header('X-Api-Key', 'test-key')
 *     .jsonBody({ firstName: 'Ada' }, { keyEncoding: 'convertToSnakeCase' }),
 *   jsonDecoder(UserSchema),
 * );
 * ```
 */
export class RequestBuilder implements Endpoint {
  readonly path: string;
  readonly method: HttpMethod;
  readonly headers: HttpHeaders;
  readonly query: readonly QueryItem[];
  readonly body?: Uint8Array | string;
  readonly timeoutMs?: number;
  readonly logLevel?: LogLevel;

  private constructor(state: RequestBuilderState) {
    this.path = state.path;
    this.method = state.method;
    this.headers = state.headers;
    this.query = state.query;
    this.body = state.body;
    this.timeoutMs = state.timeoutMs;
    this.logLevel = state.logLevel;
  }

  static get(path: string): RequestBuilder {
    return RequestBuilder.create(path, 'GET');
  }

  static post(path: string): RequestBuilder {
    return RequestBuilder.create(path, 'POST');
  }

  static put(path: string): RequestBuilder {
    return RequestBuilder.create(path, 'PUT');
  }

  static patch(path: string): RequestBuilder {
    return RequestBuilder.create(path, 'PATCH');
  }

  static delete(path: string): RequestBuilder {
    return RequestBuilder.create(path, 'DELETE');
  }

  private static create(path: string, method: HttpMethod): RequestBuilder {
    return new RequestBuilder({ path, method, headers: { ...DEFAULT_HEADERS }, query: [] });
  }

  private with(changes: Partial<RequestBuilderState>): RequestBuilder {
    return new RequestBuilder({
      path: this.path,
      method: this.method,
      headers: this.headers,
      query: this.query,
      body: this.body,
      timeoutMs: this.timeoutMs,
      logLevel: this.logLevel,
      ...changes,
    });
  }

  header(name: string, value: string): RequestBuilder {
    return this.with({ headers: mergeHeaders(this.headers, { [name]: value }) });
  }

  addHeaders(headers: HttpHeaders): RequestBuilder {
    return this.with({ headers: mergeHeaders(this.headers, headers) });
  }

  queryItem(name: string, value: string): RequestBuilder {
    return this.with({ query: [...this.query, [name, value]] });
  }

  queryItems(params: Record<string, string>): RequestBuilder {
    return this.with({ query: [...this.query, ...Object.entries(params)] });
  }

  /** Serializes `value` as JSON. Keys are converted to snake_case on request. */
  jsonBody(value: unknown, opts: { keyEncoding?: KeyEncodingStrategy } = {}): RequestBuilder {
    const payload = opts.keyEncoding === 'convertToSnakeCase' ? convertKeysToSnakeCase(value) : value;
    return this.with({ body: JSON.stringify(payload) });
  }

  rawBody(data: Uint8Array | string): RequestBuilder {
    return this.with({ body: data });
  }

  timeout(ms: number): RequestBuilder {
    return this.with({ timeoutMs: ms });
  }

  logging(level: LogLevel): RequestBuilder {
    return this.with({ logLevel: level });
  }

  authorize(token: string, scheme = 'Bearer'): RequestBuilder {
    return this.header('Authorization', `${scheme} ${token}`);
  }

  formUrlEncoded(): RequestBuilder {
    return this.header('Content-Type', 'application/x-www-form-urlencoded');
  }

  ifNoneMatch(etag: string): RequestBuilder {
    return this.header('If-None-Match', etag);
  }

  acceptLanguage(language: string): RequestBuilder {
    return this.header('Accept-Language', language);
  }
}
