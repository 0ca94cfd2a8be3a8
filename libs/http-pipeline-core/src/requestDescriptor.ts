import { NetworkError } from './errors';
import type { HttpHeaders, QueryItem, RequestDescriptor } from './types';

const findHeaderKey = (headers: Readonly<HttpHeaders>, name: string): string | undefined => {
  const lower = name.toLowerCase();
  return Object.keys(headers).find((key) => key.toLowerCase() === lower);
};

export function getHeader(headers: Readonly<HttpHeaders>, name: string): string | undefined {
  const key = findHeaderKey(headers, name);
  return key === undefined ? undefined : headers[key];
}

export function hasHeader(headers: Readonly<HttpHeaders>, name: string): boolean {
  return findHeaderKey(headers, name) !== undefined;
}

/**
 * Merges header maps left to right. A later source replaces an earlier entry
 * whose name matches case-insensitively; the later spelling wins.
 */
export function mergeHeaders(...sources: Array<Readonly<HttpHeaders> | undefined>): HttpHeaders {
  const result: HttpHeaders = {};
  for (const source of sources) {
    if (!source) continue;
    for (const [key, value] of Object.entries(source)) {
      const existing = findHeaderKey(result, key);
      if (existing !== undefined) {
        delete result[existing];
      }
      result[key] = value;
    }
  }
  return result;
}

export function createRequestDescriptor(init: RequestDescriptor): RequestDescriptor {
  return Object.freeze({
    ...init,
    headers: Object.freeze(mergeHeaders(init.headers)),
    query: Object.freeze(init.query.map((item): QueryItem => [item[0], item[1]])),
  });
}

export function withHeader(request: RequestDescriptor, name: string, value: string): RequestDescriptor {
  return createRequestDescriptor({ ...request, headers: mergeHeaders(request.headers, { [name]: value }) });
}

export function withoutHeader(request: RequestDescriptor, name: string): RequestDescriptor {
  const key = findHeaderKey(request.headers, name);
  if (key === undefined) return request;
  const headers: HttpHeaders = { ...request.headers };
  delete headers[key];
  return createRequestDescriptor({ ...request, headers });
}

export function withQueryItem(request: RequestDescriptor, name: string, value: string): RequestDescriptor {
  return createRequestDescriptor({ ...request, query: [...request.query, [name, value]] });
}

export function withBody(request: RequestDescriptor, body: Uint8Array | undefined): RequestDescriptor {
  return createRequestDescriptor({ ...request, body });
}

/**
 * Resolves the absolute URL of a descriptor. The endpoint path is appended to
 * the base URL's own path, so `https://api.example.com/v1` + `/users` targets
 * `/v1/users`.
 */
export function resolveUrl(request: RequestDescriptor): string {
  let url: URL;
  try {
    url = new URL(request.baseUrl);
  } catch (error) {
    throw new NetworkError(
      { kind: 'invalidEndpoint', detail: `invalid base URL "${request.baseUrl}"` },
      { cause: error },
    );
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw NetworkError.invalidEndpoint(`unsupported protocol "${url.protocol}"`);
  }

  const basePath = url.pathname.replace(/\/+$/, '');
  const path = request.path.startsWith('/') ? request.path : `/${request.path}`;
  url.pathname = `${basePath}${path}`;
  url.search = '';
  for (const [name, value] of request.query) {
    url.searchParams.append(name, value);
  }
  return url.toString();
}
