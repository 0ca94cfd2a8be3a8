import type { HttpTransport, TransportRequest, RawHttpResponse, HttpHeaders } from '../types';
import { toTransportError } from './transportErrors';

export interface AxiosRequestConfigLike {
  url?: string;
  method?: string;
  headers?: Record<string, string>;
  data?: unknown;
  signal?: AbortSignal;
  responseType?: 'arraybuffer';
  validateStatus?: (status: number) => boolean;
}

export interface AxiosResponseLike {
  status: number;
  headers: object;
  data: unknown;
  request?: { res?: { responseUrl?: string } };
}

/** The slice of an axios instance the transport needs. */
export interface AxiosInstanceLike {
  request(config: AxiosRequestConfigLike): Promise<AxiosResponseLike>;
}

const toBytes = (data: unknown): Uint8Array => {
  if (data instanceof Uint8Array) return data;
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  if (typeof data === 'string') return new TextEncoder().encode(data);
  return new Uint8Array(0);
};

/**
 * Transport over an axios instance. Every status is accepted so that the
 * pipeline's classifier, not axios, decides what counts as a failure.
 */
export const createAxiosTransport = (axiosInstance: AxiosInstanceLike): HttpTransport => {
  return async (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse> => {
    let response: AxiosResponseLike;
    try {
      response = await axiosInstance.request({
        url: req.url,
        method: req.method,
        headers: req.headers,
        data: req.body,
        signal,
        responseType: 'arraybuffer',
        validateStatus: () => true,
      });
    } catch (error) {
      throw toTransportError(error);
    }

    const headers: HttpHeaders = {};
    for (const key of Object.keys(response.headers)) {
      const value: unknown = Reflect.get(response.headers, key);
      if (value === undefined || value === null) continue;
      headers[key.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
    }

    return {
      status: response.status,
      headers,
      body: toBytes(response.data),
      url: response.request?.res?.responseUrl ?? req.url,
    };
  };
};
