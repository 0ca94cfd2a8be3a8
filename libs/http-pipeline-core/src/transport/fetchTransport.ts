import type { HttpTransport, TransportRequest, RawHttpResponse, HttpHeaders } from '../types';
import { toTransportError } from './transportErrors';

/**
 * Transport over the global fetch API. Any status resolves; network-level
 * failures reject with a TransportError.
 */
export const fetchTransport: HttpTransport = async (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse> => {
  try {
    const response = await fetch(req.url, {
      method: req.method,
      headers: req.headers,
      body: req.body,
      signal,
    });
    const body = new Uint8Array(await response.arrayBuffer());

    const headers: HttpHeaders = {};
    response.headers.forEach((value, key) => {
      headers[key] = value;
    });

    return {
      status: response.status,
      headers,
      body,
      url: response.url || req.url,
    };
  } catch (error) {
    throw toTransportError(error);
  }
};
