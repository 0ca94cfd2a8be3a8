import { describe, expect, it, vi } from 'vitest';
import { TransportError } from '../errors';
import {
  createAxiosTransport,
  type AxiosRequestConfigLike,
  type AxiosResponseLike,
} from '../transport/axiosTransport';

const request = {
  method: 'GET' as const,
  url: 'https://api.example.com/v1/users/1',
  headers: { Accept: 'application/json' },
};

const axiosFailure = (code: string, name = 'AxiosError') =>
  Object.assign(new Error(`request failed with ${code}`), { code, name });

describe('createAxiosTransport', () => {
  it('accepts every status and normalizes the response', async () => {
    const send = vi.fn(
      async (_config: AxiosRequestConfigLike): Promise<AxiosResponseLike> => ({
        status: 404,
        headers: { 'Content-Type': 'application/json', 'Set-Cookie': ['a=1', 'b=2'], 'X-Empty': undefined },
        data: new TextEncoder().encode('{}').buffer,
        request: { res: { responseUrl: 'https://api.example.com/v2/users/1' } },
      }),
    );
    const transport = createAxiosTransport({ request: send });
    const signal = new AbortController().signal;

    const response = await transport(request, signal);

    expect(response.status).toBe(404);
    expect(response.headers).toEqual({ 'content-type': 'application/json', 'set-cookie': 'a=1, b=2' });
    expect(new TextDecoder().decode(response.body)).toBe('{}');
    expect(response.url).toBe('https://api.example.com/v2/users/1');

    const config = send.mock.calls[0][0];
    expect(config).toMatchObject({
      url: 'https://api.example.com/v1/users/1',
      method: 'GET',
      headers: { Accept: 'application/json' },
      responseType: 'arraybuffer',
      signal,
    });
    expect(config.validateStatus?.(500)).toBe(true);
  });

  it('falls back to the request URL and accepts string payloads', async () => {
    const transport = createAxiosTransport({
      request: async () => ({ status: 200, headers: {}, data: 'plain' }),
    });

    const response = await transport(request, new AbortController().signal);

    expect(response.url).toBe('https://api.example.com/v1/users/1');
    expect(new TextDecoder().decode(response.body)).toBe('plain');
  });

  it.each([
    ['ECONNABORTED', 'AxiosError', 'timedOut'],
    ['ETIMEDOUT', 'AxiosError', 'timedOut'],
    ['ERR_NETWORK', 'AxiosError', 'offline'],
    ['ERR_CANCELED', 'CanceledError', 'cancelled'],
    ['ECONNRESET', 'AxiosError', 'connectionLost'],
  ])('maps %s (%s) to %s', async (code, name, kind) => {
    const transport = createAxiosTransport({
      request: async () => {
        throw axiosFailure(code, name);
      },
    });

    const error = await transport(request, new AbortController().signal).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    if (!(error instanceof TransportError)) return;
    expect(error.kind).toBe(kind);
  });
});
