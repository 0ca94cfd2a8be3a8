import { z } from 'zod';
import { NetworkError } from './errors';
import { getHeader } from './requestDescriptor';
import type { HttpHeaders } from './types';

export type Classification =
  | { outcome: 'proceed' }
  | { outcome: 'failure'; error: NetworkError };

export interface ClassifierInput {
  status: number;
  headers: Readonly<HttpHeaders>;
  body: Uint8Array;
}

/**
 * Conventional error envelope returned by most JSON APIs:
 * `{ message, code, errors: { field: [msg] }, details: { key: value } }`.
 */
const errorEnvelopeSchema = z.object({
  message: z.string().nullish(),
  code: z.string().nullish(),
  errors: z.record(z.array(z.string())).nullish(),
  details: z.record(z.string()).nullish(),
});

export type ErrorEnvelope = z.infer<typeof errorEnvelopeSchema>;

const utf8 = new TextDecoder();

/**
 * Best-effort extraction of a human-readable message from an error body.
 * Returns undefined when the body is not a recognizable envelope.
 */
export function extractErrorMessage(body: Uint8Array): string | undefined {
  let json: unknown;
  try {
    json = JSON.parse(utf8.decode(body));
  } catch {
    return undefined;
  }

  const parsed = errorEnvelopeSchema.safeParse(json);
  if (!parsed.success) return undefined;
  const { message, errors, details } = parsed.data;

  const parts: string[] = [];
  if (message) {
    parts.push(message);
  }
  if (errors) {
    for (const field of Object.keys(errors).sort()) {
      const messages = errors[field];
      if (messages.length === 0) continue;
      parts.push(`${field}: ${messages.join(' ')}`);
    }
  }
  if (details) {
    for (const key of Object.keys(details).sort()) {
      const value = details[key];
      parts.push(value ? `${key}: ${value}` : key);
    }
  }
  return parts.length > 0 ? parts.join('\n') : undefined;
}

/**
 * Parses a `Retry-After` value into seconds. Accepts delta-seconds or an
 * HTTP-date; dates in the past yield undefined.
 */
export function parseRetryAfter(value: string | undefined, now: number = Date.now()): number | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  if (!trimmed) return undefined;
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed);
  }
  const date = Date.parse(trimmed);
  if (!Number.isNaN(date)) {
    const diff = Math.ceil((date - now) / 1000);
    return diff > 0 ? diff : undefined;
  }
  return undefined;
}

export const isSuccessStatus = (status: number): boolean => status >= 200 && status <= 299;

/**
 * Maps a received response onto either `proceed` or a `NetworkError`.
 * Total over all status codes.
 */
export function classifyResponse(input: ClassifierInput): Classification {
  const { status, headers, body } = input;
  if (isSuccessStatus(status)) {
    return { outcome: 'proceed' };
  }
  switch (status) {
    case 401:
      return { outcome: 'failure', error: NetworkError.unauthorized() };
    case 404:
      return { outcome: 'failure', error: NetworkError.notFound() };
    case 429:
      return {
        outcome: 'failure',
        error: NetworkError.rateLimited(parseRetryAfter(getHeader(headers, 'retry-after'))),
      };
    default:
      return {
        outcome: 'failure',
        error: NetworkError.serverFault(status, extractErrorMessage(body), body),
      };
  }
}
