import type { ZodType, ZodTypeDef } from 'zod';
import type { ResponseDecoder } from './types';

export type KeyDecodingStrategy = 'useDefaultKeys' | 'convertFromSnakeCase';
export type KeyEncodingStrategy = 'useDefaultKeys' | 'convertToSnakeCase';

const utf8 = new TextDecoder();

const snakeToCamel = (key: string): string => {
  const leading = /^_*/.exec(key)?.[0] ?? '';
  const rest = key.slice(leading.length);
  if (!rest.includes('_')) return key;
  const [head, ...tail] = rest.split('_').filter((part) => part.length > 0);
  if (head === undefined) return key;
  return leading + head + tail.map((part) => part.charAt(0).toUpperCase() + part.slice(1)).join('');
};

const camelToSnake = (key: string): string =>
  key
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .toLowerCase();

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

function transformKeys(value: unknown, transform: (key: string) => string): unknown {
  if (Array.isArray(value)) {
    return value.map((entry) => transformKeys(entry, transform));
  }
  if (isPlainObject(value)) {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[transform(key)] = transformKeys(entry, transform);
    }
    return result;
  }
  return value;
}

/** Recursively renames `snake_case` object keys to `camelCase`. */
export const convertKeysFromSnakeCase = (value: unknown): unknown => transformKeys(value, snakeToCamel);

/** Recursively renames `camelCase` object keys to `snake_case`. */
export const convertKeysToSnakeCase = (value: unknown): unknown => transformKeys(value, camelToSnake);

export interface JsonDecoderOptions {
  keyDecoding?: KeyDecodingStrategy; // default: "useDefaultKeys"
}

const formatIssues = (issues: Array<{ path: Array<string | number>; message: string }>): string =>
  issues.map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message)).join('; ');

/**
 * Decodes a JSON body, optionally converting snake_case keys, and validates
 * it against a zod schema when one is given. Throwing here is turned into
 * `decodingFailure` by the client.
 *
 * @example
 * ```typescript
 * const User = z.object({ id: z.number(), name: z.string() });
 * const result = await client.execute(RequestBuilder.get('/users/1'), jsonDecoder(User));
 * ```
 */
export function jsonDecoder<T>(schema: ZodType<T, ZodTypeDef, unknown>, opts?: JsonDecoderOptions): ResponseDecoder<T>;
export function jsonDecoder(schema?: undefined, opts?: JsonDecoderOptions): ResponseDecoder<unknown>;
export function jsonDecoder<T>(
  schema?: ZodType<T, ZodTypeDef, unknown>,
  opts: JsonDecoderOptions = {},
): ResponseDecoder<T | unknown> {
  const keyDecoding = opts.keyDecoding ?? 'useDefaultKeys';
  return {
    requiresBody: true,
    decode(body) {
      const parsed: unknown = JSON.parse(utf8.decode(body));
      const value = keyDecoding === 'convertFromSnakeCase' ? convertKeysFromSnakeCase(parsed) : parsed;
      if (!schema) return value;
      const result = schema.safeParse(value);
      if (!result.success) {
        throw new Error(formatIssues(result.error.issues));
      }
      return result.data;
    },
  };
}

export function textDecoder(): ResponseDecoder<string> {
  return {
    requiresBody: false,
    decode: (body) => utf8.decode(body),
  };
}

export function rawDecoder(): ResponseDecoder<Uint8Array> {
  return {
    requiresBody: false,
    decode: (body) => body,
  };
}

/** For endpoints answered with no content (e.g. 204); any body is ignored. */
export function emptyDecoder(): ResponseDecoder<undefined> {
  return {
    requiresBody: false,
    decode: () => undefined,
  };
}
