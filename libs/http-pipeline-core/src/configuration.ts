import { z } from 'zod';
import { ConfigurationError } from './errors';
import { retryPolicies } from './retry';
import type { HttpHeaders, RetryPolicy } from './types';

const retryPolicySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('none') }),
  z.object({
    kind: z.literal('exponential'),
    maxAttempts: z.number().int().nonnegative(),
    baseDelayMs: z.number().nonnegative(),
  }),
  z.object({
    kind: z.literal('fixed'),
    maxAttempts: z.number().int().nonnegative(),
    delayMs: z.number().nonnegative(),
  }),
]);

/** Largest delay a Node timer honors; longer ones fire after 1 ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export const networkConfigurationSchema = z.object({
  baseUrl: z.string().url().optional(),
  timeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS).default(30_000),
  retryPolicy: retryPolicySchema.default({ kind: 'none' }),
  defaultHeaders: z.record(z.string()).default({}),
  maxRefreshRetries: z.number().int().nonnegative().default(1),
});

export type NetworkConfigurationInput = z.input<typeof networkConfigurationSchema>;

export interface NetworkConfiguration {
  baseUrl?: string;
  timeoutMs: number;
  retryPolicy: RetryPolicy;
  defaultHeaders: HttpHeaders;
  /** How many times one call may be re-issued after a credential refresh. */
  maxRefreshRetries: number;
}

const formatIssues = (issues: z.ZodIssue[]): string[] =>
  issues.map((issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`);

/** Validates raw input and fills in defaults. Throws {@link ConfigurationError}. */
export function parseNetworkConfiguration(input: unknown = {}): NetworkConfiguration {
  const parsed = networkConfigurationSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(formatIssues(parsed.error.issues));
  }
  return parsed.data;
}

export const defaultConfiguration: NetworkConfiguration = Object.freeze({
  timeoutMs: 30_000,
  retryPolicy: retryPolicies.none(),
  defaultHeaders: Object.freeze({}),
  maxRefreshRetries: 1,
});

/** Longer timeout and exponential backoff for flaky cellular links. */
export const mobileConfiguration: NetworkConfiguration = Object.freeze({
  timeoutMs: 60_000,
  retryPolicy: retryPolicies.exponential(3, 1000),
  defaultHeaders: Object.freeze({}),
  maxRefreshRetries: 1,
});

export type EnvSource = Record<string, string | undefined>;

const intFromEnv = (name: string, raw: string, issues: string[]): number | undefined => {
  if (!/^-?\d+$/.test(raw.trim())) {
    issues.push(`${name}: expected an integer, got "${raw}"`);
    return undefined;
  }
  return Number(raw.trim());
};

/**
 * Parses `none`, `exponential:<attempts>:<baseMs>` or `fixed:<attempts>:<ms>`.
 */
export function parseRetryPolicy(value: string): RetryPolicy {
  const [kind, attempts, delay, ...rest] = value.trim().split(':');
  if (kind === 'none' && attempts === undefined) {
    return retryPolicies.none();
  }
  if ((kind === 'exponential' || kind === 'fixed') && attempts !== undefined && delay !== undefined && rest.length === 0) {
    const issues: string[] = [];
    const maxAttempts = intFromEnv('attempts', attempts, issues);
    const delayMs = intFromEnv('delay', delay, issues);
    if (maxAttempts === undefined || delayMs === undefined) {
      throw new ConfigurationError(issues.map((issue) => `retryPolicy.${issue}`));
    }
    const candidate =
      kind === 'exponential'
        ? { kind, maxAttempts, baseDelayMs: delayMs }
        : { kind, maxAttempts, delayMs };
    const parsed = retryPolicySchema.safeParse(candidate);
    if (!parsed.success) {
      throw new ConfigurationError(formatIssues(parsed.error.issues).map((issue) => `retryPolicy.${issue}`));
    }
    return parsed.data;
  }
  throw new ConfigurationError([
    `retryPolicy: expected "none", "exponential:<attempts>:<ms>" or "fixed:<attempts>:<ms>", got "${value}"`,
  ]);
}

/**
 * Builds a configuration from environment variables, falling back to
 * defaults for anything unset:
 *
 * - `HTTP_PIPELINE_BASE_URL`
 * - `HTTP_PIPELINE_TIMEOUT_MS`
 * - `HTTP_PIPELINE_RETRY`
 * - `HTTP_PIPELINE_MAX_REFRESH_RETRIES`
 */
export function configurationFromEnv(env: EnvSource = process.env): NetworkConfiguration {
  const issues: string[] = [];
  const input: Record<string, unknown> = {};

  const baseUrl = env.HTTP_PIPELINE_BASE_URL?.trim();
  if (baseUrl) input.baseUrl = baseUrl;

  const timeout = env.HTTP_PIPELINE_TIMEOUT_MS;
  if (timeout) input.timeoutMs = intFromEnv('HTTP_PIPELINE_TIMEOUT_MS', timeout, issues);

  const retry = env.HTTP_PIPELINE_RETRY;
  if (retry) {
    try {
      input.retryPolicy = parseRetryPolicy(retry);
    } catch (error) {
      if (!(error instanceof ConfigurationError)) throw error;
      issues.push(...error.issues.map((issue) => `HTTP_PIPELINE_RETRY: ${issue}`));
    }
  }

  const refreshRetries = env.HTTP_PIPELINE_MAX_REFRESH_RETRIES;
  if (refreshRetries) {
    input.maxRefreshRetries = intFromEnv('HTTP_PIPELINE_MAX_REFRESH_RETRIES', refreshRetries, issues);
  }

  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }
  return parseNetworkConfiguration(input);
}
