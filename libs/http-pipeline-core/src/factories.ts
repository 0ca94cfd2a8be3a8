import { NetworkClient, type NetworkClientOptions } from './NetworkClient';
import { mobileConfiguration, parseNetworkConfiguration, type NetworkConfigurationInput } from './configuration';
import { ConsoleLogger } from './logger';

/**
 * Creates a NetworkClient with defaults suitable for most services.
 *
 * Defaults applied:
 * - Transport: fetch-based (via fetchTransport)
 * - Timeout: 30s per transport call, no retries
 * - Logger: console logger
 *
 * `configuration` is validated; invalid input throws a ConfigurationError.
 *
 * @example
 * ```typescript
 * const client = createNetworkClient({
 *   baseUrl: 'https://api.example.com',
 *   configuration: { retryPolicy: { kind: 'fixed', maxAttempts: 2, delayMs: 500 } },
 * });
 * ```
 */
export function createNetworkClient(
  options: Omit<NetworkClientOptions, 'configuration'> & { configuration?: NetworkConfigurationInput } = {},
): NetworkClient {
  const { configuration, ...rest } = options;
  return new NetworkClient({
    ...rest,
    configuration: parseNetworkConfiguration(configuration ?? {}),
    logger: rest.logger ?? new ConsoleLogger(),
  });
}

/** Preset for unreliable links: 60s timeout and exponential backoff (3 retries from 1s). */
export function createMobileNetworkClient(options: Omit<NetworkClientOptions, 'configuration'> = {}): NetworkClient {
  return new NetworkClient({
    ...options,
    configuration: mobileConfiguration,
    logger: options.logger ?? new ConsoleLogger(),
  });
}
