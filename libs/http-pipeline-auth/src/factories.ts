import {
  createNetworkClient,
  type NetworkClient,
  type NetworkClientOptions,
  type NetworkConfigurationInput,
} from '@courier/http-pipeline-core';
import type { CredentialStorage } from './credentialStorage';
import { RefreshCoordinator } from './RefreshCoordinator';
import { RefreshTokenInterceptor } from './interceptors';

export interface AuthenticatedClientOptions extends Omit<NetworkClientOptions, 'configuration'> {
  configuration?: NetworkConfigurationInput;
  storage: CredentialStorage;
  refresh: () => Promise<string>;
  onRefreshFailure?: (cause: unknown) => Promise<void> | void;
}

export interface AuthenticatedClient {
  client: NetworkClient;
  coordinator: RefreshCoordinator;
}

/**
 * Wires a {@link RefreshTokenInterceptor} and its coordinator into a new
 * client. Caller-supplied interceptors run first on both sides.
 *
 * @example
 * ```typescript
 * const { client } = createAuthenticatedClient({
 *   baseUrl: 'https://api.example.com',
 *   storage: new InMemoryCredentialStorage(),
 *   refresh: () => authApi.exchangeRefreshToken(),
 *   onRefreshFailure: () => session.signOut(),
 * });
 * ```
 */
export function createAuthenticatedClient(options: AuthenticatedClientOptions): AuthenticatedClient {
  const { storage, refresh, onRefreshFailure, requestInterceptors = [], responseInterceptors = [], ...rest } = options;
  const coordinator = new RefreshCoordinator({ storage, refresh, onRefreshFailure, logger: rest.logger });
  const interceptor = new RefreshTokenInterceptor(coordinator);

  const client = createNetworkClient({
    ...rest,
    requestInterceptors: [...requestInterceptors, interceptor],
    responseInterceptors: [...responseInterceptors, interceptor],
  });
  return { client, coordinator };
}
