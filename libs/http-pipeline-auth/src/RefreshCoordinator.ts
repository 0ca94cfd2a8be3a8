import { NetworkError, errorMessage, type Logger } from '@courier/http-pipeline-core';
import type { CredentialStorage } from './credentialStorage';

export type RefreshState = 'idle' | 'refreshing';

/** Result of a successful refresh episode, shared by every waiter. */
export interface CredentialHandle {
  credential: string;
  storage: CredentialStorage;
}

export interface RefreshCoordinatorOptions {
  storage: CredentialStorage;
  /** Obtains a new credential, e.g. by exchanging a refresh token. */
  refresh: () => Promise<string>;
  /** Runs once per failed episode, before any waiter is rejected. */
  onRefreshFailure?: (cause: unknown) => Promise<void> | void;
  logger?: Logger;
}

function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(NetworkError.cancelled(signal.reason));
    signal.addEventListener('abort', onAbort, { once: true });
    void promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

/**
 * Ensures at most one credential refresh runs at a time. Callers arriving
 * while a refresh is in flight wait on the same episode and receive the same
 * handle (or the same `unauthorized` failure).
 *
 * Starting an episode is synchronous: `refresh()` checks and sets the in-flight
 * promise without yielding, so two callers can never both start one.
 *
 * A caller's `signal` only stops that caller from waiting. The episode itself
 * is never cancelled.
 */
export class RefreshCoordinator {
  readonly storage: CredentialStorage;
  private readonly refreshCredential: () => Promise<string>;
  private readonly onRefreshFailure?: (cause: unknown) => Promise<void> | void;
  private readonly logger?: Logger;
  private inFlight?: Promise<CredentialHandle>;
  private episodeCount = 0;

  constructor(options: RefreshCoordinatorOptions) {
    this.storage = options.storage;
    this.refreshCredential = options.refresh;
    this.onRefreshFailure = options.onRefreshFailure;
    this.logger = options.logger;
  }

  get state(): RefreshState {
    return this.inFlight ? 'refreshing' : 'idle';
  }

  /** Number of refresh episodes started so far. */
  get episodes(): number {
    return this.episodeCount;
  }

  refresh(signal?: AbortSignal): Promise<CredentialHandle> {
    if (signal?.aborted) {
      return Promise.reject(NetworkError.cancelled(signal.reason));
    }
    const shared = this.inFlight ?? this.startEpisode();
    return signal ? abortable(shared, signal) : shared;
  }

  private startEpisode(): Promise<CredentialHandle> {
    this.episodeCount += 1;
    const episode = this.episodeCount;
    this.logger?.info('auth.refresh.started', { episode });

    const run = this.runEpisode(episode).finally(() => {
      this.inFlight = undefined;
    });
    this.inFlight = run;
    return run;
  }

  private async runEpisode(episode: number): Promise<CredentialHandle> {
    let credential: string;
    try {
      credential = await this.refreshCredential();
      await this.storage.write(credential);
    } catch (error) {
      this.logger?.warn('auth.refresh.failed', { episode, error: errorMessage(error) });
      await this.notifyFailure(error, episode);
      throw NetworkError.unauthorized(error);
    }

    this.logger?.info('auth.refresh.succeeded', { episode });
    return { credential, storage: this.storage };
  }

  private async notifyFailure(cause: unknown, episode: number): Promise<void> {
    if (!this.onRefreshFailure) return;
    try {
      await this.onRefreshFailure(cause);
    } catch (error) {
      this.logger?.error('auth.refresh.failure_callback_failed', { episode, error: errorMessage(error) });
    }
  }
}
