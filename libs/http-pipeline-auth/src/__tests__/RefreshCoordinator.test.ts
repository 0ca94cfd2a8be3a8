import { describe, expect, it, vi } from 'vitest';
import { NetworkError, type Logger } from '@courier/http-pipeline-core';
import { RefreshCoordinator } from '../RefreshCoordinator';
import { InMemoryCredentialStorage, type CredentialStorage } from '../credentialStorage';

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

const createLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

const kindOf = (result: PromiseSettledResult<unknown>): string | undefined =>
  result.status === 'rejected' && result.reason instanceof NetworkError ? result.reason.kind : undefined;

describe('RefreshCoordinator', () => {
  it('runs a single refresh for concurrent callers', async () => {
    const pending = deferred<string>();
    const refresh = vi.fn(() => pending.promise);
    const storage = new InMemoryCredentialStorage('stale');
    const coordinator = new RefreshCoordinator({ storage, refresh });

    const callers = Array.from({ length: 5 }, () => coordinator.refresh());

    expect(coordinator.state).toBe('refreshing');
    expect(refresh).toHaveBeenCalledTimes(1);

    pending.resolve('fresh');
    const handles = await Promise.all(callers);

    for (const handle of handles) {
      expect(handle).toBe(handles[0]);
    }
    expect(handles[0]).toEqual({ credential: 'fresh', storage });
    expect(await storage.read()).toBe('fresh');
    expect(coordinator.state).toBe('idle');
    expect(coordinator.episodes).toBe(1);
  });

  it('stores the credential before any waiter resumes', async () => {
    const writes: string[] = [];
    const storage: CredentialStorage = {
      read: async () => writes.at(-1),
      write: async (credential) => {
        writes.push(credential);
      },
      clear: async () => undefined,
    };
    const coordinator = new RefreshCoordinator({ storage, refresh: async () => 'fresh' });

    const observed = await coordinator.refresh().then(() => [...writes]);

    expect(observed).toEqual(['fresh']);
  });

  it('starts a new episode once the previous one finished', async () => {
    const refresh = vi.fn(async () => 'token').mockResolvedValueOnce('first').mockResolvedValueOnce('second');
    const coordinator = new RefreshCoordinator({ storage: new InMemoryCredentialStorage(), refresh });

    const first = await coordinator.refresh();
    const second = await coordinator.refresh();

    expect(first.credential).toBe('first');
    expect(second.credential).toBe('second');
    expect(coordinator.episodes).toBe(2);
  });

  it('notifies the failure callback once and rejects every waiter with unauthorized', async () => {
    const pending = deferred<string>();
    const cause = new Error('refresh token expired');
    const onRefreshFailure = vi.fn();
    const storage = new InMemoryCredentialStorage('stale');
    const coordinator = new RefreshCoordinator({ storage, refresh: () => pending.promise, onRefreshFailure });

    const callers = [coordinator.refresh(), coordinator.refresh(), coordinator.refresh()];
    pending.reject(cause);
    const results = await Promise.allSettled(callers);

    expect(results.map(kindOf)).toEqual(['unauthorized', 'unauthorized', 'unauthorized']);
    expect(onRefreshFailure).toHaveBeenCalledTimes(1);
    expect(onRefreshFailure).toHaveBeenCalledWith(cause);
    expect(await storage.read()).toBe('stale');
    expect(coordinator.state).toBe('idle');
  });

  it('treats a failing storage write as a failed refresh', async () => {
    const onRefreshFailure = vi.fn();
    const writeFailure = new Error('disk full');
    const storage: CredentialStorage = {
      read: async () => undefined,
      write: async () => {
        throw writeFailure;
      },
      clear: async () => undefined,
    };
    const coordinator = new RefreshCoordinator({ storage, refresh: async () => 'fresh', onRefreshFailure });

    const [result] = await Promise.allSettled([coordinator.refresh()]);

    expect(kindOf(result)).toBe('unauthorized');
    expect(onRefreshFailure).toHaveBeenCalledWith(writeFailure);
  });

  it('logs a throwing failure callback without changing the outcome', async () => {
    const logger = createLogger();
    const coordinator = new RefreshCoordinator({
      storage: new InMemoryCredentialStorage(),
      refresh: async () => {
        throw new Error('revoked');
      },
      onRefreshFailure: () => {
        throw new Error('sign-out failed');
      },
      logger,
    });

    const [result] = await Promise.allSettled([coordinator.refresh()]);

    expect(kindOf(result)).toBe('unauthorized');
    expect(logger.warn).toHaveBeenCalledWith('auth.refresh.failed', { episode: 1, error: 'revoked' });
    expect(logger.error).toHaveBeenCalledWith('auth.refresh.failure_callback_failed', {
      episode: 1,
      error: 'sign-out failed',
    });
  });

  it('lets one waiter give up without cancelling the episode', async () => {
    const pending = deferred<string>();
    const refresh = vi.fn(() => pending.promise);
    const coordinator = new RefreshCoordinator({ storage: new InMemoryCredentialStorage(), refresh });
    const controller = new AbortController();

    const impatient = coordinator.refresh(controller.signal);
    const patient = coordinator.refresh();
    controller.abort();

    const [abandoned] = await Promise.allSettled([impatient]);
    expect(kindOf(abandoned)).toBe('cancelled');
    expect(coordinator.state).toBe('refreshing');

    pending.resolve('fresh');
    await expect(patient).resolves.toMatchObject({ credential: 'fresh' });
    expect(refresh).toHaveBeenCalledTimes(1);
  });

  it('does not start an episode for an already aborted caller', async () => {
    const refresh = vi.fn(async () => 'fresh');
    const coordinator = new RefreshCoordinator({ storage: new InMemoryCredentialStorage(), refresh });

    const [result] = await Promise.allSettled([coordinator.refresh(AbortSignal.abort())]);

    expect(kindOf(result)).toBe('cancelled');
    expect(refresh).not.toHaveBeenCalled();
    expect(coordinator.episodes).toBe(0);
  });

  it('logs the start and end of each episode', async () => {
    const logger = createLogger();
    const coordinator = new RefreshCoordinator({
      storage: new InMemoryCredentialStorage(),
      refresh: async () => 'fresh',
      logger,
    });

    await coordinator.refresh();

    expect(logger.info).toHaveBeenNthCalledWith(1, 'auth.refresh.started', { episode: 1 });
    expect(logger.info).toHaveBeenNthCalledWith(2, 'auth.refresh.succeeded', { episode: 1 });
  });
});
