import {
  CredentialRefreshedSignal,
  NetworkError,
  withHeader,
  type RequestDescriptor,
  type RequestInterceptor,
  type ResponseEnvelope,
  type ResponseInterceptor,
  type ResponseInterceptorContext,
} from '@courier/http-pipeline-core';
import type { CredentialStorage } from './credentialStorage';
import type { RefreshCoordinator } from './RefreshCoordinator';

export interface AuthInterceptorOptions {
  storage: CredentialStorage;
  scheme?: string; // default: "Bearer"
  headerName?: string; // default: "Authorization"
}

async function authorize(
  request: RequestDescriptor,
  storage: CredentialStorage,
  scheme: string,
  headerName: string,
): Promise<RequestDescriptor> {
  const credential = await storage.read();
  if (!credential) return request;
  return withHeader(request, headerName, `${scheme} ${credential}`);
}

/** Adds `Authorization: Bearer <credential>` when storage holds a credential. */
export class AuthInterceptor implements RequestInterceptor {
  private readonly storage: CredentialStorage;
  private readonly scheme: string;
  private readonly headerName: string;

  constructor(options: AuthInterceptorOptions) {
    this.storage = options.storage;
    this.scheme = options.scheme ?? 'Bearer';
    this.headerName = options.headerName ?? 'Authorization';
  }

  interceptRequest(request: RequestDescriptor): Promise<RequestDescriptor> {
    return authorize(request, this.storage, this.scheme, this.headerName);
  }
}

/**
 * Injects the stored credential on the way out and recovers from 401 on the
 * way back: it waits for the coordinator's refresh and then throws
 * {@link CredentialRefreshedSignal} so the client re-issues the call with the
 * new credential.
 *
 * Register the same instance as a request and a response interceptor, last
 * in the request list so its header wins.
 */
export class RefreshTokenInterceptor implements RequestInterceptor, ResponseInterceptor {
  private readonly scheme: string;

  constructor(
    private readonly coordinator: RefreshCoordinator,
    options: { scheme?: string } = {},
  ) {
    this.scheme = options.scheme ?? 'Bearer';
  }

  interceptRequest(request: RequestDescriptor): Promise<RequestDescriptor> {
    return authorize(request, this.coordinator.storage, this.scheme, 'Authorization');
  }

  async interceptResponse(response: ResponseEnvelope, ctx: ResponseInterceptorContext): Promise<Uint8Array> {
    if (response.status !== 401) {
      return response.body;
    }
    if (!ctx.canRetryAfterRefresh) {
      throw NetworkError.unauthorized();
    }
    try {
      await this.coordinator.refresh(ctx.signal);
    } catch (error) {
      if (error instanceof NetworkError) throw error;
      throw NetworkError.unauthorized(error);
    }
    throw new CredentialRefreshedSignal();
  }
}
