/**
 * Engine HTTP Client
 *
 * JSON over fetch for the engine, management and database APIs. Adds the bearer
 * header, applies a per-request timeout, re-authenticates once on 401
 * and maps failures onto the error taxonomy:
 *
 * | Outcome                              | Error                    |
 * |--------------------------------------|--------------------------|
 * | network failure, timeout, 408/429/5xx| TransientNetworkError    |
 * | 401 after re-auth, 403               | AuthError                |
 * | 404                                  | EngineApiError(notFound) |
 * | other 4xx                            | EngineApiError           |
 *
 * Retrying is the caller's concern (see RetryPolicy).
 *
 * @module services/engine/EngineHttpClient
 */

import type { Logger } from 'pino';
import type { CredentialManager } from '@/services/auth';
import {
  AuthError,
  CancelledError,
  EngineApiError,
  TransientNetworkError,
  errorMessage,
} from '@/shared/errors';
import { createChildLogger } from '@/shared/utils/logger';
import { createLinkedAbortController, throwIfAborted } from '@/shared/utils/sleep';

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

export interface EngineRequestOptions {
  body?: unknown;
  signal?: AbortSignal;
}

export interface EngineHttpClientOptions {
  credentials: CredentialManager;
  requestTimeoutMs: number;
  logger?: Logger;
}

const MAX_ERROR_BODY_CHARS = 300;

function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

async function readErrorBody(response: Response): Promise<string> {
  try {
    const text = await response.text();
    return text.slice(0, MAX_ERROR_BODY_CHARS);
  } catch (error) {
    return `<unreadable body: ${errorMessage(error)}>`;
  }
}

export class EngineHttpClient {
  private readonly credentials: CredentialManager;
  private readonly requestTimeoutMs: number;
  private readonly log: Logger;

  constructor(options: EngineHttpClientOptions) {
    this.credentials = options.credentials;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.log = options.logger ?? createChildLogger({ service: 'EngineHttpClient' });
  }

  get(url: string, signal?: AbortSignal): Promise<unknown> {
    return this.request('GET', url, { signal });
  }

  post(url: string, body: unknown, signal?: AbortSignal): Promise<unknown> {
    return this.request('POST', url, { body, signal });
  }

  patch(url: string, body: unknown, signal?: AbortSignal): Promise<unknown> {
    return this.request('PATCH', url, { body, signal });
  }

  delete(url: string, signal?: AbortSignal): Promise<unknown> {
    return this.request('DELETE', url, { signal });
  }

  /**
   * Send one request. Resolves with the parsed JSON body (`{}` when empty,
   * the raw text when the body is not JSON).
   */
  async request(method: HttpMethod, url: string, options: EngineRequestOptions = {}): Promise<unknown> {
    const { body, signal } = options;

    for (let authAttempt = 0; ; authAttempt++) {
      throwIfAborted(signal);
      const authorization = await this.credentials.getAuthorizationHeader(signal);
      const response = await this.send(method, url, authorization, body, signal);

      if (response.status === 401 && authAttempt === 0) {
        this.log.warn({ method, url }, 'Received 401, refreshing credential and retrying once');
        this.credentials.invalidate();
        continue;
      }

      if (!response.ok) {
        throw await this.toError(method, url, response);
      }

      const text = await response.text();
      if (!text) {
        return {};
      }
      try {
        return JSON.parse(text);
      } catch {
        return text;
      }
    }
  }

  private async send(
    method: HttpMethod,
    url: string,
    authorization: string,
    body: unknown,
    signal?: AbortSignal
  ): Promise<Response> {
    const timeoutSignal = AbortSignal.timeout(this.requestTimeoutMs);
    const { controller, dispose } = createLinkedAbortController(signal, timeoutSignal);

    try {
      return await fetch(url, {
        method,
        headers: {
          Authorization: authorization,
          'Content-Type': 'application/json',
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (error) {
      if (signal?.aborted) {
        throw new CancelledError(`Request cancelled: ${method} ${url}`, { cause: error });
      }
      if (timeoutSignal.aborted) {
        throw new TransientNetworkError(
          `Request timed out after ${this.requestTimeoutMs}ms: ${method} ${url}`,
          undefined,
          { cause: error }
        );
      }
      throw new TransientNetworkError(`Network error: ${method} ${url}: ${errorMessage(error)}`, undefined, {
        cause: error,
      });
    } finally {
      dispose();
    }
  }

  private async toError(method: HttpMethod, url: string, response: Response): Promise<Error> {
    const detail = await readErrorBody(response);
    const message = `${method} ${url} failed with HTTP ${response.status}${detail ? `: ${detail}` : ''}`;
    const details = { method, url };

    if (response.status === 401 || response.status === 403) {
      return new AuthError(message, { details: { ...details, status: response.status } });
    }
    if (isTransientStatus(response.status)) {
      return new TransientNetworkError(message, response.status, { details });
    }
    return new EngineApiError(response.status, message, { details });
  }
}
