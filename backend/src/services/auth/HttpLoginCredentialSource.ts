/**
 * HTTP Login Credential Source
 *
 * Exchanges database username/password for a JWT at `POST {endpoint}/_open/auth`.
 *
 * @module services/auth/HttpLoginCredentialSource
 */

import { z } from 'zod';
import { AuthError } from '@/shared/errors';
import { createChildLogger } from '@/shared/utils/logger';
import type { Logger } from 'pino';
import type { AcquiredToken, ICredentialSource } from './ICredentialSource';

const loginResponseSchema = z.object({
  jwt: z.string().min(1),
});

export interface HttpLoginCredentialSourceOptions {
  endpoint: string;
  username: string;
  password: string;
  timeoutMs?: number;
  logger?: Logger;
}

export class HttpLoginCredentialSource implements ICredentialSource {
  readonly kind = 'http_login' as const;
  readonly reusable = true;

  private readonly authUrl: string;
  private readonly timeoutMs: number;
  private readonly log: Logger;

  constructor(private readonly options: HttpLoginCredentialSourceOptions) {
    this.authUrl = `${options.endpoint.replace(/\/+$/, '')}/_open/auth`;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.log = options.logger ?? createChildLogger({ service: 'HttpLoginCredentialSource' });
  }

  async acquire(): Promise<AcquiredToken> {
    let response: Response;
    try {
      response = await fetch(this.authUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ username: this.options.username, password: this.options.password }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new AuthError(`Login request to ${this.authUrl} failed`, { cause: error });
    }

    if (!response.ok) {
      const hint = response.status === 401 ? ' (check credentials and that the endpoint includes its port)' : '';
      throw new AuthError(`Login rejected with HTTP ${response.status}${hint}`, {
        details: { status: response.status },
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new AuthError('Login response was not valid JSON', { cause: error });
    }

    const parsed = loginResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new AuthError('Login response did not contain a jwt');
    }

    this.log.debug({ username: this.options.username }, 'Obtained JWT');
    return { token: parsed.data.jwt };
  }
}
