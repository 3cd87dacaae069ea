/**
 * CLI Credential Source
 *
 * Mints a managed-platform token with
 * `oasisctl login --key-id <id> --key-secret <secret>`.
 * The binary is executed directly (no shell) and key material containing
 * shell metacharacters is refused before anything is spawned.
 *
 * @module services/auth/CliCredentialSource
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { AuthError } from '@/shared/errors';
import { createChildLogger } from '@/shared/utils/logger';
import type { Logger } from 'pino';
import type { AcquiredToken, ICredentialSource } from './ICredentialSource';

const execFileAsync = promisify(execFile);

const SHELL_METACHARACTERS = /[;&|`$()<>\n\r]/;

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

/**
 * Runs a binary with arguments and no shell. Rejects on non-zero exit.
 */
export type CommandRunner = (
  file: string,
  args: readonly string[],
  options: { timeoutMs: number }
) => Promise<CommandOutput>;

export const defaultCommandRunner: CommandRunner = async (file, args, options) => {
  const { stdout, stderr } = await execFileAsync(file, [...args], {
    timeout: options.timeoutMs,
    shell: false,
    windowsHide: true,
  });
  return { stdout: String(stdout), stderr: String(stderr) };
};

export interface CliCredentialSourceOptions {
  keyId: string;
  keySecret: string;
  /** Defaults to `oasisctl` on PATH */
  cliPath?: string;
  timeoutMs?: number;
  runner?: CommandRunner;
  logger?: Logger;
}

interface ExecFailure {
  code?: string | number;
  stderr?: string;
  message?: string;
}

function isExecFailure(value: unknown): value is ExecFailure {
  return typeof value === 'object' && value !== null;
}

export class CliCredentialSource implements ICredentialSource {
  readonly kind = 'cli' as const;
  readonly reusable = true;

  private readonly cliPath: string;
  private readonly timeoutMs: number;
  private readonly runner: CommandRunner;
  private readonly log: Logger;

  constructor(private readonly options: CliCredentialSourceOptions) {
    this.cliPath = options.cliPath ?? 'oasisctl';
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.runner = options.runner ?? defaultCommandRunner;
    this.log = options.logger ?? createChildLogger({ service: 'CliCredentialSource' });
  }

  async acquire(): Promise<AcquiredToken> {
    const { keyId, keySecret } = this.options;

    if (!keyId || !keySecret) {
      throw new AuthError('API key id and secret are required to mint a token');
    }
    if (SHELL_METACHARACTERS.test(keyId)) {
      throw new AuthError('API key id contains invalid characters');
    }
    if (SHELL_METACHARACTERS.test(keySecret)) {
      throw new AuthError('API key secret contains invalid characters');
    }

    let output: CommandOutput;
    try {
      output = await this.runner(
        this.cliPath,
        ['login', '--key-id', keyId, '--key-secret', keySecret],
        { timeoutMs: this.timeoutMs }
      );
    } catch (error) {
      throw this.toAuthError(error);
    }

    const token = output.stdout.trim();
    if (!token) {
      throw new AuthError(`${this.cliPath} returned an empty token`);
    }

    this.log.info({ cliPath: this.cliPath }, 'Minted access token');
    return { token };
  }

  private toAuthError(error: unknown): AuthError {
    if (isExecFailure(error) && error.code === 'ENOENT') {
      return new AuthError(`${this.cliPath} not found; install it or set GAE_CLI_PATH`, { cause: error });
    }

    const stderr = isExecFailure(error) && typeof error.stderr === 'string' ? error.stderr.trim() : '';
    const message = stderr || (error instanceof Error ? error.message : String(error));
    return new AuthError(`Failed to mint token: ${message}`, { cause: error });
  }
}
