/**
 * Structured logger using Pino
 *
 * - JSON to stdout in production, pretty printing in development
 * - Silent by default under test (override with LOG_LEVEL)
 * - Redaction of tokens, passwords and key secrets
 * - Child loggers per component, filterable with LOG_SERVICES
 *
 * Usage:
 * ```typescript
 * const log = createChildLogger({ service: 'ExecutionStateMachine' });
 * log.info({ executionId, phase }, 'Phase entered');
 *
 * try {
 *   await operation();
 * } catch (err) {
 *   log.error({ err }, 'Operation failed');
 * }
 * ```
 */

import pino, { type Logger, type TransportTargetOptions } from 'pino';

const nodeEnv = process.env.NODE_ENV;
const isTest = nodeEnv === 'test';
const isDevelopment = nodeEnv !== 'production' && !isTest;
const logLevel = process.env.LOG_LEVEL || (isTest ? 'silent' : isDevelopment ? 'debug' : 'info');

// Service filtering for diagnostics (LOG_SERVICES=CredentialManager,ExecutionStateMachine)
const allowedServices = process.env.LOG_SERVICES?.split(',').map(s => s.trim()).filter(Boolean) ?? [];

function buildTransport(): ReturnType<typeof pino.transport> | undefined {
  // Worker-thread transports would outlive short test processes
  if (isTest) {
    return undefined;
  }

  const targets: TransportTargetOptions[] = [];

  if (isDevelopment) {
    targets.push({
      level: logLevel,
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname,env',
        singleLine: false,
        messageFormat: '[{service}] {msg}',
      },
    });
  } else {
    targets.push({
      level: logLevel,
      target: 'pino/file',
      options: { destination: 1 },
    });
  }

  if (process.env.LOG_FILE_PATH) {
    targets.push({
      level: 'info',
      target: 'pino/file',
      options: { destination: process.env.LOG_FILE_PATH, mkdir: true },
    });
  }

  return pino.transport({ targets });
}

/**
 * Paths removed from every log line.
 */
export const REDACTED_PATHS = [
  'token',
  'password',
  'jwt',
  'keySecret',
  'apiKeySecret',
  'accessToken',
  'authorization',
  'headers.authorization',
  'credential.token',
  '*.token',
  '*.password',
];

const transport = buildTransport();

const loggerOptions: pino.LoggerOptions = {
  level: logLevel,
  serializers: {
    err: pino.stdSerializers.err,
  },
  base: {
    env: nodeEnv,
    service: 'graph-orchestrator',
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: REDACTED_PATHS,
    remove: true,
  },
};

export const logger: Logger = transport ? pino(loggerOptions, transport) : pino(loggerOptions);

/**
 * Context accepted by `createChildLogger`. `service` names the component.
 */
export type LoggerContext = { service: string } & Record<string, unknown>;

/**
 * Create a child logger with additional context.
 *
 * When LOG_SERVICES is set and the service is not listed, a silent logger
 * is returned.
 *
 * @example
 * const log = createChildLogger({ service: 'CredentialManager' });
 * log.debug({ source: 'cli' }, 'Refreshing credential');
 */
export const createChildLogger = (context: LoggerContext): Logger => {
  if (allowedServices.length > 0 && !allowedServices.includes(context.service)) {
    return pino({ level: 'silent' });
  }

  return logger.child(context);
};
