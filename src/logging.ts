/**
 * Loggers for pairing and session lifecycle.
 *
 * Pairing debug output is enabled with DEBUG=pairing or LOG_LEVEL=debug.
 * LOG_LEVEL=silent turns every logger off.
 */

import { ConsoleTransport, LogLayer } from 'loglayer';
import { envConfigSchema, type EnvConfig } from './config';

const PAIRING_PREFIX = '[PAIRING]';
const SESSION_PREFIX = '[SWISS]';
const DEBUG_KEYWORD = 'pairing';

type LoggingEnv = Pick<EnvConfig, 'LOG_LEVEL' | 'DEBUG'>;

const loggingEnvSchema = envConfigSchema.pick({ LOG_LEVEL: true, DEBUG: true });

// Unknown LOG_LEVEL values read as info.
function readLoggingEnv(env: NodeJS.ProcessEnv): LoggingEnv {
  const res = loggingEnvSchema.safeParse(env);
  return res.success ? res.data : { LOG_LEVEL: 'info', DEBUG: env.DEBUG };
}

export function isPairingDebugEnabled(env: LoggingEnv): boolean {
  if (env.LOG_LEVEL === 'silent') return false;
  return (
    Boolean(env.DEBUG?.includes(DEBUG_KEYWORD)) ||
    env.LOG_LEVEL === 'debug' ||
    env.LOG_LEVEL === 'trace'
  );
}

export interface CreateLoggerOptions {
  prefix?: string;
  enabled?: boolean;
}

export function createLogger(options: CreateLoggerOptions = {}): LogLayer {
  return new LogLayer({
    transport: new ConsoleTransport({ logger: console }),
    prefix: options.prefix ?? SESSION_PREFIX,
    enabled: options.enabled ?? true,
  });
}

/** Logger for sessions, honouring LOG_LEVEL=silent. */
export function createSessionLogger(env: LoggingEnv = readLoggingEnv(process.env)): LogLayer {
  return createLogger({ prefix: SESSION_PREFIX, enabled: env.LOG_LEVEL !== 'silent' });
}

/**
 * Warnings always go out unless LOG_LEVEL=silent; debug calls are
 * guarded by IS_PAIRING_DEBUG_ENABLED at the call site.
 */
export function createPairingLogger(env: LoggingEnv = readLoggingEnv(process.env)): LogLayer {
  return createLogger({ prefix: PAIRING_PREFIX, enabled: env.LOG_LEVEL !== 'silent' });
}

const pairingEnv = readLoggingEnv(process.env);

/** Check before building debug-only payloads. */
export const IS_PAIRING_DEBUG_ENABLED = isPairingDebugEnabled(pairingEnv);

export const pairingLogger = createPairingLogger(pairingEnv);
