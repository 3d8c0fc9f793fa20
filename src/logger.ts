/**
 * Structured logging for DugoutBot.
 *
 * Uses pino for structured JSON in production and pino-pretty for
 * human-readable output during local development.
 *
 * The Logger interface accepts console-style calling conventions:
 *   log.info('message')           - simple message
 *   log.info('message:', data)    - message with extra context
 *   log.error('failed:', err)     - errors are serialized properly
 *
 * Environment variables:
 *   LOG_LEVEL             - Set log level (fatal|error|warn|info|debug|trace|silent)
 *   DUGOUTBOT_LOG_LEVEL   - Alias for LOG_LEVEL
 *   LOG_FORMAT=json       - Force structured JSON output
 *
 * Config (dugoutbot.yaml):
 *   server.logLevel       - Set log level from config (env vars take precedence)
 */

import pino from 'pino';
import { createRequire } from 'node:module';

const require = createRequire(import.meta.url);

const envLevel = process.env.LOG_LEVEL || process.env.DUGOUTBOT_LOG_LEVEL;
const initialLevel = envLevel || 'info';

function resolveTransport(): pino.TransportSingleOptions | undefined {
  if (process.env.LOG_FORMAT === 'json') return undefined;

  // pino-pretty is a dev dependency; production installs log raw JSON
  try {
    require.resolve('pino-pretty');
    return {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname,service,module',
        messageFormat: '[{module}] {msg}',
        singleLine: true,
      },
    };
  } catch {
    return undefined;
  }
}

export const rootLogger = pino({
  level: initialLevel,
  transport: resolveTransport(),
  base: { service: 'dugoutbot' },
});

type LogArgs = [msg: string | Record<string, unknown>, ...args: unknown[]];

/**
 * Logger interface that accepts console-style calling conventions.
 *
 *   log.info('message')            -> pino.info('message')
 *   log.info('message:', extra)    -> pino.info({ data: extra }, 'message:')
 *   log.error('failed:', err)      -> pino.error({ err }, 'failed:')
 *   log.info({ key: 1 }, 'msg')    -> pino.info({ key: 1 }, 'msg')
 */
export interface Logger {
  fatal(...args: LogArgs): void;
  error(...args: LogArgs): void;
  warn(...args: LogArgs): void;
  info(...args: LogArgs): void;
  debug(...args: LogArgs): void;
  trace(...args: LogArgs): void;
  /** Access the underlying pino child logger for advanced use */
  pino: pino.Logger;
}

type Level = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

/**
 * Fold console-style extras into a pino merge object.
 *
 * Error instances go under `err` (pino's serializer key), a single other
 * value under `data`, several values under `data` as an array.
 */
function buildMergeObject(rest: unknown[]): Record<string, unknown> | undefined {
  const merge: Record<string, unknown> = {};
  const extras: unknown[] = [];

  for (const arg of rest) {
    if (arg instanceof Error) {
      merge.err = arg;
    } else {
      extras.push(arg);
    }
  }

  if (extras.length === 1) {
    merge.data = extras[0];
  } else if (extras.length > 1) {
    merge.data = extras;
  }

  return Object.keys(merge).length > 0 ? merge : undefined;
}

function levelWriter(child: pino.Logger, level: Level): (...args: LogArgs) => void {
  return (first, ...rest) => {
    const write: pino.LogFn = child[level].bind(child);

    if (typeof first === 'object') {
      const [msg] = rest;
      write(first, typeof msg === 'string' ? msg : undefined);
      return;
    }

    const merge = buildMergeObject(rest);
    if (merge) {
      write(merge, first);
    } else {
      write(first);
    }
  };
}

function wrapChild(child: pino.Logger): Logger {
  return {
    fatal: levelWriter(child, 'fatal'),
    error: levelWriter(child, 'error'),
    warn: levelWriter(child, 'warn'),
    info: levelWriter(child, 'info'),
    debug: levelWriter(child, 'debug'),
    trace: levelWriter(child, 'trace'),
    pino: child,
  };
}

/**
 * Create a child logger scoped to a module.
 *
 * @example
 *   const log = createLogger('Parser');
 *   log.debug('Ignored message:', { userId });   // [DEBUG] [Parser] Ignored message: ...
 */
export function createLogger(module: string): Logger {
  return wrapChild(rootLogger.child({ module }));
}

/**
 * Update the root log level at runtime, after config is loaded.
 * Env vars still win.
 */
export function setLogLevel(level: string): void {
  if (envLevel) return;
  rootLogger.level = level;
}
