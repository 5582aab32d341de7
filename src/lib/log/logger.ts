import pino from 'pino';
import type { LoggerOptions, Logger as PinoLogger } from 'pino';

// Thin wrapper around pino with a console fallback.
// Configure via env:
// - LOG_LEVEL: 'debug' | 'info' | 'warn' | 'error' (default: 'info')
// - LOG_PRETTY: 'false' to emit raw JSON lines instead of pino-pretty output
// - USE_PINO: 'false' to force the console fallback (used by tests)

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  info: (obj: unknown, msg?: string) => void;
  warn: (obj: unknown, msg?: string) => void;
  error: (obj: unknown, msg?: string) => void;
  debug: (obj: unknown, msg?: string) => void;
  child: (bindings: Record<string, unknown>) => Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

const envLevel = process.env.LOG_LEVEL;
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

function should(method: LogLevel): boolean {
  return LEVEL_ORDER[method] >= LEVEL_ORDER[currentLevel];
}

function createConsoleWrapper(bindings: Record<string, unknown> = {}): Logger {
  const entries = Object.entries(bindings);
  const prefix = entries.length > 0 ? `[${entries.map(([k, v]) => `${k}=${String(v)}`).join(' ')}]` : '';
  return {
    info: (obj, msg) => { if (should('info')) console.log(prefix, msg || '', obj ?? ''); },
    warn: (obj, msg) => { if (should('warn')) console.warn(prefix, msg || '', obj ?? ''); },
    error: (obj, msg) => { if (should('error')) console.error(prefix, msg || '', obj ?? ''); },
    debug: (obj, msg) => { if (should('debug')) console.debug(prefix, msg || '', obj ?? ''); },
    child: (more) => createConsoleWrapper({ ...bindings, ...more }),
  };
}

// Level filtering happens here, not in pino: module loggers are pino children
// created at import time and would keep the level they were born with.
// Falls back to the console when a pino write throws.
function wrapPino(base: PinoLogger, bindings: Record<string, unknown> = {}): Logger {
  const fallback = createConsoleWrapper(bindings);
  return {
    info: (obj, msg) => { if (should('info')) try { base.info(obj, msg); } catch { fallback.info(obj, msg); } },
    warn: (obj, msg) => { if (should('warn')) try { base.warn(obj, msg); } catch { fallback.warn(obj, msg); } },
    error: (obj, msg) => { if (should('error')) try { base.error(obj, msg); } catch { fallback.error(obj, msg); } },
    debug: (obj, msg) => { if (should('debug')) try { base.debug(obj, msg); } catch { fallback.debug(obj, msg); } },
    child: (more) => {
      try {
        return wrapPino(base.child(more), { ...bindings, ...more });
      } catch {
        return createConsoleWrapper({ ...bindings, ...more });
      }
    },
  };
}

function createRootLogger(): Logger {
  if (process.env.USE_PINO === 'false') {
    return createConsoleWrapper();
  }

  const options: LoggerOptions = { level: 'debug' };
  if (process.env.LOG_PRETTY !== 'false') {
    options.transport = {
      target: 'pino-pretty',
      options: { colorize: true, translateTime: 'SYS:standard' },
    };
  }

  try {
    return wrapPino(pino(options));
  } catch {
    return createConsoleWrapper();
  }
}

const rootLogger: Logger = createRootLogger();

/** Applies to every logger, including ones created before the call. */
export function setLogLevel(level: LogLevel): void {
  if (!isLogLevel(level)) return;
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function getLogger(bindings?: Record<string, unknown>): Logger {
  if (bindings && Object.keys(bindings).length > 0) {
    return rootLogger.child(bindings);
  }
  return rootLogger;
}
