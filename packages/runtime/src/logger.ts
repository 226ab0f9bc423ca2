// Runtime logging
//
// The runtime never writes to the console on its own; it logs through
// whatever logger the runtime was created with (silent by default).

/**
 * Structured logger interface.
 * Implementations can route to console, file, or external services.
 */
export type RuntimeLogger = {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
};

export const consoleLogger: RuntimeLogger = {
  debug(message: string, data?: Record<string, unknown>) {
    console.debug(`[DEBUG] ${message}`, data ?? '');
  },
  info(message: string, data?: Record<string, unknown>) {
    console.info(`[INFO] ${message}`, data ?? '');
  },
  warn(message: string, data?: Record<string, unknown>) {
    console.warn(`[WARN] ${message}`, data ?? '');
  },
  error(message: string, data?: Record<string, unknown>) {
    console.error(`[ERROR] ${message}`, data ?? '');
  },
};

/**
 * Silent logger for testing
 */
export const silentLogger: RuntimeLogger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export type LogEntry = {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  data?: Record<string, unknown>;
  timestamp: string;
};

/**
 * Create a capturing logger that stores log entries for inspection
 */
export function createCapturingLogger(): RuntimeLogger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];

  const log = (level: LogEntry['level']) => (message: string, data?: Record<string, unknown>) => {
    entries.push({
      level,
      message,
      data,
      timestamp: new Date().toISOString(),
    });
  };

  return {
    entries,
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
  };
}
