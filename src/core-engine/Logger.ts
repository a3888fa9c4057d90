/**
 * Logging for the solitaire engine.
 *
 * Engine code never calls `console` directly; it receives a {@link Logger}
 * through its options, the same dependency-injection seam the rest of the
 * engine uses for host services. The default implementation writes to the
 * console with a `[Module]` tag, and tests pass {@link silentLogger} or a
 * spy.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Minimal subset of the Console API the logger writes to.
 * Allows injecting a fake for testing.
 */
export interface ConsoleLike {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export interface ConsoleLoggerOptions {
  /** Lowest level that is written. Defaults to `'info'`. */
  level?: LogLevel;
  /** Output sink. Defaults to the global console. */
  sink?: ConsoleLike;
}

/**
 * Create a console-backed logger that tags every line with `[tag]`.
 */
export function createConsoleLogger(
  tag: string,
  options: ConsoleLoggerOptions = {},
): Logger {
  const { level = 'info', sink = console } = options;
  const threshold = LEVEL_ORDER[level];
  const prefix = `[${tag}]`;

  const write =
    (lvl: LogLevel) =>
    (message: string, ...details: unknown[]): void => {
      if (LEVEL_ORDER[lvl] < threshold) return;
      sink[lvl](`${prefix} ${message}`, ...details);
    };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  };
}

/** A logger that discards everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
