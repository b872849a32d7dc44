/**
 * Console logger
 *
 * info/success → stdout, warn/error → stderr, filtered by minimum level.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

interface ConsoleLoggerOptions {
  level?: LogLevel;
  /** Route everything to stderr (keeps stdout clean for --json) */
  stderrOnly?: boolean;
}

export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly stderrOnly: boolean;

  constructor({ level = 'info', stderrOnly = false }: ConsoleLoggerOptions = {}) {
    this.level = level;
    this.stderrOnly = stderrOnly;
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private out(line: string): void {
    if (this.stderrOnly) console.error(line);
    else console.log(line);
  }

  debug(message: string): void {
    if (this.enabled('debug')) this.out(`· ${message}`);
  }

  info(message: string): void {
    if (this.enabled('info')) this.out(`ℹ ${message}`);
  }

  success(message: string): void {
    if (this.enabled('info')) this.out(`✓ ${message}`);
  }

  warn(message: string): void {
    if (this.enabled('warn')) console.error(`⚠ ${message}`);
  }

  error(message: string): void {
    if (this.enabled('error')) console.error(`✗ ${message}`);
  }
}

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  success: () => {},
  warn: () => {},
  error: () => {}
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LEVEL_ORDER;
}
