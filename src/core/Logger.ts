/**
 * Logger - Console logging with component prefixes
 *
 * Every line is written as `[Component] message`, optionally preceded by an
 * ISO timestamp. Components receive a Logger so tests can silence them.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LoggerConfig {
  /** Minimum level that is written (default: info) */
  level?: LogLevel;
  /** Include timestamps in console output (default: false) */
  timestamps?: boolean;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export class Logger {
  private readonly component: string;
  private readonly level: LogLevel;
  private readonly timestamps: boolean;

  constructor(component: string, config: LoggerConfig = {}) {
    this.component = component;
    this.level = config.level ?? 'info';
    this.timestamps = config.timestamps ?? false;
  }

  /**
   * Logger for a sub-component sharing this logger's settings
   */
  child(component: string): Logger {
    return new Logger(component, { level: this.level, timestamps: this.timestamps });
  }

  debug(message: string, ...details: unknown[]): void {
    if (this.enabled('debug')) {
      console.debug(this.format(message), ...details);
    }
  }

  info(message: string, ...details: unknown[]): void {
    if (this.enabled('info')) {
      console.log(this.format(message), ...details);
    }
  }

  warn(message: string, ...details: unknown[]): void {
    if (this.enabled('warn')) {
      console.warn(this.format(message), ...details);
    }
  }

  error(message: string, ...details: unknown[]): void {
    if (this.enabled('error')) {
      console.error(this.format(message), ...details);
    }
  }

  private enabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private format(message: string): string {
    const prefix = `[${this.component}]`;
    return this.timestamps
      ? `${new Date().toISOString()} ${prefix} ${message}`
      : `${prefix} ${message}`;
  }
}

export function createLogger(component: string, config?: LoggerConfig): Logger {
  return new Logger(component, config);
}

/**
 * Logger that writes nothing
 */
export const silentLogger = new Logger('silent', { level: 'silent' });
