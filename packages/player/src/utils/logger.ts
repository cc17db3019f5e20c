/**
 * Debug logging utility
 *
 * Provides structured logging with different levels and namespaces
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  namespace: string;
  message: string;
  data?: unknown;
}

export interface LoggerConfig {
  enabled?: boolean;
  level?: LogLevel;
  namespace?: string;
  prefix?: string;
  useColors?: boolean;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LOG_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m', // gray
  info: '\x1b[34m', // blue
  warn: '\x1b[33m', // yellow
  error: '\x1b[31m', // red
};

const RESET_COLOR = '\x1b[0m';

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LOG_LEVELS, value);
}

export class Logger {
  private config: Required<LoggerConfig>;
  private history: LogEntry[] = [];
  private maxHistorySize = 100;
  private children: Logger[] = [];

  constructor(config?: LoggerConfig) {
    this.config = {
      enabled: config?.enabled ?? false,
      level: config?.level ?? 'info',
      namespace: config?.namespace ?? 'core',
      prefix: config?.prefix ?? '[trackdeck]',
      useColors: config?.useColors ?? false,
    };
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }

  /**
   * Create a child logger with a sub-namespace
   */
  child(namespace: string): Logger {
    const childLogger = new Logger({
      ...this.config,
      namespace: `${this.config.namespace}:${namespace}`,
    });
    this.children.push(childLogger);
    return childLogger;
  }

  /**
   * Enable logging (propagates to children)
   */
  enable(): void {
    this.config.enabled = true;
    this.children.forEach((child) => child.enable());
  }

  /**
   * Disable logging (propagates to children)
   */
  disable(): void {
    this.config.enabled = false;
    this.children.forEach((child) => child.disable());
  }

  /**
   * Set log level (propagates to children)
   */
  setLevel(level: LogLevel): void {
    this.config.level = level;
    this.children.forEach((child) => child.setLevel(level));
  }

  /**
   * Configure logger (propagates to children)
   */
  configure(config: Partial<LoggerConfig>): void {
    Object.assign(this.config, config);
    this.children.forEach((child) => {
      child.configure({
        ...config,
        namespace: child.config.namespace, // Preserve child namespace
      });
    });
  }

  isEnabled(): boolean {
    return this.config.enabled;
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  getHistory(): LogEntry[] {
    return [...this.history];
  }

  clearHistory(): void {
    this.history = [];
  }

  /**
   * Export logs as JSON
   */
  exportLogs(): string {
    return JSON.stringify(this.history, null, 2);
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (!this.config.enabled) return;
    if (LOG_LEVELS[level] < LOG_LEVELS[this.config.level]) return;

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      namespace: this.config.namespace,
      message,
      data,
    };

    this.history.push(entry);
    if (this.history.length > this.maxHistorySize) {
      this.history.shift();
    }

    this.outputToConsole(entry);
  }

  private outputToConsole(entry: LogEntry): void {
    const { timestamp, level, namespace, message, data } = entry;
    const timeStr = timestamp.toISOString();
    const tag = this.config.useColors
      ? `${LOG_COLORS[level]}${level.toUpperCase()}${RESET_COLOR}`
      : level.toUpperCase();
    const prefix = `${this.config.prefix} [${timeStr}] [${namespace}] ${tag}`;

    const consoleMethod = level === 'debug' ? 'log' : level;
    console[consoleMethod](prefix, message, data !== undefined ? data : '');
  }
}

/**
 * Create a logger instance
 */
export function createLogger(config?: LoggerConfig): Logger {
  return new Logger(config);
}

const envLevel = process.env.LOG_LEVEL;

/**
 * Shared logger; every module logs through a child of it.
 * Starts at LOG_LEVEL when that names a known level.
 */
export const PlayerLogger = new Logger({
  enabled: false,
  level: isLogLevel(envLevel) ? envLevel : 'info',
  namespace: 'trackdeck',
  prefix: '[trackdeck]',
  useColors: process.stdout.isTTY === true,
});
