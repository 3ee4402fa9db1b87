/**
 * Log Level Enum
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

/**
 * Global Logger Configuration
 */
class LoggerConfig {
  private static instance: LoggerConfig;
  private level: LogLevel = LogLevel.INFO;

  private constructor() {}

  static getInstance(): LoggerConfig {
    if (!LoggerConfig.instance) {
      LoggerConfig.instance = new LoggerConfig();
    }
    return LoggerConfig.instance;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setDebugMode(enabled: boolean): void {
    this.level = enabled ? LogLevel.DEBUG : LogLevel.INFO;
  }
}

/**
 * Debug Logger
 * Prefixed console logging, filtered by one process-wide level
 */
export class DebugLogger {
  private prefix: string;
  private static config = LoggerConfig.getInstance();

  constructor(prefix: string) {
    this.prefix = prefix;
  }

  /**
   * Enable or disable debug mode globally
   */
  static setDebugMode(enabled: boolean): void {
    DebugLogger.config.setDebugMode(enabled);
  }

  /**
   * Set global log level
   */
  static setLogLevel(level: LogLevel): void {
    DebugLogger.config.setLevel(level);
  }

  debug(...args: unknown[]): void {
    if (DebugLogger.config.getLevel() <= LogLevel.DEBUG) {
      console.log(`[${this.prefix}]`, ...args);
    }
  }

  info(...args: unknown[]): void {
    if (DebugLogger.config.getLevel() <= LogLevel.INFO) {
      console.log(`[${this.prefix}]`, ...args);
    }
  }

  warn(...args: unknown[]): void {
    if (DebugLogger.config.getLevel() <= LogLevel.WARN) {
      console.warn(`[${this.prefix}]`, ...args);
    }
  }

  /**
   * Log error message (always shown unless silent)
   */
  error(...args: unknown[]): void {
    if (DebugLogger.config.getLevel() <= LogLevel.ERROR) {
      console.error(`[${this.prefix}]`, ...args);
    }
  }
}
