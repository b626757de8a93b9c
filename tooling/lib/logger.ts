/**
 * Structured logging for test generation and benchmarking
 * Provides contextual, hierarchical logging with optional detail levels
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface LogContext {
  operation?: string;
  testName?: string;
  phase?: string;
  component?: string;
}

export type LogData = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  data?: LogData;
}

export class Logger {
  private entries: LogEntry[] = [];
  private level: LogLevel = "info";
  private context: LogContext = {};
  private timerStack: Map<string, number> = new Map();
  private shouldLog: boolean = true;

  constructor(level: LogLevel = "info", shouldLog: boolean = true) {
    this.level = level;
    this.shouldLog = shouldLog;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Set context for all subsequent logs
   */
  setContext(context: Partial<LogContext>): void {
    this.context = { ...this.context, ...context };
  }

  clearContext(): void {
    this.context = {};
  }

  /**
   * Push a new context layer
   */
  pushContext(context: Partial<LogContext>): void {
    this.context = { ...this.context, ...context };
  }

  /**
   * Pop context keys pushed earlier
   */
  popContext(keys: (keyof LogContext)[]): void {
    keys.forEach((key) => {
      delete this.context[key];
    });
  }

  startTimer(name: string): void {
    this.timerStack.set(name, Date.now());
  }

  /**
   * End a timer and log its duration
   */
  endTimer(name: string, message: string, level: LogLevel = "debug"): number {
    const start = this.timerStack.get(name);
    if (start === undefined) {
      this.log("warn", `Timer "${name}" not found`);
      return 0;
    }

    const duration = Date.now() - start;
    this.timerStack.delete(name);
    this.log(level, message, undefined, { duration });
    return duration;
  }

  debug(message: string, data?: LogData): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: LogData): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: LogData): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: LogData): void {
    this.log("error", message, data);
  }

  private log(level: LogLevel, message: string, data?: LogData, extra?: LogData): void {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.level)) {
      return;
    }

    const mergedData = { ...(data || {}), ...(extra || {}) };
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: Object.keys(this.context).length > 0 ? { ...this.context } : undefined,
      data: Object.keys(mergedData).length > 0 ? mergedData : undefined,
    };

    this.entries.push(entry);

    if (this.shouldLog) {
      this.consoleLog(level, this.formatLog(entry, this.buildPrefix(entry)));
    }
  }

  private buildPrefix(entry: LogEntry): string {
    if (!entry.context) return "";

    const parts: string[] = [];
    if (entry.context.phase) parts.push(`[${entry.context.phase}]`);
    if (entry.context.component) parts.push(`<${entry.context.component}>`);
    if (entry.context.operation) parts.push(entry.context.operation);
    if (entry.context.testName) parts.push(`#${entry.context.testName}`);

    return parts.length > 0 ? parts.join(" ") + ": " : "";
  }

  /**
   * Format a log entry for display
   */
  formatLog(entry: LogEntry, prefix: string = this.buildPrefix(entry)): string {
    let result = prefix + entry.message;

    if (entry.data) {
      const dataStr = this.formatData(entry.data);
      if (dataStr) {
        result += "\n  " + dataStr;
      }
    }

    return result;
  }

  private formatData(data: LogData): string {
    const parts: string[] = [];

    for (const [key, value] of Object.entries(data)) {
      if (key === "duration" && typeof value === "number") {
        parts.push(`${key}: ${value}ms`);
      } else if (Array.isArray(value)) {
        parts.push(`${key}: [${value.length} items]`);
      } else if (typeof value === "bigint") {
        parts.push(`${key}: ${value.toString()}`);
      } else if (typeof value === "object" && value !== null) {
        parts.push(`${key}: ${JSON.stringify(value)}`);
      } else {
        parts.push(`${key}: ${String(value)}`);
      }
    }

    return parts.join(", ");
  }

  private consoleLog(level: LogLevel, message: string): void {
    switch (level) {
      case "debug":
        console.debug(message);
        break;
      case "info":
        console.log(message);
        break;
      case "warn":
        console.warn(message);
        break;
      case "error":
        console.error(message);
        break;
    }
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  /**
   * Entries logged while an operation was in context
   */
  getEntriesForOperation(operation: string): LogEntry[] {
    return this.entries.filter((entry) => entry.context?.operation === operation);
  }

  /**
   * Entries at or above a level
   */
  getEntriesAtLevel(level: LogLevel): LogEntry[] {
    const index = LOG_LEVELS.indexOf(level);
    return this.entries.filter((entry) => LOG_LEVELS.indexOf(entry.level) >= index);
  }

  toJSON(): LogEntry[] {
    return this.getEntries();
  }

  clear(): void {
    this.entries = [];
  }

  getSummary(): {
    totalEntries: number;
    debugCount: number;
    infoCount: number;
    warnCount: number;
    errorCount: number;
  } {
    return {
      totalEntries: this.entries.length,
      debugCount: this.entries.filter((e) => e.level === "debug").length,
      infoCount: this.entries.filter((e) => e.level === "info").length,
      warnCount: this.entries.filter((e) => e.level === "warn").length,
      errorCount: this.entries.filter((e) => e.level === "error").length,
    };
  }
}

/**
 * Global logger instance
 */
export const globalLogger = new Logger("info", true);
