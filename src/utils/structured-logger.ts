/**
 * Structured logging system with AsyncLocalStorage context propagation
 *
 * Features:
 * - Automatic context inheritance via AsyncLocalStorage
 * - Environment variable configuration (LOG_LEVEL, LOG_OUTPUT, LOG_FORMAT, LOG_FILE, LOG_TAGS)
 * - JSON and human-readable formats
 * - Container-native (stdout/stderr by default)
 * - Tag-based filtering using context keys
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { appendFileSync } from 'node:fs';
import { join } from 'node:path';

// Log levels in order of severity
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export interface LogContext {
  // Request-level context
  request_id?: string;
  operation?: string;
  component?: string;

  // Storage context
  backend?: string;
  dataset?: string;
  snapshot?: string;
  job_id?: string;
  method?: string;
  duration_ms?: number;

  // Error-level context
  error_code?: string;
  error_type?: string;

  // Additional structured context
  [key: string]: string | number | boolean | undefined;
}

interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  context: LogContext;
}

type LogOutput = 'console' | 'file' | 'both';
type LogFormat = 'json' | 'human';

const LOG_OUTPUTS: readonly LogOutput[] = ['console', 'file', 'both'];

class StructuredLogger {
  private static contextStorage = new AsyncLocalStorage<LogContext>();
  private level: LogLevel;
  private output: LogOutput;
  private format: LogFormat;
  private filePath: string;
  private tagFilters: Set<string> | null = null;
  private moduleName: string;

  constructor(moduleName: string) {
    this.moduleName = moduleName;

    this.level = this.parseLogLevel(process.env.LOG_LEVEL || 'INFO');
    this.output = this.parseLogOutput(process.env.LOG_OUTPUT || 'console');
    this.format = this.parseLogFormat(process.env.LOG_FORMAT || 'auto');
    this.filePath = process.env.LOG_FILE || join(process.cwd(), 'snapshot-portal.log');

    // Parse LOG_TAGS for filtering
    if (process.env.LOG_TAGS && process.env.LOG_TAGS !== '*') {
      this.tagFilters = new Set(process.env.LOG_TAGS.split(',').map((tag) => tag.trim()));
    }
  }

  private parseLogLevel(level: string): LogLevel {
    const levelMap: Record<string, LogLevel> = {
      DEBUG: LogLevel.DEBUG,
      INFO: LogLevel.INFO,
      WARN: LogLevel.WARN,
      ERROR: LogLevel.ERROR,
      SILENT: LogLevel.SILENT,
    };
    return levelMap[level.toUpperCase()] ?? LogLevel.INFO;
  }

  private parseLogOutput(output: string): LogOutput {
    return LOG_OUTPUTS.find((candidate) => candidate === output) ?? 'console';
  }

  private parseLogFormat(format: string): LogFormat {
    if (format === 'json' || format === 'human') {
      return format;
    }
    // Auto-detect: JSON in production, human-readable otherwise
    return process.env.NODE_ENV === 'production' ? 'json' : 'human';
  }

  private shouldLog(level: LogLevel, context: LogContext): boolean {
    if (level < this.level || this.level === LogLevel.SILENT) {
      return false;
    }

    if (this.tagFilters) {
      const filters = this.tagFilters;
      const contextMatches =
        filters.size === 0 ||
        Object.entries(context).some(
          ([key, value]) => filters.has(`${key}:${value}`) || filters.has(`${key}:*`)
        );

      if (!contextMatches) {
        return false;
      }
    }

    return true;
  }

  private formatMessage(entry: LogEntry): string {
    if (this.format === 'json') {
      return JSON.stringify(entry);
    }

    const contextStr =
      Object.keys(entry.context).length > 0 ? ` ${JSON.stringify(entry.context)}` : '';

    return `[${entry.timestamp}] ${entry.level.padEnd(5)} [${this.moduleName}] ${entry.message}${contextStr}`;
  }

  private writeLog(entry: LogEntry): void {
    const message = this.formatMessage(entry);
    const isError = entry.level === 'ERROR' || entry.level === 'WARN';

    if (this.output === 'console' || this.output === 'both') {
      // Container-native: INFO/DEBUG → stdout, WARN/ERROR → stderr
      if (isError) {
        console.error(message);
      } else {
        console.log(message);
      }
    }

    if (this.output === 'file' || this.output === 'both') {
      try {
        appendFileSync(this.filePath, `${message}\n`);
      } catch (error) {
        process.stderr.write(
          `[StructuredLogger] cannot append to ${this.filePath}: ${error instanceof Error ? error.message : String(error)}\n`
        );
      }
    }
  }

  private log(level: LogLevel, message: string, additionalContext?: Partial<LogContext>): void {
    const currentContext = StructuredLogger.contextStorage.getStore() || {};

    const context: LogContext = {
      component: this.moduleName,
      ...currentContext,
      ...additionalContext,
    };

    if (!this.shouldLog(level, context)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LogLevel[level],
      message,
      context,
    };

    this.writeLog(entry);
  }

  debug(message: string, context?: Partial<LogContext>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Partial<LogContext>): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Partial<LogContext>): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, error?: unknown, context?: Partial<LogContext>): void {
    let enrichedContext = { ...context };

    // Auto-extract error details
    if (error) {
      if (error instanceof Error) {
        enrichedContext = {
          ...enrichedContext,
          error_type: error.constructor.name,
          error_message: error.message,
          stack_trace: error.stack,
        };
      } else {
        enrichedContext = {
          ...enrichedContext,
          error_details: String(error),
        };
      }
    }

    this.log(LogLevel.ERROR, message, enrichedContext);
  }

  // Context management methods
  static withContext<T>(context: Partial<LogContext>, fn: () => T): T {
    const currentContext = StructuredLogger.contextStorage.getStore() || {};
    const newContext = { ...currentContext, ...context };
    return StructuredLogger.contextStorage.run(newContext, fn);
  }

  static async withContextAsync<T>(context: Partial<LogContext>, fn: () => Promise<T>): Promise<T> {
    const currentContext = StructuredLogger.contextStorage.getStore() || {};
    const newContext = { ...currentContext, ...context };
    return StructuredLogger.contextStorage.run(newContext, fn);
  }

  static getContext(): LogContext {
    return StructuredLogger.contextStorage.getStore() || {};
  }
}

// Factory function for creating module-scoped loggers
export function getLogger(moduleName: string): StructuredLogger {
  return new StructuredLogger(moduleName);
}

export function createRequestContext(operation: string, requestId?: string): Partial<LogContext> {
  return {
    request_id: requestId || `req_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`,
    operation,
  };
}

export { StructuredLogger };
