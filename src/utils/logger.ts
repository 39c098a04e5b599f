/**
 * Namespaced, leveled logging for the quote agent
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

/**
 * Well-known fields are lifted to the top level of structured entries,
 * everything else lands under `context`.
 */
export interface LogContext {
  taskId?: string;
  contextId?: string;
  intent?: string;
  event?: string;
  [key: string]: unknown;
}

const TOP_LEVEL_FIELDS = ['taskId', 'contextId', 'intent', 'event', 'error'];

// ANSI color codes
const LAVENDER = '\x1b[38;5;105m';
const RESET = '\x1b[0m';

function parseLevel(raw: string | undefined): LogLevel {
  switch ((raw ?? 'info').toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

function serializeError(error: unknown): unknown {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
      ...('code' in error && typeof error.code === 'string' ? { code: error.code } : {}),
    };
  }
  return error;
}

export class Logger {
  private static instance: Logger | undefined;
  // Shared across every namespaced logger so config applies process-wide
  private static level: LogLevel = parseLevel(process.env['LOG_LEVEL']);
  private static structured: boolean =
    (process.env['LOG_STRUCTURED'] ?? 'false').toLowerCase() === 'true';
  private static enabled = true;

  private readonly namespace?: string;

  private constructor(namespace?: string) {
    this.namespace = namespace;
  }

  static getInstance(namespace?: string): Logger {
    if (namespace) {
      return new Logger(namespace);
    }
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /**
   * Applies the logging section of the service config to every logger.
   */
  static configure(options: { level?: string; structured?: boolean; enabled?: boolean }): void {
    if (options.level !== undefined) {
      Logger.level = parseLevel(options.level);
    }
    if (options.structured !== undefined) {
      Logger.structured = options.structured;
    }
    if (options.enabled !== undefined) {
      Logger.enabled = options.enabled;
    }
  }

  private formatMessage(level: string, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    if (Logger.structured) {
      const rest = context
        ? Object.fromEntries(
            Object.entries(context).filter(([key]) => !TOP_LEVEL_FIELDS.includes(key)),
          )
        : {};
      const entry = {
        timestamp,
        level,
        ...(this.namespace ? { namespace: this.namespace } : {}),
        taskId: context?.taskId,
        contextId: context?.contextId,
        intent: context?.intent,
        event: context?.event,
        message,
        ...(Object.keys(rest).length > 0 ? { context: rest } : {}),
        ...(context?.['error'] !== undefined ? { error: context['error'] } : {}),
      };
      return JSON.stringify(entry);
    }
    const prefix = this.namespace ? ` [${this.namespace}]` : '';
    const contextStr = context ? ` ${JSON.stringify(context)}` : '';
    return `${timestamp} ${level}${prefix} ${message}${contextStr}`;
  }

  private shouldLog(level: LogLevel): boolean {
    return Logger.enabled && level >= Logger.level;
  }

  debug(message: string, context?: LogContext): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      console.log(this.formatMessage('DEBUG', message, context));
    }
  }

  info(message: string, context?: LogContext): void {
    if (this.shouldLog(LogLevel.INFO)) {
      console.log(this.formatMessage('INFO', message, context));
    }
  }

  warn(message: string, context?: LogContext): void {
    if (this.shouldLog(LogLevel.WARN)) {
      console.warn(this.formatMessage('WARN', message, context));
    }
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      const errorContext: LogContext = {
        ...context,
        ...(error !== undefined ? { error: serializeError(error) } : {}),
      };
      console.error(this.formatMessage('ERROR', message, errorContext));
    }
  }

  /**
   * Creates a child logger with a nested namespace
   */
  child(namespace: string): Logger {
    const fullNamespace = this.namespace ? `${this.namespace}:${namespace}` : namespace;
    return new Logger(fullNamespace);
  }

  static colorValue(value: string | number | boolean): string {
    return `${LAVENDER}${value}${RESET}`;
  }
}
