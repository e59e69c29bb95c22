/**
 * Structured Logger
 *
 * Consistent, structured logging across envguard components. Components take
 * a Logger as a constructor or option argument and fall back to the shared
 * default from {@link getLogger}.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogEntry {
  timestamp: string;
  level: Exclude<LogLevel, 'silent'>;
  component: string;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

export interface LoggerConfig {
  level: LogLevel;
  component: string;
  enableConsole: boolean;
  enableStructured: boolean;
  onLog?: (entry: LogEntry) => void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const DEFAULT_CONFIG: LoggerConfig = {
  level: 'info',
  component: 'envguard',
  enableConsole: true,
  enableStructured: false,
};

export class Logger {
  private readonly config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get level(): LogLevel {
    return this.config.level;
  }

  get component(): string {
    return this.config.component;
  }

  /**
   * Create a child logger with a new component name
   */
  child(component: string): Logger {
    return new Logger({
      ...this.config,
      component: `${this.config.component}.${component}`,
    });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    const errorInfo = error
      ? {
          name: error.name,
          message: error.message,
          code: readCode(error),
          stack: error.stack,
        }
      : undefined;

    this.log('error', message, context, errorInfo);
  }

  private log(
    level: LogEntry['level'],
    message: string,
    context?: Record<string, unknown>,
    error?: LogEntry['error'],
  ): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.config.level]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.config.component,
      message,
      context,
      error,
    };

    if (this.config.onLog) {
      this.config.onLog(entry);
    }

    if (this.config.enableConsole) {
      this.writeToConsole(entry);
    }
  }

  // Everything goes to stderr so stdout stays clean for command output.
  private writeToConsole(entry: LogEntry): void {
    if (this.config.enableStructured) {
      console.error(JSON.stringify(entry));
      return;
    }

    const prefix = `[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.component}]`;
    const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : '';
    console.error(`${prefix} ${entry.message}${contextStr}`);
    if (entry.level === 'error' && entry.error?.stack) {
      console.error(entry.error.stack);
    }
  }
}

function readCode(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' ? code : undefined;
}

let defaultLogger: Logger | null = null;

/**
 * Get or create the default logger
 */
export function getLogger(component?: string): Logger {
  if (!defaultLogger) {
    defaultLogger = new Logger({ level: 'info', component: 'envguard' });
  }
  return component ? defaultLogger.child(component) : defaultLogger;
}

/**
 * Configure the default logger
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  defaultLogger = new Logger(config);
}
