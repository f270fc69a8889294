export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

export type LogFormat = 'pretty' | 'json';

export interface LogData {
  method?: string;
  url?: string;
  statusCode?: number;
  error?: unknown;
  duration?: number | string;
  ip?: string | null;
  [key: string]: unknown;
}

export interface LogEntry extends LogData {
  timestamp: string;
  level: LogLevel;
  message: string;
}

export interface LoggerOptions {
  level: LogLevel;
  format: LogFormat;
}

const SEVERITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

const HEADER_FIELDS = ['timestamp', 'level', 'message', 'method', 'url', 'statusCode', 'duration', 'ip', 'error'];

function statusBadge(statusCode: number): string {
  if (statusCode >= 500) return `[${statusCode}] 🔴`;
  if (statusCode >= 400) return `[${statusCode}] 🟠`;
  if (statusCode >= 200) return `[${statusCode}] 🟢`;
  return `[${statusCode}]`;
}

function serializeError(error: unknown, withStack: boolean): unknown {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      ...(withStack && error.stack ? { stack: error.stack } : {}),
    };
  }
  return error;
}

function indent(text: string): string {
  return text
    .split('\n')
    .map((line) => `   ${line}`)
    .join('\n');
}

function formatPretty(entry: LogEntry, withStack: boolean): string {
  const header = [`[${new Date(entry.timestamp).toLocaleTimeString()}]`, `[${entry.level}]`];
  if (entry.statusCode !== undefined) {
    header.push(statusBadge(entry.statusCode));
  }
  if (entry.method && entry.url) {
    header.push(`${entry.method} ${entry.url}`);
  }
  if (entry.duration !== undefined) {
    header.push(`(${typeof entry.duration === 'string' ? entry.duration : `${entry.duration}ms`})`);
  }
  if (entry.ip) {
    header.push(`IP: ${entry.ip}`);
  }

  const parts = [header.join(' '), `📝 ${entry.message}`];

  const data = Object.fromEntries(
    Object.entries(entry).filter(([key, value]) => !HEADER_FIELDS.includes(key) && value !== undefined)
  );
  if (Object.keys(data).length > 0) {
    parts.push(`\n📦 Data:\n${JSON.stringify(data, null, 2)}`);
  }

  if (entry.error !== undefined) {
    parts.push(`\n❌ Error Details:`);
    if (entry.error instanceof Error) {
      parts.push(`   Message: ${entry.error.message}`);
      if (withStack && entry.error.stack) {
        parts.push(`   Stack:\n${indent(entry.error.stack)}`);
      }
    } else {
      parts.push(indent(JSON.stringify(entry.error, null, 2)));
    }
  }

  const separator = '─'.repeat(80);
  return `\n${separator}\n${parts.join('\n')}\n${separator}\n`;
}

// One line per entry, for log collectors
function formatJson(entry: LogEntry, withStack: boolean): string {
  const { error, ...rest } = entry;
  return JSON.stringify(error === undefined ? rest : { ...rest, error: serializeError(error, withStack) });
}

function defaultOptions(): LoggerOptions {
  const development = process.env.NODE_ENV === 'development';
  return {
    level: development ? LogLevel.DEBUG : LogLevel.INFO,
    format: process.env.NODE_ENV === 'production' ? 'json' : 'pretty',
  };
}

export class Logger {
  private static options: LoggerOptions = defaultOptions();

  static configure(options: Partial<LoggerOptions>): void {
    this.options = { ...this.options, ...options };
  }

  static isEnabled(level: LogLevel): boolean {
    return SEVERITY[level] >= SEVERITY[this.options.level];
  }

  static log(level: LogLevel, message: string, data?: LogData): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      ...data,
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    // Stacks only at debug verbosity
    const withStack = this.options.level === LogLevel.DEBUG;
    const line = this.options.format === 'json' ? formatJson(entry, withStack) : formatPretty(entry, withStack);

    switch (level) {
      case LogLevel.ERROR:
        console.error(line);
        break;
      case LogLevel.WARN:
        console.warn(line);
        break;
      case LogLevel.DEBUG:
        console.debug(line);
        break;
      default:
        console.log(line);
    }
  }

  static info(message: string, data?: LogData): void {
    this.log(LogLevel.INFO, message, data);
  }

  static error(message: string, error?: unknown, data?: LogData): void {
    this.log(LogLevel.ERROR, message, error === undefined ? data : { ...data, error });
  }

  static warn(message: string, data?: LogData): void {
    this.log(LogLevel.WARN, message, data);
  }

  static debug(message: string, data?: LogData): void {
    this.log(LogLevel.DEBUG, message, data);
  }
}
