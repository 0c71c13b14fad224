export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

export interface LogData {
  method?: string;
  url?: string;
  statusCode?: number;
  error?: unknown;
  duration?: number | string;
  ip?: string;
  [key: string]: unknown;
}

export interface LogEntry extends LogData {
  timestamp: string;
  level: LogLevel;
  message: string;
}

const STANDARD_FIELDS = new Set(['timestamp', 'level', 'message', 'method', 'url', 'statusCode', 'duration', 'ip', 'error']);

function statusMarker(statusCode: number): string {
  if (statusCode >= 500) return `[${statusCode}] 🔴`;
  if (statusCode >= 400) return `[${statusCode}] 🟠`;
  if (statusCode >= 300) return `[${statusCode}] 🟡`;
  if (statusCode >= 200) return `[${statusCode}] 🟢`;
  return `[${statusCode}]`;
}

export function formatLogEntry(entry: LogEntry, includeStack = false): string {
  const timestamp = new Date(entry.timestamp).toLocaleTimeString();
  const parts: string[] = [];

  const headerParts = [`[${timestamp}]`, `[${entry.level}]`];
  if (entry.statusCode !== undefined) {
    headerParts.push(statusMarker(entry.statusCode));
  }
  if (entry.method && entry.url) {
    headerParts.push(`${entry.method} ${entry.url}`);
  }
  if (entry.duration !== undefined) {
    headerParts.push(`(${typeof entry.duration === 'string' ? entry.duration : `${entry.duration}ms`})`);
  }
  if (entry.ip) {
    headerParts.push(`IP: ${entry.ip}`);
  }

  parts.push(headerParts.join(' '));
  parts.push(`📝 ${entry.message}`);

  const dataFields: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(entry)) {
    if (!STANDARD_FIELDS.has(key) && value !== undefined) {
      dataFields[key] = value;
    }
  }
  if (Object.keys(dataFields).length > 0) {
    parts.push(`\n📦 Data:\n${JSON.stringify(dataFields, null, 2)}`);
  }

  if (entry.error !== undefined) {
    parts.push(`\n❌ Error Details:`);
    if (entry.error instanceof Error) {
      parts.push(`   Message: ${entry.error.message}`);
      if (includeStack && entry.error.stack) {
        parts.push(`   Stack:\n${entry.error.stack.split('\n').map(line => `   ${line}`).join('\n')}`);
      }
    } else {
      const serialized: string | undefined = JSON.stringify(entry.error, null, 2);
      parts.push((serialized ?? String(entry.error)).split('\n').map(line => `   ${line}`).join('\n'));
    }
  }

  return parts.join('\n');
}

function toLogLevel(value: string): LogLevel {
  const upper = value.trim().toUpperCase();
  const match = Object.values(LogLevel).find(level => level === upper);
  return match ?? LogLevel.INFO;
}

export class Logger {
  private static minLevel: LogLevel = LogLevel.INFO;
  private static includeStack = false;

  static configure(options: { level: string; includeStack?: boolean }): void {
    this.minLevel = toLogLevel(options.level);
    this.includeStack = options.includeStack ?? false;
  }

  static isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
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

    const separator = '─'.repeat(80);
    const output = `\n${separator}\n${formatLogEntry(entry, this.includeStack)}\n${separator}\n`;

    switch (level) {
      case LogLevel.ERROR:
        console.error(output);
        break;
      case LogLevel.WARN:
        console.warn(output);
        break;
      case LogLevel.DEBUG:
        console.debug(output);
        break;
      default:
        console.log(output);
    }
  }

  static info(message: string, data?: LogData): void {
    this.log(LogLevel.INFO, message, data);
  }

  static error(message: string, error?: unknown, data?: LogData): void {
    this.log(LogLevel.ERROR, message, { ...data, error });
  }

  static warn(message: string, data?: LogData): void {
    this.log(LogLevel.WARN, message, data);
  }

  static debug(message: string, data?: LogData): void {
    this.log(LogLevel.DEBUG, message, data);
  }
}
