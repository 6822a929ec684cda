export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, data?: LogFields): void;
  info(message: string, data?: LogFields): void;
  warn(message: string, data?: LogFields): void;
  error(message: string, data?: LogFields): void;
  child(fields: LogFields): Logger;
}

export type LogSink = (level: Exclude<LogLevel, 'silent'>, line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  fields?: LogFields;
  sink?: LogSink;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in SEVERITY;
}

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'info':
      console.info(line);
      break;
    default:
      console.debug(line);
  }
};

// Errors don't survive JSON.stringify on their own
function replacer(_key: string, value: unknown) {
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  return value;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = 'info', fields = {}, sink = consoleSink } = options;
  const threshold = SEVERITY[level];

  const write = (at: Exclude<LogLevel, 'silent'>, message: string, data?: LogFields) => {
    if (SEVERITY[at] < threshold) return;
    const logData = {
      timestamp: new Date().toISOString(),
      level: at,
      message,
      ...fields,
      ...data,
    };
    sink(at, JSON.stringify(logData, replacer));
  };

  return {
    debug: (message, data) => write('debug', message, data),
    info: (message, data) => write('info', message, data),
    warn: (message, data) => write('warn', message, data),
    error: (message, data) => write('error', message, data),
    child: (extra) => createLogger({ level, sink, fields: { ...fields, ...extra } }),
  };
}

export const silentLogger: Logger = createLogger({ level: 'silent' });
