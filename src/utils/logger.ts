type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogSink = (level: LogLevel, line: string) => void;

interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
  sink?: LogSink;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

class Logger {
  private level: LogLevel;
  private prefix: string;
  private sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.prefix = options.prefix ?? '';
    this.sink = options.sink ?? consoleSink;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private formatMessage(level: LogLevel, message: string): string {
    const timestamp = new Date().toISOString();
    const prefix = this.prefix ? `[${this.prefix}] ` : '';
    return `${timestamp} ${level.toUpperCase().padEnd(5)} ${prefix}${message}`;
  }

  private write(level: LogLevel, message: string): void {
    if (this.shouldLog(level)) {
      this.sink(level, this.formatMessage(level, message));
    }
  }

  debug(message: string): void {
    this.write('debug', message);
  }

  info(message: string): void {
    this.write('info', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  error(message: string): void {
    this.write('error', message);
  }

  progress(current: number, total: number, item: string): void {
    if (this.shouldLog('debug')) {
      this.sink('debug', this.formatMessage('debug', `File ${current}/${total}: ${item}`));
    }
  }

  /**
   * Children share the parent's sink but take a snapshot of its level;
   * call setLevel on the root before creating component loggers.
   */
  child(prefix: string): Logger {
    return new Logger({
      level: this.level,
      prefix: this.prefix ? `${this.prefix}:${prefix}` : prefix,
      sink: this.sink,
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

export const logger = new Logger();
export { Logger, isLogLevel };
export type { LogLevel, LogSink, LoggerOptions };
