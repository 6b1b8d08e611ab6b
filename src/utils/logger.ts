type LogLevelName = 'error' | 'warn' | 'info' | 'debug';

type LogData = Record<string, unknown>;

const LOG_LEVELS: readonly LogLevelName[] = ['error', 'warn', 'info', 'debug'];

const isLogLevel = (value: string): value is LogLevelName => {
  return LOG_LEVELS.some((level) => level === value);
};

export class Logger {
  private logLevel: LogLevelName;

  constructor(level: string = process.env.LOG_LEVEL || 'info') {
    this.logLevel = isLogLevel(level) ? level : 'info';
  }

  setLevel(level: string): void {
    if (isLogLevel(level)) {
      this.logLevel = level;
    }
  }

  private shouldLog(level: LogLevelName): boolean {
    return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(this.logLevel);
  }

  private formatMessage(level: LogLevelName, message: string, data?: LogData): string {
    const timestamp = new Date().toISOString();
    const baseMessage = `[${timestamp}] [${level.toUpperCase()}] ${message}`;

    if (data) {
      return `${baseMessage}\n${JSON.stringify(data, null, 2)}`;
    }

    return baseMessage;
  }

  error(message: string, data?: LogData): void {
    if (this.shouldLog('error')) {
      console.error(this.formatMessage('error', message, data));
    }
  }

  warn(message: string, data?: LogData): void {
    if (this.shouldLog('warn')) {
      console.warn(this.formatMessage('warn', message, data));
    }
  }

  info(message: string, data?: LogData): void {
    if (this.shouldLog('info')) {
      console.info(this.formatMessage('info', message, data));
    }
  }

  debug(message: string, data?: LogData): void {
    if (this.shouldLog('debug')) {
      console.debug(this.formatMessage('debug', message, data));
    }
  }
}

export const logger = new Logger();
