type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

interface LoggerOptions {
  prefix?: string;
  enabled?: boolean;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

/**
 * Console logger for the extractor package. Silent under NODE_ENV=test;
 * LOG_LEVEL (default info) sets the lowest level printed.
 */
class ExtractorLogger {
  private prefix: string;
  private enabled: boolean;

  constructor(options: LoggerOptions = {}) {
    this.prefix = options.prefix || '[Extractor]';
    this.enabled = options.enabled ?? process.env.NODE_ENV !== 'test';
  }

  private shouldLog(level: LogLevel): boolean {
    if (!this.enabled) return false;
    const envLevel = process.env.LOG_LEVEL?.toLowerCase();
    const threshold = isLogLevel(envLevel) ? envLevel : 'info';
    return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
  }

  private formatMessage(level: LogLevel, message: string): string {
    const timestamp = new Date().toISOString();
    return `${timestamp} ${this.prefix} [${level.toUpperCase()}] ${message}`;
  }

  debug(message: string): void {
    if (this.shouldLog('debug')) {
      console.debug(this.formatMessage('debug', message));
    }
  }

  info(message: string): void {
    if (this.shouldLog('info')) {
      console.info(this.formatMessage('info', message));
    }
  }

  warn(message: string): void {
    if (this.shouldLog('warn')) {
      console.warn(this.formatMessage('warn', message));
    }
  }

  error(message: string, error?: unknown): void {
    if (this.shouldLog('error')) {
      const detail = error instanceof Error ? error.stack ?? error.message : error === undefined ? '' : String(error);
      console.error(this.formatMessage('error', message), detail);
    }
  }
}

export const httpLogger = new ExtractorLogger({ prefix: '[HTTP]' });
export const scrapeLogger = new ExtractorLogger({ prefix: '[Scrape]' });

export { ExtractorLogger };
export type { LogLevel };
