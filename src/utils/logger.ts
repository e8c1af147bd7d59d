export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'pretty';
export type LogSink = (line: string, level: LogLevel) => void;

interface LoggerOptions {
  level: LogLevel;
  format: LogFormat;
  scope?: string;
  sink?: LogSink;
}

const levelWeights: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

function consoleSink(line: string, level: LogLevel): void {
  const stream = level === 'warn' || level === 'error' ? process.stderr : process.stdout;
  stream.write(`${line}\n`);
}

export class Logger {
  private readonly level: LogLevel;
  private readonly format: LogFormat;
  private readonly scope?: string;
  private readonly sink: LogSink;

  constructor(options: LoggerOptions) {
    this.level = options.level;
    this.format = options.format;
    this.scope = options.scope;
    this.sink = options.sink ?? consoleSink;
  }

  /** Returns a logger that prefixes every line with `scope`, nested under this one's. */
  child(scope: string): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      scope: this.scope ? `${this.scope}.${scope}` : scope,
      sink: this.sink
    });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return levelWeights[level] >= levelWeights[this.level];
  }

  private formatMessage(level: LogLevel, message: string, metadata?: Record<string, unknown>) {
    const timestamp = new Date().toISOString();

    if (this.format === 'json') {
      return JSON.stringify({
        level,
        scope: this.scope ?? null,
        message,
        metadata: metadata ?? null,
        timestamp
      });
    }

    const scopeText = this.scope ? ` [${this.scope}]` : '';
    const metadataText = metadata ? ` ${JSON.stringify(metadata)}` : '';
    return `[${timestamp}] [${level.toUpperCase()}]${scopeText} ${message}${metadataText}`;
  }

  private write(level: LogLevel, message: string, metadata?: Record<string, unknown>) {
    if (!this.isLevelEnabled(level)) return;
    this.sink(this.formatMessage(level, message, metadata), level);
  }

  debug(message: string, metadata?: Record<string, unknown>) {
    this.write('debug', message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>) {
    this.write('info', message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>) {
    this.write('warn', message, metadata);
  }

  error(message: string, metadata?: Record<string, unknown>) {
    this.write('error', message, metadata);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
