export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const satisfies readonly LogLevel[];

const levels: Record<Exclude<LogLevel, 'silent'>, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export type LogSink = (level: Exclude<LogLevel, 'silent'>, line: string, meta?: unknown) => void;

const consoleSink: LogSink = (level, line, meta) => {
  const args = meta === undefined ? [line] : [line, meta];
  switch (level) {
    case 'error':
      console.error(...args);
      break;
    case 'warn':
      console.warn(...args);
      break;
    case 'info':
      console.log(...args);
      break;
    case 'debug':
      console.debug(...args);
      break;
  }
};

export class Logger {
  public constructor(
    private readonly level: LogLevel,
    private readonly sink: LogSink = consoleSink,
    private readonly scope?: string,
  ) {}

  /** Returns a logger writing to the same sink with `[scope]` prepended to each message. */
  child(scope: string): Logger {
    return new Logger(this.level, this.sink, this.scope ? `${this.scope}:${scope}` : scope);
  }

  private should(level: Exclude<LogLevel, 'silent'>): boolean {
    if (this.level === 'silent') return false;
    return levels[level] <= levels[this.level];
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, meta?: unknown): void {
    if (!this.should(level)) return;
    const scope = this.scope ? ` [${this.scope}]` : '';
    this.sink(level, `${new Date().toISOString()} ${level.toUpperCase()}${scope} ${message}`, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write('error', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write('warn', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write('info', message, meta);
  }

  debug(message: string, meta?: unknown): void {
    this.write('debug', message, meta);
  }
}
