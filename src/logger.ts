type Level = "debug" | "info" | "warn" | "error";

export interface LogSink {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  debugEnabled?: boolean;
  scope?: string;
  sink?: LogSink;
  clock?: () => Date;
}

export class Logger {
  private readonly debugEnabled: boolean;
  private readonly scope?: string;
  private readonly sink: LogSink;
  private readonly clock: () => Date;

  constructor(options: LoggerOptions = {}) {
    this.debugEnabled = options.debugEnabled ?? true;
    this.scope = options.scope;
    this.sink = options.sink ?? process.stdout;
    this.clock = options.clock ?? (() => new Date());
  }

  child(scope: string): Logger {
    return new Logger({
      debugEnabled: this.debugEnabled,
      scope: this.scope ? `${this.scope}:${scope}` : scope,
      sink: this.sink,
      clock: this.clock,
    });
  }

  debug(message: string): void {
    if (!this.debugEnabled) {
      return;
    }
    this.print("debug", message);
  }

  info(message: string): void {
    this.print("info", message);
  }

  warn(message: string): void {
    this.print("warn", message);
  }

  error(message: string): void {
    this.print("error", message);
  }

  private print(level: Level, message: string): void {
    const ts = this.clock().toISOString();
    const scope = this.scope ? ` [${this.scope}]` : "";
    this.sink.write(`[${ts}] [${level.toUpperCase()}]${scope} ${message}\n`);
  }
}
