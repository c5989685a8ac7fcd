export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogSink = (line: string) => void;

const LEVELS: Record<LogLevel, number> = {
  debug: 0, info: 1, warn: 2, error: 3,
};

const stderrSink: LogSink = (line) => {
  process.stderr.write(line + '\n');
};

/**
 * 結構化 JSON logger，一筆一行。
 * `component` 是模組名稱；`with()` 綁定的欄位（worker、objectType 等）會附在每一筆紀錄上。
 */
export class Logger {
  /** 未指定 minLevel 時採用；CLI 依 config.logLevel 設定 */
  static defaultLevel: LogLevel = 'info';
  static sink: LogSink = stderrSink;

  constructor(
    private readonly component: string,
    private readonly minLevel?: LogLevel,
    private readonly bound: Readonly<Record<string, unknown>> = {},
  ) {}

  /** 還原成寫到 stderr */
  static resetSink(): void {
    Logger.sink = stderrSink;
  }

  with(fields: Record<string, unknown>): Logger {
    return new Logger(this.component, this.minLevel, { ...this.bound, ...fields });
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.minLevel ?? Logger.defaultLevel];
  }

  private log(level: LogLevel, message: string, data: Record<string, unknown> = {}): void {
    if (!this.shouldLog(level)) return;
    const fields: Record<string, unknown> = {};
    for (const [key, value] of Object.entries({ ...this.bound, ...data })) {
      fields[key] = value instanceof Error ? value.message : value;
    }
    Logger.sink(JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      message,
      ...fields,
    }));
  }

  debug(msg: string, data?: Record<string, unknown>) { this.log('debug', msg, data); }
  info(msg: string, data?: Record<string, unknown>) { this.log('info', msg, data); }
  warn(msg: string, data?: Record<string, unknown>) { this.log('warn', msg, data); }
  error(msg: string, data?: Record<string, unknown>) { this.log('error', msg, data); }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
