export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0, info: 1, warn: 2, error: 3,
};

/** 判斷字串是否為合法的 log level（用於環境變數與設定檔） */
export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVEL_ORDER, value);
}

/** log 輸出目的地，預設寫入 stderr，讓 stdout 保留給指令結果 */
export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => {
  process.stderr.write(line + '\n');
};

/** 結構化 JSON logger */
export class Logger {
  constructor(
    private readonly context: string,
    private readonly minLevel: LogLevel = 'info',
    private readonly sink: LogSink = stderrSink,
  ) {}

  /** 建立共用 level 與 sink 的子 logger */
  child(context: string): Logger {
    return new Logger(context, this.minLevel, this.sink);
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;
    const entry = {
      timestamp: new Date().toISOString(),
      level,
      context: this.context,
      message,
      ...data,
    };
    this.sink(JSON.stringify(entry));
  }

  debug(msg: string, data?: Record<string, unknown>) { this.log('debug', msg, data); }
  info(msg: string, data?: Record<string, unknown>) { this.log('info', msg, data); }
  warn(msg: string, data?: Record<string, unknown>) { this.log('warn', msg, data); }
  error(msg: string, data?: Record<string, unknown>) { this.log('error', msg, data); }
}

/** 測試與函式庫呼叫端使用的靜默 logger */
export function silentLogger(context = 'silent'): Logger {
  return new Logger(context, 'error', () => {});
}

/** 將 unknown 錯誤轉為可序列化的 log 欄位 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
