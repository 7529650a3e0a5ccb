/**
 * ログ出力ユーティリティ
 * 標準出力はCLIの出力結果専用とし、ログはすべて標準エラーに出す
 * setLogFile でファイルにも追記できる
 */
import * as fs from 'fs';
import * as path from 'path';
import { format } from 'util';

export type LogLevel = 'debug' | 'info' | 'warning' | 'error' | 'critical';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warning: 30,
  error: 40,
  critical: 50
};

/**
 * 環境変数 ARCHAPPL_LOG_LEVEL からログレベルを決定（未指定・不正値は warning）
 */
function levelFromEnv(value: string | undefined): LogLevel {
  const normalized = (value || '').toLowerCase();
  return isLogLevel(normalized) ? normalized : 'warning';
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

let currentLevel: LogLevel = levelFromEnv(process.env.ARCHAPPL_LOG_LEVEL);

/**
 * プロセス全体のログレベルを変更
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

let logFilePath: string | undefined;

/**
 * ログの追記先ファイルを設定（undefined で解除）
 * 親ディレクトリは自動作成する
 */
export function setLogFile(filePath?: string): void {
  if (filePath) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.appendFileSync(filePath, '', 'utf-8');
  }
  logFilePath = filePath;
}

export function getLogFile(): string | undefined {
  return logFilePath;
}

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * ファイル用のタイムスタンプ（ローカル時刻、YYYYMMDDTHH:mm:ss.SSS）
 */
function fileTimestamp(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.${pad(date.getMilliseconds(), 3)}`;
}

/**
 * 名前付きロガー
 */
export class Logger {
  constructor(private readonly name: string) {}

  debug(message: string, ...args: unknown[]): void {
    this.write('debug', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write('info', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write('warning', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write('error', message, args);
  }

  private write(level: LogLevel, message: string, args: unknown[]): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) {
      return;
    }

    const now = new Date();
    const time = now.toISOString().substring(11, 23);
    const record = `${level.toUpperCase()}: ${this.name}: ${message}`;
    const line = `[${time}] ${record}`;

    if (logFilePath) {
      fs.appendFileSync(logFilePath, `[${fileTimestamp(now)}] ${args.length > 0 ? format(record, ...args) : record}\n`, 'utf-8');
    }

    if (level === 'warning') {
      console.warn(line, ...args);
    } else {
      console.error(line, ...args);
    }
  }
}

export function getLogger(name: string): Logger {
  return new Logger(name);
}
