import chalk from 'chalk';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.gray,
  debug: chalk.dim,
};

export interface LoggerOptions {
  level?: LogLevel;
  /** 輸出目標，預設寫到 stderr，讓 stdout 只保留渲染後的 log */
  write?: (line: string) => void;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * 從 LOGSPLASH_LOG_LEVEL 讀取等級，無效值回到 info
 */
export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const value = env['LOGSPLASH_LOG_LEVEL']?.toLowerCase();
  return value && isLogLevel(value) ? value : 'info';
}

/**
 * 分級 logger - 診斷訊息輸出
 */
export class Logger {
  private level: LogLevel;
  private write: (line: string) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? levelFromEnv();
    this.write = options.write ?? ((line) => console.error(line));
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  error(message: string): void {
    this.log('error', `Error: ${message}`);
  }

  warn(message: string): void {
    this.log('warn', `Warning: ${message}`);
  }

  info(message: string): void {
    this.log('info', message);
  }

  debug(message: string): void {
    this.log('debug', message);
  }

  private log(level: LogLevel, message: string): void {
    if (LEVEL_ORDER[level] > LEVEL_ORDER[this.level]) return;
    this.write(LEVEL_COLORS[level](message));
  }
}

export const logger = new Logger();
