import type { AsyncDisposableLike } from "../utils/Disposeable";

export const logLevels = ["trace", "debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof logLevels)[number];

/**
 * 每筆日誌可附帶的結構化內容。
 * - event: 事件名稱，會取代 level 顯示，並用來挑選 emoji
 * - emoji: 直接指定顯示的 emoji
 * - error: 錯誤物件，Error 會輸出 stack
 */
export type LogContext = Record<string, unknown> & {
  event?: string;
  emoji?: string;
  error?: unknown;
};

export type TemplateLog = (
  strings: TemplateStringsArray,
  ...values: unknown[]
) => void;

export interface LogMethod {
  (context: LogContext, message: string): void;
  (message: string): void;
  (context?: LogContext): TemplateLog;
}

export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;

  /** 建立子 logger，name 會接在路徑之後，context 會合併 */
  extend(name: string, context?: LogContext): Logger;

  /** 只合併 context，不改變路徑 */
  append(context: LogContext): Logger;
}

export type SerializedError = {
  name: string;
  message: string;
  stack?: string;
};

export type LogRecord = {
  time: string;
  level: LogLevel;
  path: string[];
  event?: string;
  msg: string;
  context: Record<string, unknown>;
  err?: SerializedError;
};

export interface LogTransport extends AsyncDisposableLike {
  write(record: LogRecord): void;
}

export type EmojiMap = Record<string, string>;
