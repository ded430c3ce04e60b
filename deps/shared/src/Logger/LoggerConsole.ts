import kleur from "kleur";

import { dispose } from "../utils/Disposeable";
import type {
  EmojiMap,
  LogContext,
  LogLevel,
  LogRecord,
  LogTransport,
  Logger,
  SerializedError,
  TemplateLog,
} from "./Logger";

const levelWeight: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
};

export class LoggerConsole implements Logger {
  constructor(
    private readonly level: LogLevel,
    private readonly path: string[] = [],
    private readonly context: LogContext = {},
    private readonly emojiMap: EmojiMap = {},
    private readonly transports: LogTransport[] = []
  ) {}

  trace(context: LogContext, message: string): void;
  trace(message: string): void;
  trace(context?: LogContext): TemplateLog;
  trace(contextOrMessage?: LogContext | string, message?: string) {
    return this.entry("trace", contextOrMessage, message);
  }

  debug(context: LogContext, message: string): void;
  debug(message: string): void;
  debug(context?: LogContext): TemplateLog;
  debug(contextOrMessage?: LogContext | string, message?: string) {
    return this.entry("debug", contextOrMessage, message);
  }

  info(context: LogContext, message: string): void;
  info(message: string): void;
  info(context?: LogContext): TemplateLog;
  info(contextOrMessage?: LogContext | string, message?: string) {
    return this.entry("info", contextOrMessage, message);
  }

  warn(context: LogContext, message: string): void;
  warn(message: string): void;
  warn(context?: LogContext): TemplateLog;
  warn(contextOrMessage?: LogContext | string, message?: string) {
    return this.entry("warn", contextOrMessage, message);
  }

  error(context: LogContext, message: string): void;
  error(message: string): void;
  error(context?: LogContext): TemplateLog;
  error(contextOrMessage?: LogContext | string, message?: string) {
    return this.entry("error", contextOrMessage, message);
  }

  extend(name: string, context: LogContext = {}): LoggerConsole {
    return new LoggerConsole(
      this.level,
      [...this.path, name],
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  append(context: LogContext): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.path,
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  /** transport 由整棵 logger 樹共用，子 logger 建立前後掛上都有效 */
  attachTransport(transport: LogTransport) {
    this.transports.push(transport);
  }

  async [Symbol.asyncDispose]() {
    const transports = this.transports.splice(0);
    await Promise.all(transports.map((t) => dispose(t)));
  }

  private entry(
    level: LogLevel,
    contextOrMessage: LogContext | string | undefined,
    message: string | undefined
  ): TemplateLog | undefined {
    if (typeof contextOrMessage === "string") {
      this.write(level, {}, contextOrMessage, contextOrMessage);
      return undefined;
    }
    const context = contextOrMessage ?? {};
    if (message !== undefined) {
      this.write(level, context, message, message);
      return undefined;
    }
    return (strings, ...values) => {
      let plain = strings[0];
      let colored = strings[0];
      const valueContext: Record<string, unknown> = {};
      values.forEach((value, i) => {
        plain += String(value) + strings[i + 1];
        colored += kleur.green(String(value)) + strings[i + 1];
        valueContext[`__${i}`] = value;
      });
      this.write(level, { ...context, ...valueContext }, plain, colored);
    };
  }

  private write(
    level: LogLevel,
    context: LogContext,
    plain: string,
    colored: string
  ) {
    if (levelWeight[level] < levelWeight[this.level]) return;

    const { event, emoji: _emoji, error, ...rest } = {
      ...this.context,
      ...context,
    };
    const err = serializeError(error);
    const extra: Record<string, unknown> = { ...rest };
    if (!err && error !== undefined) extra.error = error;

    const emoji = this.resolveEmoji(level, context.emoji, event);
    const label = [...this.path, event ?? level].join(":");
    const head = emoji ? `${emoji} ${label}` : label;
    const tail =
      Object.keys(extra).length > 0 ? ` ${kleur.gray(stringify(extra))}` : "";
    const line = `${head}: ${colored}${tail}`;

    switch (level) {
      case "error":
        console.error(line);
        if (err?.stack) console.error(kleur.red(err.stack));
        break;
      case "warn":
        console.warn(line);
        break;
      case "info":
        console.info(line);
        break;
      default:
        console.debug(line);
    }

    const record: LogRecord = {
      time: new Date().toISOString(),
      level,
      path: this.path,
      event,
      msg: plain,
      context: extra,
      err,
    };
    for (const transport of this.transports) transport.write(record);
  }

  /**
   * emoji 挑選順序：
   * 呼叫時指定 → event 對應 → (info 以下) 繼承的 emoji → level 對應 → 繼承的 emoji
   */
  private resolveEmoji(
    level: LogLevel,
    callEmoji: string | undefined,
    event: string | undefined
  ) {
    const inherited = this.context.emoji;
    const quiet = levelWeight[level] <= levelWeight.info;
    return (
      callEmoji ??
      (event ? this.emojiMap[event] : undefined) ??
      (quiet ? inherited : undefined) ??
      this.emojiMap[level] ??
      inherited ??
      ""
    );
  }
}

function serializeError(error: unknown): SerializedError | undefined {
  if (!(error instanceof Error)) return undefined;
  return { name: error.name, message: error.message, stack: error.stack };
}

function stringify(value: Record<string, unknown>) {
  try {
    return JSON.stringify(value, (_key, v: unknown) =>
      typeof v === "bigint" ? v.toString() : v
    );
  } catch (e) {
    return `[unserializable context: ${e instanceof Error ? e.message : String(e)}]`;
  }
}
