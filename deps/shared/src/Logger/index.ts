import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "../ConfigFactory";
import { type EmojiMap, logLevels } from "./Logger";
import { LoggerConsole } from "./LoggerConsole";
import { RfsTransport } from "./RfsTransport";

export * from "./Logger";
export { LoggerConsole } from "./LoggerConsole";

export const defaultEmojiMap: EmojiMap = {
  start: "🏁",
  done: "✅",
  trace: "🔬",
  debug: "🐛",
  info: "ℹ️",
  warn: "⚠️",
  error: "❌",
};

const getLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    LOG_LEVEL: t.Optional(t.Union(logLevels.map((l) => t.Literal(l)))),
    LOG_FILE: t.Optional(t.String()),
    LOG_DIR: t.Optional(t.String()),
  })
);

/**
 * 依環境變數建立 logger：
 * - LOG_LEVEL：最低輸出等級，預設 info
 * - LOG_FILE / LOG_DIR：設定後另外寫入輪替日誌檔
 */
export function createDefaultLoggerFromEnv() {
  const { LOG_LEVEL, LOG_FILE, LOG_DIR } = getLoggerConfig();
  const logger = new LoggerConsole(LOG_LEVEL ?? "info", [], {}, defaultEmojiMap);
  if (LOG_FILE) {
    logger.attachTransport(
      new RfsTransport({ filename: LOG_FILE, rfs: { path: LOG_DIR ?? "logs" } })
    );
  }
  return logger;
}
