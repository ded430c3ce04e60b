import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "../ConfigFactory";
import { LoggerConsole, defaultEmojiMap, logLevels } from "../Logger";

const getTestLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    TEST_LOG_LEVEL: t.Optional(t.Union(logLevels.map((l) => t.Literal(l)))),
  })
);

/** 測試用 logger，預設只輸出 error 以免干擾測試輸出 */
export function buildTestLogger() {
  const { TEST_LOG_LEVEL } = getTestLoggerConfig();
  return new LoggerConsole(TEST_LOG_LEVEL ?? "error", [], {}, defaultEmojiMap);
}
