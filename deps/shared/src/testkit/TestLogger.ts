import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "../ConfigFactory";
import { LoggerConsole } from "../Logger";

const getTestLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    TEST_LOG_LEVEL: t.Optional(
      t.Union([
        t.Literal("trace"),
        t.Literal("debug"),
        t.Literal("info"),
        t.Literal("warn"),
        t.Literal("error"),
        t.Literal("silent"),
      ])
    ),
  })
);

/** 測試用 logger，預設不輸出，設定 TEST_LOG_LEVEL 可打開 */
export function buildTestLogger() {
  const { TEST_LOG_LEVEL } = getTestLoggerConfig();
  return new LoggerConsole(TEST_LOG_LEVEL ?? "silent");
}
