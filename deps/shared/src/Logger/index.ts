import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "../ConfigFactory";
import { LoggerConsole } from "./LoggerConsole";
import { RfsTransport } from "./RfsTransport";

export * from "./Logger";
export * from "./LoggerConsole";
export type * from "./LogTransport";

const getLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    LOG_LEVEL: t.Optional(
      t.Union([
        t.Literal("trace"),
        t.Literal("debug"),
        t.Literal("info"),
        t.Literal("warn"),
        t.Literal("error"),
        t.Literal("silent"),
      ])
    ),
    /** 設定後額外寫入 `<dir>/app.log` */
    LOG_FILE_DIR: t.Optional(t.String()),
  })
);

export function createDefaultLoggerFromEnv(): LoggerConsole {
  const { LOG_LEVEL, LOG_FILE_DIR } = getLoggerConfig();
  const logger = new LoggerConsole(LOG_LEVEL ?? "info");
  if (LOG_FILE_DIR) {
    logger.attachTransport(
      new RfsTransport({ filename: "app.log", rfs: { path: LOG_FILE_DIR } })
    );
  }
  return logger;
}
