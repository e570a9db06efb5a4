import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv, envNumber } from "~shared/ConfigFactory";

import {
  DEFAULT_STATE_SAVE_INTERVAL,
  DEFAULT_TAG_WRITE_TIMEOUT_MS,
} from "./constants";

const appConfigSchema = t.Object({
  /** 單次 ExifTool 寫入的逾時 */
  TAG_WRITE_TIMEOUT_MS: t.Optional(envNumber({ minimum: 1 })),
  STATE_SAVE_INTERVAL: t.Optional(envNumber({ minimum: 1 })),
  /** 報告輸出位置，未設定時放在輸出目錄的 _reconcile/ */
  REPORT_DIR: t.Optional(t.String()),
});

export type AppConfig = {
  tagWriteTimeoutMs: number;
  stateSaveInterval: number;
  reportDir?: string;
};

export function getAppConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const raw = buildConfigFactoryEnv(appConfigSchema, env)();
  return {
    tagWriteTimeoutMs: raw.TAG_WRITE_TIMEOUT_MS ?? DEFAULT_TAG_WRITE_TIMEOUT_MS,
    stateSaveInterval: raw.STATE_SAVE_INTERVAL ?? DEFAULT_STATE_SAVE_INTERVAL,
    reportDir: raw.REPORT_DIR,
  };
}
