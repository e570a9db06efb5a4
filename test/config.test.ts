import { describe, expect, test } from "vitest";

import { ConfigError } from "~shared/ConfigFactory";

import { getAppConfig } from "@/config";

describe("getAppConfig", () => {
  test("未設定時使用預設值", () => {
    expect(getAppConfig({})).toEqual({
      tagWriteTimeoutMs: 30_000,
      stateSaveInterval: 100,
      reportDir: undefined,
    });
  });

  test("讀取環境變數", () => {
    expect(
      getAppConfig({
        TAG_WRITE_TIMEOUT_MS: "5000",
        STATE_SAVE_INTERVAL: "10",
        REPORT_DIR: "/tmp/reports",
      })
    ).toEqual({
      tagWriteTimeoutMs: 5000,
      stateSaveInterval: 10,
      reportDir: "/tmp/reports",
    });
  });

  test("數值小於 1 時丟出 ConfigError", () => {
    expect(() => getAppConfig({ STATE_SAVE_INTERVAL: "0" })).toThrow(
      ConfigError
    );
  });
});
