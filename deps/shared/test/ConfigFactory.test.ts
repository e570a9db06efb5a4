import { Type as t } from "@sinclair/typebox";
import { describe, expect, test } from "vitest";

import {
  ConfigError,
  buildConfigFactoryEnv,
  envBoolean,
  envNumber,
} from "~shared/ConfigFactory";

const schema = t.Object({
  PORT: envNumber({ minimum: 1 }),
  VERBOSE: t.Optional(envBoolean()),
  NAME: t.Optional(t.String()),
});

describe("buildConfigFactoryEnv", () => {
  test("字串轉成數字與布林", () => {
    const getConfig = buildConfigFactoryEnv(schema, {
      PORT: "8080",
      VERBOSE: "true",
      OTHER: "ignored",
    });
    expect(getConfig()).toEqual({ PORT: 8080, VERBOSE: true });
  });

  test("空字串視為未設定", () => {
    const getConfig = buildConfigFactoryEnv(schema, { PORT: "1", NAME: "" });
    expect(getConfig()).toEqual({ PORT: 1 });
  });

  test("格式錯誤時丟出 ConfigError 並指出欄位", () => {
    const getConfig = buildConfigFactoryEnv(schema, { PORT: "abc" });
    expect(getConfig).toThrow(ConfigError);
    try {
      getConfig();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) expect(error.key).toBe("PORT");
    }
  });

  test("缺少必要欄位", () => {
    const getConfig = buildConfigFactoryEnv(schema, {});
    expect(getConfig).toThrow(ConfigError);
  });
});
