import { type Static, type TObject, Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export class ConfigError extends Error {
  constructor(
    readonly key: string,
    message: string
  ) {
    super(`環境變數 ${key} 設定錯誤: ${message}`);
    this.name = "ConfigError";
  }
}

/** 接受 true/false/1/0 字串 */
export function envBoolean() {
  return t.Boolean();
}

/** 接受數字字串 */
export function envNumber(options?: { minimum?: number; maximum?: number }) {
  return t.Number(options);
}

/**
 * 依 schema 由環境變數建立設定讀取函式。
 * 每次呼叫都重新讀取 env，轉型後驗證，失敗時丟出 ConfigError。
 */
export function buildConfigFactoryEnv<T extends TObject>(
  schema: T,
  env: Record<string, string | undefined> = process.env
) {
  return (): Static<T> => {
    const source: Record<string, string> = {};
    for (const key of Object.keys(schema.properties)) {
      const raw = env[key];
      if (raw !== undefined && raw !== "") source[key] = raw;
    }
    const value = Value.Convert(schema, Value.Default(schema, source));
    if (!Value.Check(schema, value)) {
      const first = Value.Errors(schema, value).First();
      throw new ConfigError(
        first?.path.replace(/^\//, "") ?? "(unknown)",
        first?.message ?? "格式錯誤"
      );
    }
    return value;
  };
}
