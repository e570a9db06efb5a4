export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";

export type LogLevelSetting = LogLevel | "silent";

export type LogContext = {
  /** 事件名稱，輸出時取代等級作為標籤 */
  event?: string;
  /** 覆寫此筆紀錄的 emoji */
  emoji?: string;
  error?: unknown;
  [key: string]: unknown;
};

export type LogTemplate = (
  strings: TemplateStringsArray,
  ...values: unknown[]
) => void;

/**
 * 兩種呼叫方式：
 * - `logger.info(context, "訊息")` 或 `logger.info("訊息")` 直接輸出
 * - `logger.info(context)\`完成 ${count} 項\`` 以 template 輸出，插值會併入 context
 */
export interface LogMethod {
  (context: LogContext, message: string): void;
  (message: string): void;
  (context?: LogContext): LogTemplate;
}

export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;

  /** 建立子 logger，名稱附加到路徑上 */
  extend(name: string, context?: LogContext): Logger;

  /** 建立合併 context 的 logger，路徑不變 */
  append(context: LogContext): Logger;
}
