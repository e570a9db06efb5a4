import kleur from "kleur";

import type {
  LogContext,
  LogLevel,
  LogLevelSetting,
  LogTemplate,
  Logger,
} from "./Logger";
import type { LogRecord, LogTransport } from "./LogTransport";

export type EmojiMap = Record<string, string>;

export const defaultEmojiMap: EmojiMap = {
  start: "🏁",
  done: "✅",
  trace: "🔬",
  debug: "🐛",
  info: "ℹ️",
  warn: "⚠️",
  error: "❌",
};

const levelWeight: Record<LogLevelSetting, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  silent: 100,
};

export class LoggerConsole implements Logger, AsyncDisposable {
  constructor(
    private readonly level: LogLevelSetting = "info",
    private readonly path: string[] = [],
    private readonly context: LogContext = {},
    private readonly emojiMap: EmojiMap = defaultEmojiMap,
    private readonly transports: LogTransport[] = []
  ) {}

  trace(context: LogContext, message: string): void;
  trace(message: string): void;
  trace(context?: LogContext): LogTemplate;
  trace(first?: LogContext | string, message?: string): LogTemplate | void {
    return this.dispatch("trace", first, message);
  }

  debug(context: LogContext, message: string): void;
  debug(message: string): void;
  debug(context?: LogContext): LogTemplate;
  debug(first?: LogContext | string, message?: string): LogTemplate | void {
    return this.dispatch("debug", first, message);
  }

  info(context: LogContext, message: string): void;
  info(message: string): void;
  info(context?: LogContext): LogTemplate;
  info(first?: LogContext | string, message?: string): LogTemplate | void {
    return this.dispatch("info", first, message);
  }

  warn(context: LogContext, message: string): void;
  warn(message: string): void;
  warn(context?: LogContext): LogTemplate;
  warn(first?: LogContext | string, message?: string): LogTemplate | void {
    return this.dispatch("warn", first, message);
  }

  error(context: LogContext, message: string): void;
  error(message: string): void;
  error(context?: LogContext): LogTemplate;
  error(first?: LogContext | string, message?: string): LogTemplate | void {
    return this.dispatch("error", first, message);
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

  /** transport 由同一棵 logger 樹共用 */
  attachTransport(transport: LogTransport) {
    this.transports.push(transport);
  }

  async [Symbol.asyncDispose]() {
    const transports = this.transports.splice(0);
    await Promise.all(transports.map((t) => t[Symbol.asyncDispose]()));
  }

  private dispatch(
    level: LogLevel,
    first: LogContext | string | undefined,
    message: string | undefined
  ): LogTemplate | undefined {
    if (typeof first === "string") {
      this.write(level, {}, first, first);
      return undefined;
    }
    if (message !== undefined) {
      this.write(level, first ?? {}, message, message);
      return undefined;
    }
    const context = first ?? {};
    return (strings, ...values) => {
      const args: Record<string, unknown> = {};
      let colored = strings[0];
      let plain = strings[0];
      values.forEach((value, i) => {
        args[`__${i}`] = value;
        colored += kleur.green(String(value)) + strings[i + 1];
        plain += String(value) + strings[i + 1];
      });
      this.write(level, { ...context, ...args }, colored, plain);
    };
  }

  private write(
    level: LogLevel,
    callContext: LogContext,
    message: string,
    plainMessage: string
  ) {
    if (levelWeight[level] < levelWeight[this.level]) return;

    const { event, emoji: _emoji, error, ...rest } = {
      ...this.context,
      ...callContext,
    };
    const emoji = this.resolveEmoji(level, callContext.emoji, event);
    const label = [...this.path, event ?? level].join(":");
    const extra = Object.keys(rest).length > 0 ? ` ${stringify(rest)}` : "";
    const line = `${emoji} ${label}: ${message}${extra}`;

    switch (level) {
      case "error":
        console.error(line);
        if (error !== undefined) console.error(formatError(error));
        break;
      case "warn":
        console.warn(line);
        if (error !== undefined) console.warn(formatError(error));
        break;
      case "info":
        console.info(line);
        break;
      default:
        console.debug(line);
    }

    if (this.transports.length === 0) return;
    const record: LogRecord = {
      ...rest,
      time: new Date().toISOString(),
      level,
      path: this.path.join(":"),
      event: event ?? level,
      msg: plainMessage,
    };
    if (error instanceof Error) {
      record.err = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    } else if (error !== undefined) {
      record.error = error;
    }
    for (const transport of this.transports) {
      transport.write(record);
    }
  }

  /**
   * 順序：呼叫時指定 → 事件 → warn/error 等級 → 繼承的 context → 等級
   */
  private resolveEmoji(
    level: LogLevel,
    callEmoji: string | undefined,
    event: string | undefined
  ): string {
    if (callEmoji) return callEmoji;
    if (event && this.emojiMap[event]) return this.emojiMap[event];
    if ((level === "warn" || level === "error") && this.emojiMap[level])
      return this.emojiMap[level];
    if (this.context.emoji) return this.context.emoji;
    return this.emojiMap[level] ?? "";
  }
}

function stringify(value: unknown) {
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

function formatError(error: unknown) {
  if (error instanceof Error) return error.stack ?? `${error.name}: ${error.message}`;
  return stringify(error);
}
