import type { LogLevel } from "./Logger";

export type LogRecord = {
  time: string;
  level: LogLevel;
  path: string;
  event: string;
  msg: string;
  err?: { name: string; message: string; stack?: string };
  [key: string]: unknown;
};

export interface LogTransport extends AsyncDisposable {
  write(record: LogRecord): void;
}
