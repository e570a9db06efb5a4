import { type Options, type RotatingFileStream, createStream } from "rotating-file-stream";

import type { LogRecord, LogTransport } from "./LogTransport";

export type RfsTransportOptions = {
  /** 檔名，例如 `app.log` */
  filename: string;
  /** 直接傳給 rotating-file-stream 的設定 */
  rfs?: Options;
};

/** 以 JSON Lines 寫入輪替檔案 */
export class RfsTransport implements LogTransport {
  private readonly stream: RotatingFileStream;

  constructor(options: RfsTransportOptions) {
    this.stream = createStream(options.filename, {
      size: "10M",
      maxFiles: 10,
      ...options.rfs,
    });
    this.stream.on("error", (error) => {
      console.error(`RfsTransport 寫入失敗: ${options.filename}`, error);
    });
  }

  write(record: LogRecord) {
    this.stream.write(JSON.stringify(record) + "\n");
  }

  async [Symbol.asyncDispose]() {
    await new Promise<void>((resolve) => this.stream.end(resolve));
  }
}
