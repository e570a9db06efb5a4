import { format } from "date-fns";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "../Logger";
import { type Result, err, ok } from "../utils/Result";
import type { DumpWriter } from "./DumpWriter";

export class DumpWriterDefault implements DumpWriter {
  constructor(
    private readonly logger: Logger,
    private readonly dir = "dist/reports"
  ) {}

  async dump(name: string, data: unknown): Promise<Result<string, Error>> {
    const fileName = `${format(new Date(), "yyyyMMdd-HHmmss-SSS")}-${name}.json`;
    const filePath = path.join(this.dir, fileName);
    try {
      await mkdir(this.dir, { recursive: true });
      await writeFile(filePath, JSON.stringify(data, null, 2), "utf8");
    } catch (error) {
      this.logger.warn({ event: "dump-failed", error })`報告 ${name} 輸出失敗`;
      return err(error instanceof Error ? error : new Error(String(error)));
    }
    this.logger.info({
      event: "dump",
      emoji: "📝",
      file: filePath,
    })`已輸出報告 ${name}`;
    return ok(filePath);
  }
}
