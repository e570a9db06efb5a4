import { ExifTool } from "exiftool-vendored";

import { type Result, err, ok } from "~shared/utils/Result";

import { DEFAULT_TAG_WRITE_TIMEOUT_MS } from "@/constants";

import { type TagMap, toWriteArgs } from "./TagBuilder";
import type { TagWriteError, TagWriter } from "./TagWriter";

function messageOf(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

export class TagWriterExifTool implements TagWriter, AsyncDisposable {
  private readonly exiftool: ExifTool;

  constructor(options?: { timeoutMs?: number }) {
    this.exiftool = new ExifTool({
      taskTimeoutMillis: options?.timeoutMs ?? DEFAULT_TAG_WRITE_TIMEOUT_MS,
    });
  }

  async writeTags(
    filePath: string,
    tags: TagMap
  ): Promise<Result<void, TagWriteError>> {
    const args = toWriteArgs(tags);
    if (args.length === 0) return ok();
    try {
      await this.exiftool.write(
        filePath,
        {},
        { writeArgs: ["-overwrite_original", ...args] }
      );
      return ok();
    } catch (error) {
      return err({ type: "WRITE_FAILED", message: messageOf(error) });
    }
  }

  async version(): Promise<Result<string, TagWriteError>> {
    try {
      return ok(await this.exiftool.version());
    } catch (error) {
      return err({ type: "UNAVAILABLE", message: messageOf(error) });
    }
  }

  async [Symbol.asyncDispose]() {
    await this.exiftool.end();
  }
}
