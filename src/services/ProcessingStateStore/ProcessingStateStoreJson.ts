import { Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import { META_DIR_NAME, STATE_FILE_NAME } from "@/constants";
import type { ProcessingState } from "@/types";

import type {
  ProcessingStateStore,
  StateReadError,
  StateWriteError,
} from "./ProcessingStateStore";

const count = t.Integer({ minimum: 0 });

const stateSchema = t.Object({
  version: t.Literal(1),
  phase: t.Union([
    t.Literal("SCANNING"),
    t.Literal("MATCHING"),
    t.Literal("COPYING_UNMATCHED"),
    t.Literal("DONE"),
  ]),
  fingerprint: t.Object({
    sourcePath: t.String(),
    destinationPath: t.String(),
    suffixes: t.Array(t.String()),
  }),
  completedSidecars: t.Array(t.String()),
  completedMedia: t.Array(t.String()),
  failedMedia: t.Array(t.String()),
  stats: t.Object({
    processed: count,
    skipped: count,
    errors: count,
    tagErrors: count,
    withGeo: count,
    withPeople: count,
    unmatchedSidecars: count,
    unmatchedMedia: count,
  }),
  complete: t.Boolean(),
  startedAt: t.String(),
  updatedAt: t.String(),
});

export function stateFilePath(outputDir: string) {
  return path.join(outputDir, META_DIR_NAME, STATE_FILE_NAME);
}

function isNotFound(error: unknown) {
  return (
    error instanceof Error && "code" in error && error.code === "ENOENT"
  );
}

function messageOf(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

export class ProcessingStateStoreJson implements ProcessingStateStore {
  async read(
    outputDir: string
  ): Promise<Result<ProcessingState | undefined, StateReadError>> {
    const filePath = stateFilePath(outputDir);
    let raw: string;
    try {
      raw = await readFile(filePath, "utf8");
    } catch (error) {
      if (isNotFound(error)) return ok(undefined);
      return err({ type: "READ_FAILED", message: messageOf(error) });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      return err({ type: "CORRUPT", message: messageOf(error) });
    }
    if (!Value.Check(stateSchema, json)) {
      const first = Value.Errors(stateSchema, json).First();
      return err({
        type: "CORRUPT",
        message: first ? `${first.path} ${first.message}` : "格式不符",
      });
    }
    return ok(json);
  }

  /** 先寫暫存檔再 rename，中斷時不會留下寫一半的狀態檔 */
  async write(
    outputDir: string,
    state: ProcessingState
  ): Promise<Result<string, StateWriteError>> {
    const filePath = stateFilePath(outputDir);
    const tmpPath = `${filePath}.tmp`;
    try {
      await mkdir(path.dirname(filePath), { recursive: true });
      await writeFile(tmpPath, JSON.stringify(state, null, 2), "utf8");
      await rename(tmpPath, filePath);
      return ok(filePath);
    } catch (error) {
      return err({ type: "WRITE_FAILED", message: messageOf(error) });
    }
  }
}
