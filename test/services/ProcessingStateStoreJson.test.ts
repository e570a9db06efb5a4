import { readFile, rm } from "node:fs/promises";
import path from "node:path";
import { afterAll, beforeEach, describe, expect, test } from "vitest";

import { expectErr, expectOk } from "~shared/testkit/ExpectResult";

import {
  ProcessingStateStoreJson,
  stateFilePath,
} from "@/services/ProcessingStateStore";
import type { ProcessingState } from "@/types";
import { emptyStats } from "@/utils/stats";

import { resetDir, writeFiles } from "~test/fakes/SidecarFixture";

const tmpDir = "test/tmp/state-store";

function sampleState(): ProcessingState {
  return {
    version: 1,
    phase: "MATCHING",
    fingerprint: {
      sourcePath: "/photos/export",
      destinationPath: "/photos/export_reconciled",
      suffixes: ["", "-edited"],
    },
    completedSidecars: ["/photos/export/A/a.jpg.json"],
    completedMedia: ["/photos/export/A/a.jpg"],
    failedMedia: ["/photos/export/A/b.jpg"],
    stats: { ...emptyStats(), processed: 1 },
    complete: false,
    startedAt: "2024-01-01T00:00:00.000Z",
    updatedAt: "2024-01-01T00:00:01.000Z",
  };
}

describe("ProcessingStateStoreJson", () => {
  beforeEach(async () => {
    await resetDir(tmpDir);
  });

  afterAll(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  test("沒有狀態檔時回傳 undefined", async () => {
    const result = await new ProcessingStateStoreJson().read(tmpDir);
    expectOk(result);
    expect(result.value).toBeUndefined();
  });

  test("寫入後可讀回相同內容", async () => {
    const store = new ProcessingStateStoreJson();
    const written = await store.write(tmpDir, sampleState());
    expectOk(written);
    expect(written.value).toBe(
      path.join(tmpDir, "_reconcile", "processing_state.json")
    );

    const read = await store.read(tmpDir);
    expectOk(read);
    expect(read.value).toEqual(sampleState());
  });

  test("覆寫時不留下暫存檔", async () => {
    const store = new ProcessingStateStoreJson();
    await store.write(tmpDir, sampleState());
    await store.write(tmpDir, { ...sampleState(), phase: "DONE", complete: true });

    const raw = JSON.parse(await readFile(stateFilePath(tmpDir), "utf8"));
    expect(raw.phase).toBe("DONE");
    await expect(readFile(`${stateFilePath(tmpDir)}.tmp`)).rejects.toThrow();
  });

  test("內容損毀時回傳 CORRUPT", async () => {
    await writeFiles(tmpDir, { "_reconcile/processing_state.json": "{ oops" });
    const result = await new ProcessingStateStoreJson().read(tmpDir);
    expectErr(result);
    expect(result.error.type).toBe("CORRUPT");
  });

  test("欄位不符時回傳 CORRUPT", async () => {
    await writeFiles(tmpDir, {
      "_reconcile/processing_state.json": JSON.stringify({
        ...sampleState(),
        phase: "UNKNOWN",
      }),
    });
    const result = await new ProcessingStateStoreJson().read(tmpDir);
    expectErr(result);
    expect(result.error.type).toBe("CORRUPT");
  });

  test("輸出目錄是檔案時寫入失敗", async () => {
    await writeFiles(tmpDir, { "not-a-dir": "x" });
    const result = await new ProcessingStateStoreJson().write(
      path.join(tmpDir, "not-a-dir"),
      sampleState()
    );
    expectErr(result);
    expect(result.error.type).toBe("WRITE_FAILED");
  });
});
