import type { ObjectEncodingOptions, PathLike } from "node:fs";
import { mkdir, rm, symlink } from "node:fs/promises";
import path from "node:path";
import { afterAll, afterEach, describe, expect, test, vi } from "vitest";

import { buildTestLogger } from "~shared/testkit/TestLogger";
import { expectErr, expectOk } from "~shared/testkit/ExpectResult";

import { FileSystemScannerDefault } from "@/services/FileSystemScanner";

import { resetDir, writeFiles } from "~test/fakes/SidecarFixture";

const tmpDir = "test/tmp/scanner";

/** 列在這裡的資料夾（絕對路徑）讀取時丟出 EACCES */
const { deniedDirs } = vi.hoisted(() => ({ deniedDirs: new Set<string>() }));

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return {
    ...actual,
    readdir: async (
      dir: PathLike,
      options?: ObjectEncodingOptions & { withFileTypes: true }
    ) => {
      if (deniedDirs.has(String(dir))) {
        throw Object.assign(
          new Error(`EACCES: permission denied, scandir '${String(dir)}'`),
          { code: "EACCES" }
        );
      }
      return options ? actual.readdir(dir, options) : actual.readdir(dir);
    },
  };
});

describe("FileSystemScannerDefault", () => {
  afterEach(() => {
    deniedDirs.clear();
  });

  afterAll(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  test("區分 sidecar 與媒體檔，相簿為上層資料夾名稱", async () => {
    await resetDir(tmpDir);
    await writeFiles(tmpDir, {
      "Album1/b.jpg": "b",
      "Album1/a.jpg": "a",
      "Album1/a.jpg.json": "{}",
      "Album1/Nested/c.png": "c",
      "Album2/d.mp4": "d",
      "root.JSON": "x",
    });

    const scanner = new FileSystemScannerDefault(buildTestLogger());
    const result = await scanner.scan(tmpDir);

    expectOk(result);
    const root = path.resolve(tmpDir);
    expect(result.value.sidecarPaths).toEqual([
      path.join(root, "Album1", "a.jpg.json"),
    ]);
    // 同層檔案先於子資料夾，依名稱排序
    expect(
      result.value.mediaRecords.map((r) => `${r.albumName}/${r.fileName}`)
    ).toEqual([
      "scanner/root.JSON",
      "Album1/a.jpg",
      "Album1/b.jpg",
      "Nested/c.png",
      "Album2/d.mp4",
    ]);
    expect(result.value.index.has("Album1", "a.jpg")).toBe(true);
    expect(result.value.index.has("Nested", "c.png")).toBe(true);
    expect(result.value.skippedDirectories).toEqual([]);
  });

  test("不同資料夾中的同名檔案會放在各自相簿的 key 下", async () => {
    await resetDir(tmpDir);
    await writeFiles(tmpDir, {
      "X/Album/p.jpg": "1",
      "Y/Album/p.jpg": "2",
    });

    const scanner = new FileSystemScannerDefault(buildTestLogger());
    const result = await scanner.scan(tmpDir);

    expectOk(result);
    const records = result.value.index.get("Album", "p.jpg");
    expect(records?.map((r) => r.filePath)).toEqual([
      path.resolve(tmpDir, "X/Album/p.jpg"),
      path.resolve(tmpDir, "Y/Album/p.jpg"),
    ]);
    expect(result.value.index.keyCount).toBe(1);
    expect(result.value.index.recordCount).toBe(2);
  });

  test("回報掃描進度，最後一次 current 等於 total", async () => {
    await resetDir(tmpDir);
    await writeFiles(tmpDir, {
      "A/1.jpg": "1",
      "A/1.jpg.json": "{}",
      "B/2.jpg": "2",
    });

    const calls: Array<[number, number, string]> = [];
    const scanner = new FileSystemScannerDefault(buildTestLogger());
    await scanner.scan(tmpDir, {
      onProgress: (current, total, message) =>
        calls.push([current, total, message]),
    });

    expect(calls.at(-1)).toEqual([3, 3, "掃描完成"]);
    expect(calls.slice(0, -1).every(([, total]) => total === 0)).toBe(true);
  });

  test("不跟隨指向資料夾的符號連結，指向檔案的連結視為媒體檔", async () => {
    await resetDir(tmpDir);
    await writeFiles(tmpDir, { "Real/x.jpg": "x" });
    await symlink(path.resolve(tmpDir, "Real"), path.join(tmpDir, "Link"));
    await symlink(
      path.resolve(tmpDir, "Real/x.jpg"),
      path.join(tmpDir, "y.jpg")
    );

    const scanner = new FileSystemScannerDefault(buildTestLogger());
    const result = await scanner.scan(tmpDir);

    expectOk(result);
    expect(
      result.value.mediaRecords.map((r) => `${r.albumName}/${r.fileName}`)
    ).toEqual(["scanner/y.jpg", "Real/x.jpg"]);
    expect(result.value.index.has("Link", "x.jpg")).toBe(false);
  });

  test("無法讀取的子資料夾會略過並記錄，其餘繼續掃描", async () => {
    await resetDir(tmpDir);
    await writeFiles(tmpDir, {
      "A/a.jpg": "a",
      "Locked/b.jpg": "b",
      "Z/z.jpg": "z",
    });
    const locked = path.resolve(tmpDir, "Locked");
    deniedDirs.add(locked);

    const scanner = new FileSystemScannerDefault(buildTestLogger());
    const result = await scanner.scan(tmpDir);

    expectOk(result);
    expect(result.value.skippedDirectories).toEqual([
      {
        path: locked,
        message: `EACCES: permission denied, scandir '${locked}'`,
      },
    ]);
    expect(
      result.value.mediaRecords.map((r) => `${r.albumName}/${r.fileName}`)
    ).toEqual(["A/a.jpg", "Z/z.jpg"]);
  });

  test("根目錄無法讀取時回傳錯誤", async () => {
    await resetDir(tmpDir);
    deniedDirs.add(path.resolve(tmpDir));

    const scanner = new FileSystemScannerDefault(buildTestLogger());
    const result = await scanner.scan(tmpDir);

    expectErr(result);
    expect(result.error.type).toBe("SCAN_FAILED");
  });

  test("遇到不存在的路徑應回傳錯誤", async () => {
    const scanner = new FileSystemScannerDefault(buildTestLogger());
    const result = await scanner.scan("no_such_path");
    expectErr(result);
    expect(result.error.type).toBe("SCAN_FAILED");
  });

  test("空資料夾得到空結果", async () => {
    await resetDir(tmpDir);
    await mkdir(path.join(tmpDir, "Empty"));

    const scanner = new FileSystemScannerDefault(buildTestLogger());
    const result = await scanner.scan(tmpDir);

    expectOk(result);
    expect(result.value.sidecarPaths).toEqual([]);
    expect(result.value.mediaRecords).toEqual([]);
    expect(result.value.index.albumCount).toBe(0);
  });
});
