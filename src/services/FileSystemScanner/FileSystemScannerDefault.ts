import type { Dirent } from "node:fs";
import { readdir } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import { SIDECAR_EXTENSION } from "@/constants";
import type { MediaRecord, ProgressCallback, ScanResult } from "@/types";
import { isDirectory } from "@/utils/helper";

import { FileIndex } from "./FileIndex";
import { type FileSystemScanner, type ScanError } from "./FileSystemScanner";

const PROGRESS_INTERVAL = 100;

async function readEntries(dir: string): Promise<Result<Dirent[], string>> {
  try {
    return ok(await readdir(dir, { withFileTypes: true }));
  } catch (e) {
    return err(e instanceof Error ? e.message : String(e));
  }
}

function byName(a: { name: string }, b: { name: string }) {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

export class FileSystemScannerDefault implements FileSystemScanner {
  constructor(private readonly logger: Logger) {}

  async scan(
    rootPath: string,
    options?: { onProgress?: ProgressCallback }
  ): Promise<Result<ScanResult, ScanError>> {
    const onProgress = options?.onProgress;
    const root = path.resolve(rootPath);

    const rootEntries = await readEntries(root);
    if (isErr(rootEntries)) {
      return err({ type: "SCAN_FAILED", message: rootEntries.error });
    }

    const sidecarPaths: string[] = [];
    const mediaRecords: MediaRecord[] = [];
    const skippedDirectories: ScanResult["skippedDirectories"] = [];
    let found = 0;

    // 先處理同層檔案，再依名稱順序進入子資料夾
    const visit = async (dir: string, entries: Dirent[]) => {
      const albumName = path.basename(dir);
      if (found > 0) onProgress?.(found, 0, `掃描中：${albumName}`);

      const subDirs: string[] = [];
      for (const entry of [...entries].sort(byName)) {
        const fullPath = path.join(dir, entry.name);
        if (entry.isDirectory()) {
          subDirs.push(fullPath);
          continue;
        }
        // 不跟隨指向資料夾的連結，其餘非一般檔案也略過
        if (entry.isSymbolicLink()) {
          if (await isDirectory(fullPath)) continue;
        } else if (!entry.isFile()) {
          continue;
        }
        if (entry.name.endsWith(SIDECAR_EXTENSION)) {
          sidecarPaths.push(fullPath);
        } else {
          mediaRecords.push({ fileName: entry.name, filePath: fullPath, albumName });
        }
        found++;
        if (found % PROGRESS_INTERVAL === 0) {
          onProgress?.(found, 0, `已找到 ${found} 個檔案`);
        }
      }

      for (const subDir of subDirs) {
        const subEntries = await readEntries(subDir);
        if (isErr(subEntries)) {
          skippedDirectories.push({ path: subDir, message: subEntries.error });
          this.logger.warn({
            event: "dir-skipped",
            dir: subDir,
            error: subEntries.error,
          })`無法讀取資料夾，略過 ${subDir}`;
          continue;
        }
        await visit(subDir, subEntries.value);
      }
    };

    await visit(root, rootEntries.value);

    const index = FileIndex.fromRecords(mediaRecords);
    const total = sidecarPaths.length + mediaRecords.length;
    onProgress?.(total, total, "掃描完成");
    this.logger.debug({
      event: "scanned",
      root,
      sidecars: sidecarPaths.length,
      media: mediaRecords.length,
    })`掃描 ${root} 完成`;

    return ok({ sidecarPaths, mediaRecords, index, skippedDirectories });
  }
}
