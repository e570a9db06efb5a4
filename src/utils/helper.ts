import { mkdir, stat } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { stdin as input, stdout as output } from "node:process";
import { createInterface } from "node:readline/promises";

import type { Logger } from "~shared/Logger";
import { type Result, err, ok } from "~shared/utils/Result";

export async function confirm(logger: Logger, question: string) {
  const rl = createInterface({ input, output });
  const ans = (await rl.question(question)).trim().toLowerCase();
  rl.close();
  logger.debug({ event: "confirm", answer: ans })`${question}`;
  return ans === "y" || ans === "yes";
}

export function expandHome(p: string) {
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

export async function exists(p: string) {
  try {
    await stat(p);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(p: string) {
  try {
    return (await stat(p)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * 回傳不存在的路徑，已存在時加上 (n)。
 * - 檔案：`/a/photo.jpg` → `/a/photo(1).jpg`
 * - 資料夾：`/a/out` → `/a/out(1)`
 */
export async function uniquePath(p: string, isDir = false) {
  if (isDir) {
    if (!(await exists(p))) return p;
    let n = 1;
    while (await exists(`${p}(${n})`)) n++;
    return `${p}(${n})`;
  }
  if (!(await exists(p))) return p;
  const ext = path.extname(p);
  const base = p.slice(0, p.length - ext.length);
  let n = 1;
  while (await exists(`${base}(${n})${ext}`)) n++;
  return `${base}(${n})${ext}`;
}

export type CheckoutDirError = { type: "IS_FILE" | "MKDIR_FAILED"; message: string };

/**
 * 確保資料夾存在。
 * onlyNew 時一律建立新的資料夾（必要時加上 (n)）。
 */
export async function checkoutDir(
  p: string,
  onlyNew = false
): Promise<Result<string, CheckoutDirError>> {
  if ((await exists(p)) && !(await isDirectory(p))) {
    return err({ type: "IS_FILE", message: `${p} 已存在且不是資料夾` });
  }
  const target = onlyNew ? await uniquePath(p, true) : p;
  try {
    await mkdir(target, { recursive: true });
    return ok(target);
  } catch (e) {
    return err({
      type: "MKDIR_FAILED",
      message: e instanceof Error ? e.message : String(e),
    });
  }
}

/** 上層資料夾名稱即相簿名稱 */
export function albumNameOf(filePath: string) {
  return path.basename(path.dirname(filePath));
}

/** macOS 回傳 NFD 檔名，統一成 NFC 再比對 */
export function normalizeFileName(name: string) {
  return name.normalize("NFC");
}

/** child 是否等於 parent 或位於其下 */
export function isSameOrInside(parent: string, child: string) {
  const rel = path.relative(path.resolve(parent), path.resolve(child));
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}
