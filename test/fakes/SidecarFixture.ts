import { mkdir, rm, writeFile } from "node:fs/promises";
import path from "node:path";

export type SidecarJsonInput = {
  title: string;
  timestamp?: string | number;
  geo?: { latitude: number; longitude: number; altitude?: number };
  people?: string[];
  description?: string;
};

export function sidecarJson(input: SidecarJsonInput) {
  return JSON.stringify({
    title: input.title,
    description: input.description ?? "",
    photoTakenTime: { timestamp: String(input.timestamp ?? 1_600_000_000) },
    ...(input.geo ? { geoData: input.geo } : {}),
    ...(input.people ? { people: input.people.map((name) => ({ name })) } : {}),
  });
}

/** 清空並建立測試用資料夾 */
export async function resetDir(dir: string) {
  await rm(dir, { recursive: true, force: true });
  await mkdir(dir, { recursive: true });
}

/** 依相對路徑寫入檔案，自動建立上層資料夾 */
export async function writeFiles(root: string, files: Record<string, string>) {
  for (const [relative, content] of Object.entries(files)) {
    const filePath = path.join(root, relative);
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, content);
  }
}
