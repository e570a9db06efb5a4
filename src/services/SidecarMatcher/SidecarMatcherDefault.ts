import path from "node:path";

import { DEFAULT_SUFFIXES, MAX_FILENAME_BYTES } from "@/constants";
import { albumNameOf, normalizeFileName } from "@/utils/helper";

import type { FileIndex } from "../FileSystemScanner/FileIndex";
import type {
  MatchResult,
  ParsedTitle,
  SidecarMatcher,
} from "./SidecarMatcher";

/** 重複檔：`photo.jpg(1).json` 表示媒體檔為 `photo(1).jpg` */
const DUPLICATE_MARKER_RE = /\(([1-9][0-9]{0,2})\)\.json$/;

function byteLength(s: string) {
  return Buffer.byteLength(s, "utf8");
}

/**
 * 模擬匯出工具的檔名截斷：檔名超過 maxBytes 時截短主檔名，
 * 讓主檔名＋副檔名剛好等於 maxBytes。
 * 跨越上限的多位元組字元整個捨棄，因此中文等檔名可能略少於上限。
 */
export function truncateTitle(
  title: string,
  maxBytes = MAX_FILENAME_BYTES
): { name: string; extension: string } {
  const extension = path.extname(title);
  const name = title.slice(0, title.length - extension.length);
  if (byteLength(title) <= maxBytes) return { name, extension };

  const budget = maxBytes - byteLength(extension);
  let truncated = "";
  let used = 0;
  for (const char of name) {
    const size = byteLength(char);
    if (used + size > budget) break;
    truncated += char;
    used += size;
  }
  return { name: truncated, extension };
}

/** 從 sidecar 路徑取出 `(N)`，沒有時回傳 undefined */
export function extractDuplicateMarker(sidecarPath: string) {
  const match = DUPLICATE_MARKER_RE.exec(sidecarPath);
  return match ? `(${match[1]})` : undefined;
}

export function parseTitle(title: string, sidecarPath: string): ParsedTitle {
  const { name, extension } = truncateTitle(normalizeFileName(title));
  return { name, extension, duplicateMarker: extractDuplicateMarker(sidecarPath) };
}

export function buildCandidateName(parsed: ParsedTitle, suffix: string) {
  return `${parsed.name}${suffix}${parsed.duplicateMarker ?? ""}${parsed.extension}`;
}

export class SidecarMatcherDefault implements SidecarMatcher {
  readonly suffixes: readonly string[];

  constructor(options?: { suffixes?: readonly string[] }) {
    this.suffixes = options?.suffixes ?? DEFAULT_SUFFIXES;
  }

  /** 依設定順序產生候選檔名 */
  candidates(sidecarPath: string, title: string) {
    const parsed = parseTitle(title, sidecarPath);
    return this.suffixes.map((suffix) => ({
      suffix,
      fileName: buildCandidateName(parsed, suffix),
    }));
  }

  resolve(sidecarPath: string, title: string, index: FileIndex): MatchResult {
    const albumName = albumNameOf(sidecarPath);

    // 第一個命中的後綴即採用，其餘後綴不再嘗試
    for (const { suffix, fileName } of this.candidates(sidecarPath, title)) {
      const records = index.get(albumName, fileName);
      if (records) {
        return { found: true, sidecarPath, title, records, suffix, fileName };
      }
    }
    return { found: false, sidecarPath, title, records: [] };
  }
}
