import type { MediaRecord } from "@/types";

import type { FileIndex } from "../FileSystemScanner/FileIndex";

export type MatchResult = {
  found: boolean;
  sidecarPath: string;
  title: string;
  /** 命中 key 底下的全部檔案，未命中時為空陣列 */
  records: readonly MediaRecord[];
  /** 命中時使用的後綴 */
  suffix?: string;
  /** 命中時查詢的檔名 */
  fileName?: string;
};

/**
 * title 還原後的檔名組成
 * 例：`photo-edited(1).jpg` → name=photo, suffix=-edited, duplicateMarker=(1), extension=.jpg
 */
export type ParsedTitle = {
  name: string;
  extension: string;
  duplicateMarker?: string;
};

export interface SidecarMatcher {
  /**
   * 依 sidecar 的 title 與自身路徑，找出對應的媒體檔。
   * 相同輸入永遠得到相同結果。
   */
  resolve(sidecarPath: string, title: string, index: FileIndex): MatchResult;
}
