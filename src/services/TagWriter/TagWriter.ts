import type { Result } from "~shared/utils/Result";

import type { TagMap } from "./TagBuilder";

export type TagWriteError = {
  type: "WRITE_FAILED" | "UNAVAILABLE";
  message: string;
};

export interface TagWriter {
  /**
   * 將標籤寫入檔案（直接覆寫，不留備份）。
   * 逾時也視為一般失敗。
   */
  writeTags(filePath: string, tags: TagMap): Promise<Result<void, TagWriteError>>;

  /** 確認外部工具可用 */
  version(): Promise<Result<string, TagWriteError>>;
}
