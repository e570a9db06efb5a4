import type { Result } from "~shared/utils/Result";

import type { MediaRecord, SidecarMetadata } from "@/types";

import type { TagWriteError } from "../TagWriter/TagWriter";

export type ProcessError = {
  type: "MKDIR_FAILED" | "COPY_FAILED";
  message: string;
};

export type MatchedCopy = {
  outputPath: string;
  /** 有標籤並成功寫入 */
  tagged: boolean;
  /** 寫入標籤失敗，複製本身仍算成功 */
  tagError?: TagWriteError;
};

export type UnmatchedCopy = {
  outputPath: string;
  reason: string;
  motionPhoto: boolean;
};

export interface MediaProcessor {
  /** 複製到 Processed/<相簿>，設定時間並寫入標籤 */
  processMatched(
    record: MediaRecord,
    metadata: SidecarMetadata
  ): Promise<Result<MatchedCopy, ProcessError>>;

  /** 原封不動複製到 Unprocessed/<相簿> */
  copyUnmatched(
    record: MediaRecord,
    reason?: string
  ): Promise<Result<UnmatchedCopy, ProcessError>>;

  /**
   * 只寫標籤，不複製。
   * 沒有任何標籤時回傳 ok(false)。
   */
  applyTags(
    filePath: string,
    metadata: SidecarMetadata
  ): Promise<Result<boolean, TagWriteError>>;
}
