import type { Result } from "~shared/utils/Result";

import type {
  FailedItem,
  ProcessedRecord,
  ProcessingStats,
  ProgressCallback,
  UnmatchedItem,
} from "@/types";

export type RunError = {
  type:
    | "SOURCE_NOT_FOUND"
    | "SCAN_FAILED"
    | "INVALID_SUFFIXES"
    | "DESTINATION_UNUSABLE"
    | "DESTINATION_INSIDE_SOURCE"
    | "PROCESSED_DIR_NOT_FOUND"
    | "STATE_WRITE_FAILED";
  message: string;
};

export type RunStatus = "DONE" | "CANCELLED" | "ALREADY_COMPLETE";

type CommonOptions = {
  sourcePath: string;
  /** 預設為 `<來源>_reconciled` */
  destinationPath?: string;
  /** 預設 `["", "-edited"]` */
  suffixes?: readonly string[];
  onProgress?: ProgressCallback;
  signal?: AbortSignal;
};

export type DryRunOptions = CommonOptions & {
  /** 為 true 時確認標籤工具可用，預設 true */
  writeTags?: boolean;
};

export type ProcessOptions = CommonOptions & {
  /** 預設 true */
  writeTags?: boolean;
  /** 忽略目標中既有的狀態，在原處重新開始 */
  force?: boolean;
  renameMotionPhotos?: boolean;
};

export type ExtendOptions = CommonOptions;

export type DryRunSummary = {
  status: "DONE" | "CANCELLED";
  sourcePath: string;
  sidecars: number;
  media: number;
  albums: number;
  matchedSidecars: number;
  matchedMedia: number;
  unmatchedSidecars: number;
  unmatchedMedia: number;
  withGeo: number;
  withPeople: number;
  skippedDirectories: number;
  tagWriterVersion?: string;
  tagWriterError?: string;
};

export type RunReport = {
  status: RunStatus;
  sourcePath: string;
  outputPath: string;
  /** 由既有的狀態檔接續 */
  resumed: boolean;
  /** 本次執行 */
  stats: ProcessingStats;
  /** 含先前中斷的執行 */
  cumulativeStats: ProcessingStats;
  processed: ProcessedRecord[];
  unmatchedSidecars: UnmatchedItem[];
  unmatchedMedia: UnmatchedItem[];
  failures: FailedItem[];
  startedAt: string;
  finishedAt: string;
  elapsedMs: number;
  reportPath?: string;
};

export interface ExportOrchestrator {
  /** 只掃描與比對，不複製也不寫標籤 */
  dryRun(options: DryRunOptions): Promise<Result<DryRunSummary, RunError>>;

  /**
   * 完整流程：比對、複製、設定時間、寫標籤，再複製未比對的檔案。
   * 目標已有相同設定的未完成狀態時接續執行。
   */
  process(options: ProcessOptions): Promise<Result<RunReport, RunError>>;

  /** 對已輸出的 Processed 資料夾補寫標籤，不重新複製 */
  extend(options: ExtendOptions): Promise<Result<RunReport, RunError>>;
}
