import type { FileIndex } from "@/services/FileSystemScanner/FileIndex";

export type MediaRecord = {
  fileName: string;
  /** 絕對路徑 */
  filePath: string;
  /** 上層資料夾名稱 */
  albumName: string;

  // 套用比對結果後才有
  outputPath?: string;
  sidecarPath?: string;
  processedAt?: string;
};

export type GeoPoint = {
  latitude: number;
  longitude: number;
  altitude: number;
};

export type SidecarMetadata = {
  filePath: string;
  /** 匯出工具截斷前的原始檔名 */
  title: string;
  captureTime: Date;
  geo?: GeoPoint;
  people: string[];
  description: string;
};

export type ProcessingStats = {
  processed: number;
  skipped: number;
  /** 複製等 I/O 錯誤 */
  errors: number;
  /** 寫入標籤失敗，與複製錯誤分開計算 */
  tagErrors: number;
  withGeo: number;
  withPeople: number;
  unmatchedSidecars: number;
  unmatchedMedia: number;
};

export type ProcessingPhase =
  | "SCANNING"
  | "MATCHING"
  | "COPYING_UNMATCHED"
  | "DONE";

export type RunFingerprint = {
  sourcePath: string;
  /** 使用者指定的目標，不是實際輸出目錄 */
  destinationPath: string;
  suffixes: string[];
};

export type ProcessingState = {
  version: 1;
  phase: ProcessingPhase;
  fingerprint: RunFingerprint;
  completedSidecars: string[];
  completedMedia: string[];
  /** 比對成功但複製失敗，複製未比對檔案時改用對應的原因 */
  failedMedia: string[];
  /** 累計統計 */
  stats: ProcessingStats;
  complete: boolean;
  startedAt: string;
  updatedAt: string;
};

/** (current, total, message)，total 為 0 表示無法估計總數 */
export type ProgressCallback = (
  current: number,
  total: number,
  message: string
) => void;

export type ScanResult = {
  sidecarPaths: string[];
  mediaRecords: MediaRecord[];
  index: FileIndex;
  skippedDirectories: Array<{ path: string; message: string }>;
};

export type ProcessedRecord = {
  sourcePath: string;
  outputPath: string;
  sidecarPath: string;
  processedAt: string;
};

export type UnmatchedItem = {
  sourcePath: string;
  reason: string;
  title?: string;
  outputPath?: string;
};

export type FailedItem = {
  sourcePath: string;
  message: string;
};
