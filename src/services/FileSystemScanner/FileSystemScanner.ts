import type { Result } from "~shared/utils/Result";

import type { ProgressCallback, ScanResult } from "@/types";

export type ScanError = {
  type: "SCAN_FAILED";
  message: string;
};

export interface FileSystemScanner {
  /**
   * 遞迴掃描 rootPath，分出 sidecar 與媒體檔並建立索引。
   * 無法讀取的子資料夾會略過並列在 skippedDirectories；根目錄讀取失敗則回傳錯誤。
   */
  scan(
    rootPath: string,
    options?: { onProgress?: ProgressCallback }
  ): Promise<Result<ScanResult, ScanError>>;
}
