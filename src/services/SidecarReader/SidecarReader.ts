import type { Result } from "~shared/utils/Result";

import type { SidecarMetadata } from "@/types";

export type SidecarReadError = {
  type: "READ_FAILED" | "PARSE_FAILED" | "NOT_A_SIDECAR" | "INVALID_TIMESTAMP";
  message: string;
};

export interface SidecarReader {
  /**
   * 讀取並驗證 sidecar。
   * 缺少 title 或 photoTakenTime 的 JSON（例如相簿的 metadata.json）回傳 NOT_A_SIDECAR。
   */
  read(filePath: string): Promise<Result<SidecarMetadata, SidecarReadError>>;
}
