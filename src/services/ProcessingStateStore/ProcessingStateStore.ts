import type { Result } from "~shared/utils/Result";

import type { ProcessingState } from "@/types";

export type StateReadError = {
  type: "READ_FAILED" | "CORRUPT";
  message: string;
};

export type StateWriteError = { type: "WRITE_FAILED"; message: string };

export interface ProcessingStateStore {
  /** 尚未有狀態檔時回傳 ok(undefined) */
  read(
    outputDir: string
  ): Promise<Result<ProcessingState | undefined, StateReadError>>;

  /** 成功時回傳狀態檔路徑 */
  write(
    outputDir: string,
    state: ProcessingState
  ): Promise<Result<string, StateWriteError>>;
}
