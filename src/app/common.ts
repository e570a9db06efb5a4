import type { Logger } from "~shared/Logger";

import type { AppConfig } from "@/config";
import { DEFAULT_SUFFIXES } from "@/constants";
import { ExportOrchestratorDefault } from "@/services/ExportOrchestrator/ExportOrchestratorDefault";
import type { RunError } from "@/services/ExportOrchestrator/ExportOrchestrator";
import { TagWriterExifTool } from "@/services/TagWriter/TagWriterExifTool";
import type { ProgressCallback } from "@/types";

/**
 * `--suffixes ",-edited"` → `["", "-edited"]`，保留空字串。
 * 未指定時使用預設值。
 */
export function parseSuffixes(raw: string | number | undefined) {
  if (raw === undefined) return [...DEFAULT_SUFFIXES];
  return String(raw).split(",");
}

/** 進度每 intervalMs 最多輸出一次，完成時一定輸出 */
export function createProgressLogger(
  logger: Logger,
  intervalMs = 1000
): ProgressCallback {
  let last = 0;
  return (current, total, message) => {
    const now = Date.now();
    const finished = total > 0 && current === total;
    if (!finished && now - last < intervalMs) return;
    last = now;
    if (total === 0) {
      logger.info({ event: "progress", emoji: "🔎" })`已找到 ${current} 個檔案 ${message}`;
    } else {
      logger.info({ event: "progress", emoji: "⏳" })`${current}/${total} ${message}`;
    }
  };
}

export function describeRunError(error: RunError) {
  switch (error.type) {
    case "SOURCE_NOT_FOUND":
      return "來源資料夾不存在或無法讀取";
    case "SCAN_FAILED":
      return "掃描失敗";
    case "INVALID_SUFFIXES":
      return "後綴設定錯誤";
    case "DESTINATION_UNUSABLE":
      return "無法使用輸出目錄";
    case "DESTINATION_INSIDE_SOURCE":
      return "輸出目錄不可位於來源之內";
    case "PROCESSED_DIR_NOT_FOUND":
      return "輸出目錄沒有 Processed 資料夾";
    case "STATE_WRITE_FAILED":
      return "無法寫入狀態檔";
  }
}

/**
 * 建立一次執行用的 orchestrator，並把 SIGINT 轉成取消訊號。
 * 結束時呼叫 dispose 關閉 ExifTool 並移除 SIGINT 監聽。
 */
export function createRuntime(logger: Logger, config: AppConfig) {
  const tagWriter = new TagWriterExifTool({
    timeoutMs: config.tagWriteTimeoutMs,
  });
  const orchestrator = new ExportOrchestratorDefault(logger, {
    tagWriter,
    stateSaveInterval: config.stateSaveInterval,
    reportDir: config.reportDir,
  });

  const controller = new AbortController();
  const onSigint = () => {
    logger.warn({ event: "sigint", emoji: "⏹️" })`收到中斷訊號，儲存進度後結束`;
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  return {
    orchestrator,
    signal: controller.signal,
    async [Symbol.asyncDispose]() {
      process.off("SIGINT", onSigint);
      await tagWriter[Symbol.asyncDispose]();
    },
  };
}
