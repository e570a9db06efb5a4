import type { CAC } from "cac";

import type { Logger } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";
import { isErr } from "~shared/utils/Result";

import { getAppConfig } from "@/config";
import type { RunReport } from "@/services/ExportOrchestrator/ExportOrchestrator";
import { confirm } from "@/utils/helper";

import {
  createProgressLogger,
  createRuntime,
  describeRunError,
  parseSuffixes,
} from "./common";

type ProcessCliOptions = {
  dest?: string;
  suffixes?: string | number;
  tags: boolean;
  force?: boolean;
  renameMotionPhotos?: boolean;
  yes?: boolean;
};

export function logRunReport(logger: Logger, report: RunReport) {
  const { stats } = report;
  logger.info({
    emoji: "📊",
    skipped: stats.skipped,
    withGeo: stats.withGeo,
    withPeople: stats.withPeople,
  })`處理 ${stats.processed}，未比對 sidecar ${stats.unmatchedSidecars}，未比對媒體 ${stats.unmatchedMedia}`;
  if (stats.errors > 0 || stats.tagErrors > 0) {
    logger.warn({
      errors: stats.errors,
      tagErrors: stats.tagErrors,
    })`有 ${stats.errors + stats.tagErrors} 個項目失敗，詳見報告`;
  }
}

export function registerProcess(cli: CAC, baseLogger: Logger) {
  cli
    .command(
      "process <source>",
      "比對 sidecar 並複製到輸出目錄，設定拍攝時間、寫入位置與人物標籤"
    )
    .option("--dest <dir>", "輸出目錄，預設為 <source>_reconciled")
    .option("--suffixes <list>", "依序嘗試的檔名後綴，以逗號分隔，例如 \",-edited\"")
    .option("--no-tags", "只複製與設定時間，不寫入標籤")
    .option("--force", "忽略輸出目錄中既有的進度，重新處理", { default: false })
    .option("--rename-motion-photos", "動態相片的 .MP 改名為 .MP4", {
      default: false,
    })
    .option("--yes", "略過確認直接執行", { default: false })
    .action(async (source: string, options: ProcessCliOptions) => {
      const logger = baseLogger.extend("process");

      if (
        options.force &&
        !options.yes &&
        !(await confirm(logger, "將忽略既有進度並重新處理，是否繼續？ [y/N] "))
      ) {
        logger.warn({ emoji: "⏹️" })`使用者取消`;
        return;
      }

      const runtime = createRuntime(logger, getAppConfig());
      try {
        const result = await runtime.orchestrator.process({
          sourcePath: source,
          destinationPath: options.dest,
          suffixes: parseSuffixes(options.suffixes),
          writeTags: options.tags,
          force: options.force,
          renameMotionPhotos: options.renameMotionPhotos,
          onProgress: createProgressLogger(logger),
          signal: runtime.signal,
        });
        if (isErr(result)) {
          logger.error({
            emoji: "❌",
            type: result.error.type,
          })`${describeRunError(result.error)}：${result.error.message}`;
          process.exitCode = 1;
          return;
        }

        const report = result.value;
        switch (report.status) {
          case "ALREADY_COMPLETE":
            logger.info({ emoji: "✅" })`${report.outputPath} 已處理完成，加上 --force 可重新處理`;
            return;
          case "CANCELLED":
            logRunReport(logger, report);
            logger.warn({ emoji: "⏸️" })`已中斷，再次執行相同指令即可接續`;
            process.exitCode = 130;
            return;
          case "DONE":
            logRunReport(logger, report);
            logger.info({ emoji: "✅" })`輸出至 ${report.outputPath}`;
        }
      } finally {
        await dispose(runtime);
      }
    });
}
