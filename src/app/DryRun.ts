import type { CAC } from "cac";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";
import { isErr } from "~shared/utils/Result";

import { getAppConfig } from "@/config";

import {
  createProgressLogger,
  createRuntime,
  describeRunError,
  parseSuffixes,
} from "./common";

type DryRunCliOptions = {
  suffixes?: string | number;
  tags: boolean;
};

export function registerDryRun(cli: CAC, baseLogger: Logger) {
  cli
    .command("dry-run <source>", "只掃描與比對，列出會處理的數量，不複製任何檔案")
    .option("--suffixes <list>", "依序嘗試的檔名後綴，以逗號分隔，例如 \",-edited\"")
    .option("--no-tags", "不檢查 ExifTool")
    .action(async (source: string, options: DryRunCliOptions) => {
      const logger = baseLogger.extend("dry-run");
      const config = getAppConfig();
      const runtime = createRuntime(logger, config);
      try {
        const result = await runtime.orchestrator.dryRun({
          sourcePath: source,
          suffixes: parseSuffixes(options.suffixes),
          writeTags: options.tags,
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

        const summary = result.value;
        await new DumpWriterDefault(logger, config.reportDir).dump(
          "dry-run",
          summary
        );
        logger.info({
          emoji: "🧮",
          matchedSidecars: summary.matchedSidecars,
          matchedMedia: summary.matchedMedia,
          unmatchedSidecars: summary.unmatchedSidecars,
          unmatchedMedia: summary.unmatchedMedia,
        })`${summary.albums} 個相簿，${summary.sidecars} 個 sidecar，${summary.media} 個媒體檔`;
        if (summary.tagWriterError) {
          logger.warn({
            error: summary.tagWriterError,
          })`ExifTool 無法使用，處理時請加上 --no-tags`;
        } else if (summary.tagWriterVersion) {
          logger.info({ emoji: "🔧" })`ExifTool ${summary.tagWriterVersion}`;
        }
      } finally {
        await dispose(runtime);
      }
    });
}
