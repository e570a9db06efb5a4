import type { CAC } from "cac";

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
import { logRunReport } from "./Process";

type ExtendCliOptions = {
  dest?: string;
  suffixes?: string | number;
};

export function registerExtend(cli: CAC, baseLogger: Logger) {
  cli
    .command("extend <source>", "對已處理的輸出補寫位置與人物標籤，不重新複製")
    .option("--dest <dir>", "先前的輸出目錄，預設為 <source>_reconciled")
    .option("--suffixes <list>", "依序嘗試的檔名後綴，以逗號分隔")
    .action(async (source: string, options: ExtendCliOptions) => {
      const logger = baseLogger.extend("extend");
      const runtime = createRuntime(logger, getAppConfig());
      try {
        const result = await runtime.orchestrator.extend({
          sourcePath: source,
          destinationPath: options.dest,
          suffixes: parseSuffixes(options.suffixes),
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
        logRunReport(logger, result.value);
        if (result.value.status === "CANCELLED") process.exitCode = 130;
      } finally {
        await dispose(runtime);
      }
    });
}
