import { cac } from "cac";

import { createDefaultLoggerFromEnv } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";

import { registerDryRun } from "./app/DryRun";
import { registerExtend } from "./app/Extend";
import { registerProcess } from "./app/Process";

const logger = createDefaultLoggerFromEnv();
const cli = cac("export-reconciler");

registerDryRun(cli, logger);
registerProcess(cli, logger);
registerExtend(cli, logger);

cli.help();
cli.parse(process.argv, { run: false });

if (!cli.matchedCommand) {
  cli.outputHelp();
  process.exit(0);
}

try {
  await cli.runMatchedCommand();
} catch (error) {
  logger.error({ error }, "執行命令時發生錯誤");
  process.exitCode = 1;
} finally {
  await dispose(logger);
}
