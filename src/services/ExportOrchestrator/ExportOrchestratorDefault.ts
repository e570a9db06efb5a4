import { stat } from "node:fs/promises";
import path from "node:path";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, isOk, ok } from "~shared/utils/Result";

import {
  DEFAULT_DESTINATION_SUFFIX,
  DEFAULT_STATE_SAVE_INTERVAL,
  DEFAULT_SUFFIXES,
  META_DIR_NAME,
  PROCESSED_DIR_NAME,
} from "@/constants";
import type {
  FailedItem,
  ProcessedRecord,
  ProcessingState,
  ProcessingStats,
  RunFingerprint,
  UnmatchedItem,
} from "@/types";
import {
  checkoutDir,
  exists,
  expandHome,
  isDirectory,
  isSameOrInside,
} from "@/utils/helper";
import { addStats, emptyStats } from "@/utils/stats";

import type { FileSystemScanner } from "../FileSystemScanner/FileSystemScanner";
import { FileSystemScannerDefault } from "../FileSystemScanner/FileSystemScannerDefault";
import type { MediaProcessor } from "../MediaProcessor/MediaProcessor";
import {
  MediaProcessorDefault,
  type MediaProcessorOptions,
} from "../MediaProcessor/MediaProcessorDefault";
import type { ProcessingStateStore } from "../ProcessingStateStore/ProcessingStateStore";
import { ProcessingStateStoreJson } from "../ProcessingStateStore/ProcessingStateStoreJson";
import { SidecarMatcherDefault } from "../SidecarMatcher/SidecarMatcherDefault";
import type { SidecarReader } from "../SidecarReader/SidecarReader";
import { SidecarReaderJson } from "../SidecarReader/SidecarReaderJson";
import { hasLocation } from "../TagWriter/TagBuilder";
import type { TagWriter } from "../TagWriter/TagWriter";
import type {
  DryRunOptions,
  DryRunSummary,
  ExportOrchestrator,
  ExtendOptions,
  ProcessOptions,
  RunError,
  RunReport,
  RunStatus,
} from "./ExportOrchestrator";

export const NO_MATCH_REASON = "找不到對應的媒體檔";
export const COPY_FAILED_REASON = "比對成功但複製失敗";

export type ExportOrchestratorDeps = {
  tagWriter: TagWriter;
  scanner?: FileSystemScanner;
  reader?: SidecarReader;
  stateStore?: ProcessingStateStore;
  createProcessor?: (
    logger: Logger,
    options: MediaProcessorOptions
  ) => MediaProcessor;
  /** 每完成幾個項目存一次狀態 */
  stateSaveInterval?: number;
  /** 報告輸出位置，預設 `<輸出>/_reconcile` */
  reportDir?: string;
};

type Destination =
  | { kind: "fresh"; outputDir: string }
  | { kind: "resume"; outputDir: string; state: ProcessingState }
  | { kind: "complete"; outputDir: string; state: ProcessingState };

/** 一次執行累積的結果，最後轉成 RunReport */
type RunRecords = {
  sourcePath: string;
  outputDir: string;
  startedAt: Date;
  resumed: boolean;
  /** 狀態檔中先前執行的累計 */
  baseStats: ProcessingStats;
  stats: ProcessingStats;
  processed: ProcessedRecord[];
  unmatchedSidecars: UnmatchedItem[];
  unmatchedMedia: UnmatchedItem[];
  failures: FailedItem[];
};

type StatefulRun = RunRecords & {
  state: ProcessingState;
  completedSidecars: Set<string>;
  completedMedia: Set<string>;
  failedMedia: Set<string>;
  sinceSave: number;
};

function messageOf(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

async function validateSource(
  sourcePath: string
): Promise<Result<string, RunError>> {
  const resolved = path.resolve(expandHome(sourcePath));
  try {
    if (!(await stat(resolved)).isDirectory()) {
      return err({
        type: "SOURCE_NOT_FOUND",
        message: `${resolved} 不是資料夾`,
      });
    }
  } catch (error) {
    return err({
      type: "SOURCE_NOT_FOUND",
      message: `無法讀取來源 ${resolved}: ${messageOf(error)}`,
    });
  }
  return ok(resolved);
}

export function validateSuffixes(
  suffixes: readonly string[]
): Result<string[], RunError> {
  if (suffixes.length === 0) {
    return err({ type: "INVALID_SUFFIXES", message: "後綴清單不可為空" });
  }
  if (new Set(suffixes).size !== suffixes.length) {
    return err({ type: "INVALID_SUFFIXES", message: "後綴清單有重複項目" });
  }
  const bad = suffixes.find((s) => s.includes("/") || s.includes("\\"));
  if (bad !== undefined) {
    return err({
      type: "INVALID_SUFFIXES",
      message: `後綴不可包含路徑分隔字元: ${bad}`,
    });
  }
  return ok([...suffixes]);
}

function destinationOf(sourcePath: string, destinationPath?: string) {
  if (destinationPath) return path.resolve(expandHome(destinationPath));
  return `${sourcePath}${DEFAULT_DESTINATION_SUFFIX}`;
}

export function sameFingerprint(a: RunFingerprint, b: RunFingerprint) {
  return (
    a.sourcePath === b.sourcePath &&
    a.destinationPath === b.destinationPath &&
    a.suffixes.length === b.suffixes.length &&
    a.suffixes.every((s, i) => s === b.suffixes[i])
  );
}

export class ExportOrchestratorDefault implements ExportOrchestrator {
  private readonly tagWriter: TagWriter;
  private readonly scanner: FileSystemScanner;
  private readonly reader: SidecarReader;
  private readonly stateStore: ProcessingStateStore;
  private readonly createProcessor: (
    logger: Logger,
    options: MediaProcessorOptions
  ) => MediaProcessor;
  private readonly stateSaveInterval: number;
  private readonly reportDir?: string;

  constructor(
    private readonly logger: Logger,
    deps: ExportOrchestratorDeps
  ) {
    this.tagWriter = deps.tagWriter;
    this.scanner = deps.scanner ?? new FileSystemScannerDefault(logger);
    this.reader = deps.reader ?? new SidecarReaderJson();
    this.stateStore = deps.stateStore ?? new ProcessingStateStoreJson();
    this.createProcessor =
      deps.createProcessor ??
      ((l, options) => new MediaProcessorDefault(l, options));
    this.stateSaveInterval = Math.max(
      1,
      deps.stateSaveInterval ?? DEFAULT_STATE_SAVE_INTERVAL
    );
    this.reportDir = deps.reportDir;
  }

  async dryRun(
    options: DryRunOptions
  ): Promise<Result<DryRunSummary, RunError>> {
    const logger = this.logger.extend("dry-run");
    const source = await validateSource(options.sourcePath);
    if (isErr(source)) return source;
    const suffixes = validateSuffixes(options.suffixes ?? DEFAULT_SUFFIXES);
    if (isErr(suffixes)) return suffixes;

    const scanned = await this.scanner.scan(source.value, {
      onProgress: options.onProgress,
    });
    if (isErr(scanned)) {
      return err({ type: "SCAN_FAILED", message: scanned.error.message });
    }
    const { sidecarPaths, mediaRecords, index, skippedDirectories } =
      scanned.value;

    const matcher = new SidecarMatcherDefault({ suffixes: suffixes.value });
    const matched = new Set<string>();
    const summary: DryRunSummary = {
      status: "DONE",
      sourcePath: source.value,
      sidecars: sidecarPaths.length,
      media: mediaRecords.length,
      albums: index.albumCount,
      matchedSidecars: 0,
      matchedMedia: 0,
      unmatchedSidecars: 0,
      unmatchedMedia: 0,
      withGeo: 0,
      withPeople: 0,
      skippedDirectories: skippedDirectories.length,
    };

    for (const [i, sidecarPath] of sidecarPaths.entries()) {
      if (options.signal?.aborted) {
        summary.status = "CANCELLED";
        break;
      }
      options.onProgress?.(
        i + 1,
        sidecarPaths.length,
        path.basename(sidecarPath)
      );

      const metadata = await this.reader.read(sidecarPath);
      if (isErr(metadata)) {
        summary.unmatchedSidecars++;
        continue;
      }
      const match = matcher.resolve(sidecarPath, metadata.value.title, index);
      if (!match.found) {
        summary.unmatchedSidecars++;
        continue;
      }
      summary.matchedSidecars++;
      for (const record of match.records) matched.add(record.filePath);
      if (hasLocation(metadata.value.geo)) summary.withGeo++;
      if (metadata.value.people.length > 0) summary.withPeople++;
    }

    summary.matchedMedia = matched.size;
    summary.unmatchedMedia = mediaRecords.filter(
      (r) => !matched.has(r.filePath)
    ).length;

    if ((options.writeTags ?? true) && summary.status === "DONE") {
      const version = await this.tagWriter.version();
      if (isOk(version)) summary.tagWriterVersion = version.value;
      else summary.tagWriterError = version.error.message;
    }

    logger.info({
      event: "done",
      matched: summary.matchedSidecars,
      unmatchedSidecars: summary.unmatchedSidecars,
      unmatchedMedia: summary.unmatchedMedia,
    })`預覽完成：${summary.sidecars} 個 sidecar，${summary.media} 個媒體檔`;
    return ok(summary);
  }

  async process(options: ProcessOptions): Promise<Result<RunReport, RunError>> {
    const startedAt = new Date();
    const logger = this.logger.extend("process");

    // 1) 檢查設定
    const source = await validateSource(options.sourcePath);
    if (isErr(source)) return source;
    const suffixes = validateSuffixes(options.suffixes ?? DEFAULT_SUFFIXES);
    if (isErr(suffixes)) return suffixes;
    const sourcePath = source.value;
    const destinationPath = destinationOf(sourcePath, options.destinationPath);
    if (isSameOrInside(sourcePath, destinationPath)) {
      return err({
        type: "DESTINATION_INSIDE_SOURCE",
        message: `輸出目錄 ${destinationPath} 不可位於來源 ${sourcePath} 之內`,
      });
    }
    const fingerprint: RunFingerprint = {
      sourcePath,
      destinationPath,
      suffixes: suffixes.value,
    };

    // 2) 決定輸出目錄：新執行、接續或已完成
    const destination = await this.resolveDestination(
      fingerprint,
      options.force ?? false,
      logger
    );
    if (isErr(destination)) return destination;
    const dest = destination.value;
    const { outputDir } = dest;

    if (dest.kind === "complete") {
      const finishedAt = new Date();
      logger.info({
        event: "already-complete",
        emoji: "✅",
      })`${outputDir} 已有相同設定的完成紀錄，不需處理`;
      return ok({
        status: "ALREADY_COMPLETE",
        sourcePath,
        outputPath: outputDir,
        resumed: false,
        stats: emptyStats(),
        cumulativeStats: dest.state.stats,
        processed: [],
        unmatchedSidecars: [],
        unmatchedMedia: [],
        failures: [],
        startedAt: startedAt.toISOString(),
        finishedAt: finishedAt.toISOString(),
        elapsedMs: finishedAt.getTime() - startedAt.getTime(),
      });
    }

    const resumed = dest.kind === "resume";
    const state: ProcessingState =
      dest.kind === "resume"
        ? { ...dest.state }
        : {
            version: 1,
            phase: "SCANNING",
            fingerprint,
            completedSidecars: [],
            completedMedia: [],
            failedMedia: [],
            stats: emptyStats(),
            complete: false,
            startedAt: startedAt.toISOString(),
            updatedAt: startedAt.toISOString(),
          };
    const run: StatefulRun = {
      sourcePath,
      outputDir,
      startedAt,
      resumed,
      baseStats: state.stats,
      stats: emptyStats(),
      processed: [],
      unmatchedSidecars: [],
      unmatchedMedia: [],
      failures: [],
      state,
      completedSidecars: new Set(state.completedSidecars),
      completedMedia: new Set(state.completedMedia),
      failedMedia: new Set(state.failedMedia),
      sinceSave: 0,
    };

    const initial = await this.saveState(run);
    if (isErr(initial)) {
      return err({ type: "STATE_WRITE_FAILED", message: initial.error.message });
    }
    if (resumed) {
      logger.info({
        event: "resume",
        emoji: "⏯️",
        phase: state.phase,
        sidecars: run.completedSidecars.size,
        media: run.completedMedia.size,
      })`接續先前的執行 ${outputDir}`;
    } else {
      logger.info({ event: "start" })`開始處理 ${sourcePath} → ${outputDir}`;
    }

    // 3) 掃描來源
    const scanned = await this.scanner.scan(sourcePath, {
      onProgress: options.onProgress,
    });
    if (isErr(scanned)) {
      return err({ type: "SCAN_FAILED", message: scanned.error.message });
    }
    const { sidecarPaths, mediaRecords, index } = scanned.value;
    if (state.phase === "SCANNING") await this.enterPhase(run, "MATCHING", logger);

    const processor = this.createProcessor(logger, {
      outputDir,
      tagWriter: (options.writeTags ?? true) ? this.tagWriter : undefined,
      renameMotionPhotos: options.renameMotionPhotos,
    });
    // 4) 逐一處理 sidecar
    if (state.phase === "MATCHING") {
      const matcher = new SidecarMatcherDefault({ suffixes: suffixes.value });
      for (const [i, sidecarPath] of sidecarPaths.entries()) {
        if (options.signal?.aborted) return ok(await this.cancel(run, logger));
        options.onProgress?.(
          i + 1,
          sidecarPaths.length,
          path.basename(sidecarPath)
        );
        if (run.completedSidecars.has(sidecarPath)) continue;

        const metadata = await this.reader.read(sidecarPath);
        if (isErr(metadata)) {
          logger.debug({
            event: "sidecar-invalid",
            file: sidecarPath,
            type: metadata.error.type,
          })`無法使用的 sidecar ${sidecarPath}`;
          run.unmatchedSidecars.push({
            sourcePath: sidecarPath,
            reason: `${metadata.error.type}: ${metadata.error.message}`,
          });
          run.stats.unmatchedSidecars++;
          await this.completeSidecar(run, sidecarPath, logger);
          continue;
        }

        const match = matcher.resolve(sidecarPath, metadata.value.title, index);
        if (!match.found) {
          run.unmatchedSidecars.push({
            sourcePath: sidecarPath,
            reason: NO_MATCH_REASON,
            title: metadata.value.title,
          });
          run.stats.unmatchedSidecars++;
          await this.completeSidecar(run, sidecarPath, logger);
          continue;
        }

        let copiedAny = false;
        for (const record of match.records) {
          if (run.completedMedia.has(record.filePath)) {
            run.stats.skipped++;
            continue;
          }
          const copied = await processor.processMatched(record, metadata.value);
          if (isErr(copied)) {
            run.stats.errors++;
            run.failures.push({
              sourcePath: record.filePath,
              message: copied.error.message,
            });
            run.failedMedia.add(record.filePath);
            continue;
          }

          copiedAny = true;
          run.stats.processed++;
          if (copied.value.tagError) run.stats.tagErrors++;
          record.outputPath = copied.value.outputPath;
          record.sidecarPath = sidecarPath;
          record.processedAt = new Date().toISOString();
          run.processed.push({
            sourcePath: record.filePath,
            outputPath: record.outputPath,
            sidecarPath,
            processedAt: record.processedAt,
          });
          run.completedMedia.add(record.filePath);
          await this.checkpoint(run, logger);
        }

        if (copiedAny) {
          if (hasLocation(metadata.value.geo)) run.stats.withGeo++;
          if (metadata.value.people.length > 0) run.stats.withPeople++;
        }
        await this.completeSidecar(run, sidecarPath, logger);
      }
      await this.enterPhase(run, "COPYING_UNMATCHED", logger);
    }

    // 5) 沒有被比對到的檔案原樣複製
    for (const [i, record] of mediaRecords.entries()) {
      if (options.signal?.aborted) return ok(await this.cancel(run, logger));
      options.onProgress?.(i + 1, mediaRecords.length, record.fileName);
      if (run.completedMedia.has(record.filePath)) continue;

      const copied = await processor.copyUnmatched(
        record,
        run.failedMedia.has(record.filePath) ? COPY_FAILED_REASON : undefined
      );
      if (isErr(copied)) {
        run.stats.errors++;
        run.failures.push({
          sourcePath: record.filePath,
          message: copied.error.message,
        });
        continue;
      }
      run.stats.unmatchedMedia++;
      run.unmatchedMedia.push({
        sourcePath: record.filePath,
        reason: copied.value.reason,
        outputPath: copied.value.outputPath,
      });
      run.completedMedia.add(record.filePath);
      await this.checkpoint(run, logger);
    }

    // 6) 完成
    run.state.complete = true;
    await this.enterPhase(run, "DONE", logger);
    logger.info({
      event: "done",
      ...run.stats,
    })`處理完成 ${outputDir}`;
    return ok(await this.finish(run, "DONE", "process-report"));
  }

  async extend(options: ExtendOptions): Promise<Result<RunReport, RunError>> {
    const startedAt = new Date();
    const logger = this.logger.extend("extend");

    const source = await validateSource(options.sourcePath);
    if (isErr(source)) return source;
    const suffixes = validateSuffixes(options.suffixes ?? DEFAULT_SUFFIXES);
    if (isErr(suffixes)) return suffixes;
    const sourcePath = source.value;
    const outputDir = destinationOf(sourcePath, options.destinationPath);
    const processedDir = path.join(outputDir, PROCESSED_DIR_NAME);
    if (!(await isDirectory(processedDir))) {
      return err({
        type: "PROCESSED_DIR_NOT_FOUND",
        message: `找不到已處理的資料夾 ${processedDir}`,
      });
    }

    const sourceScan = await this.scanner.scan(sourcePath, {
      onProgress: options.onProgress,
    });
    if (isErr(sourceScan)) {
      return err({ type: "SCAN_FAILED", message: sourceScan.error.message });
    }
    const destScan = await this.scanner.scan(processedDir);
    if (isErr(destScan)) {
      return err({ type: "SCAN_FAILED", message: destScan.error.message });
    }

    logger.info({ event: "start" })`補寫標籤 ${sourcePath} → ${processedDir}`;
    const { sidecarPaths } = sourceScan.value;
    const matcher = new SidecarMatcherDefault({ suffixes: suffixes.value });
    const processor = this.createProcessor(logger, {
      outputDir,
      tagWriter: this.tagWriter,
    });
    const run: RunRecords = {
      sourcePath,
      outputDir,
      startedAt,
      resumed: false,
      baseStats: emptyStats(),
      stats: emptyStats(),
      processed: [],
      unmatchedSidecars: [],
      unmatchedMedia: [],
      failures: [],
    };

    for (const [i, sidecarPath] of sidecarPaths.entries()) {
      if (options.signal?.aborted) {
        logger.warn({ event: "cancelled", emoji: "⏹️" })`已取消`;
        return ok(await this.finish(run, "CANCELLED", "extend-report"));
      }
      options.onProgress?.(
        i + 1,
        sidecarPaths.length,
        path.basename(sidecarPath)
      );

      const metadata = await this.reader.read(sidecarPath);
      if (isErr(metadata)) {
        run.unmatchedSidecars.push({
          sourcePath: sidecarPath,
          reason: `${metadata.error.type}: ${metadata.error.message}`,
        });
        run.stats.unmatchedSidecars++;
        continue;
      }
      const match = matcher.resolve(
        sidecarPath,
        metadata.value.title,
        destScan.value.index
      );
      if (!match.found) {
        run.unmatchedSidecars.push({
          sourcePath: sidecarPath,
          reason: NO_MATCH_REASON,
          title: metadata.value.title,
        });
        run.stats.unmatchedSidecars++;
        continue;
      }

      let taggedAny = false;
      for (const record of match.records) {
        const tagged = await processor.applyTags(record.filePath, metadata.value);
        if (isErr(tagged)) {
          run.stats.tagErrors++;
          run.failures.push({
            sourcePath: record.filePath,
            message: tagged.error.message,
          });
          continue;
        }
        if (!tagged.value) {
          run.stats.skipped++;
          continue;
        }
        taggedAny = true;
        run.stats.processed++;
        run.processed.push({
          sourcePath: record.filePath,
          outputPath: record.filePath,
          sidecarPath,
          processedAt: new Date().toISOString(),
        });
      }
      if (taggedAny) {
        if (hasLocation(metadata.value.geo)) run.stats.withGeo++;
        if (metadata.value.people.length > 0) run.stats.withPeople++;
      }
    }

    logger.info({ event: "done", ...run.stats })`補寫標籤完成`;
    return ok(await this.finish(run, "DONE", "extend-report"));
  }

  /**
   * - 沒有狀態檔：沿用（不存在時建立）
   * - 設定相同且未完成：接續
   * - 設定相同且已完成：不需處理
   * - 設定不同或狀態檔損毀：另建 `dest(n)`
   * - force：忽略狀態，在原處重新開始
   */
  private async resolveDestination(
    fingerprint: RunFingerprint,
    force: boolean,
    logger: Logger
  ): Promise<Result<Destination, RunError>> {
    const requested = fingerprint.destinationPath;
    const checked = await checkoutDir(requested);
    if (isErr(checked)) {
      return err({ type: "DESTINATION_UNUSABLE", message: checked.error.message });
    }
    if (force) return ok({ kind: "fresh", outputDir: checked.value });

    const saved = await this.stateStore.read(requested);
    if (isErr(saved)) {
      logger.warn({
        event: "state-unreadable",
        error: saved.error.message,
      })`無法讀取 ${requested} 的狀態檔，改用其他輸出目錄`;
      return this.numberedDestination(fingerprint, logger);
    }
    const state = saved.value;
    if (!state) return ok({ kind: "fresh", outputDir: checked.value });
    if (!sameFingerprint(state.fingerprint, fingerprint)) {
      logger.info({
        event: "config-changed",
        emoji: "🔀",
      })`${requested} 的既有紀錄設定不同，改用其他輸出目錄`;
      return this.numberedDestination(fingerprint, logger);
    }
    if (state.complete) {
      return ok({ kind: "complete", outputDir: checked.value, state });
    }
    return ok({ kind: "resume", outputDir: checked.value, state });
  }

  /**
   * 先找 `dest(1)`、`dest(2)`… 中設定相同的紀錄並接續，
   * 都沒有才另建新的 `dest(n)`。
   */
  private async numberedDestination(
    fingerprint: RunFingerprint,
    logger: Logger
  ): Promise<Result<Destination, RunError>> {
    const requested = fingerprint.destinationPath;
    for (let n = 1; await exists(`${requested}(${n})`); n++) {
      const outputDir = `${requested}(${n})`;
      if (!(await isDirectory(outputDir))) continue;
      const saved = await this.stateStore.read(outputDir);
      if (isErr(saved) || !saved.value) continue;
      const state = saved.value;
      if (!sameFingerprint(state.fingerprint, fingerprint)) continue;
      logger.debug({
        event: "previous-run-found",
        complete: state.complete,
      })`找到相同設定的紀錄 ${outputDir}`;
      return ok(
        state.complete
          ? { kind: "complete", outputDir, state }
          : { kind: "resume", outputDir, state }
      );
    }

    const created = await checkoutDir(requested, true);
    if (isErr(created)) {
      return err({ type: "DESTINATION_UNUSABLE", message: created.error.message });
    }
    return ok({ kind: "fresh", outputDir: created.value });
  }

  private async saveState(run: StatefulRun) {
    run.state.stats = addStats(run.baseStats, run.stats);
    run.state.completedSidecars = [...run.completedSidecars];
    run.state.completedMedia = [...run.completedMedia];
    run.state.failedMedia = [...run.failedMedia];
    run.state.updatedAt = new Date().toISOString();
    run.sinceSave = 0;
    return this.stateStore.write(run.outputDir, run.state);
  }

  /** 執行途中存檔失敗只記錄，下次存檔會再試 */
  private async saveStateOrWarn(run: StatefulRun, logger: Logger) {
    const saved = await this.saveState(run);
    if (isErr(saved)) {
      logger.warn({
        event: "state-save-failed",
        error: saved.error.message,
      })`狀態檔寫入失敗 ${run.outputDir}`;
    }
  }

  private async checkpoint(run: StatefulRun, logger: Logger) {
    run.sinceSave++;
    if (run.sinceSave >= this.stateSaveInterval) {
      await this.saveStateOrWarn(run, logger);
    }
  }

  private async completeSidecar(
    run: StatefulRun,
    sidecarPath: string,
    logger: Logger
  ) {
    run.completedSidecars.add(sidecarPath);
    await this.checkpoint(run, logger);
  }

  private async enterPhase(
    run: StatefulRun,
    phase: ProcessingState["phase"],
    logger: Logger
  ) {
    run.state.phase = phase;
    logger.debug({ event: "phase", phase })`進入階段 ${phase}`;
    await this.saveStateOrWarn(run, logger);
  }

  private async cancel(run: StatefulRun, logger: Logger) {
    await this.saveStateOrWarn(run, logger);
    logger.warn({
      event: "cancelled",
      emoji: "⏹️",
      phase: run.state.phase,
    })`已取消，下次以相同設定執行會接續處理`;
    return this.finish(run, "CANCELLED", "process-report");
  }

  private async finish(
    run: RunRecords,
    status: RunStatus,
    reportName: string
  ): Promise<RunReport> {
    const finishedAt = new Date();
    const report: RunReport = {
      status,
      sourcePath: run.sourcePath,
      outputPath: run.outputDir,
      resumed: run.resumed,
      stats: run.stats,
      cumulativeStats: addStats(run.baseStats, run.stats),
      processed: run.processed,
      unmatchedSidecars: run.unmatchedSidecars,
      unmatchedMedia: run.unmatchedMedia,
      failures: run.failures,
      startedAt: run.startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      elapsedMs: finishedAt.getTime() - run.startedAt.getTime(),
    };
    const dumper = new DumpWriterDefault(
      this.logger,
      this.reportDir ?? path.join(run.outputDir, META_DIR_NAME)
    );
    const dumped = await dumper.dump(reportName, report);
    if (isOk(dumped)) report.reportPath = dumped.value;
    return report;
  }
}
