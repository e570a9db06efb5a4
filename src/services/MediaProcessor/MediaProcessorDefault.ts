import { constants } from "node:fs";
import { copyFile, mkdir, utimes } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import {
  PROCESSED_DIR_NAME,
  UNMATCHED_DIR_NAME,
  motionPhotoExtensions,
} from "@/constants";
import type { MediaRecord, SidecarMetadata } from "@/types";
import { uniquePath } from "@/utils/helper";

import { buildTags } from "../TagWriter/TagBuilder";
import type { TagWriteError, TagWriter } from "../TagWriter/TagWriter";
import type {
  MatchedCopy,
  MediaProcessor,
  ProcessError,
  UnmatchedCopy,
} from "./MediaProcessor";

export const UNMATCHED_REASON = "找不到對應的 sidecar";
export const MOTION_PHOTO_REASON = "動態相片的影片檔";

export type MediaProcessorOptions = {
  outputDir: string;
  /** 未提供時不寫標籤 */
  tagWriter?: TagWriter;
  /** .MP / .MP~2 複製時改名為 .MP4 */
  renameMotionPhotos?: boolean;
};

function messageOf(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

export function isMotionPhoto(fileName: string) {
  const ext = path.extname(fileName).toLowerCase();
  return motionPhotoExtensions.some((e) => e === ext);
}

export class MediaProcessorDefault implements MediaProcessor {
  private readonly outputDir: string;
  private readonly tagWriter?: TagWriter;
  private readonly renameMotionPhotos: boolean;

  constructor(
    private readonly logger: Logger,
    options: MediaProcessorOptions
  ) {
    this.outputDir = options.outputDir;
    this.tagWriter = options.tagWriter;
    this.renameMotionPhotos = options.renameMotionPhotos ?? false;
  }

  async processMatched(
    record: MediaRecord,
    metadata: SidecarMetadata
  ): Promise<Result<MatchedCopy, ProcessError>> {
    const copied = await this.copyInto(
      PROCESSED_DIR_NAME,
      record.albumName,
      record.fileName,
      record.filePath
    );
    if (isErr(copied)) return copied;
    const outputPath = copied.value;

    try {
      await utimes(outputPath, metadata.captureTime, metadata.captureTime);
    } catch (error) {
      this.logger.warn({
        event: "utimes-failed",
        file: outputPath,
        error: messageOf(error),
      })`無法設定檔案時間 ${outputPath}`;
    }

    const tagged = await this.applyTags(outputPath, metadata);
    if (isErr(tagged)) {
      return ok({ outputPath, tagged: false, tagError: tagged.error });
    }
    return ok({ outputPath, tagged: tagged.value });
  }

  async copyUnmatched(
    record: MediaRecord,
    reason = UNMATCHED_REASON
  ): Promise<Result<UnmatchedCopy, ProcessError>> {
    const motionPhoto = isMotionPhoto(record.fileName);
    let fileName = record.fileName;
    if (motionPhoto && this.renameMotionPhotos) {
      const ext = path.extname(fileName);
      fileName = `${fileName.slice(0, fileName.length - ext.length)}.MP4`;
    }

    const copied = await this.copyInto(
      UNMATCHED_DIR_NAME,
      record.albumName,
      fileName,
      record.filePath
    );
    if (isErr(copied)) return copied;

    return ok({
      outputPath: copied.value,
      reason: motionPhoto ? MOTION_PHOTO_REASON : reason,
      motionPhoto,
    });
  }

  async applyTags(
    filePath: string,
    metadata: SidecarMetadata
  ): Promise<Result<boolean, TagWriteError>> {
    if (!this.tagWriter) return ok(false);
    const tags = buildTags(metadata);
    if (Object.keys(tags).length === 0) return ok(false);

    const written = await this.tagWriter.writeTags(filePath, tags);
    if (isErr(written)) {
      this.logger.warn({
        event: "tag-failed",
        file: filePath,
        error: written.error.message,
      })`寫入標籤失敗 ${filePath}`;
      return written;
    }
    return ok(true);
  }

  /** 複製到 `<output>/<area>/<相簿>/`，檔名衝突時加上 (n)，不覆寫既有檔案 */
  private async copyInto(
    area: string,
    albumName: string,
    fileName: string,
    sourcePath: string
  ): Promise<Result<string, ProcessError>> {
    const albumDir = path.join(this.outputDir, area, albumName);
    try {
      await mkdir(albumDir, { recursive: true });
    } catch (error) {
      return err({ type: "MKDIR_FAILED", message: messageOf(error) });
    }

    const target = await uniquePath(path.join(albumDir, fileName));
    try {
      await copyFile(sourcePath, target, constants.COPYFILE_EXCL);
    } catch (error) {
      this.logger.warn({
        event: "copy-failed",
        file: sourcePath,
        error: messageOf(error),
      })`複製失敗 ${sourcePath}`;
      return err({ type: "COPY_FAILED", message: messageOf(error) });
    }
    this.logger.trace({ event: "copied", to: target })`${sourcePath}`;
    return ok(target);
  }
}
