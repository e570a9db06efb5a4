import { readFile, rm, stat } from "node:fs/promises";
import path from "node:path";
import { afterAll, beforeEach, describe, expect, test } from "vitest";

import { expectErr, expectOk } from "~shared/testkit/ExpectResult";
import { buildTestLogger } from "~shared/testkit/TestLogger";

import {
  MOTION_PHOTO_REASON,
  MediaProcessorDefault,
  UNMATCHED_REASON,
  isMotionPhoto,
} from "@/services/MediaProcessor";
import type { MediaRecord, SidecarMetadata } from "@/types";

import { resetDir, writeFiles } from "~test/fakes/SidecarFixture";
import { TagWriterFake } from "~test/fakes/TagWriterFake";

const tmpDir = "test/tmp/processor";
const sourceDir = path.join(tmpDir, "source");
const outputDir = path.join(tmpDir, "output");

function record(albumName: string, fileName: string): MediaRecord {
  return {
    albumName,
    fileName,
    filePath: path.join(sourceDir, albumName, fileName),
  };
}

function metadata(overrides: Partial<SidecarMetadata> = {}): SidecarMetadata {
  return {
    filePath: "/unused.json",
    title: "photo.jpg",
    captureTime: new Date("2020-05-01T10:00:00Z"),
    people: [],
    description: "",
    ...overrides,
  };
}

describe("MediaProcessorDefault", () => {
  beforeEach(async () => {
    await resetDir(tmpDir);
    await writeFiles(sourceDir, {
      "Trip/photo.jpg": "photo",
      "Trip/clip.MP": "motion",
      "Trip/clip.MP~2": "motion2",
    });
  });

  afterAll(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  test("複製到 Processed/<相簿>，設定時間並寫入標籤", async () => {
    const tagWriter = new TagWriterFake();
    const processor = new MediaProcessorDefault(buildTestLogger(), {
      outputDir,
      tagWriter,
    });

    const result = await processor.processMatched(
      record("Trip", "photo.jpg"),
      metadata({ people: ["Alice"] })
    );

    expectOk(result);
    const expected = path.join(outputDir, "Processed", "Trip", "photo.jpg");
    expect(result.value).toEqual({ outputPath: expected, tagged: true });
    expect(await readFile(expected, "utf8")).toBe("photo");
    expect((await stat(expected)).mtime.toISOString()).toBe(
      "2020-05-01T10:00:00.000Z"
    );
    expect(tagWriter.writes).toEqual([
      {
        filePath: expected,
        tags: {
          PersonInImage: ["Alice"],
          Keywords: ["Alice"],
          Subject: ["Alice"],
          XPKeywords: "Alice",
        },
      },
    ]);
  });

  test("檔名衝突時加上 (n)，不覆寫既有檔案", async () => {
    const processor = new MediaProcessorDefault(buildTestLogger(), { outputDir });

    const first = await processor.processMatched(record("Trip", "photo.jpg"), metadata());
    const second = await processor.processMatched(record("Trip", "photo.jpg"), metadata());

    expectOk(first);
    expectOk(second);
    expect(path.basename(first.value.outputPath)).toBe("photo.jpg");
    expect(path.basename(second.value.outputPath)).toBe("photo(1).jpg");
    expect(second.value.tagged).toBe(false);
  });

  test("寫入標籤失敗時複製仍算成功", async () => {
    const tagWriter = new TagWriterFake();
    tagWriter.failOn(path.join(outputDir, "Processed", "Trip", "photo.jpg"));
    const processor = new MediaProcessorDefault(buildTestLogger(), {
      outputDir,
      tagWriter,
    });

    const result = await processor.processMatched(
      record("Trip", "photo.jpg"),
      metadata({ description: "說明" })
    );

    expectOk(result);
    expect(result.value.tagged).toBe(false);
    expect(result.value.tagError?.type).toBe("WRITE_FAILED");
  });

  test("來源不存在時回傳 COPY_FAILED", async () => {
    const processor = new MediaProcessorDefault(buildTestLogger(), { outputDir });
    const result = await processor.processMatched(
      record("Trip", "missing.jpg"),
      metadata()
    );
    expectErr(result);
    expect(result.error.type).toBe("COPY_FAILED");
  });

  test("未比對的檔案原樣複製到 Unprocessed/<相簿>", async () => {
    const tagWriter = new TagWriterFake();
    const processor = new MediaProcessorDefault(buildTestLogger(), {
      outputDir,
      tagWriter,
    });

    const result = await processor.copyUnmatched(record("Trip", "photo.jpg"));

    expectOk(result);
    expect(result.value).toEqual({
      outputPath: path.join(outputDir, "Unprocessed", "Trip", "photo.jpg"),
      reason: UNMATCHED_REASON,
      motionPhoto: false,
    });
    expect(tagWriter.writes).toEqual([]);
  });

  test("動態相片的影片檔可改名為 .MP4", async () => {
    const processor = new MediaProcessorDefault(buildTestLogger(), {
      outputDir,
      renameMotionPhotos: true,
    });

    const mp = await processor.copyUnmatched(record("Trip", "clip.MP"));
    const mp2 = await processor.copyUnmatched(record("Trip", "clip.MP~2"));

    expectOk(mp);
    expectOk(mp2);
    expect(mp.value.reason).toBe(MOTION_PHOTO_REASON);
    expect(path.basename(mp.value.outputPath)).toBe("clip.MP4");
    expect(path.basename(mp2.value.outputPath)).toBe("clip(1).MP4");
    expect(await readFile(mp2.value.outputPath, "utf8")).toBe("motion2");
  });

  test("isMotionPhoto 不分大小寫", () => {
    expect(isMotionPhoto("a.jpg.mp")).toBe(true);
    expect(isMotionPhoto("a.MP~2")).toBe(true);
    expect(isMotionPhoto("a.mp4")).toBe(false);
  });

  test("applyTags 只寫標籤，沒有標籤時回傳 false", async () => {
    const tagWriter = new TagWriterFake();
    const processor = new MediaProcessorDefault(buildTestLogger(), {
      outputDir,
      tagWriter,
    });
    const target = path.join(sourceDir, "Trip", "photo.jpg");

    const empty = await processor.applyTags(target, metadata());
    const written = await processor.applyTags(
      target,
      metadata({ geo: { latitude: 1, longitude: 2, altitude: 3 } })
    );

    expectOk(empty);
    expectOk(written);
    expect(empty.value).toBe(false);
    expect(written.value).toBe(true);
    expect(tagWriter.writes.map((w) => w.filePath)).toEqual([target]);
  });
});
