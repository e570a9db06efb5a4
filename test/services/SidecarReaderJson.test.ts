import { rm } from "node:fs/promises";
import path from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";

import { expectErr, expectOk } from "~shared/testkit/ExpectResult";

import { SidecarReaderJson } from "@/services/SidecarReader";

import { resetDir, writeFiles } from "~test/fakes/SidecarFixture";

const tmpDir = "test/tmp/sidecar-reader";
const file = (name: string) => path.join(tmpDir, name);

describe("SidecarReaderJson", () => {
  beforeAll(async () => {
    await resetDir(tmpDir);
    await writeFiles(tmpDir, {
      "full.json": JSON.stringify({
        title: "IMG_0001.jpg",
        description: "海邊",
        photoTakenTime: { timestamp: "1600000000", formatted: "ignored" },
        geoData: { latitude: 25.03, longitude: 121.56, altitude: 12.5 },
        people: [{ name: "Alice" }, {}, { name: "Bob" }],
      }),
      "numeric.json": JSON.stringify({
        title: "a.png",
        photoTakenTime: { timestamp: 0 },
        geoData: { latitude: 0, longitude: 0, altitude: 0 },
      }),
      "metadata.json": JSON.stringify({ title: "Album", description: "" }),
      "broken.json": "{ not json",
      "bad-time.json": JSON.stringify({
        title: "x.jpg",
        photoTakenTime: { timestamp: "yesterday" },
      }),
    });
  });

  afterAll(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  test("讀取時間、位置、人物與說明", async () => {
    const result = await new SidecarReaderJson().read(file("full.json"));
    expectOk(result);
    expect(result.value).toEqual({
      filePath: file("full.json"),
      title: "IMG_0001.jpg",
      captureTime: new Date(1_600_000_000 * 1000),
      geo: { latitude: 25.03, longitude: 121.56, altitude: 12.5 },
      people: ["Alice", "Bob"],
      description: "海邊",
    });
  });

  test("數字時間戳記可接受，(0, 0) 視為沒有位置", async () => {
    const result = await new SidecarReaderJson().read(file("numeric.json"));
    expectOk(result);
    expect(result.value.captureTime.getTime()).toBe(0);
    expect(result.value.geo).toBeUndefined();
    expect(result.value.people).toEqual([]);
    expect(result.value.description).toBe("");
  });

  test("缺少 photoTakenTime 的 JSON 不是 sidecar", async () => {
    const result = await new SidecarReaderJson().read(file("metadata.json"));
    expectErr(result);
    expect(result.error.type).toBe("NOT_A_SIDECAR");
  });

  test("JSON 格式錯誤", async () => {
    const result = await new SidecarReaderJson().read(file("broken.json"));
    expectErr(result);
    expect(result.error.type).toBe("PARSE_FAILED");
  });

  test("時間戳記不是數字", async () => {
    const result = await new SidecarReaderJson().read(file("bad-time.json"));
    expectErr(result);
    expect(result.error).toEqual({
      type: "INVALID_TIMESTAMP",
      message: "無效的時間戳記: yesterday",
    });
  });

  test("檔案不存在", async () => {
    const result = await new SidecarReaderJson().read(file("missing.json"));
    expectErr(result);
    expect(result.error.type).toBe("READ_FAILED");
  });
});
