import { describe, expect, test } from "vitest";

import { buildTags, hasLocation, toWriteArgs } from "@/services/TagWriter";

describe("hasLocation", () => {
  test("(0, 0) 不算有位置", () => {
    expect(hasLocation({ latitude: 0, longitude: 0, altitude: 100 })).toBe(false);
    expect(hasLocation(undefined)).toBe(false);
  });

  test("任一座標不為 0 即有位置", () => {
    expect(hasLocation({ latitude: 0, longitude: 12.5, altitude: 0 })).toBe(true);
    expect(hasLocation({ latitude: -1, longitude: 0, altitude: 0 })).toBe(true);
  });
});

describe("buildTags", () => {
  test("南半球、西半球與海平面以下使用對應的 Ref", () => {
    const tags = buildTags({
      geo: { latitude: -33.86, longitude: -70.5, altitude: -4 },
      people: [],
      description: "",
    });
    expect(tags).toEqual({
      GPSLatitude: 33.86,
      GPSLatitudeRef: "S",
      GPSLongitude: 70.5,
      GPSLongitudeRef: "W",
      GPSAltitude: 4,
      GPSAltitudeRef: 1,
    });
  });

  test("人物寫入多個欄位，保持順序", () => {
    const tags = buildTags({ people: ["Alice", "Bob"], description: "" });
    expect(tags).toEqual({
      PersonInImage: ["Alice", "Bob"],
      Keywords: ["Alice", "Bob"],
      Subject: ["Alice", "Bob"],
      XPKeywords: "Alice;Bob",
    });
  });

  test("說明寫入三個欄位", () => {
    const tags = buildTags({ people: [], description: "生日" });
    expect(tags).toEqual({
      ImageDescription: "生日",
      "Caption-Abstract": "生日",
      Description: "生日",
    });
  });

  test("沒有任何資料時為空", () => {
    expect(
      buildTags({
        geo: { latitude: 0, longitude: 0, altitude: 0 },
        people: [],
        description: "",
      })
    ).toEqual({});
  });
});

describe("toWriteArgs", () => {
  test("數值用 #=，清單展開成多個參數", () => {
    expect(
      toWriteArgs({
        GPSLatitude: 25.5,
        GPSLatitudeRef: "N",
        Keywords: ["Alice", "Bob"],
      })
    ).toEqual([
      "-GPSLatitude#=25.5",
      "-GPSLatitudeRef=N",
      "-Keywords=Alice",
      "-Keywords=Bob",
    ]);
  });
});
