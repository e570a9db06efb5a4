import { Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { fromUnixTime, isValid } from "date-fns";
import { readFile } from "node:fs/promises";

import { type Result, err, ok } from "~shared/utils/Result";

import type { GeoPoint, SidecarMetadata } from "@/types";

import type { SidecarReadError, SidecarReader } from "./SidecarReader";

const sidecarSchema = t.Object({
  title: t.String(),
  description: t.Optional(t.String()),
  photoTakenTime: t.Object({
    timestamp: t.Union([t.String(), t.Number()]),
  }),
  geoData: t.Optional(
    t.Object({
      latitude: t.Number(),
      longitude: t.Number(),
      altitude: t.Optional(t.Number()),
    })
  ),
  people: t.Optional(t.Array(t.Object({ name: t.Optional(t.String()) }))),
});

type SidecarJson = typeof sidecarSchema.static;

function toGeoPoint(geoData: SidecarJson["geoData"]): GeoPoint | undefined {
  if (!geoData) return undefined;
  // (0, 0) 是匯出工具表示「沒有位置」的方式
  if (geoData.latitude === 0 && geoData.longitude === 0) return undefined;
  return {
    latitude: geoData.latitude,
    longitude: geoData.longitude,
    altitude: geoData.altitude ?? 0,
  };
}

export class SidecarReaderJson implements SidecarReader {
  async read(
    filePath: string
  ): Promise<Result<SidecarMetadata, SidecarReadError>> {
    let raw: string;
    try {
      raw = await readFile(filePath, "utf8");
    } catch (e) {
      return err({
        type: "READ_FAILED",
        message: e instanceof Error ? e.message : String(e),
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (e) {
      return err({
        type: "PARSE_FAILED",
        message: e instanceof Error ? e.message : String(e),
      });
    }

    if (!Value.Check(sidecarSchema, json)) {
      const first = Value.Errors(sidecarSchema, json).First();
      return err({
        type: "NOT_A_SIDECAR",
        message: first ? `${first.path} ${first.message}` : "格式不符",
      });
    }

    const { timestamp } = json.photoTakenTime;
    const seconds =
      typeof timestamp === "number"
        ? timestamp
        : timestamp.trim() === ""
          ? Number.NaN
          : Number(timestamp);
    const captureTime = fromUnixTime(seconds);
    if (!Number.isFinite(seconds) || !isValid(captureTime)) {
      return err({
        type: "INVALID_TIMESTAMP",
        message: `無效的時間戳記: ${timestamp}`,
      });
    }

    const people: string[] = [];
    for (const person of json.people ?? []) {
      if (person.name) people.push(person.name);
    }

    return ok({
      filePath,
      title: json.title,
      captureTime,
      geo: toGeoPoint(json.geoData),
      people,
      description: json.description ?? "",
    });
  }
}
