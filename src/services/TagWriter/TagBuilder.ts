import type { GeoPoint, SidecarMetadata } from "@/types";

/** ExifTool 標籤名稱 → 值 */
export type TagMap = Record<string, string | number | readonly string[]>;

/** (0, 0) 不算有位置 */
export function hasLocation(
  geo: GeoPoint | undefined
): geo is GeoPoint {
  return geo !== undefined && (geo.latitude !== 0 || geo.longitude !== 0);
}

function buildGpsTags(geo: GeoPoint | undefined): TagMap {
  if (!hasLocation(geo)) return {};
  return {
    GPSLatitude: Math.abs(geo.latitude),
    GPSLatitudeRef: geo.latitude >= 0 ? "N" : "S",
    GPSLongitude: Math.abs(geo.longitude),
    GPSLongitudeRef: geo.longitude >= 0 ? "E" : "W",
    GPSAltitude: Math.abs(geo.altitude),
    GPSAltitudeRef: geo.altitude >= 0 ? 0 : 1,
  };
}

function buildPeopleTags(people: readonly string[]): TagMap {
  if (people.length === 0) return {};
  return {
    PersonInImage: people,
    Keywords: people,
    Subject: people,
    // Windows 檔案總管
    XPKeywords: people.join(";"),
  };
}

export function buildTags(
  metadata: Pick<SidecarMetadata, "geo" | "people" | "description">
): TagMap {
  const tags: TagMap = {
    ...buildGpsTags(metadata.geo),
    ...buildPeopleTags(metadata.people),
  };
  if (metadata.description) {
    tags.ImageDescription = metadata.description;
    tags["Caption-Abstract"] = metadata.description;
    tags.Description = metadata.description;
  }
  return tags;
}

/**
 * 轉成 ExifTool 命令列參數。
 * 數值用 `#=` 直接寫入原始值，清單每個元素各一個參數。
 */
export function toWriteArgs(tags: TagMap): string[] {
  const args: string[] = [];
  for (const [name, value] of Object.entries(tags)) {
    if (typeof value === "number") {
      args.push(`-${name}#=${value}`);
    } else if (typeof value === "string") {
      args.push(`-${name}=${value}`);
    } else {
      for (const item of value) args.push(`-${name}=${item}`);
    }
  }
  return args;
}
