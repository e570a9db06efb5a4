import type { ProcessingStats } from "@/types";

export function emptyStats(): ProcessingStats {
  return {
    processed: 0,
    skipped: 0,
    errors: 0,
    tagErrors: 0,
    withGeo: 0,
    withPeople: 0,
    unmatchedSidecars: 0,
    unmatchedMedia: 0,
  };
}

export function addStats(
  a: ProcessingStats,
  b: ProcessingStats
): ProcessingStats {
  return {
    processed: a.processed + b.processed,
    skipped: a.skipped + b.skipped,
    errors: a.errors + b.errors,
    tagErrors: a.tagErrors + b.tagErrors,
    withGeo: a.withGeo + b.withGeo,
    withPeople: a.withPeople + b.withPeople,
    unmatchedSidecars: a.unmatchedSidecars + b.unmatchedSidecars,
    unmatchedMedia: a.unmatchedMedia + b.unmatchedMedia,
  };
}
