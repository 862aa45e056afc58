/**
 * Partition id helpers.
 */

import type { PartitionId } from "@mapper-activity/types";

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/** True for a real calendar date in `YYYY-MM-DD` form */
export function isPartitionId(value: string): value is PartitionId {
  if (!ISO_DATE.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

/**
 * Lexicographic maximum of the valid partition ids, or null if there are
 * none. ISO dates sort chronologically as strings.
 */
export function latestPartition(values: Iterable<string>): PartitionId | null {
  let latest: PartitionId | null = null;
  for (const value of values) {
    if (isPartitionId(value) && (latest === null || value > latest)) {
      latest = value;
    }
  }
  return latest;
}
