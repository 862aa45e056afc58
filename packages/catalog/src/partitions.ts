/**
 * Partition discovery.
 *
 * Producer side lists `key=value/` sub-prefixes so they can be registered
 * in the catalog. Consumer side picks the newest `ds` under the primary
 * output, pins it to a marker file, and every later stage reads the marker
 * instead of rescanning storage.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";

import type { PartitionDiscovery, PartitionId, PartitionRef } from "@mapper-activity/types";
import { createLogger } from "@mapper-activity/logger";
import { NoPartitionFoundError, isPartitionId, latestPartition } from "@mapper-activity/shared";

import type { S3ListApi } from "./aws.js";

const log = createLogger("partitions");

export const DEFAULT_MARKER_PATH = "output/latest_ds.txt";

export interface S3Location {
  bucket: string;
  /** Key prefix, always ending in a single slash */
  prefix: string;
}

/** Split `s3://bucket/path/` into bucket and key prefix */
export function parseS3Uri(uri: string): S3Location {
  if (!uri.startsWith("s3://")) {
    throw new Error(`Expected a full S3 URI (s3://bucket/path/), got '${uri}'`);
  }
  const rest = uri.slice("s3://".length);
  const slash = rest.indexOf("/");
  const bucket = slash === -1 ? rest : rest.slice(0, slash);
  const path = slash === -1 ? "" : rest.slice(slash + 1).replace(/\/+$/, "");
  if (!bucket || !path) {
    throw new Error(`S3 URI must include a path after the bucket name: '${uri}'`);
  }
  return { bucket, prefix: `${path}/` };
}

/** Every `key=value/` common prefix directly under the location */
export async function listPartitions(s3: S3ListApi, uri: string, key = "ds"): Promise<PartitionRef[]> {
  const { bucket, prefix } = parseS3Uri(uri);
  const partitions: PartitionRef[] = [];

  let token: string | undefined;
  do {
    const page = await s3.listObjectsV2({
      Bucket: bucket,
      Prefix: prefix,
      Delimiter: "/",
      ContinuationToken: token,
    });
    for (const common of page.CommonPrefixes ?? []) {
      if (!common.Prefix) continue;
      const remainder = common.Prefix.slice(prefix.length).replace(/^\/+|\/+$/g, "");
      if (remainder.startsWith(`${key}=`)) {
        partitions.push({ value: remainder.slice(key.length + 1), prefix: common.Prefix });
      }
    }
    token = page.IsTruncated ? page.NextContinuationToken : undefined;
  } while (token);

  return partitions;
}

/** Newest valid `ds` under the location, as a found / not-found result */
export async function discoverLatestPartition(s3: S3ListApi, uri: string, key = "ds"): Promise<PartitionDiscovery> {
  const partitions = await listPartitions(s3, uri, key);

  for (const p of partitions) {
    if (!isPartitionId(p.value)) {
      log.warn({ value: p.value, prefix: p.prefix }, "Skipping partition that is not an ISO date");
    }
  }

  const ds = latestPartition(partitions.map((p) => p.value));
  const match = partitions.find((p) => p.value === ds);
  if (ds === null || !match) {
    log.warn({ searched: uri, listed: partitions.length }, "No partition found");
    return { found: false, searched: uri };
  }

  log.info({ ds, listed: partitions.length }, "Latest partition");
  return { found: true, ds, prefix: match.prefix };
}

/**
 * Persist the discovered partition for the rest of the run.
 * A not-found result is an error; there is no default partition.
 */
export function pinPartition(result: PartitionDiscovery, markerPath = DEFAULT_MARKER_PATH): PartitionId {
  if (!result.found) {
    throw new NoPartitionFoundError(result.searched);
  }
  mkdirSync(dirname(markerPath), { recursive: true });
  writeFileSync(markerPath, `${result.ds}\n`);
  log.info({ ds: result.ds, markerPath }, "Pinned partition");
  return result.ds;
}

export function readPinnedPartition(markerPath = DEFAULT_MARKER_PATH): PartitionId {
  if (!existsSync(markerPath)) {
    throw new NoPartitionFoundError(markerPath, "partition marker is missing");
  }
  const value = readFileSync(markerPath, "utf-8").trim();
  if (!isPartitionId(value)) {
    throw new NoPartitionFoundError(markerPath, `marker holds '${value}', not a YYYY-MM-DD date`);
  }
  return value;
}
