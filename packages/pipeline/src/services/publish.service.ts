/**
 * Publish service - uploads a partition's artifacts and refreshes the CDN.
 */

import { existsSync, readFileSync } from "node:fs";
import { basename, join } from "node:path";

import { createLogger } from "@mapper-activity/logger";
import { ROLLUP_FILES } from "@mapper-activity/rollup";
import { errorMessage, PublicationError } from "@mapper-activity/shared";
import type { PartitionId } from "@mapper-activity/types";

import type { PublishClients } from "../aws.js";
import { TILE_LAYERS } from "./tile.service.js";

const log = createLogger("publish");

export const DASHBOARD_PREFIX = "activity-dashboard";

/** Files uploaded under the partition-stamped prefix */
export const PUBLISHED_ARTIFACTS: readonly string[] = [
  ...TILE_LAYERS.map((layer) => layer.archive),
  ROLLUP_FILES.weeklyCsv,
  ROLLUP_FILES.topCountries,
  ROLLUP_FILES.monthly,
  ROLLUP_FILES.summary,
  ROLLUP_FILES.dailyRollup,
];

/** Unstamped copies of the newest artifacts, each invalidated after upload */
export const LATEST_ALIASES: readonly { file: string; key: string }[] = [
  { file: ROLLUP_FILES.summary, key: `${DASHBOARD_PREFIX}/activity.json` },
  { file: ROLLUP_FILES.dailyRollup, key: "activity/daily_rollup.parquet" },
];

const CONTENT_TYPES: Record<string, string> = {
  ".pmtiles": "application/vnd.pmtiles",
  ".csv": "text/csv",
  ".json": "application/json",
  ".parquet": "application/vnd.apache.parquet",
};

function contentType(file: string): string {
  const ext = file.slice(file.lastIndexOf("."));
  return CONTENT_TYPES[ext] ?? "application/octet-stream";
}

export function partitionKey(ds: PartitionId, file: string): string {
  return `${DASHBOARD_PREFIX}/ds=${ds}/${file}`;
}

export interface PublishOptions {
  ds: PartitionId;
  outputDir: string;
  bucket: string;
  distributionId: string;
  /** Makes invalidation references unique per run */
  now?: () => number;
}

export interface PublishResult {
  uploaded: string[];
  invalidations: string[];
}

export class PublishService {
  constructor(private readonly clients: PublishClients) {}

  /**
   * Upload every artifact under `ds=<ds>/`, then the latest aliases, then
   * invalidate each alias path. Nothing is uploaded if an artifact is
   * missing; a failed upload stops without rolling back earlier ones.
   */
  async publish(options: PublishOptions): Promise<PublishResult> {
    const { ds, outputDir, bucket } = options;
    const missing = PUBLISHED_ARTIFACTS.filter((file) => !existsSync(join(outputDir, file)));
    if (missing.length > 0) {
      throw new PublicationError(partitionKey(ds, missing[0] ?? ""), `missing artifact(s) ${missing.join(", ")}`);
    }

    const uploads = [
      ...PUBLISHED_ARTIFACTS.map((file) => ({ file, key: partitionKey(ds, file) })),
      ...LATEST_ALIASES,
    ];
    const uploaded: string[] = [];
    for (const { file, key } of uploads) {
      await this.upload(bucket, key, join(outputDir, file));
      uploaded.push(key);
    }

    const now = options.now ?? Date.now;
    const invalidations: string[] = [];
    for (const { key } of LATEST_ALIASES) {
      const path = `/${key}`;
      try {
        const res = await this.clients.cdn.createInvalidation({
          DistributionId: options.distributionId,
          InvalidationBatch: {
            CallerReference: `${ds}-${basename(key)}-${now()}`,
            Paths: { Quantity: 1, Items: [path] },
          },
        });
        log.info({ path, invalidation: res.Invalidation?.Id }, "Invalidated");
      } catch (err) {
        throw new PublicationError(path, `invalidation failed: ${errorMessage(err)}`, { cause: err });
      }
      invalidations.push(path);
    }

    log.info({ ds, uploaded: uploaded.length, invalidations: invalidations.length }, "Published");
    return { uploaded, invalidations };
  }

  private async upload(bucket: string, key: string, path: string): Promise<void> {
    try {
      await this.clients.s3.putObject({
        Bucket: bucket,
        Key: key,
        Body: readFileSync(path),
        ContentType: contentType(path),
      });
    } catch (err) {
      throw new PublicationError(key, errorMessage(err), { cause: err });
    }
    log.info({ key }, "Uploaded");
  }
}
