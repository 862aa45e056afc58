import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { NoPartitionFoundError } from "@mapper-activity/shared";

import type { S3ListApi } from "./aws.js";
import {
  discoverLatestPartition,
  listPartitions,
  parseS3Uri,
  pinPartition,
  readPinnedPartition,
} from "./partitions.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

/** S3 stand-in returning one page of common prefixes per call */
function makeS3(pages: string[][]) {
  const listObjectsV2 = vi.fn<S3ListApi["listObjectsV2"]>(async (input) => {
    const index = input.ContinuationToken ? Number(input.ContinuationToken) : 0;
    const prefixes = pages[index] ?? [];
    const more = index + 1 < pages.length;
    return {
      $metadata: {},
      CommonPrefixes: prefixes.map((Prefix) => ({ Prefix })),
      IsTruncated: more,
      NextContinuationToken: more ? String(index + 1) : undefined,
    };
  });
  const s3: S3ListApi = { listObjectsV2 };
  return { s3, listObjectsV2 };
}

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "partitions-test-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

// ─── parseS3Uri ─────────────────────────────────────────────────────────────

describe("parseS3Uri", () => {
  it("normalizes the prefix to one trailing slash", () => {
    expect(parseS3Uri("s3://bucket/a/b")).toEqual({ bucket: "bucket", prefix: "a/b/" });
    expect(parseS3Uri("s3://bucket/a/b//")).toEqual({ bucket: "bucket", prefix: "a/b/" });
  });

  it("rejects URIs without the scheme or a path", () => {
    expect(() => parseS3Uri("bucket/a/")).toThrow("Expected a full S3 URI");
    expect(() => parseS3Uri("s3://bucket")).toThrow("must include a path");
    expect(() => parseS3Uri("s3://bucket/")).toThrow("must include a path");
  });
});

// ─── listPartitions ─────────────────────────────────────────────────────────

describe("listPartitions", () => {
  it("follows continuation tokens and keeps only key= prefixes", async () => {
    const { s3, listObjectsV2 } = makeS3([
      ["changesets/ds=2024-03-01/", "changesets/_tmp/"],
      ["changesets/ds=2024-03-08/"],
    ]);

    const partitions = await listPartitions(s3, "s3://test-internal/changesets/");

    expect(partitions).toEqual([
      { value: "2024-03-01", prefix: "changesets/ds=2024-03-01/" },
      { value: "2024-03-08", prefix: "changesets/ds=2024-03-08/" },
    ]);
    expect(listObjectsV2).toHaveBeenCalledTimes(2);
    expect(listObjectsV2.mock.calls[0]?.[0]).toEqual({
      Bucket: "test-internal",
      Prefix: "changesets/",
      Delimiter: "/",
      ContinuationToken: undefined,
    });
  });
});

// ─── discoverLatestPartition ────────────────────────────────────────────────

describe("discoverLatestPartition", () => {
  it("selects the lexicographic maximum", async () => {
    const { s3 } = makeS3([
      ["changesets/ds=2024-03-08/", "changesets/ds=2024-03-15/", "changesets/ds=2023-12-31/"],
    ]);

    await expect(discoverLatestPartition(s3, "s3://test-internal/changesets/")).resolves.toEqual({
      found: true,
      ds: "2024-03-15",
      prefix: "changesets/ds=2024-03-15/",
    });
  });

  it("skips values that are not ISO dates", async () => {
    const { s3 } = makeS3([["changesets/ds=2024-03-08/", "changesets/ds=latest/"]]);

    const result = await discoverLatestPartition(s3, "s3://test-internal/changesets/");

    expect(result).toMatchObject({ found: true, ds: "2024-03-08" });
  });

  it("reports not-found for an empty location", async () => {
    const { s3 } = makeS3([[]]);

    await expect(discoverLatestPartition(s3, "s3://test-internal/changesets/")).resolves.toEqual({
      found: false,
      searched: "s3://test-internal/changesets/",
    });
  });
});

// ─── pin / read ─────────────────────────────────────────────────────────────

describe("pinPartition", () => {
  it("writes the partition to the marker file", () => {
    const marker = join(dir, "output", "latest_ds.txt");

    const ds = pinPartition({ found: true, ds: "2024-03-15", prefix: "changesets/ds=2024-03-15/" }, marker);

    expect(ds).toBe("2024-03-15");
    expect(readFileSync(marker, "utf-8")).toBe("2024-03-15\n");
  });

  it("rewrites the same value when nothing new arrived", () => {
    const marker = join(dir, "latest_ds.txt");
    const found = { found: true as const, ds: "2024-03-15", prefix: "changesets/ds=2024-03-15/" };

    pinPartition(found, marker);
    pinPartition(found, marker);

    expect(readPinnedPartition(marker)).toBe("2024-03-15");
  });

  it("throws NoPartitionFoundError instead of falling back", () => {
    const marker = join(dir, "latest_ds.txt");
    writeFileSync(marker, "2024-01-01\n");

    expect(() => pinPartition({ found: false, searched: "s3://test-internal/changesets/" }, marker)).toThrow(
      NoPartitionFoundError,
    );
    expect(readFileSync(marker, "utf-8")).toBe("2024-01-01\n");
  });
});

describe("readPinnedPartition", () => {
  it("throws when the marker is missing", () => {
    expect(() => readPinnedPartition(join(dir, "missing.txt"))).toThrow("partition marker is missing");
  });

  it("throws when the marker is not a date", () => {
    const marker = join(dir, "latest_ds.txt");
    writeFileSync(marker, "garbage\n");

    expect(() => readPinnedPartition(marker)).toThrow("marker holds 'garbage'");
  });
});
