/**
 * Catalog setup and the primary UNLOAD.
 */

import { createLogger } from "@mapper-activity/logger";
import { quoteLiteral } from "@mapper-activity/shared";

import type { QueryRunner } from "./query-runner.js";

const log = createLogger("catalog");

/** Named blocks of tables.sql, in registration order */
export const TABLE_QUERIES = [
  "changesets",
  "planet-history",
  "planet",
  "country-boundaries",
  "members",
] as const;

export const MEMBERS_TABLE = "members";

/** Where the roster snapshots live */
export function rosterLocation(internalBucket: string): string {
  return `s3://${internalBucket}/mappers/`;
}

/** Where the primary query writes its `ds=` partitions */
export function changesetsLocation(internalBucket: string): string {
  return `s3://${internalBucket}/changesets/`;
}

export async function createDatabase(runner: QueryRunner, database: string): Promise<void> {
  await runner.runQuery({ query: `CREATE DATABASE IF NOT EXISTS ${database}`, name: "create-database" });
  await runner.waitForQueries();
}

/** Submit every table DDL together and wait for all of them */
export async function registerTables(runner: QueryRunner, internalBucket: string): Promise<void> {
  for (const name of TABLE_QUERIES) {
    await runner.runQuery({
      queryPath: `tables.sql:${name}`,
      name: `table:${name}`,
      params: { internalBucket },
    });
  }
  await runner.waitForQueries();
  log.info({ tables: TABLE_QUERIES.length }, "External tables registered");
}

export interface PrimaryQueryOptions {
  internalBucket: string;
  /** Earliest changeset date, `YYYY-MM-DD` */
  minDate: string;
}

/** UNLOAD the enriched roster changesets as ZSTD Parquet partitioned by `ds` */
export async function runPrimaryQuery(runner: QueryRunner, options: PrimaryQueryOptions): Promise<void> {
  const target = changesetsLocation(options.internalBucket);
  await runner.runQuery({
    queryPath: "primary.sql:enriched-changesets",
    name: "enriched-changesets",
    params: { minDate: options.minDate },
    prefix: "UNLOAD",
    suffix: `TO ${quoteLiteral(target)} WITH (format = 'PARQUET', compression = 'ZSTD', partitioned_by = ARRAY['ds'])`,
  });
  await runner.waitForQueries();
  log.info({ target }, "Primary query unloaded");
}
