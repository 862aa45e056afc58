/**
 * Named aggregation stages.
 *
 * Stages run in a fixed order, each reading tables the previous one built:
 *
 *   load-changesets / load-roster / load-countries
 *     → latest-roster → enriched-changesets → cell-day-activity
 *     → weekly / monthly / countries / tiles / summary / daily rollup
 */

import type {
  ActivitySummary,
  CellWeekActivity,
  CountryMonthActivity,
  DailyCellActivity,
  MonthlyActivity,
  PartitionId,
  WeeklyChapterActivity,
} from "@mapper-activity/types";
import { createLogger } from "@mapper-activity/logger";
import { RollupValidationError, quoteLiteral } from "@mapper-activity/shared";

import {
  activityTotalsSchema,
  cellWeekRowSchema,
  countryMonthRowSchema,
  dailyCellRowSchema,
  latestWeekSchema,
  monthlyRowSchema,
  parseRows,
  weeklyRowSchema,
} from "./schemas.js";
import { allNamed, runNamed, type QueryEngine } from "./session.js";

const log = createLogger("rollup");

/** Coarse cell resolutions with their own weekly tiles */
export type CoarseResolution = 4 | 6;

export interface RemoteSources {
  /** Parquet glob of the pinned changesets partition */
  changesets: string;
  /** Parquet glob covering every roster snapshot */
  roster: string;
}

// ─── Load ───────────────────────────────────────────────────────────────────

export async function loadChangesets(engine: QueryEngine, ds: PartitionId, source: string): Promise<void> {
  await runNamed(engine, { queryPath: "rollup.sql:load-changesets", params: { ds, source: quoteLiteral(source) } });
}

export async function loadRoster(engine: QueryEngine, source: string): Promise<void> {
  await runNamed(engine, { queryPath: "rollup.sql:load-roster", params: { source: quoteLiteral(source) } });
}

export async function loadCountries(engine: QueryEngine, file: string): Promise<void> {
  await runNamed(engine, { queryPath: "rollup.sql:load-countries", params: { source: quoteLiteral(file) } });
}

/** Remote sources of one partition */
export function remoteSources(internalBucket: string, ds: PartitionId): RemoteSources {
  return {
    changesets: `s3://${internalBucket}/changesets/ds=${ds}/*`,
    roster: `s3://${internalBucket}/mappers/ds=*/*.parquet`,
  };
}

// ─── Derived tables ─────────────────────────────────────────────────────────

export const DERIVED_STAGES = ["latest-roster", "enriched-changesets", "cell-day-activity"] as const;

/** Build latest_roster, roster_changesets and cell_day_activity */
export async function deriveTables(engine: QueryEngine): Promise<void> {
  for (const stage of DERIVED_STAGES) {
    await runNamed(engine, { queryPath: `rollup.sql:${stage}` });
  }
}

// ─── Export queries ─────────────────────────────────────────────────────────

/**
 * A negative `other` means one feature carried two named tags (e.g.
 * `building=school` + `amenity=school`) and was counted in both categories.
 * The rows are kept as computed; each one is logged and returned.
 */
export function reportDoubleCounts(rows: readonly WeeklyChapterActivity[]): WeeklyChapterActivity[] {
  const doubled = rows.filter((row) => row.other < 0);
  for (const row of doubled) {
    log.warn({ ...row }, "Named categories exceed all features in weekly rollup");
  }
  return doubled;
}

export async function weeklyRollup(engine: QueryEngine): Promise<WeeklyChapterActivity[]> {
  const rows = parseRows(
    "weekly-rollup",
    weeklyRowSchema,
    await allNamed(engine, { queryPath: "rollup.sql:weekly-rollup" }),
  );
  reportDoubleCounts(rows);
  return rows;
}

export async function monthlyActivity(engine: QueryEngine, ds: PartitionId): Promise<MonthlyActivity[]> {
  return parseRows(
    "monthly-activity",
    monthlyRowSchema,
    await allNamed(engine, { queryPath: "rollup.sql:monthly-activity", params: { ds } }),
  );
}

export async function mostEditedCountries(engine: QueryEngine, ds: PartitionId): Promise<CountryMonthActivity[]> {
  return parseRows(
    "most-edited-countries",
    countryMonthRowSchema,
    await allNamed(engine, { queryPath: "rollup.sql:most-edited-countries", params: { ds } }),
  );
}

export async function dailyCellTiles(engine: QueryEngine): Promise<DailyCellActivity[]> {
  return parseRows(
    "daily-cell-tiles",
    dailyCellRowSchema,
    await allNamed(engine, { queryPath: "rollup.sql:daily-cell-tiles" }),
  );
}

export async function weeklyCellTiles(engine: QueryEngine, resolution: CoarseResolution): Promise<CellWeekActivity[]> {
  return parseRows(
    `weekly-cell-tiles@${resolution}`,
    cellWeekRowSchema,
    await allNamed(engine, { queryPath: "rollup.sql:weekly-cell-tiles", params: { cell: `h3_${resolution}` } }),
  );
}

export async function activitySummary(engine: QueryEngine, ds: PartitionId): Promise<ActivitySummary> {
  const [totals] = parseRows(
    "activity-totals",
    activityTotalsSchema,
    await allNamed(engine, { queryPath: "rollup.sql:activity-totals" }),
  );
  const [latest] = parseRows(
    "latest-week",
    latestWeekSchema,
    await allNamed(engine, { queryPath: "rollup.sql:latest-week", params: { ds } }),
  );
  if (!totals) {
    throw new RollupValidationError("activity-totals returned no row", {});
  }

  const other = totals.all_feats - totals.buildings - totals.highways - totals.amenities;
  if (other < 0) {
    log.warn({ ...totals, other }, "Named categories exceed all features in activity totals");
  }

  return {
    ds,
    mappers: totals.mappers,
    chapters: totals.chapters,
    countries: totals.countries,
    totals: {
      all_feats: totals.all_feats,
      buildings: totals.buildings,
      highways: totals.highways,
      amenities: totals.amenities,
      other,
    },
    latest_week: latest ?? null,
  };
}

/** COPY the anonymized daily rollup to a ZSTD Parquet file */
export async function exportDailyRollup(engine: QueryEngine, path: string): Promise<void> {
  await runNamed(engine, {
    queryPath: "rollup.sql:daily-rollup",
    prefix: "COPY",
    suffix: `TO ${quoteLiteral(path)} (FORMAT PARQUET, COMPRESSION ZSTD)`,
  });
}
