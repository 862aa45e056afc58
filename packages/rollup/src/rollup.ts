/**
 * Local rollup - loads the pinned partition and writes every export.
 */

import { join } from "node:path";

import type { PartitionId } from "@mapper-activity/types";
import { createLogger } from "@mapper-activity/logger";

import { weeklyCsv, writeJson, writeText } from "./exports/files.js";
import {
  cellWeekFeature,
  dailyBboxFeature,
  dailyPointFeature,
  toGeoJsonSeq,
  type GeoJsonFeature,
} from "./exports/geojson.js";
import type { QueryEngine } from "./session.js";
import {
  activitySummary,
  dailyCellTiles,
  deriveTables,
  exportDailyRollup,
  loadChangesets,
  loadCountries,
  loadRoster,
  monthlyActivity,
  mostEditedCountries,
  weeklyCellTiles,
  weeklyRollup,
  type RemoteSources,
} from "./stages.js";

const log = createLogger("rollup");

/** File names of everything the rollup writes to the output directory */
export const ROLLUP_FILES = {
  weeklyCsv: "weekly_chapter_activity.csv",
  monthly: "monthly_activity_all_time.json",
  topCountries: "top_edited_countries.json",
  summary: "activity.json",
  dailyRollup: "daily_rollup.parquet",
  h3Res4: "h3_4_weekly.geojsonseq",
  h3Res6: "h3_6_weekly.geojsonseq",
  dailyPoints: "daily_editing_per_user.geojsonseq",
  dailyBboxes: "daily_bboxes.geojsonseq",
} as const;

export interface RollupOptions {
  ds: PartitionId;
  outputDir: string;
  /** Local country reference Parquet */
  countriesFile: string;
  /** Remote Parquet to load; omit to reuse tables already in the database */
  sources?: RemoteSources;
}

export interface RollupResult {
  ds: PartitionId;
  /** Paths of the files written */
  files: string[];
}

/**
 * Query and write every tabular and tile-input export for the pinned
 * partition. Tables must already be derived.
 */
export async function writeExports(engine: QueryEngine, options: RollupOptions): Promise<RollupResult> {
  const { ds, outputDir } = options;
  const files: string[] = [];
  const out = (name: string) => {
    const path = join(outputDir, name);
    files.push(path);
    return path;
  };

  writeText(out(ROLLUP_FILES.weeklyCsv), weeklyCsv(await weeklyRollup(engine)));
  writeJson(out(ROLLUP_FILES.monthly), await monthlyActivity(engine, ds));
  writeJson(out(ROLLUP_FILES.topCountries), await mostEditedCountries(engine, ds));

  const daily = await dailyCellTiles(engine);
  writeText(out(ROLLUP_FILES.dailyPoints), toGeoJsonSeq(daily.map(dailyPointFeature)));
  writeText(
    out(ROLLUP_FILES.dailyBboxes),
    toGeoJsonSeq(daily.map(dailyBboxFeature).filter((f): f is GeoJsonFeature => f !== null)),
  );

  writeText(out(ROLLUP_FILES.h3Res6), toGeoJsonSeq((await weeklyCellTiles(engine, 6)).map(cellWeekFeature)));
  writeText(out(ROLLUP_FILES.h3Res4), toGeoJsonSeq((await weeklyCellTiles(engine, 4)).map(cellWeekFeature)));

  await exportDailyRollup(engine, out(ROLLUP_FILES.dailyRollup));

  const summary = await activitySummary(engine, ds);
  writeJson(out(ROLLUP_FILES.summary), summary);

  log.info({ ds, files: files.length, mappers: summary.mappers }, "Rollup exports written");
  return { ds, files };
}

/** Load (unless reusing tables), derive, and export */
export async function runRollup(engine: QueryEngine, options: RollupOptions): Promise<RollupResult> {
  if (options.sources) {
    await loadChangesets(engine, options.ds, options.sources.changesets);
    await loadRoster(engine, options.sources.roster);
  } else {
    log.info("Reusing changesets and roster tables already in the database");
  }
  await loadCountries(engine, options.countriesFile);
  await deriveTables(engine);
  return writeExports(engine, options);
}
