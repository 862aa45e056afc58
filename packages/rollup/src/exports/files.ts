/**
 * Plain file writers for the tabular exports.
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";

import type { WeeklyChapterActivity } from "@mapper-activity/types";

export const WEEKLY_CSV_COLUMNS = [
  "chapter_id",
  "week",
  "all_feats",
  "buildings",
  "highways",
  "amenities",
  "other",
  "mappers",
] as const satisfies readonly (keyof WeeklyChapterActivity)[];

/** Header plus one line per row; a missing chapter id is an empty field */
export function weeklyCsv(rows: readonly WeeklyChapterActivity[]): string {
  const lines = [WEEKLY_CSV_COLUMNS.join(",")];
  for (const row of rows) {
    lines.push(WEEKLY_CSV_COLUMNS.map((col) => String(row[col] ?? "")).join(","));
  }
  return `${lines.join("\n")}\n`;
}

export function writeText(path: string, content: string): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content);
}

export function writeJson(path: string, value: unknown): void {
  writeText(path, `${JSON.stringify(value, null, 2)}\n`);
}
