/**
 * Aggregated activity rows - the outputs of the rollup stages.
 */

import type { ChangesetBbox } from "./geo.js";
import type { FeatureTotals, Subtotal } from "./counts.js";
import type { PartitionId } from "./partition.js";

/** One row of the weekly chapter rollup */
export interface WeeklyChapterActivity {
  chapter_id: number | null;
  /** Monday of the week, `YYYY-MM-DD` */
  week: string;
  all_feats: number;
  buildings: number;
  highways: number;
  amenities: number;
  /** Features outside the three named categories */
  other: number;
  /** Distinct mappers active in the chapter that week */
  mappers: number;
}

/** One row of the all-time monthly rollup */
export interface MonthlyActivity {
  /** Mid-month label (the 15th), `YYYY-MM-DD` */
  month: string;
  new_buildings: number;
  new_highways: number;
  new_amenities: number;
  edited_buildings: number;
  edited_highways: number;
  edited_amenities: number;
  chapters: number;
  users: number;
}

/** One entry of the most-edited-countries ranking */
export interface CountryMonthActivity {
  country: string;
  month: string;
  all_feats: number;
}

/** Daily activity of one mapper within one fine H3 cell */
export interface DailyCellActivity {
  h3: string;
  /** Start of the day, seconds since epoch */
  timestamp: number;
  chapter_id: number | null;
  all_feats: number;
  buildings: Subtotal;
  highways: Subtotal;
  amenities: Subtotal;
  /** Centroid of the distinct changeset points */
  lon: number;
  lat: number;
  bboxes: ChangesetBbox[];
}

/** Weekly activity within one coarse H3 cell */
export interface CellWeekActivity {
  h3: string;
  /** Start of the week, seconds since epoch */
  timestamp: number;
  all_feats: number;
  buildings: Subtotal;
  highways: Subtotal;
  amenities: Subtotal;
  mappers: number;
}

/** Feature totals across categories */
export interface CategoryTotals {
  all_feats: number;
  buildings: number;
  highways: number;
  amenities: number;
  other: number;
}

/** Root-level dashboard summary published as `activity.json` */
export interface ActivitySummary {
  ds: PartitionId;
  mappers: number;
  chapters: number;
  countries: number;
  totals: CategoryTotals;
  latest_week: {
    week: string;
    all_feats: number;
    mappers: number;
  } | null;
}
