/**
 * Row schemas for query results.
 *
 * DuckDB hands back untyped objects; every export parses its rows here
 * before anything is written, so a type drift in SQL fails the stage
 * instead of producing a malformed file.
 */

import { z } from "zod";
import type {
  CellWeekActivity,
  CountryMonthActivity,
  DailyCellActivity,
  MonthlyActivity,
  WeeklyChapterActivity,
} from "@mapper-activity/types";
import { RollupValidationError } from "@mapper-activity/shared";

const count = z.number().int();
const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

export const subtotalSchema = z.object({ new: count, edited: count });

export const bboxSchema = z.object({
  xmin: z.number(),
  ymin: z.number(),
  xmax: z.number(),
  ymax: z.number(),
});

export const weeklyRowSchema: z.ZodType<WeeklyChapterActivity> = z.object({
  chapter_id: count.nullable(),
  week: isoDate,
  all_feats: count,
  buildings: count,
  highways: count,
  amenities: count,
  other: count,
  mappers: count,
});

export const monthlyRowSchema: z.ZodType<MonthlyActivity> = z.object({
  month: isoDate,
  new_buildings: count,
  new_highways: count,
  new_amenities: count,
  edited_buildings: count,
  edited_highways: count,
  edited_amenities: count,
  chapters: count,
  users: count,
});

export const countryMonthRowSchema: z.ZodType<CountryMonthActivity> = z.object({
  country: z.string(),
  month: isoDate,
  all_feats: count,
});

export const dailyCellRowSchema: z.ZodType<DailyCellActivity> = z.object({
  h3: z.string(),
  timestamp: count,
  chapter_id: count.nullable(),
  all_feats: count,
  buildings: subtotalSchema,
  highways: subtotalSchema,
  amenities: subtotalSchema,
  lon: z.number(),
  lat: z.number(),
  bboxes: z.array(bboxSchema),
});

export const cellWeekRowSchema: z.ZodType<CellWeekActivity> = z.object({
  h3: z.string(),
  timestamp: count,
  all_feats: count,
  buildings: subtotalSchema,
  highways: subtotalSchema,
  amenities: subtotalSchema,
  mappers: count,
});

export const activityTotalsSchema = z.object({
  mappers: count,
  chapters: count,
  countries: count,
  all_feats: count,
  buildings: count,
  highways: count,
  amenities: count,
});

export const latestWeekSchema = z.object({
  week: isoDate,
  all_feats: count,
  mappers: count,
});

/** Parse query rows, naming the stage and the first bad row on failure */
export function parseRows<T extends z.ZodTypeAny>(
  stage: string,
  schema: T,
  rows: Record<string, unknown>[],
): z.infer<T>[] {
  return rows.map((row, index) => {
    const result = schema.safeParse(row);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      throw new RollupValidationError(`${stage} row ${index} is malformed: ${issues}`, row);
    }
    return result.data;
  });
}
