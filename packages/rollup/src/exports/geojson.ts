/**
 * GeoJSON sequence export for the tile builder.
 *
 * One Feature per line. Category properties follow the sparse rule: a
 * category with no new or edited features is left off the feature.
 */

import { cellToBoundary } from "h3-js";

import type { CellWeekActivity, ChangesetBbox, DailyCellActivity, Subtotal } from "@mapper-activity/types";
import { sparse, total } from "@mapper-activity/shared";

/** GeoJSON types (subset we need) */
export interface GeoJsonPoint {
  type: "Point";
  coordinates: [number, number];
}

export interface GeoJsonPolygon {
  type: "Polygon";
  coordinates: number[][][];
}

export interface GeoJsonFeature {
  type: "Feature";
  geometry: GeoJsonPoint | GeoJsonPolygon;
  properties: Record<string, string | number>;
}

/** Category totals keyed by name, omitting empty categories */
function categoryProperties(categories: Record<string, Subtotal>): Record<string, number> {
  const props: Record<string, number> = {};
  for (const [name, subtotal] of Object.entries(categories)) {
    const present = sparse(subtotal);
    if (present) props[name] = total(present);
  }
  return props;
}

function dailyProperties(row: DailyCellActivity): Record<string, string | number> {
  return {
    h3: row.h3,
    timestamp: row.timestamp,
    ...(row.chapter_id === null ? {} : { chapter_id: row.chapter_id }),
    all_feats: row.all_feats,
    ...categoryProperties({ buildings: row.buildings, highways: row.highways, amenities: row.amenities }),
  };
}

/** Smallest box holding every changeset box: min of mins, max of maxes */
export function envelope(bboxes: readonly ChangesetBbox[]): ChangesetBbox | null {
  const [first, ...rest] = bboxes;
  if (!first) return null;
  return rest.reduce<ChangesetBbox>(
    (acc, b) => ({
      xmin: Math.min(acc.xmin, b.xmin),
      ymin: Math.min(acc.ymin, b.ymin),
      xmax: Math.max(acc.xmax, b.xmax),
      ymax: Math.max(acc.ymax, b.ymax),
    }),
    { xmin: first.xmin, ymin: first.ymin, xmax: first.xmax, ymax: first.ymax },
  );
}

export function bboxPolygon(b: ChangesetBbox): GeoJsonPolygon {
  return {
    type: "Polygon",
    coordinates: [
      [
        [b.xmin, b.ymin],
        [b.xmax, b.ymin],
        [b.xmax, b.ymax],
        [b.xmin, b.ymax],
        [b.xmin, b.ymin],
      ],
    ],
  };
}

/** Daily cell activity at its centroid */
export function dailyPointFeature(row: DailyCellActivity): GeoJsonFeature {
  return {
    type: "Feature",
    geometry: { type: "Point", coordinates: [row.lon, row.lat] },
    properties: dailyProperties(row),
  };
}

/** Daily cell activity as the envelope of its changeset boxes; null without boxes */
export function dailyBboxFeature(row: DailyCellActivity): GeoJsonFeature | null {
  const box = envelope(row.bboxes);
  if (!box) return null;
  return {
    type: "Feature",
    geometry: bboxPolygon(box),
    properties: dailyProperties(row),
  };
}

/** Weekly activity drawn as its H3 cell */
export function cellWeekFeature(row: CellWeekActivity): GeoJsonFeature {
  return {
    type: "Feature",
    geometry: { type: "Polygon", coordinates: [cellToBoundary(row.h3, true)] },
    properties: {
      h3: row.h3,
      timestamp: row.timestamp,
      all_feats: row.all_feats,
      ...categoryProperties({ buildings: row.buildings, highways: row.highways, amenities: row.amenities }),
      mappers: row.mappers,
    },
  };
}

export function toGeoJsonSeq(features: Iterable<GeoJsonFeature>): string {
  let out = "";
  for (const feature of features) {
    out += `${JSON.stringify(feature)}\n`;
  }
  return out;
}
