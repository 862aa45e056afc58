import { describe, it, expect } from "vitest";
import { cellToBoundary, latLngToCell } from "h3-js";
import type { CellWeekActivity, DailyCellActivity } from "@mapper-activity/types";

import {
  cellWeekFeature,
  dailyBboxFeature,
  dailyPointFeature,
  envelope,
  toGeoJsonSeq,
} from "./geojson.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

const CELL = latLngToCell(-1.3, 36.8, 8);

function makeDaily(overrides: Partial<DailyCellActivity> = {}): DailyCellActivity {
  return {
    h3: CELL,
    timestamp: 1709596800,
    chapter_id: 7,
    all_feats: 12,
    buildings: { new: 3, edited: 1 },
    highways: { new: 2, edited: 0 },
    amenities: { new: 0, edited: 0 },
    lon: 36.8001,
    lat: -1.3001,
    bboxes: [
      { xmin: 36.79, ymin: -1.31, xmax: 36.81, ymax: -1.29 },
      { xmin: 36.8, ymin: -1.305, xmax: 36.82, ymax: -1.295 },
    ],
    ...overrides,
  };
}

// ─── Tests ──────────────────────────────────────────────────────────────────

describe("envelope", () => {
  it("takes the min of mins and max of maxes", () => {
    expect(envelope(makeDaily().bboxes)).toEqual({ xmin: 36.79, ymin: -1.31, xmax: 36.82, ymax: -1.29 });
  });

  it("is null without boxes", () => {
    expect(envelope([])).toBeNull();
  });
});

describe("dailyPointFeature", () => {
  it("places the feature at the centroid and drops empty categories", () => {
    const feature = dailyPointFeature(makeDaily());

    expect(feature.geometry).toEqual({ type: "Point", coordinates: [36.8001, -1.3001] });
    expect(feature.properties).toEqual({
      h3: CELL,
      timestamp: 1709596800,
      chapter_id: 7,
      all_feats: 12,
      buildings: 4,
      highways: 2,
    });
    expect("amenities" in feature.properties).toBe(false);
  });

  it("leaves out a missing chapter", () => {
    const feature = dailyPointFeature(makeDaily({ chapter_id: null }));
    expect(Object.keys(feature.properties)).toEqual(["h3", "timestamp", "all_feats", "buildings", "highways"]);
  });
});

describe("dailyBboxFeature", () => {
  it("draws the envelope as a closed ring", () => {
    const feature = dailyBboxFeature(makeDaily());

    expect(feature?.geometry).toEqual({
      type: "Polygon",
      coordinates: [
        [
          [36.79, -1.31],
          [36.82, -1.31],
          [36.82, -1.29],
          [36.79, -1.29],
          [36.79, -1.31],
        ],
      ],
    });
  });

  it("is null for a row without boxes", () => {
    expect(dailyBboxFeature(makeDaily({ bboxes: [] }))).toBeNull();
  });
});

describe("cellWeekFeature", () => {
  it("draws the cell boundary in lng/lat order", () => {
    const cell = latLngToCell(-1.3, 36.8, 6);
    const row: CellWeekActivity = {
      h3: cell,
      timestamp: 1709510400,
      all_feats: 13,
      buildings: { new: 3, edited: 1 },
      highways: { new: 0, edited: 0 },
      amenities: { new: 0, edited: 1 },
      mappers: 2,
    };

    const feature = cellWeekFeature(row);

    expect(feature.geometry).toEqual({ type: "Polygon", coordinates: [cellToBoundary(cell, true)] });
    expect(feature.properties).toEqual({
      h3: cell,
      timestamp: 1709510400,
      all_feats: 13,
      buildings: 4,
      amenities: 1,
      mappers: 2,
    });
  });
});

describe("toGeoJsonSeq", () => {
  it("writes one feature per line", () => {
    const text = toGeoJsonSeq([dailyPointFeature(makeDaily()), dailyPointFeature(makeDaily({ all_feats: 1 }))]);
    const lines = text.split("\n");

    expect(lines).toHaveLength(3);
    expect(lines[2]).toBe("");
    expect(JSON.parse(lines[1] ?? "")).toMatchObject({ type: "Feature", properties: { all_feats: 1 } });
  });
});
