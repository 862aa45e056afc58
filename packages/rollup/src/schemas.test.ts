import { describe, it, expect } from "vitest";
import { RollupValidationError } from "@mapper-activity/shared";

import { countryMonthRowSchema, dailyCellRowSchema, parseRows } from "./schemas.js";

describe("parseRows", () => {
  it("returns rows that match the schema", () => {
    const rows = [{ country: "Kenya", month: "2024-03-15", all_feats: 19 }];

    expect(parseRows("most-edited-countries", countryMonthRowSchema, rows)).toEqual(rows);
  });

  it("names the stage, row and field of a malformed row", () => {
    const rows = [
      { country: "Kenya", month: "2024-03-15", all_feats: 19 },
      { country: "Uganda", month: "March", all_feats: 2.5 },
    ];

    expect(() => parseRows("most-edited-countries", countryMonthRowSchema, rows)).toThrow(RollupValidationError);
    expect(() => parseRows("most-edited-countries", countryMonthRowSchema, rows)).toThrow(
      /^most-edited-countries row 1 is malformed: month: Invalid; all_feats: Expected integer, received float$/,
    );
  });

  it("accepts daily rows without a chapter or boxes", () => {
    const row = {
      h3: "887a6e4285fffff",
      timestamp: 1709596800,
      chapter_id: null,
      all_feats: 1,
      buildings: { new: 0, edited: 0 },
      highways: { new: 0, edited: 0 },
      amenities: { new: 0, edited: 0 },
      lon: 36.8,
      lat: -1.3,
      bboxes: [],
    };

    expect(parseRows("daily-cell-tiles", dailyCellRowSchema, [row])).toEqual([row]);
  });
});
