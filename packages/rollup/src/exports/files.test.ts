import { describe, it, expect } from "vitest";

import { weeklyCsv } from "./files.js";

describe("weeklyCsv", () => {
  it("writes a header and one line per row", () => {
    const csv = weeklyCsv([
      { chapter_id: 7, week: "2024-03-04", all_feats: 13, buildings: 4, highways: 2, amenities: 1, other: 6, mappers: 2 },
      { chapter_id: null, week: "2024-03-11", all_feats: 1, buildings: 0, highways: 0, amenities: 0, other: 1, mappers: 1 },
    ]);

    expect(csv).toBe(
      "chapter_id,week,all_feats,buildings,highways,amenities,other,mappers\n" +
        "7,2024-03-04,13,4,2,1,6,2\n" +
        ",2024-03-11,1,0,0,0,1,1\n",
    );
  });

  it("writes only the header for no rows", () => {
    expect(weeklyCsv([])).toBe("chapter_id,week,all_feats,buildings,highways,amenities,other,mappers\n");
  });
});
