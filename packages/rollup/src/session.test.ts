import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { RollupSession, resolveNamedQuery } from "./session.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

const dirs: string[] = [];

function makeDir(): string {
  const dir = mkdtempSync(join(tmpdir(), "session-test-"));
  dirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of dirs.splice(0)) {
    rmSync(dir, { recursive: true, force: true });
  }
});

// ─── Tests ──────────────────────────────────────────────────────────────────

describe("resolveNamedQuery", () => {
  it("renders the changeset load with the pinned partition and all cell resolutions", () => {
    const sql = resolveNamedQuery({
      queryPath: "rollup.sql:load-changesets",
      params: { ds: "2024-03-20", source: "'s3://internal-bucket/changesets/ds=2024-03-20/*'" },
    });

    expect(sql.startsWith("CREATE OR REPLACE TABLE changesets AS")).toBe(true);
    expect(sql).toContain("h3_latlng_to_cell_string(lat, lon, 8) AS h3,");
    expect(sql).toContain("h3_latlng_to_cell_string(lat, lon, 6) AS h3_6,");
    expect(sql).toContain("h3_latlng_to_cell_string(lat, lon, 4) AS h3_4,");
    expect(sql).toContain("'2024-03-20' AS ds");
    expect(sql).toContain(
      "FROM read_parquet('s3://internal-bucket/changesets/ds=2024-03-20/*', hive_partitioning = false)",
    );
    expect(sql).not.toContain("{{");
  });

  it("wraps a query in a prefix and suffix", () => {
    const sql = resolveNamedQuery({
      queryPath: "rollup.sql:activity-totals",
      prefix: "COPY",
      suffix: "TO 'out.parquet' (FORMAT PARQUET)",
    });

    expect(sql.startsWith("COPY (")).toBe(true);
    expect(sql.endsWith(") TO 'out.parquet' (FORMAT PARQUET)")).toBe(true);
  });
});

describe("RollupSession", () => {
  it("releases a database file on close", async () => {
    const path = join(makeDir(), "rollup.duckdb");

    const first = await RollupSession.open({ path, extensions: [] });
    await first.run("create", "CREATE TABLE marks AS SELECT 42 AS value");
    first.close();

    const second = await RollupSession.open({ path, extensions: [] });
    const rows = await second.all("read", "SELECT value FROM marks");
    second.close();

    expect(rows).toEqual([{ value: 42 }]);
  });
});
