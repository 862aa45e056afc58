import { describe, it, expect } from "vitest";

import type { AthenaApi } from "./aws.js";
import { QueryRunner } from "./query-runner.js";
import { createDatabase, registerTables, runPrimaryQuery, TABLE_QUERIES } from "./tables.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

/** Athena stand-in that records submit / poll events; every query succeeds */
function makeRunner() {
  const events: string[] = [];
  const queries: string[] = [];
  const athena: AthenaApi = {
    startQueryExecution: async (input) => {
      queries.push(input.QueryString ?? "");
      events.push("submit");
      return { $metadata: {}, QueryExecutionId: `exec-${queries.length}` };
    },
    getQueryExecution: async (input) => {
      events.push("poll");
      return { $metadata: {}, QueryExecution: { QueryExecutionId: input.QueryExecutionId, Status: { State: "SUCCEEDED" } } };
    },
  };
  const runner = new QueryRunner({
    athena,
    database: "test_db",
    workgroup: "test_wg",
    outputLocation: "s3://test-results/",
    sleep: async () => undefined,
  });
  return { runner, events, queries };
}

// ─── Tests ──────────────────────────────────────────────────────────────────

describe("createDatabase", () => {
  it("creates the database if missing and waits", async () => {
    const { runner, queries, events } = makeRunner();

    await createDatabase(runner, "test_db");

    expect(queries).toEqual(["CREATE DATABASE IF NOT EXISTS test_db"]);
    expect(events).toEqual(["submit", "poll"]);
  });
});

describe("registerTables", () => {
  it("submits all five DDLs before waiting on any", async () => {
    const { runner, events, queries } = makeRunner();

    await registerTables(runner, "test-internal");

    expect(TABLE_QUERIES).toHaveLength(5);
    expect(events.slice(0, 5)).toEqual(["submit", "submit", "submit", "submit", "submit"]);
    expect(events.slice(5)).toEqual(["poll", "poll", "poll", "poll", "poll"]);
    expect(queries.every((q) => q.startsWith("CREATE EXTERNAL TABLE IF NOT EXISTS"))).toBe(true);
    expect(queries[3]).toContain("LOCATION 's3://test-internal/country_boundaries/'");
  });
});

describe("runPrimaryQuery", () => {
  it("unloads to the changesets location partitioned by ds", async () => {
    const { runner, queries } = makeRunner();

    await runPrimaryQuery(runner, { internalBucket: "test-internal", minDate: "2015-01-01" });

    const sql = queries[0] ?? "";
    expect(sql.startsWith("UNLOAD (WITH roster AS (")).toBe(true);
    expect(sql).toContain("WHERE c.created_at >= DATE '2015-01-01'");
    expect(
      sql.endsWith(
        ") TO 's3://test-internal/changesets/' WITH (format = 'PARQUET', compression = 'ZSTD', partitioned_by = ARRAY['ds'])",
      ),
    ).toBe(true);
  });
});
