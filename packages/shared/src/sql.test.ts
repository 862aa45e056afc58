import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { loadQuery, queryParameters, quoteLiteral, renderQuery, wrapQuery } from "./sql.js";
import { QueryNotFoundError } from "./errors.js";

const SQL = `-- BEGIN first
SELECT 1
-- END

--BEGIN second
SELECT *
FROM t
WHERE ds = '{{ds}}'
--END
`;

let dir: string;

beforeAll(() => {
  dir = mkdtempSync(join(tmpdir(), "sql-test-"));
  writeFileSync(join(dir, "queries.sql"), SQL);
});

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("loadQuery", () => {
  it("returns a named block without its markers", () => {
    expect(loadQuery("queries.sql:first", dir)).toBe("SELECT 1");
  });

  it("accepts markers without a space after the dashes", () => {
    expect(loadQuery("queries.sql:second", dir)).toBe("SELECT *\nFROM t\nWHERE ds = '{{ds}}'");
  });

  it("returns the whole file when no block is named", () => {
    expect(loadQuery("queries.sql", dir)).toBe(SQL.trim());
  });

  it("resolves absolute paths directly", () => {
    expect(loadQuery(`${join(dir, "queries.sql")}:first`, "/nonexistent")).toBe("SELECT 1");
  });

  it("throws QueryNotFoundError for a missing file", () => {
    expect(() => loadQuery("missing.sql", dir)).toThrow(QueryNotFoundError);
  });

  it("throws QueryNotFoundError for a missing block", () => {
    expect(() => loadQuery("queries.sql:third", dir)).toThrow(
      "Query 'third' not found",
    );
  });
});

describe("renderQuery", () => {
  it("substitutes every placeholder", () => {
    expect(renderQuery("SELECT {{a}}, {{ b }}, {{a}}", { a: 1, b: "x" })).toBe("SELECT 1, x, 1");
  });

  it("throws on a placeholder without a value", () => {
    expect(() => renderQuery("SELECT {{missing}}", {})).toThrow(
      "No value for query parameter 'missing'",
    );
  });

  it("lists placeholders once each", () => {
    expect(queryParameters("{{ds}} {{cell}} {{ds}}")).toEqual(["ds", "cell"]);
  });
});

describe("quoteLiteral", () => {
  it("doubles embedded quotes", () => {
    expect(quoteLiteral("it's")).toBe("'it''s'");
  });
});

describe("wrapQuery", () => {
  it("wraps the query in parentheses between prefix and suffix", () => {
    expect(wrapQuery("SELECT 1", " COPY ", " TO 'out.csv' ")).toBe("COPY (SELECT 1) TO 'out.csv'");
  });

  it("returns the query unchanged without prefix or suffix", () => {
    expect(wrapQuery("SELECT 1")).toBe("SELECT 1");
  });

  it("handles a prefix alone", () => {
    expect(wrapQuery("SELECT 1", "CREATE TABLE t AS")).toBe("CREATE TABLE t AS (SELECT 1)");
  });
});
