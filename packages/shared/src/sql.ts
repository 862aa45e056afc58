/**
 * SQL file loading.
 *
 * SQL lives in `.sql` files beside each package. A file may hold several
 * named blocks:
 *
 *   -- BEGIN weekly-rollup
 *   SELECT ...
 *   -- END
 *
 * `loadQuery("rollup.sql:weekly-rollup")` returns one block,
 * `loadQuery("rollup.sql")` the whole file.
 */

import { existsSync, readFileSync } from "node:fs";
import { isAbsolute, join } from "node:path";

import { QueryNotFoundError } from "./errors.js";

export type QueryParams = Record<string, string | number>;

const PLACEHOLDER = /\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g;

function isBeginMarker(line: string, name: string): boolean {
  return line === `-- BEGIN ${name}` || line === `--BEGIN ${name}`;
}

function isEndMarker(line: string): boolean {
  return line.startsWith("-- END") || line.startsWith("--END");
}

/**
 * Resolve `file.sql` or `file.sql:block-name` to SQL text.
 * Relative files that don't exist from the working directory are looked up
 * in `sqlDir`.
 */
export function loadQuery(queryPath: string, sqlDir = "sql"): string {
  const sep = queryPath.indexOf(":");
  const filename = sep === -1 ? queryPath : queryPath.slice(0, sep);
  const blockName = sep === -1 ? null : queryPath.slice(sep + 1);

  let file = filename;
  if (!existsSync(file) && !isAbsolute(file)) {
    file = join(sqlDir, filename);
  }
  if (!existsSync(file)) {
    throw new QueryNotFoundError(`SQL file not found: ${file}`);
  }

  const content = readFileSync(file, "utf-8");
  if (!blockName) return content.trim();

  const lines: string[] = [];
  let inBlock = false;
  for (const line of content.split("\n")) {
    const stripped = line.trim();
    if (!inBlock) {
      inBlock = isBeginMarker(stripped, blockName);
      continue;
    }
    if (isEndMarker(stripped)) break;
    lines.push(line);
  }

  const sql = lines.join("\n").trim();
  if (!sql) {
    throw new QueryNotFoundError(
      `Query '${blockName}' not found in ${file}. Expected a block starting with '-- BEGIN ${blockName}'`,
    );
  }
  return sql;
}

/**
 * Substitute `{{name}}` placeholders. Values are inserted verbatim, so
 * callers quote string literals with {@link quoteLiteral}.
 */
export function renderQuery(sql: string, params: QueryParams = {}): string {
  return sql.replace(PLACEHOLDER, (_match, name: string) => {
    const value = params[name];
    if (value === undefined) {
      throw new Error(`No value for query parameter '${name}'`);
    }
    return String(value);
  });
}

/** Names of every placeholder in a query, in order of first use */
export function queryParameters(sql: string): string[] {
  const names = new Set<string>();
  for (const match of sql.matchAll(PLACEHOLDER)) {
    if (match[1]) names.add(match[1]);
  }
  return [...names];
}

/** Single-quoted SQL string literal */
export function quoteLiteral(value: string): string {
  return `'${value.replaceAll("'", "''")}'`;
}

/**
 * Wrap a query as `<prefix> (<query>) <suffix>`, e.g. to turn a SELECT
 * into a CREATE TABLE AS or a COPY / UNLOAD.
 */
export function wrapQuery(query: string, prefix?: string, suffix?: string): string {
  if (!prefix && !suffix) return query;
  return `${(prefix ?? "").trim()} (${query}) ${(suffix ?? "").trim()}`.trim();
}
