/**
 * DuckDB session for the local aggregation stages.
 */

import { fileURLToPath } from "node:url";

import { DuckDBInstance, type DuckDBConnection } from "@duckdb/node-api";
import { createLogger, maskSecret } from "@mapper-activity/logger";
import { loadQuery, quoteLiteral, renderQuery, wrapQuery, type QueryParams } from "@mapper-activity/shared";

const log = createLogger("rollup");

/** SQL files shipped with this package */
export const ROLLUP_SQL_DIR = fileURLToPath(new URL("../sql", import.meta.url));

export interface Extension {
  name: string;
  /** Extension repository, e.g. `community` */
  repository?: string;
}

export const DEFAULT_EXTENSIONS: Extension[] = [
  { name: "spatial" },
  { name: "h3", repository: "community" },
];

/** Anything the stages can send SQL to */
export interface QueryEngine {
  run(name: string, sql: string): Promise<void>;
  all(name: string, sql: string): Promise<Record<string, unknown>[]>;
}

export interface NamedQuery {
  /** `file.sql:block-name`, resolved against the package SQL directory */
  queryPath: string;
  params?: QueryParams;
  prefix?: string;
  suffix?: string;
}

export function resolveNamedQuery(query: NamedQuery, sqlDir = ROLLUP_SQL_DIR): string {
  return wrapQuery(renderQuery(loadQuery(query.queryPath, sqlDir), query.params), query.prefix, query.suffix);
}

/** Name used in logs for a `file.sql:block` path */
function stageName(queryPath: string): string {
  return queryPath.split(":").pop() ?? queryPath;
}

export async function runNamed(engine: QueryEngine, query: NamedQuery): Promise<void> {
  await engine.run(stageName(query.queryPath), resolveNamedQuery(query));
}

export async function allNamed(engine: QueryEngine, query: NamedQuery): Promise<Record<string, unknown>[]> {
  return engine.all(stageName(query.queryPath), resolveNamedQuery(query));
}

export interface RollupSessionOptions {
  /** Database file, or `:memory:` */
  path: string;
  extensions?: Extension[];
  /** Create an S3 secret from the credential chain for this region */
  s3Region?: string;
}

export class RollupSession implements QueryEngine {
  private constructor(
    private readonly instance: DuckDBInstance,
    private readonly connection: DuckDBConnection,
    readonly path: string,
  ) {}

  static async open(options: RollupSessionOptions): Promise<RollupSession> {
    const instance = await DuckDBInstance.create(options.path);
    const session = new RollupSession(instance, await instance.connect(), options.path);
    log.info({ path: options.path }, "Connected to DuckDB");

    for (const ext of options.extensions ?? DEFAULT_EXTENSIONS) {
      const from = ext.repository ? ` FROM ${ext.repository}` : "";
      await session.run(`install ${ext.name}`, `INSTALL ${ext.name}${from}`);
      await session.run(`load ${ext.name}`, `LOAD ${ext.name}`);
    }

    if (options.s3Region) {
      await session.run(
        "s3 secret",
        `CREATE OR REPLACE SECRET s3_credentials (TYPE s3, PROVIDER credential_chain, REGION ${quoteLiteral(options.s3Region)})`,
      );
      await session.run("s3 region", `SET s3_region = ${quoteLiteral(options.s3Region)}`);
      log.info(
        {
          AWS_ACCESS_KEY_ID: maskSecret(process.env["AWS_ACCESS_KEY_ID"]),
          AWS_SECRET_ACCESS_KEY: maskSecret(process.env["AWS_SECRET_ACCESS_KEY"]),
          AWS_SESSION_TOKEN: maskSecret(process.env["AWS_SESSION_TOKEN"]),
        },
        "AWS environment",
      );
    }
    return session;
  }

  async run(name: string, sql: string): Promise<void> {
    const started = Date.now();
    log.debug({ stage: name, sql: sql.slice(0, 100).replaceAll("\n", " ") }, "Executing");
    await this.connection.run(sql);
    log.info({ stage: name, ms: Date.now() - started }, "Executed");
  }

  async all(name: string, sql: string): Promise<Record<string, unknown>[]> {
    const started = Date.now();
    log.debug({ stage: name, sql: sql.slice(0, 100).replaceAll("\n", " ") }, "Querying");
    const reader = await this.connection.runAndReadAll(sql);
    const rows = reader.getRowObjectsJS();
    log.info({ stage: name, rows: rows.length, ms: Date.now() - started }, "Queried");
    return rows;
  }

  close(): void {
    this.connection.closeSync();
    this.instance.closeSync();
    log.info({ path: this.path }, "DuckDB closed");
  }
}
