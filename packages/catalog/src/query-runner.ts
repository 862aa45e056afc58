/**
 * Catalog query runner.
 *
 * Queries are submitted without waiting so independent statements (the
 * table DDLs) run in parallel on the engine; `waitForQueries()` then polls
 * everything still running until it reaches a terminal state.
 */

import { fileURLToPath } from "node:url";

import { createLogger } from "@mapper-activity/logger";
import {
  QueryExecutionError,
  loadQuery,
  renderQuery,
  wrapQuery,
  type FailedQuery,
  type QueryParams,
} from "@mapper-activity/shared";

import type { AthenaApi } from "./aws.js";

const log = createLogger("catalog");

/** SQL files shipped with this package */
export const CATALOG_SQL_DIR = fileURLToPath(new URL("../sql", import.meta.url));

export const POLL_INITIAL_MS = 1000;
export const POLL_MAX_MS = 10_000;
export const POLL_BACKOFF = 1.5;

export interface QueryRunnerOptions {
  athena: AthenaApi;
  database: string;
  workgroup: string;
  /** s3:// location for query results */
  outputLocation: string;
  sqlDir?: string;
  sleep?: (ms: number) => Promise<void>;
}

export interface RunQueryInput {
  /** SQL text; takes precedence over `queryPath` */
  query?: string;
  /** `file.sql` or `file.sql:block-name` */
  queryPath?: string;
  name: string;
  params?: QueryParams;
  prefix?: string;
  suffix?: string;
}

export interface QueryStats {
  name: string;
  executionId: string;
  engineMs: number;
  scannedBytes: number;
}

export interface WaitSummary {
  succeeded: QueryStats[];
  elapsedMs: number;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class QueryRunner {
  private readonly athena: AthenaApi;
  private readonly database: string;
  private readonly workgroup: string;
  private readonly outputLocation: string;
  private readonly sqlDir: string;
  private readonly sleep: (ms: number) => Promise<void>;
  /** name → execution id */
  private readonly running = new Map<string, string>();

  constructor(options: QueryRunnerOptions) {
    this.athena = options.athena;
    this.database = options.database;
    this.workgroup = options.workgroup;
    this.outputLocation = options.outputLocation;
    this.sqlDir = options.sqlDir ?? CATALOG_SQL_DIR;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /** Names of submitted queries not yet seen in a terminal state */
  get pending(): string[] {
    return [...this.running.keys()];
  }

  resolveQuery(input: RunQueryInput): string {
    let sql: string;
    if (input.query !== undefined) {
      sql = input.query;
    } else if (input.queryPath) {
      sql = loadQuery(input.queryPath, this.sqlDir);
    } else {
      throw new Error(`Query '${input.name}' needs either query or queryPath`);
    }
    return wrapQuery(renderQuery(sql, input.params), input.prefix, input.suffix);
  }

  /** Submit a query and return its execution id without waiting */
  async runQuery(input: RunQueryInput): Promise<string> {
    const sql = this.resolveQuery(input);
    log.debug({ query: input.name, sql: sql.slice(0, 200) }, "Submitting query");

    const response = await this.athena.startQueryExecution({
      QueryString: sql,
      QueryExecutionContext: { Database: this.database },
      ResultConfiguration: { OutputLocation: this.outputLocation },
      WorkGroup: this.workgroup,
    });
    const executionId = response.QueryExecutionId;
    if (!executionId) {
      throw new QueryExecutionError([
        { name: input.name, executionId: "", state: "NOT_SUBMITTED", reason: "no execution id returned" },
      ]);
    }

    log.info({ query: input.name, executionId }, "Query submitted");
    this.running.set(input.name, executionId);
    return executionId;
  }

  /**
   * Poll every running query with exponential backoff until all finish.
   * Throws QueryExecutionError naming every FAILED or CANCELLED query.
   */
  async waitForQueries(): Promise<WaitSummary> {
    const started = Date.now();
    if (this.running.size === 0) {
      log.warn("No queries to wait for");
      return { succeeded: [], elapsedMs: 0 };
    }

    log.info({ queries: this.running.size }, "Waiting for queries to complete");

    const succeeded: QueryStats[] = [];
    const failed: FailedQuery[] = [];
    let interval = POLL_INITIAL_MS;

    while (this.running.size > 0) {
      const states: Record<string, number> = {};

      for (const [name, executionId] of [...this.running]) {
        const response = await this.athena.getQueryExecution({ QueryExecutionId: executionId });
        const execution = response.QueryExecution;
        const state = execution?.Status?.State ?? "UNKNOWN";
        states[state] = (states[state] ?? 0) + 1;

        if (state === "SUCCEEDED") {
          succeeded.push({
            name,
            executionId,
            engineMs: execution?.Statistics?.EngineExecutionTimeInMillis ?? 0,
            scannedBytes: execution?.Statistics?.DataScannedInBytes ?? 0,
          });
          this.running.delete(name);
        } else if (state === "FAILED" || state === "CANCELLED") {
          const reason = execution?.Status?.StateChangeReason ?? "Unknown";
          log.error({ query: name, executionId, state, reason }, "Query did not succeed");
          failed.push({ name, executionId, state, reason });
          this.running.delete(name);
        }
      }

      if (this.running.size > 0) {
        log.info({ states }, "Query status");
        await this.sleep(interval);
        interval = Math.min(POLL_MAX_MS, interval * POLL_BACKOFF);
      }
    }

    const elapsedMs = Date.now() - started;
    for (const q of succeeded) {
      log.info(
        {
          query: q.name,
          engineSeconds: Number((q.engineMs / 1000).toFixed(2)),
          scannedGb: Number((q.scannedBytes / 1024 ** 3).toFixed(2)),
        },
        "Query succeeded",
      );
    }
    log.info(
      { total: succeeded.length + failed.length, succeeded: succeeded.length, failed: failed.length, elapsedMs },
      "Query execution summary",
    );

    if (failed.length > 0) {
      throw new QueryExecutionError(failed);
    }
    return { succeeded, elapsedMs };
  }
}
