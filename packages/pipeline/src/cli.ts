#!/usr/bin/env tsx
/**
 * mapper-activity CLI
 *
 * Commands:
 *   mapper-activity catalog              - Register tables and partitions, UNLOAD changesets
 *   mapper-activity rollup [--skip-fetch] - Pin the newest partition and aggregate it locally
 *   mapper-activity tiles                - Build PMTiles archives from the GeoJSON exports
 *   mapper-activity publish              - Upload artifacts and invalidate the CDN aliases
 *   mapper-activity run                  - rollup, tiles and publish in one go
 */

import { Command } from "commander";

import { createLogger, setLogLevel } from "@mapper-activity/logger";
import { errorMessage } from "@mapper-activity/shared";

import { loadConfig, type ConfigOverrides } from "./config.js";
import { runStages, type Stage } from "./orchestrator.js";
import {
  catalogStages,
  defaultServices,
  publishStages,
  rollupStages,
  runAllStages,
  RunContext,
  tileStages,
} from "./stages.js";

const log = createLogger("cli");

async function execute(program: Command, build: (ctx: RunContext) => Stage[]): Promise<void> {
  const config = loadConfig(process.env, program.opts<ConfigOverrides>());
  setLogLevel(config.logLevel);

  const ctx = new RunContext(config, defaultServices(config));
  const outcome = await runStages(build(ctx));
  if (!outcome.ok) {
    log.error({ completed: outcome.completed }, `Stage '${outcome.failedStage}' failed: ${errorMessage(outcome.error)}`);
    process.exitCode = 1;
    return;
  }
  log.info({ stages: outcome.completed }, "Done");
}

export function createProgram(): Command {
  const program = new Command()
    .name("mapper-activity")
    .description("Aggregate mapper chapter OSM activity and publish the dashboard files")
    .option("--log-level <level>", "Log level (overrides LOG_LEVEL)")
    .option("--region <region>", "AWS region for the catalog and partition storage")
    .option("--role <arn>", "IAM role to assume")
    .option("--output-dir <dir>", "Directory for exports and the partition marker")
    .option("--duckdb <path>", "DuckDB database file")
    .option("--countries <file>", "Country reference Parquet")
    .option("--distribution-id <id>", "CloudFront distribution to invalidate");

  program
    .command("catalog")
    .description("Register external tables and roster partitions, then UNLOAD the enriched changesets")
    .action(() => execute(program, catalogStages));

  program
    .command("rollup")
    .description("Pin the newest changesets partition and write every export")
    .option("--skip-fetch", "Reuse the tables already in the DuckDB file")
    .action((options: { skipFetch?: boolean }) =>
      execute(program, (ctx) => rollupStages(ctx, { skipFetch: options.skipFetch ?? false })),
    );

  program
    .command("tiles")
    .description("Build the PMTiles archives and remove the GeoJSON inputs")
    .action(() => execute(program, tileStages));

  program
    .command("publish")
    .description("Upload the pinned partition's artifacts and invalidate the latest aliases")
    .action(() => execute(program, publishStages));

  program
    .command("run")
    .description("rollup, tiles and publish for the newest partition")
    .action(() => execute(program, runAllStages));

  return program;
}

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    log.fatal({ err }, errorMessage(err));
    process.exitCode = 1;
  });
