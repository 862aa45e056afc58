/**
 * Stage sequences for each CLI command.
 *
 * Every stage of a run reads the partition through one RunContext, so the
 * `ds` discovered at the start is the one every artifact is written for.
 */

import { join } from "node:path";

import {
  addPartitionsWithGlue,
  changesetsLocation,
  createCatalogClients,
  createDatabase,
  discoverLatestPartition,
  MEMBERS_TABLE,
  pinPartition,
  QueryRunner,
  readPinnedPartition,
  registerTables,
  rosterLocation,
  runPrimaryQuery,
  type CatalogClients,
} from "@mapper-activity/catalog";
import { createLogger } from "@mapper-activity/logger";
import {
  remoteSources,
  RollupSession,
  runRollup,
  type QueryEngine,
  type RollupSessionOptions,
} from "@mapper-activity/rollup";
import type { PartitionId } from "@mapper-activity/types";

import { createPublishClients, type PublishClients } from "./aws.js";
import { requireDistributionId, type PipelineConfig } from "./config.js";
import type { Stage } from "./orchestrator.js";
import { PublishService } from "./services/publish.service.js";
import { TileService } from "./services/tile.service.js";

const log = createLogger("pipeline");

export const MARKER_FILE = "latest_ds.txt";

export interface RollupEngine extends QueryEngine {
  close(): void;
}

/** External systems the stages reach, created on first use */
export interface StageServices {
  catalogClients(): CatalogClients;
  publishClients(): PublishClients;
  openSession(options: RollupSessionOptions): Promise<RollupEngine>;
  tiles: TileService;
}

export function defaultServices(config: PipelineConfig): StageServices {
  let catalog: CatalogClients | undefined;
  let publish: PublishClients | undefined;
  return {
    catalogClients: () => (catalog ??= createCatalogClients(config.aws)),
    publishClients: () =>
      (publish ??= createPublishClients({ region: config.publish.region, roleArn: config.aws.roleArn })),
    openSession: (options) => RollupSession.open(options),
    tiles: new TileService(),
  };
}

export class RunContext {
  readonly markerPath: string;
  private pinned: PartitionId | null = null;

  constructor(
    readonly config: PipelineConfig,
    readonly services: StageServices,
  ) {
    this.markerPath = join(config.outputDir, MARKER_FILE);
  }

  pin(ds: PartitionId): void {
    this.pinned = ds;
  }

  /** The pinned partition, read from the marker the first time it's needed */
  get ds(): PartitionId {
    if (this.pinned === null) {
      this.pinned = readPinnedPartition(this.markerPath);
      log.info({ ds: this.pinned }, "Using pinned partition");
    }
    return this.pinned;
  }
}

/** Register tables and partitions, then UNLOAD the enriched changesets */
export function catalogStages(ctx: RunContext): Stage[] {
  const { config } = ctx;
  let runner: QueryRunner | undefined;
  const queries = () =>
    (runner ??= new QueryRunner({
      athena: ctx.services.catalogClients().athena,
      database: config.athena.database,
      workgroup: config.athena.workgroup,
      outputLocation: config.athena.outputLocation,
    }));

  return [
    { name: "create-database", run: () => createDatabase(queries(), config.athena.database) },
    { name: "register-tables", run: () => registerTables(queries(), config.internalBucket) },
    {
      name: "add-roster-partitions",
      run: async () => {
        const result = await addPartitionsWithGlue(ctx.services.catalogClients(), {
          database: config.athena.database,
          table: MEMBERS_TABLE,
          location: rosterLocation(config.internalBucket),
        });
        log.info({ ...result }, "Roster partitions registered");
      },
    },
    {
      name: "primary-query",
      run: () => runPrimaryQuery(queries(), { internalBucket: config.internalBucket, minDate: config.minDate }),
    },
  ];
}

export interface RollupStageOptions {
  /** Reuse the tables already in the DuckDB file instead of reading S3 */
  skipFetch?: boolean;
}

/**
 * Pin the newest primary-output partition and roll it up locally.
 * With `skipFetch` the partition comes from the existing marker, since the
 * database already holds its rows.
 */
export function rollupStages(ctx: RunContext, options: RollupStageOptions = {}): Stage[] {
  const { config } = ctx;
  const skipFetch = options.skipFetch ?? false;

  const discover: Stage = {
    name: "discover-partition",
    run: async () => {
      const result = await discoverLatestPartition(
        ctx.services.catalogClients().s3,
        changesetsLocation(config.internalBucket),
      );
      ctx.pin(pinPartition(result, ctx.markerPath));
    },
  };

  const rollup: Stage = {
    name: "rollup",
    run: async () => {
      const ds = ctx.ds;
      const session = await ctx.services.openSession({
        path: config.duckdbPath,
        ...(skipFetch ? {} : { s3Region: config.aws.region }),
      });
      try {
        await runRollup(session, {
          ds,
          outputDir: config.outputDir,
          countriesFile: config.countriesFile,
          ...(skipFetch ? {} : { sources: remoteSources(config.internalBucket, ds) }),
        });
      } finally {
        session.close();
      }
    },
  };

  return skipFetch ? [rollup] : [discover, rollup];
}

export function tileStages(ctx: RunContext): Stage[] {
  return [
    {
      name: "build-tiles",
      run: async () => {
        await ctx.services.tiles.buildTiles(ctx.config.outputDir);
      },
    },
  ];
}

export function publishStages(ctx: RunContext): Stage[] {
  const { config } = ctx;
  return [
    {
      name: "publish",
      run: async () => {
        const distributionId = requireDistributionId(config);
        const service = new PublishService(ctx.services.publishClients());
        await service.publish({
          ds: ctx.ds,
          outputDir: config.outputDir,
          bucket: config.publish.bucket,
          distributionId,
        });
      },
    },
  ];
}

/** Discovery through publication for one partition */
export function runAllStages(ctx: RunContext, options: RollupStageOptions = {}): Stage[] {
  return [...rollupStages(ctx, options), ...tileStages(ctx), ...publishStages(ctx)];
}
