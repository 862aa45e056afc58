/**
 * Tile service - turns the GeoJSON sequence exports into PMTiles archives
 * with tippecanoe.
 */

import { spawn } from "node:child_process";
import { rmSync } from "node:fs";
import { join } from "node:path";

import { createLogger } from "@mapper-activity/logger";
import { ROLLUP_FILES } from "@mapper-activity/rollup";
import { errorMessage, ToolInvocationError } from "@mapper-activity/shared";

const log = createLogger("tiles");

export const TIPPECANOE = "tippecanoe";

export interface TileLayer {
  archive: string;
  input: string;
  zoom: number;
  layer: string;
}

export const TILE_LAYERS: readonly TileLayer[] = [
  { archive: "res4.pmtiles", input: ROLLUP_FILES.h3Res4, zoom: 2, layer: "r4agg" },
  { archive: "res6.pmtiles", input: ROLLUP_FILES.h3Res6, zoom: 4, layer: "r6agg" },
  { archive: "res8.pmtiles", input: ROLLUP_FILES.dailyPoints, zoom: 6, layer: "daily" },
  { archive: "res8_bboxes.pmtiles", input: ROLLUP_FILES.dailyBboxes, zoom: 6, layer: "daily" },
];

export interface CommandResult {
  exitCode: number | null;
  stderr: string;
}

/** Runs an external program to completion; rejects only if it can't start */
export type CommandRunner = (command: string, args: readonly string[]) => Promise<CommandResult>;

export const spawnCommand: CommandRunner = (command, args) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ["ignore", "inherit", "pipe"] });
    let stderr = "";
    child.stderr.setEncoding("utf-8");
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });
    child.on("error", reject);
    child.on("close", (exitCode) => resolve({ exitCode, stderr }));
  });

/** Single zoom level per archive, cells keyed by `h3` dropped from attributes */
export function tippecanoeArgs(layer: TileLayer, outputDir: string): string[] {
  const z = String(layer.zoom);
  return [
    "-fo", join(outputDir, layer.archive),
    `-Z${z}`,
    `-z${z}`,
    `-B${z}`,
    "-x", "h3",
    "-l", layer.layer,
    "--no-progress-indicator",
    "-P", join(outputDir, layer.input),
  ];
}

export class TileService {
  constructor(private readonly run: CommandRunner = spawnCommand) {}

  /**
   * Build every archive in order, then remove the GeoJSON inputs.
   * The first failure stops the stage and leaves the inputs in place.
   */
  async buildTiles(outputDir: string): Promise<string[]> {
    const archives: string[] = [];
    for (const layer of TILE_LAYERS) {
      const args = tippecanoeArgs(layer, outputDir);
      const started = Date.now();
      log.info({ archive: layer.archive, zoom: layer.zoom, layer: layer.layer }, "Tiling");

      let result: CommandResult;
      try {
        result = await this.run(TIPPECANOE, args);
      } catch (err) {
        throw new ToolInvocationError(TIPPECANOE, null, errorMessage(err), { cause: err });
      }
      if (result.exitCode !== 0) {
        throw new ToolInvocationError(TIPPECANOE, result.exitCode, result.stderr.trim() || `building ${layer.archive}`);
      }

      log.info({ archive: layer.archive, ms: Date.now() - started }, "Tiled");
      archives.push(join(outputDir, layer.archive));
    }

    for (const layer of TILE_LAYERS) {
      rmSync(join(outputDir, layer.input), { force: true });
    }
    log.info({ archives: archives.length }, "Removed GeoJSON inputs");
    return archives;
  }
}
