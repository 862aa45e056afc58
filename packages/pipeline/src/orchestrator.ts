/**
 * Runs named stages in order and stops at the first failure. No retries.
 */

import { createLogger } from "@mapper-activity/logger";
import { errorMessage } from "@mapper-activity/shared";

const log = createLogger("orchestrator");

export interface Stage {
  name: string;
  run: () => Promise<void>;
}

export type RunOutcome =
  | { ok: true; completed: string[] }
  | { ok: false; failedStage: string; error: unknown; completed: string[] };

export async function runStages(stages: readonly Stage[]): Promise<RunOutcome> {
  const completed: string[] = [];
  for (const stage of stages) {
    const started = Date.now();
    log.info({ stage: stage.name }, "Stage started");
    try {
      await stage.run();
    } catch (error) {
      log.error({ stage: stage.name, err: error }, `Stage failed: ${errorMessage(error)}`);
      return { ok: false, failedStage: stage.name, error, completed };
    }
    completed.push(stage.name);
    log.info({ stage: stage.name, ms: Date.now() - started }, "Stage completed");
  }
  return { ok: true, completed };
}
