/**
 * Pipeline error taxonomy.
 *
 * Every failure that aborts a run is a PipelineError with a stable `code`,
 * so the orchestrator and the CLI can report which kind of stage broke.
 */

export type PipelineErrorCode =
  | "QUERY_EXECUTION"
  | "NO_PARTITION"
  | "TOOL_INVOCATION"
  | "PUBLICATION"
  | "CONFIG"
  | "QUERY_NOT_FOUND"
  | "ROLLUP_VALIDATION";

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A catalog query ended FAILED or CANCELLED */
export interface FailedQuery {
  name: string;
  executionId: string;
  state: string;
  reason: string;
}

export class QueryExecutionError extends PipelineError {
  readonly failed: FailedQuery[];

  constructor(failed: FailedQuery[], options?: { cause?: unknown }) {
    const names = failed.map((q) => q.name).join(", ");
    super(
      "QUERY_EXECUTION",
      `${failed.length} ${failed.length === 1 ? "query" : "queries"} failed: ${names}`,
      options,
    );
    this.failed = failed;
  }
}

export class NoPartitionFoundError extends PipelineError {
  readonly searched: string;

  constructor(searched: string, detail?: string) {
    super("NO_PARTITION", `No partition found under ${searched}${detail ? ` (${detail})` : ""}`);
    this.searched = searched;
  }
}

export class ToolInvocationError extends PipelineError {
  readonly command: string;
  readonly exitCode: number | null;

  constructor(command: string, exitCode: number | null, detail: string, options?: { cause?: unknown }) {
    super("TOOL_INVOCATION", `${command} failed (${exitCode === null ? "no exit code" : `exit ${exitCode}`}): ${detail}`, options);
    this.command = command;
    this.exitCode = exitCode;
  }
}

export class PublicationError extends PipelineError {
  readonly key: string;

  constructor(key: string, detail: string, options?: { cause?: unknown }) {
    super("PUBLICATION", `Publishing ${key} failed: ${detail}`, options);
    this.key = key;
  }
}

export class ConfigError extends PipelineError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("CONFIG", `Invalid configuration:\n  - ${issues.join("\n  - ")}`);
    this.issues = issues;
  }
}

export class QueryNotFoundError extends PipelineError {
  constructor(message: string) {
    super("QUERY_NOT_FOUND", message);
  }
}

/** An aggregate row broke a counting invariant */
export class RollupValidationError extends PipelineError {
  readonly row: Record<string, unknown>;

  constructor(message: string, row: Record<string, unknown>) {
    super("ROLLUP_VALIDATION", message);
    this.row = row;
  }
}

/** Message of any thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
