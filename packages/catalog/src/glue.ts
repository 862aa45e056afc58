/**
 * Catalog partition registration through Glue: list the `ds=` prefixes
 * and batch-create one partition per prefix.
 */

import type { PartitionInput } from "@aws-sdk/client-glue";
import { createLogger } from "@mapper-activity/logger";
import { PipelineError } from "@mapper-activity/shared";

import type { GlueApi, S3ListApi } from "./aws.js";
import { listPartitions, parseS3Uri } from "./partitions.js";

const log = createLogger("glue");

/** Glue rejects larger BatchCreatePartition requests */
export const GLUE_BATCH_SIZE = 100;

export interface AddPartitionsInput {
  database: string;
  table: string;
  /** s3:// location holding `key=value/` prefixes */
  location: string;
  key?: string;
}

export interface AddPartitionsResult {
  listed: number;
  created: number;
  alreadyExisted: number;
}

function isAlreadyExists(code: string | undefined, message: string | undefined): boolean {
  return code === "AlreadyExistsException" || (message ?? "").includes("AlreadyExistsException");
}

/**
 * Register every partition found under the location. Partitions that are
 * already registered are skipped; any other rejection fails the stage once
 * all batches have been sent.
 */
export async function addPartitionsWithGlue(
  clients: { glue: GlueApi; s3: S3ListApi },
  input: AddPartitionsInput,
): Promise<AddPartitionsResult> {
  const key = input.key ?? "ds";
  const { bucket } = parseS3Uri(input.location);
  const partitions = await listPartitions(clients.s3, input.location, key);
  if (partitions.length === 0) {
    log.warn({ table: input.table, location: input.location }, "No partitions to add");
    return { listed: 0, created: 0, alreadyExisted: 0 };
  }

  const { Table: table } = await clients.glue.getTable({
    DatabaseName: input.database,
    Name: input.table,
  });
  const descriptor = table?.StorageDescriptor;
  if (!descriptor) {
    throw new PipelineError("QUERY_EXECUTION", `Glue table ${input.database}.${input.table} has no storage descriptor`);
  }

  const inputs: PartitionInput[] = partitions.map((p) => ({
    Values: [p.value],
    StorageDescriptor: { ...descriptor, Location: `s3://${bucket}/${p.prefix}` },
  }));

  let created = 0;
  let alreadyExisted = 0;
  const rejected: string[] = [];

  for (let i = 0; i < inputs.length; i += GLUE_BATCH_SIZE) {
    const batch = inputs.slice(i, i + GLUE_BATCH_SIZE);
    const { Errors: errors = [] } = await clients.glue.batchCreatePartition({
      DatabaseName: input.database,
      TableName: input.table,
      PartitionInputList: batch,
    });
    created += batch.length - errors.length;

    for (const err of errors) {
      const code = err.ErrorDetail?.ErrorCode;
      const message = err.ErrorDetail?.ErrorMessage;
      if (isAlreadyExists(code, message)) {
        alreadyExisted++;
        continue;
      }
      const values = (err.PartitionValues ?? []).join(",");
      log.error({ table: input.table, values, message }, "Glue partition error");
      rejected.push(`${values}: ${message ?? code ?? "Unknown"}`);
    }
  }

  log.info({ table: input.table, created, alreadyExisted }, "Glue partitions created");
  if (rejected.length > 0) {
    throw new PipelineError(
      "QUERY_EXECUTION",
      `Glue rejected ${rejected.length} partition(s) of ${input.table}: ${rejected.join("; ")}`,
    );
  }
  return { listed: partitions.length, created, alreadyExisted };
}
