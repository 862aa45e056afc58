/**
 * AWS client wiring for the catalog stages.
 *
 * Stages talk to narrow `*Api` interfaces rather than SDK clients so tests
 * can hand in plain functions.
 */

import {
  AthenaClient,
  GetQueryExecutionCommand,
  StartQueryExecutionCommand,
  type GetQueryExecutionCommandInput,
  type GetQueryExecutionCommandOutput,
  type StartQueryExecutionCommandInput,
  type StartQueryExecutionCommandOutput,
} from "@aws-sdk/client-athena";
import {
  BatchCreatePartitionCommand,
  GetTableCommand,
  GlueClient,
  type BatchCreatePartitionCommandInput,
  type BatchCreatePartitionCommandOutput,
  type GetTableCommandInput,
  type GetTableCommandOutput,
} from "@aws-sdk/client-glue";
import {
  ListObjectsV2Command,
  S3Client,
  type ListObjectsV2CommandInput,
  type ListObjectsV2CommandOutput,
} from "@aws-sdk/client-s3";
import { fromTemporaryCredentials } from "@aws-sdk/credential-providers";
import { createLogger } from "@mapper-activity/logger";

const log = createLogger("aws");

export const ROLE_SESSION_NAME = "changesets-fetcher-session";
export const ROLE_SESSION_SECONDS = 3600;

type RoleCredentials = ReturnType<typeof fromTemporaryCredentials>;

export interface AthenaApi {
  startQueryExecution(input: StartQueryExecutionCommandInput): Promise<StartQueryExecutionCommandOutput>;
  getQueryExecution(input: GetQueryExecutionCommandInput): Promise<GetQueryExecutionCommandOutput>;
}

export interface GlueApi {
  getTable(input: GetTableCommandInput): Promise<GetTableCommandOutput>;
  batchCreatePartition(input: BatchCreatePartitionCommandInput): Promise<BatchCreatePartitionCommandOutput>;
}

export interface S3ListApi {
  listObjectsV2(input: ListObjectsV2CommandInput): Promise<ListObjectsV2CommandOutput>;
}

export interface CatalogClients {
  athena: AthenaApi;
  glue: GlueApi;
  s3: S3ListApi;
}

export interface AwsOptions {
  region: string;
  /** Role to assume; the default credential chain is used when unset */
  roleArn?: string | undefined;
}

/**
 * Credentials for an assumed role, refreshed by the SDK when they expire.
 * Undefined means "use the default chain".
 */
export function roleCredentials(options: AwsOptions): RoleCredentials | undefined {
  if (!options.roleArn) {
    log.info("Using default AWS credentials");
    return undefined;
  }
  log.info({ roleArn: options.roleArn }, "Assuming role");
  return fromTemporaryCredentials({
    params: {
      RoleArn: options.roleArn,
      RoleSessionName: ROLE_SESSION_NAME,
      DurationSeconds: ROLE_SESSION_SECONDS,
    },
    clientConfig: { region: options.region },
  });
}

export function athenaApi(client: AthenaClient): AthenaApi {
  return {
    startQueryExecution: (input) => client.send(new StartQueryExecutionCommand(input)),
    getQueryExecution: (input) => client.send(new GetQueryExecutionCommand(input)),
  };
}

export function glueApi(client: GlueClient): GlueApi {
  return {
    getTable: (input) => client.send(new GetTableCommand(input)),
    batchCreatePartition: (input) => client.send(new BatchCreatePartitionCommand(input)),
  };
}

export function s3ListApi(client: S3Client): S3ListApi {
  return {
    listObjectsV2: (input) => client.send(new ListObjectsV2Command(input)),
  };
}

/** Athena, Glue and S3 clients sharing one region and credential source */
export function createCatalogClients(options: AwsOptions): CatalogClients {
  const credentials = roleCredentials(options);
  const config = credentials ? { region: options.region, credentials } : { region: options.region };
  return {
    athena: athenaApi(new AthenaClient(config)),
    glue: glueApi(new GlueClient(config)),
    s3: s3ListApi(new S3Client(config)),
  };
}
