/**
 * Publication clients: object uploads and CDN invalidations.
 */

import {
  CloudFrontClient,
  CreateInvalidationCommand,
  type CreateInvalidationCommandInput,
  type CreateInvalidationCommandOutput,
} from "@aws-sdk/client-cloudfront";
import {
  PutObjectCommand,
  S3Client,
  type PutObjectCommandInput,
  type PutObjectCommandOutput,
} from "@aws-sdk/client-s3";
import { roleCredentials, type AwsOptions } from "@mapper-activity/catalog";

export interface S3PutApi {
  putObject(input: PutObjectCommandInput): Promise<PutObjectCommandOutput>;
}

export interface CdnApi {
  createInvalidation(input: CreateInvalidationCommandInput): Promise<CreateInvalidationCommandOutput>;
}

export interface PublishClients {
  s3: S3PutApi;
  cdn: CdnApi;
}

export function s3PutApi(client: S3Client): S3PutApi {
  return {
    putObject: (input) => client.send(new PutObjectCommand(input)),
  };
}

export function cdnApi(client: CloudFrontClient): CdnApi {
  return {
    createInvalidation: (input) => client.send(new CreateInvalidationCommand(input)),
  };
}

/** Clients in the publish region, sharing the catalog's credential source */
export function createPublishClients(options: AwsOptions): PublishClients {
  const credentials = roleCredentials(options);
  const config = credentials ? { region: options.region, credentials } : { region: options.region };
  return {
    s3: s3PutApi(new S3Client(config)),
    cdn: cdnApi(new CloudFrontClient(config)),
  };
}
