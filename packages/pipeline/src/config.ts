/**
 * Pipeline configuration.
 *
 * Read from `MAPPER_ACTIVITY_*` environment variables, overridden by CLI
 * flags, validated once. Every invalid value is reported together.
 */

import { z } from "zod";

import { isLogLevel, LOG_LEVELS, type LogLevel } from "@mapper-activity/logger";
import { ConfigError, isPartitionId } from "@mapper-activity/shared";

const ROLE_ARN = /^arn:aws[a-z-]*:iam::\d{12}:role\/[\w+=,.@\/-]+$/;

const envSchema = z.object({
  MAPPER_ACTIVITY_AWS_REGION: z.string().min(1).default("us-east-1"),
  MAPPER_ACTIVITY_AWS_ROLE: z.string().regex(ROLE_ARN, "must be an IAM role ARN").optional(),
  MAPPER_ACTIVITY_ATHENA_DATABASE: z
    .string()
    .regex(/^[a-z0-9_]+$/, "must be lowercase letters, digits and underscores")
    .default("mapper_activity"),
  MAPPER_ACTIVITY_ATHENA_WORKGROUP: z.string().min(1).default("mapper_activity"),
  MAPPER_ACTIVITY_ATHENA_OUTPUT_LOCATION: z
    .string()
    .startsWith("s3://", "must be an s3:// URI")
    .default("s3://mapper-activity-internal/athena-results/"),
  MAPPER_ACTIVITY_INTERNAL_BUCKET: z.string().min(1).default("mapper-activity-internal"),
  MAPPER_ACTIVITY_MIN_DATE: z.string().refine(isPartitionId, "must be a YYYY-MM-DD date").default("2015-01-01"),
  MAPPER_ACTIVITY_PUBLISH_BUCKET: z.string().min(1).default("mapper-activity-public"),
  MAPPER_ACTIVITY_PUBLISH_REGION: z.string().min(1).default("us-west-2"),
  MAPPER_ACTIVITY_DISTRIBUTION_ID: z.string().min(1).optional(),
  MAPPER_ACTIVITY_OUTPUT_DIR: z.string().min(1).default("output"),
  MAPPER_ACTIVITY_DUCKDB_PATH: z.string().min(1).default("activity.ddb"),
  MAPPER_ACTIVITY_COUNTRIES_FILE: z.string().min(1).default("ne_adm0.parquet"),
  LOG_LEVEL: z
    .string()
    .refine(isLogLevel, `must be one of ${LOG_LEVELS.join(", ")}`)
    .default("info"),
});

type Env = z.input<typeof envSchema>;

export interface PipelineConfig {
  aws: {
    region: string;
    roleArn: string | undefined;
  };
  athena: {
    database: string;
    workgroup: string;
    outputLocation: string;
  };
  internalBucket: string;
  minDate: string;
  publish: {
    bucket: string;
    region: string;
    distributionId: string | undefined;
  };
  outputDir: string;
  duckdbPath: string;
  countriesFile: string;
  logLevel: LogLevel;
}

/** CLI flags that take precedence over the environment */
export interface ConfigOverrides {
  region?: string | undefined;
  role?: string | undefined;
  outputDir?: string | undefined;
  duckdb?: string | undefined;
  countries?: string | undefined;
  distributionId?: string | undefined;
  logLevel?: string | undefined;
}

const OVERRIDE_ENV: Record<keyof ConfigOverrides, keyof Env> = {
  region: "MAPPER_ACTIVITY_AWS_REGION",
  role: "MAPPER_ACTIVITY_AWS_ROLE",
  outputDir: "MAPPER_ACTIVITY_OUTPUT_DIR",
  duckdb: "MAPPER_ACTIVITY_DUCKDB_PATH",
  countries: "MAPPER_ACTIVITY_COUNTRIES_FILE",
  distributionId: "MAPPER_ACTIVITY_DISTRIBUTION_ID",
  logLevel: "LOG_LEVEL",
};

function isOverrideKey(key: string): key is keyof ConfigOverrides {
  return key in OVERRIDE_ENV;
}

function formatIssue(issue: z.ZodIssue): string {
  return `${issue.path.join(".")}: ${issue.message}`;
}

/**
 * Validate the environment merged with CLI overrides.
 * Empty environment values count as unset.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: ConfigOverrides = {},
): PipelineConfig {
  const merged: Record<string, string> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key];
    if (value) merged[key] = value;
  }
  for (const [key, value] of Object.entries(overrides)) {
    if (isOverrideKey(key) && typeof value === "string" && value) {
      merged[OVERRIDE_ENV[key]] = value;
    }
  }

  const parsed = envSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(formatIssue));
  }

  const e = parsed.data;
  return {
    aws: {
      region: e.MAPPER_ACTIVITY_AWS_REGION,
      roleArn: e.MAPPER_ACTIVITY_AWS_ROLE,
    },
    athena: {
      database: e.MAPPER_ACTIVITY_ATHENA_DATABASE,
      workgroup: e.MAPPER_ACTIVITY_ATHENA_WORKGROUP,
      outputLocation: e.MAPPER_ACTIVITY_ATHENA_OUTPUT_LOCATION,
    },
    internalBucket: e.MAPPER_ACTIVITY_INTERNAL_BUCKET,
    minDate: e.MAPPER_ACTIVITY_MIN_DATE,
    publish: {
      bucket: e.MAPPER_ACTIVITY_PUBLISH_BUCKET,
      region: e.MAPPER_ACTIVITY_PUBLISH_REGION,
      distributionId: e.MAPPER_ACTIVITY_DISTRIBUTION_ID,
    },
    outputDir: e.MAPPER_ACTIVITY_OUTPUT_DIR,
    duckdbPath: e.MAPPER_ACTIVITY_DUCKDB_PATH,
    countriesFile: e.MAPPER_ACTIVITY_COUNTRIES_FILE,
    logLevel: e.LOG_LEVEL,
  };
}

/** The CDN distribution is only needed by the publish stage */
export function requireDistributionId(config: PipelineConfig): string {
  if (!config.publish.distributionId) {
    throw new ConfigError(["MAPPER_ACTIVITY_DISTRIBUTION_ID: required to publish"]);
  }
  return config.publish.distributionId;
}
