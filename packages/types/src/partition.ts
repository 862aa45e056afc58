/**
 * Partition identifiers.
 *
 * A partition (`ds`) is an ISO date string that versions one full run of
 * the pipeline. ISO formatting makes lexicographic order chronological.
 */

/** ISO date, `YYYY-MM-DD` */
export type PartitionId = string;

/** A `key=value/` sub-prefix found under a storage location */
export interface PartitionRef {
  value: PartitionId;
  /** Full key prefix, including the trailing slash */
  prefix: string;
}

/** Latest partition was found */
export interface PartitionFound {
  found: true;
  ds: PartitionId;
  /** Full key prefix of the partition, including the trailing slash */
  prefix: string;
}

/** No valid partition exists under the searched location */
export interface PartitionNotFound {
  found: false;
  searched: string;
}

/** Result of scanning a location for its newest partition */
export type PartitionDiscovery = PartitionFound | PartitionNotFound;
