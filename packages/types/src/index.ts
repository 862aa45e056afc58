/**
 * @mapper-activity/types
 *
 * Shared domain types for the changeset activity pipeline.
 *
 * - Counts: per-changeset and aggregated edit-category subtotals
 * - Partition: the `ds` token that versions one pipeline run
 * - Activity: the rows each export is built from
 * - Geo: changeset bounding boxes
 */

export * from "./counts.js";
export * from "./partition.js";
export * from "./activity.js";
export * from "./geo.js";
