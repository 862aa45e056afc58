export * from "./aws.js";
export * from "./query-runner.js";
export * from "./partitions.js";
export * from "./glue.js";
export * from "./tables.js";
