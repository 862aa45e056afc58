export * from "./errors.js";
export * from "./sql.js";
export * from "./categories.js";
export * from "./partition.js";
