export * from "./aws.js";
export * from "./config.js";
export * from "./orchestrator.js";
export * from "./stages.js";
export * from "./services/tile.service.js";
export * from "./services/publish.service.js";
