export * from "./session.js";
export * from "./schemas.js";
export * from "./stages.js";
export * from "./rollup.js";
export * from "./exports/files.js";
export * from "./exports/geojson.js";
