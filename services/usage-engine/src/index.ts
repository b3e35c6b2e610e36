export * from "./types.js";
export * from "./blend.js";
export * from "./rounding.js";
export * from "./token-resolver.js";
export * from "./menu-catalog.js";
export * from "./recipe-table.js";
export * from "./unknown-token-audit.js";
export * from "./canonicalizer.js";
export * from "./ice-buckets.js";
export * from "./usage-estimator.js";
export * from "./batch-yield.js";
export * from "./aggregator.js";
export * from "./validation-metrics.js";
export * from "./tea-jelly.js";
export * from "./output-rows.js";
export * from "./pipeline.js";
