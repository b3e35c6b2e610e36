export * from "./levels.js";
export * from "./keys.js";
export * from "./errors.js";
export * from "./reference.js";
export * from "./schemas.js";
