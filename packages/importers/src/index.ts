export * from "./types.js";
export * from "./workbook.js";
export * from "./pos-export-importer.js";
export * from "./reference-importer.js";
