export * from "./command-table.js";
export * from "./manifest.js";
export * from "./servers.js";
