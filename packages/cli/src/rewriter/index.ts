export * from "./config-rewriter.js";
export * from "./convert-config.js";
