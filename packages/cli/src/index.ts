export * from "./config/loaders/servers-config-loader.js";
export * from "./config/types/index.js";
export * from "./config/writers/servers-config-writer.js";
export * from "./dockerfile/index.js";
export * from "./resolver/index.js";
export * from "./rewriter/index.js";
export * from "./utils/errors.js";
