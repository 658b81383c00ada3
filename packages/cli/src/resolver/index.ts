export * from "./binary-resolver.js";
export * from "./command-resolver.js";
export * from "./dispatch-args.js";
export * from "./global-root.js";
export * from "./manifest.js";
export * from "./package-name.js";
export * from "./package-set.js";
export * from "./strategies/index.js";
export * from "./types.js";
