export * from "./generator.js";
export * from "./install-plan.js";
export * from "./template-renderer.js";
