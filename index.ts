/**
 * stratum: declarative cloud resource templates resolved into ordered,
 * conditional resource graphs.
 */

export * from "./src/errors.js";
export * from "./src/types.js";
export * from "./src/logging/logger.js";
export * from "./src/logging/redact.js";
export * from "./src/graph/expressions.js";
export * from "./src/graph/declare.js";
export * from "./src/graph/merge.js";
export * from "./src/graph/parameters.js";
export * from "./src/graph/planner.js";
export * from "./src/graph/registry.js";
export * from "./src/graph/resolver.js";
export * from "./src/apply/provider.js";
export * from "./src/apply/engine.js";
export * from "./src/apply/simulated.js";
export * from "./src/templates/index.js";
export * from "./src/config.js";
export { buildProgram, runCli } from "./src/cli/program.js";
export { VERSION } from "./src/version.js";
