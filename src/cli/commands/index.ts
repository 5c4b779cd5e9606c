export { runBuildCommand } from "./build.js";
export type { BuildCommandOptions } from "./build.js";
export { runStatusCommand } from "./status.js";
export type { StatusCommandOptions } from "./status.js";
