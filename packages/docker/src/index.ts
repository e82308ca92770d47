export { Container } from "./container.js";
export type { ContainerOptions } from "./container.js";
export { check, buildCheckArgs } from "./check.js";
export type { CheckDependencies } from "./check.js";
export { createDockerConfig } from "./config.js";
export type { DockerProbeConfig } from "./config.js";
export { zxExecutor } from "./exec.js";
export type { CommandExecutor, CommandOutput } from "./exec.js";
