import {
  Logger,
  createConfig,
  parseResultLine,
  type ProbeOptions,
  type Protocol,
  type Result,
} from "@reachcheck/connectivity";
import { createDockerConfig, type DockerProbeConfig } from "./config.js";
import {
  zxExecutor,
  type CommandExecutor,
  type CommandOutput,
} from "./exec.js";

export interface CheckDependencies {
  executor?: CommandExecutor;
  config?: DockerProbeConfig;
  logger?: Logger;
}

/**
 * Arguments for `docker exec` that run the probe tool in `containerName`.
 * The tool takes whole seconds; "-" keeps the container's own network
 * namespace.
 */
export function buildCheckArgs(
  containerName: string,
  ip: string,
  port: number,
  protocol: Protocol,
  options: ProbeOptions,
  probeBinary: string,
): string[] {
  const args = [
    "exec",
    containerName,
    probeBinary,
    `--protocol=${protocol}`,
    `--duration=${Math.floor((options.durationMs ?? 0) / 1000)}`,
    `--sendlen=${options.sendLen ?? 0}`,
    `--recvlen=${options.recvLen ?? 0}`,
    options.namespacePath ?? "-",
    ip,
    String(port),
  ];

  if (options.sourceIP) {
    args.push(`--source-ip=${options.sourceIP}`);
  }
  if (options.sourcePort !== undefined) {
    args.push(`--source-port=${options.sourcePort}`);
  }
  return args;
}

/**
 * Probes `ip:port` from inside a container. Resolves to null when the
 * connection failed; rejects with a ProbeContractError when the tool claimed
 * success with a result that does not decode.
 */
export async function check(
  containerName: string,
  ip: string,
  port: number,
  protocol: Protocol,
  options: ProbeOptions = {},
  deps: CheckDependencies = {},
): Promise<Result | null> {
  const {
    executor = zxExecutor,
    config = createDockerConfig(),
    logger = new Logger(createConfig()),
  } = deps;

  const args = buildCheckArgs(
    containerName,
    ip,
    port,
    protocol,
    options,
    config.probeBinary,
  );
  logger.debug(`[${containerName}] $ ${config.dockerBinary} ${args.join(" ")}`);

  let output: CommandOutput;
  try {
    output = await executor(config.dockerBinary, args);
  } catch (error) {
    logger.warn(`[${containerName}] Connection test could not run:`, error);
    return null;
  }

  logger.debug(
    `[${containerName}] Connection test exited with ${output.exitCode}`,
    { stdout: output.stdout, stderr: output.stderr },
  );

  if (output.exitCode !== 0) {
    return null;
  }
  return parseResultLine(output.stdout);
}
