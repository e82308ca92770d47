import { z } from "zod";
import { parseEnv } from "znv";

export interface DockerProbeConfig {
  /** The docker CLI used to reach into containers. */
  dockerBinary: string;
  /** Path of the probe tool inside each container. */
  probeBinary: string;
}

export function createDockerConfig(
  processEnv: NodeJS.ProcessEnv = process.env,
): DockerProbeConfig {
  const env = parseEnv(processEnv, {
    DOCKER_BINARY: z.string().min(1).default("docker"),
    TEST_CONNECTION_BINARY: z.string().min(1).default("/test-connection"),
  });

  return {
    dockerBinary: env.DOCKER_BINARY,
    probeBinary: env.TEST_CONNECTION_BINARY,
  };
}
