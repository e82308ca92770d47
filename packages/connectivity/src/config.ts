import { z } from "zod";
import { ConfigurationError } from "./errors.js";

export const ProtocolSchema = z.enum([
  "tcp",
  "udp",
  "udp-noconn",
  "udp-recvmsg",
  "sctp",
]);

export type Protocol = z.infer<typeof ProtocolSchema>;

const DEFAULT_TIMEOUT_MS = 10_000;

const FlagSchema = z
  .union([z.boolean(), z.enum(["true", "false", "1", "0", ""])])
  .transform((value) => value === true || value === "true" || value === "1");

const ConfigSchema = z.object({
  timeoutMs: z.coerce.number().int().nonnegative().default(DEFAULT_TIMEOUT_MS),
  protocol: ProtocolSchema.default("tcp"),
  silent: FlagSchema.default(false),
  verbose: FlagSchema.default(false),
});

export type Config = z.infer<typeof ConfigSchema>;

interface CreateConfigOptions extends Partial<Config> {
  processEnv?: NodeJS.ProcessEnv;
}

export function createConfig(options: CreateConfigOptions = {}): Config {
  const { processEnv = process.env, ...overrides } = options;

  const result = ConfigSchema.safeParse({
    timeoutMs: overrides.timeoutMs ?? processEnv.CONNECTIVITY_TIMEOUT_MS,
    protocol: overrides.protocol ?? processEnv.CONNECTIVITY_PROTOCOL,
    silent: overrides.silent ?? processEnv.CONNECTIVITY_SILENT,
    verbose: overrides.verbose ?? processEnv.CONNECTIVITY_VERBOSE,
  });

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid connectivity config: ${issues}`);
  }
  return result.data;
}
