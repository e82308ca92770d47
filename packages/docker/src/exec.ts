import { $ } from "zx";

export interface CommandOutput {
  /** null when the process could not be started or was killed. */
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export type CommandExecutor = (
  command: string,
  args: string[],
) => Promise<CommandOutput>;

/**
 * Runs a command through zx without throwing on a non-zero exit.
 */
export const zxExecutor: CommandExecutor = async (command, args) => {
  const output = await $`${command} ${args}`.nothrow().quiet();
  return {
    exitCode: output.exitCode,
    stdout: output.stdout,
    stderr: output.stderr,
  };
};
