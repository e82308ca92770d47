import { chalk } from "zx";
import type { Config } from "./config.js";

type LoggerConfig = Pick<Config, "silent" | "verbose">;

/**
 * Logger for checker output.
 */
export class Logger {
  config: LoggerConfig;

  constructor(config: LoggerConfig) {
    this.config = config;
  }

  log(...args: unknown[]): void {
    if (this.config.silent) return;
    console.log(...args);
  }

  debug(...args: unknown[]): void {
    if (this.config.silent || !this.config.verbose) return;
    console.log(chalk.gray("[debug]"), ...args);
  }

  warn(...args: unknown[]): void {
    if (this.config.silent) return;
    console.error(chalk.yellow("[warn]"), ...args);
  }

  error(...args: unknown[]): void {
    if (this.config.silent) return;
    console.error(chalk.red("[error]"), ...args);
  }
}
