/**
 * Raised at registration time when a check is declared in a way that can
 * never run (a bare IP with no port, loss bounds that make no sense, ...).
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * Raised when a probe reported success but its result could not be decoded.
 */
export class ProbeContractError extends Error {
  readonly output: string;

  constructor(message: string, output: string) {
    super(message);
    this.name = "ProbeContractError";
    this.output = output;
  }
}

/**
 * Thrown by a check whose expectations were still unmet after the last
 * attempt, when no failure callback was set on the checker.
 *
 * The stack starts at `boundary`'s caller, minus `callerSkip` further frames,
 * so the trace points at the code that declared the check.
 */
export class ConnectivityError extends Error {
  readonly callerSkip: number;

  constructor(
    message: string,
    callerSkip = 0,
    boundary?: (...args: never[]) => unknown,
  ) {
    super(message);
    this.name = "ConnectivityError";
    this.callerSkip = callerSkip;
    if (boundary) {
      Error.captureStackTrace(this, boundary);
    }
    this.stack = dropStackFrames(this.stack, callerSkip);
  }
}

function dropStackFrames(
  stack: string | undefined,
  count: number,
): string | undefined {
  if (!stack || count <= 0) return stack;
  const lines = stack.split("\n");
  const firstFrame = lines.findIndex((line) =>
    line.trimStart().startsWith("at "),
  );
  if (firstFrame === -1) return stack;
  // Always keep one frame.
  const frames = lines.length - firstFrame;
  lines.splice(firstFrame, Math.min(count, frames - 1));
  return lines.join("\n");
}
