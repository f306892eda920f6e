import { AutodiffError } from '../Errors';

/** Process exit codes of the forward-ad CLI. */
export const ExitCode = {
  usage: 1,
  invalidArguments: 2,
  evaluation: 3,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export class CliError extends Error {
  readonly exitCode: ExitCode;

  constructor(message: string, exitCode: ExitCode = ExitCode.usage) {
    super(message);
    this.name = 'CliError';
    this.exitCode = exitCode;
  }
}

/** Throws a CliError for bad input; defaults to the invalid-arguments exit code. */
export function assert(condition: unknown, message: string, exitCode: ExitCode = ExitCode.invalidArguments): asserts condition {
  if (!condition) {
    throw new CliError(message, exitCode);
  }
}

/**
 * Maps an error thrown by a command to the CliError it is reported as.
 * A failed evaluation (domain, division by zero, unsupported operand) keeps
 * its kind in the message and exits with `ExitCode.evaluation`. Anything
 * else is a usage problem, for which this returns undefined.
 */
export function toCliError(err: unknown): CliError | undefined {
  if (err instanceof CliError) {
    return err;
  }
  if (err instanceof AutodiffError) {
    return new CliError(`${err.name}: ${err.message}`, ExitCode.evaluation);
  }
  return undefined;
}
