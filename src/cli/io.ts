/**
 * Output plumbing shared by the command-line tools
 */

import { isWaffleError } from '../model/errors';

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

export const consoleIO: CliIO = {
  stdout: line => console.log(line),
  stderr: line => console.error(line),
};

/**
 * Reject anything but exactly `expected` positional arguments
 */
export function checkArgCount(args: readonly string[], expected: number, usage: string, io: CliIO): boolean {
  if (args.length === expected) {
    return true;
  }
  io.stderr(`Expected ${expected} command line arguments but got ${args.length}`);
  io.stderr(usage);
  return false;
}

/**
 * Report input errors on stderr and return the exit status; anything
 * that is not an input error is rethrown.
 */
export function reportInputError(error: unknown, io: CliIO): number {
  if (isWaffleError(error)) {
    io.stderr(error.message);
    return 1;
  }
  throw error;
}

/**
 * Entry point wrapper: sets the process exit status from the run result
 */
export function runMain(main: (args: string[]) => Promise<number>): void {
  main(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    }
  );
}
