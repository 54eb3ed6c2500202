/**
 * Command runner — reports a failed CLI action as `Error: <message>` and
 * resolves to the exit code the process should end with.
 */

import { errorMessage, exitCodeFor } from './core/errors.js';

export type Reporter = (line: string) => void;

const stderr: Reporter = line => process.stderr.write(line + '\n');

export async function runCommand(task: () => Promise<void> | void, report: Reporter = stderr): Promise<number> {
  try {
    await task();
    return 0;
  } catch (error) {
    report(`Error: ${errorMessage(error)}`);
    return exitCodeFor(error);
  }
}
