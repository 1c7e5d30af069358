import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

/**
 * Runs a program and resolves to its stdout.
 */
export type CommandRunner = (command: string, args: readonly string[]) => Promise<string>;

/** Kill a hung sensor/actuator process after this long */
const COMMAND_TIMEOUT_MS = 10_000;

/**
 * execFile-backed runner. No shell is involved, so arguments are passed
 * through verbatim.
 */
export const runCommand: CommandRunner = async (command, args) => {
  const { stdout } = await execFileAsync(command, [...args], {
    timeout: COMMAND_TIMEOUT_MS,
    maxBuffer: 64 * 1024,
    encoding: 'utf8',
  });
  return stdout;
};
