/**
 * Child process helper for the external audio tools (players, recorder, whisper)
 */
import { spawn } from 'child_process';

export interface CommandResult {
  code: number | null;
  stderr: string;
}

export interface CommandOptions {
  /**
   * Kill the process after this many milliseconds
   */
  timeoutMs?: number;
}

/**
 * Runs a command to completion; rejects only when it cannot be started
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

export const runCommand: CommandRunner = (command, args, options = {}) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      stdio: ['ignore', 'ignore', 'pipe'],
      timeout: options.timeoutMs,
    });

    const stderrChunks: Buffer[] = [];
    child.stderr.on('data', (chunk: Buffer) => stderrChunks.push(chunk));
    child.on('error', (error) => reject(error));
    child.on('close', (code) => {
      resolve({ code, stderr: Buffer.concat(stderrChunks).toString('utf8') });
    });
  });

/**
 * Runs a command and rejects on a non-zero exit
 */
export async function runChecked(
  runner: CommandRunner,
  command: string,
  args: string[],
  options?: CommandOptions
): Promise<void> {
  const result = await runner(command, args, options);
  if (result.code !== 0) {
    const detail = result.stderr.trim();
    throw new Error(detail || `${command} exited with code ${result.code}`);
  }
}
