import { spawnSync } from 'node:child_process';
import * as path from 'node:path';

export interface CommandResult {
  status: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  error?: Error;
}

export type CommandRunner = (command: string, args: readonly string[]) => CommandResult;

export const DEFAULT_MAX_BUFFER_MB = 256;

export interface SpawnRunnerOptions {
  /** Folder holding the cwb-* executables; PATH lookup when absent */
  binDir?: string;
  /** Cap on a single command's output; cwb-decode prints a whole corpus */
  maxBufferMB?: number;
  verbose?: boolean;
}

/**
 * Runs a program synchronously without a shell. Arguments are passed as-is,
 * so paths with spaces need no quoting.
 */
export function createSpawnRunner(options: SpawnRunnerOptions = {}): CommandRunner {
  const { binDir, maxBufferMB = DEFAULT_MAX_BUFFER_MB, verbose = false } = options;

  return (command, args) => {
    const executable = binDir ? path.join(binDir, command) : command;
    if (verbose) console.log(`   Running [${[executable, ...args].join(' ')}]`);

    const result = spawnSync(executable, [...args], {
      encoding: 'utf8',
      stdio: 'pipe',
      maxBuffer: maxBufferMB * 1024 * 1024,
    });

    return {
      status: result.status,
      signal: result.signal,
      stdout: result.stdout ?? '',
      stderr: result.stderr ?? '',
      error: result.error,
    };
  };
}

/**
 * One-line reason for a failed command, or null when it succeeded
 */
export function describeFailure(result: CommandResult): string | null {
  if (result.error) {
    if ('code' in result.error && result.error.code === 'ENOBUFS') {
      return `${result.error.message} (output exceeds the buffer limit; raise CWB_MAX_BUFFER_MB)`;
    }
    return result.error.message;
  }
  if (result.signal) return `terminated by ${result.signal}`;
  if (result.status !== 0) {
    const output = (result.stderr || result.stdout).trim().split('\n').pop() ?? '';
    return `exited with status ${result.status}${output ? `: ${output}` : ''}`;
  }
  return null;
}
