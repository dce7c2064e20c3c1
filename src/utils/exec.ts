import { type ChildProcess, execFile, spawn } from 'node:child_process';
import type { Readable } from 'node:stream';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface RunCommandOptions {
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
}

/**
 * Run a command to completion. Non-zero exits are reported in the result, not thrown;
 * only a missing binary (ENOENT) or similar spawn failure rejects.
 */
export function runCommand(
  file: string,
  args: string[],
  options: RunCommandOptions = {},
): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    execFile(
      file,
      args,
      {
        encoding: 'utf-8',
        timeout: options.timeoutMs ?? 60_000,
        maxBuffer: 16 * 1024 * 1024,
        env: options.env,
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr, timedOut: false });
          return;
        }

        if (typeof error.code === 'string') {
          reject(error);
          return;
        }

        resolve({
          exitCode: typeof error.code === 'number' ? error.code : 1,
          stdout,
          stderr,
          timedOut: error.killed === true && error.signal === 'SIGTERM',
        });
      },
    );
  });
}

/**
 * Start a long-running command in the background. Output is discarded.
 */
export function spawnBackground(file: string, args: string[]): ChildProcess {
  return spawn(file, args, {
    stdio: 'ignore',
  });
}

export type OutputStream = 'stdout' | 'stderr';

function forwardLines(stream: Readable, onLine: (line: string) => void): void {
  let pending = '';
  stream.on('data', (data: Buffer | string) => {
    const lines = (pending + String(data)).split(/\r?\n/);
    pending = lines.pop() ?? '';
    for (const line of lines) {
      if (line.trim() !== '') onLine(line);
    }
  });
  stream.on('end', () => {
    if (pending.trim() !== '') onLine(pending);
    pending = '';
  });
}

/**
 * Start a long-running command and hand each non-empty line it prints to `onLine`.
 * A trailing line without a newline is delivered when the stream ends.
 */
export function spawnLines(
  file: string,
  args: string[],
  onLine: (line: string, stream: OutputStream) => void,
): ChildProcess {
  const child = spawn(file, args, {
    stdio: ['ignore', 'pipe', 'pipe'],
  });
  if (child.stdout) forwardLines(child.stdout, (line) => onLine(line, 'stdout'));
  if (child.stderr) forwardLines(child.stderr, (line) => onLine(line, 'stderr'));
  return child;
}
