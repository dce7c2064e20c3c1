import { setTimeout as sleep } from 'node:timers/promises';
import type { SshConfig } from '../../types/index.js';
import {
  type CommandResult,
  DriverFailure,
  formatError,
  logger,
  runCommand,
  spawnLines,
} from '../../utils/index.js';

export interface RunnerLaunch {
  url: string;
  token: string;
  name: string;
  labels: string[];
}

export interface RunnerOutput {
  stop(): void;
}

/**
 * Puts a registration into a booted VM and starts its runner
 */
export interface GuestProvisioner {
  waitForSsh(ip: string, timeoutMs: number, signal?: AbortSignal): Promise<void>;
  launchRunner(ip: string, launch: RunnerLaunch): Promise<void>;
  /** Stream the runner's log lines until stopped or the guest goes away */
  followRunnerOutput(ip: string, onLine: (line: string) => void): RunnerOutput;
}

const RUNNER_LOG = 'runner.log';

const SSH_OPTIONS = [
  '-o', 'StrictHostKeyChecking=no',
  '-o', 'UserKnownHostsFile=/dev/null',
  '-o', 'BatchMode=yes',
  '-o', 'ConnectTimeout=5',
  '-o', 'LogLevel=ERROR',
];

export function shellEscapeArg(value: string): string {
  return `'${value.replace(/'/g, "'\\''")}'`;
}

// Keep a leading ~ outside the quotes so the guest shell still expands it
function shellPath(value: string): string {
  if (value === '~') return '"$HOME"';
  if (value.startsWith('~/')) return `"$HOME"/${shellEscapeArg(value.slice(2))}`;
  return shellEscapeArg(value);
}

/**
 * Build the guest command that registers an ephemeral runner and starts it
 * in the background. config.sh consumes the token; it never touches the host's disk.
 */
export function buildLaunchCommand(runnerDir: string, launch: RunnerLaunch): string {
  const configArgs = [
    '--unattended',
    '--ephemeral',
    '--replace',
    '--disableupdate',
    '--url',
    shellEscapeArg(launch.url),
    '--token',
    shellEscapeArg(launch.token),
    '--name',
    shellEscapeArg(launch.name),
  ];
  if (launch.labels.length > 0) {
    configArgs.push('--labels', shellEscapeArg(launch.labels.join(',')));
  }

  return [
    `cd ${shellPath(runnerDir)}`,
    `./config.sh ${configArgs.join(' ')}`,
    `(nohup ./run.sh > ${RUNNER_LOG} 2>&1 &)`,
  ].join(' && ');
}

export class SshGuestShell implements GuestProvisioner {
  private readonly ssh: SshConfig;
  private readonly binary: string;
  private readonly retryPauseMs: number;

  constructor(ssh: SshConfig, options: { binary?: string; retryPauseMs?: number } = {}) {
    this.ssh = ssh;
    this.binary = options.binary ?? 'ssh';
    this.retryPauseMs = options.retryPauseMs ?? 2000;
  }

  private sshArgs(ip: string, command: string): string[] {
    const identity = this.ssh.keyPath ? ['-i', this.ssh.keyPath] : [];
    return [...SSH_OPTIONS, ...identity, `${this.ssh.user}@${ip}`, command];
  }

  async waitForSsh(ip: string, timeoutMs: number, signal?: AbortSignal): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    let lastError = '';

    while (Date.now() < deadline) {
      signal?.throwIfAborted();
      try {
        const result = await runCommand(this.binary, this.sshArgs(ip, 'true'), {
          timeoutMs: 15_000,
        });
        if (result.exitCode === 0) {
          return;
        }
        lastError = result.stderr.trim();
      } catch (error) {
        throw new DriverFailure(`${this.binary} could not run: ${formatError(error)}`, {
          operation: 'ssh',
          cause: error,
        });
      }
      logger.debug(`SSH on ${ip} not ready yet`, { error: lastError });
      await sleep(Math.min(this.retryPauseMs, Math.max(0, deadline - Date.now())), undefined, {
        signal,
      });
    }

    throw new DriverFailure(
      `SSH on ${ip} not reachable within ${Math.round(timeoutMs / 1000)}s${lastError ? `: ${lastError}` : ''}`,
      { operation: 'ssh', timedOut: true },
    );
  }

  async launchRunner(ip: string, launch: RunnerLaunch): Promise<void> {
    const command = buildLaunchCommand(this.ssh.runnerDir, launch);

    let result: CommandResult;
    try {
      result = await runCommand(this.binary, this.sshArgs(ip, command), { timeoutMs: 120_000 });
    } catch (error) {
      throw new DriverFailure(`${this.binary} could not run: ${formatError(error)}`, {
        operation: 'launch',
        vmName: launch.name,
        cause: error,
      });
    }

    if (result.exitCode !== 0) {
      throw new DriverFailure(
        `Runner configuration failed in ${launch.name} (exit ${result.exitCode}): ${(result.stderr || result.stdout).trim()}`,
        {
          operation: 'launch',
          vmName: launch.name,
          exitCode: result.exitCode,
          timedOut: result.timedOut,
        },
      );
    }
  }

  followRunnerOutput(ip: string, onLine: (line: string) => void): RunnerOutput {
    const logFile = `${shellPath(this.ssh.runnerDir)}/${RUNNER_LOG}`;
    const child = spawnLines(this.binary, this.sshArgs(ip, `tail -n +1 -F ${logFile}`), (line, stream) => {
      if (stream === 'stdout') {
        onLine(line);
      } else {
        logger.debug(`Runner log stream from ${ip}: ${line}`);
      }
    });
    child.on('error', (error) => {
      logger.debug(`Runner log stream from ${ip} failed`, { error: formatError(error) });
    });

    return {
      stop: () => {
        if (child.exitCode === null && !child.killed) {
          child.kill();
        }
      },
    };
  }
}
