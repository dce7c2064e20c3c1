import type { ChildProcess } from 'node:child_process';
import { setTimeout as sleep } from 'node:timers/promises';
import type { VmInstance, VmResources, VmState } from '../../types/index.js';
import {
  type CommandResult,
  ConfigError,
  DriverFailure,
  formatError,
  logger,
  runCommand,
  spawnBackground,
} from '../../utils/index.js';
import type { VmDriver } from './driver.js';

export interface TartDriverOptions {
  binary?: string;
  /** Pause between `tart ip` attempts that return without an address */
  ipPollIntervalMs?: number;
  cloneTimeoutMs?: number;
}

interface TartListEntry {
  Name?: unknown;
  Source?: unknown;
  State?: unknown;
  Running?: unknown;
}

// Longest single `tart ip --wait`; the overall deadline is enforced by the loop
const IP_WAIT_STEP_SECONDS = 10;
const STOP_GRACE_SECONDS = 30;

function readListEntry(item: object): TartListEntry {
  return {
    Name: 'Name' in item ? item.Name : undefined,
    Source: 'Source' in item ? item.Source : undefined,
    State: 'State' in item ? item.State : undefined,
    Running: 'Running' in item ? item.Running : undefined,
  };
}

function toVmState(entry: TartListEntry): VmState {
  if (entry.State === 'running' || entry.Running === true) return 'running';
  if (entry.State === 'stopped' || entry.Running === false) return 'stopped';
  if (entry.State === 'suspended') return 'suspended';
  return 'unknown';
}

/**
 * VM driver backed by the `tart` CLI
 */
export class TartDriver implements VmDriver {
  private readonly binary: string;
  private readonly ipPollIntervalMs: number;
  private readonly cloneTimeoutMs: number;
  private readonly processes = new Map<string, ChildProcess>();

  constructor(options: TartDriverOptions = {}) {
    this.binary = options.binary ?? 'tart';
    this.ipPollIntervalMs = options.ipPollIntervalMs ?? 2000;
    this.cloneTimeoutMs = options.cloneTimeoutMs ?? 30 * 60 * 1000;
  }

  private async exec(args: string[], vmName?: string, timeoutMs?: number): Promise<CommandResult> {
    const operation = args[0] ?? 'exec';
    try {
      return await runCommand(this.binary, args, { timeoutMs });
    } catch (error) {
      throw new DriverFailure(`${this.binary} ${operation} could not run: ${formatError(error)}`, {
        operation,
        vmName,
        cause: error,
      });
    }
  }

  private async execOrThrow(args: string[], vmName?: string, timeoutMs?: number): Promise<string> {
    const operation = args[0] ?? 'exec';
    const result = await this.exec(args, vmName, timeoutMs);
    if (result.exitCode !== 0) {
      const reason = result.timedOut ? 'timed out' : `exit ${result.exitCode}`;
      throw new DriverFailure(
        `${this.binary} ${operation}${vmName ? ` ${vmName}` : ''} failed (${reason}): ${result.stderr.trim()}`,
        { operation, vmName, exitCode: result.exitCode, timedOut: result.timedOut },
      );
    }
    return result.stdout;
  }

  async checkAvailable(): Promise<string> {
    let result: CommandResult;
    try {
      result = await runCommand(this.binary, ['--version'], { timeoutMs: 10_000 });
    } catch (error) {
      throw new ConfigError(
        `Could not find ${this.binary}: ${formatError(error)}`,
        `Is it on the PATH? Service managers often run with a minimal PATH. Current PATH: ${process.env.PATH ?? ''}`,
      );
    }
    if (result.exitCode !== 0) {
      throw new ConfigError(`${this.binary} --version failed: ${result.stderr.trim()}`);
    }
    return result.stdout.trim();
  }

  async list(): Promise<VmInstance[]> {
    const stdout = await this.execOrThrow(['list', '--source', 'local', '--format', 'json']);

    let parsed: unknown;
    try {
      parsed = JSON.parse(stdout);
    } catch (error) {
      throw new DriverFailure(`Unreadable ${this.binary} list output: ${formatError(error)}`, {
        operation: 'list',
        cause: error,
      });
    }
    if (!Array.isArray(parsed)) {
      throw new DriverFailure(`Unexpected ${this.binary} list output`, { operation: 'list' });
    }

    const instances: VmInstance[] = [];
    for (const item of parsed) {
      if (typeof item !== 'object' || item === null) continue;
      const entry = readListEntry(item);
      if (typeof entry.Name !== 'string') continue;
      if (entry.Source !== undefined && entry.Source !== 'local') continue;
      instances.push({ name: entry.Name, state: toVmState(entry) });
    }
    return instances;
  }

  private async find(name: string): Promise<VmInstance | undefined> {
    const instances = await this.list();
    return instances.find((vm) => vm.name === name);
  }

  async clone(baseImage: string, name: string): Promise<VmInstance> {
    logger.debug(`Cloning ${baseImage} into ${name}`);
    await this.execOrThrow(['clone', baseImage, name], name, this.cloneTimeoutMs);
    return { name, baseImage, state: 'stopped' };
  }

  async configure(name: string, resources: VmResources): Promise<void> {
    const args = ['set', name];
    if (resources.cpus !== undefined) args.push('--cpu', String(resources.cpus));
    if (resources.memoryMb !== undefined) args.push('--memory', String(resources.memoryMb));
    if (args.length === 2) return;

    await this.execOrThrow(args, name);
  }

  async start(name: string): Promise<void> {
    if (this.processes.has(name)) {
      return;
    }

    logger.debug(`Starting VM ${name}`);
    const child = spawnBackground(this.binary, ['run', name, '--no-graphics']);

    await new Promise<void>((resolve, reject) => {
      const onSpawn = () => {
        child.removeListener('error', onError);
        resolve();
      };
      const onError = (error: Error) => {
        child.removeListener('spawn', onSpawn);
        reject(
          new DriverFailure(`${this.binary} run ${name} failed to start: ${error.message}`, {
            operation: 'run',
            vmName: name,
            cause: error,
          }),
        );
      };
      child.once('spawn', onSpawn);
      child.once('error', onError);
    });

    this.processes.set(name, child);
    child.on('error', (error) => {
      logger.debug(`${this.binary} run ${name} reported an error`, { error: formatError(error) });
    });
    child.once('exit', (code, signal) => {
      this.processes.delete(name);
      logger.debug(`${this.binary} run ${name} exited`, { code, signal });
    });
  }

  async waitForIP(name: string, timeoutMs: number): Promise<string> {
    const deadline = Date.now() + timeoutMs;
    let lastError = '';

    for (;;) {
      const remainingMs = deadline - Date.now();
      if (remainingMs <= 0) {
        throw new DriverFailure(
          `VM ${name} did not report an IP address within ${Math.round(timeoutMs / 1000)}s${lastError ? `: ${lastError}` : ''}`,
          { operation: 'ip', vmName: name, timedOut: true },
        );
      }

      const waitSeconds = Math.max(1, Math.min(IP_WAIT_STEP_SECONDS, Math.ceil(remainingMs / 1000)));
      const result = await this.exec(
        ['ip', name, '--wait', String(waitSeconds)],
        name,
        (waitSeconds + 10) * 1000,
      );
      const ip = result.stdout.trim();
      if (result.exitCode === 0 && ip) {
        return ip;
      }
      lastError = result.stderr.trim();

      await sleep(Math.min(this.ipPollIntervalMs, Math.max(0, deadline - Date.now())));
    }
  }

  async isRunning(name: string): Promise<boolean> {
    const vm = await this.find(name);
    return vm?.state === 'running';
  }

  async stop(name: string): Promise<void> {
    const vm = await this.find(name);
    if (!vm || vm.state !== 'running') {
      return;
    }

    const result = await this.exec(
      ['stop', name, '--timeout', String(STOP_GRACE_SECONDS)],
      name,
      (STOP_GRACE_SECONDS + 30) * 1000,
    );
    if (result.exitCode === 0) {
      return;
    }

    // Lost a race with the guest shutting itself down
    if (!(await this.isRunning(name))) {
      return;
    }
    throw new DriverFailure(`${this.binary} stop ${name} failed (exit ${result.exitCode}): ${result.stderr.trim()}`, {
      operation: 'stop',
      vmName: name,
      exitCode: result.exitCode,
      timedOut: result.timedOut,
    });
  }

  async delete(name: string): Promise<void> {
    const vm = await this.find(name);
    if (!vm) {
      return;
    }
    if (vm.state === 'running') {
      await this.stop(name);
    }

    const result = await this.exec(['delete', name], name);
    if (result.exitCode === 0) {
      this.processes.delete(name);
      return;
    }

    if (!(await this.find(name))) {
      return;
    }
    throw new DriverFailure(`${this.binary} delete ${name} failed (exit ${result.exitCode}): ${result.stderr.trim()}`, {
      operation: 'delete',
      vmName: name,
      exitCode: result.exitCode,
      timedOut: result.timedOut,
    });
  }
}
