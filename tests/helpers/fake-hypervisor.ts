import type { RegistrationClient } from '../../src/lib/github/index.js';
import type {
  GuestProvisioner,
  RunnerLaunch,
  RunnerOutput,
  VmDriver,
} from '../../src/lib/vm/index.js';
import type {
  InstallationToken,
  RegistrationToken,
  Repository,
  RunnerRecord,
  VmInstance,
  VmResources,
} from '../../src/types/index.js';
import { DriverFailure } from '../../src/utils/errors.js';

export type DriverOperation = 'clone' | 'configure' | 'start' | 'ip' | 'stop' | 'delete' | 'list';

/**
 * In-memory hypervisor. Each VM lives in `vms` until deleted.
 */
export class FakeVmDriver implements VmDriver {
  readonly vms = new Map<string, VmInstance>();
  readonly calls: string[] = [];
  /** Remaining injected failures per operation */
  readonly failures: Partial<Record<DriverOperation, number>> = {};
  /** Operations that never settle */
  readonly hangs = new Set<DriverOperation>();
  maxConcurrent = 0;
  ip = '192.168.64.10';

  private record(operation: DriverOperation, name?: string): void {
    this.calls.push(name ? `${operation}:${name}` : operation);
  }

  private async maybeFail(operation: DriverOperation, name?: string): Promise<void> {
    if (this.hangs.has(operation)) {
      await new Promise<never>(() => {});
    }
    const remaining = this.failures[operation] ?? 0;
    if (remaining > 0) {
      this.failures[operation] = remaining - 1;
      throw new DriverFailure(`${operation} failed`, { operation, vmName: name });
    }
  }

  private require(name: string, operation: DriverOperation): VmInstance {
    const vm = this.vms.get(name);
    if (!vm) {
      throw new DriverFailure(`VM ${name} does not exist`, { operation, vmName: name });
    }
    return vm;
  }

  callsFor(operation: DriverOperation): string[] {
    return this.calls.filter((call) => call === operation || call.startsWith(`${operation}:`));
  }

  /** Simulate the guest powering itself off */
  powerOff(name: string): void {
    const vm = this.vms.get(name);
    if (vm) vm.state = 'stopped';
  }

  async checkAvailable(): Promise<string> {
    return 'tart 2.0.0';
  }

  async clone(baseImage: string, name: string): Promise<VmInstance> {
    this.record('clone', name);
    await this.maybeFail('clone', name);
    const vm: VmInstance = { name, baseImage, state: 'stopped' };
    this.vms.set(name, vm);
    this.maxConcurrent = Math.max(this.maxConcurrent, this.vms.size);
    return { ...vm };
  }

  async configure(name: string, _resources: VmResources): Promise<void> {
    this.record('configure', name);
    await this.maybeFail('configure', name);
    this.require(name, 'configure');
  }

  async start(name: string): Promise<void> {
    this.record('start', name);
    await this.maybeFail('start', name);
    this.require(name, 'start').state = 'running';
  }

  async waitForIP(name: string, _timeoutMs: number): Promise<string> {
    this.record('ip', name);
    await this.maybeFail('ip', name);
    if (this.require(name, 'ip').state !== 'running') {
      throw new DriverFailure(`VM ${name} is not running`, { operation: 'ip', vmName: name, timedOut: true });
    }
    return this.ip;
  }

  async isRunning(name: string): Promise<boolean> {
    return this.vms.get(name)?.state === 'running';
  }

  async stop(name: string): Promise<void> {
    this.record('stop', name);
    await this.maybeFail('stop', name);
    this.powerOff(name);
  }

  async delete(name: string): Promise<void> {
    this.record('delete', name);
    await this.maybeFail('delete', name);
    this.vms.delete(name);
  }

  async list(): Promise<VmInstance[]> {
    this.record('list');
    await this.maybeFail('list');
    return [...this.vms.values()].map((vm) => ({ ...vm }));
  }
}

/**
 * In-memory stand-in for the GitHub runner API
 */
export class FakeRegistration implements RegistrationClient {
  readonly runners = new Map<string, RunnerRecord>();
  readonly deleted: string[] = [];
  tokensIssued = 0;
  tokenTtlMs = 60 * 60 * 1000;
  /** Thrown by every registration token request while set */
  tokenError: Error | null = null;
  /** Thrown by findRunner while set */
  findError: Error | null = null;
  private nextId = 1;

  async getInstallationToken(): Promise<InstallationToken> {
    return { token: 'test-installation-token', expiresAt: new Date(Date.now() + 60 * 60 * 1000) };
  }

  async getRunnerRegistrationToken(_repo: Repository): Promise<RegistrationToken> {
    if (this.tokenError) throw this.tokenError;
    this.tokensIssued += 1;
    return {
      token: `test-registration-token-${this.tokensIssued}`,
      expiresAt: new Date(Date.now() + this.tokenTtlMs),
    };
  }

  async listRunners(_repo: Repository): Promise<RunnerRecord[]> {
    return [...this.runners.values()].map((runner) => ({ ...runner }));
  }

  async findRunner(_repo: Repository, name: string): Promise<RunnerRecord | null> {
    if (this.findError) throw this.findError;
    const runner = this.runners.get(name);
    return runner ? { ...runner } : null;
  }

  async deleteRunner(_repo: Repository, name: string): Promise<boolean> {
    this.deleted.push(name);
    return this.runners.delete(name);
  }

  register(name: string, patch: Partial<Omit<RunnerRecord, 'id' | 'name'>> = {}): RunnerRecord {
    const runner: RunnerRecord = {
      id: this.nextId++,
      name,
      os: 'macOS',
      status: 'online',
      busy: false,
      labels: [],
      ...patch,
    };
    this.runners.set(name, runner);
    return runner;
  }

  update(name: string, patch: Partial<Omit<RunnerRecord, 'id' | 'name'>>): void {
    const runner = this.runners.get(name);
    if (runner) {
      this.runners.set(name, { ...runner, ...patch });
    }
  }

  /** Simulate an ephemeral runner finishing its job and removing itself */
  finishJob(name: string): void {
    this.runners.delete(name);
  }
}

/**
 * Guest that "runs config.sh" by registering the runner with the fake API
 */
export interface FakeRunnerOutput {
  ip: string;
  /** Feed a line as if the runner had printed it */
  emit: (line: string) => void;
  stopped: boolean;
}

export class FakeGuest implements GuestProvisioner {
  readonly launches: RunnerLaunch[] = [];
  readonly outputs: FakeRunnerOutput[] = [];
  autoRegister = true;
  launchError: Error | null = null;

  constructor(private readonly registration: FakeRegistration) {}

  async waitForSsh(_ip: string, _timeoutMs: number, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
  }

  async launchRunner(_ip: string, launch: RunnerLaunch): Promise<void> {
    this.launches.push(launch);
    if (this.launchError) throw this.launchError;
    if (this.autoRegister) {
      this.registration.register(launch.name, { labels: launch.labels });
    }
  }

  followRunnerOutput(ip: string, onLine: (line: string) => void): RunnerOutput {
    const output: FakeRunnerOutput = { ip, emit: onLine, stopped: false };
    this.outputs.push(output);
    return {
      stop: () => {
        output.stopped = true;
      },
    };
  }
}

export function createFakes() {
  const driver = new FakeVmDriver();
  const registration = new FakeRegistration();
  const guest = new FakeGuest(registration);
  return { driver, registration, guest };
}
