import { setTimeout as sleep } from 'node:timers/promises';
import type {
  RegistrationToken,
  RunnerRecord,
  ServiceConfig,
  SupervisorOutcome,
  SupervisorState,
  VmInstance,
} from '../../types/index.js';
import {
  DriverFailure,
  failureKind,
  formatError,
  InvariantViolation,
  logger,
  RegistrationTimeout,
  repositoryUrl,
  retryOperation,
  type SimpleLogger,
  TransientAPIFailure,
} from '../../utils/index.js';
import type { RegistrationClient } from '../github/index.js';
import type { GuestProvisioner, RunnerOutput, VmDriver } from '../vm/index.js';
import { generateVmName } from './naming.js';

export interface SupervisorDeps {
  driver: VmDriver;
  registration: RegistrationClient;
  guest: GuestProvisioner;
}

export interface SupervisorSnapshot {
  slotId: number;
  state: SupervisorState;
  vmName: string;
  startedAt: Date | null;
  registeredAt: Date | null;
  outcome: SupervisorOutcome | null;
  failureKind: string | null;
}

const TRANSITIONS: Record<SupervisorState, readonly SupervisorState[]> = {
  Idle: ['Provisioning'],
  Provisioning: ['Booting', 'Draining', 'Errored'],
  Booting: ['Registered', 'Draining', 'Errored'],
  Registered: ['Running', 'Draining', 'Errored'],
  Running: ['Draining', 'Errored'],
  Draining: ['Reclaimed', 'Errored'],
  Reclaimed: [],
  Errored: [],
};

// Tokens this close to expiry are replaced before they reach the guest
const TOKEN_EXPIRY_MARGIN_MS = 60_000;

// `reachable: false` is a poll the API could not answer; deadlines keep running
type RunnerPoll = { reachable: true; runner: RunnerRecord | null } | { reachable: false };

export function isTerminalState(state: SupervisorState): boolean {
  return state === 'Reclaimed' || state === 'Errored';
}

/**
 * Owns one VM from clone to deletion and the runner registered inside it.
 * `run()` settles once the supervisor is Reclaimed or Errored; it never rejects.
 */
export class RunnerSupervisor {
  readonly slotId: number;
  readonly vmName: string;
  readonly history: SupervisorState[] = ['Idle'];

  private readonly config: ServiceConfig;
  private readonly deps: SupervisorDeps;
  private readonly log: SimpleLogger;
  private readonly controller = new AbortController();

  private currentState: SupervisorState = 'Idle';
  private vm: VmInstance | null = null;
  private cloneAttempted = false;
  private launchAttempted = false;
  private running: Promise<void> | null = null;
  private output: RunnerOutput | null = null;
  private missedPolls = 0;
  private offlineSince: number | null = null;

  startedAt: Date | null = null;
  registeredAt: Date | null = null;
  jobStartedAt: Date | null = null;
  outcome: SupervisorOutcome | null = null;
  failure: unknown = null;

  constructor(slotId: number, config: ServiceConfig, deps: SupervisorDeps) {
    this.slotId = slotId;
    this.config = config;
    this.deps = deps;
    this.vmName = generateVmName(config.runnerNamePrefix, slotId);
    this.log = logger.child({ slot: slotId, vm: this.vmName });
  }

  get state(): SupervisorState {
    return this.currentState;
  }

  get instance(): VmInstance | null {
    return this.vm;
  }

  isTerminal(): boolean {
    return isTerminalState(this.currentState);
  }

  snapshot(): SupervisorSnapshot {
    return {
      slotId: this.slotId,
      state: this.currentState,
      vmName: this.vmName,
      startedAt: this.startedAt,
      registeredAt: this.registeredAt,
      outcome: this.outcome,
      failureKind: this.failure === null ? null : failureKind(this.failure),
    };
  }

  run(): Promise<void> {
    this.running ??= this.execute();
    return this.running;
  }

  /**
   * Interrupt whatever the supervisor is waiting on; it drains and reclaims the VM.
   */
  abort(): void {
    if (!this.controller.signal.aborted) {
      this.log.debug('Cancellation requested');
      this.controller.abort();
    }
  }

  private get signal(): AbortSignal {
    return this.controller.signal;
  }

  private transition(next: SupervisorState): void {
    if (!TRANSITIONS[this.currentState].includes(next)) {
      throw new InvariantViolation(
        `Illegal supervisor transition ${this.currentState} -> ${next} for ${this.vmName}`,
      );
    }
    this.log.debug(`${this.currentState} -> ${next}`);
    this.currentState = next;
    this.history.push(next);
  }

  private async execute(): Promise<void> {
    this.startedAt = new Date();
    this.transition('Provisioning');

    try {
      const token = await this.provision();
      await this.boot(token);
      await this.awaitRegistration();
      this.outcome = await this.superviseJob();
    } catch (error) {
      if (this.signal.aborted && !(error instanceof InvariantViolation)) {
        this.outcome = 'cancelled';
      } else {
        await this.fail(error);
        return;
      }
    }

    await this.drain();
  }

  private retryDriver<T>(
    operation: (attempt: number) => Promise<T>,
    name: string,
    signal?: AbortSignal,
  ): Promise<T> {
    return retryOperation(operation, `${name} ${this.vmName}`, {
      maxAttempts: this.config.driverAttempts,
      retryDelay: this.config.timing.driverRetryDelayMs,
      backoffMultiplier: 1,
      signal,
    });
  }

  private async provision(): Promise<RegistrationToken> {
    const { driver, registration } = this.deps;

    const token = await registration.getRunnerRegistrationToken(this.config.repository);
    this.signal.throwIfAborted();

    this.log.info(`Cloning ${this.config.baseImageName}`);
    this.cloneAttempted = true;
    this.vm = await this.retryDriver(
      async (attempt) => {
        // A failed clone can leave a partial VM behind under our name
        if (attempt > 1) await driver.delete(this.vmName);
        return driver.clone(this.config.baseImageName, this.vmName);
      },
      'clone',
      this.signal,
    );
    this.signal.throwIfAborted();

    const { cpus, memoryMb } = this.config.vm;
    await this.retryDriver(() => driver.configure(this.vmName, { cpus, memoryMb }), 'configure', this.signal);
    this.signal.throwIfAborted();

    return token;
  }

  private async boot(token: RegistrationToken): Promise<void> {
    const { driver, guest, registration } = this.deps;
    const { timing } = this.config;

    this.transition('Booting');
    await this.retryDriver(() => driver.start(this.vmName), 'start', this.signal);
    this.signal.throwIfAborted();

    const bootDeadline = Date.now() + timing.bootTimeoutMs;
    const ip = await driver.waitForIP(this.vmName, timing.bootTimeoutMs);
    this.signal.throwIfAborted();
    this.log.debug(`VM reachable at ${ip}`);

    await guest.waitForSsh(ip, Math.max(1, bootDeadline - Date.now()), this.signal);

    let launchToken = token;
    if (token.expiresAt.getTime() - Date.now() < TOKEN_EXPIRY_MARGIN_MS) {
      this.log.debug('Registration token about to expire, requesting a new one');
      launchToken = await registration.getRunnerRegistrationToken(this.config.repository);
    }
    this.signal.throwIfAborted();

    this.launchAttempted = true;
    await guest.launchRunner(ip, {
      url: repositoryUrl(this.config.github.serverUrl, this.config.repository),
      token: launchToken.token,
      name: this.vmName,
      labels: this.config.labels,
    });
    this.output = guest.followRunnerOutput(ip, (line) => this.log.info(`runner: ${line}`));
  }

  private async pause(): Promise<void> {
    await sleep(this.config.timing.pollIntervalMs, undefined, { signal: this.signal });
  }

  private async awaitRegistration(): Promise<void> {
    const { driver } = this.deps;
    const { registrationTimeoutMs } = this.config.timing;
    const deadline = Date.now() + registrationTimeoutMs;

    for (;;) {
      const poll = await this.pollRunner();
      if (poll.reachable && poll.runner?.status === 'online') {
        this.registeredAt = new Date();
        this.transition('Registered');
        this.log.info('Runner registered, waiting for a job');
        return;
      }

      if (!(await driver.isRunning(this.vmName))) {
        throw new DriverFailure(`VM ${this.vmName} stopped before its runner registered`, {
          operation: 'run',
          vmName: this.vmName,
        });
      }
      if (Date.now() >= deadline) {
        throw new RegistrationTimeout(this.vmName, registrationTimeoutMs);
      }
      await this.pause();
    }
  }

  /**
   * Ask the API for our runner. Transient API failures count as a missed poll
   * rather than a failure; anything else propagates.
   */
  private async pollRunner(): Promise<RunnerPoll> {
    try {
      const runner = await this.deps.registration.findRunner(this.config.repository, this.vmName);
      this.missedPolls = 0;
      return { reachable: true, runner };
    } catch (error) {
      if (!(error instanceof TransientAPIFailure)) throw error;
      this.missedPolls += 1;
      this.log.warn(`Runner status unavailable (${this.missedPolls} missed poll(s))`, {
        error: formatError(error),
      });
      return { reachable: false };
    }
  }

  /**
   * Poll the runner record until the job ends or a timeout fires.
   * An ephemeral runner removes itself after its one job, so disappearing means done.
   * An `offline` reading only ends supervision once it outlasts the offline grace period.
   */
  private async superviseJob(): Promise<SupervisorOutcome> {
    const { driver } = this.deps;
    const { idleTimeoutMs, maxJobDurationMs, runnerOfflineGraceMs } = this.config.timing;

    for (;;) {
      const poll = await this.pollRunner();
      const vmRunning = await driver.isRunning(this.vmName);

      if (poll.reachable) {
        const { runner } = poll;
        if (!runner) {
          this.log.info('Runner deregistered itself');
          return 'completed';
        }
        if (this.currentState === 'Registered' && runner.busy) {
          this.jobStartedAt = new Date();
          this.transition('Running');
          this.log.info('Job picked up');
        }
        if (runner.status === 'offline') {
          this.offlineSince ??= Date.now();
        } else {
          this.offlineSince = null;
        }
      }

      if (!vmRunning) {
        this.log.warn(
          this.currentState === 'Running'
            ? 'VM stopped while a job was running'
            : 'VM stopped before its runner picked up a job',
        );
        return 'runner-exited';
      }
      if (this.offlineSince !== null && Date.now() - this.offlineSince >= runnerOfflineGraceMs) {
        this.log.warn(`Runner offline for ${Math.round(runnerOfflineGraceMs / 1000)}s, reclaiming`);
        return 'runner-exited';
      }

      if (this.currentState === 'Running') {
        const jobStartedAt = this.jobStartedAt?.getTime() ?? Date.now();
        if (Date.now() - jobStartedAt >= maxJobDurationMs) {
          this.log.warn(`Job exceeded ${Math.round(maxJobDurationMs / 1000)}s, reclaiming`);
          return 'job-timeout';
        }
      } else {
        const registeredAt = this.registeredAt?.getTime() ?? Date.now();
        if (Date.now() - registeredAt >= idleTimeoutMs) {
          this.log.warn(`No job within ${Math.round(idleTimeoutMs / 1000)}s, reclaiming`);
          return 'idle-timeout';
        }
      }

      await this.pause();
    }
  }

  private stopOutput(): void {
    this.output?.stop();
    this.output = null;
  }

  private async deregister(): Promise<void> {
    if (!this.launchAttempted) return;

    const removed = await this.deps.registration.deleteRunner(this.config.repository, this.vmName);
    if (removed) {
      this.log.debug('Runner deregistered');
    }
  }

  private async destroyVm(): Promise<void> {
    if (!this.cloneAttempted) return;

    const { driver } = this.deps;
    await this.retryDriver(() => driver.stop(this.vmName), 'stop');
    await this.retryDriver(() => driver.delete(this.vmName), 'delete');
    this.vm = null;
  }

  private async drain(): Promise<void> {
    try {
      this.transition('Draining');
    } catch (error) {
      await this.fail(error);
      return;
    }

    this.stopOutput();
    const problems: unknown[] = [];
    try {
      await this.deregister();
    } catch (error) {
      problems.push(error);
    }
    try {
      await this.destroyVm();
    } catch (error) {
      problems.push(error);
    }

    const [problem] = problems;
    if (problem !== undefined) {
      await this.fail(problem, true);
      return;
    }

    this.transition('Reclaimed');
    this.log.info(`Reclaimed (${this.outcome ?? 'completed'})`);
  }

  private async fail(error: unknown, cleanedUp = false): Promise<void> {
    this.failure = error;
    if (this.outcome !== 'cancelled') {
      this.outcome = 'failed';
    }

    const kind = failureKind(error);
    this.log.error(`Runner failed in ${this.currentState} [kind=${kind}]`, error);
    if (kind === 'auth') {
      this.log.error('Authentication with GitHub failed; every runner slot is affected until credentials are fixed');
    }

    if (!cleanedUp) {
      await this.cleanup();
    }
    // Errored is reachable from every non-terminal state
    this.currentState = 'Errored';
    this.history.push('Errored');
  }

  private async cleanup(): Promise<void> {
    this.stopOutput();
    try {
      await this.deregister();
    } catch (error) {
      this.log.warn('Could not deregister runner during cleanup', { error: formatError(error) });
    }
    try {
      await this.destroyVm();
    } catch (error) {
      this.log.warn('Could not destroy VM during cleanup; reconciliation will retry', {
        error: formatError(error),
      });
    }
  }
}
