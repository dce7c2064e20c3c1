import { setTimeout as sleep } from 'node:timers/promises';
import type { ReconcileResult, ServiceConfig, SlotStatus, VmInstance } from '../../types/index.js';
import {
  formatError,
  InvariantViolation,
  logger,
  SimpleMutex,
  stringifyRepository,
} from '../../utils/index.js';
import { isManagedVmName, slotIdFromVmName } from './naming.js';
import { RunnerSupervisor, type SupervisorDeps } from './runner-supervisor.js';

interface RunnerSlot {
  readonly id: number;
  supervisor: RunnerSupervisor | null;
  run: Promise<void> | null;
  consecutiveFailures: number;
  notBefore: number;
}

const MAX_FAILURE_BACKOFF_MS = 5 * 60 * 1000;

export type OrchestratorDeps = SupervisorDeps;

/**
 * Keeps `concurrencyLimit` runner supervisors alive and cleans up after them.
 * Slot occupancy is only mutated inside `tick()` under the mutex.
 */
export class Orchestrator {
  private readonly config: ServiceConfig;
  private readonly deps: OrchestratorDeps;
  private readonly slots: RunnerSlot[];
  private readonly mutex = new SimpleMutex();
  private readonly loopController = new AbortController();

  private stopping = false;
  private loop: Promise<void> | null = null;
  private shutdownPromise: Promise<void> | null = null;
  private lastReconcileAt = 0;

  constructor(config: ServiceConfig, deps: OrchestratorDeps) {
    this.config = config;
    this.deps = deps;
    this.slots = Array.from({ length: config.concurrencyLimit }, (_, id) => ({
      id,
      supervisor: null,
      run: null,
      consecutiveFailures: 0,
      notBefore: 0,
    }));
  }

  get isStopping(): boolean {
    return this.stopping;
  }

  activeCount(): number {
    return this.slots.filter((slot) => slot.supervisor !== null && !slot.supervisor.isTerminal())
      .length;
  }

  getStatus(): SlotStatus[] {
    return this.slots.map((slot) => ({
      slotId: slot.id,
      state: slot.supervisor?.state ?? 'Free',
      vmName: slot.supervisor?.vmName ?? null,
      startedAt: slot.supervisor?.startedAt ?? null,
      consecutiveFailures: slot.consecutiveFailures,
    }));
  }

  /**
   * Check the hypervisor, clean up leftovers from a previous run, then start the control loop
   */
  async start(): Promise<void> {
    if (this.loop) return;

    const version = await this.deps.driver.checkAvailable();
    logger.info(`Using ${this.config.vm.binary} ${version}`);

    const result = await this.reconcile();
    if (result.destroyedVms.length > 0 || result.removedRunners.length > 0) {
      logger.info(
        `Startup cleanup removed ${result.destroyedVms.length} VM(s) and ${result.removedRunners.length} runner registration(s)`,
      );
    }

    logger.info(
      `Managing up to ${this.config.concurrencyLimit} runner(s) for ${stringifyRepository(this.config.repository)}`,
    );
    this.loop = this.runLoop();
  }

  /**
   * Settles when the control loop stops; rejects with the InvariantViolation that stopped it
   */
  waitUntilStopped(): Promise<void> {
    return this.loop ?? Promise.resolve();
  }

  private async runLoop(): Promise<void> {
    while (!this.stopping) {
      try {
        await this.tick();
      } catch (error) {
        if (error instanceof InvariantViolation) {
          logger.error('Orchestrator state is inconsistent, stopping', error);
          this.stopping = true;
          throw error;
        }
        logger.error('Control loop iteration failed', error);
      }

      try {
        await sleep(this.config.timing.tickIntervalMs, undefined, {
          signal: this.loopController.signal,
        });
      } catch (error) {
        if (!this.loopController.signal.aborted) throw error;
      }
    }
  }

  /**
   * One control-loop iteration: reap finished supervisors, fill free slots,
   * reconcile when due, then verify the concurrency invariant.
   */
  async tick(): Promise<void> {
    await this.mutex.runExclusive(() => {
      this.reap();
      if (!this.stopping) {
        this.assign();
      }
      this.assertWithinLimit();
    });

    const reconcileDue = Date.now() - this.lastReconcileAt >= this.config.timing.reconcileIntervalMs;
    if (!this.stopping && reconcileDue) {
      await this.reconcile();
    }
  }

  private reap(): void {
    for (const slot of this.slots) {
      const supervisor = slot.supervisor;
      if (!supervisor?.isTerminal()) continue;

      if (supervisor.failure instanceof InvariantViolation) {
        throw supervisor.failure;
      }

      const failed = supervisor.state === 'Errored' || supervisor.outcome === 'idle-timeout';
      if (failed && supervisor.outcome !== 'cancelled') {
        slot.consecutiveFailures += 1;
        const backoff = Math.min(
          this.config.timing.failureBackoffMs * 2 ** (slot.consecutiveFailures - 1),
          MAX_FAILURE_BACKOFF_MS,
        );
        slot.notBefore = Date.now() + backoff;
        logger.debug(`Slot ${slot.id} backing off for ${backoff}ms after ${slot.consecutiveFailures} failure(s)`);
      } else {
        slot.consecutiveFailures = 0;
        slot.notBefore = 0;
      }

      logger.debug(
        `Slot ${slot.id} freed: ${supervisor.vmName} ${supervisor.state} (${supervisor.outcome ?? 'unknown'})`,
      );
      slot.supervisor = null;
      slot.run = null;
    }
  }

  private assign(): void {
    const now = Date.now();

    for (const slot of this.slots) {
      if (this.activeCount() >= this.config.concurrencyLimit) break;
      if (slot.supervisor !== null || now < slot.notBefore) continue;

      const supervisor = new RunnerSupervisor(slot.id, this.config, this.deps);
      slot.supervisor = supervisor;
      slot.run = supervisor.run();
      logger.debug(`Slot ${slot.id} assigned ${supervisor.vmName}`);
    }
  }

  private assertWithinLimit(): void {
    const active = this.activeCount();
    if (active > this.config.concurrencyLimit) {
      throw new InvariantViolation(
        `${active} active supervisors exceed the concurrency limit of ${this.config.concurrencyLimit}`,
      );
    }
  }

  private ownedVmNames(): Set<string> {
    const names = new Set<string>();
    for (const slot of this.slots) {
      if (slot.supervisor) names.add(slot.supervisor.vmName);
    }
    return names;
  }

  private async destroyVm(name: string): Promise<boolean> {
    try {
      await this.deps.driver.stop(name);
      await this.deps.driver.delete(name);
      return true;
    } catch (error) {
      logger.error(`Failed to destroy VM ${name}`, error);
      return false;
    }
  }

  /**
   * Destroy managed VMs no supervisor owns and drop offline registrations
   * left behind by runners we no longer track.
   */
  async reconcile(): Promise<ReconcileResult> {
    return this.mutex.runExclusive(async () => {
      this.lastReconcileAt = Date.now();
      const prefix = this.config.runnerNamePrefix;
      const result: ReconcileResult = { destroyedVms: [], removedRunners: [] };

      let vms: VmInstance[] = [];
      try {
        vms = await this.deps.driver.list();
      } catch (error) {
        logger.error('Could not list VMs for reconciliation', error);
      }

      const owned = this.ownedVmNames();
      for (const vm of vms) {
        if (!isManagedVmName(prefix, vm.name) || owned.has(vm.name)) continue;

        const slotId = slotIdFromVmName(prefix, vm.name);
        logger.warn(`Destroying orphaned VM ${vm.name} (left behind by slot ${slotId ?? '?'})`);
        if (await this.destroyVm(vm.name)) {
          result.destroyedVms.push(vm.name);
        }
      }

      const { registration } = this.deps;
      const { repository } = this.config;
      try {
        const runners = await registration.listRunners(repository);
        for (const runner of runners) {
          if (!isManagedVmName(prefix, runner.name) || owned.has(runner.name)) continue;
          if (runner.status !== 'offline') continue;

          try {
            if (await registration.deleteRunner(repository, runner.name)) {
              logger.warn(`Removed stale runner registration ${runner.name}`);
              result.removedRunners.push(runner.name);
            }
          } catch (error) {
            logger.error(`Failed to remove runner registration ${runner.name}`, error);
          }
        }
      } catch (error) {
        logger.error('Could not list runners for reconciliation', { error: formatError(error) });
      }

      return result;
    });
  }

  /**
   * Stop assigning, cancel every supervisor, wait up to `graceMs` for them to
   * reclaim their VMs, then force-destroy whatever managed VMs remain.
   */
  shutdown(graceMs: number = this.config.timing.shutdownGraceMs): Promise<void> {
    this.shutdownPromise ??= this.performShutdown(graceMs);
    return this.shutdownPromise;
  }

  private async performShutdown(graceMs: number): Promise<void> {
    logger.info('Shutting down runners...');
    this.stopping = true;
    this.loopController.abort();
    await Promise.allSettled([this.loop]);

    const runs: Promise<void>[] = [];
    await this.mutex.runExclusive(() => {
      for (const slot of this.slots) {
        if (!slot.supervisor || !slot.run) continue;
        slot.supervisor.abort();
        runs.push(slot.run);
      }
    });

    if (runs.length > 0) {
      const graceTimer = new AbortController();
      const finished = await Promise.race([
        Promise.all(runs).then(() => true),
        sleep(graceMs, false, { signal: graceTimer.signal }),
      ]);
      graceTimer.abort();

      if (!finished) {
        logger.warn(`Runners did not finish within ${Math.round(graceMs / 1000)}s, destroying their VMs`);
      }
    }

    let leftovers: VmInstance[] = [];
    try {
      leftovers = (await this.deps.driver.list()).filter((vm) =>
        isManagedVmName(this.config.runnerNamePrefix, vm.name),
      );
    } catch (error) {
      logger.error('Could not list VMs during shutdown', error);
    }
    for (const vm of leftovers) {
      await this.destroyVm(vm.name);
    }

    try {
      await this.mutex.runExclusive(() => this.reap());
    } catch (error) {
      logger.error('Could not release runner slots', error);
    }
    logger.success('All runners stopped');
  }
}
