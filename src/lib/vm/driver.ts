import type { VmInstance, VmResources } from '../../types/index.js';

/**
 * Pure operations on named hypervisor VMs. No policy lives here: retries,
 * naming and ownership belong to the caller.
 */
export interface VmDriver {
  /** Verify the hypervisor CLI is installed; returns its version */
  checkAvailable(): Promise<string>;
  clone(baseImage: string, name: string): Promise<VmInstance>;
  configure(name: string, resources: VmResources): Promise<void>;
  start(name: string): Promise<void>;
  waitForIP(name: string, timeoutMs: number): Promise<string>;
  isRunning(name: string): Promise<boolean>;
  /** Succeeds when the VM is already stopped or unknown */
  stop(name: string): Promise<void>;
  /** Succeeds when the VM is already gone */
  delete(name: string): Promise<void>;
  list(): Promise<VmInstance[]>;
}
