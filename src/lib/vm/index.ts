export type { VmDriver } from './driver.js';
export {
  buildLaunchCommand,
  type GuestProvisioner,
  type RunnerLaunch,
  type RunnerOutput,
  SshGuestShell,
} from './guest-shell.js';
export { TartDriver, type TartDriverOptions } from './tart-driver.js';
