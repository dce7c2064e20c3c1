// Main classes and functions

export { ConfigLoader } from './lib/config/index.js';
export { AppTokenProvider, GitHubClient } from './lib/github/index.js';
export type { RegistrationClient } from './lib/github/index.js';
export { Orchestrator, RunnerSupervisor } from './lib/runner/index.js';
export { SshGuestShell, TartDriver } from './lib/vm/index.js';
export type { GuestProvisioner, RunnerOutput, VmDriver } from './lib/vm/index.js';
// Types that are used in public APIs
export type {
  ReconcileResult,
  Repository,
  RunnerRecord,
  ServiceConfig,
  SlotStatus,
  SupervisorOutcome,
  SupervisorState,
} from './types/index.js';
// Utilities
export {
  AuthFailure,
  ConfigError,
  DriverFailure,
  InvariantViolation,
  logger,
  parseRepository,
  RegistrationTimeout,
  TransientAPIFailure,
} from './utils/index.js';
