export interface GitHubAppConfig {
  appId: string;
  installationId: string;
  privateKey: string;
  apiUrl: string;
  serverUrl: string;
}

export interface Repository {
  owner: string;
  repo: string;
}

export interface RunnerRecord {
  id: number;
  name: string;
  os: string;
  status: 'online' | 'offline';
  busy: boolean;
  labels: string[];
}

export interface InstallationToken {
  token: string;
  expiresAt: Date;
}

export interface RegistrationToken {
  token: string;
  expiresAt: Date;
}

export type VmState = 'running' | 'stopped' | 'suspended' | 'unknown';

export interface VmInstance {
  name: string;
  baseImage?: string;
  state: VmState;
}

export interface VmResources {
  cpus?: number;
  memoryMb?: number;
}

export interface SshConfig {
  user: string;
  keyPath?: string;
  runnerDir: string;
}

export interface TimingConfig {
  pollIntervalMs: number;
  idleTimeoutMs: number;
  registrationTimeoutMs: number;
  bootTimeoutMs: number;
  maxJobDurationMs: number;
  tickIntervalMs: number;
  reconcileIntervalMs: number;
  shutdownGraceMs: number;
  driverRetryDelayMs: number;
  /** Base delay before a slot is refilled after an Errored supervisor; doubles per consecutive failure */
  failureBackoffMs: number;
  /** How long a registered runner may read `offline` while its VM still runs before it is given up on */
  runnerOfflineGraceMs: number;
}

export interface ServiceConfig {
  baseImageName: string;
  repository: Repository;
  concurrencyLimit: number;
  labels: string[];
  runnerNamePrefix: string;
  /** Attempts per driver operation, the first one included */
  driverAttempts: number;
  timing: TimingConfig;
  github: GitHubAppConfig;
  vm: VmResources & { binary: string };
  ssh: SshConfig;
  logging: {
    level: 'error' | 'warn' | 'info' | 'debug';
  };
}

export type SupervisorState =
  | 'Idle'
  | 'Provisioning'
  | 'Booting'
  | 'Registered'
  | 'Running'
  | 'Draining'
  | 'Reclaimed'
  | 'Errored';

export type SupervisorOutcome =
  | 'completed'
  | 'idle-timeout'
  | 'job-timeout'
  | 'runner-exited'
  | 'cancelled'
  | 'failed';

export interface SlotStatus {
  slotId: number;
  state: SupervisorState | 'Free';
  vmName: string | null;
  startedAt: Date | null;
  consecutiveFailures: number;
}

export interface ReconcileResult {
  destroyedVms: string[];
  removedRunners: string[];
}
