import { type CosmiconfigResult, cosmiconfig } from 'cosmiconfig';
import yaml from 'yaml';
import type { ServiceConfig } from '../../types/index.js';
import {
  ConfigError,
  fileExists,
  formatError,
  parseRepository,
  readTextFile,
  resolveFromConfig,
} from '../../utils/index.js';

export const CONFIG_MODULE_NAME = 'vm-ci-runners';

export const CONFIG_SEARCH_PLACES = [
  'vm-ci-runners.yml',
  'vm-ci-runners.yaml',
  '.vm-ci-runners.yml',
  'config/vm-ci-runners.yml',
];

export const DEFAULTS = {
  concurrencyLimit: 1,
  pollIntervalSeconds: 10,
  idleTimeoutSeconds: 900,
  registrationTimeoutSeconds: 300,
  bootTimeoutSeconds: 180,
  maxJobDurationSeconds: 6 * 60 * 60,
  tickIntervalSeconds: 5,
  reconcileIntervalSeconds: 60,
  shutdownGraceSeconds: 60,
  driverAttempts: 3,
  driverRetryDelaySeconds: 5,
  failureBackoffSeconds: 2,
  runnerOfflineGraceSeconds: 120,
  runnerNamePrefix: 'ephemeral-runner',
  apiUrl: 'https://api.github.com',
  serverUrl: 'https://github.com',
  vmBinary: 'tart',
  sshUser: 'admin',
  runnerDir: '~/actions-runner',
  logLevel: 'info',
} as const;

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

type RawObject = Record<string, unknown>;

const isObject = (value: unknown): value is RawObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

function isLogLevel(value: unknown): value is ServiceConfig['logging']['level'] {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Collects every problem in one pass so a broken file is reported in full.
 */
class FieldReader {
  readonly errors: string[] = [];

  section(raw: RawObject, key: string): RawObject {
    const value = raw[key];
    if (value === undefined || value === null) return {};
    if (!isObject(value)) {
      this.errors.push(`${key}: must be an object`);
      return {};
    }
    return value;
  }

  requiredString(raw: RawObject, key: string, path = key): string {
    const value = raw[key];
    if (typeof value !== 'string' || value.trim() === '') {
      this.errors.push(`${path}: is required and must be a non-empty string`);
      return '';
    }
    return value.trim();
  }

  optionalString(raw: RawObject, key: string, fallback: string, path?: string): string;
  optionalString(raw: RawObject, key: string, fallback: undefined, path?: string): string | undefined;
  optionalString(
    raw: RawObject,
    key: string,
    fallback: string | undefined,
    path = key,
  ): string | undefined {
    const value = raw[key];
    if (value === undefined || value === null) return fallback;
    if (typeof value !== 'string' || value.trim() === '') {
      this.errors.push(`${path}: must be a non-empty string`);
      return fallback;
    }
    return value.trim();
  }

  requiredId(raw: RawObject, key: string, path = key): string {
    const value = raw[key];
    if (typeof value === 'number' && Number.isInteger(value) && value > 0) {
      return String(value);
    }
    if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
      return value.trim();
    }
    this.errors.push(`${path}: is required and must be a numeric id`);
    return '';
  }

  positiveNumber(
    raw: RawObject,
    key: string,
    fallback: number,
    options?: { integer?: boolean; path?: string },
  ): number;
  positiveNumber(
    raw: RawObject,
    key: string,
    fallback: undefined,
    options?: { integer?: boolean; path?: string },
  ): number | undefined;
  positiveNumber(
    raw: RawObject,
    key: string,
    fallback: number | undefined,
    options: { integer?: boolean; path?: string } = {},
  ): number | undefined {
    const path = options.path ?? key;
    const value = raw[key];
    if (value === undefined || value === null) return fallback;
    if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
      this.errors.push(`${path}: must be a positive ${options.integer ? 'integer' : 'number'}`);
      return fallback;
    }
    if (options.integer && !Number.isInteger(value)) {
      this.errors.push(`${path}: must be a positive integer`);
      return fallback;
    }
    return value;
  }

  stringList(raw: RawObject, key: string): string[] {
    const value = raw[key];
    if (value === undefined || value === null) return [];
    if (!Array.isArray(value)) {
      this.errors.push(`${key}: must be an array`);
      return [];
    }
    const result: string[] = [];
    value.forEach((item, index) => {
      if (typeof item !== 'string' || item.trim() === '') {
        this.errors.push(`${key}[${index}]: must be a non-empty string`);
      } else if (item.includes(',')) {
        this.errors.push(`${key}[${index}]: must not contain commas`);
      } else if (!result.includes(item.trim())) {
        result.push(item.trim());
      }
    });
    return result;
  }
}

export class ConfigLoader {
  private readonly explorer = cosmiconfig(CONFIG_MODULE_NAME, {
    searchPlaces: CONFIG_SEARCH_PLACES,
    loaders: {
      '.yml': (_filepath: string, content: string): unknown => yaml.parse(content),
      '.yaml': (_filepath: string, content: string): unknown => yaml.parse(content),
    },
  });

  async load(filepath?: string): Promise<ServiceConfig> {
    let result: CosmiconfigResult;

    try {
      result = filepath ? await this.explorer.load(filepath) : await this.explorer.search();
    } catch (error) {
      throw new ConfigError(`Failed to read configuration: ${formatError(error)}`);
    }

    if (!result || !result.config) {
      throw new ConfigError(
        'Configuration file not found',
        `Create one of: ${CONFIG_SEARCH_PLACES.join(', ')} or pass --config <file>`,
      );
    }

    const expanded = this.processEnvVars(result.config);
    const config = await this.validateConfig(expanded, result.filepath);
    return deepFreeze(config);
  }

  private async validateConfig(config: unknown, configPath?: string): Promise<ServiceConfig> {
    if (!isObject(config)) {
      throw new ConfigError('Invalid configuration: must be an object');
    }

    const read = new FieldReader();

    const baseImageName = read.requiredString(config, 'base_image_name');

    const repositoryString = read.requiredString(config, 'repository');
    let repository = { owner: '', repo: '' };
    if (repositoryString) {
      try {
        repository = parseRepository(repositoryString);
      } catch (error) {
        read.errors.push(`repository: ${formatError(error).split('\n')[0]}`);
      }
    }

    const concurrencyLimit = read.positiveNumber(
      config,
      'concurrency_limit',
      DEFAULTS.concurrencyLimit,
      { integer: true },
    );
    const labels = read.stringList(config, 'labels');
    const runnerNamePrefix = read.optionalString(
      config,
      'runner_name_prefix',
      DEFAULTS.runnerNamePrefix,
    );
    if (!/^[a-z0-9][a-z0-9-]*$/.test(runnerNamePrefix)) {
      read.errors.push('runner_name_prefix: must contain only lowercase letters, digits and hyphens');
    }
    const driverAttempts = read.positiveNumber(config, 'driver_attempts', DEFAULTS.driverAttempts, {
      integer: true,
    });

    const seconds = (key: string, fallback: number): number =>
      read.positiveNumber(config, key, fallback) * 1000;

    const timing = {
      pollIntervalMs: seconds('poll_interval_seconds', DEFAULTS.pollIntervalSeconds),
      idleTimeoutMs: seconds('idle_timeout_seconds', DEFAULTS.idleTimeoutSeconds),
      registrationTimeoutMs: seconds(
        'registration_timeout_seconds',
        DEFAULTS.registrationTimeoutSeconds,
      ),
      bootTimeoutMs: seconds('boot_timeout_seconds', DEFAULTS.bootTimeoutSeconds),
      maxJobDurationMs: seconds('max_job_duration_seconds', DEFAULTS.maxJobDurationSeconds),
      tickIntervalMs: seconds('tick_interval_seconds', DEFAULTS.tickIntervalSeconds),
      reconcileIntervalMs: seconds(
        'reconcile_interval_seconds',
        DEFAULTS.reconcileIntervalSeconds,
      ),
      shutdownGraceMs: seconds('shutdown_grace_seconds', DEFAULTS.shutdownGraceSeconds),
      driverRetryDelayMs: seconds(
        'driver_retry_delay_seconds',
        DEFAULTS.driverRetryDelaySeconds,
      ),
      failureBackoffMs: seconds('failure_backoff_seconds', DEFAULTS.failureBackoffSeconds),
      runnerOfflineGraceMs: seconds(
        'runner_offline_grace_seconds',
        DEFAULTS.runnerOfflineGraceSeconds,
      ),
    };

    // github
    if (config.github === undefined || config.github === null) {
      read.errors.push('github: is required (app_id, installation_id, private_key_path)');
    }
    const github = read.section(config, 'github');
    const appId = config.github ? read.requiredId(github, 'app_id', 'github.app_id') : '';
    const installationId = config.github
      ? read.requiredId(github, 'installation_id', 'github.installation_id')
      : '';
    const inlineKey = read.optionalString(github, 'private_key', undefined, 'github.private_key');
    const keyPath = read.optionalString(
      github,
      'private_key_path',
      undefined,
      'github.private_key_path',
    );
    const apiUrl = read.optionalString(github, 'api_url', DEFAULTS.apiUrl, 'github.api_url');
    const serverUrl = read.optionalString(
      github,
      'server_url',
      DEFAULTS.serverUrl,
      'github.server_url',
    );

    let privateKey = '';
    if (config.github) {
      if (inlineKey && keyPath) {
        read.errors.push('github: set only one of private_key and private_key_path');
      } else if (inlineKey) {
        privateKey = inlineKey;
      } else if (keyPath) {
        const resolved = resolveFromConfig(configPath, keyPath);
        const content = await readTextFile(resolved);
        if (content === null) {
          read.errors.push(`github.private_key_path: file not found: ${resolved}`);
        } else {
          privateKey = content;
        }
      } else {
        read.errors.push('github: one of private_key or private_key_path is required');
      }
      if (privateKey && !privateKey.includes('PRIVATE KEY-----')) {
        read.errors.push('github: private key is not a PEM encoded key');
      }
    }

    // vm
    const vm = read.section(config, 'vm');
    const vmBinary = read.optionalString(vm, 'binary', DEFAULTS.vmBinary, 'vm.binary');
    const cpus = read.positiveNumber(vm, 'cpus', undefined, { integer: true, path: 'vm.cpus' });
    const memoryMb = read.positiveNumber(vm, 'memory_mb', undefined, {
      integer: true,
      path: 'vm.memory_mb',
    });

    // ssh
    const ssh = read.section(config, 'ssh');
    const sshUser = read.optionalString(ssh, 'user', DEFAULTS.sshUser, 'ssh.user');
    const runnerDir = read.optionalString(ssh, 'runner_dir', DEFAULTS.runnerDir, 'ssh.runner_dir');
    const sshKey = read.optionalString(ssh, 'key_path', undefined, 'ssh.key_path');
    let sshKeyPath: string | undefined;
    if (sshKey) {
      sshKeyPath = resolveFromConfig(configPath, sshKey);
      if (!(await fileExists(sshKeyPath))) {
        read.errors.push(`ssh.key_path: file not found: ${sshKeyPath}`);
      }
    }

    // logging
    const logging = read.section(config, 'logging');
    let level: ServiceConfig['logging']['level'] = DEFAULTS.logLevel;
    if (logging.level !== undefined) {
      if (isLogLevel(logging.level)) {
        level = logging.level;
      } else {
        read.errors.push(`logging.level: must be one of ${LOG_LEVELS.join(', ')}`);
      }
    }

    if (read.errors.length > 0) {
      throw new ConfigError(
        `Invalid configuration:\n${read.errors.map((e) => `  - ${e}`).join('\n')}`,
        configPath ? `Configuration file: ${configPath}` : undefined,
      );
    }

    return {
      baseImageName,
      repository,
      concurrencyLimit,
      labels,
      runnerNamePrefix,
      driverAttempts,
      timing,
      github: { appId, installationId, privateKey, apiUrl, serverUrl },
      vm: { binary: vmBinary, cpus, memoryMb },
      ssh: { user: sshUser, keyPath: sshKeyPath, runnerDir },
      logging: { level },
    };
  }

  /**
   * Replace `${VAR}` placeholders in every string value with the environment variable
   */
  private processEnvVars(value: unknown, path = ''): unknown {
    if (typeof value === 'string') {
      return value.replace(/\$\{([^}]+)\}/g, (_, envVar: string) => {
        const replacement = process.env[envVar];
        if (replacement === undefined || replacement === '') {
          throw new ConfigError(
            `Environment variable ${envVar} is not set`,
            path ? `Referenced by ${path}` : undefined,
          );
        }
        return replacement;
      });
    }

    if (Array.isArray(value)) {
      return value.map((item, index) => this.processEnvVars(item, `${path}[${index}]`));
    }

    if (isObject(value)) {
      const result: RawObject = {};
      for (const [key, item] of Object.entries(value)) {
        result[key] = this.processEnvVars(item, path ? `${path}.${key}` : key);
      }
      return result;
    }

    return value;
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const item of Object.values(value)) {
      deepFreeze(item);
    }
    Object.freeze(value);
  }
  return value;
}
