import { Octokit } from '@octokit/rest';
import type {
  GitHubAppConfig,
  InstallationToken,
  RegistrationToken,
  Repository,
  RunnerRecord,
} from '../../types/index.js';
import {
  AuthFailure,
  formatError,
  httpStatusOf,
  isRunnerError,
  logger,
  type RetryOptions,
  retryOperation,
  stringifyRepository,
  TransientAPIFailure,
} from '../../utils/index.js';
import { AppTokenProvider, type InstallationTokenSource } from './app-auth.js';
import { isAuthStatus, isRetryableApiError } from './retryable.js';

/**
 * What a runner supervisor needs from the CI platform
 */
export interface RegistrationClient {
  getInstallationToken(): Promise<InstallationToken>;
  getRunnerRegistrationToken(repo: Repository): Promise<RegistrationToken>;
  listRunners(repo: Repository): Promise<RunnerRecord[]>;
  findRunner(repo: Repository, name: string): Promise<RunnerRecord | null>;
  /** Resolves false when the runner is already gone */
  deleteRunner(repo: Repository, name: string): Promise<boolean>;
}

export interface GitHubClientOptions {
  retry?: Omit<RetryOptions, 'isRetryable'>;
  tokens?: InstallationTokenSource;
}

const PAGE_SIZE = 100;

export class GitHubClient implements RegistrationClient {
  private readonly tokens: InstallationTokenSource;
  private readonly apiUrl: string;
  private readonly retryOptions: Required<Pick<RetryOptions, 'maxAttempts' | 'retryDelay' | 'backoffMultiplier'>>;
  private octokit: Octokit | null = null;
  private octokitToken: string | null = null;

  constructor(config: GitHubAppConfig, options: GitHubClientOptions = {}) {
    this.apiUrl = config.apiUrl;
    this.tokens = options.tokens ?? new AppTokenProvider(config);
    this.retryOptions = {
      maxAttempts: 3,
      retryDelay: 1000,
      backoffMultiplier: 2,
      ...options.retry,
    };
  }

  private async client(): Promise<Octokit> {
    const { token } = await this.tokens.getInstallationToken();
    if (!this.octokit || this.octokitToken !== token) {
      this.octokit = new Octokit({
        auth: token,
        baseUrl: this.apiUrl,
        userAgent: 'vm-ci-runners',
      });
      this.octokitToken = token;
    }
    return this.octokit;
  }

  /**
   * Retry transient failures, then translate what escapes into the failure taxonomy
   */
  private async call<T>(
    operationName: string,
    operation: (octokit: Octokit) => Promise<T>,
  ): Promise<T> {
    try {
      return await retryOperation(async () => operation(await this.client()), operationName, {
        ...this.retryOptions,
        isRetryable: isRetryableApiError,
      });
    } catch (error) {
      throw this.translateError(error, operationName);
    }
  }

  private translateError(error: unknown, operationName: string): unknown {
    if (isRunnerError(error)) {
      return error;
    }

    if (isRetryableApiError(error)) {
      return new TransientAPIFailure(
        `${operationName} failed after ${this.retryOptions.maxAttempts} attempts: ${formatError(error)}`,
        this.retryOptions.maxAttempts,
        { cause: error },
      );
    }

    const status = httpStatusOf(error);
    if (isAuthStatus(status)) {
      // The token may have been revoked; the next call exchanges a new one
      this.tokens.invalidate();
      logger.error(`${operationName} was rejected by GitHub (HTTP ${status}). Check the app's permissions and installation.`);
      return new AuthFailure(`${operationName} rejected: ${formatError(error)}`, status, {
        cause: error,
      });
    }

    return error;
  }

  async getInstallationToken(): Promise<InstallationToken> {
    try {
      return await retryOperation(() => this.tokens.getInstallationToken(), 'getInstallationToken', {
        ...this.retryOptions,
        isRetryable: isRetryableApiError,
      });
    } catch (error) {
      throw this.translateError(error, 'getInstallationToken');
    }
  }

  async getRunnerRegistrationToken(repo: Repository): Promise<RegistrationToken> {
    return this.call(`getRunnerRegistrationToken for ${stringifyRepository(repo)}`, async (octokit) => {
      const response = await octokit.actions.createRegistrationTokenForRepo({
        owner: repo.owner,
        repo: repo.repo,
      });
      return {
        token: response.data.token,
        expiresAt: new Date(response.data.expires_at),
      };
    });
  }

  /**
   * Page through the repository's runners; `name` narrows the listing server-side
   */
  private async fetchRunners(repo: Repository, operationName: string, name?: string): Promise<RunnerRecord[]> {
    return this.call(operationName, async (octokit) => {
      const runners: RunnerRecord[] = [];

      for (let page = 1; ; page++) {
        const response = await octokit.actions.listSelfHostedRunnersForRepo({
          owner: repo.owner,
          repo: repo.repo,
          per_page: PAGE_SIZE,
          page,
          ...(name === undefined ? {} : { name }),
        });

        for (const runner of response.data.runners) {
          runners.push({
            id: runner.id,
            name: runner.name,
            os: runner.os,
            status: runner.status === 'online' ? 'online' : 'offline',
            busy: runner.busy,
            labels: runner.labels.map((label) => label.name),
          });
        }

        if (
          response.data.runners.length < PAGE_SIZE ||
          runners.length >= response.data.total_count
        ) {
          return runners;
        }
      }
    });
  }

  async listRunners(repo: Repository): Promise<RunnerRecord[]> {
    return this.fetchRunners(repo, `listRunners for ${stringifyRepository(repo)}`);
  }

  async findRunner(repo: Repository, name: string): Promise<RunnerRecord | null> {
    const runners = await this.fetchRunners(repo, `findRunner ${name} for ${stringifyRepository(repo)}`, name);
    return runners.find((runner) => runner.name === name) ?? null;
  }

  async deleteRunner(repo: Repository, name: string): Promise<boolean> {
    const runner = await this.findRunner(repo, name);
    if (!runner) {
      logger.debug(`Runner ${name} is not registered with ${stringifyRepository(repo)}`);
      return false;
    }

    try {
      await this.call(`deleteRunner ${name} for ${stringifyRepository(repo)}`, async (octokit) => {
        await octokit.actions.deleteSelfHostedRunnerFromRepo({
          owner: repo.owner,
          repo: repo.repo,
          runner_id: runner.id,
        });
      });
      return true;
    } catch (error) {
      if (httpStatusOf(error) === 404) {
        return false;
      }
      throw error;
    }
  }
}
