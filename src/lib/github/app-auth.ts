import { createAppAuth } from '@octokit/auth-app';
import { Octokit } from '@octokit/rest';
import type { GitHubAppConfig, InstallationToken } from '../../types/index.js';
import { AuthFailure, formatError, httpStatusOf, logger } from '../../utils/index.js';
import { isRetryableApiError } from './retryable.js';

export interface InstallationTokenSource {
  getInstallationToken(): Promise<InstallationToken>;
  invalidate(): void;
}

export interface AppTokenProviderOptions {
  /** Refresh this long before the token's expiry */
  refreshMarginMs?: number;
  now?: () => number;
}

const DEFAULT_REFRESH_MARGIN_MS = 5 * 60 * 1000;

/**
 * Exchanges the GitHub App's private key for installation access tokens.
 * Tokens live for an hour; one is reused until it is close to expiring.
 */
export class AppTokenProvider implements InstallationTokenSource {
  private readonly auth: ReturnType<typeof createAppAuth>;
  private readonly refreshMarginMs: number;
  private readonly now: () => number;
  private cached: InstallationToken | null = null;
  private pending: Promise<InstallationToken> | null = null;

  constructor(config: GitHubAppConfig, options: AppTokenProviderOptions = {}) {
    const bootstrap = new Octokit({ baseUrl: config.apiUrl });
    this.auth = createAppAuth({
      appId: config.appId,
      privateKey: config.privateKey,
      installationId: config.installationId,
      request: bootstrap.request,
    });
    this.refreshMarginMs = options.refreshMarginMs ?? DEFAULT_REFRESH_MARGIN_MS;
    this.now = options.now ?? Date.now;
  }

  async getInstallationToken(): Promise<InstallationToken> {
    if (this.cached && this.cached.expiresAt.getTime() - this.now() > this.refreshMarginMs) {
      return this.cached;
    }

    // Concurrent supervisors share one exchange
    if (!this.pending) {
      this.pending = this.exchange().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  invalidate(): void {
    this.cached = null;
  }

  private async exchange(): Promise<InstallationToken> {
    const refresh = this.cached !== null;
    logger.debug(refresh ? 'Refreshing installation token' : 'Requesting installation token');

    try {
      const authentication = await this.auth({ type: 'installation', refresh });
      const token: InstallationToken = {
        token: authentication.token,
        expiresAt: new Date(authentication.expiresAt),
      };
      this.cached = token;
      logger.debug(`Installation token valid until ${token.expiresAt.toISOString()}`);
      return token;
    } catch (error) {
      this.cached = null;
      if (isRetryableApiError(error)) {
        throw error;
      }
      const status = httpStatusOf(error);
      throw new AuthFailure(
        `GitHub App installation token exchange failed: ${formatError(error)}`,
        status,
        { cause: error },
      );
    }
  }
}
