import { ConfigLoader } from '../../lib/config/index.js';
import { GitHubClient } from '../../lib/github/index.js';
import type { OrchestratorDeps } from '../../lib/runner/index.js';
import { SshGuestShell, TartDriver } from '../../lib/vm/index.js';
import type { ServiceConfig } from '../../types/index.js';
import { logger } from '../../utils/logger.js';

export interface ConfigOptions {
  config?: string;
  verbose?: boolean;
}

/**
 * Load the service configuration and apply its log level
 */
export async function loadServiceConfig(options: ConfigOptions): Promise<ServiceConfig> {
  const config = await new ConfigLoader().load(options.config);
  logger.setLevel(options.verbose ? 'debug' : config.logging.level);
  return config;
}

export function createServices(config: ServiceConfig): OrchestratorDeps {
  return {
    driver: new TartDriver({ binary: config.vm.binary }),
    registration: new GitHubClient(config.github),
    guest: new SshGuestShell(config.ssh),
  };
}
