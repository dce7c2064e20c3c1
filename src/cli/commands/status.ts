import * as p from '@clack/prompts';
import { Command } from 'commander';
import color from 'picocolors';
import { isManagedVmName } from '../../lib/runner/index.js';
import type { RunnerRecord, VmInstance } from '../../types/index.js';
import { formatError, stringifyRepository } from '../../utils/index.js';
import { logger } from '../../utils/logger.js';
import {
  type ConfigOptions,
  createServices,
  createSpinner,
  displayRunnerStatus,
  displayVms,
  loadServiceConfig,
  logWarning,
  withErrorHandling,
} from '../utils/index.js';

export const statusCommand = new Command('status')
  .description('Show runner VMs and their registrations')
  .option('-c, --config <file>', 'Configuration file path')
  .action(
    withErrorHandling(async (options: ConfigOptions) => {
      p.intro(color.cyan('VM CI Runners - Status'));

      const config = await loadServiceConfig(options);
      const { driver, registration } = createServices(config);
      const managed = (name: string) => isManagedVmName(config.runnerNamePrefix, name);

      const spinner = createSpinner();
      spinner.start('Checking runner status...');

      let vms: VmInstance[] = [];
      let vmError: string | null = null;
      try {
        vms = (await driver.list()).filter((vm) => managed(vm.name));
      } catch (error) {
        vmError = formatError(error);
      }

      let runners: RunnerRecord[] = [];
      let apiError: string | null = null;
      try {
        runners = (await registration.listRunners(config.repository)).filter((runner) =>
          managed(runner.name),
        );
      } catch (error) {
        apiError = formatError(error);
      }

      spinner.stop(`Repository: ${stringifyRepository(config.repository)}`);

      if (vmError) {
        logWarning(`Could not list VMs: ${vmError}`);
      } else {
        displayVms(vms);
      }

      logger.emptyLine();
      if (apiError) {
        logWarning(`Could not list runners: ${apiError}`);
      } else {
        displayRunnerStatus(runners);
      }

      const busy = runners.filter((runner) => runner.busy).length;
      p.outro(
        `${vms.length} VM(s), ${runners.length} runner(s), ${busy} busy, limit ${config.concurrencyLimit}`,
      );
    }),
  );
