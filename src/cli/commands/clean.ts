import * as p from '@clack/prompts';
import { Command } from 'commander';
import color from 'picocolors';
import { isManagedVmName, Orchestrator } from '../../lib/runner/index.js';
import { logger } from '../../utils/logger.js';
import {
  checkCancel,
  type ConfigOptions,
  createServices,
  createSpinner,
  loadServiceConfig,
  logSuccess,
  logWarning,
  withErrorHandling,
} from '../utils/index.js';

interface CleanOptions extends ConfigOptions {
  yes?: boolean;
}

export const cleanCommand = new Command('clean')
  .description('Destroy leftover runner VMs and stale runner registrations')
  .option('-c, --config <file>', 'Configuration file path')
  .option('-y, --yes', 'Skip the confirmation prompt')
  .action(
    withErrorHandling(async (options: CleanOptions) => {
      p.intro(color.cyan('VM CI Runners - Clean'));

      const config = await loadServiceConfig(options);
      const services = createServices(config);

      const vms = (await services.driver.list()).filter((vm) =>
        isManagedVmName(config.runnerNamePrefix, vm.name),
      );
      if (vms.length > 0) {
        logWarning(`Found ${vms.length} runner VM(s):`);
        vms.forEach((vm) => {
          logger.dim(`  - ${vm.name}`);
        });
      }

      if (!options.yes) {
        const confirmClean = await p.confirm({
          message: color.red(
            'Destroy every runner VM and remove offline registrations? Runners started by a running service are destroyed too.',
          ),
          initialValue: false,
        });

        checkCancel(confirmClean);
        if (!confirmClean) {
          p.cancel('Clean cancelled');
          process.exit(0);
        }
      }

      const spinner = createSpinner();
      spinner.start('Cleaning up...');
      const result = await new Orchestrator(config, services).reconcile();
      spinner.stop('Cleanup finished');

      logSuccess(
        `Destroyed ${result.destroyedVms.length} VM(s), removed ${result.removedRunners.length} registration(s)`,
      );
      if (result.destroyedVms.length < vms.length) {
        logWarning('Some VMs could not be destroyed; see the log above');
      }
      p.outro(color.green('Done'));
    }),
  );
