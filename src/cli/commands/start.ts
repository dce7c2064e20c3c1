import { Command } from 'commander';
import { Orchestrator } from '../../lib/runner/index.js';
import { logger } from '../../utils/logger.js';
import { type ConfigOptions, createServices, loadServiceConfig, withErrorHandling } from '../utils/index.js';

export const startCommand = new Command('start')
  .description('Run ephemeral runner VMs until interrupted')
  .option('-c, --config <file>', 'Configuration file path')
  .option('-v, --verbose', 'Enable debug logging')
  .action(
    withErrorHandling(async (options: ConfigOptions) => {
      const config = await loadServiceConfig(options);
      const orchestrator = new Orchestrator(config, createServices(config));

      let signalCount = 0;
      const onSignal = (signal: NodeJS.Signals): void => {
        signalCount += 1;
        if (signalCount > 1) {
          logger.warn('Second signal received, exiting without cleanup');
          process.exit(130);
        }

        logger.info(`Received ${signal}`);
        void orchestrator.shutdown().then(
          () => process.exit(0),
          (error: unknown) => {
            logger.error('Shutdown failed', error);
            process.exit(1);
          },
        );
      };
      process.on('SIGINT', onSignal);
      process.on('SIGTERM', onSignal);

      await orchestrator.start();

      try {
        await orchestrator.waitUntilStopped();
      } catch (error) {
        await orchestrator.shutdown();
        throw error;
      }
    }),
  );
