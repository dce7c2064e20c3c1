import * as p from '@clack/prompts';
import color from 'picocolors';
import type { RunnerRecord, VmInstance } from '../../types/index.js';
import { logger } from '../../utils/logger.js';

/**
 * Get status indicator and text for a registered runner
 */
export function getRunnerStatusDisplay(runner: RunnerRecord): {
  indicator: string;
  text: string;
} {
  if (runner.status === 'offline') {
    return {
      indicator: color.gray('●'),
      text: color.gray('Offline'),
    };
  }
  if (runner.busy) {
    return {
      indicator: color.yellow('●'),
      text: color.yellow('Busy'),
    };
  }
  return {
    indicator: color.green('●'),
    text: color.green('Idle'),
  };
}

export function getVmStateDisplay(vm: VmInstance): string {
  switch (vm.state) {
    case 'running':
      return color.green('running');
    case 'stopped':
      return color.gray('stopped');
    default:
      return color.yellow(vm.state);
  }
}

/**
 * Display registered runners
 */
export function displayRunnerStatus(runners: RunnerRecord[], title = 'Registered runners:'): void {
  if (runners.length === 0) {
    p.log.info('No runners registered');
    return;
  }

  p.log.info(title);
  runners.forEach((runner) => {
    const { indicator, text } = getRunnerStatusDisplay(runner);
    logger.plain(`  ${indicator} ${runner.name} - ${text}`);
  });
}

export function displayVms(vms: VmInstance[], title = 'Runner VMs:'): void {
  if (vms.length === 0) {
    p.log.info('No runner VMs');
    return;
  }

  p.log.info(title);
  vms.forEach((vm) => {
    logger.plain(`  ${color.cyan('■')} ${vm.name} - ${getVmStateDisplay(vm)}`);
  });
}

/**
 * Create a spinner with consistent styling
 */
export function createSpinner() {
  return p.spinner();
}

/**
 * Log success with consistent styling
 */
export function logSuccess(message: string): void {
  p.log.success(color.green(`✓ ${message}`));
}

/**
 * Log warning with consistent styling
 */
export function logWarning(message: string): void {
  p.log.warn(color.yellow(`! ${message}`));
}
