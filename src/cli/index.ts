#!/usr/bin/env node

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import dotenv from 'dotenv';
import { logger } from '../utils/index.js';
import { cleanCommand } from './commands/clean.js';
import { startCommand } from './commands/start.js';
import { statusCommand } from './commands/status.js';

dotenv.config();

// Get __dirname equivalent for ESM
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function readVersion(): string {
  const parsed: unknown = JSON.parse(readFileSync(join(__dirname, '..', '..', 'package.json'), 'utf-8'));
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return '0.0.0';
}

const program = new Command();

program
  .name('vm-ci-runners')
  .description('Ephemeral GitHub Actions runners in disposable Tart VMs')
  .version(readVersion());

program.addCommand(startCommand);
program.addCommand(statusCommand);
program.addCommand(cleanCommand);

async function main() {
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof Error) {
      logger.error(error.message);
    }
    process.exit(1);
  }
}

void main();
