import { describe, expect, it } from 'vitest';
import { startCommand } from '../../../../src/cli/commands/start.js';

describe('start command', () => {
  it('should have correct command properties', () => {
    expect(startCommand.name()).toBe('start');
    expect(startCommand.description()).toBe('Run ephemeral runner VMs until interrupted');
    expect(startCommand.options).toHaveLength(2);

    expect(startCommand.options[0]?.flags).toBe('-c, --config <file>');
    expect(startCommand.options[0]?.description).toBe('Configuration file path');
    expect(startCommand.options[1]?.flags).toBe('-v, --verbose');
  });
});
