import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from 'vitest';
import { formatContext, SimpleLogger } from '../../../src/utils/logger.js';

describe('SimpleLogger', () => {
  let logSpy: MockInstance<typeof console.log>;
  let warnSpy: MockInstance<typeof console.warn>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should drop messages below the current level', () => {
    const logger = new SimpleLogger({ level: 'warn', isCLI: false });

    logger.info('hidden');
    logger.debug('hidden');
    logger.warn('shown');

    expect(logSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it('should tag child logger lines with their context', () => {
    const logger = new SimpleLogger({ level: 'info', isCLI: false });
    const child = logger.child({ slot: 1, vm: 'ephemeral-runner-1-abc' });

    child.info('Cloning');

    expect(String(logSpy.mock.calls[0]?.[0])).toContain('[slot=1 vm=ephemeral-runner-1-abc] Cloning');
  });

  it('should share the level between parent and child', () => {
    const logger = new SimpleLogger({ level: 'info', isCLI: false });
    const child = logger.child({ slot: 0 });

    logger.setLevel('error');
    child.warn('quiet');

    expect(child.getLevel()).toBe('error');
    expect(warnSpy).not.toHaveBeenCalled();
  });

  it('should append the error message', () => {
    const logger = new SimpleLogger({ level: 'error', isCLI: false });

    logger.error('Clone failed', new Error('disk full'));

    expect(String(errorSpy.mock.calls[0]?.[0])).toContain('Clone failed: disk full');
  });

  it('should ignore unknown levels', () => {
    const logger = new SimpleLogger({ level: 'info', isCLI: false });

    logger.setLevel('verbose');

    expect(logger.getLevel()).toBe('info');
  });
});

describe('formatContext', () => {
  it('should skip undefined values', () => {
    expect(formatContext({ slot: 2, vm: undefined })).toBe('[slot=2] ');
  });

  it('should be empty without context', () => {
    expect(formatContext(undefined)).toBe('');
  });
});
