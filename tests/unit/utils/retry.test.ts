import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { retryOperation as RetryOperation } from '../../../src/utils/retry.js';

describe('retryOperation', () => {
  let retryOperation: typeof RetryOperation;
  const mockLogger = {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  };

  beforeEach(async () => {
    vi.resetModules();
    vi.doMock('../../../src/utils/logger.js', () => ({ logger: mockLogger }));
    ({ retryOperation } = await import('../../../src/utils/retry.js'));
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  it('should return the first successful result', async () => {
    const operation = vi.fn().mockResolvedValue('ok');

    await expect(retryOperation(operation, 'op', { retryDelay: 1 })).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(1);
    expect(operation).toHaveBeenCalledWith(1);
  });

  it('should retry until the operation succeeds', async () => {
    const operation = vi
      .fn()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockResolvedValue('third time');

    await expect(retryOperation(operation, 'clone', { retryDelay: 1 })).resolves.toBe('third time');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(mockLogger.warn).toHaveBeenCalledTimes(2);
    expect(mockLogger.warn).toHaveBeenCalledWith(
      'clone failed (attempt 1/3), retrying in 1ms...',
      { error: 'first' },
    );
  });

  it('should rethrow the last error once attempts run out', async () => {
    const operation = vi.fn().mockRejectedValue(new Error('still broken'));

    await expect(
      retryOperation(operation, 'delete', { maxAttempts: 2, retryDelay: 1 }),
    ).rejects.toThrow('still broken');
    expect(operation).toHaveBeenCalledTimes(2);
    expect(mockLogger.error).toHaveBeenCalledWith('delete failed after 2 attempts');
  });

  it('should count the first call as one of maxAttempts', async () => {
    const operation = vi.fn().mockRejectedValue(new Error('no space left'));

    await expect(
      retryOperation(operation, 'clone', { maxAttempts: 1, retryDelay: 1 }),
    ).rejects.toThrow('no space left');
    expect(operation).toHaveBeenCalledTimes(1);
    expect(mockLogger.warn).not.toHaveBeenCalled();
    expect(mockLogger.error).toHaveBeenCalledWith('clone failed after 1 attempts');
  });

  it('should not retry errors the predicate rejects', async () => {
    const operation = vi.fn().mockRejectedValue(new Error('401'));

    await expect(
      retryOperation(operation, 'token', { retryDelay: 1, isRetryable: () => false }),
    ).rejects.toThrow('401');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should double the delay between attempts', async () => {
    const operation = vi
      .fn()
      .mockRejectedValueOnce(new Error('a'))
      .mockRejectedValueOnce(new Error('b'))
      .mockResolvedValue('done');

    await retryOperation(operation, 'list', { retryDelay: 2, backoffMultiplier: 2 });

    expect(mockLogger.warn).toHaveBeenNthCalledWith(
      2,
      'list failed (attempt 2/3), retrying in 4ms...',
      { error: 'b' },
    );
  });

  it('should stop when the signal is aborted', async () => {
    const controller = new AbortController();
    const operation = vi.fn().mockImplementation(async () => {
      controller.abort();
      throw new Error('interrupted');
    });

    await expect(
      retryOperation(operation, 'start', { retryDelay: 1, signal: controller.signal }),
    ).rejects.toThrow('interrupted');
    expect(operation).toHaveBeenCalledTimes(1);
  });
});
