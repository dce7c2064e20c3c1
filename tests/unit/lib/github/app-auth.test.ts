import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { AppTokenProvider as Provider } from '../../../../src/lib/github/app-auth.js';
import { AuthFailure } from '../../../../src/utils/errors.js';
import { createTestConfig } from '../../../helpers/test-config.js';

describe('AppTokenProvider', () => {
  let AppTokenProvider: typeof Provider;
  const mockAuth = vi.fn();
  const mockCreateAppAuth = vi.fn(() => mockAuth);
  let now = Date.parse('2025-01-01T00:00:00Z');

  const tokenExpiringIn = (ms: number, token = 'test-installation-token') => ({
    type: 'token',
    tokenType: 'installation',
    token,
    expiresAt: new Date(now + ms).toISOString(),
  });

  beforeEach(async () => {
    vi.doMock('@octokit/auth-app', () => ({ createAppAuth: mockCreateAppAuth }));
    vi.doMock('@octokit/rest', () => ({
      Octokit: vi.fn(() => ({ request: vi.fn() })),
    }));
    ({ AppTokenProvider } = await import('../../../../src/lib/github/app-auth.js'));
  });

  afterEach(() => {
    vi.clearAllMocks();
    mockAuth.mockReset();
  });

  function createProvider() {
    return new AppTokenProvider(createTestConfig().github, { now: () => now });
  }

  it('should configure app auth with the app credentials', () => {
    createProvider();

    expect(mockCreateAppAuth).toHaveBeenCalledWith(
      expect.objectContaining({ appId: '12345', installationId: '67890' }),
    );
  });

  it('should exchange once and reuse the token until close to expiry', async () => {
    mockAuth.mockResolvedValue(tokenExpiringIn(60 * 60 * 1000));
    const provider = createProvider();

    const first = await provider.getInstallationToken();
    now += 30 * 60 * 1000;
    const second = await provider.getInstallationToken();

    expect(second).toBe(first);
    expect(mockAuth).toHaveBeenCalledTimes(1);
    expect(mockAuth).toHaveBeenCalledWith({ type: 'installation', refresh: false });
  });

  it('should refresh inside the refresh margin', async () => {
    mockAuth
      .mockResolvedValueOnce(tokenExpiringIn(10 * 60 * 1000, 'test-token-1'))
      .mockResolvedValueOnce(tokenExpiringIn(60 * 60 * 1000, 'test-token-2'));
    const provider = createProvider();

    await provider.getInstallationToken();
    now += 6 * 60 * 1000;
    const refreshed = await provider.getInstallationToken();

    expect(refreshed.token).toBe('test-token-2');
    expect(mockAuth).toHaveBeenLastCalledWith({ type: 'installation', refresh: true });
  });

  it('should share one exchange between concurrent callers', async () => {
    mockAuth.mockResolvedValue(tokenExpiringIn(60 * 60 * 1000));
    const provider = createProvider();

    const [a, b] = await Promise.all([provider.getInstallationToken(), provider.getInstallationToken()]);

    expect(a).toBe(b);
    expect(mockAuth).toHaveBeenCalledTimes(1);
  });

  it('should exchange again after invalidate', async () => {
    mockAuth.mockResolvedValue(tokenExpiringIn(60 * 60 * 1000));
    const provider = createProvider();

    await provider.getInstallationToken();
    provider.invalidate();
    await provider.getInstallationToken();

    expect(mockAuth).toHaveBeenCalledTimes(2);
  });

  it('should turn a rejected exchange into an AuthFailure', async () => {
    mockAuth.mockRejectedValue(Object.assign(new Error('A JSON web token could not be decoded'), { status: 401 }));
    const provider = createProvider();

    const error = await provider.getInstallationToken().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthFailure);
    expect(error instanceof AuthFailure ? error.status : undefined).toBe(401);
  });

  it('should pass retryable errors through unchanged', async () => {
    const outage = Object.assign(new Error('Service Unavailable'), { status: 503 });
    mockAuth.mockRejectedValue(outage);
    const provider = createProvider();

    await expect(provider.getInstallationToken()).rejects.toBe(outage);
  });
});
