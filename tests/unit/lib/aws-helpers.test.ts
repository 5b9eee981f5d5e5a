import { describe, it, expect, vi, afterEach } from 'vitest';
import { UNKNOWN_ACCOUNT, resolveAccountId, resolveCredentials } from '../../../backend/src/lib/aws-helpers.js';
import { resetAllCircuitBreakers } from '../../../backend/src/lib/circuit-breaker.js';
import type { StsApi } from '../../../backend/src/lib/cloud-provider/aws-clients.js';

describe('resolveAccountId', () => {
  afterEach(() => {
    resetAllCircuitBreakers();
  });

  it('should return the caller account', async () => {
    const sts: StsApi = {
      getCallerIdentity: vi.fn<StsApi['getCallerIdentity']>().mockResolvedValue({ $metadata: {}, Account: '111122223333' }),
    };

    await expect(resolveAccountId(sts)).resolves.toBe('111122223333');
  });

  it('should fall back to Unknown when STS fails', async () => {
    const sts: StsApi = {
      getCallerIdentity: vi.fn<StsApi['getCallerIdentity']>().mockRejectedValue(new Error('ExpiredToken')),
    };

    await expect(resolveAccountId(sts)).resolves.toBe(UNKNOWN_ACCOUNT);
  });

  it('should fall back to Unknown when the identity has no account', async () => {
    const sts: StsApi = {
      getCallerIdentity: vi.fn<StsApi['getCallerIdentity']>().mockResolvedValue({ $metadata: {} }),
    };

    await expect(resolveAccountId(sts)).resolves.toBe('Unknown');
  });
});

describe('resolveCredentials', () => {
  it('should defer to the default chain without a profile', () => {
    expect(resolveCredentials()).toBeUndefined();
    expect(resolveCredentials('')).toBeUndefined();
  });

  it('should build a lazy provider for a named profile', () => {
    expect(typeof resolveCredentials('audit')).toBe('function');
  });
});
