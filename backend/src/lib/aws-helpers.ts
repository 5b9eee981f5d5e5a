/**
 * Helpers for AWS credentials and account lookup
 */

import { fromIni } from '@aws-sdk/credential-providers';
import type { AwsCredentialIdentityProvider } from '@aws-sdk/types';
import { withAwsCircuitBreaker } from './circuit-breaker.js';
import { logger } from './logger.js';
import type { StsApi } from './cloud-provider/aws-clients.js';

export const UNKNOWN_ACCOUNT = 'Unknown';

/**
 * Named profile from the shared config files, or undefined to let the SDK use
 * its default chain (environment, SSO, instance role...).
 */
export function resolveCredentials(profile?: string): AwsCredentialIdentityProvider | undefined {
  if (!profile) {
    return undefined;
  }
  logger.debug('Using AWS profile', { profile });
  return fromIni({ profile });
}

/**
 * Account id of the caller. The account only labels the report, so a failed
 * lookup is logged and reported as "Unknown".
 */
export async function resolveAccountId(sts: StsApi): Promise<string> {
  try {
    const identity = await withAwsCircuitBreaker('sts', () => sts.getCallerIdentity());
    return identity.Account ?? UNKNOWN_ACCOUNT;
  } catch (err) {
    logger.warn('Could not get account ID', {
      error: err instanceof Error ? err.message : String(err),
    });
    return UNKNOWN_ACCOUNT;
  }
}
