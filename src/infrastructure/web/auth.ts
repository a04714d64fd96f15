import { createHash, timingSafeEqual } from 'crypto';
import type { IncomingHttpHeaders } from 'http';
import { UnauthorizedError } from '../../core/errors.js';
import { fingerprintCredential } from '../ratelimit/RateLimiter.js';

export const ANONYMOUS_OWNER = 'anonymous';

export type Authenticator = (headers: IncomingHttpHeaders) => string;

/**
 * Static X-API-Key check. Returns the owner identity (a fingerprint of the key).
 * With no keys configured every request belongs to the anonymous owner.
 */
export function createAuthenticator(apiKeys: string[]): Authenticator {
  const digests = apiKeys.filter((key) => key !== '').map(digest);

  return (headers) => {
    if (digests.length === 0) return ANONYMOUS_OWNER;

    const header = headers['x-api-key'];
    const presented = Array.isArray(header) ? header[0] : header;
    if (!presented) {
      throw new UnauthorizedError();
    }

    const candidate = digest(presented);
    // every configured key is compared
    let matched = false;
    for (const known of digests) {
      if (timingSafeEqual(candidate, known)) matched = true;
    }
    if (!matched) {
      throw new UnauthorizedError();
    }
    return fingerprintCredential(presented);
  };
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}
