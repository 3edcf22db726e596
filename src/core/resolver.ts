/**
 * Target validation and hostname resolution
 */

import { promises as dns } from 'dns';
import { isIP } from 'net';
import { CacheManager } from './cache.js';
import { InvalidTargetError } from './errors.js';
import { logger } from '../utils/logger.js';
import type { LookupFn, ScanTarget } from './types.js';

const RESOLVE_TTL = 5 * 60 * 1000;

/**
 * System resolver lookup (honours /etc/hosts, unlike resolve4)
 */
export const systemLookup: LookupFn = async (hostname) => {
  const { address } = await dns.lookup(hostname);
  return address;
};

/**
 * Resolves scan targets, caching hostname lookups
 */
export class TargetResolver {
  private lookup: LookupFn;
  private cache: CacheManager<string>;

  constructor(lookup: LookupFn = systemLookup, ttl = RESOLVE_TTL) {
    this.lookup = lookup;
    this.cache = new CacheManager<string>(500, ttl);
  }

  /**
   * Validate and resolve a target.
   * @throws InvalidTargetError when the target is blank or does not resolve
   */
  async resolve(target: string): Promise<ScanTarget> {
    const host = assertTarget(target);

    if (isIP(host) !== 0) {
      return { host, address: host };
    }

    try {
      const address = await this.cache.getOrSet(`lookup:${host.toLowerCase()}`, () =>
        this.lookup(host)
      );
      if (address !== host) {
        logger.debug(`Resolved ${host} -> ${address}`);
      }
      return { host, address };
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      logger.debug(`Lookup failed for ${host}: ${detail}`);
      throw new InvalidTargetError(host, `Could not resolve hostname: ${host}`, { cause: error });
    }
  }

  clearCache(): void {
    this.cache.clear();
  }
}

/**
 * Trim a target and reject blank input
 */
export function assertTarget(target: string): string {
  const host = target.trim();
  if (host === '') {
    throw new InvalidTargetError(target, 'Target host is empty');
  }
  return host;
}
