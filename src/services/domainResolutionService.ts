/**
 * Domain resolution: decides registration and MX status for a domain,
 * answering from the domain cache when it can and populating it when it can't.
 */

import { DomainFact } from '../types/email';
import { DomainCache } from '../utils/cache';
import { lookupRegistration } from '../validators/registrationValidator';
import { hasMailExchange } from '../validators/dnsValidator';
import { logger } from '../utils/logger';
import { metrics } from '../utils/metrics';

/**
 * Network lookups the resolver depends on.
 * Implementations answer false on failure; a rejection is treated the same way.
 */
export interface DomainLookups {
  lookupRegistration(domain: string): Promise<boolean>;
  hasMailExchange(domain: string): Promise<boolean>;
}

export const defaultLookups: DomainLookups = {
  lookupRegistration,
  hasMailExchange,
};

async function failClosed(
  lookup: () => Promise<boolean>,
  domain: string,
  name: string
): Promise<boolean> {
  try {
    return await lookup();
  } catch (error) {
    logger.warn(`${name} lookup threw for ${domain}, treating as false`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}

export class DomainResolver {
  constructor(
    private readonly cache: DomainCache,
    private readonly lookups: DomainLookups = defaultLookups,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Resolve a domain. A cached fact is returned untouched; otherwise WHOIS
   * runs first and DNS MX only when the registration is alive.
   */
  async resolve(domain: string): Promise<DomainFact> {
    const key = domain.trim().toLowerCase();

    const cached = this.cache.get(key);
    metrics.recordCacheLookup(cached !== undefined);

    if (cached) {
      logger.debug(`Domain cache hit: ${key}`);
      return cached;
    }

    logger.debug(`Domain cache miss: ${key}`);

    const registrationAlive = await failClosed(() => this.lookups.lookupRegistration(key), key, 'Registration');

    let mailExchangeExists = false;
    if (registrationAlive) {
      mailExchangeExists = await failClosed(() => this.lookups.hasMailExchange(key), key, 'MX');
    }

    metrics.recordResolution(registrationAlive, registrationAlive ? mailExchangeExists : undefined);

    const fact: DomainFact = {
      registrationAlive,
      mailExchangeExists,
      checkedAt: this.clock().toISOString(),
    };

    this.cache.put(key, fact);

    logger.debug(`Domain resolved: ${key}`, fact);

    return fact;
  }
}
