/**
 * DNS and MX record validator.
 * Queries DNS for MX records to verify domain can receive email.
 * Caching happens one level up, on the whole domain fact.
 */

import { promises as dns } from 'dns';
import { ValidationReasonCode, MxRecord } from '../types/email';
import { logger } from '../utils/logger';

export interface MxValidationResult {
  domainHasMx: boolean;
  mxRecords?: MxRecord[];
  reasonCodes: ValidationReasonCode[];
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Check that a domain has at least one MX record
 *
 * @param domain - Domain name to check (should be lowercase)
 * @returns Validation result with MX records and reason codes
 */
export async function checkMailExchange(domain: string): Promise<MxValidationResult> {
  const normalizedDomain = domain.toLowerCase();

  try {
    logger.debug(`Performing DNS MX lookup for domain: ${normalizedDomain}`);

    const mxRecords = await dns.resolveMx(normalizedDomain);

    // Sort by priority (lower number = higher priority)
    const sortedRecords: MxRecord[] = mxRecords
      .map(record => ({
        exchange: record.exchange.toLowerCase(),
        priority: record.priority,
      }))
      .sort((a, b) => a.priority - b.priority);

    logger.debug(`MX lookup successful for ${normalizedDomain}`, {
      recordCount: sortedRecords.length,
    });

    if (sortedRecords.length === 0) {
      return { domainHasMx: false, mxRecords: [], reasonCodes: ['no_mx_records'] };
    }

    return { domainHasMx: true, mxRecords: sortedRecords, reasonCodes: ['mx_records_found'] };

  } catch (error) {
    const code = errorCode(error);

    logger.debug(`MX lookup failed for ${normalizedDomain}`, {
      error: error instanceof Error ? error.message : String(error),
      code,
    });

    // Domain doesn't exist or has no MX records
    if (code === 'ENOTFOUND' || code === 'ENODATA') {
      return { domainHasMx: false, mxRecords: [], reasonCodes: ['no_mx_records'] };
    }

    if (code === 'ETIMEOUT' || code === 'ETIMEDOUT') {
      return { domainHasMx: false, reasonCodes: ['dns_timeout'] };
    }

    logger.warn(`DNS lookup error for ${normalizedDomain}`, { code });

    return { domainHasMx: false, reasonCodes: ['dns_lookup_failed'] };
  }
}

/**
 * Boolean view of checkMailExchange for the resolver
 */
export async function hasMailExchange(domain: string): Promise<boolean> {
  const result = await checkMailExchange(domain);
  return result.domainHasMx;
}
