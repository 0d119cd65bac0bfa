/**
 * Domain registration validator.
 * Queries WHOIS for the domain's expiry date; a domain is alive only while
 * that date is in the future. Every failure path answers "not alive".
 */

/// <reference path="../types/whois-json.d.ts" />
import whois from 'whois-json';
import { ValidationReasonCode } from '../types/email';
import { config } from '../config/env';
import { logger } from '../utils/logger';

export interface RegistrationValidationResult {
  registrationAlive: boolean;
  expiresAt?: string;
  reasonCodes: ValidationReasonCode[];
}

/**
 * WHOIS labels that carry a registration expiry, in order of preference.
 * whois-json camel-cases labels, so "Registry Expiry Date" becomes registryExpiryDate.
 */
const EXPIRY_KEYS = [
  'registryExpiryDate',
  'registrarRegistrationExpirationDate',
  'expirationDate',
  'expiryDate',
  'expirationTime',
  'expiresOn',
  'expires',
  'expire',
  'paidTill',
  'validUntil',
];

// date, hh:mm, :ss, .fraction, offset
const ISO_TIMESTAMP =
  /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2})(?::(\d{2})(?:\.(\d+))?)?(Z|[+-]\d{2}:?\d{2})?)?$/i;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse an ISO-8601 timestamp. A missing offset is read as UTC.
 *
 * @returns The instant, or null if the text is not ISO-8601
 */
export function parseIsoTimestamp(text: string): Date | null {
  const match = ISO_TIMESTAMP.exec(text.trim());
  if (!match) {
    return null;
  }

  const [, date, hoursMinutes, seconds, fraction, offset] = match;

  // Date rolls 2030-02-31 over into March; such dates are not valid ISO
  const calendarDay = new Date(`${date}T00:00:00Z`);
  if (isNaN(calendarDay.getTime()) || calendarDay.toISOString().slice(0, 10) !== date) {
    return null;
  }

  const time = `${hoursMinutes ?? '00:00'}:${seconds ?? '00'}` +
    (fraction ? `.${fraction.slice(0, 3).padEnd(3, '0')}` : '');

  let zone = 'Z';
  if (offset && offset.toUpperCase() !== 'Z') {
    zone = offset.includes(':') ? offset : `${offset.slice(0, 3)}:${offset.slice(3)}`;
  }

  const parsed = new Date(`${date}T${time}${zone}`);
  return isNaN(parsed.getTime()) ? null : parsed;
}

/**
 * Find the first expiry value in a whois-json response.
 * Multi-server responses are searched in the order the servers answered;
 * list values contribute their first element.
 */
export function findExpirationCandidate(response: unknown): unknown {
  const records: Record<string, unknown>[] = [];

  if (Array.isArray(response)) {
    for (const entry of response) {
      if (isRecord(entry) && isRecord(entry.data)) {
        records.push(entry.data);
      } else if (isRecord(entry)) {
        records.push(entry);
      }
    }
  } else if (isRecord(response)) {
    records.push(response);
  }

  for (const record of records) {
    for (const key of EXPIRY_KEYS) {
      let value = record[key];
      if (Array.isArray(value)) {
        value = value[0];
      }
      if (value !== undefined && value !== null && value !== '') {
        return value;
      }
    }
  }

  return undefined;
}

/**
 * Convert an expiry candidate to an instant
 */
export function toExpirationDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return isNaN(value.getTime()) ? null : value;
  }
  if (typeof value === 'string') {
    return parseIsoTimestamp(value);
  }
  return null;
}

/**
 * Check whether a domain is registered and unexpired
 *
 * @param domain - Domain name to check (should be lowercase)
 * @param now - Instant the expiry is compared against
 */
export async function checkRegistration(
  domain: string,
  now: Date = new Date()
): Promise<RegistrationValidationResult> {
  let response: unknown;

  try {
    logger.debug(`Performing WHOIS lookup for domain: ${domain}`);
    response = await whois(domain, {
      follow: config.whois.follow,
      ...(config.whois.timeoutMs > 0 ? { timeout: config.whois.timeoutMs } : {}),
    });
  } catch (error) {
    logger.debug(`WHOIS lookup failed for ${domain}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return { registrationAlive: false, reasonCodes: ['registration_lookup_failed'] };
  }

  const candidate = findExpirationCandidate(response);
  if (candidate === undefined) {
    logger.debug(`WHOIS response for ${domain} carries no expiry date`);
    return { registrationAlive: false, reasonCodes: ['registration_expiry_missing'] };
  }

  const expiresAt = toExpirationDate(candidate);
  if (!expiresAt) {
    logger.debug(`WHOIS expiry for ${domain} is not ISO-8601`, { value: candidate });
    return { registrationAlive: false, reasonCodes: ['registration_expiry_unparseable'] };
  }

  const registrationAlive = expiresAt.getTime() > now.getTime();

  logger.debug(`WHOIS lookup successful for ${domain}`, {
    expiresAt: expiresAt.toISOString(),
    registrationAlive,
  });

  return {
    registrationAlive,
    expiresAt: expiresAt.toISOString(),
    reasonCodes: [registrationAlive ? 'registration_alive' : 'registration_expired'],
  };
}

/**
 * Boolean view of checkRegistration for the resolver
 */
export async function lookupRegistration(domain: string): Promise<boolean> {
  const result = await checkRegistration(domain);
  return result.registrationAlive;
}
