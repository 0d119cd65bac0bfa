/**
 * Core types for domain liveness classification.
 * Shared by the lookups, the domain cache, the resolver and the batch driver.
 */

/**
 * Reason codes explaining how a lookup reached its answer
 */
export type ValidationReasonCode =
  // Registration (WHOIS) lookup
  | "registration_alive"
  | "registration_expired"
  | "registration_expiry_missing"
  | "registration_expiry_unparseable"
  | "registration_lookup_failed"

  // DNS/MX lookup
  | "mx_records_found"
  | "no_mx_records"
  | "dns_lookup_failed"
  | "dns_timeout";

/**
 * Memoized outcome of resolving one domain.
 * `mailExchangeExists` is never true while `registrationAlive` is false.
 */
export interface DomainFact {
  /** Domain is registered and its registration has not expired */
  registrationAlive: boolean;

  /** Domain publishes at least one MX record */
  mailExchangeExists: boolean;

  /** ISO-8601 instant of resolution; opaque text if loaded from a cache file as such */
  checkedAt?: string;
}

/**
 * One classified row of batch output
 */
export interface OutputRow {
  email: string;
  domain: string;
  registrationAlive: boolean;
  mailExchangeExists: boolean;
}

/**
 * MX record information
 */
export interface MxRecord {
  exchange: string;
  priority: number;
}

/**
 * Totals reported at the end of a batch run
 */
export interface BatchSummary {
  inputAddresses: number;
  rowsWritten: number;
  invalidSkipped: number;
  domainsResolved: number;
  cacheHits: number;
  cacheSize: number;
}
