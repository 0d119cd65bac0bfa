/**
 * Persistent domain cache.
 *
 * Holds one DomainFact per lower-cased domain for the lifetime of a batch run.
 * The snapshot is a CSV file read once before processing and overwritten once
 * afterwards:
 *
 *   domain,registration_alive,mail_exchange_exists,checked_at
 *   example.com,1,1,2024-01-01T00:00:00.000Z
 *
 * Entries never expire. A domain cached as alive stays alive until the file
 * is removed.
 */

import * as fs from 'fs';
import { dirname } from 'path';
import csvParser from 'csv-parser';
import * as Papa from 'papaparse';
import { DomainFact } from '../types/email';
import { logger } from './logger';

export const CACHE_COLUMNS = ['domain', 'registration_alive', 'mail_exchange_exists', 'checked_at'];

// Column names written by earlier versions of the cache file
const LEGACY_COLUMNS = {
  registrationAlive: 'whois_alive',
  mailExchangeExists: 'mx_exists',
};

function encodeFlag(value: boolean): string {
  return value ? '1' : '0';
}

export class DomainCache {
  private readonly facts: Map<string, DomainFact> = new Map();

  /**
   * Load a snapshot. A missing path or file yields an empty cache;
   * rows without a domain are skipped.
   */
  static async load(path?: string): Promise<DomainCache> {
    const cache = new DomainCache();

    if (!path || !fs.existsSync(path)) {
      logger.debug('No domain cache snapshot to load', { path: path ?? null });
      return cache;
    }

    const source = fs.createReadStream(path, { encoding: 'utf-8' });
    const rows = source.pipe(csvParser({ mapHeaders: ({ header }) => header.trim() }));

    // pipe() does not forward read errors; fail the iteration instead
    source.on('error', error => rows.destroy(error));

    let skipped = 0;

    for await (const row of rows) {
      const record: Record<string, string | undefined> = row;
      const domain = (record.domain ?? '').trim().toLowerCase();

      if (!domain) {
        skipped++;
        continue;
      }

      const registrationFlag = record.registration_alive ?? record[LEGACY_COLUMNS.registrationAlive];
      const mailExchangeFlag = record.mail_exchange_exists ?? record[LEGACY_COLUMNS.mailExchangeExists];

      cache.put(domain, {
        registrationAlive: registrationFlag === '1',
        mailExchangeExists: mailExchangeFlag === '1',
        checkedAt: record.checked_at || undefined,
      });
    }

    logger.info(`Domain cache loaded from ${path}`, { entries: cache.size, skipped });

    return cache;
  }

  get size(): number {
    return this.facts.size;
  }

  has(domain: string): boolean {
    return this.facts.has(domain.toLowerCase());
  }

  /**
   * Returns a copy; mutating it never changes the cache
   */
  get(domain: string): DomainFact | undefined {
    const fact = this.facts.get(domain.toLowerCase());
    return fact ? { ...fact } : undefined;
  }

  /**
   * Insert or replace the fact for a domain.
   * A dead registration always stores mailExchangeExists=false.
   *
   * @throws Error if the domain is empty
   */
  put(domain: string, fact: DomainFact): void {
    const key = domain.trim().toLowerCase();

    if (!key) {
      throw new Error('Domain cache key must not be empty');
    }

    if (!fact.registrationAlive && fact.mailExchangeExists) {
      logger.debug(`Dropping MX flag for unregistered domain: ${key}`);
    }

    this.facts.set(key, {
      registrationAlive: fact.registrationAlive,
      mailExchangeExists: fact.registrationAlive && fact.mailExchangeExists,
      checkedAt: fact.checkedAt,
    });
  }

  entries(): Array<[string, DomainFact]> {
    return Array.from(this.facts, ([domain, fact]): [string, DomainFact] => [domain, { ...fact }]);
  }

  /**
   * Overwrite the snapshot at `path` with every entry. No-op without a path.
   * Facts lacking checkedAt are stamped with the time of writing.
   */
  async save(path?: string): Promise<void> {
    if (!path) {
      return;
    }

    await fs.promises.mkdir(dirname(path), { recursive: true });

    const writtenAt = new Date().toISOString();
    const data = Array.from(this.facts, ([domain, fact]) => [
      domain,
      encodeFlag(fact.registrationAlive),
      encodeFlag(fact.mailExchangeExists),
      fact.checkedAt || writtenAt,
    ]);

    const csv = Papa.unparse({ fields: CACHE_COLUMNS, data }, { newline: '\n' });
    await fs.promises.writeFile(path, `${csv}\n`, 'utf-8');

    logger.info(`Domain cache saved to ${path}`, { entries: this.facts.size });
  }
}
