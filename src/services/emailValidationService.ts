/**
 * Batch email classification.
 * Reads addresses, skips the syntactically invalid ones, resolves each domain
 * through the cache-backed resolver and writes one row per valid address.
 * Addresses are processed strictly one after another.
 */

import * as fs from 'fs';
import { BatchSummary, OutputRow } from '../types/email';
import { isValidEmail, extractDomain } from '../validators/syntaxValidator';
import { DomainResolver, DomainLookups } from './domainResolutionService';
import { DomainCache } from '../utils/cache';
import { assertSupportedInput, readEmails } from '../utils/emailSource';
import { ResultWriter } from '../utils/resultWriter';
import { config, resolveCachePath } from '../config/env';
import { logger, hashEmailForLogging } from '../utils/logger';
import { metrics } from '../utils/metrics';

export interface BatchOptions {
  /** .csv or .txt file of addresses */
  inputFile: string;

  /** Output CSV. Default: OUTPUT_PATH */
  outputFile?: string;

  /**
   * Domain cache snapshot. Undefined uses the configured path,
   * null runs without a persistent cache.
   */
  cachePath?: string | null;

  /** Lookup implementations, replaced in tests */
  lookups?: DomainLookups;
}

/**
 * Classify a single address.
 *
 * @returns The output row, or null when the address is syntactically invalid
 */
export async function processEmail(
  email: string,
  resolver: DomainResolver
): Promise<OutputRow | null> {
  const trimmedEmail = email.trim();
  const valid = isValidEmail(trimmedEmail);

  metrics.recordAddress(valid);

  if (!valid) {
    logger.debug('Skipping invalid address', { emailHash: hashEmailForLogging(trimmedEmail) });
    return null;
  }

  const domain = extractDomain(trimmedEmail);
  const fact = await resolver.resolve(domain);

  return {
    email: trimmedEmail,
    domain,
    registrationAlive: fact.registrationAlive,
    mailExchangeExists: fact.mailExchangeExists,
  };
}

/**
 * Classify a stream of addresses, handing each row to `onRow` as it is produced.
 * Per-address and per-domain counts land in `metrics`.
 *
 * @returns Number of rows handed to `onRow`
 */
export async function validateEmails(
  emails: AsyncIterable<string> | Iterable<string>,
  resolver: DomainResolver,
  onRow: (row: OutputRow) => void
): Promise<number> {
  let rowsWritten = 0;

  for await (const email of emails) {
    const row = await processEmail(email, resolver);
    if (row) {
      onRow(row);
      rowsWritten++;
    }
  }

  return rowsWritten;
}

/**
 * Run a whole batch: input file in, output CSV out, cache loaded before and
 * saved after.
 *
 * @throws UnsupportedInputError before touching any file if the extension is wrong
 */
export async function validateEmailFile(options: BatchOptions): Promise<BatchSummary> {
  const { inputFile, lookups } = options;
  assertSupportedInput(inputFile);

  if (!fs.existsSync(inputFile)) {
    throw new Error(`Input file not found: ${inputFile}`);
  }

  const outputFile = options.outputFile ?? config.output.path;
  const cachePath = options.cachePath === undefined ? resolveCachePath() : options.cachePath ?? undefined;

  logger.info('Starting batch validation', { inputFile, outputFile, cachePath: cachePath ?? null });

  // Summary counts come from the collector, so each run starts from zero
  metrics.reset();

  const cache = await DomainCache.load(cachePath);
  const resolver = new DomainResolver(cache, lookups);
  const writer = await ResultWriter.open(outputFile);

  let rowsWritten: number;
  try {
    rowsWritten = await validateEmails(readEmails(inputFile), resolver, row => writer.write(row));
  } finally {
    await writer.close();
  }

  await cache.save(cachePath);

  const snapshot = metrics.getMetrics();
  const summary: BatchSummary = {
    inputAddresses: snapshot.addressesProcessed,
    rowsWritten,
    invalidSkipped: snapshot.invalidSkipped,
    domainsResolved: snapshot.cache.misses,
    cacheHits: snapshot.cache.hits,
    cacheSize: cache.size,
  };

  logger.info('Batch validation complete', summary);

  return summary;
}
