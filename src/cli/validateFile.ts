#!/usr/bin/env node
/**
 * Domain liveness CLI - classify email addresses from a file
 *
 * Usage:
 *   validate-file <file> [options]
 *   npm run validate-file -- <file> [options]
 *
 * Options:
 *   --out <file>         Output CSV (default: OUTPUT_PATH)
 *   --cache <file>       Domain cache CSV (default: DOMAIN_CACHE_PATH)
 *   --no-cache           Do not load or save the domain cache
 *   --help, -h           Show help
 */

import { validateEmailFile, BatchOptions } from '../services/emailValidationService';
import { validateConfig } from '../config/env';
import { BatchSummary } from '../types/email';
import { logger } from '../utils/logger';
import { metrics } from '../utils/metrics';

/**
 * CLI configuration parsed from arguments
 */
export interface CliConfig {
  inputFile: string;
  outputFile?: string;
  cachePath?: string | null;
  showHelp: boolean;
}

const FLAGS_WITH_VALUE = ['--out', '--cache'];

/**
 * Parse command line arguments
 */
export function parseArgs(args: string[]): CliConfig {
  const cliConfig: CliConfig = {
    inputFile: '',
    showHelp: args.includes('--help') || args.includes('-h'),
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (FLAGS_WITH_VALUE.includes(arg)) {
      const value = args[i + 1];
      i++;
      if (!value) continue;

      if (arg === '--out') {
        cliConfig.outputFile = value;
      } else {
        cliConfig.cachePath = value;
      }
    } else if (arg === '--no-cache') {
      cliConfig.cachePath = null;
    } else if (!arg.startsWith('-') && !cliConfig.inputFile) {
      cliConfig.inputFile = arg;
    }
  }

  return cliConfig;
}

/**
 * Display help message
 */
function showHelp(): void {
  console.log(`
Email Domain Liveness Validator
━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━

USAGE
  validate-file <file> [options]

ARGUMENTS
  <file>                .csv (header row, "email" or first column) or
                        .txt (one address per line)

OPTIONS
  --out <file>          Output CSV (default: OUTPUT_PATH or output_data/output.csv)
  --cache <file>        Domain cache CSV (default: DOMAIN_CACHE_PATH)
  --no-cache            Run without loading or saving the domain cache
  --help, -h            Show this help message

OUTPUT
  email,domain,registration_alive,mail_exchange_exists
  Booleans are written as 1/0. Invalid addresses are skipped.
`);
}

function printSummary(summary: BatchSummary, durationMs: number): void {
  const snapshot = metrics.getMetrics();

  console.log(`\nSUMMARY`);
  console.log(`  Addresses read:      ${summary.inputAddresses}`);
  console.log(`  Rows written:        ${summary.rowsWritten}`);
  console.log(`  Invalid skipped:     ${summary.invalidSkipped}`);
  console.log(`  Domains looked up:   ${summary.domainsResolved}`);
  console.log(`  Cache hits:          ${summary.cacheHits}`);
  console.log(`  Registration alive:  ${snapshot.registration.alive} / dead: ${snapshot.registration.dead}`);
  console.log(`  MX found:            ${snapshot.mailExchange.found} / missing: ${snapshot.mailExchange.missing} / skipped: ${snapshot.mailExchange.skipped}`);
  console.log(`  Cached domains:      ${summary.cacheSize}`);
  console.log(`  Duration:            ${(durationMs / 1000).toFixed(2)}s`);
}

/**
 * Main CLI function
 */
async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  const cliConfig = parseArgs(argv);

  if (cliConfig.showHelp || argv.length === 0) {
    showHelp();
    return;
  }

  if (!cliConfig.inputFile) {
    console.error('❌ Error: Missing required argument: <file>');
    console.error('Run with --help for usage information');
    process.exitCode = 1;
    return;
  }

  validateConfig();

  const options: BatchOptions = { inputFile: cliConfig.inputFile };
  if (cliConfig.outputFile) options.outputFile = cliConfig.outputFile;
  if (cliConfig.cachePath !== undefined) options.cachePath = cliConfig.cachePath;

  const startTime = Date.now();
  const summary = await validateEmailFile(options);

  printSummary(summary, Date.now() - startTime);
}

// Run CLI
if (require.main === module) {
  main().catch(error => {
    console.error('❌ Fatal error:', error instanceof Error ? error.message : String(error));
    logger.error('CLI fatal error:', error);
    process.exit(1);
  });
}

export { main };
