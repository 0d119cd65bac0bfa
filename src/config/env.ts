/**
 * Environment configuration loader with validation.
 * All configuration comes from environment variables with sensible defaults.
 * Fails fast on malformed values.
 */

import dotenv from 'dotenv';
import { join } from 'path';

// Load .env file from the working directory
dotenv.config({ path: join(process.cwd(), '.env') });

interface Config {
  // Persistent domain cache
  cache: {
    enabled: boolean;                   // Disable to run without cross-run memoization
    path: string;                       // CSV snapshot location
  };

  // Batch output
  output: {
    path: string;                       // Default output CSV when --out is not given
  };

  // WHOIS registration lookup
  whois: {
    timeoutMs: number;                  // Socket timeout, 0 leaves the library default
    follow: number;                     // Referral depth to follow between WHOIS servers
  };
}

/**
 * Parse environment variable as integer with validation
 * @param key - Environment variable name
 * @param defaultValue - Default value if not set
 * @throws Error if value is invalid or out of range
 */
function getEnvInt(
  key: string,
  defaultValue: number,
  options: { min?: number; max?: number } = {}
): number {
  const value = process.env[key];

  if (!value) return defaultValue;

  const parsed = parseInt(value, 10);

  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key}="${value}" is not a valid integer`);
  }

  if (options.min !== undefined && parsed < options.min) {
    throw new Error(`Environment variable ${key}=${parsed} is below minimum ${options.min}`);
  }

  if (options.max !== undefined && parsed > options.max) {
    throw new Error(`Environment variable ${key}=${parsed} exceeds maximum ${options.max}`);
  }

  return parsed;
}

/**
 * Get environment variable as string with fallback default
 */
function getEnvString(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/**
 * Load and validate configuration from environment
 */
export const config: Config = {
  cache: {
    enabled: getEnvString('DOMAIN_CACHE_ENABLED', 'true') === 'true',
    path: getEnvString('DOMAIN_CACHE_PATH', './cached_domains/domains_cache.csv'),
  },

  output: {
    path: getEnvString('OUTPUT_PATH', 'output_data/output.csv'),
  },

  whois: {
    timeoutMs: getEnvInt('WHOIS_TIMEOUT_MS', 0, { min: 0, max: 120000 }),
    follow: getEnvInt('WHOIS_FOLLOW', 2, { min: 0, max: 5 }),
  },
};

/**
 * Validate configuration values at startup
 * Throws if configuration is invalid
 */
export function validateConfig(): void {
  const errors: string[] = [];

  if (config.cache.enabled && !config.cache.path.trim()) {
    errors.push('DOMAIN_CACHE_PATH must not be blank while DOMAIN_CACHE_ENABLED=true');
  }

  if (!config.output.path.toLowerCase().endsWith('.csv')) {
    errors.push(`OUTPUT_PATH must point at a .csv file (got: "${config.output.path}")`);
  }

  if (errors.length > 0) {
    throw new Error(`Configuration validation failed:\n  - ${errors.join('\n  - ')}`);
  }
}

/**
 * Cache path to use for a run, or undefined when caching is switched off
 */
export function resolveCachePath(): string | undefined {
  return config.cache.enabled ? config.cache.path : undefined;
}
