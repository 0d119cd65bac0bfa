/**
 * Simple in-memory counters for a batch run
 */

interface MetricsCounts {
  addressesProcessed: number;
  invalidSkipped: number;
  cache: {
    hits: number;
    misses: number;
  };
  registration: {
    alive: number;
    dead: number;
  };
  mailExchange: {
    found: number;
    missing: number;
    skipped: number;    // MX lookup never ran because registration was dead
  };
}

function emptyCounts(): MetricsCounts {
  return {
    addressesProcessed: 0,
    invalidSkipped: 0,
    cache: { hits: 0, misses: 0 },
    registration: { alive: 0, dead: 0 },
    mailExchange: { found: 0, missing: 0, skipped: 0 },
  };
}

class MetricsCollector {
  private metrics: MetricsCounts = emptyCounts();

  recordAddress(valid: boolean): void {
    this.metrics.addressesProcessed++;
    if (!valid) {
      this.metrics.invalidSkipped++;
    }
  }

  recordCacheLookup(hit: boolean): void {
    if (hit) {
      this.metrics.cache.hits++;
    } else {
      this.metrics.cache.misses++;
    }
  }

  /**
   * Track a fresh resolution. `mailExchangeExists` is undefined when the
   * MX lookup was short-circuited.
   */
  recordResolution(registrationAlive: boolean, mailExchangeExists?: boolean): void {
    if (registrationAlive) {
      this.metrics.registration.alive++;
    } else {
      this.metrics.registration.dead++;
    }

    if (mailExchangeExists === undefined) {
      this.metrics.mailExchange.skipped++;
    } else if (mailExchangeExists) {
      this.metrics.mailExchange.found++;
    } else {
      this.metrics.mailExchange.missing++;
    }
  }

  /**
   * Get current metrics snapshot
   */
  getMetrics(): MetricsCounts {
    return JSON.parse(JSON.stringify(this.metrics));
  }

  /**
   * Reset all metrics (useful for testing)
   */
  reset(): void {
    this.metrics = emptyCounts();
  }
}

export const metrics = new MetricsCollector();
