/**
 * Metrics tracking for cache and population operations
 */

export interface RegistryMetrics {
  cacheHits: number;
  cacheMisses: number;
  cacheRejections: number;
  cacheSaves: number;
  cacheSaveFailures: number;
  cacheLoadTimeMs: number[];
  populateTimeMs: number[];
}

const MAX_SAMPLES = 100;

function emptyMetrics(): RegistryMetrics {
  return {
    cacheHits: 0,
    cacheMisses: 0,
    cacheRejections: 0,
    cacheSaves: 0,
    cacheSaveFailures: 0,
    cacheLoadTimeMs: [],
    populateTimeMs: [],
  };
}

function pushSample(samples: number[], ms: number): void {
  samples.push(ms);

  // Keep only the most recent samples to avoid unbounded memory growth
  if (samples.length > MAX_SAMPLES) {
    samples.shift();
  }
}

class MetricsCollector {
  #metrics = emptyMetrics();

  /**
   * Record a cache file that loaded and validated
   */
  recordCacheHit(ms: number): void {
    this.#metrics.cacheHits++;
    pushSample(this.#metrics.cacheLoadTimeMs, ms);
  }

  /**
   * Record a cache file that did not exist
   */
  recordCacheMiss(): void {
    this.#metrics.cacheMisses++;
  }

  /**
   * Record a cache file that existed but was not trusted
   */
  recordCacheRejection(): void {
    this.#metrics.cacheRejections++;
  }

  recordCacheSave(): void {
    this.#metrics.cacheSaves++;
  }

  recordCacheSaveFailure(): void {
    this.#metrics.cacheSaveFailures++;
  }

  /**
   * Record the duration of a full default-registry population
   */
  recordPopulateTime(ms: number): void {
    pushSample(this.#metrics.populateTimeMs, ms);
  }

  /**
   * Cache hit rate over all load attempts
   */
  getHitRate(): number {
    const { cacheHits, cacheMisses, cacheRejections } = this.#metrics;
    const total = cacheHits + cacheMisses + cacheRejections;
    return total > 0 ? cacheHits / total : 0;
  }

  /**
   * Calculate p95 for a series of samples
   */
  getP95(values: number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[Math.max(0, idx)] ?? 0;
  }

  /**
   * Copy of the current counters and samples
   */
  snapshot(): RegistryMetrics {
    return {
      ...this.#metrics,
      cacheLoadTimeMs: [...this.#metrics.cacheLoadTimeMs],
      populateTimeMs: [...this.#metrics.populateTimeMs],
    };
  }

  reset(): void {
    this.#metrics = emptyMetrics();
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
