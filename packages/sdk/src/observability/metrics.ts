/**
 * Metrics tracking for index lookups
 */

export interface IndexMetrics {
  lookupCount: number;
  emptyCount: number;
  matchedEntries: number;
  lookupTimeMs: number[];
  loadTimeMs: number[];
}

const MAX_SAMPLES = 100;

export class MetricsCollector {
  #metrics = new Map<string, IndexMetrics>();

  /**
   * Get or create metrics for an index key
   */
  #getMetrics(key: string): IndexMetrics {
    let metrics = this.#metrics.get(key);
    if (!metrics) {
      metrics = {
        lookupCount: 0,
        emptyCount: 0,
        matchedEntries: 0,
        lookupTimeMs: [],
        loadTimeMs: [],
      };
      this.#metrics.set(key, metrics);
    }
    return metrics;
  }

  #pushSample(samples: number[], ms: number): void {
    samples.push(ms);
    if (samples.length > MAX_SAMPLES) {
      samples.shift();
    }
  }

  /**
   * Record one index lookup and how many entries it matched
   */
  recordLookup(key: string, matched: number, ms: number): void {
    const metrics = this.#getMetrics(key);
    metrics.lookupCount++;
    metrics.matchedEntries += matched;
    if (matched === 0) {
      metrics.emptyCount++;
    }
    this.#pushSample(metrics.lookupTimeMs, ms);
  }

  /**
   * Record decoding an index's entry list
   */
  recordLoad(key: string, ms: number): void {
    this.#pushSample(this.#getMetrics(key).loadTimeMs, ms);
  }

  getMetrics(key: string): IndexMetrics | undefined {
    return this.#metrics.get(key);
  }

  /**
   * Get all metrics
   */
  getAllMetrics(): Map<string, IndexMetrics> {
    return new Map(this.#metrics);
  }

  /**
   * Calculate p95 for a metric
   */
  getP95(values: number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[Math.max(0, idx)];
  }

  /**
   * Get p95 lookup time for a key
   */
  getP95LookupTime(key: string): number {
    return this.getP95(this.#metrics.get(key)?.lookupTimeMs ?? []);
  }

  /**
   * Reset metrics for one key or for all keys
   */
  reset(key?: string): void {
    if (key !== undefined) {
      this.#metrics.delete(key);
    } else {
      this.#metrics.clear();
    }
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
