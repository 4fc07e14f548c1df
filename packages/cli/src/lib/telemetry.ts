/**
 * Telemetry and observability helpers
 */

import { metrics } from "@pakdb/sdk";
import { isVerbose } from "./env.js";
import { writeStderr } from "./io.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

/**
 * Sanitize metric part by removing newlines
 */
function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Render one metric line
 */
export function formatMetric(key: string, fields: Record<string, unknown>): string {
  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }
  return parts.join(" ");
}

/**
 * Emit a metric to stderr if verbose mode is enabled
 */
export function emitMetric(key: string, fields: Record<string, unknown>): void {
  if (!isVerbose()) {
    return;
  }

  writeStderr(formatMetric(key, fields) + "\n");
}

/**
 * Emit lookup metrics recorded by the SDK for the given index keys
 */
export function emitIndexMetrics(keys: readonly string[]): void {
  for (const key of keys) {
    const recorded = metrics.getMetrics(key);
    if (!recorded) continue;
    emitMetric("index.lookup", {
      key,
      lookups: recorded.lookupCount,
      empty: recorded.emptyCount,
      matched: recorded.matchedEntries,
      p95_ms: metrics.getP95LookupTime(key).toFixed(3),
    });
  }
}

/**
 * Wrap an async function with timing metrics
 */
export async function withTiming<T>(label: string, fn: () => Promise<T>): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    const duration = Date.now() - start;
    emitMetric(label, {
      duration_ms: duration,
      success,
    });
  }
}
