/**
 * Metrics tracking for repository lifecycle steps
 */

export const LIFECYCLE_STEPS = ["validate", "fetch", "extract", "config"] as const;

export type LifecycleStep = (typeof LIFECYCLE_STEPS)[number];

export interface StepMetrics {
  successCount: number;
  failureCount: number;
  durationMs: number[];
}

const MAX_SAMPLES = 100;

class MetricsCollector {
  #metrics = new Map<LifecycleStep, StepMetrics>();

  #getMetrics(step: LifecycleStep): StepMetrics {
    let metrics = this.#metrics.get(step);
    if (!metrics) {
      metrics = { successCount: 0, failureCount: 0, durationMs: [] };
      this.#metrics.set(step, metrics);
    }
    return metrics;
  }

  /**
   * Record the outcome and duration of one step run
   */
  recordStep(step: LifecycleStep, ms: number, ok: boolean): void {
    const metrics = this.#getMetrics(step);
    if (ok) {
      metrics.successCount++;
    } else {
      metrics.failureCount++;
    }

    metrics.durationMs.push(ms);
    // Keep only the most recent samples
    if (metrics.durationMs.length > MAX_SAMPLES) {
      metrics.durationMs.shift();
    }
  }

  /**
   * Time an async step and record its outcome
   *
   * A step counts as failed when it throws or resolves to `{ ok: false }`.
   */
  async time<T>(step: LifecycleStep, fn: () => Promise<T>): Promise<T> {
    const start = performance.now();
    let ok = false;
    try {
      const result = await fn();
      ok = !isFailedResult(result);
      return result;
    } finally {
      this.recordStep(step, performance.now() - start, ok);
    }
  }

  getMetrics(step: LifecycleStep): StepMetrics | undefined {
    return this.#metrics.get(step);
  }

  /**
   * Calculate p95 for a list of samples
   */
  getP95(values: number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.max(0, Math.ceil(sorted.length * 0.95) - 1);
    return sorted[idx] ?? 0;
  }

  getP95Duration(step: LifecycleStep): number {
    return this.getP95(this.#metrics.get(step)?.durationMs ?? []);
  }

  reset(step?: LifecycleStep): void {
    if (step) {
      this.#metrics.delete(step);
    } else {
      this.#metrics.clear();
    }
  }
}

function isFailedResult(value: unknown): boolean {
  return typeof value === "object" && value !== null && "ok" in value && value.ok === false;
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
