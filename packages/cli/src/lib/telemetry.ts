/**
 * Per-command timing, reported on stderr when MODELREPO_CLI_DEBUG=1
 *
 *   metric command.init outcome=ok duration_ms=42
 *   metric step.validate ok=1 failed=0 p95_ms=0.8
 *   metric step.extract ok=1 failed=0 p95_ms=31.5
 *
 * Step lines come from the SDK's lifecycle metrics, covering only the steps
 * the command actually ran.
 */

import { LIFECYCLE_STEPS, metrics, type LifecycleStep } from "@modelrepo/sdk";
import { isVerbose } from "./env.js";

/**
 * Summary line for one lifecycle step, or `null` if it never ran
 */
export function formatStepMetrics(step: LifecycleStep): string | null {
  const recorded = metrics.getMetrics(step);
  if (!recorded) return null;

  const p95 = metrics.getP95Duration(step).toFixed(1);
  return `metric step.${step} ok=${recorded.successCount} failed=${recorded.failureCount} p95_ms=${p95}`;
}

/**
 * Run a command, then report its outcome and the lifecycle steps it drove
 */
export async function withCommandMetrics<T>(command: string, fn: () => Promise<T>): Promise<T> {
  if (!isVerbose()) {
    return fn();
  }

  metrics.reset();
  const start = performance.now();
  let outcome = "failed";

  try {
    const result = await fn();
    outcome = "ok";
    return result;
  } finally {
    const lines = [
      `metric command.${command} outcome=${outcome} duration_ms=${Math.round(performance.now() - start)}`,
    ];
    for (const step of LIFECYCLE_STEPS) {
      const line = formatStepMetrics(step);
      if (line) lines.push(line);
    }
    process.stderr.write(lines.join("\n") + "\n");
  }
}
