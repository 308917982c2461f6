/**
 * Unit tests for command metrics
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { metrics } from "@modelrepo/sdk";
import { formatStepMetrics, withCommandMetrics } from "../src/lib/telemetry.js";

describe("telemetry", () => {
  let savedDebug: string | undefined;

  beforeEach(() => {
    savedDebug = process.env.MODELREPO_CLI_DEBUG;
    metrics.reset();
  });

  afterEach(() => {
    if (savedDebug !== undefined) {
      process.env.MODELREPO_CLI_DEBUG = savedDebug;
    } else {
      delete process.env.MODELREPO_CLI_DEBUG;
    }
    vi.restoreAllMocks();
  });

  describe("formatStepMetrics", () => {
    it("should summarize counts and p95 of a step", () => {
      metrics.recordStep("fetch", 10, true);
      metrics.recordStep("fetch", 30, false);

      expect(formatStepMetrics("fetch")).toBe("metric step.fetch ok=1 failed=1 p95_ms=30.0");
    });

    it("should return null for a step that never ran", () => {
      expect(formatStepMetrics("config")).toBeNull();
    });
  });

  describe("withCommandMetrics", () => {
    it("should report the command and the steps it ran in verbose mode", async () => {
      process.env.MODELREPO_CLI_DEBUG = "1";
      const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

      const result = await withCommandMetrics("init", async () => {
        metrics.recordStep("validate", 2, true);
        return "done";
      });

      expect(result).toBe("done");
      expect(write).toHaveBeenCalledTimes(1);
      const lines = String(write.mock.calls[0]?.[0]).trimEnd().split("\n");
      expect(lines).toHaveLength(2);
      expect(lines[0]).toMatch(/^metric command\.init outcome=ok duration_ms=\d+$/);
      expect(lines[1]).toBe("metric step.validate ok=1 failed=0 p95_ms=2.0");
    });

    it("should report a failed command and rethrow", async () => {
      process.env.MODELREPO_CLI_DEBUG = "1";
      const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

      await expect(
        withCommandMetrics("best-model", async () => {
          throw new Error("missing");
        })
      ).rejects.toThrow("missing");

      expect(String(write.mock.calls[0]?.[0])).toMatch(
        /^metric command\.best-model outcome=failed duration_ms=\d+\n$/
      );
    });

    it("should stay silent and keep recorded metrics outside verbose mode", async () => {
      delete process.env.MODELREPO_CLI_DEBUG;
      const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
      metrics.recordStep("extract", 5, true);

      await withCommandMetrics("labels", async () => undefined);

      expect(write).not.toHaveBeenCalled();
      expect(metrics.getMetrics("extract")?.successCount).toBe(1);
    });
  });
});
