import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { formatEntry, logger } from "./logs.js";
import { metrics } from "./metrics.js";

describe("logger", () => {
  afterEach(() => {
    logger.setEnabled(true);
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it("should format warnings with event, subject, message and details", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    logger.warn("cache.load.reject", {
      type: "/tmp/types.cache",
      message: "payload digest mismatch",
      details: { reason: "digest" },
    });

    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0]?.[0])).toMatch(
      /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[WARN\] \[cache\.load\.reject\] \/tmp\/types\.cache payload digest mismatch \{"reason":"digest"\}$/
    );
  });

  it("should only print debug lines when TYPEREG_DEBUG is set", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);

    vi.stubEnv("TYPEREG_DEBUG", "");
    logger.debug("registry.populate.start");
    expect(debug).not.toHaveBeenCalled();

    vi.stubEnv("TYPEREG_DEBUG", "1");
    logger.debug("registry.populate.start");
    expect(debug).toHaveBeenCalledTimes(1);
  });

  it("should print nothing when disabled", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    logger.setEnabled(false);
    logger.warn("cache.save.error");

    expect(logger.enabled).toBe(false);
    expect(warn).not.toHaveBeenCalled();
  });

  it("should omit absent fields from the line", () => {
    expect(
      formatEntry({ timestamp: "2024-01-01T00:00:00.000Z", level: "debug", event: "cache.load.miss" })
    ).toBe("[2024-01-01T00:00:00.000Z] [DEBUG] [cache.load.miss]");
  });
});

describe("metrics", () => {
  beforeEach(() => {
    metrics.reset();
  });

  it("should compute the hit rate over every load attempt", () => {
    metrics.recordCacheHit(2);
    metrics.recordCacheMiss();
    metrics.recordCacheRejection();
    metrics.recordCacheHit(4);

    expect(metrics.getHitRate()).toBe(0.5);
  });

  it("should report a zero hit rate before any load", () => {
    expect(metrics.getHitRate()).toBe(0);
  });

  it("should keep the most recent 100 samples", () => {
    for (let i = 0; i < 120; i++) {
      metrics.recordPopulateTime(i);
    }

    const samples = metrics.snapshot().populateTimeMs;
    expect(samples).toHaveLength(100);
    expect(samples[0]).toBe(20);
  });

  it("should compute p95", () => {
    const values = Array.from({ length: 20 }, (_, i) => i + 1);
    expect(metrics.getP95(values)).toBe(19);
    expect(metrics.getP95([])).toBe(0);
  });

  it("should return copies from snapshot", () => {
    metrics.recordCacheHit(1);
    const snapshot = metrics.snapshot();
    snapshot.cacheLoadTimeMs.push(99);

    expect(metrics.snapshot().cacheLoadTimeMs).toEqual([1]);
  });
});
