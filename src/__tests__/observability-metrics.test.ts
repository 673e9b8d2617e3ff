import { afterEach, describe, expect, it, vi } from "vitest";

import { logEvent } from "../observability/log";
import {
  buildMetricsSnapshot,
  recordComparison,
  recordCrawlRun,
  recordSearch,
  resetMetricsForTests,
} from "../observability/metrics";

describe("observability metrics", () => {
  afterEach(() => {
    resetMetricsForTests();
  });

  it("computes counters, rates and latency summaries", () => {
    resetMetricsForTests();

    recordCrawlRun(1500, { fetched: 9, failed: 1, accepted: 6, rejected: 2 });
    recordSearch(100);
    recordSearch(200);
    recordSearch(300);
    recordSearch(400);
    recordSearch(500);
    recordComparison(0.25);
    recordComparison(Number.NaN);

    const snapshot = buildMetricsSnapshot();

    expect(snapshot.counters).toEqual({
      crawl_runs: 1,
      pages_fetched: 9,
      fetch_failures: 1,
      records_accepted: 6,
      records_rejected: 2,
      searches: 5,
      comparisons: 2,
    });
    expect(snapshot.rates).toEqual({ fetch_success: 0.9, record_acceptance: 0.75 });
    expect(snapshot.latency_ms.search).toEqual({ count: 5, avg: 300, p50: 300, p95: 500 });
    expect(snapshot.latency_ms.crawl.p95).toBe(1500);
    expect(snapshot.latency_ms.compare).toEqual({ count: 2, avg: 0.13, p50: 0, p95: 0.25 });
  });

  it("starts from an empty snapshot", () => {
    resetMetricsForTests();
    const snapshot = buildMetricsSnapshot();

    expect(snapshot.rates).toEqual({ fetch_success: 1, record_acceptance: 0 });
    expect(snapshot.latency_ms.search).toEqual({ count: 0, avg: 0, p50: 0, p95: 0 });
  });

  it("keeps a bounded latency window", () => {
    resetMetricsForTests();
    for (let i = 0; i < 1100; i++) recordSearch(i);

    const snapshot = buildMetricsSnapshot();
    expect(snapshot.latency_ms.search.count).toBe(1024);
    expect(snapshot.counters.searches).toBe(1100);
  });
});

describe("logEvent", () => {
  it("writes one JSON line with the event name and timestamp", () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    logEvent("search_complete", { results: 3 });

    expect(logSpy).toHaveBeenCalledTimes(1);
    const line: unknown = JSON.parse(String(logSpy.mock.calls[0]?.[0]));
    expect(line).toMatchObject({ event: "search_complete", results: 3 });
    expect(line).toHaveProperty("ts", expect.stringMatching(/^\d{4}-\d{2}-\d{2}T/));
  });
});
