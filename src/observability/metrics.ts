interface LatencySummary {
  count: number;
  avg: number;
  p50: number;
  p95: number;
}

export interface CourseIndexMetricsSnapshot {
  counters: {
    crawl_runs: number;
    pages_fetched: number;
    fetch_failures: number;
    records_accepted: number;
    records_rejected: number;
    searches: number;
    comparisons: number;
  };
  rates: {
    fetch_success: number;
    record_acceptance: number;
  };
  latency_ms: {
    crawl: LatencySummary;
    search: LatencySummary;
    compare: LatencySummary;
  };
}

const LATENCY_WINDOW_LIMIT = 1024;
const crawlLatencies: number[] = [];
const searchLatencies: number[] = [];
const compareLatencies: number[] = [];

let crawlRuns = 0;
let pagesFetched = 0;
let fetchFailures = 0;
let recordsAccepted = 0;
let recordsRejected = 0;
let searches = 0;
let comparisons = 0;

function clampNumber(value: number, fallback: number = 0): number {
  if (!Number.isFinite(value)) return fallback;
  return value;
}

function toCount(value: number): number {
  return Math.max(0, Math.floor(clampNumber(value, 0)));
}

function round(value: number, digits: number = 3): number {
  const p = 10 ** digits;
  return Math.round(value * p) / p;
}

function pushLatency(bucket: number[], durationMs: number): void {
  const value = Math.max(0, round(clampNumber(durationMs, 0), 3));
  bucket.push(value);
  if (bucket.length > LATENCY_WINDOW_LIMIT) {
    bucket.splice(0, bucket.length - LATENCY_WINDOW_LIMIT);
  }
}

function percentile(values: number[], p: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const idx = Math.max(0, Math.min(sorted.length - 1, Math.ceil(p * sorted.length) - 1));
  return sorted[idx];
}

function summarizeLatencies(values: number[]): LatencySummary {
  if (values.length === 0) {
    return { count: 0, avg: 0, p50: 0, p95: 0 };
  }
  const total = values.reduce((sum, item) => sum + item, 0);
  return {
    count: values.length,
    avg: round(total / values.length, 2),
    p50: percentile(values, 0.5),
    p95: percentile(values, 0.95),
  };
}

export function recordCrawlRun(
  durationMs: number,
  counts: { fetched: number; failed: number; accepted: number; rejected: number },
): void {
  pushLatency(crawlLatencies, durationMs);
  crawlRuns += 1;
  pagesFetched += toCount(counts.fetched);
  fetchFailures += toCount(counts.failed);
  recordsAccepted += toCount(counts.accepted);
  recordsRejected += toCount(counts.rejected);
}

export function recordSearch(durationMs: number): void {
  pushLatency(searchLatencies, durationMs);
  searches += 1;
}

export function recordComparison(durationMs: number): void {
  pushLatency(compareLatencies, durationMs);
  comparisons += 1;
}

export function buildMetricsSnapshot(): CourseIndexMetricsSnapshot {
  const fetchAttempts = pagesFetched + fetchFailures;
  const validated = recordsAccepted + recordsRejected;
  return {
    counters: {
      crawl_runs: crawlRuns,
      pages_fetched: pagesFetched,
      fetch_failures: fetchFailures,
      records_accepted: recordsAccepted,
      records_rejected: recordsRejected,
      searches,
      comparisons,
    },
    rates: {
      fetch_success: fetchAttempts > 0 ? round(pagesFetched / fetchAttempts, 4) : 1,
      record_acceptance: validated > 0 ? round(recordsAccepted / validated, 4) : 0,
    },
    latency_ms: {
      crawl: summarizeLatencies(crawlLatencies),
      search: summarizeLatencies(searchLatencies),
      compare: summarizeLatencies(compareLatencies),
    },
  };
}

export function resetMetricsForTests(): void {
  crawlLatencies.length = 0;
  searchLatencies.length = 0;
  compareLatencies.length = 0;
  crawlRuns = 0;
  pagesFetched = 0;
  fetchFailures = 0;
  recordsAccepted = 0;
  recordsRejected = 0;
  searches = 0;
  comparisons = 0;
}
