import {
  DEFAULT_MAX_RESULTS,
  RELEVANCE_THRESHOLD,
  SMART_COVERAGE_WEIGHT,
} from "../config";
import { CourseIndexError } from "../errors";
import { recordSearch } from "../observability/metrics";
import { normalize } from "../text/normalizer";
import type {
  CourseId,
  CourseRecord,
  Corpus,
  IdfTable,
  ScoreResult,
  SearchMethod,
  Word,
} from "../types";

export const SEARCH_METHODS: readonly SearchMethod[] = ["smart", "cosine", "relevance", "tfidf"];

export interface SearchOptions {
  method?: SearchMethod;
  maxResults?: number;
  minScore?: number;
}

export interface SearchTimings {
  preprocessingMs: number;
  candidateMs: number;
  scoringMs: number;
  totalMs: number;
}

export interface SearchMeasurement {
  query: string;
  method: SearchMethod;
  queryTokens: Word[];
  results: ScoreResult[];
  timings: SearchTimings;
  candidateCount: number;
  resultsFound: number;
  resultsReturned: number;
  /** Candidates as a share of all courses. */
  corpusCoverage: number;
  /** Share of returned results scoring above RELEVANCE_THRESHOLD. */
  precisionAtK: number;
  averageScore: number;
}

export function parseSearchMethod(name: string): SearchMethod {
  const value = name.trim().toLowerCase();
  const method = SEARCH_METHODS.find((candidate) => candidate === value);
  if (!method) {
    throw new CourseIndexError(
      "INVALID_METHOD",
      `Unknown search method "${name}". Available: ${SEARCH_METHODS.join(", ")}`,
      { method: name },
    );
  }
  return method;
}

function countTerms(tokens: readonly Word[]): Map<Word, number> {
  const counts = new Map<Word, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}

function coverage(record: CourseRecord, distinctTerms: ReadonlySet<Word>): number {
  if (distinctTerms.size === 0) return 0;
  let matches = 0;
  for (const term of distinctTerms) {
    if (record.words.has(term)) matches += 1;
  }
  return matches / distinctTerms.size;
}

/**
 * Cosine between the query count vector and the course TF-IDF vector, where
 * every course word has tf = 1/|words|. Terms outside the IDF table weigh 0.
 */
function queryCosine(
  record: CourseRecord,
  queryCounts: ReadonlyMap<Word, number>,
  idf: IdfTable,
): number {
  const size = record.words.size;
  if (size === 0) return 0;
  const tf = 1 / size;

  let courseNorm = 0;
  for (const word of record.words) {
    const weight = tf * (idf.get(word) ?? 0);
    courseNorm += weight * weight;
  }

  let queryNorm = 0;
  let dot = 0;
  for (const [term, count] of queryCounts) {
    queryNorm += count * count;
    if (record.words.has(term)) {
      dot += count * tf * (idf.get(term) ?? 0);
    }
  }

  if (queryNorm === 0 || courseNorm === 0) return 0;
  return dot / (Math.sqrt(queryNorm) * Math.sqrt(courseNorm));
}

/**
 * Accumulated TF-IDF of the query terms in the course: each occurrence of a
 * query term adds tf * idf, with tf = 1/|words| for a term the course has.
 */
function queryTfIdf(
  record: CourseRecord,
  queryCounts: ReadonlyMap<Word, number>,
  idf: IdfTable,
): number {
  const size = record.words.size;
  if (size === 0) return 0;
  let total = 0;
  for (const [term, count] of queryCounts) {
    if (record.words.has(term)) total += (count / size) * (idf.get(term) ?? 0);
  }
  return total;
}

function scoreCourse(
  record: CourseRecord,
  method: SearchMethod,
  queryCounts: ReadonlyMap<Word, number>,
  distinctTerms: ReadonlySet<Word>,
  idf: IdfTable,
): ScoreResult {
  const base = { courseId: record.id, url: record.url, title: record.title };
  switch (method) {
    case "relevance":
      return { ...base, score: coverage(record, distinctTerms) };
    case "cosine":
      return { ...base, score: queryCosine(record, queryCounts, idf) };
    case "tfidf":
      return { ...base, score: queryTfIdf(record, queryCounts, idf) };
    case "smart": {
      const breakdown = {
        coverage: coverage(record, distinctTerms),
        cosine: queryCosine(record, queryCounts, idf),
      };
      return {
        ...base,
        score: breakdown.coverage * SMART_COVERAGE_WEIGHT + breakdown.cosine,
        breakdown,
      };
    }
  }
}

function compareResults(a: ScoreResult, b: ScoreResult): number {
  if (b.score !== a.score) return b.score - a.score;
  if (a.title !== b.title) return a.title < b.title ? -1 : 1;
  if (a.courseId === b.courseId) return 0;
  return a.courseId < b.courseId ? -1 : 1;
}

function runSearch(
  query: string,
  corpus: Corpus,
  options: SearchOptions,
): SearchMeasurement {
  const method = options.method ?? "smart";
  const maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
  const minScore = options.minScore ?? 0;
  const started = performance.now();

  const queryTokens = normalize(query);
  const queryCounts = countTerms(queryTokens);
  const distinctTerms = new Set(queryCounts.keys());
  const preprocessed = performance.now();

  const candidates = new Set<CourseId>();
  for (const term of distinctTerms) {
    for (const courseId of corpus.index.get(term) ?? []) {
      candidates.add(courseId);
    }
  }
  const collected = performance.now();

  const scored: ScoreResult[] = [];
  for (const courseId of candidates) {
    const record = corpus.dictionary.get(courseId);
    if (!record) {
      throw new CourseIndexError(
        "MALFORMED_RECORD",
        `Index entry references unknown course "${courseId}"`,
        { courseId },
      );
    }
    const result = scoreCourse(record, method, queryCounts, distinctTerms, corpus.idf);
    if (result.score > 0) scored.push(result);
  }
  scored.sort(compareResults);

  const results = maxResults <= 0
    ? []
    : scored.filter((result) => result.score >= minScore).slice(0, maxResults);
  const finished = performance.now();

  const relevant = results.filter((result) => result.score > RELEVANCE_THRESHOLD).length;
  const scoreTotal = results.reduce((sum, result) => sum + result.score, 0);
  return {
    query,
    method,
    queryTokens,
    results,
    timings: {
      preprocessingMs: preprocessed - started,
      candidateMs: collected - preprocessed,
      scoringMs: finished - collected,
      totalMs: finished - started,
    },
    candidateCount: candidates.size,
    resultsFound: scored.length,
    resultsReturned: results.length,
    corpusCoverage: corpus.dictionary.size > 0 ? candidates.size / corpus.dictionary.size : 0,
    precisionAtK: results.length > 0 ? relevant / results.length : 0,
    averageScore: results.length > 0 ? scoreTotal / results.length : 0,
  };
}

/** Ranks the courses matching a free-text query. */
export function search(
  query: string,
  corpus: Corpus,
  options: SearchOptions = {},
): ScoreResult[] {
  const measurement = runSearch(query, corpus, options);
  recordSearch(measurement.timings.totalMs);
  return measurement.results;
}

export function searchUrls(
  query: string,
  corpus: Corpus,
  options: SearchOptions = {},
): string[] {
  return search(query, corpus, options).map((result) => result.url);
}

/** Runs a search and reports phase timings and result quality figures. */
export function measureSearch(
  query: string,
  corpus: Corpus,
  options: SearchOptions = {},
): SearchMeasurement {
  const measurement = runSearch(query, corpus, options);
  recordSearch(measurement.timings.totalMs);
  return measurement;
}

function mentionsCategory(record: CourseRecord, category: string): boolean {
  const text = `${record.title} ${record.description}`.toLowerCase();
  if (text.includes(category)) return true;
  return category.split(/\s+/).some((word) => text.includes(word));
}

/**
 * Searches over twice the requested results, then keeps the courses whose
 * title or description mentions the category or any of its words. A blank
 * category leaves the results unfiltered.
 */
export function searchByCategory(
  query: string,
  category: string,
  corpus: Corpus,
  options: SearchOptions = {},
): ScoreResult[] {
  const maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
  if (maxResults <= 0) return [];
  const results = search(query, corpus, {
    ...options,
    method: options.method ?? "cosine",
    maxResults: maxResults * 2,
  });

  const wanted = category.trim().toLowerCase();
  if (!wanted) return results.slice(0, maxResults);
  return results
    .filter((result) => {
      const record = corpus.dictionary.get(result.courseId);
      return record !== undefined && mentionsCategory(record, wanted);
    })
    .slice(0, maxResults);
}
