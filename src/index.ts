export * from "./types";
export * from "./config";
export { CourseIndexError, isCourseIndexError } from "./errors";
export type { CourseIndexErrorCode } from "./errors";
export { normalize, slugFromUrl, STOP_WORDS, tokenSet } from "./text/normalizer";
export { runBfsCrawl, extractLinksFromHtml } from "./deepcrawl/bfs";
export type { CrawlNode, CrawlPage, CrawlTermination, PageFetcher } from "./deepcrawl/bfs";
export { crawlCourses } from "./crawler";
export type { CrawlOptions, CrawlResult, CrawlStats } from "./crawler";
export { extractCoursePage } from "./extraction/course-page";
export { createHttpPageFetcher } from "./fetch";
export {
  assertIndexMatchesDictionary,
  buildCorpus,
  buildInvertedIndex,
  computeIdf,
  indexStatistics,
  invertedIndexFromRows,
  toIndexRows,
} from "./indexing/inverted-index";
export {
  measureSearch,
  parseSearchMethod,
  search,
  searchByCategory,
  searchUrls,
} from "./search/ranker";
export type { SearchMeasurement, SearchOptions } from "./search/ranker";
export {
  createComparator,
  DEFAULT_KEYWORD_CATEGORIES,
  parseSimilarityMethod,
} from "./compare/comparator";
export type { Comparator, SimilarCourse } from "./compare/comparator";
export { noopMemoryProbe, processMemoryProbe } from "./compare/memory-probe";
export type { MemoryProbe } from "./compare/memory-probe";
export {
  loadDictionary,
  loadIndexRows,
  saveDictionary,
  saveIndexRows,
} from "./storage/files";
export { buildMirrorRows, renderMirrorInserts } from "./storage/mirror";
export { buildMetricsSnapshot } from "./observability/metrics";
