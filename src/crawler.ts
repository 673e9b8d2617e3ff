import { MAX_URL_LENGTH, MIN_COURSE_WORDS } from "./config";
import {
  type BfsCrawlStats,
  type CrawlNode,
  type CrawlTermination,
  type PageFetcher,
  runBfsCrawl,
} from "./deepcrawl/bfs";
import {
  createContentTypeFilter,
  createDomainFilter,
  createPageLinkFilter,
  createUrlPatternFilter,
  FilterChain,
} from "./deepcrawl/filters";
import { extractCoursePage } from "./extraction/course-page";
import {
  type ValidationLayer,
  validateSemantic,
  validateStructural,
  validateSyntactic,
} from "./extraction/validation";
import { toIndexRows } from "./indexing/inverted-index";
import { logEvent } from "./observability/log";
import { recordCrawlRun } from "./observability/metrics";
import { slugFromUrl, STOP_WORDS, tokenSet } from "./text/normalizer";
import type { CourseDictionary, CourseId, CourseRecord, CrawlSite, IndexRow } from "./types";

export interface CrawlOptions {
  /** Budget of successfully fetched pages. */
  maxPages: number;
  maxDepth?: number;
  minWords?: number;
  stopWords?: ReadonlySet<string>;
  signal?: AbortSignal;
  onNode?: (node: CrawlNode) => void | Promise<void>;
}

export interface CrawlStats extends BfsCrawlStats {
  records: number;
  duplicateRecords: number;
  rejected: Record<ValidationLayer, number>;
  elapsedMs: number;
  termination: CrawlTermination;
}

export interface CrawlResult {
  dictionary: CourseDictionary;
  rows: IndexRow[];
  stats: CrawlStats;
}

function buildLinkFilter(site: CrawlSite): FilterChain {
  return new FilterChain()
    .add(async (url) => url.length <= MAX_URL_LENGTH)
    .add(createDomainFilter(site.domain))
    .add(createPageLinkFilter())
    .add(createUrlPatternFilter(site.followPatterns ?? []));
}

/**
 * Crawls a course catalog and returns the validated course records.
 * Every fetched page feeds link discovery; only pages passing all three
 * validation layers become records.
 */
export async function crawlCourses(
  site: CrawlSite,
  fetchPage: PageFetcher,
  options: CrawlOptions,
): Promise<CrawlResult> {
  const startedAt = performance.now();
  const minWords = options.minWords ?? MIN_COURSE_WORDS;
  const stopWords = options.stopWords ?? STOP_WORDS;
  const dictionary = new Map<CourseId, CourseRecord>();
  const rejected: Record<ValidationLayer, number> = {
    syntactic: 0,
    structural: 0,
    semantic: 0,
  };
  let duplicateRecords = 0;

  const traversal = await runBfsCrawl(site.seedUrls, fetchPage, {
    maxPages: options.maxPages,
    maxDepth: options.maxDepth,
    domain: site.domain,
    linkFilter: buildLinkFilter(site),
    pageFilter: new FilterChain().add(createContentTypeFilter(["text/html", "application/xhtml+xml"])),
    signal: options.signal,
    onResult: async (node) => {
      if (!node.success && node.error) {
        console.warn("Skipping page:", { url: node.url, error: node.error });
      }
      if (options.onNode) {
        await options.onNode(node);
      }
    },
    onPage: (page) => {
      const syntactic = validateSyntactic(page.url, site);
      if (!syntactic.ok) {
        rejected.syntactic += 1;
        return;
      }
      const extracted = extractCoursePage(page.html);
      const structural = validateStructural(extracted);
      if (!structural.ok) {
        rejected.structural += 1;
        return;
      }
      const words = tokenSet(`${extracted.title} ${extracted.description}`, stopWords);
      const semantic = validateSemantic(extracted.title, words, minWords);
      if (!semantic.ok) {
        rejected.semantic += 1;
        return;
      }

      const id = slugFromUrl(page.url);
      if (dictionary.has(id)) {
        duplicateRecords += 1;
        return;
      }
      dictionary.set(id, {
        id,
        url: page.url,
        title: extracted.title,
        description: extracted.description,
        words,
      });
    },
  });

  const stats: CrawlStats = {
    ...traversal.stats,
    records: dictionary.size,
    duplicateRecords,
    rejected,
    elapsedMs: performance.now() - startedAt,
    termination: traversal.termination,
  };

  recordCrawlRun(stats.elapsedMs, {
    fetched: stats.fetchedPages,
    failed: stats.failedFetches,
    accepted: stats.records,
    rejected: rejected.syntactic + rejected.structural + rejected.semantic,
  });
  logEvent("crawl_complete", {
    fetched_pages: stats.fetchedPages,
    failed_fetches: stats.failedFetches,
    records: stats.records,
    duplicate_records: duplicateRecords,
    rejected,
    termination: stats.termination,
    elapsed_ms: Math.round(stats.elapsedMs),
  });

  return { dictionary, rows: toIndexRows(dictionary), stats };
}
