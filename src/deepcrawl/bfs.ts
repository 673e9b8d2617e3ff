import { CourseIndexError, errorMessage } from "../errors";
import { parseDocument } from "../extraction/dom";
import { FilterChain } from "./filters";

export interface CrawlPage {
  url: string;
  html: string;
  contentType?: string;
}

export interface CrawlFetchContext {
  depth: number;
  parentUrl?: string;
  signal?: AbortSignal;
}

export type PageFetcher = (
  url: string,
  context: CrawlFetchContext,
) => Promise<CrawlPage>;

export interface CrawlQueueItem {
  url: string;
  parentUrl?: string;
  depth: number;
}

export interface CrawlNode {
  url: string;
  parentUrl?: string;
  depth: number;
  success: boolean;
  linksDiscovered: number;
  error?: string;
}

export interface BfsCrawlStats {
  fetchedPages: number;
  failedFetches: number;
  filteredPages: number;
  enqueuedPages: number;
  visitedPages: number;
}

export type CrawlTermination = "budget" | "frontier" | "aborted";

export interface BfsCrawlResult {
  results: CrawlNode[];
  stats: BfsCrawlStats;
  termination: CrawlTermination;
}

export interface BfsCrawlOptions {
  /** Budget of successfully fetched pages. */
  maxPages: number;
  maxDepth?: number;
  /** Host links must stay on; defaults to the first seed's host. */
  domain?: string;
  /** Decides which discovered links are enqueued. */
  linkFilter?: FilterChain;
  /** Decides, after the fetch, whether a page is processed at all. */
  pageFilter?: FilterChain;
  signal?: AbortSignal;
  onPage?: (page: CrawlPage, item: CrawlQueueItem) => void | Promise<void>;
  onResult?: (node: CrawlNode) => void | Promise<void>;
}

export function normalizeUrl(value: string, base?: string): string | null {
  try {
    const normalized = base ? new URL(value, base) : new URL(value);
    if (normalized.protocol !== "http:" && normalized.protocol !== "https:") {
      return null;
    }
    normalized.hash = "";
    return normalized.toString();
  } catch {
    return null;
  }
}

function getHost(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return "";
  }
}

export function extractLinksFromHtml(html: string, baseUrl: string): string[] {
  if (!html.trim()) return [];
  let anchors: Element[];
  try {
    anchors = Array.from(parseDocument(html).querySelectorAll("a[href]"));
  } catch {
    return [];
  }
  const links: string[] = [];
  for (const anchor of anchors) {
    const href = anchor.getAttribute("href");
    if (!href) continue;
    const normalized = normalizeUrl(href.trim(), baseUrl);
    if (normalized) links.push(normalized);
  }
  return links;
}

const BFS_QUEUE_COMPACT_MIN_HEAD = 1024;

function maybeCompactBfsQueue(
  queue: CrawlQueueItem[],
  head: number,
): { queue: CrawlQueueItem[]; head: number } {
  if (head < BFS_QUEUE_COMPACT_MIN_HEAD || head * 2 <= queue.length) {
    return { queue, head };
  }
  return {
    queue: queue.slice(head),
    head: 0,
  };
}

/**
 * Breadth-first traversal from one or more seeds. Every URL is fetched at most
 * once: a URL is marked visited when it is enqueued, so it can never be queued
 * twice. Fetch failures are recorded and skipped without consuming budget.
 */
export async function runBfsCrawl(
  seedUrls: readonly string[],
  fetchPage: PageFetcher,
  options: BfsCrawlOptions,
): Promise<BfsCrawlResult> {
  const seeds: string[] = [];
  for (const seed of seedUrls) {
    const normalized = normalizeUrl(seed);
    if (normalized && !seeds.includes(normalized)) seeds.push(normalized);
  }
  if (seeds.length === 0) {
    throw new CourseIndexError("INVALID_SEED", "No valid seed URL", {
      seeds: [...seedUrls],
    });
  }

  const maxPages = Math.max(0, Math.floor(options.maxPages));
  const maxDepth = options.maxDepth ?? Number.POSITIVE_INFINITY;
  const domain = options.domain ?? getHost(seeds[0]);
  const linkFilter = options.linkFilter ?? new FilterChain();
  const pageFilter = options.pageFilter ?? new FilterChain();

  let queue: CrawlQueueItem[] = seeds.map((url) => ({ url, depth: 0 }));
  let queueHead = 0;
  const visited = new Set<string>(seeds);
  const results: CrawlNode[] = [];
  let enqueued = seeds.length;
  let fetched = 0;
  let failed = 0;
  let filtered = 0;
  let termination: CrawlTermination = "frontier";

  while (queueHead < queue.length) {
    if (fetched >= maxPages) {
      termination = "budget";
      break;
    }
    if (options.signal?.aborted) {
      termination = "aborted";
      break;
    }
    const current = queue[queueHead];
    queueHead += 1;

    let node: CrawlNode;
    let page: CrawlPage;
    try {
      page = await fetchPage(current.url, {
        depth: current.depth,
        parentUrl: current.parentUrl,
        signal: options.signal,
      });
    } catch (error) {
      failed += 1;
      node = {
        url: current.url,
        parentUrl: current.parentUrl,
        depth: current.depth,
        success: false,
        linksDiscovered: 0,
        error: errorMessage(error),
      };
      results.push(node);
      if (options.onResult) {
        await options.onResult(node);
      }
      continue;
    }

    fetched += 1;
    const pageUrl = normalizeUrl(page.url || current.url) ?? current.url;
    visited.add(pageUrl);

    try {
      const pageAllowed = await pageFilter.test(pageUrl, {
        url: pageUrl,
        parentUrl: current.parentUrl,
        depth: current.depth,
        domain,
        contentType: page.contentType,
      });
      if (!pageAllowed) {
        filtered += 1;
        node = {
          url: pageUrl,
          parentUrl: current.parentUrl,
          depth: current.depth,
          success: false,
          linksDiscovered: 0,
          error: "Filtered by active page filter.",
        };
      } else {
        if (options.onPage) {
          await options.onPage({ ...page, url: pageUrl }, current);
        }

        let discovered = 0;
        if (current.depth < maxDepth) {
          for (const link of extractLinksFromHtml(page.html || "", pageUrl)) {
            if (visited.has(link)) continue;
            const keep = await linkFilter.test(link, {
              url: link,
              parentUrl: pageUrl,
              depth: current.depth + 1,
              domain,
            });
            if (!keep) continue;
            visited.add(link);
            queue.push({
              url: link,
              parentUrl: pageUrl,
              depth: current.depth + 1,
            });
            discovered += 1;
          }
          enqueued += discovered;
        }

        node = {
          url: pageUrl,
          parentUrl: current.parentUrl,
          depth: current.depth,
          success: true,
          linksDiscovered: discovered,
        };
      }
    } catch (error) {
      node = {
        url: pageUrl,
        parentUrl: current.parentUrl,
        depth: current.depth,
        success: false,
        linksDiscovered: 0,
        error: errorMessage(error),
      };
    }

    results.push(node);
    if (options.onResult) {
      await options.onResult(node);
    }

    const compacted = maybeCompactBfsQueue(queue, queueHead);
    queue = compacted.queue;
    queueHead = compacted.head;
  }

  return {
    results,
    termination,
    stats: {
      fetchedPages: fetched,
      failedFetches: failed,
      filteredPages: filtered,
      enqueuedPages: enqueued,
      visitedPages: visited.size,
    },
  };
}
