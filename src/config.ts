import type { CrawlSite } from "./types";

/** Maximum response body size (5 MB). */
export const MAX_RESPONSE_BYTES = 5 * 1024 * 1024;

/** Maximum URL length accepted by the crawler. */
export const MAX_URL_LENGTH = 4096;

/** Page fetch budget (ms) and retry policy. */
export const FETCH_TIMEOUT_MS = 10_000;
export const FETCH_MAX_RETRIES = 2;
export const FETCH_RETRY_DELAY_MS = 250;
export const FETCH_MAX_RETRY_DELAY_MS = 2_000;
export const FETCH_MAX_REDIRECTS = 5;

export const DESKTOP_UA =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 " +
  "(KHTML, like Gecko) Chrome/123.0.0.0 Safari/537.36";

/** Crawl defaults. */
export const DEFAULT_PAGE_BUDGET = 10;
export const MIN_COURSE_WORDS = 3;
export const MAX_DESCRIPTION_BLOCKS = 3;
export const MIN_PARAGRAPH_CHARS = 50;

/** Search defaults. */
export const DEFAULT_MAX_RESULTS = 10;
export const SMART_COVERAGE_WEIGHT = 10;
export const RELEVANCE_THRESHOLD = 0.1;

/** Similarity weights. */
export const SEMANTIC_KEYWORD_WEIGHT = 0.6;
export const SEMANTIC_JACCARD_WEIGHT = 0.4;
export const COMBINED_JACCARD_WEIGHT = 0.3;
export const COMBINED_COSINE_WEIGHT = 0.3;
export const COMBINED_SEMANTIC_WEIGHT = 0.4;

export const DEFAULT_DICTIONARY_FILE = "curso.json";
export const DEFAULT_INDEX_FILE = "curso.csv";
export const DEFAULT_MIRROR_FILE = "curso.sql";

export const DEFAULT_CATALOG_SITE: CrawlSite = {
  seedUrls: ["https://educacionvirtual.javeriana.edu.co/nuestros-programas-nuevo"],
  domain: "educacionvirtual.javeriana.edu.co",
  coursePagePattern: "https://educacionvirtual.javeriana.edu.co/*",
  excludePatterns: [
    "*/buscar*",
    "*/filtrar*",
    "*/categoria*",
    "*/tipo*",
    "*/nivel*",
    "*/page*",
    "*/admin*",
    "*/login*",
    "*/home*",
    "*/nuestros-programas*",
  ],
};
