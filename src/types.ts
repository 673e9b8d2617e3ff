export type CourseId = string;
export type Word = string;

export interface CourseRecord {
  readonly id: CourseId;
  readonly url: string;
  readonly title: string;
  readonly description: string;
  readonly words: ReadonlySet<Word>;
}

export type CourseDictionary = ReadonlyMap<CourseId, CourseRecord>;
export type InvertedIndex = ReadonlyMap<Word, ReadonlySet<CourseId>>;
export type IdfTable = ReadonlyMap<Word, number>;

export interface IndexRow {
  courseId: CourseId;
  word: Word;
}

/** Everything a query needs; built once per dictionary snapshot. */
export interface Corpus {
  dictionary: CourseDictionary;
  index: InvertedIndex;
  idf: IdfTable;
}

export interface CrawlSite {
  seedUrls: string[];
  /** Host (or parent domain) links must stay on. */
  domain: string;
  /** Wildcard pattern a course detail page URL must match. */
  coursePagePattern: string;
  /** Wildcard patterns that never denote a course page. */
  excludePatterns?: string[];
  /** Extra wildcard patterns a link must match to be followed. */
  followPatterns?: string[];
}

export type SearchMethod = "relevance" | "cosine" | "tfidf" | "smart";

export type SimilarityMethod =
  | "jaccard"
  | "cosine"
  | "overlap"
  | "semantic"
  | "combined";

export interface ScoreBreakdown {
  coverage: number;
  cosine: number;
}

export interface ScoreResult {
  courseId: CourseId;
  url: string;
  title: string;
  score: number;
  breakdown?: ScoreBreakdown;
}

export interface PerformanceMetrics {
  method: SimilarityMethod;
  similarityScore: number;
  wordCountA: number;
  wordCountB: number;
  sharedWords: number;
  vocabularyOverlap: number;
  elapsedMs: number;
  memoryDeltaMb: number;
  complexity: string;
}

export interface KeywordCategory {
  name: string;
  terms: readonly Word[];
}
