import categoryList from "../../data/keyword-categories.json";
import {
  COMBINED_COSINE_WEIGHT,
  COMBINED_JACCARD_WEIGHT,
  COMBINED_SEMANTIC_WEIGHT,
  SEMANTIC_JACCARD_WEIGHT,
  SEMANTIC_KEYWORD_WEIGHT,
} from "../config";
import { CourseIndexError } from "../errors";
import { recordComparison } from "../observability/metrics";
import type {
  CourseDictionary,
  CourseId,
  CourseRecord,
  IdfTable,
  KeywordCategory,
  PerformanceMetrics,
  SimilarityMethod,
  Word,
} from "../types";
import { type MemoryProbe, noopMemoryProbe, readResidentSetMb } from "./memory-probe";

export const SIMILARITY_METHODS: readonly SimilarityMethod[] = [
  "jaccard",
  "cosine",
  "overlap",
  "semantic",
  "combined",
];

export const DEFAULT_KEYWORD_CATEGORIES: readonly KeywordCategory[] = categoryList;

const METHOD_COMPLEXITY: Record<SimilarityMethod, string> = {
  jaccard: "O(n + m)",
  cosine: "O(n + m)",
  overlap: "O(n + m)",
  semantic: "O(n + m + k)",
  combined: "O(n + m + k)",
};

export interface ComparatorOptions {
  dictionary: CourseDictionary;
  idf: IdfTable;
  categories?: readonly KeywordCategory[];
  memoryProbe?: MemoryProbe;
}

export interface SimilarCourse {
  courseId: CourseId;
  score: number;
}

export interface Comparator {
  compare(idA: CourseId, idB: CourseId, method?: SimilarityMethod): number;
  measure(idA: CourseId, idB: CourseId, method?: SimilarityMethod): PerformanceMetrics;
  compareAll(idA: CourseId, idB: CourseId): Record<SimilarityMethod, PerformanceMetrics>;
  findSimilar(id: CourseId, topK?: number, method?: SimilarityMethod): SimilarCourse[];
}

export function parseSimilarityMethod(name: string): SimilarityMethod {
  const value = name.trim().toLowerCase();
  const method = SIMILARITY_METHODS.find((candidate) => candidate === value);
  if (!method) {
    throw new CourseIndexError(
      "INVALID_METHOD",
      `Unknown similarity method "${name}". Available: ${SIMILARITY_METHODS.join(", ")}`,
      { method: name },
    );
  }
  return method;
}

function intersectionSize(a: ReadonlySet<Word>, b: ReadonlySet<Word>): number {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let count = 0;
  for (const word of small) {
    if (large.has(word)) count += 1;
  }
  return count;
}

export function jaccard(a: ReadonlySet<Word>, b: ReadonlySet<Word>): number {
  const shared = intersectionSize(a, b);
  const union = a.size + b.size - shared;
  return union === 0 ? 0 : shared / union;
}

export function overlapCoefficient(a: ReadonlySet<Word>, b: ReadonlySet<Word>): number {
  const smaller = Math.min(a.size, b.size);
  return smaller === 0 ? 0 : intersectionSize(a, b) / smaller;
}

/** Cosine of the two IDF-weighted set vectors (tf = 1). */
export function idfCosine(
  a: ReadonlySet<Word>,
  b: ReadonlySet<Word>,
  idf: IdfTable,
): number {
  let normA = 0;
  let dot = 0;
  for (const word of a) {
    const weight = idf.get(word) ?? 0;
    normA += weight * weight;
    if (b.has(word)) dot += weight * weight;
  }
  let normB = 0;
  for (const word of b) {
    const weight = idf.get(word) ?? 0;
    normB += weight * weight;
  }
  if (normA === 0 || normB === 0) return 0;
  return Math.min(1, dot / (Math.sqrt(normA) * Math.sqrt(normB)));
}

/**
 * Share of the categories touched by either course in which both courses
 * have a term. Two courses outside every category count as alike.
 */
export function keywordSimilarity(
  a: ReadonlySet<Word>,
  b: ReadonlySet<Word>,
  categories: readonly KeywordCategory[],
): number {
  let touched = 0;
  let shared = 0;
  for (const category of categories) {
    const inA = category.terms.some((term) => a.has(term));
    const inB = category.terms.some((term) => b.has(term));
    if (inA || inB) touched += 1;
    if (inA && inB) shared += 1;
  }
  return touched === 0 ? 1 : shared / touched;
}

export function createComparator(options: ComparatorOptions): Comparator {
  const { dictionary, idf } = options;
  const categories = options.categories ?? DEFAULT_KEYWORD_CATEGORIES;
  const memoryProbe = options.memoryProbe ?? noopMemoryProbe;

  function lookup(id: CourseId): CourseRecord {
    const record = dictionary.get(id);
    if (!record) {
      throw new CourseIndexError("COURSE_NOT_FOUND", `Course "${id}" not found`, {
        courseId: id,
      });
    }
    return record;
  }

  function semantic(a: ReadonlySet<Word>, b: ReadonlySet<Word>): number {
    return Math.min(
      1,
      SEMANTIC_KEYWORD_WEIGHT * keywordSimilarity(a, b, categories) +
        SEMANTIC_JACCARD_WEIGHT * jaccard(a, b),
    );
  }

  function score(a: ReadonlySet<Word>, b: ReadonlySet<Word>, method: SimilarityMethod): number {
    switch (method) {
      case "jaccard":
        return jaccard(a, b);
      case "cosine":
        return idfCosine(a, b, idf);
      case "overlap":
        return overlapCoefficient(a, b);
      case "semantic":
        return semantic(a, b);
      case "combined":
        return Math.min(
          1,
          COMBINED_JACCARD_WEIGHT * jaccard(a, b) +
            COMBINED_COSINE_WEIGHT * idfCosine(a, b, idf) +
            COMBINED_SEMANTIC_WEIGHT * semantic(a, b),
        );
    }
  }

  function compare(idA: CourseId, idB: CourseId, method: SimilarityMethod = "combined"): number {
    const a = lookup(idA);
    const b = lookup(idB);
    const started = performance.now();
    const result = score(a.words, b.words, method);
    recordComparison(performance.now() - started);
    return result;
  }

  function measure(
    idA: CourseId,
    idB: CourseId,
    method: SimilarityMethod = "combined",
  ): PerformanceMetrics {
    const a = lookup(idA);
    const b = lookup(idB);
    const memoryBefore = readResidentSetMb(memoryProbe);
    const started = performance.now();
    const similarityScore = score(a.words, b.words, method);
    const elapsedMs = performance.now() - started;
    const memoryAfter = readResidentSetMb(memoryProbe);
    recordComparison(elapsedMs);

    const shared = intersectionSize(a.words, b.words);
    const union = a.words.size + b.words.size - shared;
    return {
      method,
      similarityScore,
      wordCountA: a.words.size,
      wordCountB: b.words.size,
      sharedWords: shared,
      vocabularyOverlap: union === 0 ? 0 : shared / union,
      elapsedMs,
      memoryDeltaMb:
        memoryBefore === undefined || memoryAfter === undefined ? 0 : memoryAfter - memoryBefore,
      complexity: METHOD_COMPLEXITY[method],
    };
  }

  function compareAll(idA: CourseId, idB: CourseId): Record<SimilarityMethod, PerformanceMetrics> {
    return {
      jaccard: measure(idA, idB, "jaccard"),
      cosine: measure(idA, idB, "cosine"),
      overlap: measure(idA, idB, "overlap"),
      semantic: measure(idA, idB, "semantic"),
      combined: measure(idA, idB, "combined"),
    };
  }

  function findSimilar(
    id: CourseId,
    topK: number = 5,
    method: SimilarityMethod = "combined",
  ): SimilarCourse[] {
    const target = lookup(id);
    if (topK <= 0) return [];
    const ranked: SimilarCourse[] = [];
    for (const [otherId, other] of dictionary) {
      if (otherId === id) continue;
      ranked.push({ courseId: otherId, score: score(target.words, other.words, method) });
    }
    ranked.sort((x, y) => {
      if (y.score !== x.score) return y.score - x.score;
      if (x.courseId === y.courseId) return 0;
      return x.courseId < y.courseId ? -1 : 1;
    });
    return ranked.slice(0, topK);
  }

  return { compare, measure, compareAll, findSimilar };
}
