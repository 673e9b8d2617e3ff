import { CourseIndexError } from "../errors";
import type {
  CourseDictionary,
  CourseId,
  Corpus,
  IdfTable,
  IndexRow,
  InvertedIndex,
  Word,
} from "../types";

export interface IndexStatistics {
  totalCourses: number;
  vocabularySize: number;
  indexEntries: number;
  averageWordsPerCourse: number;
}

/** Maps every word to the ids of the courses containing it. */
export function buildInvertedIndex(dictionary: CourseDictionary): InvertedIndex {
  const index = new Map<Word, Set<CourseId>>();
  for (const [courseId, record] of dictionary) {
    for (const word of record.words) {
      let postings = index.get(word);
      if (!postings) {
        postings = new Set();
        index.set(word, postings);
      }
      postings.add(courseId);
    }
  }
  return index;
}

/** idf(w) = ln(total courses / courses containing w). */
export function computeIdf(
  dictionary: CourseDictionary,
  index: InvertedIndex,
): IdfTable {
  const total = dictionary.size;
  const idf = new Map<Word, number>();
  if (total === 0) return idf;
  for (const [word, postings] of index) {
    if (postings.size === 0) continue;
    idf.set(word, Math.log(total / postings.size));
  }
  return idf;
}

/** Unique (course, word) pairs in dictionary order. */
export function toIndexRows(dictionary: CourseDictionary): IndexRow[] {
  const rows: IndexRow[] = [];
  for (const [courseId, record] of dictionary) {
    for (const word of record.words) {
      rows.push({ courseId, word });
    }
  }
  return rows;
}

export function indexStatistics(
  dictionary: CourseDictionary,
  index: InvertedIndex,
): IndexStatistics {
  let entries = 0;
  for (const postings of index.values()) entries += postings.size;
  let words = 0;
  for (const record of dictionary.values()) words += record.words.size;
  return {
    totalCourses: dictionary.size,
    vocabularySize: index.size,
    indexEntries: entries,
    averageWordsPerCourse: dictionary.size > 0 ? words / dictionary.size : 0,
  };
}

export function buildCorpus(dictionary: CourseDictionary): Corpus {
  const index = buildInvertedIndex(dictionary);
  return { dictionary, index, idf: computeIdf(dictionary, index) };
}

/** Rebuilds the index from stored (course, word) rows. */
export function invertedIndexFromRows(rows: readonly IndexRow[]): InvertedIndex {
  const index = new Map<Word, Set<CourseId>>();
  for (const { courseId, word } of rows) {
    let postings = index.get(word);
    if (!postings) {
      postings = new Set();
      index.set(word, postings);
    }
    postings.add(courseId);
  }
  return index;
}

/**
 * Throws MALFORMED_RECORD unless the index holds exactly the (course, word)
 * pairs of the dictionary.
 */
export function assertIndexMatchesDictionary(
  dictionary: CourseDictionary,
  index: InvertedIndex,
): void {
  for (const [courseId, record] of dictionary) {
    for (const word of record.words) {
      if (!index.get(word)?.has(courseId)) {
        throw new CourseIndexError(
          "MALFORMED_RECORD",
          `Index is missing word "${word}" of course "${courseId}"`,
          { courseId, word },
        );
      }
    }
  }
  for (const [word, postings] of index) {
    for (const courseId of postings) {
      if (!dictionary.get(courseId)?.words.has(word)) {
        throw new CourseIndexError(
          "MALFORMED_RECORD",
          `Index lists word "${word}" for course "${courseId}" that the dictionary does not`,
          { courseId, word },
        );
      }
    }
  }
}
