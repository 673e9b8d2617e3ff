import { MIN_COURSE_WORDS } from "../config";
import { matchesAnyPattern } from "../deepcrawl/filters";
import { stripDiacritics } from "../text/normalizer";
import type { CrawlSite } from "../types";
import type { CoursePage } from "./course-page";

export type ValidationLayer = "syntactic" | "structural" | "semantic";

export type ValidationResult =
  | { ok: true }
  | { ok: false; layer: ValidationLayer; reason: string };

const OBVIOUS_NON_COURSE_TITLES = new Set([
  "TIPO",
  "MODALIDAD",
  "NIVEL",
  "CATEGORIA",
  "FILTRAR",
  "BUSCAR",
  "ORDENAR",
  "VER",
  "MOSTRAR",
]);

const ACCEPTED: ValidationResult = { ok: true };

function reject(layer: ValidationLayer, reason: string): ValidationResult {
  return { ok: false, layer, reason };
}

/** URL shape: a course detail page of the site, not a listing or utility page. */
export function validateSyntactic(url: string, site: CrawlSite): ValidationResult {
  if (!matchesAnyPattern(url, [site.coursePagePattern])) {
    return reject("syntactic", "URL does not match the course page pattern");
  }
  if (site.excludePatterns && matchesAnyPattern(url, site.excludePatterns)) {
    return reject("syntactic", "URL matches an excluded pattern");
  }
  return ACCEPTED;
}

export function validateStructural(page: CoursePage): ValidationResult {
  if (!page.title) return reject("structural", "Missing title");
  if (!page.blocks.some((block) => block.length > 0)) {
    return reject("structural", "Missing description");
  }
  return ACCEPTED;
}

/** Labels of filters and navigation widgets that are never course titles. */
export function isObviousNonCourseTitle(title: string): boolean {
  const label = stripDiacritics(title).toUpperCase().trim();
  if (!label) return true;
  if (OBVIOUS_NON_COURSE_TITLES.has(label)) return true;
  if (/^\d+$/.test(label)) return true;
  const words = label.split(/\s+/);
  return words.length === 1 && words[0].length <= 3;
}

export function validateSemantic(
  title: string,
  words: ReadonlySet<string>,
  minWords: number = MIN_COURSE_WORDS,
): ValidationResult {
  if (isObviousNonCourseTitle(title)) {
    return reject("semantic", "Title is a navigation label");
  }
  const required = Math.max(1, minWords);
  if (words.size < required) {
    return reject("semantic", `Fewer than ${required} index words`);
  }
  return ACCEPTED;
}
