import stopWordList from "../../data/stop-words.json";

/** Stop words in normalized form (lowercase, no diacritics). */
export const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);

const COMBINING_MARKS = /\p{M}+/gu;
const NON_TOKEN_CHARS = /[^\p{L}\p{N}-]+/gu;
const TOKEN_BOUNDARY = /[\s-]+/;
const STARTS_WITH_LETTER = /^\p{L}/u;

export function stripDiacritics(value: string): string {
  return value.normalize("NFD").replace(COMBINING_MARKS, "");
}

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

/**
 * Turns free text into index tokens. Course text and queries both go through
 * here, so exact-token matching holds between the two.
 */
export function normalize(
  text: string,
  stopWords: ReadonlySet<string> = STOP_WORDS,
): string[] {
  if (!text) return [];

  const cleaned = stripDiacritics(text.toLowerCase()).replace(NON_TOKEN_CHARS, " ");
  const tokens: string[] = [];
  for (const token of cleaned.split(TOKEN_BOUNDARY)) {
    if (token.length < 2) continue;
    if (!STARTS_WITH_LETTER.test(token)) continue;
    if (stopWords.has(token)) continue;
    tokens.push(token);
  }
  return tokens;
}

export function tokenSet(
  text: string,
  stopWords: ReadonlySet<string> = STOP_WORDS,
): Set<string> {
  return new Set(normalize(text, stopWords));
}

function slugify(value: string): string {
  return stripDiacritics(value.toLowerCase())
    .replace(/\.html?$/, "")
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/** Stable course id for a page: the last path segment as a slug. */
export function slugFromUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return slugify(url);
  }
  const segments = parsed.pathname.split("/").filter(Boolean);
  const last = segments.length > 0
    ? decodeSegment(segments[segments.length - 1])
    : parsed.hostname;
  return slugify(last);
}
