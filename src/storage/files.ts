import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { CourseIndexError, errorMessage } from "../errors";
import type { CourseDictionary, CourseId, CourseRecord, IndexRow } from "../types";

const courseEntrySchema = z.object({
  url: z.string().url(),
  title: z.string().min(1),
  description: z.string().optional(),
  words: z.array(z.string().min(1)).min(1),
});

const dictionarySchema = z.record(z.string().min(1), courseEntrySchema);

export type DictionaryFile = z.infer<typeof dictionarySchema>;

const INDEX_SEPARATOR = "|";

async function readText(path: string): Promise<string> {
  try {
    return await readFile(path, "utf8");
  } catch (error) {
    throw new CourseIndexError("STORAGE_FAILED", `Cannot read ${path}: ${errorMessage(error)}`, {
      path,
    });
  }
}

export async function writeTextFile(path: string, content: string): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, "utf8");
  } catch (error) {
    throw new CourseIndexError("STORAGE_FAILED", `Cannot write ${path}: ${errorMessage(error)}`, {
      path,
    });
  }
}

export function serializeDictionary(dictionary: CourseDictionary): string {
  const file: DictionaryFile = {};
  for (const [id, record] of dictionary) {
    file[id] = {
      url: record.url,
      title: record.title,
      description: record.description,
      words: [...record.words],
    };
  }
  return `${JSON.stringify(file, null, 2)}\n`;
}

/** Validates a parsed dictionary file and turns it into course records. */
export function parseDictionary(value: unknown, source: string = "dictionary"): CourseDictionary {
  const parsed = dictionarySchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join(", ");
    throw new CourseIndexError("INVALID_DICTIONARY", `Invalid ${source}: ${issues}`, {
      source,
    });
  }
  const dictionary = new Map<CourseId, CourseRecord>();
  for (const [id, entry] of Object.entries(parsed.data)) {
    dictionary.set(id, {
      id,
      url: entry.url,
      title: entry.title,
      description: entry.description ?? "",
      words: new Set(entry.words),
    });
  }
  return dictionary;
}

export async function saveDictionary(path: string, dictionary: CourseDictionary): Promise<void> {
  await writeTextFile(path, serializeDictionary(dictionary));
}

export async function loadDictionary(path: string): Promise<CourseDictionary> {
  const text = await readText(path);
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw new CourseIndexError("INVALID_DICTIONARY", `${path} is not valid JSON: ${errorMessage(error)}`, {
      path,
    });
  }
  return parseDictionary(value, path);
}

export function serializeIndexRows(rows: readonly IndexRow[]): string {
  return rows.map((row) => `${row.courseId}${INDEX_SEPARATOR}${row.word}\n`).join("");
}

/**
 * Parses `courseId|word` lines. Duplicate pairs collapse; a malformed line or a
 * row naming a course absent from the dictionary is MALFORMED_RECORD.
 */
export function parseIndexRows(text: string, dictionary: CourseDictionary): IndexRow[] {
  const rows: IndexRow[] = [];
  const seen = new Set<string>();
  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;
    const separator = line.indexOf(INDEX_SEPARATOR);
    const courseId = separator > 0 ? line.slice(0, separator) : "";
    const word = separator > 0 ? line.slice(separator + 1) : "";
    if (!courseId || !word || word.includes(INDEX_SEPARATOR)) {
      throw new CourseIndexError("MALFORMED_RECORD", `Malformed index row at line ${i + 1}`, {
        line: i + 1,
        content: line,
      });
    }
    if (!dictionary.has(courseId)) {
      throw new CourseIndexError(
        "MALFORMED_RECORD",
        `Index row at line ${i + 1} names unknown course "${courseId}"`,
        { line: i + 1, courseId },
      );
    }
    const key = `${courseId}${INDEX_SEPARATOR}${word}`;
    if (seen.has(key)) continue;
    seen.add(key);
    rows.push({ courseId, word });
  }
  return rows;
}

export async function saveIndexRows(path: string, rows: readonly IndexRow[]): Promise<void> {
  await writeTextFile(path, serializeIndexRows(rows));
}

export async function loadIndexRows(path: string, dictionary: CourseDictionary): Promise<IndexRow[]> {
  return parseIndexRows(await readText(path), dictionary);
}
