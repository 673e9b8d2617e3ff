import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";
import { createComparator, parseSimilarityMethod, SIMILARITY_METHODS } from "./compare/comparator";
import { processMemoryProbe } from "./compare/memory-probe";
import {
  DEFAULT_CATALOG_SITE,
  DEFAULT_DICTIONARY_FILE,
  DEFAULT_INDEX_FILE,
  DEFAULT_MAX_RESULTS,
  DEFAULT_MIRROR_FILE,
  DEFAULT_PAGE_BUDGET,
} from "./config";
import { crawlCourses } from "./crawler";
import { errorMessage } from "./errors";
import { createHttpPageFetcher } from "./fetch";
import {
  assertIndexMatchesDictionary,
  buildInvertedIndex,
  computeIdf,
  indexStatistics,
  invertedIndexFromRows,
} from "./indexing/inverted-index";
import { parseSearchMethod, search, searchByCategory } from "./search/ranker";
import {
  loadDictionary,
  loadIndexRows,
  saveDictionary,
  saveIndexRows,
  writeTextFile,
} from "./storage/files";
import { buildMirrorRows, renderMirrorInserts } from "./storage/mirror";
import type { Corpus } from "./types";

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
}

const USAGE = [
  "Usage:",
  "  crawl <pages> [dict_file] [index_file]",
  "  search \"<query>\" [dict_file] [index_file] [max_results] [method] [--category <name>]",
  "  compare <id1> <id2> [dict_file] [index_file] [--metrics | --compare-all] [--method <name>] [--similar <k>]",
  "  mirror [dict_file] [sql_file]",
].join("\n");

const defaultIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

class UsageError extends Error {}

function parseCount(value: string | undefined, fallback: number, label: string): number {
  if (value === undefined) return fallback;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || String(parsed) !== value.trim()) {
    throw new UsageError(`${label} must be an integer, got "${value}"`);
  }
  return parsed;
}

async function loadCorpus(dictFile: string, indexFile: string): Promise<Corpus> {
  const dictionary = await loadDictionary(dictFile);
  const index = invertedIndexFromRows(await loadIndexRows(indexFile, dictionary));
  assertIndexMatchesDictionary(dictionary, index);
  return { dictionary, index, idf: computeIdf(dictionary, index) };
}

function formatScore(value: number): string {
  return value.toFixed(4);
}

async function runCrawl(args: string[], io: CliIo): Promise<void> {
  const pages = parseCount(args[0], DEFAULT_PAGE_BUDGET, "pages");
  const dictFile = args[1] ?? DEFAULT_DICTIONARY_FILE;
  const indexFile = args[2] ?? DEFAULT_INDEX_FILE;

  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once("SIGINT", onInterrupt);
  try {
    const result = await crawlCourses(DEFAULT_CATALOG_SITE, createHttpPageFetcher(), {
      maxPages: pages,
      signal: controller.signal,
    });
    await saveDictionary(dictFile, result.dictionary);
    await saveIndexRows(indexFile, result.rows);

    const { stats } = result;
    io.out(`Fetched pages: ${stats.fetchedPages} (failed: ${stats.failedFetches})`);
    io.out(`Courses: ${stats.records} (duplicates: ${stats.duplicateRecords})`);
    io.out(
      `Rejected: syntactic ${stats.rejected.syntactic}, structural ${stats.rejected.structural}, semantic ${stats.rejected.semantic}`,
    );
    io.out(`Index rows: ${result.rows.length}`);
    io.out(`Stopped: ${stats.termination} after ${(stats.elapsedMs / 1000).toFixed(2)}s`);
    io.out(`Wrote ${dictFile} and ${indexFile}`);
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}

async function runSearch(args: string[], category: string | undefined, io: CliIo): Promise<void> {
  const query = args[0];
  if (query === undefined) throw new UsageError("search needs a query");
  const corpus = await loadCorpus(args[1] ?? DEFAULT_DICTIONARY_FILE, args[2] ?? DEFAULT_INDEX_FILE);
  const maxResults = parseCount(args[3], DEFAULT_MAX_RESULTS, "max_results");
  const method = args[4] === undefined ? undefined : parseSearchMethod(args[4]);

  const results = category === undefined
    ? search(query, corpus, { method, maxResults })
    : searchByCategory(query, category, corpus, { method, maxResults });
  if (results.length === 0) {
    io.out(`No courses match "${query}".`);
    return;
  }
  results.forEach((result, position) => {
    io.out(`${position + 1}. ${result.url}`);
    const detail = result.breakdown
      ? ` (coverage ${formatScore(result.breakdown.coverage)}, cosine ${formatScore(result.breakdown.cosine)})`
      : "";
    io.out(`   ${result.title} | score ${formatScore(result.score)}${detail}`);
  });
}

async function runCompare(
  args: string[],
  flags: { metrics: boolean; compareAll: boolean; method?: string; similar?: string },
  io: CliIo,
): Promise<void> {
  const [idA, idB] = args;
  if (idA === undefined || idB === undefined) {
    throw new UsageError("compare needs two course ids");
  }
  const corpus = await loadCorpus(args[2] ?? DEFAULT_DICTIONARY_FILE, args[3] ?? DEFAULT_INDEX_FILE);
  const comparator = createComparator({
    dictionary: corpus.dictionary,
    idf: corpus.idf,
    memoryProbe: processMemoryProbe,
  });
  const method = parseSimilarityMethod(flags.method ?? "combined");

  if (flags.compareAll) {
    const all = comparator.compareAll(idA, idB);
    io.out("method     score    time_ms  memory_mb  complexity");
    for (const name of SIMILARITY_METHODS) {
      const metrics = all[name];
      io.out(
        `${name.padEnd(10)} ${formatScore(metrics.similarityScore)}  ${metrics.elapsedMs.toFixed(3).padStart(7)}  ${metrics.memoryDeltaMb.toFixed(2).padStart(9)}  ${metrics.complexity}`,
      );
    }
  } else if (flags.metrics) {
    const metrics = comparator.measure(idA, idB, method);
    io.out(`${method}: ${formatScore(metrics.similarityScore)}`);
    io.out(`Words: ${metrics.wordCountA} / ${metrics.wordCountB}, shared ${metrics.sharedWords}`);
    io.out(`Vocabulary overlap: ${formatScore(metrics.vocabularyOverlap)}`);
    io.out(`Time: ${metrics.elapsedMs.toFixed(3)} ms, memory delta: ${metrics.memoryDeltaMb.toFixed(2)} MB`);
    io.out(`Complexity: ${metrics.complexity}`);
  } else {
    io.out(`${method}: ${formatScore(comparator.compare(idA, idB, method))}`);
  }

  if (flags.similar !== undefined) {
    const topK = parseCount(flags.similar, 5, "--similar");
    io.out(`Most similar to ${idA}:`);
    for (const entry of comparator.findSimilar(idA, topK, method)) {
      io.out(`  ${entry.courseId} ${formatScore(entry.score)}`);
    }
  }
}

async function runMirror(args: string[], io: CliIo): Promise<void> {
  const dictFile = args[0] ?? DEFAULT_DICTIONARY_FILE;
  const sqlFile = args[1] ?? DEFAULT_MIRROR_FILE;
  const dictionary = await loadDictionary(dictFile);
  const rows = buildMirrorRows(dictionary);
  await writeTextFile(sqlFile, renderMirrorInserts(rows));
  const stats = indexStatistics(dictionary, buildInvertedIndex(dictionary));
  io.out(`Wrote ${rows.length} rows for ${stats.totalCourses} courses (${stats.vocabularySize} words) to ${sqlFile}`);
}

function parseCliArgs(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    allowPositionals: true,
    options: {
      metrics: { type: "boolean", default: false },
      "compare-all": { type: "boolean", default: false },
      method: { type: "string" },
      similar: { type: "string" },
      category: { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
  });
}

/** Runs one CLI command and resolves to the process exit code. */
export async function runCli(argv: readonly string[], io: CliIo = defaultIo): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    io.err(errorMessage(error));
    io.err(USAGE);
    return 1;
  }

  const [command, ...rest] = parsed.positionals;
  if (parsed.values.help || command === undefined) {
    io.out(USAGE);
    return command === undefined && !parsed.values.help ? 1 : 0;
  }

  try {
    switch (command) {
      case "crawl":
        await runCrawl(rest, io);
        break;
      case "search":
        await runSearch(rest, parsed.values.category, io);
        break;
      case "compare":
        await runCompare(rest, {
          metrics: parsed.values.metrics ?? false,
          compareAll: parsed.values["compare-all"] ?? false,
          method: parsed.values.method,
          similar: parsed.values.similar,
        }, io);
        break;
      case "mirror":
        await runMirror(rest, io);
        break;
      default:
        throw new UsageError(`Unknown command "${command}"`);
    }
    return 0;
  } catch (error) {
    io.err(`Error: ${errorMessage(error)}`);
    if (error instanceof UsageError) io.err(USAGE);
    return 1;
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error("Fatal:", errorMessage(error));
      process.exitCode = 1;
    },
  );
}
