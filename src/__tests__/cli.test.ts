import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { runCli, type CliIo } from "../cli";
import { toIndexRows } from "../indexing/inverted-index";
import { saveDictionary, saveIndexRows } from "../storage/files";
import { makeDictionary, SAMPLE_COURSES } from "./test-helpers";

function captureIo(): CliIo & { lines: string[]; errors: string[] } {
  const lines: string[] = [];
  const errors: string[] = [];
  return {
    lines,
    errors,
    out: (line) => lines.push(line),
    err: (line) => errors.push(line),
  };
}

describe("cli", () => {
  let dir = "";
  let dictFile = "";
  let indexFile = "";

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "course-cli-"));
    dictFile = join(dir, "curso.json");
    indexFile = join(dir, "curso.csv");
    const dictionary = makeDictionary(SAMPLE_COURSES);
    await saveDictionary(dictFile, dictionary);
    await saveIndexRows(indexFile, toIndexRows(dictionary));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("prints ranked search results", async () => {
    const io = captureIo();
    const code = await runCli(["search", "gestion proyectos", dictFile, indexFile], io);

    expect(code).toBe(0);
    expect(io.lines).toEqual([
      "1. https://catalog.example.edu/gestion-proyectos-agiles",
      "   Gestion de Proyectos Agiles | score 10.5774 (coverage 1.0000, cosine 0.5774)",
    ]);
  });

  it("filters search results by category", async () => {
    const io = captureIo();
    expect(await runCli(["search", "gestion proyectos", dictFile, indexFile, "--category", "agiles"], io)).toBe(0);
    expect(io.lines).toEqual([
      "1. https://catalog.example.edu/gestion-proyectos-agiles",
      "   Gestion de Proyectos Agiles | score 0.5774",
    ]);

    const none = captureIo();
    await runCli(["search", "gestion proyectos", dictFile, indexFile, "--category", "marketing"], none);
    expect(none.lines).toEqual(['No courses match "gestion proyectos".']);
  });

  it("rejects an index file that disagrees with the dictionary", async () => {
    const partialIndex = join(dir, "parcial.csv");
    await saveIndexRows(partialIndex, toIndexRows(makeDictionary(SAMPLE_COURSES)).slice(0, -1));
    const io = captureIo();

    expect(await runCli(["search", "datos", dictFile, partialIndex], io)).toBe(1);
    expect(io.errors).toEqual([
      'Error: Index is missing word "metricas" of course "marketing-digital-estrategico"',
    ]);
  });

  it("reports queries without matches", async () => {
    const io = captureIo();
    expect(await runCli(["search", "", dictFile, indexFile], io)).toBe(0);
    expect(io.lines).toEqual(['No courses match "".']);
  });

  it("compares two courses with the chosen method", async () => {
    const io = captureIo();
    const code = await runCli([
      "compare",
      "gestion-proyectos-agiles",
      "marketing-digital-estrategico",
      dictFile,
      indexFile,
      "--method",
      "jaccard",
    ], io);

    expect(code).toBe(0);
    expect(io.lines).toEqual(["jaccard: 0.0000"]);
  });

  it("prints one line per method with --compare-all", async () => {
    const io = captureIo();
    await runCli(["compare", "gestion-proyectos-agiles", "gestion-proyectos-agiles", dictFile, indexFile, "--compare-all"], io);

    expect(io.lines).toHaveLength(6);
    expect(io.lines[1].startsWith("jaccard    1.0000")).toBe(true);
  });

  it("writes the relational mirror", async () => {
    const io = captureIo();
    const sqlFile = join(dir, "curso.sql");
    expect(await runCli(["mirror", dictFile, sqlFile], io)).toBe(0);

    expect(io.lines).toEqual([`Wrote 13 rows for 2 courses (13 words) to ${sqlFile}`]);
    expect((await readFile(sqlFile, "utf8")).startsWith("INSERT IGNORE INTO indice_rastreador")).toBe(true);
  });

  it("exits with 1 on errors", async () => {
    const unknownCourse = captureIo();
    expect(await runCli(["compare", "gestion-proyectos-agiles", "nope", dictFile, indexFile], unknownCourse)).toBe(1);
    expect(unknownCourse.errors).toEqual(['Error: Course "nope" not found']);

    const badMethod = captureIo();
    expect(await runCli(["search", "datos", dictFile, indexFile, "5", "bm25"], badMethod)).toBe(1);
    expect(badMethod.errors[0]).toBe(
      'Error: Unknown search method "bm25". Available: smart, cosine, relevance, tfidf',
    );

    const unknownCommand = captureIo();
    expect(await runCli(["frobnicate"], unknownCommand)).toBe(1);
    expect(unknownCommand.errors[0]).toBe('Error: Unknown command "frobnicate"');

    const missingFile = captureIo();
    expect(await runCli(["search", "datos", join(dir, "missing.json"), indexFile], missingFile)).toBe(1);

    const noCommand = captureIo();
    expect(await runCli([], noCommand)).toBe(1);
    expect(noCommand.lines[0].startsWith("Usage:\n")).toBe(true);
  });
});
