import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { crawlCourses } from "../crawler";
import type { CrawlNode } from "../deepcrawl/bfs";
import { buildMetricsSnapshot, resetMetricsForTests } from "../observability/metrics";
import type { CrawlSite } from "../types";
import { coursePageHtml, createGraphFetcher, listingPageHtml } from "./test-helpers";

const BASE = "https://catalog.example.edu";

const site: CrawlSite = {
  seedUrls: [`${BASE}/programas`],
  domain: "catalog.example.edu",
  coursePagePattern: `${BASE}/*`,
  excludePatterns: ["*/programas*"],
};

const catalog: Record<string, string> = {
  [`${BASE}/programas`]: listingPageHtml([
    "/analitica-datos",
    "/gestion-proyectos-agiles",
    "/programas?page=2",
    "/brochure.pdf",
    "mailto:admisiones@catalog.example.edu",
    "https://other.example.org/curso",
    "/filtro-tipo",
  ]),
  [`${BASE}/programas?page=2`]: listingPageHtml([
    "/marketing-digital-estrategico",
    "/analitica-datos",
    "/sin-titulo",
  ]),
  [`${BASE}/analitica-datos`]: coursePageHtml(
    "Analitica de Datos",
    "Fundamentos de analitica de datos aplicada a organizaciones modernas.",
  ),
  [`${BASE}/gestion-proyectos-agiles`]: coursePageHtml(
    "Gestion de Proyectos Agiles",
    "Metodologias scrum y kanban para la gestion efectiva de proyectos.",
  ),
  [`${BASE}/marketing-digital-estrategico`]: coursePageHtml(
    "Marketing Digital Estrategico",
    "SEO, SEM, redes sociales y metricas digitales.",
  ),
  [`${BASE}/filtro-tipo`]: coursePageHtml(
    "Tipo",
    "Listado de tipos de programas ofrecidos en modalidad virtual.",
  ),
  [`${BASE}/sin-titulo`]: "<html><body><div>Sin encabezado</div></body></html>",
};

describe("crawlCourses", () => {
  beforeEach(() => {
    resetMetricsForTests();
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    resetMetricsForTests();
  });

  it("follows pagination and keeps only validated course pages", async () => {
    const visits: string[] = [];
    const result = await crawlCourses(site, createGraphFetcher(catalog, visits), { maxPages: 20 });

    expect(visits).toEqual([
      `${BASE}/programas`,
      `${BASE}/analitica-datos`,
      `${BASE}/gestion-proyectos-agiles`,
      `${BASE}/programas?page=2`,
      `${BASE}/filtro-tipo`,
      `${BASE}/marketing-digital-estrategico`,
      `${BASE}/sin-titulo`,
    ]);
    expect([...result.dictionary.keys()]).toEqual([
      "analitica-datos",
      "gestion-proyectos-agiles",
      "marketing-digital-estrategico",
    ]);
    expect(result.dictionary.get("gestion-proyectos-agiles")).toEqual({
      id: "gestion-proyectos-agiles",
      url: `${BASE}/gestion-proyectos-agiles`,
      title: "Gestion de Proyectos Agiles",
      description: "Metodologias scrum y kanban para la gestion efectiva de proyectos.",
      words: new Set(["gestion", "proyectos", "agiles", "metodologias", "scrum", "kanban", "efectiva"]),
    });
    expect(result.stats).toMatchObject({
      fetchedPages: 7,
      failedFetches: 0,
      enqueuedPages: 7,
      visitedPages: 7,
      records: 3,
      duplicateRecords: 0,
      rejected: { syntactic: 2, structural: 1, semantic: 1 },
      termination: "frontier",
    });
    expect(result.rows).toHaveLength(6 + 7 + 9);
    expect(result.rows[0]).toEqual({ courseId: "analitica-datos", word: "analitica" });
  });

  it("stops at the page budget", async () => {
    const result = await crawlCourses(site, createGraphFetcher(catalog), { maxPages: 2 });

    expect([...result.dictionary.keys()]).toEqual(["analitica-datos"]);
    expect(result.stats.fetchedPages).toBe(2);
    expect(result.stats.termination).toBe("budget");
  });

  it("keeps the first record when two pages share a slug", async () => {
    const result = await crawlCourses(site, createGraphFetcher({
      [`${BASE}/programas`]: listingPageHtml(["/a/ciencia-datos", "/b/ciencia-datos"]),
      [`${BASE}/a/ciencia-datos`]: coursePageHtml(
        "Ciencia de Datos",
        "Estadistica, aprendizaje automatico y visualizacion para analistas.",
      ),
      [`${BASE}/b/ciencia-datos`]: coursePageHtml(
        "Ciencia de Datos Avanzada",
        "Modelos predictivos, series de tiempo y despliegue de soluciones.",
      ),
    }), { maxPages: 10 });

    expect(result.dictionary.size).toBe(1);
    expect(result.dictionary.get("ciencia-datos")?.url).toBe(`${BASE}/a/ciencia-datos`);
    expect(result.stats.duplicateRecords).toBe(1);
  });

  it("skips failed fetches and reports every node", async () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const nodes: CrawlNode[] = [];
    const result = await crawlCourses(site, createGraphFetcher({
      [`${BASE}/programas`]: listingPageHtml(["/caido", "/analitica-datos"]),
      [`${BASE}/analitica-datos`]: catalog[`${BASE}/analitica-datos`],
    }), { maxPages: 10, onNode: (node) => { nodes.push(node); } });

    expect(result.stats.failedFetches).toBe(1);
    expect(result.stats.records).toBe(1);
    expect(nodes.map((node) => [node.url, node.success])).toEqual([
      [`${BASE}/programas`, true],
      [`${BASE}/caido`, false],
      [`${BASE}/analitica-datos`, true],
    ]);
    expect(warnSpy).toHaveBeenCalledWith("Skipping page:", {
      url: `${BASE}/caido`,
      error: `404: ${BASE}/caido`,
    });
  });

  it("honours a custom minimum word count", async () => {
    const result = await crawlCourses(site, createGraphFetcher(catalog), {
      maxPages: 20,
      minWords: 8,
    });

    expect([...result.dictionary.keys()]).toEqual(["marketing-digital-estrategico"]);
    expect(result.stats.rejected.semantic).toBe(3);
  });

  it("never accepts a record without index words", async () => {
    const result = await crawlCourses({ ...site, seedUrls: [`${BASE}/curso-x`] }, createGraphFetcher({
      [`${BASE}/curso-x`]: coursePageHtml("De la Para Con", "de la para con los las del por una que el en y"),
    }), { maxPages: 5, minWords: 0 });

    expect(result.dictionary.size).toBe(0);
    expect(result.rows).toEqual([]);
    expect(result.stats.rejected.semantic).toBe(1);
  });

  it("produces the same dictionary and index on every run over a static site", async () => {
    const first = await crawlCourses(site, createGraphFetcher(catalog), { maxPages: 20 });
    const second = await crawlCourses(site, createGraphFetcher(catalog), { maxPages: 20 });

    expect([...second.dictionary.keys()]).toEqual([...first.dictionary.keys()]);
    for (const [id, record] of first.dictionary) {
      expect(second.dictionary.get(id)?.words).toEqual(record.words);
    }
    expect(second.rows).toEqual(first.rows);
  });

  it("logs a summary event and records metrics", async () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    await crawlCourses(site, createGraphFetcher(catalog), { maxPages: 20 });

    const lastLine = String(logSpy.mock.calls[logSpy.mock.calls.length - 1]?.[0]);
    expect(JSON.parse(lastLine)).toMatchObject({
      event: "crawl_complete",
      fetched_pages: 7,
      records: 3,
      termination: "frontier",
    });
    const snapshot = buildMetricsSnapshot();
    expect(snapshot.counters).toMatchObject({
      crawl_runs: 1,
      pages_fetched: 7,
      records_accepted: 3,
      records_rejected: 4,
    });
    expect(snapshot.latency_ms.crawl.count).toBe(1);
  });
});
