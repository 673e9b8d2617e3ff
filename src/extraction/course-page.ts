import { Readability } from "@mozilla/readability";
import { MAX_DESCRIPTION_BLOCKS, MIN_PARAGRAPH_CHARS } from "../config";
import { errorMessage } from "../errors";
import { parseDocument, textOf } from "./dom";

export type DescriptionSource =
  | "meta"
  | "justified"
  | "container"
  | "paragraphs"
  | "readability"
  | "none";

export interface CoursePage {
  title: string;
  description: string;
  /** Description blocks in page order, at most MAX_DESCRIPTION_BLOCKS. */
  blocks: string[];
  descriptionSource: DescriptionSource;
}

const MIN_BLOCK_CHARS = 30;
const CONTAINER_SELECTOR = ".description p, .course-content p, .content p";
const METADATA_MARKERS = [
  "Duración:",
  "Precio:",
  "Fecha:",
  "Nivel:",
  "Modalidad:",
  "Horario:",
  "Copyright",
  "©",
];

function clean(value: string | null | undefined): string {
  return (value ?? "").replace(/\s+/g, " ").trim();
}

function metaContent(document: Document, selectors: string[]): string {
  for (const selector of selectors) {
    const content = clean(document.querySelector(selector)?.getAttribute("content"));
    if (content) return content;
  }
  return "";
}

function isMetadataLine(text: string): boolean {
  return METADATA_MARKERS.some((marker) => text.includes(marker));
}

function collectBlocks(
  elements: Iterable<Element>,
  accept: (text: string) => boolean,
): string[] {
  const blocks: string[] = [];
  for (const element of elements) {
    const text = textOf(element);
    if (!accept(text) || blocks.includes(text)) continue;
    blocks.push(text);
    if (blocks.length >= MAX_DESCRIPTION_BLOCKS) break;
  }
  return blocks;
}

function extractTitle(document: Document): string {
  const heading = textOf(document.querySelector("h1"));
  if (heading) return heading;
  const ogTitle = metaContent(document, ['meta[property="og:title"]']);
  if (ogTitle) return ogTitle;
  return clean(document.querySelector("title")?.textContent);
}

function readabilityText(html: string): string {
  try {
    const article = new Readability(parseDocument(html)).parse();
    return clean(article?.textContent);
  } catch (error) {
    console.warn("Readability extraction failed:", errorMessage(error));
    return "";
  }
}

function extractDescription(
  document: Document,
  html: string,
): { blocks: string[]; source: DescriptionSource } {
  const meta = metaContent(document, [
    'meta[name="description"]',
    'meta[property="og:description"]',
  ]);
  if (meta) return { blocks: [meta], source: "meta" };

  const paragraphs = Array.from(document.querySelectorAll("p"));
  const justified = collectBlocks(
    paragraphs.filter((p) => /justify/i.test(p.getAttribute("style") ?? "")),
    (text) => text.length > MIN_BLOCK_CHARS,
  );
  if (justified.length > 0) return { blocks: justified, source: "justified" };

  const container = collectBlocks(
    document.querySelectorAll(CONTAINER_SELECTOR),
    (text) => text.length > MIN_BLOCK_CHARS,
  );
  if (container.length > 0) return { blocks: container, source: "container" };

  const long = collectBlocks(
    paragraphs,
    (text) => text.length > MIN_PARAGRAPH_CHARS && !isMetadataLine(text),
  );
  if (long.length > 0) return { blocks: long, source: "paragraphs" };

  const article = readabilityText(html);
  if (article) return { blocks: [article], source: "readability" };

  return { blocks: [], source: "none" };
}

/** Pulls the title and description of a course detail page. */
export function extractCoursePage(html: string): CoursePage {
  if (!html.trim()) {
    return { title: "", description: "", blocks: [], descriptionSource: "none" };
  }
  const document = parseDocument(html);
  const title = extractTitle(document);
  const { blocks, source } = extractDescription(document, html);
  return {
    title,
    description: blocks.join(" "),
    blocks,
    descriptionSource: source,
  };
}
