import { parseHTML } from "linkedom";

/**
 * Parses markup into a DOM document. Fragments are wrapped so that
 * querySelector works the same on partial and full pages.
 */
export function parseDocument(html: string): Document {
  const wrapped = html.includes("<html")
    ? html
    : `<html><head></head><body>${html}</body></html>`;
  const { document } = parseHTML(wrapped);
  // linkedom implements the DOM interfaces but ships its own class types
  return document as unknown as Document;
}

export function textOf(node: Element | null | undefined): string {
  return (node?.textContent ?? "").replace(/\s+/g, " ").trim();
}
