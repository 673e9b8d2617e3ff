import type { CrawlPage, PageFetcher } from "../deepcrawl/bfs";
import type { CourseDictionary, CourseId, CourseRecord } from "../types";

/** In-process site: URL -> HTML. Unknown URLs fail like a 404. */
export function createGraphFetcher(
  graph: Record<string, string>,
  visits: string[] = [],
): PageFetcher {
  return async (url: string): Promise<CrawlPage> => {
    visits.push(url);
    const html = graph[url];
    if (html === undefined) {
      throw new Error(`404: ${url}`);
    }
    return { url, html, contentType: "text/html; charset=utf-8" };
  };
}

export function coursePageHtml(title: string, description: string, links: string[] = []): string {
  const anchors = links.map((href) => `<a href="${href}">${href}</a>`).join("\n");
  return `<html><head><title>${title}</title></head><body>
    <h1>${title}</h1>
    <p style="text-align:justify">${description}</p>
    ${anchors}
  </body></html>`;
}

export function listingPageHtml(links: string[]): string {
  const anchors = links.map((href) => `<li><a href="${href}">${href}</a></li>`).join("\n");
  return `<html><body><h1>Programas</h1><ul>${anchors}</ul></body></html>`;
}

export function makeDictionary(
  courses: Record<CourseId, { title?: string; words: string[] }>,
): CourseDictionary {
  const dictionary = new Map<CourseId, CourseRecord>();
  for (const [id, course] of Object.entries(courses)) {
    dictionary.set(id, {
      id,
      url: `https://catalog.example.edu/${id}`,
      title: course.title ?? id,
      description: course.words.join(" "),
      words: new Set(course.words),
    });
  }
  return dictionary;
}

/** The two-course catalog used across ranking and comparison tests. */
export const SAMPLE_COURSES = {
  "gestion-proyectos-agiles": {
    title: "Gestion de Proyectos Agiles",
    words: ["gestion", "proyectos", "agiles", "scrum", "kanban", "metodologias"],
  },
  "marketing-digital-estrategico": {
    title: "Marketing Digital Estrategico",
    words: ["marketing", "digital", "seo", "sem", "redes", "sociales", "metricas"],
  },
};

export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}
