export interface UrlFilterContext {
  url: string;
  depth: number;
  parentUrl?: string;
  domain: string;
  contentType?: string;
}

export type UrlFilter = (
  url: string,
  context: UrlFilterContext,
) => boolean | Promise<boolean>;

function wildcardToRegex(pattern: string): RegExp {
  const escaped = pattern
    .replace(/[.+^${}()|[\]\\]/g, "\\$&")
    .replace(/\*/g, ".*")
    .replace(/\?/g, ".");
  return new RegExp(`^${escaped}$`, "i");
}

function compilePatterns(patterns: readonly string[]): RegExp[] {
  return patterns
    .map((pattern) => pattern.trim())
    .filter(Boolean)
    .map((pattern) => wildcardToRegex(pattern));
}

/** True when the URL matches any of the wildcard patterns. */
export function matchesAnyPattern(url: string, patterns: readonly string[]): boolean {
  return compilePatterns(patterns).some((regex) => regex.test(url));
}

/** Lowercased host of a bare host name or of a URL, without trailing dots. */
function hostOf(value: string): string | null {
  const trimmed = value.trim();
  if (!trimmed) return null;
  try {
    const url = new URL(trimmed.includes("://") ? trimmed : `https://${trimmed}`);
    return url.hostname.toLowerCase().replace(/\.+$/, "");
  } catch {
    return null;
  }
}

export class FilterChain {
  private readonly filters: UrlFilter[];

  constructor(filters: UrlFilter[] = []) {
    this.filters = [...filters];
  }

  add(filter: UrlFilter): FilterChain {
    return new FilterChain([...this.filters, filter]);
  }

  async test(url: string, context: UrlFilterContext): Promise<boolean> {
    for (const filter of this.filters) {
      const allowed = await filter(url, context);
      if (!allowed) return false;
    }
    return true;
  }
}

/** Passes URLs matching any pattern; an empty list passes everything. */
export function createUrlPatternFilter(patterns: readonly string[]): UrlFilter {
  const compiled = compilePatterns(patterns);
  if (compiled.length === 0) {
    return async () => true;
  }
  return async (url) => compiled.some((regex) => regex.test(url));
}

/** Keeps URLs on the catalog host or one of its subdomains. */
export function createDomainFilter(domain: string): UrlFilter {
  const catalogHost = hostOf(domain);
  if (!catalogHost) return async () => true;
  return async (url) => {
    const host = hostOf(url);
    if (!host || !/^https?:\/\//i.test(url)) return false;
    return host === catalogHost || host.endsWith(`.${catalogHost}`);
  };
}

/**
 * Keeps links that look like catalog pages: no mail addresses, and a path that
 * is a directory, has no extension, or ends in .html/.htm.
 */
export function createPageLinkFilter(): UrlFilter {
  return async (url) => {
    if (url.includes("@") || url.toLowerCase().includes("mailto:")) return false;
    let path = "";
    try {
      path = new URL(url).pathname.toLowerCase();
    } catch {
      return false;
    }
    if (path === "" || path.endsWith("/")) return true;
    const lastSegment = path.split("/").pop() ?? "";
    if (!lastSegment.includes(".")) return true;
    return lastSegment.endsWith(".html") || lastSegment.endsWith(".htm");
  };
}

export function createContentTypeFilter(allowedTypes: readonly string[]): UrlFilter {
  const normalized = allowedTypes
    .map((item) => item.trim().toLowerCase())
    .filter(Boolean);
  if (normalized.length === 0) {
    return async () => true;
  }
  return async (_url, context) => {
    if (!context.contentType) return true;
    const lower = context.contentType.toLowerCase();
    return normalized.some((allowed) => lower.includes(allowed));
  };
}
