import { readFile } from "node:fs/promises";

/**
 * Local file name for a page: the last path segment plus `.html`, so
 * `https://host/book/roofline/` becomes `roofline.html`.
 */
export const fileNameForUrl = (url: string): string => {
  const { pathname } = new URL(url);
  const segments = pathname.split("/").filter(Boolean);
  const last = segments[segments.length - 1];
  if (!last) {
    return "index.html";
  }
  const decoded = decodeURIComponent(last).replace(/[^\w.-]+/g, "-");
  return /\.html?$/i.test(decoded) ? decoded.replace(/\.htm$/i, ".html") : `${decoded}.html`;
};

/** Scheme, host and path without a trailing slash; query and hash dropped. */
export const normalizePageUrl = (url: string): string => {
  const parsed = new URL(url);
  const pathname = parsed.pathname.replace(/\/+$/, "");
  return `${parsed.protocol}//${parsed.host}${pathname}`;
};

/**
 * File names for the pages of one run, assigned in list order. A page whose
 * name is already taken gets a `_N` suffix, so `/a/index/` and `/b/index/`
 * become `index.html` and `index_1.html`.
 */
export class PageFileNames {
  private readonly names = new Map<string, string>();

  constructor(urls: readonly string[] = []) {
    const taken = new Set<string>();
    for (const url of urls) {
      const key = normalizePageUrl(url);
      if (this.names.has(key)) continue;
      const base = fileNameForUrl(url);
      let name = base;
      // Case-insensitive file systems treat `Page.html` and `page.html` alike.
      for (let counter = 1; taken.has(name.toLowerCase()); counter += 1) {
        name = base.replace(/(\.html)$/i, `_${counter}$1`);
      }
      taken.add(name.toLowerCase());
      this.names.set(key, name);
    }
  }

  /** Name assigned to a run page, or undefined for pages outside the run. */
  get(url: string): string | undefined {
    return this.names.get(normalizePageUrl(url));
  }

  resolve(url: string): string {
    return this.get(url) ?? fileNameForUrl(url);
  }
}

export const parseUrlList = (contents: string): string[] => {
  const seen = new Set<string>();
  const urls: string[] = [];
  for (const line of contents.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const url = new URL(trimmed).toString();
    if (seen.has(url)) continue;
    seen.add(url);
    urls.push(url);
  }
  return urls;
};

export const loadUrlList = async (filePath: string): Promise<string[]> =>
  parseUrlList(await readFile(filePath, "utf8"));
