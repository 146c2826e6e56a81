import type { Element } from "domhandler";

import {
  applyEdits,
  escapeHtmlAttribute,
  escapeHtmlText,
  findOpenTagEnd,
  nodeRange,
  parseHtml,
  setTagAttribute,
  type SourceEdit,
} from "../../utils/htmlSource";
import type { PageFileNames } from "../../utils/url";

export interface PostProcessContext {
  url: string;
  targetLanguage: string;
}

/** Runs on the reassembled page before it is persisted. */
export interface DocumentPostProcessor {
  readonly name: string;
  process(html: string, context: PostProcessContext): string;
}

const ASSET_ATTRIBUTES: Readonly<Record<string, readonly string[]>> = {
  a: ["href"],
  link: ["href"],
  script: ["src"],
  img: ["src", "data-src", "srcset"],
  source: ["src", "srcset"],
  video: ["src", "poster"],
  audio: ["src"],
  iframe: ["src"],
  embed: ["src"],
  object: ["data"],
  form: ["action"],
  base: ["href"],
};

// Fragments, bare queries and anything that names its own scheme.
const LEFT_AS_IS = /^(?:#|\?|[a-z][a-z\d+.-]*:)/i;

const CSS_URL = /url\(\s*(["']?)([^"')]*?)\1\s*\)/gi;

export const toAbsoluteUrl = (value: string, baseUrl: string): string => {
  const trimmed = value.trim();
  if (!trimmed || LEFT_AS_IS.test(trimmed) || !URL.canParse(trimmed, baseUrl)) {
    return value;
  }
  return new URL(trimmed, baseUrl).href;
};

/** Resolves every candidate of a `srcset`; returns the input when none moves. */
export const absolutizeSrcset = (srcset: string, baseUrl: string): string => {
  let changed = false;
  const candidates = srcset
    .split(",")
    .map((candidate) => candidate.trim())
    .filter(Boolean)
    .map((candidate) => {
      const [url = "", ...descriptors] = candidate.split(/\s+/);
      const absolute = toAbsoluteUrl(url, baseUrl);
      if (absolute !== url) changed = true;
      return [absolute, ...descriptors].join(" ");
    });
  return changed ? candidates.join(", ") : srcset;
};

export const absolutizeCssUrls = (css: string, baseUrl: string): string =>
  css.replace(CSS_URL, (match: string, quote: string, url: string) => {
    const absolute = toAbsoluteUrl(url, baseUrl);
    return absolute === url ? match : `url(${quote}${absolute}${quote})`;
  });

/**
 * Rewrites relative asset and link URLs against the page URL, so a page saved
 * away from its site still loads images, styles and scripts. Inline `style`
 * attributes and `<style>` sheets have their `url()` references resolved too.
 */
export class AssetUrlResolver implements DocumentPostProcessor {
  readonly name = "asset-url-resolver";

  process(html: string, { url }: PostProcessContext): string {
    const { $ } = parseHtml(html);
    const edits: SourceEdit[] = [];

    for (const element of $<Element, string>("*").toArray()) {
      const names = ASSET_ATTRIBUTES[element.name] ?? [];
      if (!names.length && element.attribs.style === undefined) continue;

      const { start } = nodeRange(element);
      const end = findOpenTagEnd(html, start);
      if (end < 0) continue;
      const openTag = html.slice(start, end + 1);
      let rewritten = openTag;
      for (const name of names) {
        const value = element.attribs[name];
        if (value === undefined) continue;
        const next = name === "srcset" ? absolutizeSrcset(value, url) : toAbsoluteUrl(value, url);
        if (next !== value) rewritten = setTagAttribute(rewritten, name, next);
      }
      const style = element.attribs.style;
      if (style !== undefined) {
        const next = absolutizeCssUrls(style, url);
        if (next !== style) rewritten = setTagAttribute(rewritten, "style", next);
      }
      if (rewritten !== openTag) {
        edits.push({ start, end: end + 1, text: rewritten });
      }
    }

    for (const sheet of $("style").toArray()) {
      for (const child of sheet.children) {
        const range = nodeRange(child);
        const css = html.slice(range.start, range.end);
        const next = absolutizeCssUrls(css, url);
        if (next !== css) {
          edits.push({ ...range, text: next });
        }
      }
    }
    return applyEdits(html, edits);
  }
}

/**
 * Points links to other pages of the run at their local translated copies,
 * keeping any `#fragment`.
 */
export class LinkLocalizer implements DocumentPostProcessor {
  readonly name = "link-localizer";

  constructor(private readonly pages: PageFileNames) {}

  process(html: string, { url }: PostProcessContext): string {
    const { $ } = parseHtml(html);
    const edits: SourceEdit[] = [];
    for (const anchor of $("a[href]").toArray()) {
      const href = anchor.attribs.href?.trim();
      if (!href || href.startsWith("#") || !URL.canParse(href, url)) continue;

      const target = new URL(href, url);
      if (target.protocol !== "http:" && target.protocol !== "https:") continue;
      const fileName = this.pages.get(target.href);
      if (!fileName) continue;

      const localHref = `${fileName}${target.hash}`;
      if (localHref === href) continue;
      const { start } = nodeRange(anchor);
      const end = findOpenTagEnd(html, start);
      if (end < 0) continue;
      edits.push({
        start,
        end: end + 1,
        text: setTagAttribute(html.slice(start, end + 1), "href", localHref),
      });
    }
    return applyEdits(html, edits);
  }
}

export interface HeaderLabels {
  source: string;
  translator: string;
}

export const DEFAULT_HEADER_LABELS: HeaderLabels = {
  source: "英文原文：",
  translator: "翻译：",
};

export interface HeaderInjectorOptions {
  translatorName?: string;
  labels?: HeaderLabels;
}

export const TRANSLATION_INFO_CLASS = "translation-info";

/**
 * Adds a block naming the source page (and translator, when configured) at
 * the top of the article. Pages that already carry one are left alone.
 */
export class HeaderInjector implements DocumentPostProcessor {
  readonly name = "header-injector";

  constructor(private readonly options: HeaderInjectorOptions = {}) {}

  buildHeader(url: string): string {
    const labels = this.options.labels ?? DEFAULT_HEADER_LABELS;
    const lines = [
      `<div class="${TRANSLATION_INFO_CLASS}">`,
      `  <p><span>${escapeHtmlText(labels.source)}</span><a href="${escapeHtmlAttribute(url)}" target="_blank" rel="noopener noreferrer">${escapeHtmlText(url)}</a></p>`,
    ];
    if (this.options.translatorName) {
      lines.push(
        `  <p><span>${escapeHtmlText(labels.translator)}</span>${escapeHtmlText(this.options.translatorName)}</p>`,
      );
    }
    lines.push("</div>");
    return lines.join("\n");
  }

  process(html: string, { url }: PostProcessContext): string {
    const { $ } = parseHtml(html);
    if ($(`.${TRANSLATION_INFO_CLASS}`).length) {
      return html;
    }
    const container =
      $("div.post.distill").get(0) ??
      $("d-title").first().parent().get(0) ??
      $("body").get(0);
    if (!container) {
      return html;
    }
    const end = findOpenTagEnd(html, nodeRange(container).start);
    if (end < 0) {
      return html;
    }
    return applyEdits(html, [
      { start: end + 1, end: end + 1, text: `\n${this.buildHeader(url)}\n` },
    ]);
  }
}
