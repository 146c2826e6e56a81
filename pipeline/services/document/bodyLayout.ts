import { hasChildren, isTag, type AnyNode, type Element } from "domhandler";

import {
  describeElement,
  nodeRange,
  parseHtml,
  rootNodes,
  type SourceRange,
} from "../../utils/htmlSource";
import { placeholderPattern } from "./placeholderStore";

export const BLOCK_TAGS: ReadonlySet<string> = new Set([
  "address",
  "article",
  "aside",
  "blockquote",
  "body",
  "caption",
  "d-appendix",
  "d-article",
  "d-byline",
  "d-contents",
  "d-footnote-list",
  "d-title",
  "dd",
  "details",
  "dialog",
  "div",
  "dl",
  "dt",
  "fieldset",
  "figcaption",
  "figure",
  "footer",
  "form",
  "h1",
  "h2",
  "h3",
  "h4",
  "h5",
  "h6",
  "header",
  "hgroup",
  "hr",
  "li",
  "main",
  "nav",
  "ol",
  "p",
  "section",
  "summary",
  "table",
  "tbody",
  "td",
  "tfoot",
  "th",
  "thead",
  "tr",
  "ul",
]);

export type LayoutPart =
  | { kind: "markup"; html: string }
  | { kind: "block"; blockIndex: number };

export interface BodyLayout {
  parts: LayoutPart[];
  /** Translatable block texts, in document order. */
  blocks: string[];
}

const isBlock = (node: AnyNode): node is Element => isTag(node) && BLOCK_TAGS.has(node.name);

const containsBlock = (node: AnyNode): boolean =>
  hasChildren(node) && node.children.some((child) => isBlock(child) || containsBlock(child));

const hasTranslatableText = (html: string): boolean => {
  const visible = html
    .replace(placeholderPattern(), " ")
    .replace(/<[^>]*>/g, " ")
    .replace(/&[#a-zA-Z0-9]+;/g, " ");
  return /\p{L}/u.test(visible);
};

/**
 * Splits a placeholdered body into pass-through markup and translatable
 * blocks. `parts` concatenated with each block's own text reproduce the body,
 * except that blank lines inside a block are collapsed, since the blank line
 * separates blocks inside a chunk.
 */
export const layoutBody = (placeholderedBody: string): BodyLayout => {
  const parsed = parseHtml(placeholderedBody);
  const source = placeholderedBody;
  const parts: LayoutPart[] = [];
  const blocks: string[] = [];

  const pushMarkup = (html: string) => {
    if (!html) return;
    const last = parts[parts.length - 1];
    if (last && last.kind === "markup") {
      last.html += html;
    } else {
      parts.push({ kind: "markup", html });
    }
  };

  const pushRun = ({ start, end }: SourceRange) => {
    const raw = source.slice(start, end);
    const leading = /^\s*/.exec(raw)?.[0] ?? "";
    const body = raw.slice(leading.length).trimEnd();
    const trailing = raw.slice(leading.length + body.length);
    if (!body || !hasTranslatableText(body)) {
      pushMarkup(raw);
      return;
    }
    pushMarkup(leading);
    parts.push({ kind: "block", blockIndex: blocks.length });
    blocks.push(body.replace(/\n[ \t]*(?:\n[ \t]*)+/g, "\n"));
    pushMarkup(trailing);
  };

  const walk = (nodes: readonly AnyNode[], range: SourceRange) => {
    let cursor = range.start;
    let runStart: number | null = null;

    const flush = () => {
      if (runStart !== null) {
        pushRun({ start: runStart, end: cursor });
        runStart = null;
      }
    };

    for (const node of nodes) {
      const { start, end } = nodeRange(node);
      const isContainer = isTag(node) && (isBlock(node) || containsBlock(node));
      if (!isContainer) {
        if (runStart === null) {
          pushMarkup(source.slice(cursor, start));
          runStart = start;
        }
        cursor = end;
        continue;
      }
      flush();
      pushMarkup(source.slice(cursor, start));

      const layout = describeElement(source, node);
      if (!layout.content) {
        pushMarkup(source.slice(start, end));
      } else if (containsBlock(node)) {
        pushMarkup(source.slice(layout.openTag.start, layout.openTag.end));
        walk(node.children, layout.content);
        pushMarkup(source.slice(layout.content.end, end));
      } else {
        pushMarkup(source.slice(layout.openTag.start, layout.openTag.end));
        pushRun(layout.content);
        pushMarkup(source.slice(layout.content.end, end));
      }
      cursor = end;
    }
    flush();
    pushMarkup(source.slice(cursor, range.end));
  };

  walk(rootNodes(parsed), { start: 0, end: source.length });
  return { parts, blocks };
};

export const fillLayout = (layout: BodyLayout, translatedBlocks: readonly string[]): string =>
  layout.parts
    .map((part) => {
      if (part.kind === "markup") return part.html;
      const text = translatedBlocks[part.blockIndex];
      if (text === undefined) {
        throw new RangeError(`Missing translation for block ${part.blockIndex}`);
      }
      return text;
    })
    .join("");
