import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import { isTag, type AnyNode, type Element } from "domhandler";

import { MalformedDocumentError } from "../services/errors";

// Every structural edit in the pipeline slices the original source by the
// parser's node offsets, so nothing outside an edited range is re-serialized.

export const VOID_TAGS = new Set([
  "area",
  "base",
  "br",
  "col",
  "embed",
  "hr",
  "img",
  "input",
  "link",
  "meta",
  "param",
  "source",
  "track",
  "wbr",
]);

export interface SourceRange {
  start: number;
  /** exclusive */
  end: number;
}

export interface SourceEdit extends SourceRange {
  text: string;
}

export interface ParsedHtml {
  $: CheerioAPI;
  source: string;
}

export const parseHtml = (source: string): ParsedHtml => {
  const $ = cheerio.load(
    source,
    {
      xml: {
        xmlMode: false,
        withStartIndices: true,
        withEndIndices: true,
        recognizeSelfClosing: true,
        lowerCaseTags: true,
        lowerCaseAttributeNames: true,
      },
    },
    false,
  );
  return { $, source };
};

export const rootNodes = ({ $ }: ParsedHtml): AnyNode[] => {
  const root = $.root().get(0);
  return root ? [...root.children] : [];
};

export const nodeRange = (node: AnyNode): SourceRange => {
  if (node.startIndex === null || node.endIndex === null) {
    throw new MalformedDocumentError("Parser did not report source positions");
  }
  return { start: node.startIndex, end: node.endIndex + 1 };
};

const escapeRegExp = (value: string): string =>
  value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * Index of the `>` closing the start tag that begins at `start`, or -1.
 * Quotes only count once they open an attribute value.
 */
export const findOpenTagEnd = (source: string, start: number): number => {
  let quote: string | null = null;
  let afterEquals = false;
  for (let i = start + 1; i < source.length; i += 1) {
    const char = source[i];
    if (quote) {
      if (char === quote) quote = null;
      continue;
    }
    if (char === ">") return i;
    if ((char === '"' || char === "'") && afterEquals) {
      quote = char;
      afterEquals = false;
      continue;
    }
    if (char === "=") {
      afterEquals = true;
      continue;
    }
    if (!/\s/.test(char)) afterEquals = false;
  }
  return -1;
};

export interface ElementLayout {
  outer: SourceRange;
  openTag: SourceRange;
  /** null for void and self-closed elements */
  content: SourceRange | null;
}

export const describeElement = (source: string, element: Element): ElementLayout => {
  const outer = nodeRange(element);
  const slice = source.slice(outer.start, outer.end);
  const opener = new RegExp(`^<${escapeRegExp(element.name)}(?=[\\s/>])`, "i");
  if (!opener.test(slice)) {
    throw new MalformedDocumentError(
      `Unexpected markup ${JSON.stringify(slice.slice(0, 20))} at offset ${outer.start}`,
    );
  }

  const openEnd = findOpenTagEnd(source, outer.start);
  if (openEnd < 0 || openEnd >= outer.end) {
    throw new MalformedDocumentError(
      `Start tag <${element.name}> at offset ${outer.start} is not terminated`,
    );
  }
  const openTag = { start: outer.start, end: openEnd + 1 };

  const isVoid = VOID_TAGS.has(element.name);
  const selfClosed = source[openEnd - 1] === "/" && openTag.end === outer.end;
  if (isVoid || selfClosed) {
    if (openTag.end !== outer.end) {
      throw new MalformedDocumentError(
        `Void element <${element.name}> at offset ${outer.start} has content`,
      );
    }
    return { outer, openTag, content: null };
  }

  const closer = new RegExp(`</${escapeRegExp(element.name)}\\s*>$`, "i").exec(slice);
  if (!closer || outer.end - closer[0].length < openTag.end) {
    throw new MalformedDocumentError(
      `Element <${element.name}> at offset ${outer.start} is not closed`,
    );
  }
  return {
    outer,
    openTag,
    content: { start: openTag.end, end: outer.end - closer[0].length },
  };
};

/**
 * Checks that `nodes` cover `range` exactly and that every element among them
 * (recursively) is explicitly closed. Gaps between siblings are markup the
 * parser dropped, such as stray end tags. Subtrees for which `isOpaque`
 * returns true are checked for closure but not descended into.
 */
export const assertWellFormed = (
  source: string,
  nodes: readonly AnyNode[],
  range: SourceRange,
  isOpaque: (node: Element) => boolean = () => false,
): void => {
  let cursor = range.start;
  for (const node of nodes) {
    const { start, end } = nodeRange(node);
    if (start !== cursor) {
      throw new MalformedDocumentError(
        `Unexpected markup ${JSON.stringify(source.slice(cursor, start).slice(0, 20))} at offset ${cursor}`,
      );
    }
    if (isTag(node)) {
      const layout = describeElement(source, node);
      if (layout.content && !isOpaque(node)) {
        assertWellFormed(source, node.children, layout.content, isOpaque);
      }
    }
    cursor = end;
  }
  if (cursor !== range.end) {
    throw new MalformedDocumentError(
      `Unexpected markup ${JSON.stringify(source.slice(cursor, range.end).slice(0, 20))} at offset ${cursor}`,
    );
  }
};

/** Applies non-overlapping edits, last offset first. */
export const applyEdits = (source: string, edits: readonly SourceEdit[]): string => {
  const ordered = [...edits].sort((a, b) => b.start - a.start);
  let result = source;
  let limit = source.length;
  for (const edit of ordered) {
    if (edit.end > limit || edit.start > edit.end) {
      throw new Error(`Overlapping edit at offset ${edit.start}`);
    }
    result = result.slice(0, edit.start) + edit.text + result.slice(edit.end);
    limit = edit.start;
  }
  return result;
};

export const escapeHtmlText = (value: string): string =>
  value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");

export const escapeHtmlAttribute = (value: string): string =>
  escapeHtmlText(value).replace(/"/g, "&quot;");

const ATTRIBUTE_VALUE = String.raw`(?:"[^"]*"|'[^']*'|[^\s"'=<>\x60]+)`;

/**
 * Sets (or adds) an attribute on a start tag without touching its other
 * attributes.
 */
export const setTagAttribute = (openTag: string, name: string, value: string): string => {
  const quoted = `"${escapeHtmlAttribute(value)}"`;
  const existing = new RegExp(
    `(\\s${escapeRegExp(name)}\\s*=\\s*)${ATTRIBUTE_VALUE}`,
    "i",
  );
  if (existing.test(openTag)) {
    return openTag.replace(existing, (_match, head: string) => `${head}${quoted}`);
  }
  const bare = new RegExp(`\\s${escapeRegExp(name)}(?=[\\s/>])`, "i");
  if (bare.test(openTag)) {
    return openTag.replace(bare, (match) => `${match}=${quoted}`);
  }
  return openTag.replace(/\s*(\/?)>$/, (_match, slash: string) =>
    ` ${name}=${quoted}${slash ? " /" : ""}>`,
  );
};
