import type { CheerioAPI } from "cheerio";
import type { Element } from "domhandler";

import { MalformedDocumentError } from "../errors";
import {
  assertWellFormed,
  describeElement,
  findOpenTagEnd,
  nodeRange,
  parseHtml,
  rootNodes,
  type SourceRange,
} from "../../utils/htmlSource";
import { layoutBody, type BodyLayout } from "./bodyLayout";
import { PlaceholderStore } from "./placeholderStore";
import {
  createProtectionMatcher,
  DEFAULT_PROTECTION_RULES,
  isOpaqueElement,
  type ProtectionRule,
} from "./protection";

export interface DocumentMetadata {
  title: string | null;
  description: string | null;
}

export interface HeadSlots {
  /** Text content of `<title>` */
  title: SourceRange | null;
  /** The whole `<meta name="description">` tag */
  description: SourceRange | null;
  /** The `<html ...>` start tag */
  htmlOpenTag: SourceRange | null;
}

export interface SegmentedDocument {
  source: string;
  /** Inner content of `<body>`, or the whole source for fragments. */
  bodyRange: SourceRange;
  metadata: DocumentMetadata;
  headSlots: HeadSlots;
  body: string;
  placeholderedBody: string;
  layout: BodyLayout;
  store: PlaceholderStore;
}

export interface SegmentOptions {
  protectionRules?: readonly ProtectionRule[];
}

const normalizeWhitespace = (value: string): string => value.replace(/\s+/g, " ").trim();

const outsideBody = ($: CheerioAPI, selector: string): Element | null => {
  const match = $<Element, string>(selector)
    .toArray()
    .find((element) => $(element).closest("body").length === 0);
  return match ?? null;
};

const readHead = ($: CheerioAPI, source: string) => {
  const slots: HeadSlots = { title: null, description: null, htmlOpenTag: null };
  const metadata: DocumentMetadata = { title: null, description: null };

  const title = outsideBody($, "title");
  if (title) {
    const { content } = describeElement(source, title);
    const text = normalizeWhitespace($(title).text());
    if (content && text) {
      slots.title = content;
      metadata.title = text;
    }
  }

  const meta = outsideBody($, 'meta[name="description" i]');
  if (meta) {
    const text = normalizeWhitespace($(meta).attr("content") ?? "");
    if (text) {
      slots.description = nodeRange(meta);
      metadata.description = text;
    }
  }

  const html = $("html").get(0);
  if (html) {
    const { start } = nodeRange(html);
    const end = findOpenTagEnd(source, start);
    if (end < 0) {
      throw new MalformedDocumentError("Start tag <html> is not terminated");
    }
    slots.htmlOpenTag = { start, end: end + 1 };
  }

  return { slots, metadata };
};

/**
 * Splits a document into head metadata and a placeholdered body ready for
 * chunking. Input without `<html>`, `<head>` or `<body>` is taken as a body
 * fragment.
 */
export const segment = (rawHtml: string, options: SegmentOptions = {}): SegmentedDocument => {
  if (!rawHtml.trim()) {
    throw new MalformedDocumentError("Document is empty");
  }

  const rules = options.protectionRules ?? DEFAULT_PROTECTION_RULES;
  const parsed = parseHtml(rawHtml);
  const { $ } = parsed;
  const isOpaque = isOpaqueElement(createProtectionMatcher($, rules));

  const bodyElement = $("body").get(0);
  let bodyRange: SourceRange;
  let head: ReturnType<typeof readHead>;

  if (bodyElement) {
    const { content } = describeElement(rawHtml, bodyElement);
    if (!content) {
      throw new MalformedDocumentError("<body> has no content range");
    }
    assertWellFormed(rawHtml, bodyElement.children, content, isOpaque);
    bodyRange = content;
    head = readHead($, rawHtml);
  } else {
    if ($("html, head").length > 0) {
      throw new MalformedDocumentError("Document has no <body> element");
    }
    bodyRange = { start: 0, end: rawHtml.length };
    assertWellFormed(rawHtml, rootNodes(parsed), bodyRange, isOpaque);
    head = {
      slots: { title: null, description: null, htmlOpenTag: null },
      metadata: { title: null, description: null },
    };
  }

  const body = rawHtml.slice(bodyRange.start, bodyRange.end);
  const store = new PlaceholderStore(rules);
  const placeholderedBody = store.substituteAll(body);

  return {
    source: rawHtml,
    bodyRange,
    metadata: head.metadata,
    headSlots: head.slots,
    body,
    placeholderedBody,
    layout: layoutBody(placeholderedBody),
    store,
  };
};
