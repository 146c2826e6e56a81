import { hasChildren, type AnyNode } from "domhandler";

import {
  DanglingPlaceholderError,
  UnresolvedZoneError,
} from "../errors";
import {
  applyEdits,
  nodeRange,
  parseHtml,
  rootNodes,
  type SourceEdit,
} from "../../utils/htmlSource";
import {
  createProtectionMatcher,
  DEFAULT_PROTECTION_RULES,
  type ProtectedZoneKind,
  type ProtectionMatcher,
  type ProtectionRule,
} from "./protection";

export interface ProtectedZone {
  placeholderId: number;
  token: string;
  kind: ProtectedZoneKind;
  originalContent: string;
  /** Offset of the zone in the body it was extracted from. */
  position: number;
}

const TOKEN_PREFIX: Record<ProtectedZoneKind, string> = {
  math: "MATH",
  code: "CODE",
  script: "SCRIPT",
  style: "STYLE",
  comment: "COMMENT",
  raw_html: "RAW_HTML",
};

export const PLACEHOLDER_ID_WIDTH = 3;

// No word boundaries: a token runs straight into neighbouring text, as in
// `CODE_PLACEHOLDER_000s` for `<code>Tensor</code>s`.
const PLACEHOLDER_SOURCE = String.raw`(?:MATH|CODE|SCRIPT|STYLE|COMMENT|RAW_HTML)_PLACEHOLDER_\d{3,}`;

/** Fresh global regex per call so `lastIndex` never leaks between scans. */
export const placeholderPattern = (): RegExp => new RegExp(PLACEHOLDER_SOURCE, "g");

export const formatPlaceholderToken = (
  kind: ProtectedZoneKind,
  id: number,
  width = PLACEHOLDER_ID_WIDTH,
): string => `${TOKEN_PREFIX[kind]}_PLACEHOLDER_${String(id).padStart(width, "0")}`;

export class PlaceholderStore {
  private readonly zones = new Map<string, ProtectedZone>();
  private nextId = 0;
  private tokenSource: string | null = null;

  constructor(private readonly rules: readonly ProtectionRule[] = DEFAULT_PROTECTION_RULES) {}

  get size(): number {
    return this.zones.size;
  }

  list(): ProtectedZone[] {
    return Array.from(this.zones.values());
  }

  tokens(): string[] {
    return Array.from(this.zones.keys());
  }

  get(token: string): ProtectedZone | undefined {
    return this.zones.get(token);
  }

  extract(
    kind: ProtectedZoneKind,
    rawFragment: string,
    position = 0,
    idWidth = PLACEHOLDER_ID_WIDTH,
  ): ProtectedZone {
    const placeholderId = this.nextId;
    this.nextId += 1;
    const zone: ProtectedZone = Object.freeze({
      placeholderId,
      token: formatPlaceholderToken(kind, placeholderId, idWidth),
      kind,
      originalContent: rawFragment,
      position,
    });
    this.zones.set(zone.token, zone);
    this.tokenSource = null;
    return zone;
  }

  /**
   * Placeholder tokens in `text`, in order. Stored tokens win over the
   * generic shape, so `CODE_PLACEHOLDER_0002` reads as the stored
   * `CODE_PLACEHOLDER_000` followed by a digit. Anything else shaped like a
   * token is reported as found, so `restore` can reject it.
   */
  findTokens(text: string): string[] {
    return Array.from(text.matchAll(this.tokenPattern()), (match) => match[0]);
  }

  /**
   * Replaces every outermost protected node of `bodyHtml` with a placeholder
   * token. Tokens are plain text, so a second pass over the result finds
   * nothing new.
   */
  substituteAll(bodyHtml: string): string {
    const parsed = parseHtml(bodyHtml);
    const matcher = createProtectionMatcher(parsed.$, this.rules);
    const found = collectProtected(rootNodes(parsed), matcher);
    // One width per pass, so no token of the pass is a prefix of another.
    const idWidth = Math.max(
      PLACEHOLDER_ID_WIDTH,
      String(this.nextId + found.length - 1).length,
    );
    const edits: SourceEdit[] = [];
    for (const { node, kind } of found) {
      const { start, end } = nodeRange(node);
      const zone = this.extract(kind, bodyHtml.slice(start, end), start, idWidth);
      edits.push({ start, end, text: zone.token });
    }
    return applyEdits(bodyHtml, edits);
  }

  restore(text: string): string {
    const seen = new Set<string>();
    for (const token of this.findTokens(text)) {
      if (!this.zones.has(token)) {
        throw new DanglingPlaceholderError(token, "unknown");
      }
      if (seen.has(token)) {
        throw new DanglingPlaceholderError(token, "duplicated");
      }
      seen.add(token);
    }

    const missing = this.tokens().filter((token) => !seen.has(token));
    if (missing.length) {
      throw new UnresolvedZoneError(missing);
    }

    // Function replacement keeps `$&`-style sequences in the markup literal.
    return text.replace(this.tokenPattern(), (token) => {
      const zone = this.zones.get(token);
      return zone ? zone.originalContent : token;
    });
  }

  private tokenPattern(): RegExp {
    if (this.tokenSource === null) {
      const known = this.tokens().sort((a, b) => b.length - a.length);
      this.tokenSource = [...known, PLACEHOLDER_SOURCE].join("|");
    }
    return new RegExp(this.tokenSource, "g");
  }
}

const collectProtected = (
  nodes: readonly AnyNode[],
  matcher: ProtectionMatcher,
  into: Array<{ node: AnyNode; kind: ProtectedZoneKind }> = [],
): Array<{ node: AnyNode; kind: ProtectedZoneKind }> => {
  for (const node of nodes) {
    const kind = matcher(node);
    if (kind) {
      into.push({ node, kind });
      continue;
    }
    if (hasChildren(node)) {
      collectProtected(node.children, matcher, into);
    }
  }
  return into;
};
