import type { CheerioAPI } from "cheerio";
import { isCDATA, isComment, isTag, type AnyNode, type Element } from "domhandler";

export type ProtectedZoneKind =
  | "math"
  | "code"
  | "script"
  | "style"
  | "comment"
  | "raw_html";

export interface ProtectionRule {
  kind: Exclude<ProtectedZoneKind, "comment">;
  selector: string;
}

// Order matters: the first rule whose selector matches decides the kind, so
// math scripts are claimed before the generic script rule.
export const DEFAULT_PROTECTION_RULES: readonly ProtectionRule[] = Object.freeze([
  {
    kind: "math",
    selector: [
      "mjx-container",
      "math",
      "d-math",
      ".MathJax",
      ".MathJax_Display",
      ".MathJax_Preview",
      ".katex",
      ".katex-display",
      'script[type^="math/tex"]',
    ].join(", "),
  },
  {
    kind: "code",
    selector: [
      "pre",
      "code",
      "kbd",
      "samp",
      "d-code",
      ".highlight",
      ".highlighter-rouge",
      ".sourceCode",
    ].join(", "),
  },
  { kind: "script", selector: "script" },
  { kind: "style", selector: "style" },
  {
    kind: "raw_html",
    selector: "svg, iframe, noscript, template, canvas, object, video, audio",
  },
]);

export type ProtectionMatcher = (node: AnyNode) => ProtectedZoneKind | null;

export const createProtectionMatcher = (
  $: CheerioAPI,
  rules: readonly ProtectionRule[] = DEFAULT_PROTECTION_RULES,
): ProtectionMatcher => {
  return (node) => {
    if (isComment(node) || isCDATA(node)) return "comment";
    if (!isTag(node)) return null;
    const selection = $(node);
    const rule = rules.find((candidate) => selection.is(candidate.selector));
    return rule ? rule.kind : null;
  };
};

export const isOpaqueElement =
  (matcher: ProtectionMatcher) =>
  (element: Element): boolean =>
    matcher(element) !== null;
