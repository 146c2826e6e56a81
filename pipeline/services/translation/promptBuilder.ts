import { selectRelevantTerms, type Terminology } from "../../config/terminology";
import type { TranslationRequest } from "./oracle";

const GENERAL_GUIDELINES = [
  "Translate technical prose accurately; keep numbers, units and variable names unchanged.",
  "Respect block order; never merge, split, drop or reorder blocks.",
  "Do not add commentary, summaries, notes or content that isn't in the source.",
];

const MARKUP_GUIDELINES = [
  "Keep every inline HTML tag and attribute exactly as written; translate only the human-readable text between tags.",
  "Do not translate URLs, file paths, code identifiers or HTML entities.",
  "Keep the blank lines that separate blocks: the output must contain the same number of blocks as the input.",
];

function formatBulletList(items: string[]): string {
  return items.map((item) => `- ${item}`).join("\n");
}

function buildPlaceholderSection(placeholders: readonly string[]): string {
  const lines = [
    "Substrings such as MATH_PLACEHOLDER_000, CODE_PLACEHOLDER_001 or RAW_HTML_PLACEHOLDER_002 stand for protected content.",
    "Copy each of them verbatim, exactly once, at the grammatically correct position. Never translate, renumber, split or invent them.",
  ];
  if (placeholders.length) {
    lines.push(`This text contains: ${placeholders.join(", ")}.`);
  }
  return `Placeholders:\n${formatBulletList(lines)}`;
}

function buildTerminologySection(terminology: Terminology): string | null {
  if (!terminology.length) return null;
  const entries = terminology.map((entry) =>
    entry.source === entry.target
      ? `${entry.source} → keep as "${entry.target}"`
      : `${entry.source} → ${entry.target}`,
  );
  return `Terminology (always use these renderings):\n${formatBulletList(entries)}`;
}

export const buildSystemPrompt = (request: TranslationRequest): string => {
  const terminology = selectRelevantTerms(request.terminology, request.chunkText);
  const sections = [
    `You are a professional technical translator rendering an English e-book about machine learning systems into ${request.targetLanguageName} (${request.targetLanguage}).`,
    `General guidelines:\n${formatBulletList(GENERAL_GUIDELINES)}`,
    `Markup:\n${formatBulletList(MARKUP_GUIDELINES)}`,
    buildPlaceholderSection(request.placeholders),
    buildTerminologySection(terminology),
    'Respond with a JSON object of the form {"translation": "<translated text>"} and nothing else.',
  ];
  return sections.filter((section): section is string => Boolean(section)).join("\n\n");
};

export const buildUserPrompt = (request: TranslationRequest): string =>
  [
    `Translate the following ${request.blockCount} block(s) into ${request.targetLanguageName}.`,
    "",
    request.chunkText,
  ].join("\n");
