import { readFileSync } from "node:fs";
import { z } from "zod";

import bundledTerminology from "./terminology.json";

export interface TerminologyEntry {
  source: string;
  target: string;
}

export type Terminology = readonly Readonly<TerminologyEntry>[];

const terminologySchema = z.record(z.string().trim().min(1), z.string().trim().min(1));

export const parseTerminology = (raw: unknown): Terminology => {
  const parsed = terminologySchema.parse(raw);
  return Object.freeze(
    Object.entries(parsed).map(([source, target]) => Object.freeze({ source, target })),
  );
};

export const loadTerminologyFile = (filePath: string): Terminology => {
  const contents = readFileSync(filePath, "utf8");
  return parseTerminology(JSON.parse(contents));
};

let cachedTerminology: Terminology | null = null;

/** Loaded once per process; later calls ignore `filePath`. */
export const getTerminology = (filePath?: string): Terminology => {
  if (cachedTerminology) {
    return cachedTerminology;
  }
  cachedTerminology = filePath
    ? loadTerminologyFile(filePath)
    : parseTerminology(bundledTerminology);
  return cachedTerminology;
};

export const resetTerminologyForTests = () => {
  if (process.env.NODE_ENV === "test") {
    cachedTerminology = null;
  }
};

/** Entries whose source term occurs in `text`, matched case-insensitively. */
export const selectRelevantTerms = (terminology: Terminology, text: string): Terminology => {
  const haystack = text.toLowerCase();
  return terminology.filter((entry) => haystack.includes(entry.source.toLowerCase()));
};
