import type { Terminology } from "../../config/terminology";

export interface TranslationRequest {
  chunkText: string;
  terminology: Terminology;
  /** BCP 47 tag, e.g. `zh-CN` */
  targetLanguage: string;
  /** Human readable name used in the prompt */
  targetLanguageName: string;
  /** Placeholder tokens present in `chunkText` */
  placeholders: readonly string[];
  /** Number of blank-line separated blocks in `chunkText` */
  blockCount: number;
  /** Checked before the call starts */
  signal?: AbortSignal;
}

export interface TranslationResult {
  translatedText: string;
}

/**
 * Black-box text translator. Implementations fail with
 * `OracleUnavailableError` (transient), `OracleRejectedError` (permanent) or
 * `MalformedOracleOutputError`.
 */
export interface TranslationOracle {
  translate(request: TranslationRequest): Promise<TranslationResult>;
}
