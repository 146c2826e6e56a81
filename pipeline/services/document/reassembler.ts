import { IncompleteTranslationError } from "../errors";
import {
  applyEdits,
  escapeHtmlText,
  setTagAttribute,
  type SourceEdit,
} from "../../utils/htmlSource";
import { fillLayout } from "./bodyLayout";
import { splitChunkText, type Chunk } from "./fragmenter";
import type { DocumentMetadata, SegmentedDocument } from "./segmenter";

export interface ReassembleInput {
  document: SegmentedDocument;
  /** Translated metadata; required when the source had any. */
  metadata: DocumentMetadata | null;
  chunks: readonly Chunk[];
  targetLanguage: string;
}

const collectBlocks = (chunks: readonly Chunk[], expectedBlocks: number): string[] => {
  const ordered = [...chunks].sort((a, b) => a.index - b.index);
  const blocks: string[] = [];
  ordered.forEach((chunk, position) => {
    if (chunk.index !== position) {
      throw new IncompleteTranslationError(`Chunk ${position} is missing`);
    }
    if (chunk.translatedText === null) {
      throw new IncompleteTranslationError(`Chunk ${chunk.index} has no translation`);
    }
    if (chunk.firstBlock !== blocks.length) {
      throw new IncompleteTranslationError(
        `Chunk ${chunk.index} starts at block ${chunk.firstBlock}, expected ${blocks.length}`,
      );
    }
    blocks.push(...splitChunkText(chunk.translatedText, chunk.blockCount));
  });
  if (blocks.length !== expectedBlocks) {
    throw new IncompleteTranslationError(
      `Translated ${blocks.length} of ${expectedBlocks} blocks`,
    );
  }
  return blocks;
};

const metadataEdits = (
  document: SegmentedDocument,
  metadata: DocumentMetadata | null,
  targetLanguage: string,
): SourceEdit[] => {
  const { source, headSlots } = document;
  const edits: SourceEdit[] = [];
  const needsMetadata = document.metadata.title !== null || document.metadata.description !== null;
  if (needsMetadata && !metadata) {
    throw new IncompleteTranslationError("Document metadata was not translated");
  }

  if (headSlots.title && metadata?.title) {
    edits.push({ ...headSlots.title, text: escapeHtmlText(metadata.title) });
  }
  if (headSlots.description && metadata?.description) {
    const tag = source.slice(headSlots.description.start, headSlots.description.end);
    edits.push({
      ...headSlots.description,
      text: setTagAttribute(tag, "content", metadata.description),
    });
  }
  if (headSlots.htmlOpenTag) {
    const tag = source.slice(headSlots.htmlOpenTag.start, headSlots.htmlOpenTag.end);
    edits.push({ ...headSlots.htmlOpenTag, text: setTagAttribute(tag, "lang", targetLanguage) });
  }
  return edits;
};

/**
 * Rebuilds the translated document: chunk translations in index order fill
 * the body layout, protected zones are restored, and head metadata plus the
 * document language are rewritten in place.
 */
export const reassemble = ({
  document,
  metadata,
  chunks,
  targetLanguage,
}: ReassembleInput): string => {
  const blocks = collectBlocks(chunks, document.layout.blocks.length);
  const body = document.store.restore(fillLayout(document.layout, blocks));
  return applyEdits(document.source, [
    ...metadataEdits(document, metadata, targetLanguage),
    { ...document.bodyRange, text: body },
  ]);
};
