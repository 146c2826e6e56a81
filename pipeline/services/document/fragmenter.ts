import { MalformedOracleOutputError } from "../errors";

/** Joins blocks inside a chunk; the oracle is told to keep it. */
export const BLOCK_SEPARATOR = "\n\n";

export interface Chunk {
  /** 0-based, contiguous within a document */
  index: number;
  firstBlock: number;
  blockCount: number;
  sourceText: string;
  translatedText: string | null;
  charLength: number;
}

export const DEFAULT_MAX_CHUNK_CHARS = 12_000;

function* generateChunks(
  blocks: readonly string[],
  maxChunkChars: number,
): Generator<Chunk> {
  let index = 0;
  let first = 0;
  let pending: string[] = [];
  let pendingLength = 0;

  const build = (): Chunk => {
    const sourceText = pending.join(BLOCK_SEPARATOR);
    const chunk: Chunk = {
      index,
      firstBlock: first,
      blockCount: pending.length,
      sourceText,
      translatedText: null,
      charLength: sourceText.length,
    };
    index += 1;
    first += pending.length;
    pending = [];
    pendingLength = 0;
    return chunk;
  };

  for (const block of blocks) {
    const nextLength = pending.length
      ? pendingLength + BLOCK_SEPARATOR.length + block.length
      : block.length;
    if (pending.length && nextLength > maxChunkChars) {
      yield build();
      pendingLength = block.length;
    } else {
      pendingLength = nextLength;
    }
    pending.push(block);
  }
  if (pending.length) {
    yield build();
  }
}

/**
 * Groups blocks greedily into chunks of at most `maxChunkChars`. A block is
 * never split, so a single block over the limit becomes a chunk of its own.
 * Each iteration of the result regenerates the same sequence.
 */
export const fragment = (
  blocks: readonly string[],
  maxChunkChars: number = DEFAULT_MAX_CHUNK_CHARS,
): Iterable<Chunk> => {
  if (!Number.isInteger(maxChunkChars) || maxChunkChars <= 0) {
    throw new RangeError(`maxChunkChars must be a positive integer, got ${maxChunkChars}`);
  }
  const snapshot = [...blocks];
  return {
    [Symbol.iterator]: () => generateChunks(snapshot, maxChunkChars),
  };
};

/**
 * Splits an oracle response for a chunk back into its blocks. A response with
 * a different number of blank-line separated blocks cannot be mapped back and
 * is reported as malformed, which makes the call retryable.
 */
export const splitChunkText = (text: string, blockCount: number): string[] => {
  const normalized = text.replace(/\r\n?/g, "\n").trim();
  if (blockCount === 1) {
    return [normalized.replace(/\n[ \t]*(?:\n[ \t]*)+/g, "\n")];
  }
  const blocks = normalized
    .split(/\n[ \t]*(?:\n[ \t]*)+/)
    .map((block) => block.trim())
    .filter(Boolean);
  if (blocks.length !== blockCount) {
    throw new MalformedOracleOutputError(
      `Expected ${blockCount} blocks in translation but received ${blocks.length}`,
    );
  }
  return blocks;
};
