import { sha256Hex } from "../utils/hash";
import { assertValidChunking } from "./settings";

export type ChunkingOptions = {
  chunkSize: number;
  chunkOverlap: number;
};

export type Chunk = {
  ordinal: number;
  /** Offset of the first character, inclusive. */
  start: number;
  /** Offset past the last character. */
  end: number;
  /** 1-based line of `start`. */
  startLine: number;
  /** 1-based line of the last character in the chunk. */
  endLine: number;
  text: string;
};

/**
 * Chunk identity is the file path plus the ordinal, never the content: a
 * re-embedded position overwrites its previous vector instead of adding one.
 */
export function buildChunkId(relPath: string, ordinal: number): string {
  return sha256Hex(`${relPath}:${ordinal}`);
}

export function expectedChunkCount(length: number, options: ChunkingOptions): number {
  if (length <= 0) return 0;
  const step = options.chunkSize - options.chunkOverlap;
  return Math.max(1, Math.ceil((length - options.chunkOverlap) / step));
}

function lineStartOffsets(text: string): number[] {
  const starts = [0];
  for (let i = text.indexOf("\n"); i !== -1; i = text.indexOf("\n", i + 1)) {
    starts.push(i + 1);
  }
  return starts;
}

function lineAt(starts: number[], offset: number): number {
  let lo = 0;
  let hi = starts.length - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if ((starts[mid] ?? 0) <= offset) lo = mid;
    else hi = mid - 1;
  }
  return lo + 1;
}

/**
 * Splits text into fixed-size windows advancing by `chunkSize - chunkOverlap`.
 * The result is lazy and can be iterated any number of times; each iteration
 * yields the same chunks. Empty text yields nothing.
 */
export function chunkText(text: string, options: ChunkingOptions): Iterable<Chunk> {
  assertValidChunking(options.chunkSize, options.chunkOverlap);
  const { chunkSize, chunkOverlap } = options;
  const step = chunkSize - chunkOverlap;
  let starts: number[] | null = null;

  return {
    *[Symbol.iterator](): Iterator<Chunk> {
      if (text.length === 0) return;
      const lines = (starts ??= lineStartOffsets(text));
      for (let ordinal = 0; ; ordinal += 1) {
        const start = ordinal * step;
        const end = Math.min(start + chunkSize, text.length);
        yield {
          ordinal,
          start,
          end,
          startLine: lineAt(lines, start),
          endLine: lineAt(lines, end - 1),
          text: text.slice(start, end)
        };
        if (end >= text.length) return;
      }
    }
  };
}
