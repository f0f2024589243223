import { describe, expect, it } from "vitest";
import * as fc from "fast-check";
import { chunkText, expectedChunkCount } from "../../src/core/chunker";

/** Chunk size in [1, 60] with an overlap strictly below it. */
const arbChunking = fc
  .integer({ min: 1, max: 60 })
  .chain((chunkSize) =>
    fc.integer({ min: 0, max: chunkSize - 1 }).map((chunkOverlap) => ({ chunkSize, chunkOverlap }))
  );

const arbText = fc.string({ maxLength: 400 });

describe("chunkText properties", () => {
  it("reconstructs the text once overlaps are removed", () => {
    fc.assert(
      fc.property(arbText, arbChunking, (text, options) => {
        let rebuilt = "";
        for (const chunk of chunkText(text, options)) {
          rebuilt += chunk.text.slice(rebuilt.length - chunk.start);
        }
        expect(rebuilt).toBe(text);
      })
    );
  });

  it("produces the expected number of chunks", () => {
    fc.assert(
      fc.property(arbText, arbChunking, (text, options) => {
        const chunks = Array.from(chunkText(text, options));
        expect(chunks.length).toBe(expectedChunkCount(text.length, options));
        if (text.length > options.chunkOverlap) {
          const step = options.chunkSize - options.chunkOverlap;
          expect(chunks.length).toBe(Math.ceil((text.length - options.chunkOverlap) / step));
        }
      })
    );
  });

  it("places chunk i at i * (size - overlap) with no gaps", () => {
    fc.assert(
      fc.property(arbText, arbChunking, (text, options) => {
        const step = options.chunkSize - options.chunkOverlap;
        const chunks = Array.from(chunkText(text, options));
        chunks.forEach((chunk, index) => {
          expect(chunk.ordinal).toBe(index);
          expect(chunk.start).toBe(index * step);
          expect(chunk.end).toBe(Math.min(chunk.start + options.chunkSize, text.length));
          expect(chunk.text).toBe(text.slice(chunk.start, chunk.end));
        });
        const last = chunks[chunks.length - 1];
        if (last) expect(last.end).toBe(text.length);
      })
    );
  });
});
