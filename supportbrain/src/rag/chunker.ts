import { TextSplitter } from "@langchain/textsplitters";

import type { ChunkingSettings } from "../config/settings.js";
import type { ExtractedUnit, FormatId } from "../loaders/types.js";

export type Chunk = {
  documentId: string;
  filename: string;
  format: FormatId;
  unitLabel: string;
  ordinal: number;
  /** Offsets into the unit text, end exclusive. */
  start: number;
  end: number;
  text: string;
  extractionConfidence: number;
  ingestedAt: string;
};

export type ChunkOrigin = {
  filename: string;
  format: FormatId;
  ingestedAt: string;
};

type Span = { start: number; end: number };

const SENTENCE_END = /[.!?;:]/;
const WHITESPACE = /\s/;

/** Last cut position in [from, to], preferring line breaks, then sentence ends, then spaces. */
function findBoundary(text: string, from: number, to: number): number | null {
  let sentence: number | null = null;
  let word: number | null = null;

  for (let i = to - 1; i >= from - 1 && i >= 0; i -= 1) {
    const ch = text.charAt(i);
    const cut = i + 1;
    if (cut < from || cut > to) continue;

    if (ch === "\n") return cut;
    if (sentence === null && WHITESPACE.test(ch) && i > 0 && SENTENCE_END.test(text.charAt(i - 1))) {
      sentence = cut;
    }
    if (word === null && WHITESPACE.test(ch)) word = cut;
  }
  return sentence ?? word;
}

/**
 * Boundary-aware splitter. Chunks are between `minChunkSize` and `chunkSize`
 * characters, except the last chunk of a text which may be shorter; each chunk
 * after the first starts `chunkOverlap` characters before the previous end.
 */
export class PassageSplitter extends TextSplitter {
  readonly minChunkSize: number;

  constructor(settings: ChunkingSettings) {
    const { minChars, maxChars, overlapChars } = settings;
    if (!(overlapChars >= 0 && overlapChars < minChars && minChars <= maxChars)) {
      throw new RangeError(
        `Invalid chunking parameters: min=${minChars} max=${maxChars} overlap=${overlapChars}`
      );
    }
    super({ chunkSize: maxChars, chunkOverlap: overlapChars });
    this.minChunkSize = minChars;
  }

  spans(text: string): Span[] {
    if (!text.trim()) return [];
    if (text.length <= this.chunkSize) return [{ start: 0, end: text.length }];

    const spans: Span[] = [];
    let start = 0;
    while (text.length - start > this.chunkSize) {
      const limit = start + this.chunkSize;
      const end = findBoundary(text, start + this.minChunkSize, limit) ?? limit;
      spans.push({ start, end });
      start = end - this.chunkOverlap;
    }
    spans.push({ start, end: text.length });
    return spans;
  }

  async splitText(text: string): Promise<string[]> {
    return this.spans(text).map((s) => text.slice(s.start, s.end));
  }

  chunk(unit: ExtractedUnit, origin: ChunkOrigin): Chunk[] {
    return this.spans(unit.text).map((span, ordinal) => ({
      documentId: unit.documentId,
      filename: origin.filename,
      format: origin.format,
      unitLabel: unit.label,
      ordinal,
      start: span.start,
      end: span.end,
      text: unit.text.slice(span.start, span.end),
      extractionConfidence: unit.confidence,
      ingestedAt: origin.ingestedAt
    }));
  }
}
