import { ConfigurationError } from "../errors.js";

export interface TextSegment {
  text: string;
  start: number;
  end: number;
}

export interface TextChunkerOptions {
  chunkSize: number;
  overlap: number;
}

const paragraphBreak = /\n[ \t]*\n+/g;
const sentenceBreak = /[.!?]+["'”’)\]]*\s+|\n/g;

/**
 * Splits text into segments of at most `chunkSize` characters. Every segment
 * after the first starts exactly `overlap` characters before the end of the
 * previous one, so `segments[i].text.slice(-overlap) === segments[i + 1].text.slice(0, overlap)`
 * and dropping the leading overlap of each later segment reproduces the input.
 */
export class TextChunker {
  readonly chunkSize: number;
  readonly overlap: number;

  constructor(options: TextChunkerOptions) {
    if (!Number.isInteger(options.chunkSize) || options.chunkSize <= 0) {
      throw new ConfigurationError(`chunkSize must be a positive integer, got ${options.chunkSize}`);
    }
    if (!Number.isInteger(options.overlap) || options.overlap < 0) {
      throw new ConfigurationError(`overlap must be a non-negative integer, got ${options.overlap}`);
    }
    if (options.overlap >= options.chunkSize) {
      throw new ConfigurationError(
        `overlap (${options.overlap}) must be smaller than chunkSize (${options.chunkSize})`
      );
    }

    this.chunkSize = options.chunkSize;
    this.overlap = options.overlap;
  }

  chunk(text: string): TextSegment[] {
    if (text.trim().length === 0) {
      throw new ConfigurationError("Cannot chunk empty document text");
    }

    const paragraphs = collectBoundaries(text, paragraphBreak);
    const sentences = collectBoundaries(text, sentenceBreak);
    const segments: TextSegment[] = [];
    let start = 0;

    while (true) {
      if (text.length - start <= this.chunkSize) {
        segments.push({ text: text.slice(start), start, end: text.length });
        return segments;
      }

      const end = this.pickEnd(start, paragraphs, sentences);
      segments.push({ text: text.slice(start, end), start, end });
      start = end - this.overlap;
    }
  }

  // end is always > start + overlap, so the next start moves forward
  private pickEnd(start: number, paragraphs: number[], sentences: number[]): number {
    const lowExclusive = start + this.overlap;
    const high = start + this.chunkSize;

    const paragraphEnd = lastBoundaryIn(paragraphs, lowExclusive, high);
    if (paragraphEnd !== null && paragraphEnd >= start + this.chunkSize / 2) {
      return paragraphEnd;
    }

    return lastBoundaryIn(sentences, lowExclusive, high) ?? high;
  }
}

function collectBoundaries(text: string, pattern: RegExp): number[] {
  const boundaries: number[] = [];
  for (const match of text.matchAll(pattern)) {
    boundaries.push((match.index ?? 0) + match[0].length);
  }
  return boundaries;
}

function lastBoundaryIn(boundaries: number[], lowExclusive: number, high: number): number | null {
  let lo = 0;
  let hi = boundaries.length - 1;
  let found: number | null = null;

  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    const value = boundaries[mid];
    if (value === undefined) {
      break;
    }
    if (value <= high) {
      found = value;
      lo = mid + 1;
    } else {
      hi = mid - 1;
    }
  }

  return found !== null && found > lowExclusive ? found : null;
}
