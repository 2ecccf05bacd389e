import { AI_CONFIG } from './ai-config';
import { ValidationError } from './errors';
import type { TextChunk, TextUnit } from './types';

export interface TextSplitterOptions {
  chunkSize: number;
  chunkOverlap: number;
  separators: string[];
}

interface Span {
  start: number;
  end: number;
}

const length = (span: Span) => span.end - span.start;

/**
 * Recursive character splitter.
 *
 * Text is cut on the first separator present, pieces are merged greedily up to
 * `chunkSize`, and each new chunk starts with the trailing pieces of the
 * previous one (at most `chunkOverlap` characters). Pieces still larger than
 * `chunkSize` are cut again with the remaining separators; the empty separator
 * cuts into single characters.
 *
 * Chunks are exact slices of the input: nothing is trimmed and separators stay
 * attached to the piece before them, so dropping each chunk's overlap with its
 * predecessor gives back the original text.
 */
export class RecursiveTextSplitter {
  readonly chunkSize: number;
  readonly chunkOverlap: number;
  readonly separators: string[];

  constructor(options: Partial<TextSplitterOptions> = {}) {
    this.chunkSize = options.chunkSize ?? AI_CONFIG.chunking.chunkSize;
    this.chunkOverlap = options.chunkOverlap ?? AI_CONFIG.chunking.chunkOverlap;
    this.separators = options.separators ?? [...AI_CONFIG.chunking.separators];

    if (!Number.isInteger(this.chunkSize) || this.chunkSize <= 0) {
      throw new ValidationError(`chunkSize must be a positive integer, got ${this.chunkSize}`);
    }
    if (!Number.isInteger(this.chunkOverlap) || this.chunkOverlap < 0 || this.chunkOverlap >= this.chunkSize) {
      throw new ValidationError(
        `chunkOverlap must be an integer in [0, chunkSize), got ${this.chunkOverlap} for chunkSize ${this.chunkSize}`,
      );
    }
  }

  splitText(text: string): TextChunk[] {
    if (!text.trim()) return [];
    return this.splitSpan(text, { start: 0, end: text.length }, this.separators).map(span => ({
      text: text.slice(span.start, span.end),
      start: span.start,
      end: span.end,
    }));
  }

  /** Splits each unit on its own; chunks never span two units and keep unit order. */
  splitUnits(units: TextUnit[]): TextChunk[] {
    const chunks: TextChunk[] = [];
    for (const unit of units) {
      for (const chunk of this.splitText(unit.text)) {
        chunks.push(unit.pageNumber === undefined ? chunk : { ...chunk, pageNumber: unit.pageNumber });
      }
    }
    console.log(`[CHUNK] Split ${units.length} text units into ${chunks.length} chunks`);
    return chunks;
  }

  private splitSpan(text: string, span: Span, separators: string[]): Span[] {
    const segment = text.slice(span.start, span.end);
    const index = separators.findIndex(separator => separator === '' || segment.includes(separator));
    if (index === -1) {
      return this.slice(text, span);
    }

    const separator = separators[index];
    const remaining = separators.slice(index + 1);
    const pieces = separator === '' ? this.characters(text, span) : this.cut(text, span, separator);

    const result: Span[] = [];
    let fitting: Span[] = [];
    for (const piece of pieces) {
      if (length(piece) <= this.chunkSize) {
        fitting.push(piece);
        continue;
      }
      if (fitting.length > 0) {
        result.push(...this.merge(fitting));
        fitting = [];
      }
      result.push(...(remaining.length > 0 ? this.splitSpan(text, piece, remaining) : this.slice(text, piece)));
    }
    if (fitting.length > 0) {
      result.push(...this.merge(fitting));
    }
    return result;
  }

  private cut(text: string, span: Span, separator: string): Span[] {
    const pieces: Span[] = [];
    let start = span.start;
    let at = text.indexOf(separator, start);
    while (at !== -1 && at + separator.length <= span.end) {
      pieces.push({ start, end: at + separator.length });
      start = at + separator.length;
      at = text.indexOf(separator, start);
    }
    if (start < span.end) {
      pieces.push({ start, end: span.end });
    }
    return pieces;
  }

  // One piece per code point, so surrogate pairs stay whole.
  private characters(text: string, span: Span): Span[] {
    const pieces: Span[] = [];
    let at = span.start;
    while (at < span.end) {
      const codePoint = text.codePointAt(at) ?? 0;
      const end = Math.min(at + (codePoint > 0xffff ? 2 : 1), span.end);
      pieces.push({ start: at, end });
      at = end;
    }
    return pieces;
  }

  // Only reached when the separator list has no "" entry.
  private slice(text: string, span: Span): Span[] {
    return this.merge(this.characters(text, span));
  }

  private merge(pieces: Span[]): Span[] {
    const chunks: Span[] = [];
    const window: Span[] = [];
    let total = 0;

    for (const piece of pieces) {
      const size = length(piece);
      if (window.length > 0 && total + size > this.chunkSize) {
        chunks.push({ start: window[0].start, end: window[window.length - 1].end });
        while (window.length > 0 && (total > this.chunkOverlap || total + size > this.chunkSize)) {
          total -= length(window[0]);
          window.shift();
        }
      }
      window.push(piece);
      total += size;
    }

    if (window.length > 0) {
      chunks.push({ start: window[0].start, end: window[window.length - 1].end });
    }
    return chunks;
  }
}
