import { InvalidConfigurationError } from "./errors";

/** A span of the source text produced by {@link Chunker}. */
export interface ChunkSpan {
  /** 0-based position of the span within the document. */
  position: number;
  /** Inclusive start offset in the source text. */
  start: number;
  /** Exclusive end offset in the source text. */
  end: number;
  text: string;
}

/**
 * Splits text into fixed-size overlapping character spans.
 *
 * The chunker is a lazy iterable: spans are produced on demand and iterating
 * the same instance again starts over from the beginning. Every span is at
 * most `size` characters, consecutive spans share exactly `overlap`
 * characters and the last span ends at the end of the text. Text no longer
 * than `size` yields a single span; empty text yields none.
 *
 * Offsets are UTF-16 code units, but no boundary falls inside a surrogate
 * pair: a span that would cut one ends a unit early, and a span that would
 * start inside one starts a unit early.
 */
export class Chunker implements Iterable<ChunkSpan> {
  private readonly text: string;
  private readonly size: number;
  private readonly overlap: number;

  /**
   * @param size Target maximum characters per chunk.
   * @param overlap Characters shared by adjacent chunks. Must be < size.
   * @throws {InvalidConfigurationError} On a non-positive size, negative overlap or overlap >= size.
   */
  public constructor(text: string, size: number, overlap: number) {
    Chunker.validate(size, overlap);
    this.text = text;
    this.size = size;
    this.overlap = overlap;
  }

  public static validate(size: number, overlap: number): void {
    if (!Number.isInteger(size) || size <= 0) {
      throw new InvalidConfigurationError(`Chunk size must be a positive integer (got ${size})`, "chunking");
    }
    if (!Number.isInteger(overlap) || overlap < 0) {
      throw new InvalidConfigurationError(`Chunk overlap must be a non-negative integer (got ${overlap})`, "chunking");
    }
    if (overlap >= size) {
      throw new InvalidConfigurationError(
        `Chunk overlap (=${overlap}) must be smaller than chunk size (=${size})`,
        "chunking",
      );
    }
  }

  /** Number of spans the text will produce, without materialising them. */
  public static count(length: number, size: number, overlap: number): number {
    Chunker.validate(size, overlap);
    if (length === 0) return 0;
    if (length <= size) return 1;
    return Math.ceil((length - overlap) / (size - overlap));
  }

  /** Convenience: split eagerly and return only the span texts. */
  public static split(text: string, size: number, overlap: number): string[] {
    return Array.from(new Chunker(text, size, overlap), (span) => span.text);
  }

  public *[Symbol.iterator](): Iterator<ChunkSpan> {
    const { text, size, overlap } = this;
    let start = 0;
    let position = 0;
    while (start < text.length) {
      let end = Math.min(text.length, start + size);
      if (splitsPair(text, end)) end = end - 1 > start ? end - 1 : end + 1;
      yield { position: position++, start, end, text: text.slice(start, end) };
      if (end >= text.length) return;
      let next = Math.max(start + 1, end - overlap);
      if (splitsPair(text, next)) next = next - 1 > start ? next - 1 : next + 1;
      start = next;
    }
  }
}

/** Whether a cut at `offset` would separate the halves of a surrogate pair. */
function splitsPair(text: string, offset: number): boolean {
  if (offset <= 0 || offset >= text.length) return false;
  const before = text.charCodeAt(offset - 1);
  const after = text.charCodeAt(offset);
  return before >= 0xd800 && before <= 0xdbff && after >= 0xdc00 && after <= 0xdfff;
}
