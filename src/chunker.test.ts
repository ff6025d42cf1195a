import { describe, expect, it } from "vitest";
import { Chunker } from "./chunker";
import { InvalidConfigurationError } from "./errors";

function makeText(length: number): string {
  let out = "";
  for (let i = 0; i < length; i++) out += String.fromCharCode(97 + (i % 26));
  return out;
}

describe("Chunker", () => {
  it("splits 3000 characters into 4 chunks of at most 1000 with 200 overlap", () => {
    const text = makeText(3000);
    const spans = Array.from(new Chunker(text, 1000, 200));

    expect(spans).toHaveLength(4);
    expect(spans.map((s) => s.start)).toEqual([0, 800, 1600, 2400]);
    expect(spans.map((s) => s.text.length)).toEqual([1000, 1000, 1000, 600]);
    for (let i = 1; i < spans.length; i++) {
      expect(spans[i].text.slice(0, 200)).toBe(spans[i - 1].text.slice(-200));
    }
  });

  it("yields nothing for empty text", () => {
    expect(Array.from(new Chunker("", 100, 10))).toEqual([]);
  });

  it("yields exactly one chunk for text up to the chunk size", () => {
    expect(Chunker.split("short text", 100, 10)).toEqual(["short text"]);
    expect(Chunker.split(makeText(100), 100, 10)).toHaveLength(1);
  });

  it("matches ceil((L - O) / (S - O)) and reconstructs the text", () => {
    const cases: Array<[number, number, number]> = [
      [101, 100, 10],
      [1001, 250, 50],
      [777, 64, 0],
      [5000, 1000, 999],
      [2048, 512, 128],
    ];
    for (const [length, size, overlap] of cases) {
      const text = makeText(length);
      const pieces = Chunker.split(text, size, overlap);
      expect(pieces).toHaveLength(Math.ceil((length - overlap) / (size - overlap)));
      expect(pieces.length).toBe(Chunker.count(length, size, overlap));
      expect(pieces.every((p) => p.length <= size)).toBe(true);
      const rebuilt = pieces[0] + pieces.slice(1).map((p) => p.slice(overlap)).join("");
      expect(rebuilt).toBe(text);
    }
  });

  it("restarts when iterated again", () => {
    const chunker = new Chunker(makeText(250), 100, 20);
    const first = Array.from(chunker, (s) => s.text);
    const second = Array.from(chunker, (s) => s.text);
    expect(second).toEqual(first);
    expect(first).toHaveLength(3);
  });

  it("never cuts a surrogate pair at the end of a span", () => {
    const text = `${"a".repeat(9)}😀${"b".repeat(20)}`;
    const spans = Array.from(new Chunker(text, 10, 2));

    expect(spans.map((s) => s.text)).toEqual(["a".repeat(9), "aa😀bbbbbb", "b".repeat(10), "b".repeat(8)]);
    expect(spans.map((s) => [s.start, s.end])).toEqual([
      [0, 9],
      [7, 17],
      [15, 25],
      [23, 31],
    ]);
  });

  it("never starts a span inside a surrogate pair", () => {
    const text = `${"a".repeat(8)}😀${"b".repeat(10)}`;

    expect(Chunker.split(text, 10, 1)).toEqual(["aaaaaaaa😀", "😀bbbbbbbb", "bbb"]);
  });

  it("rejects overlap >= size", () => {
    expect(() => new Chunker("abc", 100, 100)).toThrow(InvalidConfigurationError);
    expect(() => Chunker.split("abc", 10, 20)).toThrow(/must be smaller than chunk size/);
    expect(() => new Chunker("abc", 0, 0)).toThrow(InvalidConfigurationError);
  });
});
