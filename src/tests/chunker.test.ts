import { describe, expect, it } from "vitest";
import { buildOverlappingChunks, describeChunks, joinChunkTexts } from "@/lib/pipeline/chunker";
import type { CaptionCue } from "@/lib/pipeline/types";
import { cue } from "@/tests/fakes";

function numberedCaptions(count: number): CaptionCue[] {
  return Array.from({ length: count }, (_, index) =>
    cue(`${String(index).padStart(2, "0")}${"x".repeat(197)}`, index * 3, 3),
  );
}

describe("buildOverlappingChunks", () => {
  it("returns no chunks for an empty transcript", () => {
    expect(buildOverlappingChunks([])).toEqual([]);
  });

  it("keeps a short transcript in a single chunk spanning all captions", () => {
    const chunks = buildOverlappingChunks([cue("Hello", 0, 2), cue("world", 2, 2)]);

    expect(chunks).toEqual([{ text: "Hello world", startTime: 0, endTime: 4, index: 0 }]);
  });

  it("restarts the next chunk from the trailing captions of the previous one", () => {
    const captions = [0, 1, 2, 3, 4].map((index) => cue(`caption-${index}`, index * 2, 2));

    const chunks = buildOverlappingChunks(captions, { chunkSizeChars: 30, chunkOverlapChars: 10 });

    expect(chunks).toEqual([
      { text: "caption-0 caption-1 caption-2", startTime: 0, endTime: 6, index: 0 },
      { text: "caption-2 caption-3 caption-4", startTime: 4, endTime: 10, index: 1 },
    ]);
  });

  it("stays within the size budget and overlaps consecutive chunks", () => {
    const chunks = buildOverlappingChunks(numberedCaptions(50), {
      chunkSizeChars: 1000,
      chunkOverlapChars: 300,
    });

    expect(chunks).toHaveLength(16);
    expect(chunks.map((chunk) => chunk.index)).toEqual(Array.from({ length: 16 }, (_, index) => index));

    for (const chunk of chunks) {
      expect(chunk.text.length).toBeLessThanOrEqual(1000);
    }

    for (let index = 1; index < chunks.length; index += 1) {
      expect(chunks[index].startTime).toBeLessThan(chunks[index - 1].endTime);
      expect(chunks[index].startTime).toBeGreaterThan(chunks[index - 1].startTime);
    }

    expect(chunks[0]).toMatchObject({ startTime: 0, endTime: 15 });
    expect(chunks[1].text.startsWith("03")).toBe(true);
    expect(chunks[1]).toMatchObject({ startTime: 9, endTime: 24 });
    expect(chunks[15]).toMatchObject({ startTime: 135, endTime: 150 });
    expect(chunks[15].text.startsWith("45")).toBe(true);
  });

  it("rebuilds the whole transcript once the overlaps are dropped", () => {
    const words = Array.from({ length: 40 }, (_, index) => `w${String(index).padStart(2, "0")}`);
    const captions = words.map((word, index) => cue(word, index, 1));

    const chunks = buildOverlappingChunks(captions, { chunkSizeChars: 20, chunkOverlapChars: 8 });
    const rebuilt: string[] = [];

    for (const chunk of chunks) {
      const chunkWords = chunk.text.split(" ");
      const shared = chunkWords.findIndex((word) => !rebuilt.includes(word));
      rebuilt.push(...chunkWords.slice(shared));
    }

    expect(chunks.length).toBeGreaterThan(1);
    expect(chunks[0].text).toBe("w00 w01 w02 w03 w04");
    expect(chunks[1].text).toBe("w03 w04 w05 w06 w07");
    expect(rebuilt).toEqual(words);
  });

  it("charges empty captions one separator each", () => {
    const captions = [cue("abcd", 0, 1), cue("", 1, 1), cue("", 2, 1), cue("efgh", 3, 1)];

    expect(buildOverlappingChunks(captions, { chunkSizeChars: 11, chunkOverlapChars: 0 })).toEqual([
      { text: "abcd", startTime: 0, endTime: 3, index: 0 },
      { text: "efgh", startTime: 3, endTime: 4, index: 1 },
    ]);
    expect(buildOverlappingChunks(captions, { chunkSizeChars: 12, chunkOverlapChars: 0 })).toEqual([
      { text: "abcd   efgh", startTime: 0, endTime: 4, index: 0 },
    ]);
  });

  it("never splits a caption longer than the budget", () => {
    const long = "abcdefghijklmnopqrst";

    const chunks = buildOverlappingChunks([cue(long, 0, 5), cue("xy", 5, 1)], {
      chunkSizeChars: 10,
      chunkOverlapChars: 0,
    });

    expect(chunks).toEqual([
      { text: long, startTime: 0, endTime: 5, index: 0 },
      { text: "xy", startTime: 5, endTime: 6, index: 1 },
    ]);
  });

  it("rejects invalid budgets", () => {
    const captions = [cue("Hello", 0, 1)];

    expect(() => buildOverlappingChunks(captions, { chunkSizeChars: 0 })).toThrow("Invalid chunking size setting");
    expect(() => buildOverlappingChunks(captions, { chunkOverlapChars: -1 })).toThrow(
      "Invalid chunking overlap setting",
    );
  });
});

describe("joinChunkTexts", () => {
  it("joins chunk texts with single spaces", () => {
    const chunks = buildOverlappingChunks([cue("a", 0, 1), cue("b", 1, 1), cue("c", 2, 1)], {
      chunkSizeChars: 4,
      chunkOverlapChars: 0,
    });

    expect(chunks.map((chunk) => chunk.text)).toEqual(["a b", "c"]);
    expect(joinChunkTexts(chunks)).toBe("a b c");
  });
});

describe("describeChunks", () => {
  it("reports count and rounded average length", () => {
    expect(
      describeChunks([
        { text: "abc", startTime: 0, endTime: 1, index: 0 },
        { text: "abcd", startTime: 1, endTime: 2, index: 1 },
      ]),
    ).toEqual({ count: 2, averageChars: 4 });
    expect(describeChunks([])).toEqual({ count: 0, averageChars: 0 });
  });
});
