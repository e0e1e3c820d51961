import type { CaptionCue, TranscriptChunk } from "@/lib/pipeline/types";

export const CHUNK_SIZE_TOKENS = 2000;
export const CHUNK_OVERLAP_TOKENS = 200;
// rough English average
export const CHARS_PER_TOKEN = 4;

export type ChunkingOptions = {
  chunkSizeChars?: number;
  chunkOverlapChars?: number;
};

/**
 * Packs captions into chunks of at most `chunkSizeChars` characters, where each
 * caption costs its length plus one separator. When a caption does not fit, the
 * current chunk is emitted and the next one restarts from the trailing captions
 * of the emitted chunk (about `chunkOverlapChars` worth) followed by that caption.
 *
 * Captions are never split, so a chunk holding one very long caption may exceed
 * the budget.
 */
export function buildOverlappingChunks(
  captions: readonly CaptionCue[],
  options: ChunkingOptions = {},
): TranscriptChunk[] {
  if (captions.length === 0) {
    return [];
  }

  const chunkSizeChars = options.chunkSizeChars ?? CHUNK_SIZE_TOKENS * CHARS_PER_TOKEN;
  const chunkOverlapChars = options.chunkOverlapChars ?? CHUNK_OVERLAP_TOKENS * CHARS_PER_TOKEN;

  if (!Number.isFinite(chunkSizeChars) || chunkSizeChars <= 0) {
    throw new RangeError("Invalid chunking size setting");
  }

  if (!Number.isFinite(chunkOverlapChars) || chunkOverlapChars < 0) {
    throw new RangeError("Invalid chunking overlap setting");
  }

  const chunks: TranscriptChunk[] = [];
  let parts: string[] = [];
  let charCount = 0;
  let chunkStartIndex = 0;
  let chunkStartTime = captions[0].startOffset;

  for (let index = 0; index < captions.length; index += 1) {
    const caption = captions[index];
    const captionLength = caption.text.length + 1;

    if (charCount + captionLength > chunkSizeChars && charCount > 0) {
      chunks.push({
        text: parts.join(" ").trim(),
        startTime: chunkStartTime,
        endTime: caption.startOffset,
        index: chunks.length,
      });

      const overlapStartIndex = Math.max(
        chunkStartIndex,
        index - countOverlapCaptions(captions, index, chunkOverlapChars),
      );

      parts = [];
      charCount = 0;
      chunkStartIndex = overlapStartIndex;
      chunkStartTime = captions[overlapStartIndex].startOffset;

      for (let overlapIndex = overlapStartIndex; overlapIndex <= index; overlapIndex += 1) {
        parts.push(captions[overlapIndex].text);
        charCount += captions[overlapIndex].text.length + 1;
      }

      continue;
    }

    parts.push(caption.text);
    charCount += captionLength;
  }

  if (parts.length > 0) {
    const last = captions[captions.length - 1];

    chunks.push({
      text: parts.join(" ").trim(),
      startTime: chunkStartTime,
      endTime: last.startOffset + last.duration,
      index: chunks.length,
    });
  }

  return chunks;
}

/** Number of captions before `currentIndex` needed to reach the overlap budget. */
function countOverlapCaptions(
  captions: readonly CaptionCue[],
  currentIndex: number,
  chunkOverlapChars: number,
): number {
  let overlapChars = 0;
  let count = 0;

  for (let index = currentIndex - 1; index >= 0 && overlapChars < chunkOverlapChars; index -= 1) {
    overlapChars += captions[index].text.length + 1;
    count += 1;
  }

  return count;
}

export function joinChunkTexts(chunks: readonly TranscriptChunk[]): string {
  return chunks.map((chunk) => chunk.text).join(" ");
}

export function describeChunks(chunks: readonly TranscriptChunk[]): { count: number; averageChars: number } {
  if (chunks.length === 0) {
    return { count: 0, averageChars: 0 };
  }

  const totalChars = chunks.reduce((sum, chunk) => sum + chunk.text.length, 0);

  return {
    count: chunks.length,
    averageChars: Math.round(totalChars / chunks.length),
  };
}
