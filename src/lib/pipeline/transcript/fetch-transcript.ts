import {
  YoutubeTranscript,
  YoutubeTranscriptDisabledError,
  YoutubeTranscriptNotAvailableError,
  YoutubeTranscriptNotAvailableLanguageError,
  YoutubeTranscriptTooManyRequestError,
  YoutubeTranscriptVideoUnavailableError,
  type TranscriptResponse,
} from "youtube-transcript";
import {
  AppError,
  NoCaptionsError,
  UpstreamError,
  VideoUnavailableError,
  toErrorMessage,
} from "@/lib/errors";
import type { Logger } from "@/lib/logger";
import { fetchVideoMetadata, type FetchFn } from "@/lib/pipeline/transcript/video-metadata";
import type {
  CaptionCue,
  CaptionSource,
  FetchCaptionsOptions,
  RawCaptionRow,
  VideoExtraction,
} from "@/lib/pipeline/types";

export type YouTubeCaptionSourceOptions = {
  /** Preferred caption track; the video's default track is used when it is missing. */
  language?: string;
  fetchFn?: FetchFn;
  logger?: Logger;
};

export class YouTubeCaptionSource implements CaptionSource {
  private readonly language: string;
  private readonly fetchFn?: FetchFn;
  private readonly logger?: Logger;

  constructor(options: YouTubeCaptionSourceOptions = {}) {
    this.language = options.language ?? "en";
    this.fetchFn = options.fetchFn;
    this.logger = options.logger;
  }

  async fetchCaptions(videoId: string, options: FetchCaptionsOptions = {}): Promise<VideoExtraction> {
    options.signal?.throwIfAborted();

    const metadata = await fetchVideoMetadata(videoId, {
      fetchFn: this.fetchFn,
      signal: options.signal,
    });

    options.signal?.throwIfAborted();

    const rows = await this.fetchRows(videoId);
    const captions = normalizeCaptionRows(rows);

    if (captions.length === 0) {
      throw new NoCaptionsError();
    }

    const last = captions[captions.length - 1];
    const duration = metadata.duration > 0 ? metadata.duration : last.startOffset + last.duration;

    this.logger?.info({ videoId, captions: captions.length, duration }, "captions fetched");

    return {
      videoId,
      metadata: { ...metadata, duration },
      captions,
    };
  }

  private async fetchRows(videoId: string): Promise<TranscriptResponse[]> {
    try {
      return await YoutubeTranscript.fetchTranscript(videoId, { lang: this.language });
    } catch (error) {
      if (!(error instanceof YoutubeTranscriptNotAvailableLanguageError)) {
        throw toCaptionError(error);
      }

      this.logger?.debug({ videoId, language: this.language }, "preferred caption language missing");
    }

    try {
      return await YoutubeTranscript.fetchTranscript(videoId);
    } catch (error) {
      throw toCaptionError(error);
    }
  }
}

export function toCaptionError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof YoutubeTranscriptVideoUnavailableError) {
    return new VideoUnavailableError(undefined, { cause: error });
  }

  if (
    error instanceof YoutubeTranscriptDisabledError ||
    error instanceof YoutubeTranscriptNotAvailableError ||
    error instanceof YoutubeTranscriptNotAvailableLanguageError
  ) {
    return new NoCaptionsError(undefined, { cause: error });
  }

  if (error instanceof YoutubeTranscriptTooManyRequestError) {
    return new UpstreamError("YouTube is rate limiting caption requests. Try again later.", { cause: error });
  }

  return new UpstreamError(`Transcript fetch failed: ${toErrorMessage(error, "Unknown transcript error")}`, {
    cause: error,
  });
}

/**
 * Orders rows by offset and cleans their fields. Rows with empty text are kept:
 * the chunker still charges them a separator.
 */
export function normalizeCaptionRows(rows: readonly RawCaptionRow[]): CaptionCue[] {
  return rows
    .map((row) => ({
      text: typeof row.text === "string" ? decodeEntities(row.text).replace(/\s+/g, " ").trim() : "",
      startOffset: sanitizeNumber(row.offset),
      duration: sanitizeNumber(row.duration),
    }))
    .sort((left, right) => left.startOffset - right.startOffset);
}

function decodeEntities(value: string): string {
  return value
    .replace(/&amp;/g, "&")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&apos;/g, "'")
    .replace(/&#x([0-9a-f]+);/gi, (match, code: string) => fromCodePoint(Number.parseInt(code, 16), match))
    .replace(/&#(\d+);/g, (match, code: string) => fromCodePoint(Number(code), match));
}

function fromCodePoint(code: number, fallback: string): string {
  return code <= 0x10ffff ? String.fromCodePoint(code) : fallback;
}

function sanitizeNumber(value: unknown): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
    return 0;
  }

  return value;
}
