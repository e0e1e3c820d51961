import { Hono } from "hono";
import { streamSSE } from "hono/streaming";
import { z } from "zod";
import { AppError } from "@/lib/errors";
import type { VideoInsightService } from "@/lib/insight/insight-service";
import type { Logger } from "@/lib/logger";
import { buildOverlappingChunks, type ChunkingOptions } from "@/lib/pipeline/chunker";
import { parseYouTubeVideoId } from "@/lib/pipeline/transcript/parse-url";
import type { CaptionSource } from "@/lib/pipeline/types";
import { formatZodError, problem, readJsonBody, statusForCode } from "@/server/http";

const analyzeRequestSchema = z.object({
  videoUrl: z.string().trim().min(1, "videoUrl is required"),
});

const askQuestionRequestSchema = z.object({
  videoId: z.string().trim().min(1, "videoId is required"),
  question: z.string().trim().min(1, "question is required"),
});

const FIRST_CHUNK_PREVIEW_CHARS = 100;

export type YouTubeRouteDeps = {
  insight: VideoInsightService;
  captionSource: CaptionSource;
  chunking: ChunkingOptions;
  logger: Logger;
};

export function createYouTubeRoutes(deps: YouTubeRouteDeps) {
  const app = new Hono();

  app.post("/youtube/analyze", async (c) => {
    const parsed = analyzeRequestSchema.safeParse(await readJsonBody(c));

    if (!parsed.success) {
      return problem(c, 400, "Video Analysis Failed", "Invalid analyze payload", formatZodError(parsed.error));
    }

    try {
      const analysis = await deps.insight.analyze(parsed.data.videoUrl, { signal: c.req.raw.signal });
      return c.json(analysis);
    } catch (error) {
      if (error instanceof AppError && error.code !== "CONFIGURATION") {
        const status = statusForCode(error.code);
        deps.logger.warn({ videoUrl: parsed.data.videoUrl, code: error.code }, "video analysis rejected");
        return problem(c, status, status < 500 ? "Video Analysis Failed" : "Server error", error.message);
      }

      throw error;
    }
  });

  app.post("/youtube/ask", async (c) => {
    const parsed = askQuestionRequestSchema.safeParse(await readJsonBody(c));

    if (!parsed.success) {
      return problem(c, 400, "Question Failed", "Invalid question payload", formatZodError(parsed.error));
    }

    const { videoId, question } = parsed.data;
    const controller = new AbortController();
    const requestSignal = c.req.raw.signal;
    const abort = () => controller.abort();

    if (requestSignal.aborted) {
      controller.abort();
    } else {
      requestSignal.addEventListener("abort", abort, { once: true });
    }

    return streamSSE(c, async (stream) => {
      stream.onAbort(abort);

      try {
        for await (const event of deps.insight.askQuestion(videoId, question, { signal: controller.signal })) {
          if (event.type === "text") {
            await stream.writeSSE({ data: event.text });
          } else {
            await stream.writeSSE({ data: JSON.stringify({ error: event.message }) });
          }
        }

        if (!controller.signal.aborted) {
          await stream.writeSSE({ data: "[DONE]" });
          deps.logger.info({ videoId }, "question processing completed");
        }
      } finally {
        requestSignal.removeEventListener("abort", abort);
      }
    });
  });

  app.get("/youtube/extract", async (c) => {
    const url = c.req.query("url") ?? "";
    const videoId = parseYouTubeVideoId(url);

    if (!videoId) {
      return problem(c, 400, "Extraction Failed", "Invalid YouTube URL. Please provide a valid YouTube video link.");
    }

    try {
      const extraction = await deps.captionSource.fetchCaptions(videoId, { signal: c.req.raw.signal });
      const chunks = buildOverlappingChunks(extraction.captions, deps.chunking);
      const firstChunk = chunks[0]?.text ?? null;

      return c.json({
        videoId,
        metadata: extraction.metadata,
        chunkCount: chunks.length,
        firstChunk:
          firstChunk && firstChunk.length > FIRST_CHUNK_PREVIEW_CHARS
            ? firstChunk.slice(0, FIRST_CHUNK_PREVIEW_CHARS)
            : firstChunk,
      });
    } catch (error) {
      if (error instanceof AppError) {
        return problem(c, statusForCode(error.code), "Extraction Failed", error.message);
      }

      throw error;
    }
  });

  return app;
}
