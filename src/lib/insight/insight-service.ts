import {
  AppError,
  InvalidInputError,
  UpstreamError,
  isAbortError,
  toErrorMessage,
} from "@/lib/errors";
import { buildAnswerPrompt, buildSummaryPrompt } from "@/lib/insight/prompts";
import { StreamCollector } from "@/lib/insight/stream-collector";
import type { ChatCapability } from "@/lib/llm/types";
import type { Logger } from "@/lib/logger";
import {
  buildOverlappingChunks,
  describeChunks,
  joinChunkTexts,
  type ChunkingOptions,
} from "@/lib/pipeline/chunker";
import { parseYouTubeVideoId } from "@/lib/pipeline/transcript/parse-url";
import type { CaptionSource, VideoMetadata } from "@/lib/pipeline/types";
import type { VideoSessionStore } from "@/lib/session/session-store";
import type { ConversationMessage, VideoSession } from "@/lib/session/types";

export type VideoAnalysis = {
  videoId: string;
  metadata: VideoMetadata;
  summary: string;
};

export type AnswerEvent = { type: "text"; text: string } | { type: "error"; message: string };

export type InsightRequestOptions = {
  signal?: AbortSignal;
};

export type VideoInsightServiceOptions = {
  store: VideoSessionStore;
  captionSource: CaptionSource;
  chat: ChatCapability;
  chunking?: ChunkingOptions;
  /** Most recent conversation messages included in the answer prompt. */
  historyLimit?: number;
  logger: Logger;
  now?: () => Date;
};

export class VideoInsightService {
  private readonly store: VideoSessionStore;
  private readonly captionSource: CaptionSource;
  private readonly chat: ChatCapability;
  private readonly chunking: ChunkingOptions;
  private readonly historyLimit: number;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: VideoInsightServiceOptions) {
    this.store = options.store;
    this.captionSource = options.captionSource;
    this.chat = options.chat;
    this.chunking = options.chunking ?? {};
    this.historyLimit = options.historyLimit ?? 10;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  async analyze(videoUrl: string, options: InsightRequestOptions = {}): Promise<VideoAnalysis> {
    const videoId = parseYouTubeVideoId(videoUrl);

    if (!videoId) {
      this.logger.warn({ videoUrl }, "invalid YouTube URL");
      throw new InvalidInputError();
    }

    try {
      const cached = await this.store.get(videoId);

      if (cached) {
        this.logger.info({ videoId }, "video found in cache");

        if (cached.summary) {
          return { videoId, metadata: cached.metadata, summary: cached.summary };
        }

        const summary = await this.summarize(cached, options);
        return { videoId, metadata: cached.metadata, summary };
      }

      this.logger.info({ videoId }, "extracting video content");
      const extraction = await this.captionSource.fetchCaptions(videoId, { signal: options.signal });
      const chunks = buildOverlappingChunks(extraction.captions, this.chunking);
      const stats = describeChunks(chunks);

      this.logger.info(
        { videoId, title: extraction.metadata.title, chunks: stats.count, averageChars: stats.averageChars },
        "transcript chunked",
      );

      const session: VideoSession = {
        videoId,
        metadata: extraction.metadata,
        chunks,
        conversationHistory: [],
      };

      await this.store.put(session);
      const summary = await this.summarize(session, options);

      this.logger.info({ videoId }, "video analysis completed");
      return { videoId, metadata: extraction.metadata, summary };
    } catch (error) {
      this.logger.error({ err: error, videoId }, "video analysis failed");

      if (error instanceof AppError || isAbortError(error)) {
        throw error;
      }

      throw new UpstreamError(`Video analysis failed: ${toErrorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Streams an answer grounded in the cached transcript.
   *
   * Never throws: failures arrive as a single error event. The answer is stored in
   * the conversation history only when the model stream ran to completion, so a
   * cancelled or failed answer leaves just the user's question behind.
   */
  async *askQuestion(
    videoId: string,
    question: string,
    options: InsightRequestOptions = {},
  ): AsyncGenerator<AnswerEvent, void, undefined> {
    const { signal } = options;
    this.logger.info({ videoId }, "processing question");

    let session: VideoSession | undefined;

    try {
      session = await this.store.get(videoId);
    } catch (error) {
      this.logger.error({ err: error, videoId }, "failed to read video session");
      yield { type: "error", message: `Failed to check video existence - ${toErrorMessage(error)}` };
      return;
    }

    if (!session) {
      const message = `Video must be analyzed before asking questions. VideoId: ${videoId}`;
      this.logger.warn({ videoId }, message);
      yield { type: "error", message };
      return;
    }

    const history = this.recentHistory(session.conversationHistory);

    try {
      await this.store.addConversationMessage(videoId, this.message("user", question));
    } catch (error) {
      this.logger.error({ err: error, videoId }, "failed to store user question");
      yield { type: "error", message: `Failed to save question - ${toErrorMessage(error)}` };
      return;
    }

    if (signal?.aborted) {
      this.logger.info({ videoId }, "question cancelled before streaming");
      return;
    }

    const messages = buildAnswerPrompt({
      metadata: session.metadata,
      summary: session.summary,
      history,
      transcript: joinChunkTexts(session.chunks),
      question,
    });

    const collector = new StreamCollector(this.chat.completeStreaming(messages, { signal }), this.logger);

    try {
      for await (const fragment of collector.forward(signal)) {
        yield { type: "text", text: fragment };
      }
    } catch (error) {
      if (signal?.aborted || isAbortError(error)) {
        this.logger.info({ videoId }, "answer stream cancelled");
        return;
      }

      this.logger.error({ err: error, videoId }, "answer stream failed");
      yield { type: "error", message: `Failed to process question - ${toErrorMessage(error)}` };
      return;
    }

    if (!collector.completed) {
      this.logger.info({ videoId, partialChars: collector.text.length }, "answer stream cancelled, partial answer discarded");
      return;
    }

    try {
      await this.store.addConversationMessage(videoId, this.message("assistant", collector.text));
      this.logger.info({ videoId }, "question answered");
    } catch (error) {
      this.logger.error({ err: error, videoId }, "failed to store assistant answer");
    }
  }

  getSession(videoId: string): Promise<VideoSession | undefined> {
    return this.store.get(videoId);
  }

  private async summarize(session: VideoSession, options: InsightRequestOptions): Promise<string> {
    this.logger.info({ videoId: session.videoId }, "generating summary");

    const messages = buildSummaryPrompt(session.metadata, joinChunkTexts(session.chunks));
    const summary = await this.chat.complete(messages, { signal: options.signal });

    await this.store.updateSummary(session.videoId, summary);
    return summary;
  }

  private recentHistory(history: readonly ConversationMessage[]): readonly ConversationMessage[] {
    if (this.historyLimit <= 0) {
      return [];
    }

    return history.slice(-this.historyLimit);
  }

  private message(role: ConversationMessage["role"], content: string): ConversationMessage {
    return { role, content, timestamp: this.now().toISOString() };
  }
}
