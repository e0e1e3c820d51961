import type { TranscriptChunk, VideoMetadata } from "@/lib/pipeline/types";

export type ConversationRole = "user" | "assistant";

export type ConversationMessage = {
  role: ConversationRole;
  content: string;
  /** ISO-8601 */
  timestamp: string;
};

export type VideoSession = {
  videoId: string;
  metadata: VideoMetadata;
  chunks: readonly TranscriptChunk[];
  summary?: string;
  conversationHistory: readonly ConversationMessage[];
};
