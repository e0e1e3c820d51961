import type { ChatMessage } from "@/lib/llm/types";
import type { VideoMetadata } from "@/lib/pipeline/types";
import type { ConversationMessage } from "@/lib/session/types";

export function buildSummaryPrompt(metadata: VideoMetadata, transcript: string): ChatMessage[] {
  const content = [
    "Please provide a comprehensive summary of the following YouTube video transcript.",
    `The video title is: "${metadata.title}"`,
    `The channel is: "${metadata.channel}"`,
    "",
    "Transcript:",
    transcript,
    "",
    "Please provide a well-structured summary that captures the main points, key insights, and overall message of the video.",
  ].join("\n");

  return [{ role: "user", content }];
}

export type AnswerPromptInput = {
  metadata: VideoMetadata;
  summary?: string;
  history: readonly ConversationMessage[];
  transcript: string;
  question: string;
};

export function buildAnswerPrompt(input: AnswerPromptInput): ChatMessage[] {
  const summaryBlock = input.summary ? `Video Summary: ${input.summary}\n\n` : "";
  const historyBlock =
    input.history.length > 0
      ? `Previous conversation:\n${input.history.map((message) => `${message.role}: ${message.content}`).join("\n")}\n\n`
      : "";

  const content = [
    "You are an AI assistant helping answer questions about a YouTube video.",
    "",
    "Video Information:",
    `Title: "${input.metadata.title}"`,
    `Channel: "${input.metadata.channel}"`,
    `Duration: ${formatDuration(input.metadata.duration)}`,
    "",
    `${summaryBlock}${historyBlock}Video Transcript:`,
    input.transcript,
    "",
    `User Question: ${input.question}`,
    "",
    "Please provide a helpful and accurate answer based on the video content. If the information is not available in the transcript, please indicate that clearly.",
  ].join("\n");

  return [{ role: "user", content }];
}

/** `h:mm:ss`, hours unpadded. */
export function formatDuration(seconds: number): string {
  const total = Number.isFinite(seconds) && seconds > 0 ? Math.floor(seconds) : 0;
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;

  return `${hours}:${String(minutes).padStart(2, "0")}:${String(secs).padStart(2, "0")}`;
}
