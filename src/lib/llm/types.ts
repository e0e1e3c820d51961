export type ChatRole = "system" | "user" | "assistant";

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

export type ChatRequestOptions = {
  signal?: AbortSignal;
};

/** Opaque chat completion capability; prompt construction belongs to callers. */
export interface ChatCapability {
  complete(messages: ChatMessage[], options?: ChatRequestOptions): Promise<string>;
  /** Finite and not restartable. */
  completeStreaming(messages: ChatMessage[], options?: ChatRequestOptions): AsyncIterable<string>;
}
