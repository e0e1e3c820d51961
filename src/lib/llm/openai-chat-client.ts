import OpenAI from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import type { Logger } from "@/lib/logger";
import type { ChatCapability, ChatMessage, ChatRequestOptions } from "@/lib/llm/types";

export type OpenAIChatClientConfig = {
  apiKey: string;
  /** OpenAI-compatible base URL, e.g. https://openrouter.ai/api/v1 */
  endpoint: string;
  model: string;
  logger?: Logger;
};

export class OpenAIChatClient implements ChatCapability {
  readonly model: string;

  private readonly client: OpenAI;
  private readonly logger?: Logger;

  constructor(config: OpenAIChatClientConfig, client?: OpenAI) {
    this.model = config.model;
    this.logger = config.logger;
    this.client =
      client ??
      new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.endpoint,
      });
  }

  async complete(messages: ChatMessage[], options: ChatRequestOptions = {}): Promise<string> {
    const startedAt = Date.now();
    const completion = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: toMessageParams(messages),
      },
      { signal: options.signal },
    );

    this.logger?.debug(
      {
        model: this.model,
        latencyMs: Date.now() - startedAt,
        totalTokens: completion.usage?.total_tokens,
      },
      "chat completion finished",
    );

    return completion.choices[0]?.message?.content ?? "";
  }

  async *completeStreaming(messages: ChatMessage[], options: ChatRequestOptions = {}): AsyncIterable<string> {
    const stream = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: toMessageParams(messages),
        stream: true,
      },
      { signal: options.signal },
    );

    for await (const chunk of stream) {
      const text = chunk.choices[0]?.delta?.content;

      if (text) {
        yield text;
      }
    }
  }
}

function toMessageParams(messages: ChatMessage[]): ChatCompletionMessageParam[] {
  return messages.map((message): ChatCompletionMessageParam => {
    switch (message.role) {
      case "system":
        return { role: "system", content: message.content };
      case "assistant":
        return { role: "assistant", content: message.content };
      case "user":
        return { role: "user", content: message.content };
    }
  });
}
