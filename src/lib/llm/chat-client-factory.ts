import type { ProvidersConfiguration } from "@/lib/config/app-config";
import { ConfigurationError } from "@/lib/errors";
import type { Logger } from "@/lib/logger";
import { OpenAIChatClient } from "@/lib/llm/openai-chat-client";
import type { ChatCapability } from "@/lib/llm/types";

export type ChatClientFactoryOptions = {
  providers: ProvidersConfiguration;
  defaultProvider: string;
  logger?: Logger;
  createClient?: (config: { apiKey: string; endpoint: string; model: string }) => ChatCapability;
};

export class ChatClientFactory {
  private readonly providers: ProvidersConfiguration;
  private readonly defaultProvider: string;
  private readonly logger?: Logger;
  private readonly build: (config: { apiKey: string; endpoint: string; model: string }) => ChatCapability;

  constructor(options: ChatClientFactoryOptions) {
    this.providers = options.providers;
    this.defaultProvider = options.defaultProvider;
    this.logger = options.logger;
    this.build =
      options.createClient ?? ((config) => new OpenAIChatClient({ ...config, logger: this.logger }));
  }

  createClient(providerName?: string, modelId?: string): ChatCapability {
    const provider = providerName ?? this.defaultProvider;
    const settings = this.providers[provider];

    if (!settings) {
      const available = Object.keys(this.providers);
      throw new ConfigurationError(
        `Provider '${provider}' not found in configuration. Available providers: ${
          available.length > 0 ? available.join(", ") : "(none)"
        }`,
      );
    }

    const model = modelId ?? settings.models[0]?.id;

    if (!model) {
      throw new ConfigurationError(`No models configured for provider '${provider}'`);
    }

    this.logger?.info({ provider, model }, "creating chat client");

    return this.build({ apiKey: settings.apiKey, endpoint: settings.endpoint, model });
  }
}
