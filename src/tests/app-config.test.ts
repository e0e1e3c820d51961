import { describe, expect, it } from "vitest";
import { parseAppConfig } from "@/lib/config/app-config";
import { ConfigurationError } from "@/lib/errors";

describe("parseAppConfig", () => {
  it("applies defaults around the OpenRouter shorthand", () => {
    const config = parseAppConfig({ OPENROUTER_API_KEY: "test-secret" });

    expect(config).toEqual({
      llm: {
        defaultProvider: "openrouter",
        providers: {
          openrouter: {
            apiKey: "test-secret",
            endpoint: "https://openrouter.ai/api/v1",
            models: [{ id: "openai/gpt-4o-mini", displayName: "openai/gpt-4o-mini" }],
          },
        },
      },
      captions: { language: "en" },
      chunking: { chunkSizeChars: 8000, chunkOverlapChars: 800 },
      session: { absoluteTtlMs: 86_400_000, slidingTtlMs: 14_400_000 },
      conversationHistoryLimit: 10,
      port: 3000,
    });
  });

  it("defaults to OpenAI when it is the only provider", () => {
    const config = parseAppConfig({ OPENAI_API_KEY: "test-secret", OPENAI_MODEL: "gpt-4o" });

    expect(config.llm.defaultProvider).toBe("openai");
    expect(config.llm.providers.openai).toEqual({
      apiKey: "test-secret",
      endpoint: "https://api.openai.com/v1",
      models: [{ id: "gpt-4o", displayName: "gpt-4o" }],
    });
  });

  it("loads without any provider so caption commands need no key", () => {
    const config = parseAppConfig({});

    expect(config.llm).toEqual({ defaultProvider: "openrouter", providers: {} });
  });

  it("merges providers declared as JSON", () => {
    const config = parseAppConfig({
      OPENROUTER_API_KEY: "test-secret",
      LLM_DEFAULT_PROVIDER: "local",
      LLM_PROVIDERS: JSON.stringify({
        local: {
          apiKey: "test-secret",
          endpoint: "http://localhost:11434/v1",
          models: [{ id: "llama3", displayName: "Llama 3" }],
        },
      }),
    });

    expect(config.llm.defaultProvider).toBe("local");
    expect(Object.keys(config.llm.providers)).toEqual(["openrouter", "local"]);
  });

  it("reads numeric settings from strings", () => {
    const config = parseAppConfig({
      CHUNK_SIZE_CHARS: "4000",
      CHUNK_OVERLAP_CHARS: "0",
      SESSION_SLIDING_TTL_MINUTES: "30",
      PORT: "8080",
    });

    expect(config.chunking).toEqual({ chunkSizeChars: 4000, chunkOverlapChars: 0 });
    expect(config.session.slidingTtlMs).toBe(1_800_000);
    expect(config.port).toBe(8080);
  });

  it("rejects malformed settings", () => {
    expect(() => parseAppConfig({ CHUNK_SIZE_CHARS: "lots" })).toThrow(ConfigurationError);
    expect(() => parseAppConfig({ CHUNK_SIZE_CHARS: "lots" })).toThrow(/^Invalid configuration: CHUNK_SIZE_CHARS: /);
    expect(() => parseAppConfig({ LLM_PROVIDERS: "{not json" })).toThrow("LLM_PROVIDERS must be a JSON object");
    expect(() =>
      parseAppConfig({
        LLM_PROVIDERS: JSON.stringify({ local: { apiKey: "", endpoint: "http://localhost:11434/v1", models: [] } }),
      }),
    ).toThrow("Invalid LLM_PROVIDERS: local.apiKey: LLM provider API key is required");
  });
});
