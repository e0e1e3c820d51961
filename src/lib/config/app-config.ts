import { z } from "zod";
import { ConfigurationError } from "@/lib/errors";
import { ensureEnvLoaded } from "@/lib/config/load-env";
import {
  CHARS_PER_TOKEN,
  CHUNK_OVERLAP_TOKENS,
  CHUNK_SIZE_TOKENS,
} from "@/lib/pipeline/chunker";

const modelSchema = z.object({
  id: z.string().min(1),
  displayName: z.string().min(1),
});

const providerSchema = z.object({
  apiKey: z.string().min(1, "LLM provider API key is required"),
  endpoint: z.string().url(),
  models: z.array(modelSchema),
});

const providersSchema = z.record(providerSchema);

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

const envSchema = z.object({
  LLM_DEFAULT_PROVIDER: z.string().min(1).optional(),
  LLM_PROVIDERS: z.string().optional(),
  OPENROUTER_API_KEY: z.string().optional(),
  OPENROUTER_ENDPOINT: z.string().url().default("https://openrouter.ai/api/v1"),
  OPENROUTER_MODEL: z.string().min(1).default("openai/gpt-4o-mini"),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  OPENAI_MODEL: z.string().min(1).default("gpt-4o-mini"),
  CAPTION_LANGUAGE: z.string().min(1).default("en"),
  CHUNK_SIZE_CHARS: positiveInt.default(CHUNK_SIZE_TOKENS * CHARS_PER_TOKEN),
  CHUNK_OVERLAP_CHARS: nonNegativeInt.default(CHUNK_OVERLAP_TOKENS * CHARS_PER_TOKEN),
  SESSION_ABSOLUTE_TTL_MINUTES: positiveInt.default(24 * 60),
  SESSION_SLIDING_TTL_MINUTES: positiveInt.default(4 * 60),
  CONVERSATION_HISTORY_LIMIT: nonNegativeInt.default(10),
  PORT: positiveInt.default(3000),
});

export type ProvidersConfiguration = Record<string, z.infer<typeof providerSchema>>;

export type AppConfig = {
  llm: {
    defaultProvider: string;
    providers: ProvidersConfiguration;
  };
  captions: {
    language: string;
  };
  chunking: {
    chunkSizeChars: number;
    chunkOverlapChars: number;
  };
  session: {
    absoluteTtlMs: number;
    slidingTtlMs: number;
  };
  conversationHistoryLimit: number;
  port: number;
};

const MINUTE_MS = 60 * 1000;

/**
 * Builds the application configuration from environment variables.
 *
 * Providers come from `LLM_PROVIDERS` (a JSON object keyed by provider name) and
 * from the `OPENROUTER_*` / `OPENAI_*` shorthands; an explicit entry in
 * `LLM_PROVIDERS` wins over a shorthand of the same name. The LLM section is
 * validated lazily by the chat client factory, so commands that never talk to a
 * model (transcript fetch/chunk) run without API keys.
 */
export function parseAppConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }

  const values = parsed.data;
  const providers: ProvidersConfiguration = {};

  if (values.OPENROUTER_API_KEY) {
    providers.openrouter = {
      apiKey: values.OPENROUTER_API_KEY,
      endpoint: values.OPENROUTER_ENDPOINT,
      models: [{ id: values.OPENROUTER_MODEL, displayName: values.OPENROUTER_MODEL }],
    };
  }

  if (values.OPENAI_API_KEY) {
    providers.openai = {
      apiKey: values.OPENAI_API_KEY,
      endpoint: values.OPENAI_BASE_URL,
      models: [{ id: values.OPENAI_MODEL, displayName: values.OPENAI_MODEL }],
    };
  }

  Object.assign(providers, parseProvidersJson(values.LLM_PROVIDERS));

  const defaultProvider =
    values.LLM_DEFAULT_PROVIDER ?? (providers.openrouter || !providers.openai ? "openrouter" : "openai");

  return {
    llm: {
      defaultProvider,
      providers,
    },
    captions: {
      language: values.CAPTION_LANGUAGE,
    },
    chunking: {
      chunkSizeChars: values.CHUNK_SIZE_CHARS,
      chunkOverlapChars: values.CHUNK_OVERLAP_CHARS,
    },
    session: {
      absoluteTtlMs: values.SESSION_ABSOLUTE_TTL_MINUTES * MINUTE_MS,
      slidingTtlMs: values.SESSION_SLIDING_TTL_MINUTES * MINUTE_MS,
    },
    conversationHistoryLimit: values.CONVERSATION_HISTORY_LIMIT,
    port: values.PORT,
  };
}

export function loadAppConfig(): AppConfig {
  ensureEnvLoaded();
  return parseAppConfig(process.env);
}

function parseProvidersJson(raw: string | undefined): ProvidersConfiguration {
  if (!raw || !raw.trim()) {
    return {};
  }

  let json: unknown;

  try {
    json = JSON.parse(raw);
  } catch {
    throw new ConfigurationError("LLM_PROVIDERS must be a JSON object");
  }

  const parsed = providersSchema.safeParse(json);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid LLM_PROVIDERS: ${details}`);
  }

  return parsed.data;
}
