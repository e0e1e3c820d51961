import type { AppConfig } from "@/lib/config/app-config";
import { VideoInsightService } from "@/lib/insight/insight-service";
import { ChatClientFactory } from "@/lib/llm/chat-client-factory";
import type { ChatCapability } from "@/lib/llm/types";
import type { Logger } from "@/lib/logger";
import { YouTubeCaptionSource } from "@/lib/pipeline/transcript/fetch-transcript";
import type { CaptionSource } from "@/lib/pipeline/types";
import { VideoSessionStore } from "@/lib/session/session-store";

export type AppContext = {
  config: AppConfig;
  logger: Logger;
  store: VideoSessionStore;
  captionSource: CaptionSource;
  insight: VideoInsightService;
  close: () => void;
};

export type AppContextOverrides = {
  captionSource?: CaptionSource;
  chat?: ChatCapability;
};

/** Wires one process-wide session store into the service graph. */
export function createAppContext(
  config: AppConfig,
  logger: Logger,
  overrides: AppContextOverrides = {},
): AppContext {
  const store = new VideoSessionStore({
    absoluteTtlMs: config.session.absoluteTtlMs,
    slidingTtlMs: config.session.slidingTtlMs,
    logger: logger.child({ module: "session-store" }),
  });

  const captionSource =
    overrides.captionSource ??
    new YouTubeCaptionSource({
      language: config.captions.language,
      logger: logger.child({ module: "captions" }),
    });

  const chat =
    overrides.chat ??
    new ChatClientFactory({
      providers: config.llm.providers,
      defaultProvider: config.llm.defaultProvider,
      logger: logger.child({ module: "llm" }),
    }).createClient();

  const insight = new VideoInsightService({
    store,
    captionSource,
    chat,
    chunking: config.chunking,
    historyLimit: config.conversationHistoryLimit,
    logger: logger.child({ module: "insight" }),
  });

  return {
    config,
    logger,
    store,
    captionSource,
    insight,
    close: () => {
      store.clear();
    },
  };
}
