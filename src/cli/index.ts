#!/usr/bin/env node

import { writeFile } from "node:fs/promises";
import { createInterface } from "node:readline/promises";
import { serve } from "@hono/node-server";
import { Command } from "commander";
import { createAppContext, type AppContext } from "@/lib/app-context";
import { loadAppConfig } from "@/lib/config/app-config";
import { InvalidInputError, toErrorMessage } from "@/lib/errors";
import { formatDuration } from "@/lib/insight/prompts";
import { createLogger } from "@/lib/logger";
import { buildOverlappingChunks, describeChunks } from "@/lib/pipeline/chunker";
import { YouTubeCaptionSource } from "@/lib/pipeline/transcript/fetch-transcript";
import { parseYouTubeVideoId } from "@/lib/pipeline/transcript/parse-url";
import type { VideoExtraction } from "@/lib/pipeline/types";
import { createServerApp } from "@/server/app";

const program = new Command();

program
  .name("tubechat")
  .description("Ask questions about YouTube videos from their captions")
  .version("0.1.0");

const transcript = program.command("transcript").description("Transcript operations");

transcript
  .command("fetch")
  .requiredOption("--url <url>", "YouTube video URL")
  .option("--out <path>", "Output file path (JSON)")
  .action(async (options: { url: string; out?: string }) => {
    try {
      const extraction = await fetchExtraction(options.url);

      if (options.out) {
        await writeJsonFile(options.out, extraction);
        console.log(`Saved ${extraction.captions.length} captions to ${options.out}`);
        return;
      }

      console.log(JSON.stringify(extraction, null, 2));
    } catch (error) {
      console.error(`Transcript fetch failed: ${toErrorMessage(error, "Unknown transcript error")}`);
      process.exitCode = 1;
    }
  });

transcript
  .command("chunk")
  .requiredOption("--url <url>", "YouTube video URL")
  .option("--chunk-size <chars>", "Chunk size in characters", parseInteger)
  .option("--overlap <chars>", "Overlap in characters", parseNonNegativeInteger)
  .option("--out <path>", "Output file path (JSON)")
  .action(async (options: { url: string; chunkSize?: number; overlap?: number; out?: string }) => {
    try {
      const config = loadAppConfig();
      const extraction = await fetchExtraction(options.url);
      const chunks = buildOverlappingChunks(extraction.captions, {
        chunkSizeChars: options.chunkSize ?? config.chunking.chunkSizeChars,
        chunkOverlapChars: options.overlap ?? config.chunking.chunkOverlapChars,
      });

      if (options.out) {
        await writeJsonFile(options.out, { videoId: extraction.videoId, metadata: extraction.metadata, chunks });
        console.log(`Saved ${chunks.length} chunks to ${options.out}`);
        return;
      }

      const stats = describeChunks(chunks);
      console.log(`Video: ${extraction.metadata.title} (${extraction.videoId})`);
      console.log(`- captions: ${extraction.captions.length}`);
      console.log(`- chunks: ${stats.count}`);
      console.log(`- average chunk length: ${stats.averageChars} chars`);

      for (const chunk of chunks) {
        console.log(`  #${chunk.index} ${formatDuration(chunk.startTime)} - ${formatDuration(chunk.endTime)}`);
      }
    } catch (error) {
      console.error(`Transcript chunk failed: ${toErrorMessage(error, "Unknown chunking error")}`);
      process.exitCode = 1;
    }
  });

program
  .command("analyze")
  .argument("<url>", "YouTube video URL")
  .action(async (url: string) => {
    let context: AppContext | undefined;

    try {
      context = buildContext();
      const analysis = await context.insight.analyze(url);

      console.log(`Title: ${analysis.metadata.title}`);
      console.log(`Channel: ${analysis.metadata.channel}`);
      console.log(`Duration: ${formatDuration(analysis.metadata.duration)}`);
      console.log("");
      console.log(analysis.summary);
    } catch (error) {
      console.error(`Analyze failed: ${toErrorMessage(error, "Unknown analysis error")}`);
      process.exitCode = 1;
    } finally {
      context?.close();
    }
  });

program
  .command("chat")
  .argument("<url>", "YouTube video URL")
  .action(async (url: string) => {
    let context: AppContext | undefined;
    const rl = createInterface({ input: process.stdin, output: process.stdout });

    try {
      context = buildContext();
      const analysis = await context.insight.analyze(url);

      console.log(`${analysis.metadata.title} (${formatDuration(analysis.metadata.duration)})`);
      console.log("");
      console.log(analysis.summary);
      console.log("");
      console.log("Ask a question, /history to show the conversation, /exit to quit.");

      for (;;) {
        const question = (await rl.question("> ")).trim();

        if (!question) {
          continue;
        }

        if (question === "/exit") {
          break;
        }

        if (question === "/history") {
          const session = await context.insight.getSession(analysis.videoId);

          for (const message of session?.conversationHistory ?? []) {
            console.log(`[${message.timestamp}] ${message.role}: ${message.content}`);
          }

          continue;
        }

        for await (const event of context.insight.askQuestion(analysis.videoId, question)) {
          if (event.type === "text") {
            process.stdout.write(event.text);
          } else {
            console.error(`Error: ${event.message}`);
          }
        }

        process.stdout.write("\n");
      }
    } catch (error) {
      console.error(`Chat failed: ${toErrorMessage(error, "Unknown chat error")}`);
      process.exitCode = 1;
    } finally {
      rl.close();
      context?.close();
    }
  });

program
  .command("serve")
  .option("--port <port>", "Port to listen on", parseInteger)
  .action((options: { port?: number }) => {
    try {
      const config = loadAppConfig();
      const logger = createLogger();
      const context = createAppContext(config, logger);
      const app = createServerApp(context);
      const port = options.port ?? config.port;

      const server = serve({ fetch: app.fetch, port }, (info) => {
        logger.info({ port: info.port }, "server listening");
      });

      const shutdown = () => {
        logger.info("shutting down");
        context.close();
        server.close();
      };

      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);
    } catch (error) {
      console.error(`Serve failed: ${toErrorMessage(error, "Unknown server error")}`);
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(toErrorMessage(error, "Unknown CLI error"));
  process.exitCode = 1;
});

function buildContext(): AppContext {
  const config = loadAppConfig();
  return createAppContext(config, createLogger({ destination: 2 }));
}

async function fetchExtraction(url: string): Promise<VideoExtraction> {
  const videoId = parseYouTubeVideoId(url);

  if (!videoId) {
    throw new InvalidInputError();
  }

  const config = loadAppConfig();
  const source = new YouTubeCaptionSource({
    language: config.captions.language,
    logger: createLogger({ destination: 2 }),
  });

  return source.fetchCaptions(videoId);
}

async function writeJsonFile(path: string, payload: unknown): Promise<void> {
  await writeFile(path, `${JSON.stringify(payload, null, 2)}\n`, "utf8");
}

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);

  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Invalid integer value: ${value}`);
  }

  return parsed;
}

function parseNonNegativeInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);

  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Invalid integer value: ${value}`);
  }

  return parsed;
}
