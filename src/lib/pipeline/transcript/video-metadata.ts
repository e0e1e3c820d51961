import { UpstreamError, VideoUnavailableError } from "@/lib/errors";
import { toWatchUrl } from "@/lib/pipeline/transcript/parse-url";
import type { VideoMetadata } from "@/lib/pipeline/types";

export type FetchFn = (input: string | URL, init?: RequestInit) => Promise<Response>;

type PlayerResponse = {
  playabilityStatus?: {
    status?: string;
    reason?: string;
  };
  videoDetails?: {
    title?: string;
    author?: string;
    lengthSeconds?: string;
  };
};

const BROWSER_UA =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36";
const PLAYER_RESPONSE_MARKER = "var ytInitialPlayerResponse = ";

/**
 * Reads title, channel and length from the watch page's embedded player response.
 *
 * A missing length is reported as `0`; callers fall back to the caption span.
 */
export async function fetchVideoMetadata(
  videoId: string,
  options: { fetchFn?: FetchFn; signal?: AbortSignal } = {},
): Promise<VideoMetadata> {
  const fetcher = options.fetchFn ?? globalThis.fetch;

  const response = await fetcher(toWatchUrl(videoId), {
    headers: { "User-Agent": BROWSER_UA, "Accept-Language": "en-US,en;q=0.9" },
    signal: options.signal,
  });

  if (response.status === 404) {
    throw new VideoUnavailableError();
  }

  if (!response.ok) {
    throw new UpstreamError(`YouTube page fetch failed: ${response.status}`);
  }

  const player = extractPlayerResponse(await response.text());

  if (!player) {
    throw new UpstreamError("Could not find ytInitialPlayerResponse in page");
  }

  const status = player.playabilityStatus?.status;

  if (status && status !== "OK") {
    throw new VideoUnavailableError();
  }

  const lengthSeconds = Number.parseInt(player.videoDetails?.lengthSeconds ?? "", 10);

  return {
    title: player.videoDetails?.title ?? "",
    channel: player.videoDetails?.author ?? "",
    duration: Number.isFinite(lengthSeconds) && lengthSeconds > 0 ? lengthSeconds : 0,
  };
}

export function extractPlayerResponse(html: string): PlayerResponse | null {
  const start = html.indexOf(PLAYER_RESPONSE_MARKER);

  if (start === -1) {
    return null;
  }

  const jsonStart = start + PLAYER_RESPONSE_MARKER.length;
  let depth = 0;
  let inString = false;
  let end = -1;

  for (let index = jsonStart; index < html.length; index += 1) {
    const char = html[index];

    if (inString) {
      if (char === "\\") {
        index += 1;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === "{") {
      depth += 1;
    } else if (char === "}") {
      depth -= 1;

      if (depth === 0) {
        end = index + 1;
        break;
      }
    }
  }

  if (end === -1) {
    return null;
  }

  try {
    return JSON.parse(html.slice(jsonStart, end)) as PlayerResponse;
  } catch {
    return null;
  }
}
