const VIDEO_ID_PATTERN = /^[\w-]{11}$/;
const WATCH_HOSTS = new Set(["youtube.com", "m.youtube.com", "music.youtube.com"]);
const PATH_ID_PATTERN = /^\/(?:embed|shorts|live|v)\/([\w-]{11})(?:[/?#]|$)/;

/**
 * Extracts a YouTube video id from a link.
 *
 * Handles watch pages (including the mobile and music hosts), `youtu.be` short
 * links, and `/embed`, `/shorts`, `/live` and `/v` paths, plus
 * `youtube-nocookie.com` embeds. Returns `null` for anything else, bare ids
 * included.
 */
export function parseYouTubeVideoId(url: string): string | null {
  const trimmed = url.trim();

  if (!trimmed) {
    return null;
  }

  let parsed: URL;

  try {
    parsed = new URL(trimmed);
  } catch {
    return null;
  }

  if (parsed.protocol !== "https:" && parsed.protocol !== "http:") {
    return null;
  }

  const host = parsed.hostname.toLowerCase().replace(/^www\./, "");

  if (host === "youtu.be") {
    const id = parsed.pathname.split("/")[1] ?? "";
    return VIDEO_ID_PATTERN.test(id) ? id : null;
  }

  if (WATCH_HOSTS.has(host)) {
    const v = parsed.searchParams.get("v");

    if (parsed.pathname === "/watch") {
      return v && VIDEO_ID_PATTERN.test(v) ? v : null;
    }

    return parsed.pathname.match(PATH_ID_PATTERN)?.[1] ?? null;
  }

  if (host === "youtube-nocookie.com") {
    return parsed.pathname.match(PATH_ID_PATTERN)?.[1] ?? null;
  }

  return null;
}

export function toWatchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${encodeURIComponent(videoId)}`;
}
