import { describe, expect, it } from "vitest";
import { UpstreamError, VideoUnavailableError } from "@/lib/errors";
import { extractPlayerResponse, fetchVideoMetadata, type FetchFn } from "@/lib/pipeline/transcript/video-metadata";
import { watchPage } from "@/tests/fakes";

function respondWith(body: string, status = 200): { fetchFn: FetchFn; urls: string[] } {
  const urls: string[] = [];
  const fetchFn: FetchFn = async (input) => {
    urls.push(String(input));
    return new Response(body, { status });
  };

  return { fetchFn, urls };
}

describe("extractPlayerResponse", () => {
  it("reads the embedded object even with braces and quotes inside strings", () => {
    const html = watchPage({ videoDetails: { title: 'A {braced} "title"', author: "Chan" } });

    expect(extractPlayerResponse(html)).toEqual({
      videoDetails: { title: 'A {braced} "title"', author: "Chan" },
    });
  });

  it("returns null when the marker is missing", () => {
    expect(extractPlayerResponse("<html></html>")).toBeNull();
  });
});

describe("fetchVideoMetadata", () => {
  it("maps video details to metadata", async () => {
    const { fetchFn, urls } = respondWith(
      watchPage({
        playabilityStatus: { status: "OK" },
        videoDetails: { title: "Test Video", author: "Test Channel", lengthSeconds: "125" },
      }),
    );

    await expect(fetchVideoMetadata("abcDEF12345", { fetchFn })).resolves.toEqual({
      title: "Test Video",
      channel: "Test Channel",
      duration: 125,
    });
    expect(urls).toEqual(["https://www.youtube.com/watch?v=abcDEF12345"]);
  });

  it("reports a missing length as zero", async () => {
    const { fetchFn } = respondWith(watchPage({ videoDetails: { title: "Untimed" } }));

    await expect(fetchVideoMetadata("abcDEF12345", { fetchFn })).resolves.toEqual({
      title: "Untimed",
      channel: "",
      duration: 0,
    });
  });

  it("treats a non-playable video as unavailable", async () => {
    const { fetchFn } = respondWith(
      watchPage({ playabilityStatus: { status: "LOGIN_REQUIRED", reason: "Sign in to confirm your age" } }),
    );

    await expect(fetchVideoMetadata("abcDEF12345", { fetchFn })).rejects.toBeInstanceOf(VideoUnavailableError);
  });

  it("treats a 404 page as unavailable", async () => {
    const { fetchFn } = respondWith("", 404);

    await expect(fetchVideoMetadata("abcDEF12345", { fetchFn })).rejects.toBeInstanceOf(VideoUnavailableError);
  });

  it("reports other HTTP failures as upstream errors", async () => {
    const { fetchFn } = respondWith("", 503);

    await expect(fetchVideoMetadata("abcDEF12345", { fetchFn })).rejects.toThrow(
      new UpstreamError("YouTube page fetch failed: 503"),
    );
  });

  it("reports a page without player data as an upstream error", async () => {
    const { fetchFn } = respondWith("<html><body>consent</body></html>");

    await expect(fetchVideoMetadata("abcDEF12345", { fetchFn })).rejects.toThrow(
      "Could not find ytInitialPlayerResponse in page",
    );
  });
});
