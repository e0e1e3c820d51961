import { describe, expect, it } from "vitest";
import { buildAnswerPrompt, buildSummaryPrompt, formatDuration } from "@/lib/insight/prompts";
import { TEST_METADATA } from "@/tests/fakes";

describe("buildSummaryPrompt", () => {
  it("asks for a summary of the titled transcript", () => {
    expect(buildSummaryPrompt(TEST_METADATA, "hello world")).toEqual([
      {
        role: "user",
        content: [
          "Please provide a comprehensive summary of the following YouTube video transcript.",
          'The video title is: "Test Video"',
          'The channel is: "Test Channel"',
          "",
          "Transcript:",
          "hello world",
          "",
          "Please provide a well-structured summary that captures the main points, key insights, and overall message of the video.",
        ].join("\n"),
      },
    ]);
  });
});

describe("buildAnswerPrompt", () => {
  it("places summary and history ahead of the transcript", () => {
    const [prompt] = buildAnswerPrompt({
      metadata: TEST_METADATA,
      summary: "A short summary.",
      history: [
        { role: "user", content: "Q1", timestamp: "2026-01-01T00:00:00.000Z" },
        { role: "assistant", content: "A1", timestamp: "2026-01-01T00:00:01.000Z" },
      ],
      transcript: "hello world",
      question: "Q2",
    });

    expect(prompt.role).toBe("user");
    expect(prompt.content).toContain(
      [
        "Title: \"Test Video\"",
        "Channel: \"Test Channel\"",
        "Duration: 0:02:00",
        "",
        "Video Summary: A short summary.",
        "",
        "Previous conversation:",
        "user: Q1",
        "assistant: A1",
        "",
        "Video Transcript:",
        "hello world",
        "",
        "User Question: Q2",
      ].join("\n"),
    );
  });

  it("omits empty summary and history blocks", () => {
    const [prompt] = buildAnswerPrompt({
      metadata: TEST_METADATA,
      history: [],
      transcript: "hello world",
      question: "Q",
    });

    expect(prompt.content.startsWith("You are an AI assistant helping answer questions about a YouTube video.")).toBe(
      true,
    );
    expect(prompt.content).toContain("Duration: 0:02:00\n\nVideo Transcript:\nhello world\n\nUser Question: Q\n\n");
    expect(prompt.content).not.toContain("Video Summary:");
    expect(prompt.content).not.toContain("Previous conversation:");
  });
});

describe("formatDuration", () => {
  it.each([
    [0, "0:00:00"],
    [59, "0:00:59"],
    [125, "0:02:05"],
    [3725, "1:02:05"],
    [36000.9, "10:00:00"],
    [-5, "0:00:00"],
  ])("formats %d seconds as %s", (seconds, expected) => {
    expect(formatDuration(seconds)).toBe(expected);
  });
});
