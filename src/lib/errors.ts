export type AppErrorCode =
  | "INVALID_INPUT"
  | "VIDEO_UNAVAILABLE"
  | "NO_CAPTIONS"
  | "NOT_FOUND"
  | "UPSTREAM"
  | "CONFIGURATION";

export class AppError extends Error {
  readonly code: AppErrorCode;

  constructor(code: AppErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AppError";
    this.code = code;
  }
}

export class InvalidInputError extends AppError {
  constructor(message = "Invalid YouTube URL. Please provide a valid YouTube video link.") {
    super("INVALID_INPUT", message);
    this.name = "InvalidInputError";
  }
}

export class VideoUnavailableError extends AppError {
  constructor(
    message = "Video is unavailable. It may be private, deleted, age-restricted, or region-locked.",
    options?: { cause?: unknown },
  ) {
    super("VIDEO_UNAVAILABLE", message, options);
    this.name = "VideoUnavailableError";
  }
}

export class NoCaptionsError extends AppError {
  constructor(
    message = "No captions available for this video. The video creator has not enabled captions.",
    options?: { cause?: unknown },
  ) {
    super("NO_CAPTIONS", message, options);
    this.name = "NoCaptionsError";
  }
}

export class NotFoundError extends AppError {
  readonly videoId: string;

  constructor(videoId: string) {
    super("NOT_FOUND", `Video session with ID '${videoId}' not found in cache.`);
    this.name = "NotFoundError";
    this.videoId = videoId;
  }
}

export class UpstreamError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("UPSTREAM", message, options);
    this.name = "UpstreamError";
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super("CONFIGURATION", message);
    this.name = "ConfigurationError";
  }
}

export function toErrorMessage(error: unknown, fallback = "Unknown error"): string {
  if (error instanceof Error && error.message) {
    return error.message;
  }

  if (typeof error === "string" && error) {
    return error;
  }

  return fallback;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "APIUserAbortError");
}
