import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { ZodError } from "zod";
import type { AppErrorCode } from "@/lib/errors";

export type ProblemDetails = {
  status: number;
  title: string;
  detail: string;
  instance: string;
  errors?: Array<{ path: string; message: string }>;
};

const STATUS_BY_CODE: Record<AppErrorCode, ContentfulStatusCode> = {
  INVALID_INPUT: 400,
  VIDEO_UNAVAILABLE: 400,
  NO_CAPTIONS: 400,
  NOT_FOUND: 404,
  UPSTREAM: 502,
  CONFIGURATION: 500,
};

export function statusForCode(code: AppErrorCode): ContentfulStatusCode {
  return STATUS_BY_CODE[code];
}

export async function readJsonBody(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    return null;
  }
}

export function problem(
  c: Context,
  status: ContentfulStatusCode,
  title: string,
  detail: string,
  errors?: ProblemDetails["errors"],
) {
  const body: ProblemDetails = { status, title, detail, instance: c.req.path };

  if (errors) {
    body.errors = errors;
  }

  return c.json(body, status, { "Content-Type": "application/problem+json" });
}

export function formatZodError(error: ZodError): Array<{ path: string; message: string }> {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
