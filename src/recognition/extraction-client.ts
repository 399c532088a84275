import { z } from "zod";

import type { AppConfig } from "../config";
import type {
  ExtractionRequest,
  RawExtractionReply,
  RecognitionFailure,
  StageResult,
} from "../types";
import {
  errorMessage,
  fail,
  isConnectionError,
  isTimeoutError,
  ok,
} from "./errors";

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }),
      })
    )
    .min(1),
  usage: z.record(z.unknown()).nullish(),
});

const serviceErrorSchema = z.object({
  error: z.union([z.object({ message: z.string() }), z.string()]),
});

export const NOT_CONFIGURED: RecognitionFailure = {
  kind: "ExtractionNotConfigured",
  error: "Text extraction service is not configured",
  message: "Set OPENAI_API_KEY to enable plate recognition.",
};

/** Rejects when the body read is aborted, so timeouts stay visible. */
async function readServiceError(response: Response): Promise<string> {
  const text = await response.text();
  try {
    const parsed = serviceErrorSchema.safeParse(JSON.parse(text));
    if (parsed.success) {
      const { error } = parsed.data;
      return typeof error === "string" ? error : error.message;
    }
  } catch {
    /* not JSON */
  }
  return text || response.statusText;
}

function timedOut(url: string, timeoutMs: number) {
  return fail<RawExtractionReply>(
    "ExtractionTimeout",
    "Text extraction service timed out",
    { message: `No reply from ${url} within ${timeoutMs}ms.` }
  );
}

/**
 * Talks to an OpenAI-compatible chat completions endpoint. The reply content
 * is returned untouched; reading it is the parser's job.
 */
export class ExtractionClient {
  constructor(
    private readonly settings: AppConfig["openai"],
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  get configured(): boolean {
    return this.settings.apiKey !== null;
  }

  get model(): string {
    return this.settings.model;
  }

  async send(
    request: ExtractionRequest,
    timeoutMs: number = this.settings.timeoutMs
  ): Promise<StageResult<RawExtractionReply>> {
    if (this.settings.apiKey === null) {
      return { ok: false, failure: NOT_CONFIGURED };
    }

    const url = `${this.settings.baseUrl}/chat/completions`;
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.settings.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify(request.payload),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      if (isTimeoutError(error)) {
        return timedOut(url, timeoutMs);
      }
      if (isConnectionError(error)) {
        return fail(
          "ExtractionUnreachable",
          "Could not connect to text extraction service",
          { message: `Could not connect to ${this.settings.baseUrl}.` }
        );
      }
      console.error("Unexpected error calling text extraction service:", error);
      return fail("InternalError", "Error during license plate recognition", {
        message: errorMessage(error),
      });
    }

    // The timeout signal still covers the body reads below.
    if (!response.ok) {
      let detail: string;
      try {
        detail = await readServiceError(response);
      } catch (error) {
        if (isTimeoutError(error)) return timedOut(url, timeoutMs);
        console.error("Could not read extraction error body:", error);
        detail = response.statusText;
      }
      return fail(
        "ExtractionServiceError",
        "Text extraction service returned an error",
        { message: detail, statusCode: response.status }
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      if (isTimeoutError(error)) return timedOut(url, timeoutMs);
      return fail(
        "ExtractionServiceError",
        "Text extraction service returned an invalid body",
        { message: errorMessage(error), statusCode: response.status }
      );
    }

    const parsed = completionSchema.safeParse(body);
    if (!parsed.success) {
      return fail(
        "ExtractionServiceError",
        "Text extraction service returned an unexpected body",
        {
          message: parsed.error.issues
            .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
            .join("; "),
          statusCode: response.status,
        }
      );
    }

    return ok({
      content: parsed.data.choices[0].message.content ?? "",
      usage: parsed.data.usage ?? null,
      statusCode: response.status,
    });
  }
}
