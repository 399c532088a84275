import { describe, expect, it, vi } from "vitest";

import { completionResponse, jsonResponse, testConfig } from "../testing/fixtures";
import { ExtractionClient } from "./extraction-client";
import { buildExtractionRequest } from "./request-builder";

const settings = testConfig("/tmp/unused").openai;
const request = buildExtractionRequest(Buffer.from("crop"), "plate_car.jpg", settings);

/** Sends the headers and a partial body, then stalls until the signal fires. */
function stallingFetch(status: number, head: string) {
  return vi.fn<typeof fetch>(async (_input, init) => {
    const signal = init?.signal;
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode(head));
        if (signal) {
          signal.addEventListener("abort", () => controller.error(signal.reason));
        }
      },
    });
    return new Response(body, { status });
  });
}

describe("ExtractionClient", () => {
  it("posts the payload with bearer auth", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(completionResponse("{}"));
    const client = new ExtractionClient(settings, fetchImpl);

    await client.send(request);

    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe("https://extraction.test/v1/chat/completions");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({
      Authorization: "Bearer test-secret",
      "Content-Type": "application/json",
    });
    expect(JSON.parse(String(init?.body))).toEqual(request.payload);
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it("returns the raw content and usage untouched", async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockResolvedValue(completionResponse("Here you go: {}", { total_tokens: 42 }));
    const client = new ExtractionClient(settings, fetchImpl);

    expect(await client.send(request)).toEqual({
      ok: true,
      value: { content: "Here you go: {}", usage: { total_tokens: 42 }, statusCode: 200 },
    });
  });

  it("maps a null message content to an empty string", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(completionResponse(null, null));
    const client = new ExtractionClient(settings, fetchImpl);

    expect(await client.send(request)).toEqual({
      ok: true,
      value: { content: "", usage: null, statusCode: 200 },
    });
  });

  it("classifies a timeout", async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockRejectedValue(new DOMException("The operation was aborted due to timeout", "TimeoutError"));
    const client = new ExtractionClient(settings, fetchImpl);

    const result = await client.send(request);

    expect(!result.ok && result.failure.kind).toBe("ExtractionTimeout");
    expect(!result.ok && result.failure.message).toBe(
      "No reply from https://extraction.test/v1/chat/completions within 30000ms."
    );
  });

  it("classifies a body that stalls past the deadline as a timeout", async () => {
    const client = new ExtractionClient(settings, stallingFetch(200, '{"choices":['));

    expect(await client.send(request, 50)).toEqual({
      ok: false,
      failure: {
        kind: "ExtractionTimeout",
        error: "Text extraction service timed out",
        message: "No reply from https://extraction.test/v1/chat/completions within 50ms.",
      },
    });
  });

  it("classifies an error body that stalls past the deadline as a timeout", async () => {
    const client = new ExtractionClient(settings, stallingFetch(500, '{"error":'));

    const result = await client.send(request, 50);

    expect(!result.ok && result.failure.kind).toBe("ExtractionTimeout");
  });

  it("classifies a connection failure", async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockRejectedValue(new TypeError("fetch failed", { cause: new Error("getaddrinfo ENOTFOUND extraction.test") }));
    const client = new ExtractionClient(settings, fetchImpl);

    expect(await client.send(request)).toEqual({
      ok: false,
      failure: {
        kind: "ExtractionUnreachable",
        error: "Could not connect to text extraction service",
        message: "Could not connect to https://extraction.test/v1.",
      },
    });
  });

  it("surfaces the service error message and status", async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockResolvedValue(jsonResponse({ error: { message: "Incorrect API key provided" } }, 401));
    const client = new ExtractionClient(settings, fetchImpl);

    expect(await client.send(request)).toEqual({
      ok: false,
      failure: {
        kind: "ExtractionServiceError",
        error: "Text extraction service returned an error",
        message: "Incorrect API key provided",
        statusCode: 401,
      },
    });
  });

  it("falls back to the body text for a non-JSON error", async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockResolvedValue(new Response("upstream overloaded", { status: 503 }));
    const client = new ExtractionClient(settings, fetchImpl);

    const result = await client.send(request);

    expect(!result.ok && result.failure.message).toBe("upstream overloaded");
    expect(!result.ok && result.failure.statusCode).toBe(503);
  });

  it("rejects a success body without choices", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ choices: [] }));
    const client = new ExtractionClient(settings, fetchImpl);

    const result = await client.send(request);

    expect(!result.ok && result.failure.kind).toBe("ExtractionServiceError");
  });

  it("does not call the service without an API key", async () => {
    const fetchImpl = vi.fn<typeof fetch>();
    const unconfigured = testConfig("/tmp/unused", { OPENAI_API_KEY: "" }).openai;
    const client = new ExtractionClient(unconfigured, fetchImpl);

    const result = await client.send(request);

    expect(client.configured).toBe(false);
    expect(!result.ok && result.failure.kind).toBe("ExtractionNotConfigured");
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});
