import { Hono, type Context } from "hono";
import { bodyLimit } from "hono/body-limit";
import { cors } from "hono/cors";
import { logger } from "hono/logger";

import type { AppConfig } from "./config";
import {
  failureResult,
  toHttpResponse,
  type RecognizeFailureBody,
} from "./recognition/assembler";
import {
  payloadTooLarge,
  readIntakeCandidate,
  type IntakeCandidate,
} from "./recognition/intake";
import { recognizePlate, type RecognitionDeps } from "./recognition/pipeline";

export const API_NAME = "Vehicle License Plate Recognition API";
export const API_VERSION = "1.0.0";

/** Room for multipart boundaries and part headers around the image. */
export const MULTIPART_OVERHEAD_BYTES = 64 * 1024;

export type AppDeps = RecognitionDeps;

/** Hono's body-limit middleware errors the request stream with this name. */
function isBodyLimitError(error: unknown): boolean {
  return error instanceof Error && error.name === "BodyLimitError";
}

export function apiInfo(config: AppConfig) {
  return {
    name: API_NAME,
    version: API_VERSION,
    endpoints: {
      "GET /health": "Health check",
      "GET /info": "API information",
      "POST /recognize": "Recognize license plate from image",
    },
    usage: {
      "POST /recognize": {
        description: "Upload an image to recognize license plate",
        parameters: {
          "image (file)": 'Image file (form-data), also accepted under "file"',
          "raw body": "Binary image with an image/* Content-Type",
        },
        response: {
          left_number: "Numeric segment on the left of the plate",
          middle_text: "Letter segment in its original script",
          right_number: "Numeric segment on the right of the plate",
        },
        unreadable_value: "UNREADABLE",
        example:
          'curl -X POST -F "image=@vehicle.jpg" ' +
          `http://localhost:${config.port}/recognize`,
      },
    },
    supported_formats: [...config.allowedExtensions],
    max_upload_bytes: config.maxUploadBytes,
    model: config.openai.model,
  };
}

export function createApp(deps: AppDeps) {
  const app = new Hono();

  // --- Middleware ---
  app.use("*", logger());
  app.use("*", cors());

  // ------------------------------------
  // --- Routes ---
  // ------------------------------------

  app.get("/health", (c) =>
    c.json(
      {
        status: "healthy",
        message: "License Plate Recognition API is running",
        openai_configured: deps.extraction.configured,
      },
      200
    )
  );

  app.get("/info", (c) => c.json(apiInfo(deps.config), 200));

  const tooLarge = (c: Context) => {
    const { status, body } = toHttpResponse(
      failureResult(payloadTooLarge(deps.config.maxUploadBytes))
    );
    return c.json(body, status);
  };

  // Stops reading the body as soon as it outgrows the upload limit.
  const uploadLimit = bodyLimit({
    maxSize: deps.config.maxUploadBytes + MULTIPART_OVERHEAD_BYTES,
    onError: tooLarge,
  });

  app.post("/recognize", uploadLimit, async (c) => {
    let candidate: IntakeCandidate;
    try {
      candidate = await readIntakeCandidate(c.req.raw);
    } catch (error) {
      if (isBodyLimitError(error)) {
        console.warn("Upload rejected: body exceeds the size limit");
        return tooLarge(c);
      }
      console.error("Failed to read upload:", error);
      const body: RecognizeFailureBody = {
        success: false,
        error: "Failed to parse multipart form data.",
        error_code: "MissingInput",
      };
      return c.json(body, 400);
    }

    const result = await recognizePlate(candidate, deps);
    const { status, body } = toHttpResponse(result);
    return c.json(body, status);
  });

  app.notFound((c) =>
    c.json({ success: false, error: "Not found", error_code: "NotFound" }, 404)
  );

  app.onError((error, c) => {
    console.error("Unhandled error:", error);
    const body: RecognizeFailureBody = {
      success: false,
      error: "Internal server error",
      error_code: "InternalError",
      message: error.message,
    };
    return c.json(body, 500);
  });

  return app;
}
