import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

import type { AppConfig } from "../config";
import type {
  DetectionOutcome,
  DetectorResult,
  ImageSubmission,
  PlateDetector,
  StageResult,
} from "../types";
import {
  errorMessage,
  fail,
  isConnectionError,
  isTimeoutError,
  ok,
} from "./errors";

const detectorReplySchema = z.object({
  plate: z
    .object({
      image_base64: z.string(),
      width: z.number().nonnegative(),
      height: z.number().nonnegative(),
      bounding_box: z.tuple([z.number(), z.number(), z.number(), z.number()]),
    })
    .nullable(),
  context_image_base64: z.string().nullish(),
  top: z.number().default(0),
});

export class DetectorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DetectorError";
  }
}

/**
 * Client for the plate detection service. The model runs out of process; it
 * receives the full photo and answers with the cropped plate (if any).
 */
export class HttpPlateDetector implements PlateDetector {
  constructor(
    private readonly settings: AppConfig["detector"],
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async detect(imagePath: string): Promise<DetectorResult> {
    const image = await readFile(imagePath);
    const form = new FormData();
    form.append("file", new Blob([image]), path.basename(imagePath));

    const url = `${this.settings.url}/detect`;
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "POST",
        body: form,
        signal: AbortSignal.timeout(this.settings.timeoutMs),
      });
    } catch (error) {
      if (isTimeoutError(error)) {
        throw new DetectorError(
          `Detector did not answer within ${this.settings.timeoutMs}ms`,
          { cause: error }
        );
      }
      if (isConnectionError(error)) {
        throw new DetectorError(
          `Could not connect to plate detector at ${this.settings.url}.`,
          { cause: error }
        );
      }
      throw error;
    }

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      throw new DetectorError(
        `Detector error: ${response.status} ${response.statusText}. ` +
          `Details: ${body}`
      );
    }

    const parsed = detectorReplySchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new DetectorError(
        `Unexpected detector reply: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".")} ${issue.message}`)
          .join(", ")}`
      );
    }

    const { plate, context_image_base64, top } = parsed.data;
    if (!plate) {
      return {
        cropped: null,
        boundingRegion: null,
        contextImage: null,
        topOffset: top,
      };
    }
    const [x, y, width, height] = plate.bounding_box;
    return {
      cropped: {
        data: Buffer.from(plate.image_base64, "base64"),
        width: plate.width,
        height: plate.height,
      },
      boundingRegion: { x, y, width, height },
      contextImage: context_image_base64
        ? Buffer.from(context_image_base64, "base64")
        : null,
      topOffset: top,
    };
  }
}

/**
 * Runs the detector on a validated upload. A missing crop and a crop with no
 * area are the same outcome: no plate.
 */
export async function invokeDetection(
  detector: PlateDetector,
  submission: ImageSubmission
): Promise<StageResult<DetectionOutcome>> {
  let result: DetectorResult;
  try {
    result = await detector.detect(submission.path);
  } catch (error) {
    console.error(`Plate detection failed for ${submission.path}:`, error);
    return fail("DetectionFailed", "License plate detection failed", {
      message: errorMessage(error),
    });
  }

  const { cropped } = result;
  if (
    cropped === null ||
    cropped.width * cropped.height === 0 ||
    cropped.data.byteLength === 0
  ) {
    return ok({ status: "not_found" });
  }

  return ok({
    status: "found",
    croppedPlateImage: cropped.data,
    boundingRegion: result.boundingRegion,
    artifactName: `plate_${submission.fileName}`,
  });
}
