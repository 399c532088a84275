import type { AppConfig } from "../config";
import type { ApiResult, PlateDetector } from "../types";
import { TempArtifacts } from "./artifacts";
import { assembleResult, failureResult } from "./assembler";
import { invokeDetection } from "./detection";
import { errorMessage } from "./errors";
import { NOT_CONFIGURED, type ExtractionClient } from "./extraction-client";
import { validateSubmission, type IntakeCandidate } from "./intake";
import { buildExtractionRequest } from "./request-builder";
import { parsePlateReply } from "./response-parser";

export interface RecognitionDeps {
  config: AppConfig;
  detector: PlateDetector;
  extraction: ExtractionClient;
}

/**
 * intake -> detection -> request -> extraction -> parse -> result.
 * Any stage may end the run; the upload is removed on every path.
 */
export async function recognizePlate(
  candidate: IntakeCandidate,
  deps: RecognitionDeps
): Promise<ApiResult> {
  const artifacts = new TempArtifacts(deps.config.uploadDir);
  try {
    const submission = await validateSubmission(
      candidate,
      deps.config,
      artifacts
    );
    if (!submission.ok) return failureResult(submission.failure);

    if (!deps.extraction.configured) {
      return failureResult(NOT_CONFIGURED);
    }

    console.log(`Processing image: ${submission.value.path}`);
    const detection = await invokeDetection(deps.detector, submission.value);
    if (!detection.ok) return failureResult(detection.failure);

    const outcome = detection.value;
    if (outcome.status === "not_found") {
      console.warn(`No license plate detected in ${submission.value.fileName}`);
      return failureResult({
        kind: "NoPlateDetected",
        error: "Could not detect license plate in the image",
        message:
          "The image may not contain a visible license plate. " +
          "Try a different image with a clearer license plate.",
      });
    }

    const request = buildExtractionRequest(
      outcome.croppedPlateImage,
      outcome.artifactName,
      deps.config.openai
    );
    const reply = await deps.extraction.send(request);
    if (!reply.ok) {
      const { kind, message, error } = reply.failure;
      console.error(`Text extraction failed (${kind}): ${message ?? error}`);
      return failureResult(reply.failure);
    }

    return assembleResult(
      parsePlateReply(reply.value),
      deps.extraction.model,
      reply.value.usage
    );
  } catch (error) {
    console.error("Unexpected error during plate recognition:", error);
    return failureResult({
      kind: "InternalError",
      error: "Internal server error",
      message: errorMessage(error),
    });
  } finally {
    await artifacts.release();
  }
}
