import type { AppConfig } from "../config";
import type {
  ImageSubmission,
  RecognitionFailure,
  StageResult,
} from "../types";
import type { TempArtifacts } from "./artifacts";
import { fail, ok } from "./errors";

export const FILE_FIELD_NAMES = ["image", "file"] as const;

/** The subset of a multipart `File` the intake relies on. */
export interface UploadedFile {
  name: string;
  size: number;
  type: string;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export type IntakeCandidate =
  | { kind: "file"; file: UploadedFile }
  | { kind: "raw"; contentType: string; data: Uint8Array }
  | { kind: "none" };

const MISSING_INPUT_MESSAGE =
  'No image file provided. Send image as form-data with key "image" or ' +
  '"file", or as raw binary data.';

function isMultipart(contentType: string): boolean {
  return (
    contentType.startsWith("multipart/form-data") ||
    contentType.startsWith("application/x-www-form-urlencoded")
  );
}

/**
 * Pulls the image payload out of a request: a multipart field named `image`
 * (preferred) or `file`, otherwise a raw body with an image content type.
 */
export async function readIntakeCandidate(
  request: Request
): Promise<IntakeCandidate> {
  const contentType = (
    request.headers.get("content-type") ?? ""
  ).toLowerCase();

  if (isMultipart(contentType)) {
    const formData = await request.formData();
    for (const field of FILE_FIELD_NAMES) {
      const value = formData.get(field);
      if (value !== null && typeof value !== "string") {
        return { kind: "file", file: value };
      }
    }
    return { kind: "none" };
  }

  if (contentType.includes("image")) {
    const data = new Uint8Array(await request.arrayBuffer());
    return { kind: "raw", contentType, data };
  }

  return { kind: "none" };
}

export function extensionOf(fileName: string): string {
  const dot = fileName.lastIndexOf(".");
  return dot === -1 ? "" : fileName.slice(dot + 1).toLowerCase();
}

export function hasAllowedExtension(
  fileName: string,
  allowedExtensions: readonly string[]
): boolean {
  const ext = extensionOf(fileName);
  return ext !== "" && allowedExtensions.includes(ext);
}

/**
 * Reduces a client-supplied filename to a safe basename: drops any directory
 * part, control characters and anything outside `[A-Za-z0-9._-]`.
 */
export function sanitizeFilename(fileName: string): string {
  const base = fileName.split(/[/\\]/).pop() ?? "";
  const cleaned = base
    .replace(/[\u0000-\u001f\u007f]/g, "")
    .trim()
    .replace(/\s+/g, "_")
    .replace(/[^A-Za-z0-9._-]/g, "")
    .replace(/^[._]+/, "");
  return cleaned.length > 0 ? cleaned : "upload";
}

export async function validateSubmission(
  candidate: IntakeCandidate,
  config: AppConfig,
  artifacts: TempArtifacts
): Promise<StageResult<ImageSubmission>> {
  if (candidate.kind === "none") {
    return fail("MissingInput", MISSING_INPUT_MESSAGE);
  }

  if (candidate.kind === "raw") {
    if (candidate.data.byteLength === 0) {
      return fail("MissingInput", MISSING_INPUT_MESSAGE);
    }
    if (candidate.data.byteLength > config.maxUploadBytes) {
      return { ok: false, failure: payloadTooLarge(config.maxUploadBytes) };
    }
    const fileName = "upload.jpg";
    const imagePath = await artifacts.write(fileName, candidate.data);
    return ok({
      path: imagePath,
      fileName,
      contentType: candidate.contentType,
      size: candidate.data.byteLength,
    });
  }

  const { file } = candidate;
  if (file.name === "") {
    return fail("MissingInput", "No file selected");
  }
  if (!hasAllowedExtension(file.name, config.allowedExtensions)) {
    const allowed = config.allowedExtensions.join(", ");
    return fail(
      "UnsupportedFormat",
      `Invalid file type. Allowed types: ${allowed}`
    );
  }
  if (file.size === 0) {
    return fail("MissingInput", "Uploaded file is empty");
  }
  if (file.size > config.maxUploadBytes) {
    return { ok: false, failure: payloadTooLarge(config.maxUploadBytes) };
  }

  // The extension already passed the allow-list; only the stem needs cleaning.
  const ext = extensionOf(file.name);
  const stem = sanitizeFilename(file.name.slice(0, -(ext.length + 1)));
  const fileName = `${stem}.${ext}`;
  const data = new Uint8Array(await file.arrayBuffer());
  const imagePath = await artifacts.write(fileName, data);
  return ok({
    path: imagePath,
    fileName,
    contentType: file.type || null,
    size: data.byteLength,
  });
}

export function payloadTooLarge(limit: number): RecognitionFailure {
  return {
    kind: "PayloadTooLarge",
    error: "Image is too large",
    message: `Maximum accepted size is ${limit} bytes.`,
  };
}
