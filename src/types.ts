export const UNREADABLE = "UNREADABLE";

export const PLATE_FIELDS = [
  "left_number",
  "middle_text",
  "right_number",
] as const;

export type PlateField = (typeof PLATE_FIELDS)[number];

export type PlateRecord = Record<PlateField, string>;

export interface ImageSubmission {
  path: string;
  /** Sanitized name used to derive artifact names. */
  fileName: string;
  contentType: string | null;
  size: number;
}

export interface BoundingRegion {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface CroppedPlate {
  data: Buffer;
  width: number;
  height: number;
}

/** What the detector collaborator hands back for one image. */
export interface DetectorResult {
  cropped: CroppedPlate | null;
  boundingRegion: BoundingRegion | null;
  contextImage: Buffer | null;
  topOffset: number;
}

export interface PlateDetector {
  detect(imagePath: string): Promise<DetectorResult>;
}

export type DetectionOutcome =
  | {
      status: "found";
      croppedPlateImage: Buffer;
      boundingRegion: BoundingRegion | null;
      artifactName: string;
    }
  | { status: "not_found" };

export interface ExtractionRequest {
  mimeType: string;
  payload: ExtractionPayload;
}

export type ChatContentPart =
  | { type: "text"; text: string }
  | { type: "image_url"; image_url: { url: string } };

export interface ExtractionPayload {
  model: string;
  messages: { role: "user" | "system"; content: string | ChatContentPart[] }[];
  max_tokens: number;
  response_format?: { type: "json_object" };
}

export type ExtractionUsage = Record<string, unknown>;

export interface RawExtractionReply {
  content: string;
  usage: ExtractionUsage | null;
  statusCode: number;
}

export type FailureKind =
  | "MissingInput"
  | "UnsupportedFormat"
  | "PayloadTooLarge"
  | "NoPlateDetected"
  | "DetectionFailed"
  | "ExtractionNotConfigured"
  | "ExtractionTimeout"
  | "ExtractionUnreachable"
  | "ExtractionServiceError"
  | "ExtractionParseFailure"
  | "InternalError";

export interface RecognitionFailure {
  kind: FailureKind;
  error: string;
  message?: string;
  statusCode?: number;
  rawContent?: string;
}

export type StageResult<T> =
  | { ok: true; value: T }
  | { ok: false; failure: RecognitionFailure };

export type ApiResult =
  | {
      success: true;
      plate: PlateRecord;
      model: string;
      usage: ExtractionUsage | null;
    }
  | { success: false; failure: RecognitionFailure };
