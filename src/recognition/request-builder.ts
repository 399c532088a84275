import type { AppConfig } from "../config";
import { UNREADABLE, type ExtractionRequest } from "../types";
import { extensionOf } from "./intake";

const MIME_TYPES: Record<string, string> = {
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  png: "image/png",
  gif: "image/gif",
  bmp: "image/bmp",
};

export function mimeTypeFor(fileName: string): string {
  return MIME_TYPES[extensionOf(fileName)] ?? "image/jpeg";
}

export const PLATE_INSTRUCTION = [
  "You are reading a cropped photo of a vehicle license plate.",
  "The plate text has exactly three parts, read from left to right:",
  "1. left_number: the numeric segment on the left.",
  "2. middle_text: the letter segment in the middle. Return it in its " +
    "original script exactly as printed; do not transliterate or translate it.",
  "3. right_number: the numeric segment on the right.",
  "",
  "If any part cannot be read with confidence, set that field to " +
    `"${UNREADABLE}".`,
  "",
  "Respond with a JSON object containing exactly these three fields and " +
    "nothing else, no prose and no markdown:",
  '{"left_number": "...", "middle_text": "...", "right_number": "..."}',
].join("\n");

export function buildExtractionRequest(
  image: Buffer,
  artifactName: string,
  settings: AppConfig["openai"]
): ExtractionRequest {
  const mimeType = mimeTypeFor(artifactName);
  const dataUri = `data:${mimeType};base64,${image.toString("base64")}`;

  return {
    mimeType,
    payload: {
      model: settings.model,
      messages: [
        {
          role: "user",
          content: [
            { type: "text", text: PLATE_INSTRUCTION },
            { type: "image_url", image_url: { url: dataUri } },
          ],
        },
      ],
      max_tokens: settings.maxTokens,
      response_format: { type: "json_object" },
    },
  };
}

/** Text-only request used to check credentials and connectivity. */
export function buildConnectivityRequest(
  settings: AppConfig["openai"]
): ExtractionRequest {
  return {
    mimeType: "text/plain",
    payload: {
      model: settings.model,
      messages: [{ role: "user", content: 'Say "test" if you can read this.' }],
      max_tokens: 10,
    },
  };
}
