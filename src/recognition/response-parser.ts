import { z } from "zod";

import {
  PLATE_FIELDS,
  UNREADABLE,
  type PlateRecord,
  type RawExtractionReply,
  type StageResult,
} from "../types";
import { fail, ok } from "./errors";

type JsonObject = Record<string, unknown>;

/** A recovery step. Never throws; `null` means "try the next one". */
export type ParseStrategy = {
  name: string;
  run: (content: string) => JsonObject | null;
};

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseObject(text: string): JsonObject | null {
  try {
    const value: unknown = JSON.parse(text);
    return isJsonObject(value) ? value : null;
  } catch {
    return null;
  }
}

export const directJson: ParseStrategy = {
  name: "direct",
  run: (content) => parseObject(content.trim()),
};

// First flat `{...}` in the text, e.g. inside a ```json fence or after prose.
const FLAT_OBJECT = /\{[^{}]*\}/;

export const embeddedObject: ParseStrategy = {
  name: "embedded",
  run: (content) => {
    const match = FLAT_OBJECT.exec(content);
    return match ? parseObject(match[0]) : null;
  },
};

export const DEFAULT_STRATEGIES: readonly ParseStrategy[] = [
  directJson,
  embeddedObject,
];

const plateField = z
  .union([z.string(), z.number().finite().transform((n) => String(n))])
  .catch(UNREADABLE);

const plateRecordSchema = z.object({
  left_number: plateField,
  middle_text: plateField,
  right_number: plateField,
});

/** Fills every missing or non-text field with the sentinel. */
export function completePlateRecord(source: JsonObject): PlateRecord {
  return plateRecordSchema.parse(source);
}

export function missingFields(source: JsonObject): string[] {
  return PLATE_FIELDS.filter((field) => !(field in source));
}

export function parsePlateReply(
  reply: Pick<RawExtractionReply, "content">,
  strategies: readonly ParseStrategy[] = DEFAULT_STRATEGIES
): StageResult<PlateRecord> {
  for (const strategy of strategies) {
    const recovered = strategy.run(reply.content);
    if (recovered === null) continue;

    const missing = missingFields(recovered);
    if (strategy !== strategies[0] || missing.length > 0) {
      console.warn(
        `Plate reply recovered by "${strategy.name}" parse` +
          (missing.length > 0 ? `, missing: ${missing.join(", ")}` : "")
      );
    }
    return ok(completePlateRecord(recovered));
  }

  console.warn("Could not recover a JSON object from the plate reply");
  return fail(
    "ExtractionParseFailure",
    "Could not parse text extraction reply",
    {
      message: "The extraction service did not return a JSON object.",
      rawContent: reply.content,
    }
  );
}
