import { mkdtemp, readdir, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { vi } from "vitest";

import { loadConfig, type AppConfig } from "../config";
import type { DetectorResult, PlateDetector } from "../types";

export async function makeUploadDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), "plate-reader-test-"));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function filesIn(dir: string): Promise<string[]> {
  try {
    return await readdir(dir);
  } catch {
    return [];
  }
}

export function testConfig(
  uploadDir: string,
  env: Record<string, string> = {}
): AppConfig {
  return loadConfig({
    OPENAI_API_KEY: "test-secret",
    OPENAI_MODEL: "test-model",
    OPENAI_BASE_URL: "https://extraction.test/v1",
    DETECTOR_URL: "http://detector.test",
    UPLOAD_DIR: uploadDir,
    ...env,
  });
}

export const PLATE_BYTES = Buffer.from("plate-image-bytes");

export function foundPlate(
  overrides: Partial<DetectorResult> = {}
): DetectorResult {
  return {
    cropped: { data: PLATE_BYTES, width: 120, height: 40 },
    boundingRegion: { x: 10, y: 20, width: 120, height: 40 },
    contextImage: null,
    topOffset: 20,
    ...overrides,
  };
}

export function fakeDetector(result: DetectorResult = foundPlate()) {
  const detect = vi.fn<PlateDetector["detect"]>().mockResolvedValue(result);
  return { detect };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

export function completionResponse(
  content: string | null,
  usage: Record<string, unknown> | null = {
    prompt_tokens: 812,
    completion_tokens: 24,
    total_tokens: 836,
  }
): Response {
  return jsonResponse({
    id: "chatcmpl-test",
    choices: [{ index: 0, message: { role: "assistant", content } }],
    usage,
  });
}
