import "dotenv/config";

import { mkdir } from "node:fs/promises";
import { serve } from "@hono/node-server";

import { ConfigError, loadConfig, type AppConfig } from "./config";
import { createApp } from "./index";
import { HttpPlateDetector } from "./recognition/detection";
import { ExtractionClient } from "./recognition/extraction-client";

function loadOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      for (const issue of error.issues) console.error(`  ${issue}`);
    }
    console.error("Failed to load configuration:", error);
    process.exit(1);
  }
}

const config = loadOrExit();
await mkdir(config.uploadDir, { recursive: true });

const extraction = new ExtractionClient(config.openai);
if (!extraction.configured) {
  console.warn("OPENAI_API_KEY is not set; /recognize will answer 503.");
}

const app = createApp({
  config,
  detector: new HttpPlateDetector(config.detector),
  extraction,
});

console.log("=".repeat(70));
console.log("Vehicle License Plate Recognition API Server");
console.log("=".repeat(70));
console.log(`Server starting on http://localhost:${config.port}`);
console.log(`Upload folder: ${config.uploadDir}`);
console.log(`Plate detector: ${config.detector.url}`);
console.log(
  `Extraction model: ${config.openai.model} (${config.openai.baseUrl})`
);
console.log("\nAvailable endpoints:");
console.log("  GET  /health          - Health check");
console.log("  GET  /info            - API information");
console.log("  POST /recognize       - Recognize license plate");
console.log("=".repeat(70));

serve({ fetch: app.fetch, port: config.port });
