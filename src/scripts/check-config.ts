import "dotenv/config";

import { runConfigCheck } from "../config-check";
import { loadConfig } from "../config";
import { ExtractionClient } from "../recognition/extraction-client";

console.log("=".repeat(70));
console.log("Extraction API Configuration Check");
console.log("=".repeat(70));

let success = false;
try {
  const config = loadConfig();
  success = await runConfigCheck(config, new ExtractionClient(config.openai));
} catch (error) {
  console.error("✗ Unexpected error:", error);
}

console.log("=".repeat(70));
process.exit(success ? 0 : 1);
