import { maskApiKey, type AppConfig } from "./config";
import type { ExtractionClient } from "./recognition/extraction-client";
import { buildConnectivityRequest } from "./recognition/request-builder";

const CONNECTIVITY_TIMEOUT_MS = 10_000;

const STATUS_HINTS: Record<number, string[]> = {
  401: ["Invalid API key", "API key expired", "Wrong API key format"],
  403: [
    "API key doesn't have access to this model",
    "Account has no credits",
    "Account restrictions",
  ],
  429: ["Rate limit exceeded", "Quota exceeded"],
};

export function hintsForStatus(status: number | undefined): string[] {
  return status === undefined ? [] : STATUS_HINTS[status] ?? [];
}

/**
 * Prints the effective extraction settings and sends a one-line test prompt.
 * Resolves to `true` when the service answered.
 */
export async function runConfigCheck(
  config: AppConfig,
  client: ExtractionClient,
  print: (line: string) => void = console.log
): Promise<boolean> {
  const { apiKey, model, baseUrl } = config.openai;
  if (apiKey === null) {
    print("✗ OPENAI_API_KEY not found in environment");
    print("  Add it to your .env file: OPENAI_API_KEY=your_key_here");
    return false;
  }
  print(`✓ OPENAI_API_KEY found: ${maskApiKey(apiKey)}`);
  print(`✓ Model: ${model}`);
  print(`✓ Base URL: ${baseUrl}`);
  print("");
  print("Testing API connectivity...");

  const reply = await client.send(
    buildConnectivityRequest(config.openai),
    CONNECTIVITY_TIMEOUT_MS
  );
  if (reply.ok) {
    print("✓ API connection successful!");
    print(`  Response: ${reply.value.content}`);
    return true;
  }

  const { failure } = reply;
  switch (failure.kind) {
    case "ExtractionTimeout":
      print("✗ API request timed out");
      print("  Check your internet connection");
      break;
    case "ExtractionUnreachable":
      print("✗ Could not connect to the extraction API");
      print("  Check your internet connection and firewall settings");
      break;
    case "ExtractionServiceError":
      print(
        `✗ API request failed with status ${failure.statusCode ?? "unknown"}`
      );
      print(`  Error: ${failure.message ?? failure.error}`);
      {
        const hints = hintsForStatus(failure.statusCode);
        if (hints.length > 0) {
          print("  Possible issues:");
          for (const hint of hints) print(`  - ${hint}`);
        }
      }
      break;
    default:
      print(`✗ Unexpected error: ${failure.message ?? failure.error}`);
  }
  return false;
}
