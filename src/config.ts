import path from "node:path";
import { z } from "zod";

export interface AppConfig {
  port: number;
  openai: {
    apiKey: string | null;
    model: string;
    baseUrl: string;
    timeoutMs: number;
    maxTokens: number;
  };
  detector: {
    url: string;
    timeoutMs: number;
  };
  uploadDir: string;
  allowedExtensions: readonly string[];
  maxUploadBytes: number;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  OPENAI_API_KEY: optionalText,
  OPENAI_MODEL: optionalText.pipe(z.string().default("gpt-4.1")),
  OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  OPENAI_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  OPENAI_MAX_TOKENS: z.coerce.number().int().positive().default(300),
  DETECTOR_URL: z.string().url().default("http://127.0.0.1:8000"),
  DETECTOR_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  UPLOAD_DIR: z.string().min(1).default("uploads"),
  ALLOWED_EXTENSIONS: z
    .string()
    .default("png,jpg,jpeg,gif,bmp")
    .transform((raw) =>
      raw
        .split(",")
        .map((ext) => ext.trim().replace(/^\./, "").toLowerCase())
        .filter((ext) => ext.length > 0)
    )
    .pipe(z.array(z.string()).min(1, "at least one extension is required")),
  MAX_UPLOAD_BYTES: z.coerce
    .number()
    .int()
    .positive()
    .default(16 * 1024 * 1024),
});

function stripTrailingSlashes(url: string): string {
  return url.replace(/\/+$/, "");
}

/**
 * Reads the environment once. The returned object is frozen and meant to be
 * passed to every component that needs it.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`
    );
    throw new ConfigError(issues);
  }
  const vars = parsed.data;

  return Object.freeze({
    port: vars.PORT,
    openai: Object.freeze({
      apiKey: vars.OPENAI_API_KEY ?? null,
      model: vars.OPENAI_MODEL,
      baseUrl: stripTrailingSlashes(vars.OPENAI_BASE_URL),
      timeoutMs: vars.OPENAI_TIMEOUT_MS,
      maxTokens: vars.OPENAI_MAX_TOKENS,
    }),
    detector: Object.freeze({
      url: stripTrailingSlashes(vars.DETECTOR_URL),
      timeoutMs: vars.DETECTOR_TIMEOUT_MS,
    }),
    uploadDir: path.resolve(vars.UPLOAD_DIR),
    allowedExtensions: Object.freeze([...new Set(vars.ALLOWED_EXTENSIONS)]),
    maxUploadBytes: vars.MAX_UPLOAD_BYTES,
  });
}

export function maskApiKey(key: string): string {
  return key.length > 12 ? `${key.slice(0, 8)}...${key.slice(-4)}` : "***";
}
