import path from "node:path";
import { describe, expect, it } from "vitest";

import { ConfigError, loadConfig, maskApiKey } from "./config";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});

    expect(config).toEqual({
      port: 5000,
      openai: {
        apiKey: null,
        model: "gpt-4.1",
        baseUrl: "https://api.openai.com/v1",
        timeoutMs: 30000,
        maxTokens: 300,
      },
      detector: { url: "http://127.0.0.1:8000", timeoutMs: 15000 },
      uploadDir: path.resolve("uploads"),
      allowedExtensions: ["png", "jpg", "jpeg", "gif", "bmp"],
      maxUploadBytes: 16 * 1024 * 1024,
    });
  });

  it("reads overrides and normalizes them", () => {
    const config = loadConfig({
      PORT: "8080",
      OPENAI_API_KEY: "  test-secret  ",
      OPENAI_MODEL: "vision-small",
      OPENAI_BASE_URL: "http://localhost:11434/v1/",
      ALLOWED_EXTENSIONS: ".JPG, png,,jpg",
    });

    expect(config.port).toBe(8080);
    expect(config.openai.apiKey).toBe("test-secret");
    expect(config.openai.model).toBe("vision-small");
    expect(config.openai.baseUrl).toBe("http://localhost:11434/v1");
    expect(config.allowedExtensions).toEqual(["jpg", "png"]);
  });

  it("treats a blank API key as unset", () => {
    expect(loadConfig({ OPENAI_API_KEY: "   " }).openai.apiKey).toBeNull();
  });

  it("is frozen", () => {
    const config = loadConfig({});

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.openai)).toBe(true);
    expect(Object.isFrozen(config.allowedExtensions)).toBe(true);
  });

  it("lists every invalid variable", () => {
    let caught: unknown;
    try {
      loadConfig({ PORT: "http", OPENAI_BASE_URL: "not a url", ALLOWED_EXTENSIONS: " , " });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.issues.map((issue) => issue.split(":")[0])).toEqual([
      "PORT",
      "OPENAI_BASE_URL",
      "ALLOWED_EXTENSIONS",
    ]);
  });
});

describe("maskApiKey", () => {
  it("keeps the first eight and last four characters", () => {
    expect(maskApiKey("test-secret-value-1234")).toBe("test-sec...1234");
  });

  it("hides short keys entirely", () => {
    expect(maskApiKey("test-secret")).toBe("***");
  });
});
