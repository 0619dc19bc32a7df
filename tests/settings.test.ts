import { afterEach, describe, it, expect } from "vitest";
import { ConfigurationError } from "../src/core/errors";
import { DEFAULT_MODELS, loadEnvFile, loadSettings } from "../src/core/settings";
import { makeTempDir, type TempDir } from "./fixtures";

describe("loadSettings", () => {
  it("defaults to gemini with its default model", () => {
    const settings = loadSettings({ GEMINI_API_KEY: "test-key" });
    expect(settings).toEqual({
      provider: "gemini",
      credential: "test-key",
      model: DEFAULT_MODELS.gemini,
      ollamaHost: "http://localhost:11434",
      timeoutMs: 60_000,
      maxPayloadBytes: undefined,
      strictFiles: false,
      logLevel: "info",
    });
  });

  it("fails when the chosen provider's key is missing", () => {
    expect(() => loadSettings({})).toThrow(ConfigurationError);
    expect(() => loadSettings({})).toThrow("GEMINI_API_KEY is not set");
    expect(() => loadSettings({ LLM_PROVIDER: "openai", GEMINI_API_KEY: "test-key" })).toThrow(
      "OPENAI_API_KEY is not set"
    );
  });

  it("treats a blank key as missing", () => {
    expect(() => loadSettings({ GEMINI_API_KEY: "   " })).toThrow("GEMINI_API_KEY is not set");
  });

  it("selects the provider case-insensitively and applies its model override", () => {
    const settings = loadSettings({
      LLM_PROVIDER: "Anthropic",
      ANTHROPIC_API_KEY: "test-key",
      ANTHROPIC_MODEL: "claude-3-5-haiku-latest",
    });
    expect(settings.provider).toBe("anthropic");
    expect(settings.model).toBe("claude-3-5-haiku-latest");
  });

  it("needs no key for ollama", () => {
    const settings = loadSettings({ LLM_PROVIDER: "ollama", OLLAMA_HOST: "http://gpu-box:11434" });
    expect(settings.credential).toBe("ollama");
    expect(settings.ollamaHost).toBe("http://gpu-box:11434");
    expect(settings.model).toBe(DEFAULT_MODELS.ollama);
  });

  it("parses numeric and boolean options", () => {
    const settings = loadSettings({
      GEMINI_API_KEY: "test-key",
      LLM_TIMEOUT_MS: "1500",
      MAX_PAYLOAD_BYTES: "2048",
      STRICT_FILES: "TRUE",
      LOG_LEVEL: "debug",
    });
    expect(settings.timeoutMs).toBe(1500);
    expect(settings.maxPayloadBytes).toBe(2048);
    expect(settings.strictFiles).toBe(true);
    expect(settings.logLevel).toBe("debug");
  });

  it("falls back to defaults for empty values", () => {
    const settings = loadSettings({ GEMINI_API_KEY: "test-key", LLM_TIMEOUT_MS: "", STRICT_FILES: "" });
    expect(settings.timeoutMs).toBe(60_000);
    expect(settings.strictFiles).toBe(false);
  });

  it("rejects unknown providers and invalid numbers", () => {
    expect(() => loadSettings({ LLM_PROVIDER: "mystery" })).toThrow(ConfigurationError);
    expect(() => loadSettings({ GEMINI_API_KEY: "test-key", LLM_TIMEOUT_MS: "soon" })).toThrow(
      ConfigurationError
    );
  });
});

describe("loadEnvFile", () => {
  let dir: TempDir | undefined;

  afterEach(() => {
    dir?.cleanup();
    delete process.env.MEDIAPROMPT_TEST_VALUE;
  });

  it("reads variables from .env in the given directory", () => {
    dir = makeTempDir();
    dir.write(".env", "MEDIAPROMPT_TEST_VALUE=from-file\n");
    loadEnvFile(dir.path);
    expect(process.env.MEDIAPROMPT_TEST_VALUE).toBe("from-file");
  });

  it("does not override variables that are already set", () => {
    dir = makeTempDir();
    dir.write(".env", "MEDIAPROMPT_TEST_VALUE=from-file\n");
    process.env.MEDIAPROMPT_TEST_VALUE = "from-env";
    loadEnvFile(dir.path);
    expect(process.env.MEDIAPROMPT_TEST_VALUE).toBe("from-env");
  });

  it("is a no-op when there is no .env file", () => {
    dir = makeTempDir();
    expect(() => loadEnvFile(dir?.path)).not.toThrow();
  });
});
