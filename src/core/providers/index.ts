import type { AppSettings } from "../settings";
import { AnthropicProvider } from "./anthropic";
import type { LlmProvider } from "./base";
import { GeminiProvider } from "./gemini";
import { OllamaProvider } from "./ollama";
import { OpenAIProvider } from "./openai";

export type { FinishReason, GenerationRequest, GenerationResult, LlmProvider, TokenUsage } from "./base";

export function createProvider(settings: Pick<AppSettings, "provider" | "credential" | "ollamaHost">): LlmProvider {
  switch (settings.provider) {
    case "gemini":
      return new GeminiProvider(settings.credential);
    case "openai":
      return new OpenAIProvider(settings.credential);
    case "anthropic":
      return new AnthropicProvider(settings.credential);
    case "ollama":
      return new OllamaProvider(settings.ollamaHost);
  }
}
