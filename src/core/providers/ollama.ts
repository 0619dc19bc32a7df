import type { ProviderName } from "../settings";
import { OpenAIProvider } from "./openai";

/** Local or remote Ollama server through its OpenAI-compatible endpoint. */
export class OllamaProvider extends OpenAIProvider {
  override readonly name: ProviderName = "ollama";

  constructor(host: string) {
    super("ollama", `${host.replace(/\/+$/, "")}/v1`);
  }
}
