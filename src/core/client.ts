/**
 * Single point of contact with the generation service: holds the session's
 * GenerationConfig and credential and sends one request per generate() call.
 */

import type { ContentBlock } from "./content";
import {
  updateGenerationConfig,
  validateGenerationConfig,
  type GenerationConfig,
  type GenerationConfigPatch,
} from "./config";
import { GenerationError } from "./errors";
import { silentLogger, type Logger } from "./logger";
import { messageOf, type GenerationResult, type LlmProvider } from "./providers/base";

export type ClientState = "idle" | "in-flight";

export interface GenerationClientOptions {
  provider: LlmProvider;
  credential: string;
  config: GenerationConfig;
  /** Abort the request after this many milliseconds. Undefined = wait indefinitely. */
  timeoutMs?: number;
  logger?: Logger;
}

export class GenerationClient {
  readonly provider: LlmProvider;
  private readonly credential: string;
  private readonly timeoutMs?: number;
  private readonly logger: Logger;
  private currentConfig: GenerationConfig;
  private currentState: ClientState = "idle";

  constructor(options: GenerationClientOptions) {
    this.provider = options.provider;
    this.credential = options.credential;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? silentLogger;
    this.currentConfig = validateGenerationConfig(options.config);
  }

  get config(): GenerationConfig {
    return this.currentConfig;
  }

  get state(): ClientState {
    return this.currentState;
  }

  /** Replace the config with a validated copy that has `patch` applied. */
  configure(patch: GenerationConfigPatch): GenerationConfig {
    this.assertIdle();
    this.currentConfig = updateGenerationConfig(this.currentConfig, patch);
    return this.currentConfig;
  }

  async generate(blocks: readonly ContentBlock[]): Promise<GenerationResult> {
    if (this.credential.trim().length === 0) {
      throw new GenerationError("AuthFailure", "No API credential configured");
    }
    if (blocks.length === 0) {
      throw new GenerationError("MalformedRequest", "Nothing to send: no content blocks");
    }
    this.assertIdle();
    const config = validateGenerationConfig(this.currentConfig);

    const controller = new AbortController();
    let timedOut = false;
    const timer =
      this.timeoutMs === undefined
        ? undefined
        : setTimeout(() => {
            timedOut = true;
            controller.abort();
          }, this.timeoutMs);

    this.currentState = "in-flight";
    const t0 = Date.now();
    this.logger.debug(
      `→ ${this.provider.name}/${config.model}: ${blocks.map((b) => b.kind).join(", ")}`
    );
    try {
      const result = await this.provider.generate({ blocks, config, signal: controller.signal });
      this.logger.debug(
        `← ${result.finishReason} in ${Date.now() - t0} ms` +
          (result.usage ? ` (${result.usage.inputTokens} in / ${result.usage.outputTokens} out)` : "")
      );
      return result;
    } catch (err) {
      if (timedOut) {
        throw new GenerationError("Timeout", `No response within ${this.timeoutMs} ms`, { cause: err });
      }
      if (err instanceof GenerationError) throw err;
      throw new GenerationError("ProviderError", messageOf(err), { cause: err });
    } finally {
      clearTimeout(timer);
      this.currentState = "idle";
    }
  }

  private assertIdle(): void {
    if (this.currentState === "in-flight") {
      throw new Error("A generation request is already in flight");
    }
  }
}
