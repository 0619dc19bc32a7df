import type { GenerationClient } from "../core/client";
import { formatGenerationConfig } from "../core/config";
import { describeError, MediaPromptError } from "../core/errors";
import { silentLogger, type Logger } from "../core/logger";
import { normalizeContent } from "../core/normalizer";
import type { GenerationResult } from "../core/providers/base";
import type { ReaderRegistry } from "../core/readers/registry";
import { HELP_TEXT, parseCommand, settingPatch, type Command } from "./commands";

export const DEFAULT_FILE_PROMPT = "Describe the attached content.";

export interface ShellIO {
  /** Resolves to null at end of input. */
  ask(question: string): Promise<string | null>;
  print(text: string): void;
}

export interface ShellOptions {
  client: GenerationClient;
  registry: ReaderRegistry;
  io: ShellIO;
  suggestedModels?: readonly string[];
  strictFiles?: boolean;
  maxPayloadBytes?: number;
  logger?: Logger;
}

export class Shell {
  private client: GenerationClient;
  private registry: ReaderRegistry;
  private io: ShellIO;
  private options: ShellOptions;
  private logger: Logger;

  constructor(options: ShellOptions) {
    this.client = options.client;
    this.registry = options.registry;
    this.io = options.io;
    this.options = options;
    this.logger = options.logger ?? silentLogger;
  }

  async run(): Promise<void> {
    this.io.print(
      `Connected to ${this.client.provider.name} (${this.client.config.model}). Type /help for commands, /quit to leave.`
    );
    for (;;) {
      const line = await this.io.ask("\nYou: ");
      if (line === null) break;
      if (!(await this.handle(line))) break;
    }
    this.io.print("Bye.");
  }

  /** Run one input line. Returns false when the session should end. */
  async handle(line: string): Promise<boolean> {
    const command = parseCommand(line);
    try {
      return await this.dispatch(command);
    } catch (err) {
      if (!(err instanceof MediaPromptError)) throw err;
      this.logger.debug(`${err.name} while handling "${line}"`, err);
      this.io.print(describeError(err));
      return true;
    }
  }

  private async dispatch(command: Command): Promise<boolean> {
    switch (command.type) {
      case "quit":
        return false;
      case "help":
        HELP_TEXT.forEach((l) => this.io.print(l));
        return true;
      case "invalid":
        this.io.print(command.message);
        return true;
      case "show-config":
        formatGenerationConfig(this.client.config).forEach((l) => this.io.print(l));
        return true;
      case "set": {
        const next = this.client.configure(settingPatch(command.setting, command.value));
        formatGenerationConfig(next).forEach((l) => this.io.print(l));
        return true;
      }
      case "model":
        if (command.model === undefined) {
          this.io.print(`Current model: ${this.client.config.model}`);
          const suggested = this.options.suggestedModels ?? [];
          if (suggested.length > 0) this.io.print(`Suggested: ${suggested.join(", ")}`);
        } else {
          this.client.configure({ model: command.model });
          this.io.print(`Model set to ${this.client.config.model}`);
        }
        return true;
      case "prompt":
        if (command.text) await this.send(command.text, []);
        return true;
      case "file": {
        const answer = await this.io.ask("Prompt (enter for a description): ");
        if (answer === null) return false;
        await this.send(answer.trim() || DEFAULT_FILE_PROMPT, command.paths);
        return true;
      }
    }
  }

  private async send(prompt: string, paths: string[]): Promise<void> {
    const { blocks, failures } = await normalizeContent(prompt, paths, {
      registry: this.registry,
      strict: this.options.strictFiles,
      maxPayloadBytes: this.options.maxPayloadBytes,
      logger: this.logger,
    });
    for (const failure of failures) {
      this.io.print(`${describeError(failure.error)} (skipped)`);
    }
    const result = await this.client.generate(blocks);
    this.io.print(formatReply(result));
  }
}

export function formatReply(result: GenerationResult): string {
  const note = result.finishReason === "stop" ? "" : `\n[finish reason: ${result.finishReason}]`;
  return `\nModel: ${result.text}${note}`;
}
