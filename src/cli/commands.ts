import type { GenerationConfigPatch } from "../core/config";
import { GenerationError } from "../core/errors";

export type SettingName = "temperature" | "topk" | "topp" | "max-tokens" | "stop";

export const SETTING_NAMES: readonly SettingName[] = [
  "temperature",
  "topk",
  "topp",
  "max-tokens",
  "stop",
];

export type Command =
  | { type: "prompt"; text: string }
  | { type: "help" }
  | { type: "quit" }
  | { type: "show-config" }
  | { type: "set"; setting: SettingName; value: string }
  | { type: "model"; model?: string }
  | { type: "file"; paths: string[] }
  | { type: "invalid"; message: string };

export const HELP_TEXT = [
  "Type a prompt to send it, or one of:",
  "  /file <path> [<path> ...]   attach files (quote paths with spaces), then enter a prompt",
  "  /config                     show the generation settings",
  "  /set temperature <0-1>",
  "  /set topk <n|off>",
  "  /set topp <0-1|off>",
  "  /set max-tokens <n|off>",
  "  /set stop <a,b,...>         comma-separated stop sequences; empty clears",
  "  /model [<id>]               switch model, or list suggestions",
  "  /help",
  "  /quit",
];

/**
 * Split on whitespace, honouring single and double quotes so paths with
 * spaces survive.
 */
export function tokenize(input: string): string[] {
  const tokens: string[] = [];
  const pattern = /"([^"]*)"|'([^']*)'|(\S+)/g;
  for (const match of input.matchAll(pattern)) {
    tokens.push(match[1] ?? match[2] ?? match[3] ?? "");
  }
  return tokens;
}

export function parseCommand(line: string): Command {
  const trimmed = line.trim();
  if (!trimmed.startsWith("/")) return { type: "prompt", text: trimmed };

  const spaceAt = trimmed.search(/\s/);
  const name = (spaceAt === -1 ? trimmed.slice(1) : trimmed.slice(1, spaceAt)).toLowerCase();
  const rest = spaceAt === -1 ? "" : trimmed.slice(spaceAt + 1).trim();

  switch (name) {
    case "help":
    case "?":
      return { type: "help" };
    case "quit":
    case "exit":
      return { type: "quit" };
    case "config":
      return { type: "show-config" };
    case "model":
      return rest ? { type: "model", model: rest } : { type: "model" };
    case "file": {
      const paths = tokenize(rest);
      if (paths.length === 0) return { type: "invalid", message: "Usage: /file <path> [<path> ...]" };
      return { type: "file", paths };
    }
    case "set": {
      const nameEnd = rest.search(/\s/);
      const setting = nameEnd === -1 ? rest : rest.slice(0, nameEnd);
      const key = setting.toLowerCase();
      if (!isSettingName(key)) {
        return {
          type: "invalid",
          message: `Unknown setting "${setting}". Expected one of: ${SETTING_NAMES.join(", ")}`,
        };
      }
      // The value keeps its inner whitespace; stop sequences may contain spaces.
      return { type: "set", setting: key, value: nameEnd === -1 ? "" : rest.slice(nameEnd + 1) };
    }
    default:
      return { type: "invalid", message: `Unknown command /${name}. Type /help for the list.` };
  }
}

/**
 * Turn a `/set` value into a config patch. "off" or 0 disables an optional
 * numeric setting. Range checks are left to the config validator.
 */
export function settingPatch(setting: SettingName, raw: string): GenerationConfigPatch {
  const value = raw.trim();
  switch (setting) {
    case "temperature":
      return { temperature: parseNumber(setting, value) };
    case "topk":
      return { topK: optionalNumber(setting, value) };
    case "topp":
      return { topP: optionalNumber(setting, value) };
    case "max-tokens":
      return { maxOutputTokens: optionalNumber(setting, value) };
    case "stop":
      return {
        stopSequences: value
          ? value
              .split(",")
              .map((s) => s.trim())
              .filter((s) => s.length > 0)
          : [],
      };
  }
}

function isSettingName(value: string): value is SettingName {
  return SETTING_NAMES.some((name) => name === value);
}

function optionalNumber(setting: SettingName, value: string): number | undefined {
  if (value.toLowerCase() === "off") return undefined;
  const n = parseNumber(setting, value);
  return n === 0 ? undefined : n;
}

function parseNumber(setting: SettingName, value: string): number {
  const n = Number(value);
  if (value === "" || !Number.isFinite(n)) {
    throw new GenerationError("MalformedRequest", `${setting} expects a number, got "${value}"`);
  }
  return n;
}
