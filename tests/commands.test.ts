import { describe, it, expect } from "vitest";
import { parseCommand, settingPatch, tokenize, type SettingName } from "../src/cli/commands";
import { GenerationError } from "../src/core/errors";

describe("tokenize", () => {
  it("splits on whitespace and keeps quoted runs together", () => {
    expect(tokenize(`a.png "my notes.md"  'x y.pdf' b.txt`)).toEqual([
      "a.png",
      "my notes.md",
      "x y.pdf",
      "b.txt",
    ]);
  });

  it("returns nothing for blank input", () => {
    expect(tokenize("   ")).toEqual([]);
  });
});

describe("parseCommand", () => {
  it("treats plain text as a prompt", () => {
    expect(parseCommand("  What is in this image?  ")).toEqual({
      type: "prompt",
      text: "What is in this image?",
    });
  });

  it.each([
    ["/help", { type: "help" }],
    ["/?", { type: "help" }],
    ["/quit", { type: "quit" }],
    ["/EXIT", { type: "quit" }],
    ["/config", { type: "show-config" }],
    ["/model", { type: "model" }],
    ["/model  gpt-4o-mini ", { type: "model", model: "gpt-4o-mini" }],
    ["/set temperature 0.2", { type: "set", setting: "temperature", value: "0.2" }],
    ["/set TopK off", { type: "set", setting: "topk", value: "off" }],
    ["/set stop END, STOP", { type: "set", setting: "stop", value: "END, STOP" }],
    ["/file a.png 'b c.pdf'", { type: "file", paths: ["a.png", "b c.pdf"] }],
  ])("parses %j", (line, command) => {
    expect(parseCommand(line)).toEqual(command);
  });

  it("keeps the whitespace inside a /set value", () => {
    expect(parseCommand("/set stop a  b,c\td")).toEqual({
      type: "set",
      setting: "stop",
      value: "a  b,c\td",
    });
    expect(settingPatch("stop", "a  b,c\td")).toEqual({ stopSequences: ["a  b", "c\td"] });
  });

  it("asks for at least one path after /file", () => {
    expect(parseCommand("/file")).toEqual({
      type: "invalid",
      message: "Usage: /file <path> [<path> ...]",
    });
  });

  it("names the valid settings for an unknown one", () => {
    expect(parseCommand("/set seed 4")).toEqual({
      type: "invalid",
      message: 'Unknown setting "seed". Expected one of: temperature, topk, topp, max-tokens, stop',
    });
  });

  it("rejects unknown commands", () => {
    expect(parseCommand("/upload x")).toEqual({
      type: "invalid",
      message: "Unknown command /upload. Type /help for the list.",
    });
  });
});

describe("settingPatch", () => {
  it("parses numbers", () => {
    expect(settingPatch("temperature", "0.25")).toEqual({ temperature: 0.25 });
    expect(settingPatch("topk", "40")).toEqual({ topK: 40 });
    expect(settingPatch("topp", "0.9")).toEqual({ topP: 0.9 });
    expect(settingPatch("max-tokens", " 512 ")).toEqual({ maxOutputTokens: 512 });
  });

  it.each(["off", "OFF", "0"])("clears an optional setting with %s", (value) => {
    const patch = settingPatch("topk", value);
    expect(Object.keys(patch)).toEqual(["topK"]);
    expect(patch.topK).toBeUndefined();
  });

  it("splits stop sequences on commas and drops empty entries", () => {
    expect(settingPatch("stop", " END ,, ### ")).toEqual({ stopSequences: ["END", "###"] });
    expect(settingPatch("stop", "")).toEqual({ stopSequences: [] });
  });

  const invalid: [SettingName, string][] = [
    ["temperature", "warm"],
    ["temperature", ""],
    ["max-tokens", "lots"],
  ];

  it.each(invalid)("rejects %s %j", (setting, value) => {
    expect(() => settingPatch(setting, value)).toThrow(GenerationError);
    expect(() => settingPatch(setting, value)).toThrow(`${setting} expects a number, got "${value}"`);
  });
});
