import { describe, it, expect } from "vitest";
import { PromptComposer } from "../../src/prompts/composer.js";
import { DEFAULT_PROMPTS, type PromptRegistry } from "../../src/prompts/defaults.js";

const registry: PromptRegistry = {
  base: { json: "BASE-JSON", normal: "BASE-NORMAL" },
  modifiers: {
    talk: { json: "TALK-JSON", normal: "TALK-NORMAL" },
    expert: { json: "TODO: write expert modifier", normal: "EXPERT-NORMAL" },
    creative: { json: "   ", normal: "CREATIVE-NORMAL" },
  },
  schemaInstructions: {
    talk: "TALK-SCHEMA",
    creative: "CREATIVE-SCHEMA",
  },
};

describe("PromptComposer", () => {
  const composer = new PromptComposer(registry);

  it("sends only the user message when the prompt is excluded", () => {
    expect(composer.compose("hello", false, "talk", "structured")).toEqual([
      { role: "user", content: "hello" },
    ]);
  });

  it("puts the system prompt first and the user message last", () => {
    const messages = composer.compose("hello", true, "base", "structured");

    expect(messages).toEqual([
      { role: "system", content: "BASE-JSON" },
      { role: "user", content: "hello" },
    ]);
  });

  it("uses the normal base variant in the fallback phase", () => {
    expect(composer.buildSystemPrompt("base", "fallback")).toBe("BASE-NORMAL");
  });

  it("appends modifier and schema instructions in the structured phase", () => {
    expect(composer.buildSystemPrompt("talk", "structured")).toBe(
      "BASE-JSON\n\nTALK-JSON\n\nTALK-SCHEMA"
    );
  });

  it("omits schema instructions in the fallback phase", () => {
    expect(composer.buildSystemPrompt("talk", "fallback")).toBe("BASE-NORMAL\n\nTALK-NORMAL");
  });

  it("falls back to the base prompt for a placeholder modifier", () => {
    expect(composer.buildSystemPrompt("expert", "structured")).toBe("BASE-JSON");
  });

  it("falls back to the base prompt for a blank modifier", () => {
    expect(composer.buildSystemPrompt("creative", "structured")).toBe("BASE-JSON");
  });

  it("uses the modifier without schema block when none is registered", () => {
    expect(composer.buildSystemPrompt("expert", "fallback")).toBe("BASE-NORMAL\n\nEXPERT-NORMAL");
  });

  it("falls back to the base prompt for an unknown mode", () => {
    expect(composer.buildSystemPrompt("poetry", "structured")).toBe("BASE-JSON");
  });

  it("ships defaults with a JSON instruction only in the structured base prompt", () => {
    const defaults = new PromptComposer(DEFAULT_PROMPTS);

    expect(defaults.buildSystemPrompt("base", "structured")).toContain('"response" field');
    expect(defaults.buildSystemPrompt("base", "fallback")).not.toContain('"response" field');
    expect(defaults.buildSystemPrompt("expert", "structured")).toContain('"key_points"');
  });
});
