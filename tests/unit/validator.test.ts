import { describe, it, expect } from "vitest";
import { SchemaValidator, formatIssue } from "../../src/generation/validator.js";

describe("SchemaValidator", () => {
  const validator = new SchemaValidator({ enabled: true, maxErrors: 5 });

  it("accepts a minimal base payload and unknown extra fields", () => {
    expect(validator.validate({ response: "hi", extra: true }, "base")).toEqual({
      valid: true,
      errors: [],
    });
  });

  it("rejects an empty response", () => {
    const outcome = validator.validate({ response: "" }, "base");

    expect(outcome.valid).toBe(false);
    expect(outcome.errors).toEqual([{ path: "response", message: "response must not be empty" }]);
  });

  it("requires mode-specific fields", () => {
    const outcome = validator.validate({ response: "x" }, "expert");

    expect(outcome.errors.map(formatIssue)).toEqual([
      "topic: Required",
      "confidence: Required",
      "key_points: Required",
    ]);
  });

  it("reports dotted paths into arrays", () => {
    const outcome = validator.validate(
      { response: "x", topic: "t", confidence: 0.5, key_points: ["good", ""] },
      "expert"
    );

    expect(outcome.errors.map(formatIssue)).toEqual([
      "key_points.1: String must contain at least 1 character(s)",
    ]);
  });

  it("checks score ranges", () => {
    const outcome = validator.validate(
      { response: "x", emotional_tone: "calm", engagement_level: 1.5 },
      "talk"
    );

    expect(outcome.errors.map(formatIssue)).toEqual([
      "engagement_level: Number must be less than or equal to 1",
    ]);
  });

  it("accepts a complete creative payload", () => {
    const outcome = validator.validate(
      { response: "x", style: "haiku", imagery: ["moon", "river"], mood: "quiet" },
      "creative"
    );
    expect(outcome.valid).toBe(true);
  });

  it("truncates errors with a count-only summary entry", () => {
    const capped = new SchemaValidator({ enabled: true, maxErrors: 2 });
    const outcome = capped.validate({ response: "x" }, "expert");

    expect(outcome.errors).toEqual([
      { path: "topic", message: "Required" },
      { path: "confidence", message: "Required" },
      { path: "", message: "... and 1 more errors" },
    ]);
    expect(outcome.errors.map(formatIssue)[2]).toBe("... and 1 more errors");
  });

  it("reports everything valid when disabled", () => {
    const disabled = new SchemaValidator({ enabled: false, maxErrors: 5 });
    expect(disabled.validate({ nothing: true }, "expert")).toEqual({ valid: true, errors: [] });
  });
});
