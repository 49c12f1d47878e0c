import { ParseError, SchemaFieldMissingError } from "../utils/errors.js";

export type StructuredPayload = Record<string, unknown>;

export const RESPONSE_FIELD = "response";

function isPlainObject(value: unknown): value is StructuredPayload {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parses the aggregated structured-phase text.
 *
 * The `response` value is returned exactly as the model produced it;
 * rendering non-string values is the caller's concern.
 */
export class StructuredExtractor {
  /**
   * @throws ParseError when the text is not a JSON object
   * @throws SchemaFieldMissingError when the object has no `response`
   */
  extract(rawText: string): StructuredPayload {
    let parsed: unknown;
    try {
      parsed = JSON.parse(rawText);
    } catch (error) {
      throw new ParseError(
        `Structured response is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    if (!isPlainObject(parsed)) {
      const kind = Array.isArray(parsed) ? "array" : parsed === null ? "null" : typeof parsed;
      throw new ParseError(`Structured response must be a JSON object, got ${kind}`);
    }

    if (!(RESPONSE_FIELD in parsed)) {
      throw new SchemaFieldMissingError(RESPONSE_FIELD);
    }

    return parsed;
  }

  extractResponse(rawText: string): unknown {
    return this.extract(rawText)[RESPONSE_FIELD];
  }
}

/**
 * Text form of an extracted `response` value.
 */
export function renderResponse(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (value === null || value === undefined || typeof value !== "object") {
    return String(value);
  }
  return JSON.stringify(value);
}
