/**
 * Advisory schema validation of structured payloads.
 *
 * An invalid payload is reported, never rejected: the orchestrator still
 * returns its `response`.
 */

import type { ZodIssue } from "zod";
import type { GenerationMode } from "../config/modes.js";
import { schemaForMode } from "../schemas/structured-responses.js";
import type { StructuredPayload } from "./extractor.js";

export interface ValidationIssue {
  /** Dotted path into the payload (`key_points.0`); empty for summary entries */
  path: string;
  message: string;
}

export interface ValidationOutcome {
  valid: boolean;
  errors: ValidationIssue[];
}

export interface SchemaValidatorOptions {
  enabled: boolean;
  maxErrors: number;
}

function toIssue(issue: ZodIssue): ValidationIssue {
  return { path: issue.path.join("."), message: issue.message };
}

export function formatIssue(issue: ValidationIssue): string {
  return issue.path ? `${issue.path}: ${issue.message}` : issue.message;
}

export class SchemaValidator {
  constructor(private readonly options: SchemaValidatorOptions) {}

  validate(payload: StructuredPayload, mode: GenerationMode): ValidationOutcome {
    if (!this.options.enabled) {
      return { valid: true, errors: [] };
    }

    const result = schemaForMode(mode).safeParse(payload);
    if (result.success) {
      return { valid: true, errors: [] };
    }

    return { valid: false, errors: this.truncate(result.error.issues.map(toIssue)) };
  }

  private truncate(errors: ValidationIssue[]): ValidationIssue[] {
    const max = this.options.maxErrors;
    if (errors.length <= max) {
      return errors;
    }
    return [
      ...errors.slice(0, max),
      { path: "", message: `... and ${errors.length - max} more errors` },
    ];
  }
}
