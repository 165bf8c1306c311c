/**
 * Turns the reasoning service's free-form reply into a ValidationResult.
 *
 * The reply is never schema-guaranteed: the embedded JSON object is located, decoded, and
 * read leniently. Anything that cannot be decoded becomes an ERROR-shaped result carrying an
 * excerpt of the reply. Nothing in this module throws.
 */

import {
  lenientSingleDocumentReportSchema,
  lenientValidationReportSchema,
} from "../llm/schemas/report.js";
import { ParseError, getErrorMessage } from "../errors.js";
import type {
  ErrorAssessment,
  SingleDocumentResult,
  ValidationFailure,
  ValidationResult,
} from "../types.js";

export const RAW_RESPONSE_EXCERPT_LENGTH = 500;

export const PARSE_FAILURE_SUGGESTIONS = [
  "The document may be too complex for automated processing",
  "Try submitting a clearer, more structured document",
  "Manual review may be required",
];

export const INVOCATION_FAILURE_SUGGESTIONS = [
  "Check reasoning service credentials and permissions",
  "Verify the model is available for your account and region",
  "Try again later if this is a temporary service issue",
];

/**
 * Picks the span between the first `{` and the last `}`, or the whole text when there is none.
 */
export function extractJsonCandidate(raw: string): string {
  const text = raw.trim();
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");

  if (start >= 0 && end > start) {
    return text.slice(start, end + 1);
  }
  return text;
}

/**
 * Decodes the embedded JSON object.
 * Throws ParseError when the candidate is not valid JSON or not an object.
 */
export function decodeJsonObject(raw: string): Record<string, unknown> {
  const candidate = extractJsonCandidate(raw);

  let decoded: unknown;
  try {
    decoded = JSON.parse(candidate);
  } catch (error) {
    throw new ParseError(getErrorMessage(error), { cause: error });
  }

  if (typeof decoded !== "object" || decoded === null || Array.isArray(decoded)) {
    throw new ParseError(
      `expected a JSON object but got ${Array.isArray(decoded) ? "an array" : typeof decoded}`,
    );
  }

  return Object.fromEntries(Object.entries(decoded));
}

function parseFailureAssessment(raw: string, error: unknown): ErrorAssessment {
  return {
    overall_status: "ERROR",
    error: `Failed to parse reasoning service response as JSON: ${getErrorMessage(error)}`,
    raw_response: raw.slice(0, RAW_RESPONSE_EXCERPT_LENGTH),
    suggestions: [...PARSE_FAILURE_SUGGESTIONS],
  };
}

function invocationFailureAssessment(error: unknown): ErrorAssessment {
  return {
    overall_status: "ERROR",
    error: `Reasoning service error: ${getErrorMessage(error)}`,
    suggestions: [...INVOCATION_FAILURE_SUGGESTIONS],
  };
}

export function parseValidationResponse(raw: string): ValidationResult {
  let decoded: Record<string, unknown>;
  try {
    decoded = decodeJsonObject(raw);
  } catch (error) {
    console.warn(
      `[ResponseParser] Could not decode reply (${getErrorMessage(error)}). First ${RAW_RESPONSE_EXCERPT_LENGTH} chars: ${raw.slice(0, RAW_RESPONSE_EXCERPT_LENGTH)}`,
    );
    return {
      individual_document_reports: [],
      overall_assessment: parseFailureAssessment(raw, error),
    };
  }

  return lenientValidationReportSchema.parse(decoded);
}

/**
 * ERROR-shaped result for failures of the remote call itself.
 */
export function invocationErrorResult(error: unknown): ValidationFailure {
  return {
    individual_document_reports: [],
    overall_assessment: invocationFailureAssessment(error),
  };
}

export function parseSingleDocumentResponse(raw: string): SingleDocumentResult {
  let decoded: Record<string, unknown>;
  try {
    decoded = decodeJsonObject(raw);
  } catch (error) {
    console.warn(
      `[ResponseParser] Could not decode single-document reply (${getErrorMessage(error)})`,
    );
    return parseFailureAssessment(raw, error);
  }

  return lenientSingleDocumentReportSchema.parse(decoded);
}

export function singleDocumentInvocationError(error: unknown): ErrorAssessment {
  return invocationFailureAssessment(error);
}
