/**
 * Domain Types
 *
 * Contracts between the request layer, the validation pipeline and the public API.
 */

import type {
  DocumentReport,
  OverallAssessment,
  SingleDocumentReport,
} from "./llm/schemas/report.js";

export type {
  Finding,
  DocumentReport,
  CrossDocumentInconsistency,
  OverallAssessment,
  Verdict,
  FindingStatus,
  Severity,
} from "./llm/schemas/report.js";

/** Document name → extracted plain text, in submission order. */
export type DocumentSet = Map<string, string>;

// ============================================================================
// Validation results
// ============================================================================

export interface ErrorAssessment {
  overall_status: "ERROR";
  error: string;
  /** First characters of the unparseable reply, for operator diagnosis */
  raw_response?: string;
  suggestions: string[];
}

export interface ValidationSuccess {
  individual_document_reports: DocumentReport[];
  overall_assessment: OverallAssessment;
}

export interface ValidationFailure {
  individual_document_reports: [];
  overall_assessment: ErrorAssessment;
}

export type ValidationResult = ValidationSuccess | ValidationFailure;

export function isValidationFailure(
  result: ValidationResult,
): result is ValidationFailure {
  return result.overall_assessment.overall_status === "ERROR";
}

/** Legacy single-document result: fields at top level. */
export type SingleDocumentResult = SingleDocumentReport | ErrorAssessment;

// ============================================================================
// Aggregation & public responses
// ============================================================================

export interface FlatReport {
  issues: string[];
  critical_issues: string[];
  recommendations: string[];
}

export type PublicStatus = "approved" | "rejected" | "needs_review";

export interface ClaimReportResponse {
  status: PublicStatus;
  confidence_score: number;
  critical_issues: string[];
  issues: string[];
  compliance_summary: Record<string, number>;
  recommendations: string[];
  additional_notes: string;
  individual_document_reports: DocumentReport[];
  completeness_assessment: Record<string, boolean>;
  model_used: string;
  filenames: string[];
}

export interface ClaimErrorResponse {
  status: "error";
  error: string;
  suggestions: string[];
  raw_response: string;
}

export type ClaimResponse = ClaimReportResponse | ClaimErrorResponse;

export type ConnectionTestResult =
  | { status: "connected"; model: string; response: string }
  | { status: "error"; error: string };

/** An uploaded file as received by the request layer. */
export interface UploadedFile {
  filename: string;
  content: Buffer;
}
