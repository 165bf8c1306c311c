/**
 * Shapes the public JSON returned for a claim submission.
 */

import { flattenReport } from "./report-aggregator.js";
import { resolveStatus } from "./status-resolver.js";
import { RAW_RESPONSE_EXCERPT_LENGTH } from "./response-parser.js";
import { isValidationFailure } from "../types.js";
import type { ClaimResponse, ValidationResult } from "../types.js";

export function toClaimResponse(
  result: ValidationResult,
  filenames: string[],
  modelUsed: string,
): ClaimResponse {
  if (isValidationFailure(result)) {
    const { error, suggestions, raw_response } = result.overall_assessment;
    return {
      status: "error",
      error,
      suggestions,
      raw_response: raw_response
        ? raw_response.slice(0, RAW_RESPONSE_EXCERPT_LENGTH)
        : "",
    };
  }

  const assessment = result.overall_assessment;
  const { issues, critical_issues, recommendations } = flattenReport(result);

  return {
    status: resolveStatus(assessment.overall_status),
    confidence_score: assessment.overall_confidence_score ?? 0.0,
    critical_issues,
    issues,
    compliance_summary: assessment.cross_document_compliance,
    recommendations,
    additional_notes: assessment.additional_notes ?? "",
    individual_document_reports: result.individual_document_reports,
    completeness_assessment: assessment.completeness_assessment,
    model_used: modelUsed,
    filenames,
  };
}
