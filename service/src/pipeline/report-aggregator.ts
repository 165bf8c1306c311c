/**
 * Flattens a multi-document validation result into unified issue lists.
 *
 * Encounter order is kept: document 1 before document 2, per-document entries before
 * overall entries. Severity bucketing is the only reordering.
 */

import type { FlatReport, ValidationResult } from "../types.js";

export function flattenReport(result: ValidationResult): FlatReport {
  const issues: string[] = [];
  const criticalIssues: string[] = [];
  const recommendations: string[] = [];

  for (const report of result.individual_document_reports) {
    const documentName = report.document_name ?? "Unknown document";

    for (const finding of report.detailed_findings) {
      if (finding.status !== "FAILED") {
        continue;
      }

      const issueText = `${documentName} - ${finding.requirement ?? "Unknown requirement"}: ${finding.explanation ?? "No explanation"}`;
      if (finding.severity === "CRITICAL") {
        criticalIssues.push(issueText);
      } else {
        issues.push(issueText);
      }
    }

    recommendations.push(...report.recommendations);
  }

  const assessment = result.overall_assessment;
  if (assessment.overall_status !== "ERROR") {
    recommendations.push(...assessment.overall_recommendations);
    issues.push(
      ...assessment.missing_documents.map(
        (document) => `Missing document: ${document}`,
      ),
    );
    issues.push(
      ...assessment.cross_document_inconsistencies.map(
        (inconsistency) =>
          `Cross-document issue: ${inconsistency.issue ?? "Unknown issue"}`,
      ),
    );
  }

  return {
    issues,
    critical_issues: criticalIssues,
    recommendations,
  };
}
