import { describe, it, expect } from "vitest";
import { flattenReport } from "./report-aggregator.js";
import type {
  DocumentReport,
  OverallAssessment,
  ValidationResult,
} from "../types.js";

function documentReport(overrides: Partial<DocumentReport>): DocumentReport {
  return {
    compliance_summary: {},
    detailed_findings: [],
    missing_information: [],
    recommendations: [],
    ...overrides,
  };
}

function result(
  reports: DocumentReport[],
  overall: Partial<OverallAssessment> = {},
): ValidationResult {
  return {
    individual_document_reports: reports,
    overall_assessment: {
      overall_status: "NEEDS_REVIEW",
      cross_document_compliance: {},
      missing_documents: [],
      cross_document_inconsistencies: [],
      overall_recommendations: [],
      completeness_assessment: {},
      ...overall,
    },
  };
}

describe("flattenReport", () => {
  it("should produce empty issue lists when every finding is met", () => {
    const flat = flattenReport(
      result([
        documentReport({
          document_name: "claim.pdf",
          detailed_findings: [
            { requirement: "Signed", status: "MET", severity: "CRITICAL" },
            { requirement: "Dated", status: "MET", severity: "MINOR" },
          ],
        }),
      ]),
    );

    expect(flat).toEqual({ issues: [], critical_issues: [], recommendations: [] });
  });

  it("should place a critical failure only in critical_issues", () => {
    const flat = flattenReport(
      result([
        documentReport({
          document_name: "claim.pdf",
          detailed_findings: [
            {
              requirement: "Policy in force",
              status: "FAILED",
              explanation: "Policy expired",
              severity: "CRITICAL",
            },
          ],
        }),
      ]),
    );

    expect(flat.critical_issues).toEqual([
      "claim.pdf - Policy in force: Policy expired",
    ]);
    expect(flat.issues).toEqual([]);
  });

  it("should use fallbacks for missing fields", () => {
    const flat = flattenReport(
      result([documentReport({ detailed_findings: [{ status: "FAILED" }] })], {
        cross_document_inconsistencies: [{ affected_documents: [] }],
      }),
    );

    expect(flat.issues).toEqual([
      "Unknown document - Unknown requirement: No explanation",
      "Cross-document issue: Unknown issue",
    ]);
  });

  it("should keep encounter order across documents and overall entries", () => {
    const flat = flattenReport(
      result(
        [
          documentReport({
            document_name: "a.pdf",
            detailed_findings: [
              { requirement: "R1", status: "FAILED", explanation: "e1", severity: "MAJOR" },
              { requirement: "R2", status: "UNCLEAR", explanation: "e2", severity: "MAJOR" },
              { requirement: "R3", status: "FAILED", explanation: "e3", severity: "CRITICAL" },
            ],
            recommendations: ["fix a"],
          }),
          documentReport({
            document_name: "b.pdf",
            detailed_findings: [
              { requirement: "R4", status: "FAILED", explanation: "e4", severity: "MINOR" },
              { requirement: "R5", status: "FAILED", explanation: "e5", severity: "CRITICAL" },
            ],
            recommendations: ["fix b"],
          }),
        ],
        {
          overall_recommendations: ["resubmit"],
          missing_documents: ["Bill of lading"],
          cross_document_inconsistencies: [
            { issue: "Amounts differ", affected_documents: ["a.pdf", "b.pdf"] },
          ],
        },
      ),
    );

    expect(flat).toEqual({
      issues: [
        "a.pdf - R1: e1",
        "b.pdf - R4: e4",
        "Missing document: Bill of lading",
        "Cross-document issue: Amounts differ",
      ],
      critical_issues: ["a.pdf - R3: e3", "b.pdf - R5: e5"],
      recommendations: ["fix a", "fix b", "resubmit"],
    });
  });

  it("should append missing documents after per-document issues", () => {
    const flat = flattenReport(
      result(
        [
          documentReport({
            document_name: "claim.pdf",
            detailed_findings: [
              { requirement: "Amount stated", status: "FAILED", explanation: "No amount", severity: "MAJOR" },
            ],
          }),
        ],
        { missing_documents: ["Proof of loss"] },
      ),
    );

    expect(flat.issues).toEqual([
      "claim.pdf - Amount stated: No amount",
      "Missing document: Proof of loss",
    ]);
  });

  it("should flatten an ERROR result to empty lists", () => {
    const flat = flattenReport({
      individual_document_reports: [],
      overall_assessment: {
        overall_status: "ERROR",
        error: "Reasoning service error: timeout",
        suggestions: ["Try again later if this is a temporary service issue"],
      },
    });

    expect(flat).toEqual({ issues: [], critical_issues: [], recommendations: [] });
  });
});
