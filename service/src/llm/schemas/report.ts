/**
 * Compliance report structures exchanged with the reasoning service.
 *
 * Two families of schemas live here:
 * - descriptive schemas, rendered into the prompt so the model knows the exact reply shape;
 * - lenient readers, applied to whatever the model actually returned. Every field falls
 *   back to a safe default instead of failing, so a reply that satisfies most of the
 *   schema still flows through the pipeline.
 */

import { z } from "zod";

export const VERDICTS = ["APPROVED", "REJECTED", "NEEDS_REVIEW"] as const;
export const FINDING_STATUSES = [
  "MET",
  "FAILED",
  "UNCLEAR",
  "NOT_APPLICABLE",
] as const;
export const SEVERITIES = ["CRITICAL", "MAJOR", "MINOR"] as const;

export type Verdict = (typeof VERDICTS)[number];
export type FindingStatus = (typeof FINDING_STATUSES)[number];
export type Severity = (typeof SEVERITIES)[number];

// ============================================================================
// Descriptive schemas (prompt rendering)
// ============================================================================

const findingSchema = z.object({
  requirement: z.string().describe("Specific requirement from the rules"),
  status: z.enum(FINDING_STATUSES),
  evidence: z
    .string()
    .describe("Specific text from the document that addresses this requirement"),
  explanation: z
    .string()
    .describe("Why this requirement is met, failed, unclear or not applicable"),
  severity: z.enum(SEVERITIES),
});

const complianceSummarySchema = z.object({
  total_requirements_checked: z.number(),
  requirements_met: z.number(),
  requirements_failed: z.number(),
  requirements_unclear: z.number(),
});

export const documentReportSchema = z.object({
  document_name: z.string().describe("Exact name of the submitted document"),
  document_status: z.enum(VERDICTS),
  confidence_score: z.number().min(0).max(1).describe("0.0 to 1.0"),
  compliance_summary: complianceSummarySchema,
  detailed_findings: z.array(findingSchema),
  missing_information: z
    .array(z.string())
    .describe("Required information missing from this document"),
  recommendations: z
    .array(z.string())
    .describe("Actionable recommendations for this document"),
  notes: z.string().describe("Other observations about this document"),
});

export const crossDocumentInconsistencySchema = z.object({
  issue: z
    .string()
    .describe("Discrepancy between documents, e.g. conflicting dates or amounts"),
  affected_documents: z.array(z.string()),
  severity: z.enum(SEVERITIES),
  recommendation: z.string(),
});

export const overallAssessmentSchema = z.object({
  overall_status: z.enum(VERDICTS),
  overall_confidence_score: z.number().min(0).max(1).describe("0.0 to 1.0"),
  cross_document_compliance: z.object({
    total_documents_reviewed: z.number(),
    documents_compliant: z.number(),
    documents_non_compliant: z.number(),
    documents_unclear: z.number(),
  }),
  missing_documents: z
    .array(z.string())
    .describe("Required document types that were not submitted"),
  cross_document_inconsistencies: z.array(crossDocumentInconsistencySchema),
  overall_recommendations: z.array(z.string()),
  completeness_assessment: z.object({
    all_documents_present: z.boolean(),
    all_information_present: z.boolean(),
    ready_for_processing: z.boolean(),
  }),
  additional_notes: z.string(),
});

export const validationReportSchema = z
  .object({
    individual_document_reports: z
      .array(documentReportSchema)
      .describe("One report per submitted document, in submission order"),
    overall_assessment: overallAssessmentSchema,
  })
  .describe("Multi-document validation report");

export const singleDocumentReportSchema = z
  .object({
    overall_status: z.enum(VERDICTS),
    confidence_score: z.number().min(0).max(1).describe("0.0 to 1.0"),
    compliance_summary: complianceSummarySchema,
    detailed_findings: z.array(findingSchema),
    missing_documents: z
      .array(z.string())
      .describe("Required documents that appear to be missing"),
    missing_information: z
      .array(z.string())
      .describe("Required information that appears to be missing"),
    recommendations: z
      .array(z.string())
      .describe("Specific actionable recommendations to address issues"),
    additional_notes: z
      .string()
      .describe("Any other relevant observations or concerns"),
  })
  .describe("Single-document validation report");

// ============================================================================
// Lenient readers (model output)
// ============================================================================

const optionalText = () => z.string().optional().catch(undefined);

const optionalScore = () => z.number().optional().catch(undefined);

const textList = () =>
  z
    .array(z.unknown())
    .catch([])
    .transform((items) =>
      items.filter((item): item is string => typeof item === "string"),
    );

/** Keeps the entries holding the expected type; a bad value drops only its own key. */
function recordOf<T>(isValue: (value: unknown) => value is T) {
  return z
    .record(z.unknown())
    .catch({})
    .transform((entries): Record<string, T> =>
      Object.fromEntries(
        Object.entries(entries).flatMap(([key, value]): [string, T][] =>
          isValue(value) ? [[key, value]] : [],
        ),
      ),
    );
}

const counts = () =>
  recordOf((value): value is number => typeof value === "number");

const flags = () =>
  recordOf((value): value is boolean => typeof value === "boolean");

/** Parses each element on its own and drops the ones that are not objects. */
function objectList<T extends z.ZodTypeAny>(schema: T) {
  return z
    .array(z.unknown())
    .catch([])
    .transform((items) =>
      items.flatMap((item): z.output<T>[] => {
        const parsed = schema.safeParse(item);
        return parsed.success ? [parsed.data] : [];
      }),
    );
}

// Per-document reports reach the client as returned, so keys the model adds are kept.
const lenientFindingSchema = z
  .object({
    requirement: optionalText(),
    status: z.enum(FINDING_STATUSES).optional().catch(undefined),
    evidence: optionalText(),
    explanation: optionalText(),
    severity: z.enum(SEVERITIES).optional().catch(undefined),
  })
  .passthrough();

const lenientDocumentReportSchema = z
  .object({
    document_name: optionalText(),
    document_status: z.enum(VERDICTS).optional().catch(undefined),
    confidence_score: optionalScore(),
    compliance_summary: counts(),
    detailed_findings: objectList(lenientFindingSchema),
    missing_information: textList(),
    recommendations: textList(),
    notes: optionalText(),
  })
  .passthrough();

const lenientInconsistencySchema = z.object({
  issue: optionalText(),
  affected_documents: textList(),
  severity: z.enum(SEVERITIES).optional().catch(undefined),
  recommendation: optionalText(),
});

const lenientOverallAssessmentSchema = z.object({
  overall_status: z.enum(VERDICTS).optional().catch(undefined),
  overall_confidence_score: optionalScore(),
  cross_document_compliance: counts(),
  missing_documents: textList(),
  cross_document_inconsistencies: objectList(lenientInconsistencySchema),
  overall_recommendations: textList(),
  completeness_assessment: flags(),
  additional_notes: optionalText(),
});

export const lenientValidationReportSchema = z.object({
  individual_document_reports: objectList(lenientDocumentReportSchema),
  overall_assessment: lenientOverallAssessmentSchema.catch({
    cross_document_compliance: {},
    missing_documents: [],
    cross_document_inconsistencies: [],
    overall_recommendations: [],
    completeness_assessment: {},
  }),
});

export const lenientSingleDocumentReportSchema = z.object({
  overall_status: z.enum(VERDICTS).optional().catch(undefined),
  confidence_score: optionalScore(),
  compliance_summary: counts(),
  detailed_findings: objectList(lenientFindingSchema),
  missing_documents: textList(),
  missing_information: textList(),
  recommendations: textList(),
  additional_notes: optionalText(),
});

export type Finding = z.output<typeof lenientFindingSchema>;
export type DocumentReport = z.output<typeof lenientDocumentReportSchema>;
export type CrossDocumentInconsistency = z.output<
  typeof lenientInconsistencySchema
>;
export type OverallAssessment = z.output<typeof lenientOverallAssessmentSchema>;
export type ValidationReport = z.output<typeof lenientValidationReportSchema>;
export type SingleDocumentReport = z.output<
  typeof lenientSingleDocumentReportSchema
>;
