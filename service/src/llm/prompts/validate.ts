/**
 * Validation prompts: the rules document and the submitted claim documents, wrapped in
 * explicit delimiters, followed by the reply structure and the analysis guidelines.
 *
 * Rendering is a pure function of its inputs. The closing "JSON only" instruction is what
 * the response parser relies on.
 */

import {
  singleDocumentReportSchema,
  validationReportSchema,
} from "../schemas/report.js";
import { zodToTs } from "../schemas/utils.js";
import type { DocumentSet } from "../../types.js";

const MULTI_DOCUMENT_PROMPT_TEMPLATE = `
You are an expert document reviewer specializing in {{ claim_type }} validation.
Your task is to compare a set of submitted documents against a comprehensive set of rules and requirements.

<rules_document>
{{ rules }}
</rules_document>

<submitted_documents>
{{ documents }}
</submitted_documents>

Analyze every submitted document against the rules document, then assess the submission as a whole.

OUTPUT FORMAT:
Your reply must follow this specific structure:

\`\`\`typescript
{{ schema }}
\`\`\`

GUIDELINES FOR YOUR ANALYSIS:

1. Analyze each document independently against the requirements that apply to its document type before cross-referencing documents.
2. Do NOT penalize a document for missing information that belongs to a different document type; report such gaps in missing_documents instead.
3. After the individual analysis, cross-reference the documents for inconsistencies such as conflicting names, dates, amounts or policy numbers.
4. When a requirement is ambiguous or the evidence is borderline, prefer the less punitive verdict (NEEDS_REVIEW over REJECTED, MET over UNCLEAR). Approved claims still receive human review.
5. Ignore any requirement whose satisfaction cannot be determined from the document content alone, such as submission timeliness or the date the claim was received.
6. Use the exact document names given in the name attribute of each <document> tag.
7. Provide specific evidence from the document text whenever possible.
8. Mark a finding CRITICAL only if failing it alone would justify rejecting the claim.

Return ONLY a valid JSON object matching this interface, with no additional text or explanation outside the JSON structure.
`;

const SINGLE_DOCUMENT_PROMPT_TEMPLATE = `
You are an expert document reviewer specializing in {{ claim_type }} validation.
Your task is to carefully compare a submitted application against a comprehensive set of rules and requirements.

<rules_document>
{{ rules }}
</rules_document>

<submitted_application>
{{ application }}
</submitted_application>

Analyze the submitted application against the rules document.

OUTPUT FORMAT:
Your reply must follow this specific structure:

\`\`\`typescript
{{ schema }}
\`\`\`

GUIDELINES FOR YOUR ANALYSIS:

1. Be thorough and systematic: check every requirement mentioned in the rules that applies to this application.
2. Look for both explicit compliance (directly stated) and implicit compliance (can be reasonably inferred).
3. Pay attention to required fields, signatures, dates and specific procedural requirements.
4. When information is ambiguous, prefer the less punitive verdict and note the ambiguity explicitly.
5. Ignore any requirement whose satisfaction cannot be determined from the application content alone, such as submission timeliness.
6. Provide specific evidence from the application text when possible.

Return ONLY a valid JSON object matching this interface, with no additional text or explanation outside the JSON structure.
`;

const MULTI_DOCUMENT_SCHEMA = zodToTs(validationReportSchema, "ValidationReport");
const SINGLE_DOCUMENT_SCHEMA = zodToTs(
  singleDocumentReportSchema,
  "SingleDocumentReport",
);

/**
 * Substitutes every `{{ key }}` placeholder in one pass, so inserted document text is
 * never scanned for further placeholders or replacement patterns.
 */
function render(template: string, values: Record<string, string>): string {
  return template
    .replace(/\{\{ (\w+) \}\}/g, (placeholder, key: string) =>
      Object.hasOwn(values, key) ? values[key] : placeholder,
    )
    .trim();
}

function escapeAttribute(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/"/g, "&quot;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

function renderDocuments(documents: DocumentSet): string {
  return Array.from(documents, ([name, text]) =>
    [`<document name="${escapeAttribute(name)}">`, text, "</document>"].join(
      "\n",
    ),
  ).join("\n\n");
}

export function buildMultiDocumentPrompt(
  claimType: string,
  rulesText: string,
  documents: DocumentSet,
): string {
  return render(MULTI_DOCUMENT_PROMPT_TEMPLATE, {
    claim_type: claimType,
    rules: rulesText,
    documents: renderDocuments(documents),
    schema: MULTI_DOCUMENT_SCHEMA,
  });
}

export function buildSingleDocumentPrompt(
  claimType: string,
  rulesText: string,
  documentText: string,
): string {
  return render(SINGLE_DOCUMENT_PROMPT_TEMPLATE, {
    claim_type: claimType,
    rules: rulesText,
    application: documentText,
    schema: SINGLE_DOCUMENT_SCHEMA,
  });
}
