/**
 * Claim submission pipeline
 *
 * uploads → request checks → staged text extraction → rules → single validation call → public response.
 * The staging directory is request-scoped and removed on every exit path.
 */

import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { validateUploads, type UploadLimits } from "../uploads.js";
import { toClaimResponse } from "./claim-response.js";
import { ExtractionError, getErrorMessage } from "../errors.js";
import type { ClaimValidator } from "./claim-validator.js";
import type { TextExtractor } from "../pdf-extract.js";
import type { ClaimResponse, DocumentSet, UploadedFile } from "../types.js";

export interface RulesProvider {
  get(): Promise<string>;
}

export interface SubmitClaimDeps {
  validator: ClaimValidator;
  rules: RulesProvider;
  extractor: TextExtractor;
  claimType: string;
  limits: UploadLimits;
}

function extractionFailure(filename: string, cause?: unknown): ExtractionError {
  return new ExtractionError(
    `Could not extract text from '${filename}'. Please ensure the PDF contains readable text.`,
    { cause },
  );
}

/**
 * Writes each upload to a temp directory and extracts its text, keyed by upload filename.
 */
export async function stageAndExtract(
  files: UploadedFile[],
  extractor: TextExtractor,
): Promise<DocumentSet> {
  const tempDir = await mkdtemp(join(tmpdir(), "claim-"));
  const documents: DocumentSet = new Map();

  try {
    for (const [index, file] of files.entries()) {
      // Upload names are untrusted; never use them as paths
      const filePath = join(tempDir, `${index}.pdf`);
      await writeFile(filePath, file.content);

      let text: string;
      try {
        ({ text } = await extractor.extract(filePath));
      } catch (error) {
        console.warn(
          `[SubmitClaim] Extraction failed for ${file.filename}: ${getErrorMessage(error)}`,
        );
        throw extractionFailure(file.filename, error);
      }

      if (!text.trim()) {
        throw extractionFailure(file.filename);
      }

      documents.set(file.filename, text);
    }
  } finally {
    await rm(tempDir, { recursive: true, force: true });
  }

  return documents;
}

export async function submitClaim(
  files: UploadedFile[],
  deps: SubmitClaimDeps,
): Promise<ClaimResponse> {
  await validateUploads(files, deps.limits);

  const filenames = files.map((f) => f.filename);
  console.log(`[SubmitClaim] Received ${files.length} file(s): ${filenames.join(", ")}`);

  const documents = await stageAndExtract(files, deps.extractor);
  const rulesText = await deps.rules.get();

  const result = await deps.validator.validateMultiple(
    deps.claimType,
    rulesText,
    documents,
  );

  const response = toClaimResponse(result, filenames, deps.validator.model);
  console.log(`[SubmitClaim] Completed with status ${response.status}`);
  return response;
}
