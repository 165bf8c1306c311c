/**
 * Claim uploads: multipart decoding and request-level checks.
 */

import { fileTypeFromBuffer } from "file-type";
import { ValidationInputError, getErrorMessage } from "./errors.js";
import type { UploadedFile } from "./types.js";

export const UPLOAD_FIELD = "files";

const PDF_MIME_TYPE = "application/pdf";

export interface UploadLimits {
  maxFiles: number;
  maxFileSizeBytes: number;
}

/**
 * Decodes a multipart/form-data body and returns the files sent under the `files` field.
 * Plain text fields are ignored.
 */
export async function parseMultipartFiles(
  contentType: string,
  body: Buffer,
): Promise<UploadedFile[]> {
  const request = new Request("http://localhost/submit-claim", {
    method: "POST",
    headers: { "content-type": contentType },
    body,
  });

  let formData: FormData;
  try {
    formData = await request.formData();
  } catch (error) {
    throw new ValidationInputError(
      `Malformed multipart/form-data body: ${getErrorMessage(error)}`,
    );
  }

  const files: UploadedFile[] = [];
  for (const entry of formData.getAll(UPLOAD_FIELD)) {
    if (typeof entry === "string") continue;
    files.push({
      filename: entry.name,
      content: Buffer.from(await entry.arrayBuffer()),
    });
  }
  return files;
}

function isPdfFilename(filename: string): boolean {
  return filename.toLowerCase().endsWith(".pdf");
}

/** Detects the real format from magic bytes; the client-declared type is ignored. */
async function isPdfContent(content: Buffer): Promise<boolean> {
  const detected = await fileTypeFromBuffer(content);
  return detected?.mime === PDF_MIME_TYPE;
}

/**
 * Rejects the request before any extraction or remote call is made.
 * Throws ValidationInputError naming the first offending file.
 */
export async function validateUploads(
  files: UploadedFile[],
  limits: UploadLimits,
): Promise<void> {
  if (files.length > limits.maxFiles) {
    throw new ValidationInputError(`Maximum ${limits.maxFiles} files allowed`);
  }
  if (files.length === 0) {
    throw new ValidationInputError("At least 1 file is required");
  }

  const maxMb = Math.round(limits.maxFileSizeBytes / (1024 * 1024));
  const seen = new Set<string>();

  for (const { filename, content } of files) {
    if (!isPdfFilename(filename)) {
      throw new ValidationInputError(
        `Only PDF files are accepted. File '${filename}' is not a PDF`,
      );
    }
    if (!(await isPdfContent(content))) {
      throw new ValidationInputError(
        `File '${filename}' is not a valid PDF document`,
      );
    }
    if (content.length > limits.maxFileSizeBytes) {
      throw new ValidationInputError(
        `File '${filename}' too large. Maximum size is ${maxMb}MB`,
      );
    }
    if (seen.has(filename)) {
      throw new ValidationInputError(`Duplicate file name '${filename}'`);
    }
    seen.add(filename);
  }
}
