/**
 * PDF text extraction
 *
 * Reads the text layer of a PDF page by page with pdfjs-dist. No OCR: scanned documents
 * without a text layer come back empty, and callers decide what that means.
 */

import { readFile } from "fs/promises";
import * as pdfjsLib from "pdfjs-dist/legacy/build/pdf.mjs";

export interface PdfExtractResult {
  text: string;
  pageCount: number;
}

export interface TextExtractor {
  extract(filePath: string): Promise<PdfExtractResult>;
}

export async function extractTextFromPdf(
  filePath: string,
): Promise<PdfExtractResult> {
  const buffer = await readFile(filePath);

  const loadingTask = pdfjsLib.getDocument({
    data: new Uint8Array(buffer),
    verbosity: 0,
  });
  const pdf = await loadingTask.promise;

  try {
    const pages: string[] = [];
    for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
      const page = await pdf.getPage(pageNum);
      const content = await page.getTextContent();

      let pageText = "";
      for (const item of content.items) {
        if (!("str" in item)) continue; // marked content
        pageText += item.str;
        if (item.hasEOL) pageText += "\n";
      }
      pages.push(pageText);
    }

    return { text: pages.join("\n").trim(), pageCount: pdf.numPages };
  } finally {
    await pdf.destroy();
  }
}

export const pdfTextExtractor: TextExtractor = {
  extract: extractTextFromPdf,
};
