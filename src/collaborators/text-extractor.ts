import { existsSync } from "node:fs";
import { PDFLoader } from "@langchain/community/document_loaders/fs/pdf";

import { CollaboratorFailure, errorMessage } from "../core/errors.js";

export type ExtractedText = {
  text: string;
  pages: number;
};

export interface TextExtractor {
  extract(path: string): Promise<ExtractedText>;
}

const readTotalPages = (metadata: Record<string, unknown> | undefined): number | null => {
  const pdf = metadata?.pdf;
  if (typeof pdf !== "object" || pdf === null || !("totalPages" in pdf)) {
    return null;
  }
  return typeof pdf.totalPages === "number" ? pdf.totalPages : null;
};

export class PdfTextExtractor implements TextExtractor {
  async extract(path: string): Promise<ExtractedText> {
    if (!existsSync(path)) {
      throw new CollaboratorFailure("text_extractor", `PDF not found: ${path}`, { path });
    }

    const loader = new PDFLoader(path, { splitPages: false });
    const docs = await loader.load().catch((error: unknown) => {
      throw new CollaboratorFailure("text_extractor", `Could not read PDF: ${errorMessage(error)}`, {
        path
      });
    });

    const text = docs
      .map((doc) => doc.pageContent)
      .join("\n\n")
      .trim();
    if (text.length === 0) {
      throw new CollaboratorFailure("text_extractor", "No text could be extracted from PDF", { path });
    }

    return {
      text,
      pages: readTotalPages(docs[0]?.metadata) ?? docs.length
    };
  }
}
