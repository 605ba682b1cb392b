import { join, resolve } from "node:path";

import { defineTool } from "../registry.js";
import { RUN_FILES } from "../../artifacts/run-files.js";
import { writeTextAtomic } from "../../artifacts/io.js";
import { mergeRunMetadata } from "../../artifacts/run-metadata.js";
import { inferReferenceCategories } from "../../model/category-inference.js";

const PREVIEW_CHARS = 2_000;

type PreparePaperArgs = {
  pdf_path: string;
};

export const preparePaperTool = defineTool<PreparePaperArgs>({
  name: "prepare_paper",
  description:
    "Extract the text of the paper PDF into paper.txt, infer which reference categories fit it, " +
    "and list the reference models available in those categories. Call this first.",
  parameters: {
    type: "object",
    additionalProperties: false,
    required: ["pdf_path"],
    properties: {
      pdf_path: { type: "string", minLength: 1, description: "Path of the paper PDF" }
    }
  },
  handler: async (args, context) => {
    const pdfPath = resolve(args.pdf_path);
    const extracted = await context.textExtractor.extract(pdfPath);

    const textPath = join(context.runDir, RUN_FILES.paperText);
    writeTextAtomic(textPath, extracted.text);

    const inference = inferReferenceCategories(extracted.text, context.references.categories());
    const available: Record<string, string[]> = {};
    for (const category of inference.selected_categories) {
      available[category] = context.references.list(category)[category] ?? [];
    }

    mergeRunMetadata(context.runDir, {
      paper: context.paper.name,
      pdf_path: pdfPath,
      pages: extracted.pages,
      characters: extracted.text.length,
      reference_inference: inference,
      prepared_at: new Date().toISOString()
    });

    return {
      run_id: context.runId,
      text_path: textPath,
      pages: extracted.pages,
      characters: extracted.text.length,
      text_preview: extracted.text.slice(0, PREVIEW_CHARS),
      suggested_categories: inference.selected_categories,
      category_scores: inference.scores,
      available_references: available,
      next: "Read paper.txt with read_run_file for the full text, then read_reference for a close example."
    };
  }
});
