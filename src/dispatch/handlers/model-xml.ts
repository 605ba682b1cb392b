import { join } from "node:path";

import { defineTool } from "../registry.js";
import { InvalidArguments } from "../../core/errors.js";
import { writeTextAtomic } from "../../artifacts/io.js";
import { mergeRunMetadata } from "../../artifacts/run-metadata.js";
import {
  checkXmlCompleteness,
  getAnalysisTemplate,
  looksLikeModelXml,
  sanitizeModelXml
} from "../../model/xml-checks.js";
import type { XmlCompleteness } from "../../model/xml-checks.js";

const describeValidation = (check: XmlCompleteness): Record<string, unknown> => ({
  valid: check.valid,
  graph_generation_ready: check.graph_generation_ready,
  errors: check.errors,
  warnings: check.warnings,
  sections_found: check.sections
});

type ValidateModelXmlArgs = {
  model_xml: string;
};

export const validateModelXmlTool = defineTool<ValidateModelXmlArgs>({
  name: "validate_model_xml",
  description:
    "Check a MorpheusML document for the sections needed to run and produce outputs, before saving it.",
  parameters: {
    type: "object",
    additionalProperties: false,
    required: ["model_xml"],
    properties: {
      model_xml: { type: "string" }
    }
  },
  handler: async (args) => {
    const check = checkXmlCompleteness(sanitizeModelXml(args.model_xml));
    return {
      ...describeValidation(check),
      ...(check.sections.Analysis ? {} : { analysis_template: getAnalysisTemplate() })
    };
  }
});

type SaveModelXmlArgs = {
  model_xml: string;
  file_name?: string;
};

export const saveModelXmlTool = defineTool<SaveModelXmlArgs>({
  name: "save_model_xml",
  description:
    "Save a MorpheusML document into the run directory (default model.xml). Markdown fences are stripped.",
  parameters: {
    type: "object",
    additionalProperties: false,
    required: ["model_xml"],
    properties: {
      model_xml: { type: "string" },
      file_name: { type: "string", pattern: "^[A-Za-z0-9_.-]+\\.xml$", default: "model.xml" }
    }
  },
  handler: async (args, context) => {
    const xml = sanitizeModelXml(args.model_xml);
    if (xml.length === 0) {
      throw new InvalidArguments("model_xml is empty; refusing to write an empty model");
    }
    if (!looksLikeModelXml(xml)) {
      throw new InvalidArguments("model_xml does not look like a MorpheusModel document", [
        "expected <MorpheusModel version=...> ... </MorpheusModel>"
      ]);
    }

    const fileName = args.file_name ?? "model.xml";
    const xmlPath = join(context.runDir, fileName);
    writeTextAtomic(xmlPath, xml);
    mergeRunMetadata(context.runDir, {
      model_file: fileName,
      model_saved_at: new Date().toISOString()
    });

    const check = checkXmlCompleteness(xml);
    return {
      xml_path: xmlPath,
      file_name: fileName,
      validation: describeValidation(check),
      ...(check.sections.Gnuplotter
        ? {}
        : {
            critical_warning:
              "Saved, but no graphs will be generated: add a <Gnuplotter> inside <Analysis> (see get_analysis_template)."
          })
    };
  }
});
