import { defineTool } from "../registry.js";
import {
  ANALYSIS_TEMPLATE_NOTES,
  checkXmlCompleteness,
  getAnalysisTemplate
} from "../../model/xml-checks.js";

type ListReferencesArgs = {
  category?: string;
};

export const listReferencesTool = defineTool<ListReferencesArgs>({
  name: "list_references",
  description: "List reference Morpheus models, optionally for a single category.",
  parameters: {
    type: "object",
    additionalProperties: false,
    properties: {
      category: { type: "string", minLength: 1, description: "CPM, PDE, ODE, Multiscale or Miscellaneous" }
    }
  },
  handler: async (args, context) => ({
    categories: context.references.list(args.category)
  })
});

type ReadReferenceArgs = {
  category: string;
  name: string;
  max_chars?: number;
};

export const readReferenceTool = defineTool<ReadReferenceArgs>({
  name: "read_reference",
  description:
    "Read a reference model. The response says whether it carries an <Analysis> section " +
    "with <Gnuplotter> and <Logger>, which are needed for PNG and CSV outputs. " +
    "Without max_chars the configured reference limit applies.",
  parameters: {
    type: "object",
    additionalProperties: false,
    required: ["category", "name"],
    properties: {
      category: { type: "string", minLength: 1 },
      name: { type: "string", minLength: 1 },
      max_chars: { type: "integer", minimum: 1 }
    }
  },
  handler: async (args, context) => {
    const doc = context.references.read(
      args.category,
      args.name,
      args.max_chars ?? context.config.references.default_max_chars
    );
    const check = checkXmlCompleteness(doc.content);
    return {
      category: doc.category,
      name: doc.name,
      content: doc.content,
      total_chars: doc.total_chars,
      truncated: doc.truncated,
      reference_has_analysis: check.sections.Analysis,
      reference_has_gnuplotter: check.sections.Gnuplotter,
      reference_has_logger: check.sections.Logger
    };
  }
});

export const getAnalysisTemplateTool = defineTool<Record<string, never>>({
  name: "get_analysis_template",
  description:
    "Return a template <Analysis> block with Gnuplotter, Logger and ModelGraph to place before </MorpheusModel>.",
  parameters: {
    type: "object",
    additionalProperties: false,
    properties: {}
  },
  handler: async () => ({
    template: getAnalysisTemplate(),
    explanation: ANALYSIS_TEMPLATE_NOTES
  })
});
