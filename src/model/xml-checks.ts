import { readFileSync } from "node:fs";

import { resolveAssetPath } from "../utils/asset-root.js";

export type ModelSection =
  | "Space"
  | "Time"
  | "CellTypes"
  | "Analysis"
  | "Gnuplotter"
  | "Logger"
  | "ModelGraph";

export type XmlCompleteness = {
  valid: boolean;
  errors: string[];
  warnings: string[];
  sections: Record<ModelSection, boolean>;
  graph_generation_ready: boolean;
};

/** Strips the markdown fences models tend to wrap XML in. */
export const sanitizeModelXml = (xml: string): string =>
  xml
    .trim()
    .replace(/^\s*```xml\s*/i, "")
    .replace(/^\s*```\s*/, "")
    .replace(/\s*```\s*$/, "")
    .trim();

export const looksLikeModelXml = (xml: string): boolean =>
  xml.includes("<MorpheusModel") && xml.includes("</MorpheusModel>") && xml.includes("version=");

export const hasGnuplotter = (xml: string): boolean => xml.includes("<Gnuplotter");

const emptySections = (): Record<ModelSection, boolean> => ({
  Space: false,
  Time: false,
  CellTypes: false,
  Analysis: false,
  Gnuplotter: false,
  Logger: false,
  ModelGraph: false
});

/**
 * Presence checks for the sections a simulation needs to produce outputs.
 * This is not schema validation: the simulator remains the authority.
 */
export const checkXmlCompleteness = (xml: string): XmlCompleteness => {
  const sections = emptySections();
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!xml.includes("<MorpheusModel")) {
    return {
      valid: false,
      errors: ["Missing <MorpheusModel> root element"],
      warnings,
      sections,
      graph_generation_ready: false
    };
  }
  if (!xml.includes("</MorpheusModel>")) {
    return {
      valid: false,
      errors: ["Missing </MorpheusModel> closing tag"],
      warnings,
      sections,
      graph_generation_ready: false
    };
  }

  sections.Space = xml.includes("<Space>");
  if (!sections.Space) {
    warnings.push("Missing <Space> section: spatial domain not defined");
  }

  sections.Time = xml.includes("<Time>");
  if (sections.Time) {
    if (!xml.includes("<StopTime")) {
      warnings.push("Missing <StopTime>: the simulation may not run");
    }
    if (!xml.includes("<SaveInterval")) {
      warnings.push("Missing <SaveInterval>: outputs may not be written at regular intervals");
    }
  } else {
    warnings.push("Missing <Time> section: time configuration not defined");
  }

  sections.CellTypes = xml.includes("<CellTypes>") && xml.includes("<CellType");
  if (!sections.CellTypes) {
    warnings.push("Missing <CellTypes> section: no cells defined");
  }

  let plotsDeclared = false;
  sections.Analysis = xml.includes("<Analysis>");
  if (sections.Analysis) {
    sections.Gnuplotter = hasGnuplotter(xml);
    if (sections.Gnuplotter) {
      plotsDeclared = xml.includes("<Plot>") || xml.includes("<Plot ");
      if (!plotsDeclared) {
        warnings.push("Gnuplotter found but no <Plot> elements: no graphs will be generated");
      }
    } else {
      warnings.push("No <Gnuplotter> in <Analysis>: no PNG graphs will be generated");
    }

    sections.Logger = xml.includes("<Logger");
    if (!sections.Logger) {
      warnings.push("No <Logger> in <Analysis>: no CSV data output");
    }
    sections.ModelGraph = xml.includes("<ModelGraph");
  } else {
    errors.push("Missing <Analysis> section: no outputs will be generated");
    errors.push("Include <Analysis> with <Gnuplotter> and <Logger> to generate graphs");
  }

  if (!sections.Gnuplotter) {
    errors.push("Models without a <Gnuplotter> section do not generate PNG graphs");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    sections,
    graph_generation_ready: sections.Gnuplotter && plotsDeclared
  };
};

const STOP_TIME_PATTERNS = [
  /<StopTime\s+value\s*=\s*["']?([\d.eE+-]+)["']?\s*\/?>/i,
  /<StopTime[^>]*>([\d.eE+-]+)<\/StopTime>/i
];

export const extractStopTime = (xml: string): number | null => {
  for (const pattern of STOP_TIME_PATTERNS) {
    const match = pattern.exec(xml);
    if (match?.[1] !== undefined) {
      const value = Number.parseFloat(match[1]);
      if (Number.isFinite(value)) {
        return value;
      }
    }
  }
  return null;
};

let cachedTemplate: string | null = null;

export const getAnalysisTemplate = (): string => {
  if (cachedTemplate === null) {
    cachedTemplate = readFileSync(resolveAssetPath("templates", "analysis-template.xml"), "utf8");
  }
  return cachedTemplate;
};

export const ANALYSIS_TEMPLATE_NOTES = {
  Gnuplotter: "Writes PNG images at the given time-step interval; required for graphs.",
  Logger: "Writes CSV data files for quantitative analysis.",
  ModelGraph: "Writes a DOT file describing the model structure."
} as const;
