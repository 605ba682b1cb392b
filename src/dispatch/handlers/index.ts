import type { ToolBuilder } from "../registry.js";
import { preparePaperTool } from "./paper.js";
import { getAnalysisTemplateTool, listReferencesTool, readReferenceTool } from "./references.js";
import { saveModelXmlTool, validateModelXmlTool } from "./model-xml.js";
import { inspectFailureTool, runSimulationTool } from "./simulation.js";
import { evaluateRunTool, getRunSummaryTool, readRunFileTool } from "./run-state.js";

export const BUILTIN_TOOLS: readonly ToolBuilder[] = [
  preparePaperTool,
  listReferencesTool,
  readReferenceTool,
  getAnalysisTemplateTool,
  validateModelXmlTool,
  saveModelXmlTool,
  runSimulationTool,
  inspectFailureTool,
  evaluateRunTool,
  getRunSummaryTool,
  readRunFileTool
];
