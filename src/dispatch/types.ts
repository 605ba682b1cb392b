import type { BenchConfig } from "../config/types.js";
import type { PaperRef } from "../artifacts/types.js";
import type { TextExtractor } from "../collaborators/text-extractor.js";
import type { Simulator } from "../collaborators/simulator.js";
import type { ReferenceStore } from "../collaborators/reference-store.js";

export const TOOL_NAMES = [
  "prepare_paper",
  "list_references",
  "read_reference",
  "get_analysis_template",
  "validate_model_xml",
  "save_model_xml",
  "run_simulation",
  "inspect_failure",
  "evaluate_run",
  "get_run_summary",
  "read_run_file"
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export const asToolName = (name: string): ToolName | undefined =>
  TOOL_NAMES.find((candidate) => candidate === name);

export type ToolErrorKind = "invalid_arguments" | "unknown_tool" | "collaborator_failure" | "internal";

export type ToolSuccess = {
  ok: true;
  data: Record<string, unknown>;
};

export type ToolFailure = {
  ok: false;
  error_kind: ToolErrorKind;
  error: string;
  hint?: string;
  details?: Record<string, unknown>;
};

export type ToolResult = ToolSuccess | ToolFailure;

/** Everything a tool may touch while one paper is running. */
export type ToolContext = {
  runId: string;
  runDir: string;
  paper: PaperRef;
  config: BenchConfig;
  textExtractor: TextExtractor;
  simulator: Simulator;
  references: ReferenceStore;
};

export type ToolHandler<A> = (args: A, context: ToolContext) => Promise<Record<string, unknown>>;

export type ToolSpec<A> = {
  name: ToolName;
  description: string;
  /** JSON Schema (2020-12) for the arguments object. */
  parameters: Record<string, unknown>;
  handler: ToolHandler<A>;
};
