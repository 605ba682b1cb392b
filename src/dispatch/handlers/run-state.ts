import { existsSync, readdirSync, readFileSync, statSync } from "node:fs";
import { join, relative } from "node:path";

import { defineTool } from "../registry.js";
import { CollaboratorFailure, InvalidArguments } from "../../core/errors.js";
import { clipTail } from "../../core/text.js";
import { readTextIfExists } from "../../artifacts/io.js";
import { listRunOutputs } from "../../artifacts/outputs.js";
import { RUN_FILES, readSimulationRecord, resolveInsideRun } from "../../artifacts/run-files.js";
import { readRunMetadata } from "../../artifacts/run-metadata.js";
import { evaluateRunDir } from "../../evaluation/scoring.js";
import { writeEvaluation } from "../../evaluation/evaluation-writer.js";

export const evaluateRunTool = defineTool<Record<string, never>>({
  name: "evaluate_run",
  description:
    "Score the run from its artifacts (errors, model graph, time steps, StopTime, result files) " +
    "and write evaluation.json and evaluation.txt. The final score is recomputed when the paper ends.",
  parameters: {
    type: "object",
    additionalProperties: false,
    properties: {}
  },
  handler: async (_args, context) => {
    const evaluation = evaluateRunDir({
      runId: context.runId,
      runDir: context.runDir,
      rubric: context.config.scoring
    });
    const paths = writeEvaluation(context.runDir, evaluation);
    return {
      total_score: evaluation.total,
      max_possible_score: evaluation.max_possible,
      score_percentage: evaluation.percentage,
      breakdown: evaluation,
      evaluation_json: paths.jsonPath,
      evaluation_txt: paths.textPath
    };
  }
});

const listFiles = (dir: string): string[] => {
  const files: string[] = [];
  const visit = (current: string): void => {
    for (const entry of readdirSync(current, { withFileTypes: true })) {
      const path = join(current, entry.name);
      if (entry.isDirectory()) {
        visit(path);
      } else if (entry.isFile()) {
        files.push(relative(dir, path));
      }
    }
  };
  if (existsSync(dir)) {
    visit(dir);
  }
  return files.sort();
};

export const getRunSummaryTool = defineTool<Record<string, never>>({
  name: "get_run_summary",
  description: "Summarize the run directory: files, output lists, last simulation and log tails.",
  parameters: {
    type: "object",
    additionalProperties: false,
    properties: {}
  },
  handler: async (_args, context) => {
    const { runDir, config } = context;
    const maxChars = config.simulator.max_output_chars;
    return {
      run_id: context.runId,
      run_dir: runDir,
      files: listFiles(runDir),
      outputs: listRunOutputs(runDir),
      last_simulation: readSimulationRecord(runDir),
      metadata: readRunMetadata(runDir),
      stdout_tail: clipTail(readTextIfExists(join(runDir, RUN_FILES.stdout)) ?? "", maxChars),
      stderr_tail: clipTail(readTextIfExists(join(runDir, RUN_FILES.stderr)) ?? "", maxChars)
    };
  }
});

type ReadRunFileArgs = {
  path: string;
  max_chars?: number;
};

const DEFAULT_READ_CHARS = 5_000;

export const readRunFileTool = defineTool<ReadRunFileArgs>({
  name: "read_run_file",
  description: "Read a text file from the run directory, e.g. paper.txt or a Logger CSV.",
  parameters: {
    type: "object",
    additionalProperties: false,
    required: ["path"],
    properties: {
      path: { type: "string", minLength: 1, description: "Path relative to the run directory" },
      max_chars: { type: "integer", minimum: 1, default: DEFAULT_READ_CHARS }
    }
  },
  handler: async (args, context) => {
    const target = resolveInsideRun(context.runDir, args.path);
    if (!target) {
      throw new InvalidArguments(`Path is outside the run directory: ${args.path}`);
    }
    if (!existsSync(target) || !statSync(target).isFile()) {
      throw new CollaboratorFailure("filesystem", `File not found in run directory: ${args.path}`, {
        available: listFiles(context.runDir)
      });
    }
    const maxChars = args.max_chars ?? DEFAULT_READ_CHARS;
    const content = readFileSync(target, "utf8");
    return {
      path: relative(context.runDir, target),
      content: content.slice(0, maxChars),
      total_chars: content.length,
      truncated: content.length > maxChars
    };
  }
});
