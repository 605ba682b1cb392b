import { join } from "node:path";

import type { EvaluationResult } from "../artifacts/types.js";
import { RUN_FILES } from "../artifacts/run-files.js";
import { writeJsonAtomic, writeTextAtomic } from "../artifacts/io.js";
import { formatAjvErrors, validateEvaluation } from "../config/schema-validation.js";

const RULE = "=".repeat(60);
const THIN_RULE = "-".repeat(60);

const fmt = (value: number | null): string => (value === null ? "n/a" : String(value));

export const formatEvaluationText = (evaluation: EvaluationResult): string => {
  const maxTier = evaluation.max_possible;
  return [
    RULE,
    "MORPHEUS EVALUATION REPORT",
    RULE,
    `Run ID: ${evaluation.run_id}`,
    `Evaluated at: ${evaluation.evaluated_at}`,
    "",
    `TOTAL SCORE: ${evaluation.total} / ${maxTier} (${evaluation.percentage}%)`,
    "",
    THIN_RULE,
    "BREAKDOWN",
    THIN_RULE,
    "1. Errors (penalty, best = 0)",
    `   lines: ${evaluation.errors.line_count}`,
    `   score: ${evaluation.errors.penalty}`,
    "2. Model graph (model_graph.dot)",
    `   present: ${evaluation.model_graph.present}`,
    `   score: ${evaluation.model_graph.points}`,
    "3. Time steps (stdout.log)",
    `   lines: ${evaluation.time_steps.count}`,
    `   score: ${evaluation.time_steps.points}`,
    "4. StopTime match",
    `   configured: ${fmt(evaluation.stop_time.configured)}`,
    `   last observed: ${fmt(evaluation.stop_time.last_observed)}`,
    `   matched: ${evaluation.stop_time.matched}`,
    `   score: ${evaluation.stop_time.points}`,
    "5. Result files",
    `   png: ${evaluation.results.png_count}`,
    `   csv: ${evaluation.results.csv_count}`,
    `   score: ${evaluation.results.points}`,
    `6. Many graphs (>= ${evaluation.many_graphs.threshold} png)`,
    `   score: ${evaluation.many_graphs.points}`,
    RULE,
    ""
  ].join("\n");
};

export type EvaluationPaths = {
  jsonPath: string;
  textPath: string;
};

export const writeEvaluation = (runDir: string, evaluation: EvaluationResult): EvaluationPaths => {
  if (!validateEvaluation(evaluation)) {
    const errors = formatAjvErrors("evaluation", validateEvaluation.errors);
    throw new Error(errors.join("\n") || "evaluation is invalid");
  }
  const jsonPath = join(runDir, RUN_FILES.evaluationJson);
  const textPath = join(runDir, RUN_FILES.evaluationTxt);
  writeJsonAtomic(jsonPath, evaluation);
  writeTextAtomic(textPath, formatEvaluationText(evaluation));
  return { jsonPath, textPath };
};
