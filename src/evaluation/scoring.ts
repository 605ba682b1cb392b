import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";

import type { ScoringRubric } from "../config/types.js";
import type { EvaluationResult } from "../artifacts/types.js";
import { listRunOutputs } from "../artifacts/outputs.js";
import { RUN_FILES, readSimulationRecord, simulationFailed } from "../artifacts/run-files.js";
import { extractStopTime } from "../model/xml-checks.js";

const readIfExists = (path: string): string => (existsSync(path) ? readFileSync(path, "utf8") : "");

const nonEmptyLines = (text: string): string[] =>
  text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

const TIME_LINE = /Time:\s*<?(\d+\.?\d*)/gi;

/** Simulation times reported on stdout after the "model is up" marker. */
export const extractSimulationTimes = (stdout: string): number[] => {
  const marker = stdout.toLowerCase().indexOf("model is up");
  const tail = marker >= 0 ? stdout.slice(marker) : stdout;
  const times: number[] = [];
  for (const match of tail.matchAll(TIME_LINE)) {
    const value = Number.parseFloat(match[1] ?? "");
    if (Number.isFinite(value)) {
      times.push(value);
    }
  }
  return times;
};

export const timeStepPoints = (count: number, rubric: ScoringRubric): number => {
  let points = 0;
  for (const tier of rubric.time_step_tiers) {
    if (count >= tier.min_lines) {
      points = Math.max(points, tier.points);
    }
  }
  return points;
};

export const maxPossibleScore = (rubric: ScoringRubric): number =>
  rubric.model_graph_points +
  rubric.time_step_tiers.reduce((max, tier) => Math.max(max, tier.points), 0) +
  rubric.stop_time_points +
  rubric.results_points +
  rubric.many_graphs_points;

const round2 = (value: number): number => Math.round(value * 100) / 100;

const deepFreeze = <T extends object>(value: T): Readonly<T> => {
  for (const nested of Object.values(value)) {
    if (typeof nested === "object" && nested !== null && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
};

export type EvaluateRunInput = {
  runId: string;
  runDir: string;
  rubric: ScoringRubric;
  now?: Date;
};

/**
 * Scores a run directory from its artifacts. The result is frozen: a
 * RunRecord's evaluation is computed once and never edited.
 */
export const evaluateRunDir = (input: EvaluateRunInput): Readonly<EvaluationResult> => {
  const { runDir, rubric } = input;

  const errorLines = [
    ...nonEmptyLines(readIfExists(join(runDir, RUN_FILES.stderr))),
    ...nonEmptyLines(readIfExists(join(runDir, RUN_FILES.modelErrors)))
  ];
  let errorCount = errorLines.length;
  if (errorCount === 0 && simulationFailed(readSimulationRecord(runDir))) {
    errorCount = 1;
  }
  const penalty = errorCount === 0 ? 0 : -errorCount * rubric.error_penalty_per_line;

  const outputs = listRunOutputs(runDir);
  const graphPresent = outputs.dot.some(
    (path) => path === RUN_FILES.modelGraph || path.endsWith(`/${RUN_FILES.modelGraph}`)
  );
  const graphPoints = graphPresent ? rubric.model_graph_points : 0;

  const times = extractSimulationTimes(readIfExists(join(runDir, RUN_FILES.stdout)));
  const timePoints = timeStepPoints(times.length, rubric);

  const modelPath = join(runDir, RUN_FILES.modelXml);
  const configuredStop = existsSync(modelPath) ? extractStopTime(readFileSync(modelPath, "utf8")) : null;
  const lastObserved = times.length > 0 ? (times[times.length - 1] ?? null) : null;
  const stopMatched =
    configuredStop !== null &&
    lastObserved !== null &&
    Math.abs(configuredStop - lastObserved) < rubric.stop_time_tolerance;
  const stopPoints = stopMatched ? rubric.stop_time_points : 0;

  const pngCount = outputs.png.length;
  const csvCount = outputs.csv.length;
  const resultsPoints = pngCount > 0 || csvCount > 0 ? rubric.results_points : 0;
  const manyGraphsPoints = pngCount >= rubric.many_graphs_threshold ? rubric.many_graphs_points : 0;

  const total = penalty + graphPoints + timePoints + stopPoints + resultsPoints + manyGraphsPoints;
  const maxPossible = maxPossibleScore(rubric);

  return deepFreeze({
    run_id: input.runId,
    errors: {
      line_count: errorCount,
      penalty,
      sample: errorLines.slice(0, 10)
    },
    model_graph: {
      present: graphPresent,
      points: graphPoints
    },
    time_steps: {
      count: times.length,
      points: timePoints
    },
    stop_time: {
      configured: configuredStop,
      last_observed: lastObserved,
      matched: stopMatched,
      points: stopPoints
    },
    results: {
      png_count: pngCount,
      csv_count: csvCount,
      points: resultsPoints
    },
    many_graphs: {
      threshold: rubric.many_graphs_threshold,
      points: manyGraphsPoints
    },
    total,
    max_possible: maxPossible,
    percentage: maxPossible > 0 ? round2((total / maxPossible) * 100) : 0,
    evaluated_at: (input.now ?? new Date()).toISOString()
  });
};
