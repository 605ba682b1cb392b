import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { describe, expect, it } from "vitest";

import { DEFAULT_SCORING_RUBRIC } from "../../config/defaults.js";
import { RUN_FILES } from "../../artifacts/run-files.js";
import { MINIMAL_MODEL_XML, makeTempDir } from "../../engine/__tests__/fakes.js";
import { evaluateRunDir, extractSimulationTimes, maxPossibleScore, timeStepPoints } from "../scoring.js";
import { formatEvaluationText, writeEvaluation } from "../evaluation-writer.js";

const RUN_ID = "20240102T030405Z_abcdef";
const AT = new Date("2024-01-02T03:04:05.000Z");

const writeSimulation = (runDir: string, exitCode: number | null, timedOut = false): void => {
  writeFileSync(
    join(runDir, RUN_FILES.simulation),
    JSON.stringify({ exit_code: exitCode, timed_out: timedOut, duration_ms: 10, command: ["morpheus"], finished_at: AT.toISOString() })
  );
};

describe("evaluateRunDir", () => {
  it("penalizes a failed simulation that left no outputs", () => {
    const runDir = makeTempDir("score-fail");
    writeSimulation(runDir, 1);

    const result = evaluateRunDir({ runId: RUN_ID, runDir, rubric: DEFAULT_SCORING_RUBRIC, now: AT });

    expect(result.errors.line_count).toBe(1);
    expect(result.errors.penalty).toBe(-1);
    expect(result.results.png_count).toBe(0);
    expect(result.results.csv_count).toBe(0);
    expect(result.total).toBe(-1);
    expect(result.evaluated_at).toBe("2024-01-02T03:04:05.000Z");
  });

  it("counts every stderr line as an error", () => {
    const runDir = makeTempDir("score-stderr");
    writeSimulation(runDir, 2);
    writeFileSync(join(runDir, RUN_FILES.stderr), "error: unknown symbol\n\n  at line 4\nabort\n");
    writeFileSync(join(runDir, RUN_FILES.modelErrors), "XML parse failure\n");

    const result = evaluateRunDir({ runId: RUN_ID, runDir, rubric: DEFAULT_SCORING_RUBRIC, now: AT });
    expect(result.errors.line_count).toBe(4);
    expect(result.errors.penalty).toBe(-4);
    expect(result.errors.sample).toEqual(["error: unknown symbol", "at line 4", "abort", "XML parse failure"]);
  });

  it("awards every criterion for a complete run", () => {
    const runDir = makeTempDir("score-full");
    writeSimulation(runDir, 0);
    writeFileSync(join(runDir, RUN_FILES.modelXml), MINIMAL_MODEL_XML);
    writeFileSync(join(runDir, RUN_FILES.modelGraph), "digraph {}");
    const times = Array.from({ length: 11 }, (_, i) => `Time: ${i}`);
    writeFileSync(join(runDir, RUN_FILES.stdout), ["Loading", "Time: 99", "model is up", ...times].join("\n"));
    mkdirSync(join(runDir, "plots"));
    for (let i = 0; i < 10; i += 1) {
      writeFileSync(join(runDir, "plots", `plot_${i}.png`), "png");
    }
    writeFileSync(join(runDir, "logger.csv"), "t,n\n0,1\n");

    const result = evaluateRunDir({ runId: RUN_ID, runDir, rubric: DEFAULT_SCORING_RUBRIC, now: AT });

    expect(result.errors.penalty).toBe(0);
    expect(result.model_graph).toEqual({ present: true, points: 1 });
    expect(result.time_steps).toEqual({ count: 11, points: 2 });
    expect(result.stop_time).toEqual({ configured: 10, last_observed: 10, matched: true, points: 1 });
    expect(result.results).toEqual({ png_count: 10, csv_count: 1, points: 1 });
    expect(result.many_graphs).toEqual({ threshold: 10, points: 1 });
    expect(result.total).toBe(6);
    expect(result.max_possible).toBe(7);
    expect(result.percentage).toBe(85.71);
  });

  it("returns a frozen result", () => {
    const result = evaluateRunDir({ runId: RUN_ID, runDir: makeTempDir("score-frozen"), rubric: DEFAULT_SCORING_RUBRIC });
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.stop_time)).toBe(true);
    expect(result.total).toBe(0);
  });
});

describe("scoring helpers", () => {
  it("reads times only after the model-is-up marker", () => {
    expect(extractSimulationTimes("Time: 1\nModel is up\nTime: 2.5\ntime: 3")).toEqual([2.5, 3]);
  });

  it("picks the highest tier reached", () => {
    expect(timeStepPoints(0, DEFAULT_SCORING_RUBRIC)).toBe(0);
    expect(timeStepPoints(10, DEFAULT_SCORING_RUBRIC)).toBe(1);
    expect(timeStepPoints(51, DEFAULT_SCORING_RUBRIC)).toBe(3);
    expect(maxPossibleScore(DEFAULT_SCORING_RUBRIC)).toBe(7);
  });
});

describe("writeEvaluation", () => {
  it("writes both the JSON and the text report", () => {
    const runDir = makeTempDir("score-write");
    const result = evaluateRunDir({ runId: RUN_ID, runDir, rubric: DEFAULT_SCORING_RUBRIC, now: AT });
    const paths = writeEvaluation(runDir, result);

    expect(paths.jsonPath).toBe(join(runDir, RUN_FILES.evaluationJson));
    expect(formatEvaluationText(result)).toContain("TOTAL SCORE: 0 / 7 (0%)");
  });
});
