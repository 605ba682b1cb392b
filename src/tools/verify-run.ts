import { existsSync, readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import type { ValidateFunction } from "ajv";

import {
  formatAjvErrors,
  validateEvaluation,
  validateRunRecord,
  validateSummary
} from "../config/schema-validation.js";
import { BENCHMARK_FILES, RUN_FILES } from "../artifacts/run-files.js";
import { RUN_STATUSES, type BenchmarkSummary, type RunRecord, type RunStatus } from "../artifacts/types.js";
import { statusForTerminal } from "../engine/status.js";

export type VerifyStatus = "OK" | "WARN" | "FAIL";

export type VerifyResult = {
  status: VerifyStatus;
  label: string;
  detail?: string;
};

export type VerifyReport = {
  results: VerifyResult[];
  ok: boolean;
};

const addResult = (
  results: VerifyResult[],
  status: VerifyStatus,
  label: string,
  detail?: string
): void => {
  results.push({ status, label, detail });
};

const verifyJson = <T>(
  results: VerifyResult[],
  label: string,
  path: string,
  validate: ValidateFunction<T>
): T | null => {
  if (!existsSync(path)) {
    addResult(results, "FAIL", label, `Missing file: ${path}`);
    return null;
  }
  try {
    const value: unknown = JSON.parse(readFileSync(path, "utf8"));
    if (!validate(value)) {
      const errors = formatAjvErrors(label, validate.errors);
      addResult(results, "FAIL", label, errors.join("; ") || "Schema validation failed");
      return null;
    }
    addResult(results, "OK", label);
    return value;
  } catch (error) {
    addResult(results, "FAIL", label, error instanceof Error ? error.message : String(error));
    return null;
  }
};

const countLines = (path: string): number =>
  readFileSync(path, "utf8")
    .split("\n")
    .filter((line) => line.trim().length > 0).length;

const verifyCounts = (results: VerifyResult[], summary: BenchmarkSummary): void => {
  const counts: Record<RunStatus, number> = { completed: 0, failed: 0, incomplete: 0, pending: 0 };
  let scored = 0;
  for (const record of summary.results) {
    counts[record.status] += 1;
    if (record.evaluation) {
      scored += 1;
    }
  }
  const mismatched = RUN_STATUSES.filter(
    (status) => counts[status] !== summary.counts[status]
  );
  if (mismatched.length > 0) {
    addResult(results, "FAIL", "summary counts", `Mismatch for ${mismatched.join(", ")}`);
  } else {
    addResult(results, "OK", "summary counts");
  }
  if (summary.paper_count !== summary.results.length) {
    addResult(
      results,
      "FAIL",
      "summary paper_count",
      `paper_count ${summary.paper_count} but ${summary.results.length} results`
    );
  }
  if (summary.scores.count !== scored) {
    addResult(results, "FAIL", "summary scores", `scores.count ${summary.scores.count} but ${scored} evaluated papers`);
  }
};

const verifyPaper = (results: VerifyResult[], listed: RunRecord): void => {
  const label = `${listed.paper.name}`;
  if (listed.terminal !== null && statusForTerminal(listed.terminal) !== listed.status) {
    addResult(results, "FAIL", `${label} status`, `status ${listed.status} does not follow terminal ${listed.terminal}`);
  }
  if (listed.status === "pending") {
    addResult(results, "WARN", label, "Paper was never started");
    return;
  }
  if (listed.status === "failed" && listed.evaluation) {
    addResult(results, "FAIL", `${label} evaluation`, "Failed papers must not carry an evaluation");
  }

  const runDir = resolve(listed.run_dir);
  const record = verifyJson(results, `${label} run.json`, join(runDir, RUN_FILES.runRecord), validateRunRecord);
  if (!record) {
    return;
  }
  if (record.status !== listed.status || record.run_id !== listed.run_id) {
    addResult(results, "FAIL", `${label} run.json`, "Does not match the summary entry");
  }

  if (record.evaluation) {
    const evaluation = verifyJson(
      results,
      `${label} evaluation.json`,
      join(runDir, RUN_FILES.evaluationJson),
      validateEvaluation
    );
    if (evaluation && evaluation.total !== record.evaluation.total) {
      addResult(
        results,
        "FAIL",
        `${label} evaluation total`,
        `evaluation.json has ${evaluation.total}, run.json has ${record.evaluation.total}`
      );
    }
  }

  const tracePath = join(runDir, RUN_FILES.toolCalls);
  if (existsSync(tracePath)) {
    const traced = countLines(tracePath);
    if (traced !== record.tool_calls) {
      addResult(results, "FAIL", `${label} tool_calls.jsonl`, `${traced} traced but run.json says ${record.tool_calls}`);
    }
  } else if (record.tool_calls > 0) {
    addResult(results, "WARN", `${label} tool_calls.jsonl`, "File not present");
  }

  for (const relative of [...record.artifacts.png_files, ...record.artifacts.csv_files]) {
    if (!existsSync(join(runDir, relative))) {
      addResult(results, "FAIL", `${label} artifact exists`, `Missing ${relative}`);
    }
  }
};

/** Checks a benchmark directory's summary against each paper's files. */
export const verifyBenchmarkDir = (benchmarkDir: string): VerifyReport => {
  const results: VerifyResult[] = [];
  const root = resolve(benchmarkDir);

  const summary = verifyJson(
    results,
    BENCHMARK_FILES.summary,
    join(root, BENCHMARK_FILES.summary),
    validateSummary
  );
  if (summary) {
    verifyCounts(results, summary);
    for (const record of summary.results) {
      verifyPaper(results, record);
    }
  }

  if (!existsSync(join(root, BENCHMARK_FILES.receipt))) {
    addResult(results, "WARN", BENCHMARK_FILES.receipt, "File not present");
  }

  const ok = !results.some((result) => result.status === "FAIL");
  return { results, ok };
};

export const formatVerifyReport = (report: VerifyReport): string => {
  return report.results
    .map((result) => {
      const detail = result.detail ? `: ${result.detail}` : "";
      return `${result.status} ${result.label}${detail}`;
    })
    .join("\n");
};
