import { existsSync } from "node:fs";
import { resolve } from "node:path";

import { readJsonFile } from "../artifacts/io.js";
import { BENCHMARK_FILES } from "../artifacts/run-files.js";
import type { RunStatus } from "../artifacts/types.js";
import { formatAjvErrors, validateSummary } from "../config/schema-validation.js";

const truncate = (value: string, max = 120): string =>
  value.length > max ? `${value.slice(0, max - 1)}…` : value;

export type ReceiptPaperRow = {
  index: number;
  name: string;
  status: RunStatus;
  iterations: number;
  tool_calls: number;
  score?: string;
  error?: string;
};

export type ReceiptModel = {
  benchmark_id: string;
  benchmark_dir: string;
  model: string;
  started_at: string;
  completed_at: string;
  duration_ms: number;
  counts: Record<RunStatus, number>;
  totals: {
    png_files: number;
    csv_files: number;
    iterations: number;
    tool_calls: number;
  };
  scores: {
    count: number;
    mean: number | null;
    min: number | null;
    max: number | null;
  };
  papers: ReceiptPaperRow[];
};

export const buildReceiptModel = (benchmarkDir: string): ReceiptModel => {
  const summaryPath = resolve(benchmarkDir, BENCHMARK_FILES.summary);
  if (!existsSync(summaryPath)) {
    throw new Error(`${BENCHMARK_FILES.summary} not found; cannot build receipt`);
  }
  const summary = readJsonFile(summaryPath);
  if (!validateSummary(summary)) {
    const errors = formatAjvErrors(BENCHMARK_FILES.summary, validateSummary.errors);
    throw new Error(`Invalid ${BENCHMARK_FILES.summary}:\n${errors.join("\n")}`);
  }

  return {
    benchmark_id: summary.benchmark_id,
    benchmark_dir: benchmarkDir,
    model: summary.model,
    started_at: summary.started_at,
    completed_at: summary.completed_at,
    duration_ms: summary.duration_ms,
    counts: summary.counts,
    totals: summary.totals,
    scores: {
      count: summary.scores.count,
      mean: summary.scores.mean,
      min: summary.scores.min,
      max: summary.scores.max
    },
    papers: summary.results.map((record) => ({
      index: record.paper.index,
      name: record.paper.name,
      status: record.status,
      iterations: record.iterations,
      tool_calls: record.tool_calls,
      ...(record.evaluation
        ? { score: `${record.evaluation.total}/${record.evaluation.max_possible}` }
        : {}),
      ...(record.error ? { error: truncate(`${record.error.code}: ${record.error.message}`) } : {})
    }))
  };
};
