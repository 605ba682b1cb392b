import type { BenchmarkSummary, RunRecord, RunStatus } from "../artifacts/types.js";

const round2 = (value: number): number => Math.round(value * 100) / 100;

/** Derived from the run records alone; nothing else feeds the summary. */
export const computeSummary = (input: {
  benchmarkId: string;
  model: string;
  startedAt: Date;
  completedAt: Date;
  records: readonly RunRecord[];
}): BenchmarkSummary => {
  const counts: Record<RunStatus, number> = { completed: 0, failed: 0, incomplete: 0, pending: 0 };
  const totals = { png_files: 0, csv_files: 0, iterations: 0, tool_calls: 0 };
  const scores: number[] = [];

  for (const record of input.records) {
    counts[record.status] += 1;
    totals.png_files += record.artifacts.png_files.length;
    totals.csv_files += record.artifacts.csv_files.length;
    totals.iterations += record.iterations;
    totals.tool_calls += record.tool_calls;
    if (record.evaluation) {
      scores.push(record.evaluation.total);
    }
  }

  return {
    schema_version: "1.0.0",
    benchmark_id: input.benchmarkId,
    model: input.model,
    started_at: input.startedAt.toISOString(),
    completed_at: input.completedAt.toISOString(),
    duration_ms: Math.max(0, input.completedAt.getTime() - input.startedAt.getTime()),
    paper_count: input.records.length,
    counts,
    totals,
    scores: {
      count: scores.length,
      mean: scores.length > 0 ? round2(scores.reduce((sum, score) => sum + score, 0) / scores.length) : null,
      min: scores.length > 0 ? Math.min(...scores) : null,
      max: scores.length > 0 ? Math.max(...scores) : null,
      all: scores
    },
    results: [...input.records]
  };
};
