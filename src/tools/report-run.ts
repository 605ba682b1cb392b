import { existsSync, readFileSync } from "node:fs";
import { join, resolve } from "node:path";

import { formatAjvErrors, validateSummary } from "../config/schema-validation.js";
import { BENCHMARK_FILES, RUN_FILES } from "../artifacts/run-files.js";
import type { BenchmarkSummary, RunRecord, RunStatus } from "../artifacts/types.js";

type ToolTraceLine = {
  name: string;
  ok: boolean;
};

const isTraceLine = (value: unknown): value is ToolTraceLine =>
  typeof value === "object" &&
  value !== null &&
  "name" in value &&
  typeof value.name === "string" &&
  "ok" in value &&
  typeof value.ok === "boolean";

const readToolTrace = (runDir: string): ToolTraceLine[] => {
  const path = join(runDir, RUN_FILES.toolCalls);
  if (!existsSync(path)) {
    return [];
  }
  const raw = readFileSync(path, "utf8").trim();
  if (!raw) {
    return [];
  }
  return raw
    .split("\n")
    .filter(Boolean)
    .map((line): unknown => JSON.parse(line))
    .filter(isTraceLine);
};

export type ReportPaper = {
  index: number;
  name: string;
  status: RunStatus;
  iterations: number;
  tool_calls: number;
  score: number | null;
  max_possible: number | null;
  breakdown?: {
    errors: number;
    model_graph: number;
    time_steps: number;
    stop_time: number;
    results: number;
    many_graphs: number;
  };
  error?: string;
};

export type ReportModel = {
  benchmark_id: string;
  benchmark_dir: string;
  model: string;
  counts: Record<RunStatus, number>;
  scores: BenchmarkSummary["scores"];
  papers: ReportPaper[];
  top: ReportPaper[];
  tools: Record<string, { calls: number; failures: number }>;
};

const toReportPaper = (record: RunRecord): ReportPaper => {
  const evaluation = record.evaluation;
  return {
    index: record.paper.index,
    name: record.paper.name,
    status: record.status,
    iterations: record.iterations,
    tool_calls: record.tool_calls,
    score: evaluation ? evaluation.total : null,
    max_possible: evaluation ? evaluation.max_possible : null,
    ...(evaluation
      ? {
          breakdown: {
            errors: evaluation.errors.penalty,
            model_graph: evaluation.model_graph.points,
            time_steps: evaluation.time_steps.points,
            stop_time: evaluation.stop_time.points,
            results: evaluation.results.points,
            many_graphs: evaluation.many_graphs.points
          }
        }
      : {}),
    ...(record.error ? { error: `${record.error.code}: ${record.error.message}` } : {})
  };
};

export const buildReportModel = (benchmarkDir: string, topN = 3): ReportModel => {
  const summaryPath = resolve(benchmarkDir, BENCHMARK_FILES.summary);
  if (!existsSync(summaryPath)) {
    throw new Error(`${BENCHMARK_FILES.summary} not found; cannot build report`);
  }
  const summary: unknown = JSON.parse(readFileSync(summaryPath, "utf8"));
  if (!validateSummary(summary)) {
    throw new Error(formatAjvErrors(BENCHMARK_FILES.summary, validateSummary.errors).join("\n"));
  }

  const tools: ReportModel["tools"] = {};
  for (const record of summary.results) {
    if (record.status === "pending") {
      continue;
    }
    for (const line of readToolTrace(record.run_dir)) {
      const entry = tools[line.name] ?? { calls: 0, failures: 0 };
      entry.calls += 1;
      if (!line.ok) {
        entry.failures += 1;
      }
      tools[line.name] = entry;
    }
  }

  const papers = summary.results.map(toReportPaper);
  const top = papers
    .filter((paper) => paper.score !== null)
    .slice()
    .sort((a, b) => (b.score ?? 0) - (a.score ?? 0) || a.index - b.index)
    .slice(0, topN);

  return {
    benchmark_id: summary.benchmark_id,
    benchmark_dir: benchmarkDir,
    model: summary.model,
    counts: summary.counts,
    scores: summary.scores,
    papers,
    top,
    tools
  };
};

const formatScore = (paper: ReportPaper): string =>
  paper.score === null ? "-" : `${paper.score}/${paper.max_possible ?? "-"}`;

export const formatReportText = (model: ReportModel): string => {
  const lines: string[] = [];
  lines.push("Morpheus Benchmark Report");
  lines.push(`Benchmark ID: ${model.benchmark_id}`);
  lines.push(`Model: ${model.model}`);
  lines.push(
    `Counts: completed ${model.counts.completed}, incomplete ${model.counts.incomplete}, failed ${model.counts.failed}, pending ${model.counts.pending}`
  );
  lines.push(
    `Scores: n=${model.scores.count} mean=${model.scores.mean ?? "null"} min=${model.scores.min ?? "null"} max=${model.scores.max ?? "null"}`
  );

  lines.push("");
  lines.push("Papers:");
  for (const paper of model.papers) {
    lines.push(
      `  ${String(paper.index + 1).padStart(2, "0")} ${paper.name} | ${paper.status} | score ${formatScore(paper)} | iterations ${paper.iterations} | tool calls ${paper.tool_calls}`
    );
    if (paper.breakdown) {
      const b = paper.breakdown;
      lines.push(
        `     errors ${b.errors}, graph ${b.model_graph}, time steps ${b.time_steps}, stop time ${b.stop_time}, results ${b.results}, many graphs ${b.many_graphs}`
      );
    }
    if (paper.error) {
      lines.push(`     ${paper.error}`);
    }
  }

  if (model.top.length > 0) {
    lines.push("");
    lines.push(`Top papers: ${model.top.map((paper) => `${paper.name} (${formatScore(paper)})`).join(", ")}`);
  }

  const tools = Object.entries(model.tools).sort((a, b) => b[1].calls - a[1].calls);
  if (tools.length > 0) {
    lines.push("");
    lines.push(
      `Tools: ${tools.map(([name, usage]) => `${name}=${usage.calls}${usage.failures > 0 ? ` (${usage.failures} failed)` : ""}`).join(", ")}`
    );
  }

  lines.push(`Output: ${model.benchmark_dir}`);
  return `${lines.join("\n")}\n`;
};

export const formatReportJson = (model: ReportModel): string =>
  `${JSON.stringify(model, null, 2)}\n`;
