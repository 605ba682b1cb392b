import type { ReceiptModel } from "./receipt-model.js";

const formatScore = (value: number | null): string => (value === null ? "-" : String(value));

const formatDuration = (ms: number): string => {
  const seconds = Math.round(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  return minutes > 0 ? `${minutes}m ${seconds % 60}s` : `${seconds}s`;
};

const formatBanner = (model: ReceiptModel): string => {
  const total = model.papers.length;
  if (total === 0) {
    return "Finished: no papers were selected";
  }
  if (model.counts.completed === total) {
    return `Finished: all ${total} papers completed`;
  }
  if (model.counts.pending > 0) {
    return `Stopped early: ${model.counts.pending} of ${total} papers not started`;
  }
  return `Finished: ${model.counts.completed} of ${total} papers completed`;
};

export const formatReceiptText = (model: ReceiptModel): string => {
  const lines: string[] = [];

  lines.push(formatBanner(model));
  lines.push("Scores measure simulator output, not agreement with the paper.");
  lines.push("");

  lines.push("Summary:");
  lines.push(`- benchmark id: ${model.benchmark_id}`);
  lines.push(`- model: ${model.model}`);
  lines.push(
    `- papers completed/incomplete/failed/pending: ${model.counts.completed}/${model.counts.incomplete}/${model.counts.failed}/${model.counts.pending}`
  );
  lines.push(`- iterations: ${model.totals.iterations} | tool calls: ${model.totals.tool_calls}`);
  lines.push(`- outputs: ${model.totals.png_files} png, ${model.totals.csv_files} csv`);
  lines.push(
    `- scores (n=${model.scores.count}): mean ${formatScore(model.scores.mean)}, min ${formatScore(model.scores.min)}, max ${formatScore(model.scores.max)}`
  );
  lines.push(`- time: ${model.started_at} -> ${model.completed_at} (${formatDuration(model.duration_ms)})`);

  lines.push("");
  lines.push("Papers:");
  if (model.papers.length === 0) {
    lines.push("- (none)");
  } else {
    for (const paper of model.papers) {
      const score = paper.score ? ` score ${paper.score}` : "";
      lines.push(
        `- ${String(paper.index + 1).padStart(2, "0")} ${paper.name}: ${paper.status} (${paper.iterations} iterations, ${paper.tool_calls} tool calls)${score}`
      );
      if (paper.error) {
        lines.push(`    ${paper.error}`);
      }
    }
  }

  lines.push("");
  lines.push(`Output: ${model.benchmark_dir}`);

  return `${lines.join("\n")}\n`;
};
