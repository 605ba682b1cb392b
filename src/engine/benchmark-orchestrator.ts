import { setTimeout as delay } from "node:timers/promises";
import { join } from "node:path";

import type { BenchConfig } from "../config/types.js";
import { formatAjvErrors, validateSummary } from "../config/schema-validation.js";
import { writeJsonAtomic } from "../artifacts/io.js";
import { BENCHMARK_FILES } from "../artifacts/run-files.js";
import type { BenchmarkSummary, PaperRef, RunRecord } from "../artifacts/types.js";
import { errorMessage } from "../core/errors.js";
import type { ToolDispatcher } from "../dispatch/dispatcher.js";
import type { EventBus } from "../events/event-bus.js";
import type { OpenRouterToolDeclaration } from "../openrouter/client.js";
import type { ModelClient } from "./model-client.js";
import { generateRunId } from "../artifacts/run-id.js";
import { emptyArtifacts, runPaper, type Collaborators } from "./paper-runner.js";
import { computeSummary } from "./summary.js";

export type BenchmarkOptions = {
  benchmarkId: string;
  benchmarkDir: string;
  papers: readonly PaperRef[];
  config: BenchConfig;
  systemPrompt: string;
  model: ModelClient;
  dispatcher: ToolDispatcher;
  tools: readonly OpenRouterToolDeclaration[];
  collaborators: Collaborators;
  bus: EventBus;
  shutdown?: {
    signal: AbortSignal;
    isRequested: () => boolean;
  };
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
};

export type BenchmarkResult = {
  summary: BenchmarkSummary;
  summaryPath: string;
};

/** A paper the batch never reached; it has no run directory of its own. */
const pendingRecord = (paper: PaperRef, benchmarkDir: string, at: Date): RunRecord => ({
  run_id: generateRunId(at),
  paper,
  status: "pending",
  terminal: null,
  run_dir: benchmarkDir,
  artifacts: emptyArtifacts(),
  iterations: 0,
  tool_calls: 0,
  started_at: at.toISOString(),
  completed_at: null
});

/**
 * Runs every paper in order. One paper's failure never stops the batch; an
 * interrupt stops new papers from starting and leaves the rest pending.
 */
export const runBenchmark = async (options: BenchmarkOptions): Promise<BenchmarkResult> => {
  const { bus, config } = options;
  const now = options.now ?? (() => new Date());
  const sleep = options.sleep ?? ((ms: number) => delay(ms));
  const startedAt = now();

  bus.emit({
    type: "benchmark.started",
    payload: {
      benchmark_id: options.benchmarkId,
      started_at: startedAt.toISOString(),
      model: options.model.modelName,
      paper_count: options.papers.length,
      max_iterations: config.loop.max_iterations,
      output_dir: options.benchmarkDir
    }
  });

  try {
    const records: RunRecord[] = [];
    for (const paper of options.papers) {
      if (options.shutdown?.isRequested()) {
        records.push(pendingRecord(paper, options.benchmarkDir, now()));
        continue;
      }
      if (records.length > 0 && config.execution.paper_delay_ms > 0) {
        await sleep(config.execution.paper_delay_ms);
      }

      records.push(await runPaperIsolated(paper, options, now));
      await bus.flush();
    }

    const summary = computeSummary({
      benchmarkId: options.benchmarkId,
      model: options.model.modelName,
      startedAt,
      completedAt: now(),
      records
    });
    if (!validateSummary(summary)) {
      const errors = formatAjvErrors("summary", validateSummary.errors);
      throw new Error(errors.join("\n") || "benchmark summary is invalid");
    }
    const summaryPath = join(options.benchmarkDir, BENCHMARK_FILES.summary);
    writeJsonAtomic(summaryPath, summary);
    bus.emit({ type: "artifact.written", payload: { path: summaryPath, kind: "summary" } });

    bus.emit({ type: "benchmark.completed", payload: { summary } });
    await bus.flush();
    return { summary, summaryPath };
  } catch (error) {
    bus.emit({
      type: "benchmark.failed",
      payload: {
        benchmark_id: options.benchmarkId,
        completed_at: now().toISOString(),
        error: errorMessage(error)
      }
    });
    await bus.flush();
    throw error;
  }
};

const runPaperIsolated = async (
  paper: PaperRef,
  options: BenchmarkOptions,
  now: () => Date
): Promise<RunRecord> => {
  const startedAt = now();
  try {
    return await runPaper(paper, {
      benchmarkId: options.benchmarkId,
      benchmarkDir: options.benchmarkDir,
      config: options.config,
      systemPrompt: options.systemPrompt,
      model: options.model,
      dispatcher: options.dispatcher,
      tools: options.tools,
      collaborators: options.collaborators,
      bus: options.bus,
      now,
      ...(options.sleep ? { sleep: options.sleep } : {}),
      ...(options.shutdown ? { signal: options.shutdown.signal } : {})
    });
  } catch (error) {
    const record: RunRecord = {
      run_id: generateRunId(startedAt),
      paper,
      status: "failed",
      terminal: "fatal",
      run_dir: options.benchmarkDir,
      artifacts: emptyArtifacts(),
      iterations: 0,
      tool_calls: 0,
      started_at: startedAt.toISOString(),
      completed_at: now().toISOString(),
      error: { message: errorMessage(error), code: "paper_setup_failed" }
    };
    options.bus.emit({ type: "paper.completed", payload: { run_record: record } });
    return record;
  }
};
