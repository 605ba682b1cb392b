import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { describe, expect, it } from "vitest";

import { BENCHMARK_FILES, RUN_FILES } from "../../artifacts/run-files.js";
import type { PaperRef, RunRecord } from "../../artifacts/types.js";
import { TransportError } from "../../core/errors.js";
import { ToolDispatcher } from "../../dispatch/dispatcher.js";
import { ToolRegistry } from "../../dispatch/registry.js";
import { BUILTIN_TOOLS } from "../../dispatch/handlers/index.js";
import { EventBus } from "../../events/event-bus.js";
import type { EventType } from "../../events/types.js";
import { verifyBenchmarkDir } from "../../tools/verify-run.js";
import { runBenchmark, type BenchmarkOptions } from "../benchmark-orchestrator.js";
import type { ModelRequest } from "../model-client.js";
import { MINIMAL_MODEL_XML, ScriptedModel, call, makeTempDir, reply, stubCollaborators, testConfig } from "./fakes.js";

const makePapers = (root: string): PaperRef[] =>
  ["alpha.pdf", "beta.pdf", "gamma.pdf"].map((name, index) => {
    const path = join(root, name);
    writeFileSync(path, "%PDF-1.4 placeholder");
    return { name, path, index };
  });

const promptOf = (request: ModelRequest): string => {
  const first = request.turns[0];
  return first && first.kind === "text" ? first.text : "";
};

const setup = (model: ScriptedModel, patch: Partial<BenchmarkOptions> = {}) => {
  const root = makeTempDir("bench");
  const benchmarkDir = join(root, "runs", "20240102T030405Z_abcdef");
  const registry = ToolRegistry.create(BUILTIN_TOOLS);
  const bus = new EventBus();
  const seen: EventType[] = [];
  for (const type of ["benchmark.started", "paper.started", "paper.completed", "benchmark.completed"] as const) {
    bus.subscribe(type, () => {
      seen.push(type);
    });
  }
  const options: BenchmarkOptions = {
    benchmarkId: "20240102T030405Z_abcdef",
    benchmarkDir,
    papers: makePapers(root),
    config: testConfig({ maxIterations: 5 }),
    systemPrompt: "You build Morpheus models.",
    model,
    dispatcher: new ToolDispatcher(registry),
    tools: registry.declarations(),
    collaborators: stubCollaborators(),
    bus,
    sleep: async () => {},
    ...patch
  };
  return { options, benchmarkDir, seen };
};

const readRecord = (record: RunRecord): unknown =>
  JSON.parse(readFileSync(join(record.run_dir, RUN_FILES.runRecord), "utf8"));

describe("runBenchmark", () => {
  it("records a capped paper as incomplete and keeps going", async () => {
    const model = new ScriptedModel((request) => {
      const prompt = promptOf(request);
      if (prompt.includes("alpha.pdf")) {
        return request.turns.length === 1
          ? reply("", [call("c1", "save_model_xml", { model_xml: MINIMAL_MODEL_XML })])
          : reply("Evaluation finished. PAPER_COMPLETE");
      }
      if (prompt.includes("beta.pdf")) {
        return reply("Still reading the paper.");
      }
      return reply("PAPER_COMPLETE");
    });
    const { options, benchmarkDir, seen } = setup(model);
    const { summary, summaryPath } = await runBenchmark(options);

    expect(summaryPath).toBe(join(benchmarkDir, BENCHMARK_FILES.summary));
    expect(summary.paper_count).toBe(3);
    expect(summary.counts).toEqual({ completed: 2, incomplete: 1, failed: 0, pending: 0 });
    expect(summary.results.map((record) => record.status)).toEqual(["completed", "incomplete", "completed"]);
    expect(summary.results.map((record) => record.iterations)).toEqual([2, 5, 1]);
    expect(summary.totals.tool_calls).toBe(1);
    expect(summary.scores.count).toBe(3);

    const [alpha, beta] = summary.results;
    expect(alpha?.run_dir).toBe(join(benchmarkDir, "01_alpha"));
    expect(alpha?.artifacts.model_xml).toBe("model.xml");
    expect(alpha?.artifacts.conversation_log).toBe("conversation.txt");
    expect(alpha?.evaluation?.stop_time.configured).toBe(10);
    expect(beta?.terminal).toBe("capped");
    expect(beta?.evaluation?.total).toBe(0);

    if (!alpha) {
      throw new Error("missing alpha record");
    }
    const traced = readFileSync(join(alpha.run_dir, RUN_FILES.toolCalls), "utf8").trim().split("\n");
    expect(traced).toHaveLength(1);
    expect(readRecord(alpha)).toEqual(alpha);

    expect(seen[0]).toBe("benchmark.started");
    expect(seen.at(-1)).toBe("benchmark.completed");
    expect(seen.filter((type) => type === "paper.completed")).toHaveLength(3);

    const report = verifyBenchmarkDir(benchmarkDir);
    expect(report.ok).toBe(true);
  });

  it("isolates a paper whose model transport fails", async () => {
    const model = new ScriptedModel((request) => {
      if (promptOf(request).includes("beta.pdf")) {
        throw new TransportError("rate limited after retries", { status: 429, code: "rate_limited", retryCount: 4 });
      }
      return reply("PAPER_COMPLETE");
    });
    const { options } = setup(model);
    const { summary } = await runBenchmark(options);

    expect(summary.counts).toEqual({ completed: 2, incomplete: 0, failed: 1, pending: 0 });
    const beta = summary.results[1];
    expect(beta?.status).toBe("failed");
    expect(beta?.terminal).toBe("fatal");
    expect(beta?.error).toEqual({ message: "rate limited after retries", code: "rate_limited" });
    expect(beta?.evaluation).toBeUndefined();
    expect(beta && existsSync(join(beta.run_dir, RUN_FILES.evaluationJson))).toBe(false);
    expect(summary.scores.count).toBe(2);
  });

  it("keeps the outcome of a paper whose transcript cannot be written", async () => {
    let benchmarkDir = "";
    const model = new ScriptedModel((request) => {
      if (promptOf(request).includes("alpha.pdf")) {
        mkdirSync(join(benchmarkDir, "01_alpha", RUN_FILES.conversation));
      }
      return reply("PAPER_COMPLETE");
    });
    const setupResult = setup(model);
    benchmarkDir = setupResult.benchmarkDir;
    const { summary } = await runBenchmark(setupResult.options);

    expect(summary.counts).toEqual({ completed: 3, incomplete: 0, failed: 0, pending: 0 });
    const alpha = summary.results[0];
    if (!alpha) {
      throw new Error("missing alpha record");
    }
    expect(alpha.terminal).toBe("done");
    expect(alpha.iterations).toBe(1);
    expect(alpha.run_dir).toBe(join(benchmarkDir, "01_alpha"));
    expect(alpha.error?.code).toBe("finalize_failed");
    expect(alpha.error?.message).toMatch(/^Writing conversation\.txt failed: /);
    expect(alpha.evaluation?.max_possible).toBe(7);
    expect(readRecord(alpha)).toEqual(alpha);
  });

  it("leaves papers pending once shutdown is requested", async () => {
    let stop = false;
    const model = new ScriptedModel(() => {
      stop = true;
      return reply("PAPER_COMPLETE");
    });
    const { options, benchmarkDir } = setup(model, {
      shutdown: { signal: new AbortController().signal, isRequested: () => stop }
    });
    const { summary } = await runBenchmark(options);

    expect(summary.counts).toEqual({ completed: 1, incomplete: 0, failed: 0, pending: 2 });
    expect(summary.results[1]?.run_dir).toBe(benchmarkDir);
    expect(summary.results[2]?.completed_at).toBeNull();
    expect(existsSync(join(benchmarkDir, "02_beta"))).toBe(false);
  });

  it("writes the summary file that matches the returned summary", async () => {
    const { options } = setup(ScriptedModel.sequence([reply("PAPER_COMPLETE"), reply("PAPER_COMPLETE"), reply("PAPER_COMPLETE")]));
    const { summary, summaryPath } = await runBenchmark(options);
    expect(JSON.parse(readFileSync(summaryPath, "utf8"))).toEqual(summary);
  });
});
