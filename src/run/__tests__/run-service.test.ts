import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { describe, expect, it } from "vitest";

import { DEFAULT_CONFIG_PATH } from "../../config/defaults.js";
import { BENCHMARK_FILES } from "../../artifacts/run-files.js";
import { ScriptedModel, makeTempDir, reply, stubCollaborators } from "../../engine/__tests__/fakes.js";
import { createBufferedWarningSink } from "../../utils/warnings.js";
import { runBenchmarkService } from "../run-service.js";
import type { RunLifecycleContext } from "../lifecycle-hooks.js";

const setupWorkspace = (papers: string[]): string => {
  const rootDir = makeTempDir("run-service");
  mkdirSync(join(rootDir, "papers"));
  papers.forEach((name) => writeFileSync(join(rootDir, "papers", name), "%PDF-1.4"));
  writeFileSync(
    join(rootDir, DEFAULT_CONFIG_PATH),
    JSON.stringify({
      model: { name: "test/model", requests_per_second: null },
      output: { root: "out" }
    })
  );
  return rootDir;
};

describe("runBenchmarkService", () => {
  it("runs the batch, writes the receipt and the execution log", async () => {
    const rootDir = setupWorkspace(["one.pdf"]);
    const warnings = createBufferedWarningSink();
    const seen: string[] = [];

    const result = await runBenchmarkService({
      rootDir,
      receiptMode: "writeOnly",
      warningSink: warnings,
      model: ScriptedModel.sequence([reply("Done. PAPER_COMPLETE")]),
      collaborators: stubCollaborators(),
      hooks: {
        onRunSetup: (context: RunLifecycleContext) => {
          seen.push(`setup ${context.benchmarkId}`);
        },
        onRunFinally: () => {
          seen.push("finally");
        }
      }
    });

    expect(result.summary.counts.completed).toBe(1);
    expect(result.benchmarkDir.startsWith(join(rootDir, "out"))).toBe(true);
    expect(seen).toEqual([`setup ${result.benchmarkId}`, "finally"]);

    expect(result.receiptPath).toBe(join(result.benchmarkDir, BENCHMARK_FILES.receipt));
    const receipt = readFileSync(join(result.benchmarkDir, BENCHMARK_FILES.receipt), "utf8");
    expect(receipt).toContain("Finished: all 1 papers completed");

    const log = readFileSync(join(result.benchmarkDir, BENCHMARK_FILES.executionLog), "utf8");
    expect(log).toContain(`Benchmark started: ${result.benchmarkId}`);
    expect(log).toContain("Paper 1 completed: one.pdf | iterations 1 | tool calls 0");

    expect(warnings.drain().map((warning) => warning.source)).toContain("config");
  });

  it("skips the receipt when asked", async () => {
    const rootDir = setupWorkspace(["one.pdf"]);
    const result = await runBenchmarkService({
      rootDir,
      receiptMode: "skip",
      warningSink: createBufferedWarningSink(),
      model: ScriptedModel.sequence([reply("PAPER_COMPLETE")]),
      collaborators: stubCollaborators()
    });

    expect(result.receiptPath).toBeNull();
    expect(existsSync(join(result.benchmarkDir, BENCHMARK_FILES.receipt))).toBe(false);
  });

  it("refuses to start without papers", async () => {
    const rootDir = setupWorkspace([]);
    await expect(
      runBenchmarkService({
        rootDir,
        receiptMode: "skip",
        warningSink: createBufferedWarningSink(),
        model: ScriptedModel.sequence([]),
        collaborators: stubCollaborators()
      })
    ).rejects.toThrow(`No papers found in ${join(rootDir, "papers")}`);
  });
});
