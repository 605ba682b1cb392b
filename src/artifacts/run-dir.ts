import { mkdirSync } from "node:fs";
import { resolve } from "node:path";

import { slugifyPaperName } from "./run-id.js";

export interface BenchmarkDirOptions {
  outRoot?: string;
  benchmarkId: string;
}

export const createBenchmarkDir = (options: BenchmarkDirOptions): string => {
  const outRoot = resolve(options.outRoot ?? "runs");
  const benchmarkDir = resolve(outRoot, options.benchmarkId);
  mkdirSync(benchmarkDir, { recursive: true });
  return benchmarkDir;
};

export interface PaperRunDirOptions {
  benchmarkDir: string;
  paperName: string;
  index: number;
}

/** One directory per paper, ordered by position in the batch: `01_<slug>`. */
export const createPaperRunDir = (options: PaperRunDirOptions): string => {
  const prefix = (options.index + 1).toString().padStart(2, "0");
  const runDir = resolve(options.benchmarkDir, `${prefix}_${slugifyPaperName(options.paperName)}`);
  mkdirSync(runDir, { recursive: true });
  return runDir;
};
