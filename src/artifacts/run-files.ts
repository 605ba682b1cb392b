import { existsSync } from "node:fs";
import { isAbsolute, join, relative, resolve } from "node:path";

import { readJsonFile } from "./io.js";

export const RUN_FILES = {
  paperText: "paper.txt",
  metadata: "metadata.json",
  modelXml: "model.xml",
  modelErrors: "model.xml.err",
  stdout: "stdout.log",
  stderr: "stderr.log",
  simulation: "simulation.json",
  modelGraph: "model_graph.dot",
  evaluationJson: "evaluation.json",
  evaluationTxt: "evaluation.txt",
  conversation: "conversation.txt",
  toolCalls: "tool_calls.jsonl",
  runRecord: "run.json"
} as const;

export const BENCHMARK_FILES = {
  summary: "benchmark_summary.json",
  receipt: "receipt.txt",
  executionLog: "execution.log"
} as const;

/** Outcome of the most recent simulator invocation in a run directory. */
export type SimulationRecord = {
  exit_code: number | null;
  timed_out: boolean;
  duration_ms: number;
  command: string[];
  finished_at: string;
};

export const readSimulationRecord = (runDir: string): SimulationRecord | null => {
  const path = join(runDir, RUN_FILES.simulation);
  if (!existsSync(path)) {
    return null;
  }
  const parsed = readJsonFile(path);
  if (typeof parsed !== "object" || parsed === null) {
    return null;
  }
  const exitCode = "exit_code" in parsed ? parsed.exit_code : null;
  const timedOut = "timed_out" in parsed ? parsed.timed_out : false;
  const durationMs = "duration_ms" in parsed ? parsed.duration_ms : 0;
  const command = "command" in parsed ? parsed.command : [];
  const finishedAt = "finished_at" in parsed ? parsed.finished_at : "";
  return {
    exit_code: typeof exitCode === "number" ? exitCode : null,
    timed_out: timedOut === true,
    duration_ms: typeof durationMs === "number" ? durationMs : 0,
    command: Array.isArray(command) ? command.filter((part): part is string => typeof part === "string") : [],
    finished_at: typeof finishedAt === "string" ? finishedAt : ""
  };
};

export const simulationFailed = (record: SimulationRecord | null): boolean =>
  record !== null && (record.timed_out || record.exit_code !== 0);

/**
 * Resolves `path` against the run directory and returns null when the result
 * would fall outside it.
 */
export const resolveInsideRun = (runDir: string, path: string): string | null => {
  const root = resolve(runDir);
  const target = isAbsolute(path) ? resolve(path) : resolve(root, path);
  const rel = relative(root, target);
  if (rel.length === 0 || rel.startsWith("..") || isAbsolute(rel)) {
    return null;
  }
  return target;
};
