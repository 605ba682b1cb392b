import { existsSync } from "node:fs";
import { join } from "node:path";

import type { BenchConfig } from "../config/types.js";
import { formatAjvErrors, validateRunRecord } from "../config/schema-validation.js";
import { createJsonlWriter, writeJsonAtomic, writeTextAtomic } from "../artifacts/io.js";
import { listRunOutputs } from "../artifacts/outputs.js";
import { createPaperRunDir } from "../artifacts/run-dir.js";
import { RUN_FILES } from "../artifacts/run-files.js";
import { generateRunId } from "../artifacts/run-id.js";
import { mergeRunMetadata } from "../artifacts/run-metadata.js";
import type {
  EvaluationResult,
  PaperRef,
  RunArtifacts,
  RunError,
  RunRecord,
  TerminalState
} from "../artifacts/types.js";
import type { ReferenceStore } from "../collaborators/reference-store.js";
import type { Simulator } from "../collaborators/simulator.js";
import type { TextExtractor } from "../collaborators/text-extractor.js";
import { formatTranscript } from "../conversation/transcript.js";
import type { ConversationTurn } from "../conversation/types.js";
import { errorMessage } from "../core/errors.js";
import type { ToolDispatcher } from "../dispatch/dispatcher.js";
import { evaluateRunDir } from "../evaluation/scoring.js";
import { writeEvaluation } from "../evaluation/evaluation-writer.js";
import type { EventBus } from "../events/event-bus.js";
import type { OpenRouterToolDeclaration } from "../openrouter/client.js";
import type { ModelClient } from "./model-client.js";
import { shouldEvaluate, statusForTerminal } from "./status.js";
import { runTurnLoop, type TurnLoopOutcome } from "./turn-loop.js";

export type Collaborators = {
  textExtractor: TextExtractor;
  simulator: Simulator;
  references: ReferenceStore;
};

export type PaperRunnerContext = {
  benchmarkId: string;
  benchmarkDir: string;
  config: BenchConfig;
  systemPrompt: string;
  model: ModelClient;
  dispatcher: ToolDispatcher;
  tools: readonly OpenRouterToolDeclaration[];
  collaborators: Collaborators;
  bus: EventBus;
  sleep?: (ms: number) => Promise<void>;
  signal?: AbortSignal;
  now?: () => Date;
};

export const initialPaperPrompt = (pdfPath: string, sentinel: string): string =>
  `Process this paper completely: ${pdfPath}. Follow ALL steps in order. ` +
  `Say '${sentinel}' only after evaluation is done.`;

const presentFile = (runDir: string, name: string): string | null =>
  existsSync(join(runDir, name)) ? name : null;

/** Paths are relative to the paper's run directory; absent files are null. */
export const collectRunArtifacts = (runDir: string): RunArtifacts => {
  const outputs = listRunOutputs(runDir);
  return {
    model_xml: presentFile(runDir, RUN_FILES.modelXml),
    stdout_log: presentFile(runDir, RUN_FILES.stdout),
    stderr_log: presentFile(runDir, RUN_FILES.stderr),
    conversation_log: presentFile(runDir, RUN_FILES.conversation),
    evaluation_json: presentFile(runDir, RUN_FILES.evaluationJson),
    evaluation_txt: presentFile(runDir, RUN_FILES.evaluationTxt),
    png_files: outputs.png,
    csv_files: outputs.csv
  };
};

export const writeRunRecord = (record: RunRecord): void => {
  if (!validateRunRecord(record)) {
    const errors = formatAjvErrors("run record", validateRunRecord.errors);
    throw new Error(errors.join("\n") || "run record is invalid");
  }
  writeJsonAtomic(join(record.run_dir, RUN_FILES.runRecord), record);
};

export const emptyArtifacts = (): RunArtifacts => ({
  model_xml: null,
  stdout_log: null,
  stderr_log: null,
  conversation_log: null,
  evaluation_json: null,
  evaluation_txt: null,
  png_files: [],
  csv_files: []
});

/**
 * Runs one paper end to end: directory, turn loop, evaluation, transcript and
 * run.json. Failures after the directory exists end up in the returned
 * record; only setup failures reject.
 */
export const runPaper = async (paper: PaperRef, context: PaperRunnerContext): Promise<RunRecord> => {
  const now = context.now ?? (() => new Date());
  const { config, bus } = context;
  const startedAt = now();
  const runId = generateRunId(startedAt);
  const runDir = createPaperRunDir({
    benchmarkDir: context.benchmarkDir,
    paperName: paper.name,
    index: paper.index
  });

  writeRunRecord({
    run_id: runId,
    paper,
    status: "pending",
    terminal: null,
    run_dir: runDir,
    artifacts: emptyArtifacts(),
    iterations: 0,
    tool_calls: 0,
    started_at: startedAt.toISOString(),
    completed_at: null
  });
  mergeRunMetadata(runDir, {
    run_id: runId,
    benchmark_id: context.benchmarkId,
    paper: paper.name,
    pdf_path: paper.path,
    model: context.model.modelName,
    started_at: startedAt.toISOString()
  });
  bus.emit({
    type: "paper.started",
    payload: { benchmark_id: context.benchmarkId, run_id: runId, paper, run_dir: runDir }
  });

  const traceWriter = createJsonlWriter(join(runDir, RUN_FILES.toolCalls));
  let outcome: TurnLoopOutcome;
  try {
    outcome = await runTurnLoop({
      runId,
      systemPrompt: context.systemPrompt,
      initialPrompt: initialPaperPrompt(paper.path, config.loop.sentinel),
      model: context.model,
      dispatcher: context.dispatcher,
      tools: context.tools,
      toolContext: {
        runId,
        runDir,
        paper,
        config,
        ...context.collaborators
      },
      loop: config.loop,
      truncation: config.truncation,
      bus,
      onToolCall: (trace) => traceWriter.append({ run_id: runId, ...trace }),
      ...(context.sleep ? { sleep: context.sleep } : {}),
      ...(context.signal ? { signal: context.signal } : {})
    });
  } catch (error) {
    outcome = {
      terminal: "fatal",
      iterations: 0,
      toolCalls: 0,
      transcript: [],
      error: { message: errorMessage(error), code: "internal" }
    };
  }

  let finalizeError: RunError | undefined;
  try {
    await traceWriter.close();
  } catch (error) {
    finalizeError = finalizeFailure(RUN_FILES.toolCalls, error);
  }

  return finishPaper({ paper, runId, runDir, startedAt, outcome, finalizeError, context, now });
};

/** The loop already ended; a failure while persisting its results keeps the outcome. */
const finalizeFailure = (file: string, error: unknown): RunError => ({
  message: `Writing ${file} failed: ${errorMessage(error)}`,
  code: "finalize_failed"
});

const finishPaper = (input: {
  paper: PaperRef;
  runId: string;
  runDir: string;
  startedAt: Date;
  outcome: TurnLoopOutcome;
  finalizeError?: RunError;
  context: PaperRunnerContext;
  now: () => Date;
}): RunRecord => {
  const { runDir, runId, outcome, context } = input;
  const terminal: TerminalState = outcome.terminal;
  const status = statusForTerminal(terminal);
  let error: RunError | undefined = outcome.error ?? input.finalizeError;

  let evaluation: EvaluationResult | undefined;
  if (shouldEvaluate(terminal)) {
    try {
      const scored = evaluateRunDir({
        runId,
        runDir,
        rubric: context.config.scoring,
        now: input.now()
      });
      const paths = writeEvaluation(runDir, scored);
      evaluation = scored;
      context.bus.emit({ type: "artifact.written", payload: { path: paths.jsonPath, kind: "evaluation" } });
    } catch (caught) {
      error = { message: `Evaluation failed: ${errorMessage(caught)}`, code: "evaluation_failed" };
    }
  }

  try {
    writeTranscript(runDir, {
      paper: input.paper.name,
      runId,
      model: context.model.modelName,
      status,
      iterations: outcome.iterations,
      toolCalls: outcome.toolCalls,
      turns: outcome.transcript
    });
  } catch (caught) {
    error = error ?? finalizeFailure(RUN_FILES.conversation, caught);
  }

  const completedAt = input.now();
  let record: RunRecord = {
    run_id: runId,
    paper: input.paper,
    status,
    terminal,
    run_dir: runDir,
    artifacts: collectRunArtifacts(runDir),
    iterations: outcome.iterations,
    tool_calls: outcome.toolCalls,
    started_at: input.startedAt.toISOString(),
    completed_at: completedAt.toISOString(),
    ...(error ? { error } : {}),
    ...(evaluation ? { evaluation } : {})
  };

  try {
    writeRunRecord(record);
    mergeRunMetadata(runDir, {
      status,
      terminal,
      completed_at: record.completed_at
    });
  } catch (caught) {
    const failure = finalizeFailure(RUN_FILES.runRecord, caught);
    record = { ...record, error: record.error ?? failure };
    context.bus.emit({
      type: "warning.raised",
      payload: { message: `${runId}: ${failure.message}`, source: "paper", recorded_at: input.now().toISOString() }
    });
  }
  context.bus.emit({ type: "paper.completed", payload: { run_record: record } });
  return record;
};

const writeTranscript = (
  runDir: string,
  input: {
    paper: string;
    runId: string;
    model: string;
    status: string;
    iterations: number;
    toolCalls: number;
    turns: readonly ConversationTurn[];
  }
): void => {
  writeTextAtomic(
    join(runDir, RUN_FILES.conversation),
    formatTranscript(
      {
        paper: input.paper,
        runId: input.runId,
        model: input.model,
        status: input.status,
        iterations: input.iterations,
        toolCalls: input.toolCalls
      },
      input.turns
    )
  );
};
