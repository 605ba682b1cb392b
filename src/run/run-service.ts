import { resolve } from "node:path";

import { resolveConfig, type ConfigOverrides } from "../config/resolve-config.js";
import type { RuntimeSettings } from "../config/types.js";
import { createBenchmarkDir } from "../artifacts/run-dir.js";
import { BENCHMARK_FILES } from "../artifacts/run-files.js";
import { generateRunId } from "../artifacts/run-id.js";
import type { PaperRef } from "../artifacts/types.js";
import { FileReferenceStore } from "../collaborators/reference-store.js";
import { MorpheusSimulator } from "../collaborators/simulator.js";
import { PdfTextExtractor } from "../collaborators/text-extractor.js";
import { ToolDispatcher } from "../dispatch/dispatcher.js";
import { BUILTIN_TOOLS } from "../dispatch/handlers/index.js";
import { ToolRegistry } from "../dispatch/registry.js";
import { runBenchmark, type BenchmarkResult } from "../engine/benchmark-orchestrator.js";
import { OpenRouterModelClient, type ModelClient } from "../engine/model-client.js";
import { discoverPapers } from "../engine/papers.js";
import type { Collaborators } from "../engine/paper-runner.js";
import { EventBus } from "../events/event-bus.js";
import { ExecutionLogger } from "../ui/execution-log.js";
import { buildReceiptModel } from "../ui/receipt-model.js";
import { formatReceiptText } from "../ui/receipt-text.js";
import { renderReceiptInk } from "../ui/receipt-ink.js";
import { writeReceiptText } from "../ui/receipt-writer.js";
import { createConsoleWarningSink, type WarningSink } from "../utils/warnings.js";
import type { ReceiptMode, RunLifecycleContext, RunLifecycleHooks } from "./lifecycle-hooks.js";

export type RunServiceOptions = {
  configPath?: string;
  rootDir?: string;
  overrides?: ConfigOverrides;
  quiet?: boolean;
  bus?: EventBus;
  receiptMode?: ReceiptMode;
  hooks?: RunLifecycleHooks;
  warningSink?: WarningSink;
  forwardWarningEvents?: boolean;
  /** Replace the live collaborators; tests pass in-process fakes here. */
  model?: ModelClient;
  collaborators?: Partial<Collaborators>;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
};

export type RunServiceResult = BenchmarkResult & {
  benchmarkId: string;
  benchmarkDir: string;
  receiptPath: string | null;
};

const setupShutdownHandlers = (input: {
  warningSink: WarningSink;
  timeoutMs: number;
}): {
  signal: AbortSignal;
  isRequested: () => boolean;
  dispose: () => void;
} => {
  const controller = new AbortController();
  let shutdownRequested = false;
  let shutdownTimer: ReturnType<typeof setTimeout> | null = null;

  const requestShutdown = (signalName: string): void => {
    if (shutdownRequested) {
      return;
    }
    shutdownRequested = true;
    input.warningSink.warn(
      `${signalName} received: no new papers will start; waiting for the current paper to finish...`,
      "shutdown"
    );
    shutdownTimer = setTimeout(() => controller.abort(), input.timeoutMs);
  };

  const onSigint = (): void => requestShutdown("SIGINT");
  const onSigterm = (): void => requestShutdown("SIGTERM");

  process.on("SIGINT", onSigint);
  process.on("SIGTERM", onSigterm);

  const dispose = (): void => {
    process.removeListener("SIGINT", onSigint);
    process.removeListener("SIGTERM", onSigterm);
    if (shutdownTimer) {
      clearTimeout(shutdownTimer);
      shutdownTimer = null;
    }
  };

  return {
    signal: controller.signal,
    isRequested: () => shutdownRequested,
    dispose
  };
};

const registerWarningForwarder = (
  bus: EventBus,
  sink: WarningSink,
  forward: boolean
): (() => void) => {
  if (!forward) {
    return () => {};
  }
  return bus.subscribeSafe("warning.raised", (payload) => {
    sink.warn(payload.message, payload.source);
  });
};

const buildCollaborators = (settings: RuntimeSettings, overrides?: Partial<Collaborators>): Collaborators => {
  const { config, configRoot } = settings;
  return {
    textExtractor: overrides?.textExtractor ?? new PdfTextExtractor(),
    simulator: overrides?.simulator ?? new MorpheusSimulator(config.simulator.bin),
    references:
      overrides?.references ??
      new FileReferenceStore(resolve(configRoot, config.references.root), config.references.categories)
  };
};

export const writeReceipt = async (input: {
  benchmarkDir: string;
  mode: ReceiptMode;
  useInk: boolean;
}): Promise<string | null> => {
  if (input.mode === "skip") {
    return null;
  }
  const model = buildReceiptModel(input.benchmarkDir);
  const text = formatReceiptText(model);
  const path = writeReceiptText(input.benchmarkDir, text);

  if (input.mode === "auto") {
    if (input.useInk) {
      await renderReceiptInk(model);
    } else {
      process.stdout.write(text);
    }
  }
  return path;
};

/**
 * Resolves configuration, wires the bus, logger and collaborators, runs the
 * batch and writes the receipt. Everything the CLI `run` command does.
 */
export const runBenchmarkService = async (options: RunServiceOptions = {}): Promise<RunServiceResult> => {
  const warningSink = options.warningSink ?? createConsoleWarningSink();
  const resolved = resolveConfig({
    configPath: options.configPath,
    rootDir: options.rootDir,
    overrides: options.overrides
  });
  resolved.warnings.forEach((warning) => warningSink.warn(warning, "config"));
  const { settings } = resolved;
  const { config } = settings;

  if (!options.model && !settings.apiKey) {
    throw new Error("OPENROUTER_API_KEY is required to run a benchmark");
  }

  const papers: PaperRef[] = discoverPapers(config, settings.configRoot);
  if (papers.length === 0) {
    throw new Error(`No papers found in ${resolve(settings.configRoot, config.papers.dir)}`);
  }

  const registry = ToolRegistry.create(BUILTIN_TOOLS, config.tools?.enabled);
  const dispatcher = new ToolDispatcher(registry);
  const collaborators = buildCollaborators(settings, options.collaborators);

  const now = options.now ?? (() => new Date());
  const benchmarkId = generateRunId(now());
  const benchmarkDir = createBenchmarkDir({
    outRoot: resolve(settings.configRoot, config.output.root),
    benchmarkId
  });

  const bus = options.bus ?? new EventBus();
  const stopWarningForwarder = registerWarningForwarder(bus, warningSink, options.forwardWarningEvents ?? true);
  const logger = new ExecutionLogger(resolve(benchmarkDir, BENCHMARK_FILES.executionLog));
  logger.attach(bus);

  const modelClient: ModelClient =
    options.model ??
    new OpenRouterModelClient({
      config,
      apiKey: settings.apiKey,
      onRetry: (runId, notice) =>
        bus.emit({
          type: "model.retry",
          payload: {
            run_id: runId,
            attempt: notice.attempt,
            delay_ms: notice.delayMs,
            ...(notice.status !== undefined ? { status: notice.status } : {}),
            reason: notice.reason
          }
        })
    });

  const quiet = options.quiet ?? false;
  const receiptMode = options.receiptMode ?? "auto";
  const lifecycleContext: RunLifecycleContext = {
    bus,
    benchmarkId,
    benchmarkDir,
    config,
    quiet,
    receiptMode,
    warningSink
  };
  const shutdown = setupShutdownHandlers({ warningSink, timeoutMs: 30_000 });

  try {
    await options.hooks?.onRunSetup?.(lifecycleContext);
  } catch (error) {
    warningSink.warn(
      `Run lifecycle setup failed: ${error instanceof Error ? error.message : String(error)}`,
      "lifecycle"
    );
  }

  let result: BenchmarkResult | undefined;
  let runError: Error | null = null;
  let receiptPath: string | null = null;
  try {
    result = await runBenchmark({
      benchmarkId,
      benchmarkDir,
      papers,
      config,
      systemPrompt: settings.systemPrompt,
      model: modelClient,
      dispatcher,
      tools: registry.declarations(),
      collaborators,
      bus,
      shutdown,
      now,
      ...(options.sleep ? { sleep: options.sleep } : {})
    });
  } catch (error) {
    runError = error instanceof Error ? error : new Error(String(error));
  } finally {
    shutdown.dispose();
    await logger.close();
    if (result) {
      try {
        receiptPath = await writeReceipt({
          benchmarkDir,
          mode: receiptMode,
          useInk: Boolean(process.stdout.isTTY && !quiet)
        });
        if (receiptPath) {
          bus.emit({ type: "artifact.written", payload: { path: receiptPath, kind: "receipt" } });
        }
      } catch (error) {
        warningSink.warn(
          `Failed to render receipt: ${error instanceof Error ? error.message : String(error)}`,
          "receipt"
        );
      }
    }
    try {
      await options.hooks?.onRunFinally?.(lifecycleContext);
    } catch (error) {
      warningSink.warn(
        `Run lifecycle finalization failed: ${error instanceof Error ? error.message : String(error)}`,
        "lifecycle"
      );
    }
    logger.detach();
    stopWarningForwarder();
  }

  if (runError) {
    throw runError;
  }
  if (!result) {
    throw new Error("Benchmark completed without a result");
  }
  return { ...result, benchmarkId, benchmarkDir, receiptPath };
};
