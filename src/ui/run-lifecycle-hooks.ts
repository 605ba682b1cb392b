import type { EventBus } from "../events/event-bus.js";
import type { EventPayloadMap } from "../events/types.js";
import type { RunLifecycleContext, RunLifecycleHooks } from "../run/lifecycle-hooks.js";
import { createStdoutFormatter, levelForStatus, type Formatter } from "./fmt.js";

const formatDuration = (inputMs: number): string => {
  const totalSeconds = Math.max(0, Math.floor(inputMs / 1000));
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (minutes === 0) {
    return `${seconds}s`;
  }
  return `${minutes}m ${seconds}s`;
};

/** Prints one line per paper milestone while a benchmark runs. */
class ProgressPrinter {
  private readonly bus: EventBus;
  private readonly fmt: Formatter;
  private readonly unsubs: Array<() => void> = [];
  private paperCount = 0;
  private paperStartedAt = new Map<string, number>();

  constructor(context: RunLifecycleContext, fmt: Formatter) {
    this.bus = context.bus;
    this.fmt = fmt;
  }

  attach(): void {
    this.unsubs.push(
      this.bus.subscribeSafe("benchmark.started", (payload) => this.onBenchmarkStarted(payload)),
      this.bus.subscribeSafe("paper.started", (payload) => this.onPaperStarted(payload)),
      this.bus.subscribeSafe("model.retry", (payload) => this.onRetry(payload)),
      this.bus.subscribeSafe("tool.completed", (payload) => this.onToolCompleted(payload)),
      this.bus.subscribeSafe("paper.completed", (payload) => this.onPaperCompleted(payload))
    );
  }

  detach(): void {
    this.unsubs.splice(0).forEach((unsubscribe) => unsubscribe());
  }

  private write(line: string): void {
    process.stdout.write(`${line}\n`);
  }

  private onBenchmarkStarted(payload: EventPayloadMap["benchmark.started"]): void {
    this.paperCount = payload.paper_count;
    this.write(this.fmt.header(`Benchmark ${payload.benchmark_id}`));
    this.write(
      `Model ${payload.model} | ${payload.paper_count} papers | max ${payload.max_iterations} iterations per paper`
    );
  }

  private onPaperStarted(payload: EventPayloadMap["paper.started"]): void {
    this.paperStartedAt.set(payload.run_id, Date.now());
    this.write(
      this.fmt.statusChip(
        `[${payload.paper.index + 1}/${this.paperCount}] ${payload.paper.name}`,
        "info",
        "started"
      )
    );
  }

  private onRetry(payload: EventPayloadMap["model.retry"]): void {
    this.write(
      this.fmt.warnBlock(`retry ${payload.attempt} (${payload.reason}) in ${formatDuration(payload.delay_ms)}`)
    );
  }

  private onToolCompleted(payload: EventPayloadMap["tool.completed"]): void {
    const detail = payload.ok ? `${payload.duration_ms}ms` : (payload.error_kind ?? "error");
    this.write(`    ${this.fmt.muted(`${payload.ok ? "·" : "x"} ${payload.name} ${detail}`)}`);
  }

  private onPaperCompleted(payload: EventPayloadMap["paper.completed"]): void {
    const record = payload.run_record;
    const startedAt = this.paperStartedAt.get(record.run_id);
    const elapsed = startedAt !== undefined ? ` in ${formatDuration(Date.now() - startedAt)}` : "";
    const score = record.evaluation
      ? `, score ${record.evaluation.total}/${record.evaluation.max_possible}`
      : "";
    this.write(
      this.fmt.statusChip(
        `[${record.paper.index + 1}/${this.paperCount}] ${record.paper.name}`,
        levelForStatus(record.status),
        `${record.status}${elapsed} (${record.iterations} iterations, ${record.tool_calls} tool calls${score})`
      )
    );
  }
}

export const createUiRunLifecycleHooks = (input?: { progress?: boolean }): RunLifecycleHooks => {
  let printer: ProgressPrinter | null = null;

  return {
    onRunSetup: (context): void => {
      if (!(input?.progress ?? true) || context.quiet) {
        return;
      }
      printer = new ProgressPrinter(context, createStdoutFormatter());
      printer.attach();
    },
    onRunFinally: (): void => {
      if (printer) {
        printer.detach();
        printer = null;
      }
    }
  };
};
