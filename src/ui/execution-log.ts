import { createWriteStream } from "node:fs";

import type { EventBus } from "../events/event-bus.js";
import type { EventPayloadMap, EventType } from "../events/types.js";

/** Appends one timestamped line per notable event to the benchmark's execution.log. */
export class ExecutionLogger {
  private stream: ReturnType<typeof createWriteStream> | null;
  private unsubs: Array<() => void> = [];

  constructor(logPath: string) {
    this.stream = createWriteStream(logPath, { flags: "a" });
  }

  private append(line: string): void {
    if (!this.stream) {
      return;
    }
    this.stream.write(`${new Date().toISOString()} ${line}\n`);
  }

  private on<T extends EventType>(bus: EventBus, type: T, handler: (payload: EventPayloadMap[T]) => void): void {
    this.unsubs.push(
      bus.subscribeSafe(type, handler, (error) => {
        const message = error instanceof Error ? error.message : String(error);
        this.append(`Execution log subscriber error (${type}): ${message}`);
      })
    );
  }

  attach(bus: EventBus): void {
    this.on(bus, "benchmark.started", (payload) => {
      this.append(`Benchmark started: ${payload.benchmark_id}`);
      this.append(
        `Model: ${payload.model} | papers ${payload.paper_count} | max iterations ${payload.max_iterations}`
      );
      this.append(`Output: ${payload.output_dir}`);
    });

    this.on(bus, "paper.started", (payload) => {
      this.append(`Paper ${payload.paper.index + 1} started: ${payload.paper.name} (${payload.run_id})`);
    });

    this.on(bus, "model.retry", (payload) => {
      const status = payload.status !== undefined ? ` status ${payload.status}` : "";
      this.append(
        `Retry ${payload.attempt} for ${payload.run_id}:${status} ${payload.reason}, waiting ${payload.delay_ms}ms`
      );
    });

    this.on(bus, "conversation.truncated", (payload) => {
      this.append(
        `Conversation truncated for ${payload.run_id}: ${payload.turns_before} -> ${payload.turns_after} turns (${payload.elided_total} elided)`
      );
    });

    this.on(bus, "tool.completed", (payload) => {
      if (!payload.ok) {
        this.append(`Tool ${payload.name} failed for ${payload.run_id}: ${payload.error_kind ?? "error"}`);
      }
    });

    this.on(bus, "paper.completed", (payload) => {
      const record = payload.run_record;
      const score = record.evaluation
        ? ` | score ${record.evaluation.total}/${record.evaluation.max_possible}`
        : "";
      const error = record.error ? ` | ${record.error.code}: ${record.error.message}` : "";
      this.append(
        `Paper ${record.paper.index + 1} ${record.status}: ${record.paper.name} | iterations ${record.iterations} | tool calls ${record.tool_calls}${score}${error}`
      );
    });

    this.on(bus, "benchmark.completed", (payload) => {
      const { counts } = payload.summary;
      this.append(
        `Benchmark completed: ${payload.summary.benchmark_id} (completed ${counts.completed}, incomplete ${counts.incomplete}, failed ${counts.failed}, pending ${counts.pending})`
      );
    });

    this.on(bus, "benchmark.failed", (payload) => {
      this.append(`Benchmark failed: ${payload.benchmark_id} (${payload.error})`);
    });

    this.on(bus, "warning.raised", (payload) => {
      this.append(`Warning${payload.source ? ` [${payload.source}]` : ""}: ${payload.message}`);
    });
  }

  async close(): Promise<void> {
    if (!this.stream) {
      return;
    }
    await new Promise<void>((resolve, reject) => {
      this.stream?.end(() => resolve());
      this.stream?.on("error", (error) => reject(error));
    });
    this.stream = null;
  }

  detach(): void {
    this.unsubs.forEach((unsubscribe) => unsubscribe());
    this.unsubs = [];
  }
}
