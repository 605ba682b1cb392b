import type {
  BenchmarkSummary,
  PaperRef,
  RunRecord
} from "../artifacts/types.js";

export type BenchmarkStartedPayload = {
  benchmark_id: string;
  started_at: string;
  model: string;
  paper_count: number;
  max_iterations: number;
  output_dir: string;
};

export type BenchmarkCompletedPayload = {
  summary: BenchmarkSummary;
};

export type BenchmarkFailedPayload = {
  benchmark_id: string;
  completed_at: string;
  error: string;
};

export type PaperStartedPayload = {
  benchmark_id: string;
  run_id: string;
  paper: PaperRef;
  run_dir: string;
};

export type PaperCompletedPayload = {
  run_record: RunRecord;
};

export type ModelRequestedPayload = {
  run_id: string;
  iteration: number;
  turn_count: number;
};

export type ModelRetryPayload = {
  run_id: string;
  attempt: number;
  delay_ms: number;
  status?: number;
  reason: string;
};

export type ModelRespondedPayload = {
  run_id: string;
  iteration: number;
  tool_calls: number;
  text_chars: number;
  sentinel: boolean;
};

export type ConversationTruncatedPayload = {
  run_id: string;
  turns_before: number;
  turns_after: number;
  elided_total: number;
};

export type ToolCalledPayload = {
  run_id: string;
  iteration: number;
  call_id: string;
  name: string;
};

export type ToolCompletedPayload = {
  run_id: string;
  call_id: string;
  name: string;
  ok: boolean;
  error_kind?: string;
  duration_ms: number;
};

export type ArtifactWrittenPayload = {
  path: string;
  kind: string;
};

export type WarningRaisedPayload = {
  message: string;
  source?: string;
  recorded_at: string;
};

export type Event =
  | { type: "benchmark.started"; payload: BenchmarkStartedPayload }
  | { type: "benchmark.completed"; payload: BenchmarkCompletedPayload }
  | { type: "benchmark.failed"; payload: BenchmarkFailedPayload }
  | { type: "paper.started"; payload: PaperStartedPayload }
  | { type: "paper.completed"; payload: PaperCompletedPayload }
  | { type: "model.requested"; payload: ModelRequestedPayload }
  | { type: "model.retry"; payload: ModelRetryPayload }
  | { type: "model.responded"; payload: ModelRespondedPayload }
  | { type: "conversation.truncated"; payload: ConversationTruncatedPayload }
  | { type: "tool.called"; payload: ToolCalledPayload }
  | { type: "tool.completed"; payload: ToolCompletedPayload }
  | { type: "artifact.written"; payload: ArtifactWrittenPayload }
  | { type: "warning.raised"; payload: WarningRaisedPayload };

export type EventType = Event["type"];

export type EventPayloadMap = {
  [K in EventType]: Extract<Event, { type: K }>["payload"];
};
