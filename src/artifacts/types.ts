export const RUN_STATUSES = ["pending", "completed", "failed", "incomplete"] as const;

export type RunStatus = (typeof RUN_STATUSES)[number];

export type TerminalState = "done" | "capped" | "fatal";

export type PaperRef = {
  name: string;
  path: string;
  index: number;
};

export type RunArtifacts = {
  model_xml: string | null;
  stdout_log: string | null;
  stderr_log: string | null;
  conversation_log: string | null;
  evaluation_json: string | null;
  evaluation_txt: string | null;
  png_files: string[];
  csv_files: string[];
};

export type EvaluationResult = {
  run_id: string;
  errors: {
    line_count: number;
    penalty: number;
    sample: string[];
  };
  model_graph: {
    present: boolean;
    points: number;
  };
  time_steps: {
    count: number;
    points: number;
  };
  stop_time: {
    configured: number | null;
    last_observed: number | null;
    matched: boolean;
    points: number;
  };
  results: {
    png_count: number;
    csv_count: number;
    points: number;
  };
  many_graphs: {
    threshold: number;
    points: number;
  };
  total: number;
  max_possible: number;
  percentage: number;
  evaluated_at: string;
};

export type RunError = {
  message: string;
  code: string;
};

export type RunRecord = {
  run_id: string;
  paper: PaperRef;
  status: RunStatus;
  terminal: TerminalState | null;
  run_dir: string;
  artifacts: RunArtifacts;
  iterations: number;
  tool_calls: number;
  started_at: string;
  completed_at: string | null;
  error?: RunError;
  evaluation?: EvaluationResult;
};

export type BenchmarkSummary = {
  schema_version: "1.0.0";
  benchmark_id: string;
  model: string;
  started_at: string;
  completed_at: string;
  duration_ms: number;
  paper_count: number;
  counts: Record<RunStatus, number>;
  totals: {
    png_files: number;
    csv_files: number;
    iterations: number;
    tool_calls: number;
  };
  scores: {
    count: number;
    mean: number | null;
    min: number | null;
    max: number | null;
    all: number[];
  };
  results: RunRecord[];
};
