import type { BenchConfig, ScoringRubric } from "./types.js";

export const DEFAULT_CONFIG_PATH = "morpheus-bench.config.json";
export const DEFAULT_SENTINEL = "PAPER_COMPLETE";
export const DEFAULT_REFERENCE_CATEGORIES = ["CPM", "PDE", "ODE", "Multiscale", "Miscellaneous"];

export const DEFAULT_SCORING_RUBRIC: ScoringRubric = {
  error_penalty_per_line: 1,
  model_graph_points: 1,
  time_step_tiers: [
    { min_lines: 1, points: 1 },
    { min_lines: 11, points: 2 },
    { min_lines: 51, points: 3 }
  ],
  stop_time_points: 1,
  stop_time_tolerance: 1,
  results_points: 1,
  many_graphs_threshold: 10,
  many_graphs_points: 1
};

export const DEFAULT_CONFIG: BenchConfig = {
  schema_version: "1.0.0",
  papers: {
    dir: "papers",
    max_papers: 10
  },
  model: {
    name: "anthropic/claude-sonnet-4.5",
    max_tokens: 8192,
    requests_per_second: 1
  },
  retry: {
    max_retries: 4,
    backoff_ms: 5_000,
    max_backoff_ms: 90_000,
    jitter: "equal"
  },
  loop: {
    max_iterations: 25,
    sentinel: DEFAULT_SENTINEL,
    turn_delay_ms: 0,
    request_timeout_ms: 300_000
  },
  truncation: {
    max_turns: 8,
    keep_recent: 6,
    max_estimated_tokens: 120_000
  },
  simulator: {
    bin: "morpheus",
    timeout_ms: 600_000,
    max_output_chars: 20_000
  },
  references: {
    root: "references",
    categories: DEFAULT_REFERENCE_CATEGORIES,
    default_max_chars: 8_000
  },
  output: {
    root: "runs"
  },
  execution: {
    paper_delay_ms: 0
  },
  prompts: {
    system_prompt_path: "prompts/system-prompt.md"
  },
  scoring: DEFAULT_SCORING_RUBRIC
};
