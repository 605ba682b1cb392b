import type { RetryJitter } from "../openrouter/client.js";

export type { RetryJitter };

export type TimeStepTier = {
  min_lines: number;
  points: number;
};

export type ScoringRubric = {
  error_penalty_per_line: number;
  model_graph_points: number;
  time_step_tiers: TimeStepTier[];
  stop_time_points: number;
  stop_time_tolerance: number;
  results_points: number;
  many_graphs_threshold: number;
  many_graphs_points: number;
};

export type BenchConfig = {
  schema_version: "1.0.0";
  papers: {
    dir: string;
    files?: string[];
    max_papers: number;
  };
  model: {
    name: string;
    base_url?: string;
    max_tokens: number;
    temperature?: number;
    requests_per_second: number | null;
  };
  retry: {
    max_retries: number;
    backoff_ms: number;
    max_backoff_ms: number;
    jitter: RetryJitter;
  };
  loop: {
    max_iterations: number;
    sentinel: string;
    turn_delay_ms: number;
    request_timeout_ms: number;
  };
  truncation: {
    max_turns: number;
    keep_recent: number;
    max_estimated_tokens: number;
  };
  simulator: {
    bin: string;
    timeout_ms: number;
    max_output_chars: number;
  };
  references: {
    root: string;
    categories: string[];
    default_max_chars: number;
  };
  output: {
    root: string;
  };
  execution: {
    paper_delay_ms: number;
  };
  prompts: {
    system_prompt_path: string;
  };
  scoring: ScoringRubric;
  tools?: {
    enabled?: string[];
  };
};

type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends Array<infer U>
    ? U[]
    : T[K] extends object | null
      ? DeepPartial<T[K]> | Extract<T[K], null>
      : T[K];
};

/**
 * Shape of a config file on disk. Every section is optional and falls back
 * to the defaults in `defaults.ts`.
 */
export type BenchConfigInput = DeepPartial<BenchConfig> & {
  _readme?: string;
};

/**
 * Everything a benchmark needs at run time: the resolved file config plus
 * values that come from the environment or the command line.
 */
export type RuntimeSettings = {
  config: BenchConfig;
  configRoot: string;
  apiKey?: string;
  systemPrompt: string;
};
