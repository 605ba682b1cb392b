import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";

import { formatAjvErrors, validateConfig } from "./schema-validation.js";
import { DEFAULT_CONFIG, DEFAULT_CONFIG_PATH } from "./defaults.js";
import type { BenchConfig, BenchConfigInput, RuntimeSettings } from "./types.js";
import { resolveAssetPath } from "../utils/asset-root.js";

export interface ConfigOverrides {
  papersDir?: string;
  paperFiles?: string[];
  maxPapers?: number;
  model?: string;
  maxIterations?: number;
  outputRoot?: string;
  simulatorBin?: string;
}

export interface ResolveConfigOptions {
  configPath?: string;
  rootDir?: string;
  overrides?: ConfigOverrides;
  env?: NodeJS.ProcessEnv;
}

export interface ResolveConfigResult {
  settings: RuntimeSettings;
  configPath: string | null;
  warnings: string[];
}

const readJsonFile = (path: string): unknown => {
  const raw = readFileSync(path, "utf8");
  try {
    return JSON.parse(raw) as unknown;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Config file is not valid JSON (${path}): ${message}`);
  }
};

export const loadConfigInput = (path: string): BenchConfigInput => {
  const parsed = readJsonFile(path);
  if (!validateConfig(parsed)) {
    const formatted = formatAjvErrors("config", validateConfig.errors);
    throw new Error(formatted.length > 0 ? formatted.join("\n") : "config is invalid");
  }
  return parsed;
};

export const mergeConfig = (input: BenchConfigInput): BenchConfig => ({
  schema_version: DEFAULT_CONFIG.schema_version,
  papers: { ...DEFAULT_CONFIG.papers, ...input.papers },
  model: { ...DEFAULT_CONFIG.model, ...input.model },
  retry: { ...DEFAULT_CONFIG.retry, ...input.retry },
  loop: { ...DEFAULT_CONFIG.loop, ...input.loop },
  truncation: { ...DEFAULT_CONFIG.truncation, ...input.truncation },
  simulator: { ...DEFAULT_CONFIG.simulator, ...input.simulator },
  references: {
    ...DEFAULT_CONFIG.references,
    ...input.references,
    categories: [...(input.references?.categories ?? DEFAULT_CONFIG.references.categories)]
  },
  output: { ...DEFAULT_CONFIG.output, ...input.output },
  execution: { ...DEFAULT_CONFIG.execution, ...input.execution },
  prompts: { ...DEFAULT_CONFIG.prompts, ...input.prompts },
  scoring: {
    ...DEFAULT_CONFIG.scoring,
    ...input.scoring,
    time_step_tiers: [...(input.scoring?.time_step_tiers ?? DEFAULT_CONFIG.scoring.time_step_tiers)]
      .map((tier) => ({ ...tier }))
      .sort((a, b) => a.min_lines - b.min_lines)
  },
  ...(input.tools ? { tools: { ...input.tools } } : {})
});

export const applyOverrides = (config: BenchConfig, overrides: ConfigOverrides): BenchConfig => {
  const next: BenchConfig = {
    ...config,
    papers: { ...config.papers },
    model: { ...config.model },
    loop: { ...config.loop },
    output: { ...config.output },
    simulator: { ...config.simulator }
  };
  if (overrides.papersDir !== undefined) {
    next.papers.dir = overrides.papersDir;
  }
  if (overrides.paperFiles !== undefined && overrides.paperFiles.length > 0) {
    next.papers.files = [...overrides.paperFiles];
  }
  if (overrides.maxPapers !== undefined) {
    next.papers.max_papers = overrides.maxPapers;
  }
  if (overrides.model !== undefined) {
    next.model.name = overrides.model;
  }
  if (overrides.maxIterations !== undefined) {
    next.loop.max_iterations = overrides.maxIterations;
  }
  if (overrides.outputRoot !== undefined) {
    next.output.root = overrides.outputRoot;
  }
  if (overrides.simulatorBin !== undefined) {
    next.simulator.bin = overrides.simulatorBin;
  }
  return next;
};

/**
 * Checks constraints that span several fields and cannot be expressed in the
 * JSON schema.
 */
export const checkConfigConsistency = (config: BenchConfig): string[] => {
  const errors: string[] = [];
  if (config.truncation.keep_recent + 2 > config.truncation.max_turns) {
    errors.push(
      `truncation.keep_recent (${config.truncation.keep_recent}) must be at most truncation.max_turns - 2 (${config.truncation.max_turns - 2})`
    );
  }
  if (config.retry.max_backoff_ms < config.retry.backoff_ms) {
    errors.push("retry.max_backoff_ms must be >= retry.backoff_ms");
  }
  if (!Number.isInteger(config.papers.max_papers) || config.papers.max_papers < 1) {
    errors.push("papers.max_papers must be a positive integer");
  }
  if (!Number.isInteger(config.loop.max_iterations) || config.loop.max_iterations < 1) {
    errors.push("loop.max_iterations must be a positive integer");
  }
  return errors;
};

const readSystemPrompt = (rootDir: string, promptPath: string, warnings: string[]): string => {
  const local = resolve(rootDir, promptPath);
  if (existsSync(local)) {
    return readFileSync(local, "utf8");
  }
  warnings.push(`System prompt not found at ${local}; using the bundled prompt`);
  return readFileSync(resolveAssetPath("prompts", "system-prompt.md"), "utf8");
};

export const resolveConfig = (options: ResolveConfigOptions = {}): ResolveConfigResult => {
  const rootDir = options.rootDir ?? process.cwd();
  const env = options.env ?? process.env;
  const warnings: string[] = [];

  const candidate = resolve(rootDir, options.configPath ?? DEFAULT_CONFIG_PATH);
  let configPath: string | null = null;
  let input: BenchConfigInput = {};
  if (existsSync(candidate)) {
    input = loadConfigInput(candidate);
    configPath = candidate;
  } else if (options.configPath) {
    throw new Error(`Config file not found: ${candidate}`);
  } else {
    warnings.push(`No ${DEFAULT_CONFIG_PATH} in ${rootDir}; using defaults`);
  }

  const config = applyOverrides(mergeConfig(input), options.overrides ?? {});
  const errors = checkConfigConsistency(config);
  if (errors.length > 0) {
    throw new Error(errors.join("\n"));
  }

  const apiKey = env.OPENROUTER_API_KEY?.trim();

  return {
    settings: {
      config,
      configRoot: rootDir,
      apiKey: apiKey ? apiKey : undefined,
      systemPrompt: readSystemPrompt(rootDir, config.prompts.system_prompt_path, warnings)
    },
    configPath,
    warnings
  };
};
