import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { describe, expect, it } from "vitest";

import { DEFAULT_CONFIG, DEFAULT_CONFIG_PATH } from "../defaults.js";
import { checkConfigConsistency, mergeConfig, resolveConfig } from "../resolve-config.js";
import { makeTempDir } from "../../engine/__tests__/fakes.js";

const writeConfig = (dir: string, content: unknown, name = DEFAULT_CONFIG_PATH): string => {
  const path = join(dir, name);
  writeFileSync(path, typeof content === "string" ? content : JSON.stringify(content));
  return path;
};

describe("resolveConfig", () => {
  it("uses defaults when no config file exists", () => {
    const rootDir = makeTempDir("config-none");
    const result = resolveConfig({ rootDir, env: {} });

    expect(result.configPath).toBeNull();
    expect(result.settings.config).toEqual(DEFAULT_CONFIG);
    expect(result.settings.apiKey).toBeUndefined();
    expect(result.warnings[0]).toBe(`No ${DEFAULT_CONFIG_PATH} in ${rootDir}; using defaults`);
  });

  it("merges the file over the defaults and reads the key from the environment", () => {
    const rootDir = makeTempDir("config-file");
    const path = writeConfig(rootDir, { loop: { max_iterations: 3 }, papers: { dir: "pdfs" } });
    const result = resolveConfig({ rootDir, env: { OPENROUTER_API_KEY: " test-secret " } });

    expect(result.configPath).toBe(path);
    expect(result.settings.config.loop).toEqual({ ...DEFAULT_CONFIG.loop, max_iterations: 3 });
    expect(result.settings.config.papers).toEqual({ dir: "pdfs", max_papers: 10 });
    expect(result.settings.apiKey).toBe("test-secret");
  });

  it("prefers command-line overrides", () => {
    const rootDir = makeTempDir("config-overrides");
    writeConfig(rootDir, { model: { name: "file/model" } });
    const result = resolveConfig({
      rootDir,
      env: {},
      overrides: { model: "flag/model", maxIterations: 7, paperFiles: ["x.pdf"], outputRoot: "out" }
    });

    expect(result.settings.config.model.name).toBe("flag/model");
    expect(result.settings.config.loop.max_iterations).toBe(7);
    expect(result.settings.config.papers.files).toEqual(["x.pdf"]);
    expect(result.settings.config.output.root).toBe("out");
  });

  it("loads the system prompt next to the config, falling back to the bundled one", () => {
    const rootDir = makeTempDir("config-prompt");
    mkdirSync(join(rootDir, "prompts"));
    writeFileSync(join(rootDir, "prompts", "system-prompt.md"), "local prompt");
    expect(resolveConfig({ rootDir, env: {} }).settings.systemPrompt).toBe("local prompt");

    const bare = makeTempDir("config-prompt-bundled");
    const result = resolveConfig({ rootDir: bare, env: {} });
    expect(result.settings.systemPrompt).toContain("MorpheusML");
    expect(result.warnings).toContain(
      `System prompt not found at ${join(bare, "prompts", "system-prompt.md")}; using the bundled prompt`
    );
  });

  it("rejects files that do not match the schema", () => {
    const rootDir = makeTempDir("config-invalid");
    writeConfig(rootDir, { loop: { max_iterations: 0 }, unknown_section: {} });
    expect(() => resolveConfig({ rootDir, env: {} })).toThrow(/config\/loop\/max_iterations: must be >= 1/);
  });

  it("rejects files that are not JSON", () => {
    const rootDir = makeTempDir("config-json");
    writeConfig(rootDir, "{ loop: ");
    expect(() => resolveConfig({ rootDir, env: {} })).toThrow(/Config file is not valid JSON/);
  });

  it("fails when an explicit config path is missing", () => {
    const rootDir = makeTempDir("config-missing");
    expect(() => resolveConfig({ rootDir, configPath: "other.json", env: {} })).toThrow(
      `Config file not found: ${join(rootDir, "other.json")}`
    );
  });
});

describe("checkConfigConsistency", () => {
  it("requires room for the first turn and the elision marker", () => {
    const config = mergeConfig({ truncation: { max_turns: 8, keep_recent: 7 } });
    expect(checkConfigConsistency(config)).toEqual([
      "truncation.keep_recent (7) must be at most truncation.max_turns - 2 (6)"
    ]);
  });

  it("sorts scoring tiers by threshold", () => {
    const config = mergeConfig({
      scoring: {
        time_step_tiers: [
          { min_lines: 20, points: 2 },
          { min_lines: 1, points: 1 }
        ]
      }
    });
    expect(config.scoring.time_step_tiers.map((tier) => tier.min_lines)).toEqual([1, 20]);
  });
});
