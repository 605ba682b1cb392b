import { copyFileSync, existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";

import { resolveConfig, type ConfigOverrides } from "../config/resolve-config.js";
import { DEFAULT_CONFIG_PATH } from "../config/defaults.js";
import { readRunMetadata } from "../artifacts/run-metadata.js";
import { FileReferenceStore } from "../collaborators/reference-store.js";
import { discoverPapers } from "../engine/papers.js";
import { evaluateRunDir } from "../evaluation/scoring.js";
import { formatEvaluationText, writeEvaluation } from "../evaluation/evaluation-writer.js";
import { createUiRunLifecycleHooks } from "../ui/run-lifecycle-hooks.js";
import { runBenchmarkService, writeReceipt } from "../run/run-service.js";
import { formatVerifyReport, verifyBenchmarkDir } from "../tools/verify-run.js";
import { buildReportModel, formatReportJson, formatReportText } from "../tools/report-run.js";
import { resolveAssetPath } from "../utils/asset-root.js";

export type ParsedArgs = {
  positional: string[];
  flags: Record<string, string | boolean>;
};

export const parseArgs = (args: readonly string[]): ParsedArgs => {
  const positional: string[] = [];
  const flags: Record<string, string | boolean> = {};
  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (arg === undefined) {
      continue;
    }
    if (arg.startsWith("--")) {
      const next = args[i + 1];
      if (next !== undefined && !next.startsWith("--")) {
        flags[arg] = next;
        i += 1;
      } else {
        flags[arg] = true;
      }
    } else {
      positional.push(arg);
    }
  }
  return { positional, flags };
};

export const getFlag = (flags: ParsedArgs["flags"], name: string): string | undefined => {
  const value = flags[name];
  return typeof value === "string" ? value : undefined;
};

export const hasFlag = (flags: ParsedArgs["flags"], name: string): boolean => Boolean(flags[name]);

export const getFlagNumber = (flags: ParsedArgs["flags"], name: string): number | undefined => {
  const value = getFlag(flags, name);
  if (!value) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid ${name} value: ${value}`);
  }
  return parsed;
};

export const overridesFromFlags = (flags: ParsedArgs["flags"]): ConfigOverrides => {
  const paperList = getFlag(flags, "--papers");
  const maxPapers = getFlagNumber(flags, "--max-papers");
  const maxIterations = getFlagNumber(flags, "--max-iterations");
  return {
    ...(getFlag(flags, "--papers-dir") ? { papersDir: getFlag(flags, "--papers-dir") } : {}),
    ...(paperList
      ? {
          paperFiles: paperList
            .split(",")
            .map((entry) => entry.trim())
            .filter((entry) => entry.length > 0)
        }
      : {}),
    ...(maxPapers !== undefined ? { maxPapers: Math.max(1, Math.floor(maxPapers)) } : {}),
    ...(getFlag(flags, "--model") ? { model: getFlag(flags, "--model") } : {}),
    ...(maxIterations !== undefined ? { maxIterations: Math.max(1, Math.floor(maxIterations)) } : {}),
    ...(getFlag(flags, "--out") ? { outputRoot: getFlag(flags, "--out") } : {}),
    ...(getFlag(flags, "--simulator") ? { simulatorBin: getFlag(flags, "--simulator") } : {})
  };
};

const configPathFrom = (parsed: ParsedArgs): string | undefined =>
  getFlag(parsed.flags, "--config") ?? parsed.positional[0];

const printWarnings = (warnings: readonly string[]): void => {
  if (warnings.length > 0) {
    console.warn("Warnings:");
    warnings.forEach((warning) => console.warn(`- ${warning}`));
  }
};

export const runInit = (parsed: ParsedArgs): void => {
  const outPath = getFlag(parsed.flags, "--out") ?? DEFAULT_CONFIG_PATH;
  const force = hasFlag(parsed.flags, "--force");
  const templatePath = resolveAssetPath("templates", "default.config.json");

  const targetPath = resolve(process.cwd(), outPath);
  if (existsSync(targetPath) && !force) {
    throw new Error(`Config already exists at ${targetPath}. Use --force to overwrite.`);
  }
  copyFileSync(templatePath, targetPath);

  console.log(`Created config: ${targetPath}`);
  console.log("Next steps:");
  console.log("  1) Put paper PDFs under papers/ and reference models under references/<category>/");
  console.log("  2) Set OPENROUTER_API_KEY (recommend .env)");
  console.log("  3) morpheus-bench validate");
  console.log("  4) morpheus-bench run");
  console.log("Results will be written under runs/<benchmark_id>/.");
};

export const runValidate = (parsed: ParsedArgs): void => {
  const result = resolveConfig({
    configPath: configPathFrom(parsed),
    overrides: overridesFromFlags(parsed.flags)
  });
  const { config, configRoot, apiKey } = result.settings;

  const papers = discoverPapers(config, configRoot);
  const references = new FileReferenceStore(resolve(configRoot, config.references.root), config.references.categories);
  const listing = references.list();
  const referenceCount = Object.values(listing).reduce((sum, names) => sum + names.length, 0);

  printWarnings(result.warnings);
  console.log(`Config OK: ${result.configPath ?? "(defaults)"}`);
  console.log(`  Model: ${config.model.name}`);
  console.log(`  Papers: ${papers.length} selected from ${resolve(configRoot, config.papers.dir)}`);
  console.log(`  References: ${referenceCount} across ${Object.keys(listing).length} categories`);
  console.log(`  Simulator: ${config.simulator.bin}`);
  console.log(`  OPENROUTER_API_KEY: ${apiKey ? "set" : "missing"}`);
  if (papers.length === 0) {
    process.exitCode = 1;
  }
};

export const runReferences = (parsed: ParsedArgs): void => {
  const result = resolveConfig({ configPath: getFlag(parsed.flags, "--config") });
  const { config, configRoot } = result.settings;
  const store = new FileReferenceStore(resolve(configRoot, config.references.root), config.references.categories);
  const listing = store.list(parsed.positional[0]);
  for (const [category, names] of Object.entries(listing)) {
    console.log(`${category} (${names.length})`);
    names.forEach((name) => console.log(`  ${name}`));
  }
};

export const runBenchmarkCommand = async (parsed: ParsedArgs): Promise<void> => {
  const quiet = hasFlag(parsed.flags, "--quiet");
  const result = await runBenchmarkService({
    configPath: configPathFrom(parsed),
    overrides: overridesFromFlags(parsed.flags),
    quiet,
    receiptMode: quiet ? "writeOnly" : "auto",
    hooks: createUiRunLifecycleHooks({ progress: !quiet })
  });

  const { counts } = result.summary;
  if (counts.completed !== result.summary.paper_count) {
    process.exitCode = 1;
  }
  console.log(`Benchmark directory: ${result.benchmarkDir}`);
  console.log("Next steps:");
  console.log(`  morpheus-bench report ${result.benchmarkDir}`);
  console.log(`  morpheus-bench verify ${result.benchmarkDir}`);
};

export const runEvaluate = (parsed: ParsedArgs): void => {
  const runDir = parsed.positional[0];
  if (!runDir) {
    throw new Error("Usage: morpheus-bench evaluate <paper_run_dir>");
  }
  const result = resolveConfig({ configPath: getFlag(parsed.flags, "--config") });
  const metadata = readRunMetadata(runDir);
  const runId = typeof metadata.run_id === "string" ? metadata.run_id : "unknown";
  const evaluation = evaluateRunDir({ runId, runDir: resolve(runDir), rubric: result.settings.config.scoring });
  if (hasFlag(parsed.flags, "--write")) {
    const paths = writeEvaluation(resolve(runDir), evaluation);
    console.log(`Wrote ${paths.jsonPath}`);
  }
  process.stdout.write(formatEvaluationText(evaluation));
};

export const runVerify = (parsed: ParsedArgs): void => {
  const benchmarkDir = parsed.positional[0];
  if (!benchmarkDir) {
    throw new Error("Usage: morpheus-bench verify <benchmark_dir>");
  }
  const report = verifyBenchmarkDir(benchmarkDir);
  console.log(formatVerifyReport(report));
  if (!report.ok) {
    process.exitCode = 1;
  }
};

export const runReport = (parsed: ParsedArgs): void => {
  const benchmarkDir = parsed.positional[0];
  if (!benchmarkDir) {
    throw new Error("Usage: morpheus-bench report <benchmark_dir>");
  }
  const format = getFlag(parsed.flags, "--format") ?? "text";
  const top = getFlagNumber(parsed.flags, "--top") ?? 3;
  const model = buildReportModel(benchmarkDir, top);

  if (format === "json") {
    process.stdout.write(formatReportJson(model));
    return;
  }
  if (format !== "text") {
    throw new Error("Invalid --format (expected text|json)");
  }
  process.stdout.write(formatReportText(model));
};

export const runReceipt = async (parsed: ParsedArgs): Promise<void> => {
  const benchmarkDir = parsed.positional[0];
  if (!benchmarkDir) {
    throw new Error("Usage: morpheus-bench receipt <benchmark_dir>");
  }
  await writeReceipt({
    benchmarkDir,
    mode: "auto",
    useInk: Boolean(process.stdout.isTTY)
  });
};

export const readPackageVersion = (): string => {
  const raw: unknown = JSON.parse(readFileSync(resolveAssetPath("package.json"), "utf8"));
  if (typeof raw === "object" && raw !== null && "version" in raw && typeof raw.version === "string") {
    return raw.version;
  }
  return "0.0.0";
};
