import { copyFileSync, existsSync, readFileSync } from "node:fs";
import { basename, join } from "node:path";

import { defineTool } from "../registry.js";
import { CollaboratorFailure, InvalidArguments, errorMessage } from "../../core/errors.js";
import { clipHead, clipTail } from "../../core/text.js";
import { writeJsonAtomic, writeTextAtomic, readTextIfExists } from "../../artifacts/io.js";
import { listRunOutputs } from "../../artifacts/outputs.js";
import {
  RUN_FILES,
  readSimulationRecord,
  resolveInsideRun
} from "../../artifacts/run-files.js";
import type { SimulationRecord } from "../../artifacts/run-files.js";
import { mergeRunMetadata } from "../../artifacts/run-metadata.js";
import {
  checkXmlCompleteness,
  getAnalysisTemplate,
  hasGnuplotter
} from "../../model/xml-checks.js";

type RunSimulationArgs = {
  xml_path?: string;
};

export const runSimulationTool = defineTool<RunSimulationArgs>({
  name: "run_simulation",
  description:
    "Run the Morpheus simulator on the saved model (model.xml by default) and report logs and output files.",
  parameters: {
    type: "object",
    additionalProperties: false,
    properties: {
      xml_path: { type: "string", minLength: 1, description: "Model file inside the run directory" }
    }
  },
  handler: async (args, context) => {
    const { runDir, config } = context;
    const source = resolveInsideRun(runDir, args.xml_path ?? RUN_FILES.modelXml);
    if (!source) {
      throw new InvalidArguments(`xml_path must point inside the run directory: ${args.xml_path ?? ""}`);
    }
    if (!existsSync(source)) {
      throw new CollaboratorFailure("simulator", `Model file not found: ${basename(source)}`, {
        hint: "Save the model with save_model_xml first"
      });
    }

    const xml = readFileSync(source, "utf8");
    if (!hasGnuplotter(xml)) {
      throw new InvalidArguments("Model has no <Gnuplotter>; it would not generate any graphs", [
        "add the <Analysis> block from get_analysis_template and save the model again"
      ]);
    }

    const modelPath = join(runDir, RUN_FILES.modelXml);
    if (source !== modelPath) {
      copyFileSync(source, modelPath);
    }

    const stdoutPath = join(runDir, RUN_FILES.stdout);
    const stderrPath = join(runDir, RUN_FILES.stderr);
    const command = [config.simulator.bin, "--file", RUN_FILES.modelXml, "--outdir", runDir, "--model-graph", "dot"];

    const record = (outcome: Omit<SimulationRecord, "command" | "finished_at">): SimulationRecord => {
      const full = { ...outcome, command, finished_at: new Date().toISOString() };
      writeJsonAtomic(join(runDir, RUN_FILES.simulation), full);
      return full;
    };

    const outcome = await context.simulator
      .run({
        modelPath: RUN_FILES.modelXml,
        workDir: runDir,
        timeoutMs: config.simulator.timeout_ms
      })
      .catch((error: unknown) => {
        writeTextAtomic(stderrPath, errorMessage(error));
        record({ exit_code: null, timed_out: false, duration_ms: 0 });
        throw error;
      });

    writeTextAtomic(stdoutPath, outcome.stdout);
    writeTextAtomic(stderrPath, outcome.stderr);
    record({ exit_code: outcome.exitCode, timed_out: outcome.timedOut, duration_ms: outcome.durationMs });

    const outputs = listRunOutputs(runDir);
    const maxChars = config.simulator.max_output_chars;
    const report = {
      exit_code: outcome.exitCode,
      timed_out: outcome.timedOut,
      duration_ms: outcome.durationMs,
      stdout_log: stdoutPath,
      stderr_log: stderrPath,
      stdout: clipTail(outcome.stdout, maxChars),
      stderr: clipTail(outcome.stderr, maxChars),
      outputs,
      png_count: outputs.png.length,
      csv_count: outputs.csv.length
    };

    mergeRunMetadata(runDir, {
      last_simulation: {
        exit_code: outcome.exitCode,
        timed_out: outcome.timedOut,
        png_count: outputs.png.length,
        csv_count: outputs.csv.length
      }
    });

    if (outcome.timedOut || outcome.exitCode !== 0) {
      const reason = outcome.timedOut
        ? `Simulation timed out after ${config.simulator.timeout_ms}ms`
        : `Simulation exited with code ${String(outcome.exitCode)}`;
      throw new CollaboratorFailure("simulator", reason, report);
    }

    return {
      ...report,
      graphs_generated: outputs.png.length > 0,
      ...(outputs.png.length > 0
        ? {}
        : { warning: "No PNG graphs were generated; check the <Gnuplotter> section." })
    };
  }
});

export const inspectFailureTool = defineTool<Record<string, never>>({
  name: "inspect_failure",
  description:
    "Collect what is needed to repair a failed run: the saved model, simulator logs, " +
    "a completeness check of the model and the analysis template when sections are missing.",
  parameters: {
    type: "object",
    additionalProperties: false,
    properties: {}
  },
  handler: async (_args, context) => {
    const { runDir, config } = context;
    const maxChars = config.simulator.max_output_chars;
    const xml = readTextIfExists(join(runDir, RUN_FILES.modelXml));
    if (xml === null) {
      return {
        has_model: false,
        hint: "No model.xml yet: write one with save_model_xml."
      };
    }

    const check = checkXmlCompleteness(xml);
    const needsTemplate = !check.sections.Analysis || !check.sections.Gnuplotter;
    return {
      has_model: true,
      model_xml: clipHead(xml, maxChars),
      last_simulation: readSimulationRecord(runDir),
      stdout: clipTail(readTextIfExists(join(runDir, RUN_FILES.stdout)) ?? "", maxChars),
      stderr: clipTail(readTextIfExists(join(runDir, RUN_FILES.stderr)) ?? "", maxChars),
      model_errors: clipTail(readTextIfExists(join(runDir, RUN_FILES.modelErrors)) ?? "", maxChars),
      validation: {
        valid: check.valid,
        errors: check.errors,
        warnings: check.warnings,
        sections_found: check.sections
      },
      ...(needsTemplate ? { analysis_template: getAnalysisTemplate() } : {})
    };
  }
});
