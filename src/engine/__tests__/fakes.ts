import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { DEFAULT_CONFIG } from "../../config/defaults.js";
import type { BenchConfig } from "../../config/types.js";
import type { PaperRef } from "../../artifacts/types.js";
import type { ReferenceDocument, ReferenceStore } from "../../collaborators/reference-store.js";
import type { SimulationOutcome, SimulationRequest, Simulator } from "../../collaborators/simulator.js";
import type { ExtractedText, TextExtractor } from "../../collaborators/text-extractor.js";
import type { ToolCallRequest } from "../../conversation/types.js";
import type { ToolContext } from "../../dispatch/types.js";
import type { ModelClient, ModelReply, ModelRequest } from "../model-client.js";
import type { Collaborators } from "../paper-runner.js";

export const makeTempDir = (prefix: string): string => mkdtempSync(join(tmpdir(), `${prefix}-`));

export const testConfig = (patch: { maxIterations?: number; maxTurns?: number; keepRecent?: number } = {}): BenchConfig => ({
  ...DEFAULT_CONFIG,
  model: { ...DEFAULT_CONFIG.model, name: "test/model", requests_per_second: null },
  loop: {
    ...DEFAULT_CONFIG.loop,
    max_iterations: patch.maxIterations ?? DEFAULT_CONFIG.loop.max_iterations
  },
  truncation: {
    ...DEFAULT_CONFIG.truncation,
    max_turns: patch.maxTurns ?? DEFAULT_CONFIG.truncation.max_turns,
    keep_recent: patch.keepRecent ?? DEFAULT_CONFIG.truncation.keep_recent
  }
});

export const reply = (text: string, toolCalls: ToolCallRequest[] = []): ModelReply => ({
  text,
  toolCalls,
  usage: null,
  retryCount: 0
});

export const call = (id: string, name: string, args: Record<string, unknown> = {}): ToolCallRequest => ({
  id,
  name,
  arguments: JSON.stringify(args)
});

type Responder = (request: ModelRequest, callIndex: number) => ModelReply | Promise<ModelReply>;

/** Answers each request through `respond` and keeps a copy of every request. */
export class ScriptedModel implements ModelClient {
  readonly modelName = "test/model";
  readonly requests: ModelRequest[] = [];

  constructor(private readonly respond: Responder) {}

  static sequence(replies: readonly ModelReply[]): ScriptedModel {
    return new ScriptedModel((_request, index) => {
      const next = replies[index];
      if (!next) {
        throw new Error(`No scripted reply for request ${index + 1}`);
      }
      return next;
    });
  }

  async complete(request: ModelRequest): Promise<ModelReply> {
    const index = this.requests.length;
    this.requests.push({ ...request, turns: [...request.turns] });
    return this.respond(request, index);
  }
}

export class StubTextExtractor implements TextExtractor {
  constructor(private readonly text = "A cellular potts model of cell sorting driven by adhesion.") {}

  async extract(): Promise<ExtractedText> {
    return { text: this.text, pages: 3 };
  }
}

export class StubSimulator implements Simulator {
  readonly requests: SimulationRequest[] = [];

  constructor(private readonly outcome: Partial<SimulationOutcome> = {}) {}

  async run(request: SimulationRequest): Promise<SimulationOutcome> {
    this.requests.push(request);
    return { exitCode: 0, timedOut: false, stdout: "", stderr: "", durationMs: 5, ...this.outcome };
  }
}

export class StubReferenceStore implements ReferenceStore {
  categories(): string[] {
    return ["CPM", "Miscellaneous"];
  }

  list(category?: string): Record<string, string[]> {
    return category ? { [category]: [] } : {};
  }

  read(category: string, name: string): ReferenceDocument {
    return { category, name, path: `/refs/${category}/${name}`, content: "", total_chars: 0, truncated: false };
  }
}

export const stubCollaborators = (overrides: Partial<Collaborators> = {}): Collaborators => ({
  textExtractor: new StubTextExtractor(),
  simulator: new StubSimulator(),
  references: new StubReferenceStore(),
  ...overrides
});

export const toolContext = (runDir: string, config: BenchConfig = testConfig()): ToolContext => {
  const paper: PaperRef = { name: "paper.pdf", path: join(runDir, "paper.pdf"), index: 0 };
  return {
    runId: "20240102T030405Z_abcdef",
    runDir,
    paper,
    config,
    ...stubCollaborators()
  };
};

export const MINIMAL_MODEL_XML = [
  '<MorpheusModel version="4">',
  "  <Space><Lattice class=\"square\"/></Space>",
  "  <Time><StopTime value=\"10\"/><SaveInterval value=\"1\"/></Time>",
  "  <CellTypes><CellType name=\"cell\" class=\"biological\"/></CellTypes>",
  "  <Analysis>",
  "    <Gnuplotter time-step=\"1\"><Plot><Cells value=\"cell.type\"/></Plot></Gnuplotter>",
  "    <Logger time-step=\"1\"/>",
  "    <ModelGraph format=\"dot\"/>",
  "  </Analysis>",
  "</MorpheusModel>"
].join("\n");
