import { describe, expect, it } from "vitest";

import { CollaboratorFailure } from "../../core/errors.js";
import { makeTempDir, toolContext } from "../../engine/__tests__/fakes.js";
import { ToolDispatcher, parseToolArguments, serializeToolResult } from "../dispatcher.js";
import { ToolRegistry, defineTool } from "../registry.js";
import { BUILTIN_TOOLS } from "../handlers/index.js";
import { TOOL_NAMES } from "../types.js";

type EchoArgs = { category: string; count?: number };

const echoTool = defineTool<EchoArgs>({
  name: "list_references",
  description: "echo",
  parameters: {
    type: "object",
    additionalProperties: false,
    required: ["category"],
    properties: {
      category: { type: "string", minLength: 1 },
      count: { type: "integer", minimum: 0 }
    }
  },
  handler: async (args) => {
    if (args.category === "broken") {
      throw new CollaboratorFailure("reference_store", "store offline", { retry: false });
    }
    if (args.category === "crash") {
      throw new Error("boom");
    }
    return { category: args.category, count: args.count ?? 0 };
  }
});

const dispatcher = new ToolDispatcher(ToolRegistry.create([echoTool]));
const context = toolContext(makeTempDir("dispatch"));

describe("ToolDispatcher", () => {
  it("returns handler data on success", async () => {
    const result = await dispatcher.dispatch("list_references", '{"category":"CPM","count":2}', context);
    expect(result).toEqual({ ok: true, data: { category: "CPM", count: 2 } });
  });

  it("reports unknown tools with the available names", async () => {
    const result = await dispatcher.dispatch("delete_everything", "{}", context);
    expect(result).toEqual({
      ok: false,
      error_kind: "unknown_tool",
      error: "Unknown tool: delete_everything",
      hint: "Available tools: list_references"
    });
  });

  it("rejects arguments that are not JSON", async () => {
    const result = await dispatcher.dispatch("list_references", "{category:", context);
    expect(result.ok).toBe(false);
    expect(result.ok ? undefined : result.error_kind).toBe("invalid_arguments");
  });

  it("rejects arguments that do not match the schema", async () => {
    const result = await dispatcher.dispatch("list_references", '{"count":-1}', context);
    if (result.ok) {
      throw new Error("expected a failure");
    }
    expect(result.error_kind).toBe("invalid_arguments");
    expect(result.error).toBe("Invalid arguments for list_references");
    expect(result.details?.issues).toEqual(
      expect.arrayContaining([
        "list_references: must have required property 'category'",
        "list_references/count: must be >= 0"
      ])
    );
  });

  it("turns collaborator failures into values", async () => {
    const result = await dispatcher.dispatch("list_references", { category: "broken" }, context);
    expect(result).toEqual({
      ok: false,
      error_kind: "collaborator_failure",
      error: "store offline",
      details: { collaborator: "reference_store", retry: false }
    });
  });

  it("turns unexpected handler errors into internal failures", async () => {
    const result = await dispatcher.dispatch("list_references", { category: "crash" }, context);
    expect(result).toEqual({
      ok: false,
      error_kind: "internal",
      error: "Tool list_references failed: boom"
    });
  });
});

describe("parseToolArguments", () => {
  it("treats empty input as an empty object", () => {
    expect(parseToolArguments("")).toEqual({ ok: true, value: {} });
    expect(parseToolArguments(undefined)).toEqual({ ok: true, value: {} });
  });

  it("refuses JSON that is not an object", () => {
    expect(parseToolArguments("[1,2]")).toEqual({ ok: false, reason: "arguments must be a JSON object" });
  });
});

describe("serializeToolResult", () => {
  it("flattens success data with ok last", () => {
    expect(serializeToolResult({ ok: true, data: { a: 1 } })).toBe('{"a":1,"ok":true}');
  });
});

describe("ToolRegistry", () => {
  it("registers every built-in tool", () => {
    const registry = ToolRegistry.create(BUILTIN_TOOLS);
    expect(registry.names().sort()).toEqual([...TOOL_NAMES].sort());
    expect(registry.declarations()[0]?.type).toBe("function");
  });

  it("restricts the registry to enabled tools", () => {
    const registry = ToolRegistry.create(BUILTIN_TOOLS, ["prepare_paper", "evaluate_run"]);
    expect(registry.names()).toEqual(["prepare_paper", "evaluate_run"]);
    expect(registry.get("run_simulation")).toBeUndefined();
  });

  it("fails at startup on an unknown enabled tool", () => {
    expect(() => ToolRegistry.create(BUILTIN_TOOLS, ["teleport"])).toThrow(/Unknown tool in tools.enabled: teleport/);
  });

  it("fails at startup on duplicate definitions", () => {
    expect(() => ToolRegistry.create([echoTool, echoTool])).toThrow("Duplicate tool definition: list_references");
  });
});
