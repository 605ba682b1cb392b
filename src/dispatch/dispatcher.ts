import { CollaboratorFailure, InvalidArguments, errorMessage } from "../core/errors.js";
import type { ToolRegistry } from "./registry.js";
import type { ToolContext, ToolFailure, ToolResult } from "./types.js";

const failure = (
  kind: ToolFailure["error_kind"],
  error: string,
  extra: { hint?: string; details?: Record<string, unknown> } = {}
): ToolFailure => ({
  ok: false,
  error_kind: kind,
  error,
  ...(extra.hint ? { hint: extra.hint } : {}),
  ...(extra.details ? { details: extra.details } : {})
});

type ParsedArguments = { ok: true; value: Record<string, unknown> } | { ok: false; reason: string };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/** Accepts a JSON string (as sent on the wire) or an already-decoded object. */
export const parseToolArguments = (raw: unknown): ParsedArguments => {
  if (raw === undefined || raw === null) {
    return { ok: true, value: {} };
  }
  if (typeof raw === "string") {
    if (raw.trim().length === 0) {
      return { ok: true, value: {} };
    }
    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (error) {
      return { ok: false, reason: `arguments are not valid JSON: ${errorMessage(error)}` };
    }
    return isRecord(decoded)
      ? { ok: true, value: decoded }
      : { ok: false, reason: "arguments must be a JSON object" };
  }
  return isRecord(raw) ? { ok: true, value: raw } : { ok: false, reason: "arguments must be an object" };
};

/**
 * Routes a tool call to its handler. Every failure, including a handler that
 * throws, comes back as a `ToolFailure` value.
 */
export class ToolDispatcher {
  constructor(private readonly registry: ToolRegistry) {}

  async dispatch(name: string, rawArguments: unknown, context: ToolContext): Promise<ToolResult> {
    const tool = this.registry.get(name);
    if (!tool) {
      return failure("unknown_tool", `Unknown tool: ${name}`, {
        hint: `Available tools: ${this.registry.names().join(", ")}`
      });
    }

    const parsed = parseToolArguments(rawArguments);
    if (!parsed.ok) {
      return failure("invalid_arguments", `Invalid arguments for ${name}: ${parsed.reason}`);
    }

    try {
      const data = await tool.invoke(parsed.value, context);
      return { ok: true, data };
    } catch (error) {
      if (error instanceof InvalidArguments) {
        return failure("invalid_arguments", error.message, {
          ...(error.issues.length > 0 ? { details: { issues: error.issues } } : {})
        });
      }
      if (error instanceof CollaboratorFailure) {
        return failure("collaborator_failure", error.message, {
          details: { collaborator: error.collaborator, ...error.details }
        });
      }
      return failure("internal", `Tool ${name} failed: ${errorMessage(error)}`);
    }
  }
}

/** Wire form of a result: `{ok: true, ...data}` or the failure object. */
export const serializeToolResult = (result: ToolResult): string =>
  JSON.stringify(result.ok ? { ...result.data, ok: true } : result);
