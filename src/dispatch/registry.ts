import type { OpenRouterToolDeclaration } from "../openrouter/client.js";
import { createSchemaCompiler, formatAjvErrors } from "../config/schema-validation.js";
import { InvalidArguments } from "../core/errors.js";
import type { ToolContext, ToolName, ToolSpec } from "./types.js";
import { TOOL_NAMES, asToolName } from "./types.js";

type SchemaCompiler = ReturnType<typeof createSchemaCompiler>;

export type RegisteredTool = {
  name: ToolName;
  description: string;
  parameters: Record<string, unknown>;
  invoke: (args: unknown, context: ToolContext) => Promise<Record<string, unknown>>;
};

export type ToolBuilder = (compiler: SchemaCompiler) => RegisteredTool;

/**
 * Compiles the argument schema once and closes over the typed handler, so the
 * registry can hold tools with different argument types.
 */
export const defineTool =
  <A>(spec: ToolSpec<A>): ToolBuilder =>
  (compiler) => {
    const validate = compiler.compile<A>(spec.parameters);
    return {
      name: spec.name,
      description: spec.description,
      parameters: spec.parameters,
      invoke: async (args, context) => {
        if (!validate(args)) {
          const issues = formatAjvErrors(spec.name, validate.errors);
          throw new InvalidArguments(`Invalid arguments for ${spec.name}`, issues);
        }
        return spec.handler(args, context);
      }
    };
  };

export class ToolRegistry {
  private readonly tools: Map<ToolName, RegisteredTool>;

  private constructor(tools: Map<ToolName, RegisteredTool>) {
    this.tools = tools;
  }

  /**
   * Builds the registry at startup. Throws on a schema that does not compile,
   * a duplicate tool, or an enabled name that no tool carries.
   */
  static create(builders: readonly ToolBuilder[], enabled?: readonly string[]): ToolRegistry {
    const compiler = createSchemaCompiler();
    const all = new Map<ToolName, RegisteredTool>();
    for (const build of builders) {
      const tool = build(compiler);
      if (all.has(tool.name)) {
        throw new Error(`Duplicate tool definition: ${tool.name}`);
      }
      all.set(tool.name, tool);
    }

    if (enabled === undefined) {
      return new ToolRegistry(all);
    }

    const selected = new Map<ToolName, RegisteredTool>();
    for (const raw of enabled) {
      const name = asToolName(raw);
      const tool = name ? all.get(name) : undefined;
      if (!name || !tool) {
        throw new Error(`Unknown tool in tools.enabled: ${raw} (known: ${TOOL_NAMES.join(", ")})`);
      }
      selected.set(name, tool);
    }
    return new ToolRegistry(selected);
  }

  get(name: string): RegisteredTool | undefined {
    const known = asToolName(name);
    return known ? this.tools.get(known) : undefined;
  }

  names(): ToolName[] {
    return Array.from(this.tools.keys());
  }

  declarations(): OpenRouterToolDeclaration[] {
    return Array.from(this.tools.values()).map((tool) => ({
      type: "function",
      function: {
        name: tool.name,
        description: tool.description,
        parameters: tool.parameters
      }
    }));
  }
}
