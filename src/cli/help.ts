import type { Formatter } from "../ui/fmt.js";

export type HelpFlag = {
  name: string;
  description: string;
};

export type HelpCommand = {
  name: string;
  summary: string;
  usage: string;
  flags?: HelpFlag[];
  examples?: string[];
  group: "workflow" | "inspection";
};

const CONFIG_FLAG: HelpFlag = {
  name: "--config <path>",
  description: "config path (default: morpheus-bench.config.json)"
};

const COMMANDS: HelpCommand[] = [
  {
    name: "init",
    summary: "write a starter config",
    usage: "morpheus-bench init [--out <path>] [--force]",
    group: "workflow",
    flags: [
      { name: "--out <path>", description: "config output path (default: morpheus-bench.config.json)" },
      { name: "--force", description: "overwrite an existing config file" }
    ]
  },
  {
    name: "validate",
    summary: "check config, papers and references",
    usage: "morpheus-bench validate [config.json]",
    group: "workflow",
    flags: [CONFIG_FLAG],
    examples: ["morpheus-bench validate", "morpheus-bench validate experiments/small.json"]
  },
  {
    name: "run",
    summary: "run the benchmark over every selected paper",
    usage: "morpheus-bench run [config.json] [flags]",
    group: "workflow",
    flags: [
      CONFIG_FLAG,
      { name: "--papers-dir <dir>", description: "override papers.dir" },
      { name: "--papers <a.pdf,b.pdf>", description: "run only these papers, in this order" },
      { name: "--max-papers <N>", description: "override papers.max_papers" },
      { name: "--model <id>", description: "override model.name" },
      { name: "--max-iterations <N>", description: "override loop.max_iterations" },
      { name: "--out <runs_dir>", description: "override output.root" },
      { name: "--simulator <bin>", description: "override simulator.bin" },
      { name: "--quiet", description: "suppress progress output" }
    ],
    examples: [
      "morpheus-bench run",
      "morpheus-bench run --papers turing.pdf --max-iterations 10",
      "morpheus-bench run --model openai/gpt-4o --out runs-gpt4o"
    ]
  },
  {
    name: "references",
    summary: "list reference models",
    usage: "morpheus-bench references [category] [--config <path>]",
    group: "inspection",
    examples: ["morpheus-bench references", "morpheus-bench references CPM"]
  },
  {
    name: "evaluate",
    summary: "score one paper run directory",
    usage: "morpheus-bench evaluate <paper_run_dir> [--write] [--config <path>]",
    group: "inspection",
    flags: [{ name: "--write", description: "write evaluation.json and evaluation.txt" }]
  },
  {
    name: "report",
    summary: "summarize a finished benchmark",
    usage: "morpheus-bench report <benchmark_dir> [--format text|json] [--top N]",
    group: "inspection",
    flags: [
      { name: "--format <type>", description: "text|json (default: text)" },
      { name: "--top <N>", description: "best-scoring papers to list (default: 3)" }
    ],
    examples: ["morpheus-bench report runs/<benchmark_id>"]
  },
  {
    name: "verify",
    summary: "check benchmark artifact integrity",
    usage: "morpheus-bench verify <benchmark_dir>",
    group: "inspection",
    examples: ["morpheus-bench verify runs/<benchmark_id>"]
  },
  {
    name: "receipt",
    summary: "print the receipt for a benchmark",
    usage: "morpheus-bench receipt <benchmark_dir>",
    group: "inspection"
  }
];

const byGroup = (group: HelpCommand["group"]): HelpCommand[] =>
  COMMANDS.filter((command) => command.group === group);

const renderCommandLine = (fmt: Formatter, command: HelpCommand): string => {
  if (!fmt.isTTY) {
    return `  ${command.name.padEnd(11)} ${command.summary}`;
  }
  return `  ${fmt.accent(command.name.padEnd(11))} ${fmt.text(command.summary)}`;
};

export const getHelpCommand = (name: string): HelpCommand | undefined =>
  COMMANDS.find((command) => command.name === name);

export const renderRootHelp = (fmt: Formatter): string => {
  const lines: string[] = [];

  lines.push(fmt.header("MORPHEUS-BENCH // tool-calling benchmark for Morpheus model building"));
  lines.push("");
  lines.push(fmt.text("Workflow:"));
  byGroup("workflow").forEach((command) => lines.push(renderCommandLine(fmt, command)));
  lines.push("");
  lines.push(fmt.text("Inspection:"));
  byGroup("inspection").forEach((command) => lines.push(renderCommandLine(fmt, command)));
  lines.push("");
  lines.push(fmt.text("Global flags:"));
  lines.push(`  ${fmt.accent("--help")}      ${fmt.muted("show root or command help")}`);
  lines.push(`  ${fmt.accent("--version")}   ${fmt.muted("print package version")}`);
  lines.push("");
  lines.push(fmt.text("Quick start:"));
  lines.push(`  ${fmt.muted("morpheus-bench init")}`);
  lines.push(`  ${fmt.muted("morpheus-bench run")}`);
  lines.push(`  ${fmt.muted("morpheus-bench report runs/<benchmark_id>")}`);

  return `${lines.join("\n")}\n`;
};

export const renderCommandHelp = (fmt: Formatter, command: HelpCommand): string => {
  const lines: string[] = [];
  lines.push(fmt.header(`morpheus-bench ${command.name}: ${command.summary}`));
  lines.push("");
  lines.push(fmt.text("Usage:"));
  lines.push(`  ${fmt.muted(command.usage)}`);

  if (command.flags && command.flags.length > 0) {
    lines.push("");
    lines.push(fmt.text("Flags:"));
    command.flags.forEach((flag) => {
      if (fmt.isTTY) {
        lines.push(`  ${fmt.accent(flag.name.padEnd(24))} ${fmt.muted(flag.description)}`);
      } else {
        lines.push(`  ${flag.name.padEnd(24)} ${flag.description}`);
      }
    });
  }

  if (command.examples && command.examples.length > 0) {
    lines.push("");
    lines.push(fmt.text("Examples:"));
    command.examples.forEach((example) => {
      lines.push(`  ${fmt.muted(example)}`);
    });
  }

  return `${lines.join("\n")}\n`;
};
