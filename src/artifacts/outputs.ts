import { existsSync, readdirSync } from "node:fs";
import { extname, join, relative } from "node:path";

export type OutputKind = "png" | "csv" | "log" | "xml" | "tif" | "dot";

export type RunOutputs = Record<OutputKind, string[]>;

const KIND_BY_EXTENSION: Record<string, OutputKind> = {
  ".png": "png",
  ".csv": "csv",
  ".log": "log",
  ".xml": "xml",
  ".tif": "tif",
  ".tiff": "tif",
  ".dot": "dot"
};

const walk = (dir: string, visit: (path: string) => void): void => {
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      walk(path, visit);
    } else if (entry.isFile()) {
      visit(path);
    }
  }
};

/** Files under the run directory grouped by kind, as sorted relative paths. */
export const listRunOutputs = (runDir: string): RunOutputs => {
  const outputs: RunOutputs = { png: [], csv: [], log: [], xml: [], tif: [], dot: [] };
  if (!existsSync(runDir)) {
    return outputs;
  }
  walk(runDir, (path) => {
    const kind = KIND_BY_EXTENSION[extname(path).toLowerCase()];
    if (kind) {
      outputs[kind].push(relative(runDir, path));
    }
  });
  for (const list of Object.values(outputs)) {
    list.sort();
  }
  return outputs;
};
