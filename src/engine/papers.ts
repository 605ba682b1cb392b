import { existsSync, readdirSync } from "node:fs";
import { basename, isAbsolute, resolve } from "node:path";

import type { BenchConfig } from "../config/types.js";
import type { PaperRef } from "../artifacts/types.js";

/**
 * The papers of a batch: `papers.files` in the given order (relative to
 * `papers.dir`), or every `*.pdf` in `papers.dir` sorted by name; at most
 * `papers.max_papers` of them.
 */
export const discoverPapers = (config: BenchConfig, rootDir: string): PaperRef[] => {
  const dir = resolve(rootDir, config.papers.dir);
  let paths: string[];
  if (config.papers.files && config.papers.files.length > 0) {
    paths = config.papers.files.map((file) => (isAbsolute(file) ? file : resolve(dir, file)));
  } else {
    if (!existsSync(dir)) {
      throw new Error(`Papers directory not found: ${dir}`);
    }
    paths = readdirSync(dir, { withFileTypes: true })
      .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith(".pdf"))
      .map((entry) => entry.name)
      .sort((a, b) => a.localeCompare(b))
      .map((name) => resolve(dir, name));
  }

  return paths.slice(0, config.papers.max_papers).map((path, index) => ({
    name: basename(path),
    path,
    index
  }));
};
