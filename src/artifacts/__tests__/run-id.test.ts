import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { describe, expect, it } from "vitest";

import { makeTempDir } from "../../engine/__tests__/fakes.js";
import { createPaperRunDir } from "../run-dir.js";
import { RUN_ID_PATTERN, generateRunId, slugifyPaperName } from "../run-id.js";
import { resolveInsideRun } from "../run-files.js";
import { mergeRunMetadata, readRunMetadata } from "../run-metadata.js";

describe("generateRunId", () => {
  it("formats the UTC timestamp with a hex suffix", () => {
    const at = new Date(Date.UTC(2024, 0, 2, 3, 4, 5));
    expect(generateRunId(at, { suffix: "ABCDEF12" })).toBe("20240102T030405Z_abcdef");
    expect(generateRunId(at, { suffix: "z1" })).toBe("20240102T030405Z_100000");
    expect(generateRunId(at)).toMatch(RUN_ID_PATTERN);
  });
});

describe("paper run directories", () => {
  it("slugifies paper names", () => {
    expect(slugifyPaperName("Turing Patterns (2019).pdf")).toBe("turing-patterns-2019");
    expect(slugifyPaperName("###.pdf")).toBe("paper");
  });

  it("prefixes the directory with the paper position", () => {
    const benchmarkDir = makeTempDir("run-dir");
    const runDir = createPaperRunDir({ benchmarkDir, paperName: "Cell Sorting.pdf", index: 2 });
    expect(runDir).toBe(join(benchmarkDir, "03_cell-sorting"));
    expect(existsSync(runDir)).toBe(true);
  });
});

describe("run files", () => {
  it("keeps paths inside the run directory", () => {
    const runDir = makeTempDir("inside");
    expect(resolveInsideRun(runDir, "plots/a.png")).toBe(join(runDir, "plots", "a.png"));
    expect(resolveInsideRun(runDir, "../escape.txt")).toBeNull();
    expect(resolveInsideRun(runDir, "/etc/passwd")).toBeNull();
    expect(resolveInsideRun(runDir, ".")).toBeNull();
  });

  it("merges metadata patches", () => {
    const runDir = makeTempDir("metadata");
    mergeRunMetadata(runDir, { paper: "a.pdf", pages: 3 });
    mergeRunMetadata(runDir, { pages: 4, status: "completed" });
    expect(readRunMetadata(runDir)).toEqual({ paper: "a.pdf", pages: 4, status: "completed" });
    expect(readFileSync(join(runDir, "metadata.json"), "utf8").endsWith("\n")).toBe(true);
  });
});
