import { writeFileSync } from "node:fs";
import { join } from "node:path";
import { describe, expect, it } from "vitest";

import { discoverPapers } from "../papers.js";
import { makeTempDir, testConfig } from "./fakes.js";

const withPapers = (names: string[]): string => {
  const root = makeTempDir("papers");
  for (const name of names) {
    writeFileSync(join(root, name), "%PDF");
  }
  return root;
};

describe("discoverPapers", () => {
  it("lists PDFs in name order", () => {
    const root = withPapers(["b.pdf", "a.PDF", "notes.txt"]);
    const config = testConfig();
    const papers = discoverPapers({ ...config, papers: { dir: ".", max_papers: 10 } }, root);
    expect(papers).toEqual([
      { name: "a.PDF", path: join(root, "a.PDF"), index: 0 },
      { name: "b.pdf", path: join(root, "b.pdf"), index: 1 }
    ]);
  });

  it("keeps the order of an explicit file list and applies max_papers", () => {
    const root = withPapers(["a.pdf", "b.pdf", "c.pdf"]);
    const config = testConfig();
    const papers = discoverPapers(
      { ...config, papers: { dir: root, files: ["c.pdf", "a.pdf", "b.pdf"], max_papers: 2 } },
      "/unused"
    );
    expect(papers.map((paper) => [paper.name, paper.index])).toEqual([
      ["c.pdf", 0],
      ["a.pdf", 1]
    ]);
  });

  it("fails when the directory is missing", () => {
    const root = makeTempDir("papers-missing");
    const config = testConfig();
    expect(() => discoverPapers({ ...config, papers: { dir: "nope", max_papers: 5 } }, root)).toThrow(
      `Papers directory not found: ${join(root, "nope")}`
    );
  });
});
