import { existsSync } from "node:fs";
import { basename, dirname } from "node:path";
import { describe, expect, it } from "vitest";

import { resolveAssetPath } from "../asset-root.js";

describe("resolveAssetPath", () => {
  it("finds the bundled schemas, prompts and templates beside package.json", () => {
    const schema = resolveAssetPath("schemas", "config.schema.json");
    expect(basename(dirname(schema))).toBe("schemas");
    expect(existsSync(schema)).toBe(true);
    expect(existsSync(resolveAssetPath("prompts", "system-prompt.md"))).toBe(true);
    expect(existsSync(resolveAssetPath("templates", "analysis-template.xml"))).toBe(true);
    expect(existsSync(resolveAssetPath("package.json"))).toBe(true);
  });
});
