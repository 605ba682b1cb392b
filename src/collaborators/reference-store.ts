import { existsSync, readdirSync, readFileSync, statSync } from "node:fs";
import { extname, relative, resolve, sep } from "node:path";

import { CollaboratorFailure, InvalidArguments } from "../core/errors.js";

const REFERENCE_EXTENSIONS = new Set([".xml", ".txt"]);

export type ReferenceDocument = {
  category: string;
  name: string;
  path: string;
  content: string;
  total_chars: number;
  truncated: boolean;
};

export interface ReferenceStore {
  categories(): string[];
  list(category?: string): Record<string, string[]>;
  read(category: string, name: string, maxChars: number): ReferenceDocument;
}

/** Reference models laid out as `<root>/<category>/<name>.{xml,txt}`. */
export class FileReferenceStore implements ReferenceStore {
  private readonly root: string;

  constructor(root: string, private readonly knownCategories: readonly string[]) {
    this.root = resolve(root);
  }

  categories(): string[] {
    return [...this.knownCategories];
  }

  private requireCategory(category: string): string {
    if (!this.knownCategories.includes(category)) {
      throw new InvalidArguments(`Unknown category: ${category}`, [
        `valid categories: ${this.knownCategories.join(", ")}`
      ]);
    }
    return resolve(this.root, category);
  }

  private listCategory(category: string): string[] {
    const dir = resolve(this.root, category);
    if (!existsSync(dir) || !statSync(dir).isDirectory()) {
      return [];
    }
    return readdirSync(dir, { withFileTypes: true })
      .filter((entry) => entry.isFile() && REFERENCE_EXTENSIONS.has(extname(entry.name)))
      .map((entry) => entry.name)
      .sort();
  }

  list(category?: string): Record<string, string[]> {
    if (category !== undefined) {
      this.requireCategory(category);
      return { [category]: this.listCategory(category) };
    }
    const listing: Record<string, string[]> = {};
    for (const known of this.knownCategories) {
      const names = this.listCategory(known);
      if (names.length > 0) {
        listing[known] = names;
      }
    }
    return listing;
  }

  read(category: string, name: string, maxChars: number): ReferenceDocument {
    const dir = this.requireCategory(category);
    const path = resolve(dir, name);
    const rel = relative(dir, path);
    if (rel.length === 0 || rel.startsWith("..") || rel.includes(sep)) {
      throw new InvalidArguments(`Invalid reference path: ${name}`);
    }
    if (!existsSync(path) || !statSync(path).isFile()) {
      throw new CollaboratorFailure("reference_store", `Reference not found: ${category}/${name}`, {
        available: this.listCategory(category)
      });
    }
    const full = readFileSync(path, "utf8");
    return {
      category,
      name,
      path,
      content: full.slice(0, maxChars),
      total_chars: full.length,
      truncated: full.length > maxChars
    };
  }
}
