import { existsSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";

const detectAssetRoot = (): string => {
  const moduleDir = dirname(fileURLToPath(import.meta.url));
  const packageRoot = resolve(moduleDir, "..", "..");

  if (existsSync(resolve(packageRoot, "package.json"))) {
    return packageRoot;
  }

  return process.cwd();
};

const ASSET_ROOT = detectAssetRoot();

/** Path of a bundled asset (schemas, prompts, templates) inside the package. */
export const resolveAssetPath = (...segments: string[]): string =>
  resolve(ASSET_ROOT, ...segments);
