import { existsSync } from "node:fs";
import { join } from "node:path";

import { readJsonFile, writeJsonAtomic } from "./io.js";

export const METADATA_FILE = "metadata.json";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const readRunMetadata = (runDir: string): Record<string, unknown> => {
  const path = join(runDir, METADATA_FILE);
  if (!existsSync(path)) {
    return {};
  }
  const parsed = readJsonFile(path);
  return isRecord(parsed) ? parsed : {};
};

/** Shallow-merges `patch` into the run's metadata.json. */
export const mergeRunMetadata = (
  runDir: string,
  patch: Record<string, unknown>
): Record<string, unknown> => {
  const merged = { ...readRunMetadata(runDir), ...patch };
  writeJsonAtomic(join(runDir, METADATA_FILE), merged);
  return merged;
};
