import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";
import type { ErrorObject, ValidateFunction, Options } from "ajv";
import { readFileSync } from "node:fs";
import { join } from "node:path";

import type { BenchConfigInput } from "./types.js";
import type { BenchmarkSummary, EvaluationResult, RunRecord } from "../artifacts/types.js";
import { resolveAssetPath } from "../utils/asset-root.js";

const loadSchema = (fileName: string): unknown => {
  const raw = readFileSync(join(resolveAssetPath("schemas"), fileName), "utf8");
  return JSON.parse(raw) as unknown;
};

type SchemaCompiler = {
  compile: <T>(schema: unknown) => ValidateFunction<T>;
};

const Ajv2020Ctor = Ajv2020 as unknown as new (opts?: Options) => SchemaCompiler;

const applyFormats = addFormats as unknown as (instance: unknown) => void;

/**
 * Creates an ajv instance with the project's dialect and formats. Tool
 * argument schemas are compiled against their own instance.
 */
export const createSchemaCompiler = (): SchemaCompiler => {
  const instance = new Ajv2020Ctor({
    allErrors: true,
    strict: true,
    allowUnionTypes: true,
    validateSchema: true
  });
  applyFormats(instance);
  return instance;
};

const ajv = createSchemaCompiler();

export const validateConfig: ValidateFunction<BenchConfigInput> = ajv.compile(
  loadSchema("config.schema.json")
);
export const validateRunRecord: ValidateFunction<RunRecord> = ajv.compile(
  loadSchema("run-record.schema.json")
);
export const validateEvaluation: ValidateFunction<EvaluationResult> = ajv.compile(
  loadSchema("evaluation.schema.json")
);
export const validateSummary: ValidateFunction<BenchmarkSummary> = ajv.compile(
  loadSchema("summary.schema.json")
);

export const formatAjvErrors = (
  schemaName: string,
  errors: ErrorObject[] | null | undefined
): string[] => {
  if (!errors || errors.length === 0) {
    return [];
  }

  return errors.map((error) => {
    const path = error.instancePath || "";
    const message = error.message ?? "is invalid";
    return `${schemaName}${path}: ${message}`.trim();
  });
};
