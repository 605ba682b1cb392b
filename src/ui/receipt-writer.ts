import { resolve } from "node:path";

import { writeTextAtomic } from "../artifacts/io.js";
import { BENCHMARK_FILES } from "../artifacts/run-files.js";

export const writeReceiptText = (benchmarkDir: string, text: string): string => {
  const path = resolve(benchmarkDir, BENCHMARK_FILES.receipt);
  writeTextAtomic(path, text);
  return path;
};
