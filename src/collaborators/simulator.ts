import { spawn } from "node:child_process";

import { CollaboratorFailure } from "../core/errors.js";

export type SimulationRequest = {
  modelPath: string;
  workDir: string;
  timeoutMs: number;
};

export type SimulationOutcome = {
  exitCode: number | null;
  timedOut: boolean;
  stdout: string;
  stderr: string;
  durationMs: number;
};

export interface Simulator {
  run(request: SimulationRequest): Promise<SimulationOutcome>;
}

/**
 * Runs `<bin> --file <model> --outdir <workDir> --model-graph dot` and waits
 * for it, killing the process once the timeout expires.
 */
export class MorpheusSimulator implements Simulator {
  constructor(private readonly bin: string) {}

  buildArgs(request: SimulationRequest): string[] {
    return ["--file", request.modelPath, "--outdir", request.workDir, "--model-graph", "dot"];
  }

  run(request: SimulationRequest): Promise<SimulationOutcome> {
    const started = Date.now();
    return new Promise((resolve, reject) => {
      const child = spawn(this.bin, this.buildArgs(request), {
        cwd: request.workDir,
        env: process.env,
        stdio: ["ignore", "pipe", "pipe"]
      });

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let timedOut = false;
      let settled = false;

      child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

      const timer = setTimeout(() => {
        timedOut = true;
        child.kill("SIGKILL");
      }, request.timeoutMs);

      child.once("error", (error) => {
        clearTimeout(timer);
        if (settled) {
          return;
        }
        settled = true;
        reject(
          new CollaboratorFailure("simulator", `Could not launch ${this.bin}: ${error.message}`, {
            bin: this.bin,
            model_path: request.modelPath
          })
        );
      });

      child.once("close", (code) => {
        clearTimeout(timer);
        if (settled) {
          return;
        }
        settled = true;
        resolve({
          exitCode: code,
          timedOut,
          stdout: Buffer.concat(stdout).toString("utf8"),
          stderr: Buffer.concat(stderr).toString("utf8"),
          durationMs: Date.now() - started
        });
      });
    });
  }
}
