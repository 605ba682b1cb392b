import type { RunStatus, TerminalState } from "../artifacts/types.js";

export const statusForTerminal = (terminal: TerminalState): RunStatus => {
  switch (terminal) {
    case "done":
      return "completed";
    case "capped":
      return "incomplete";
    case "fatal":
      return "failed";
  }
};

/** Only runs that reached the model's own end (or the cap) are scored. */
export const shouldEvaluate = (terminal: TerminalState): boolean =>
  terminal === "done" || terminal === "capped";
