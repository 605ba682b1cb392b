import type { ConversationTurn } from "./types.js";
import { elisionText } from "./types.js";

export type TranscriptHeader = {
  paper: string;
  runId: string;
  model: string;
  status: string;
  iterations: number;
  toolCalls: number;
};

const RULE = "=".repeat(80);
const THIN_RULE = "-".repeat(80);

const renderTurn = (turn: ConversationTurn, index: number): string => {
  switch (turn.kind) {
    case "text":
      return `[${index}] ${turn.role.toUpperCase()}\n${turn.text}`;
    case "tool_request": {
      const calls = turn.calls
        .map((call) => `  -> ${call.name} (${call.id})\n     ${call.arguments}`)
        .join("\n");
      return `[${index}] ASSISTANT${turn.text ? `\n${turn.text}` : ""}\n${calls}`;
    }
    case "tool_result":
      return `[${index}] TOOL RESULT ${turn.name} (${turn.call_id})\n${turn.content}`;
    case "elision":
      return `[${index}] ${elisionText(turn.dropped)}`;
  }
};

/** Human-readable conversation log written to conversation.txt. */
export const formatTranscript = (header: TranscriptHeader, turns: readonly ConversationTurn[]): string =>
  [
    RULE,
    `Paper: ${header.paper}`,
    `Run: ${header.runId}`,
    `Model: ${header.model}`,
    `Status: ${header.status}`,
    `Iterations: ${header.iterations} | Tool calls: ${header.toolCalls}`,
    RULE,
    ...turns.map((turn, index) => `${renderTurn(turn, index + 1)}\n${THIN_RULE}`),
    ""
  ].join("\n");
