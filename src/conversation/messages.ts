import type { OpenRouterMessage, OpenRouterToolCall } from "../openrouter/client.js";
import type { ConversationTurn, ToolCallRequest } from "./types.js";
import { elisionText } from "./types.js";

export const toOpenRouterMessages = (
  systemPrompt: string,
  turns: readonly ConversationTurn[]
): OpenRouterMessage[] => [
  { role: "system", content: systemPrompt },
  ...turns.map((turn): OpenRouterMessage => {
    switch (turn.kind) {
      case "text":
        return turn.role === "user"
          ? { role: "user", content: turn.text }
          : { role: "assistant", content: turn.text };
      case "tool_request":
        return {
          role: "assistant",
          content: turn.text.length > 0 ? turn.text : null,
          tool_calls: turn.calls.map(
            (call): OpenRouterToolCall => ({
              id: call.id,
              type: "function",
              function: { name: call.name, arguments: call.arguments }
            })
          )
        };
      case "tool_result":
        return { role: "tool", tool_call_id: turn.call_id, content: turn.content };
      case "elision":
        return { role: "user", content: elisionText(turn.dropped) };
    }
  })
];

export const fromOpenRouterToolCalls = (calls: readonly OpenRouterToolCall[]): ToolCallRequest[] =>
  calls.map((call) => ({
    id: call.id,
    name: call.function.name,
    arguments: call.function.arguments
  }));
