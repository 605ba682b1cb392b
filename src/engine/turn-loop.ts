import { setTimeout as delay } from "node:timers/promises";

import type { BenchConfig } from "../config/types.js";
import type { TerminalState, RunError } from "../artifacts/types.js";
import type { ConversationTurn, ToolResultTurn } from "../conversation/types.js";
import { assistantText, userText } from "../conversation/types.js";
import { truncateConversation } from "../conversation/truncation.js";
import { TransportError } from "../core/errors.js";
import type { ToolDispatcher } from "../dispatch/dispatcher.js";
import { serializeToolResult } from "../dispatch/dispatcher.js";
import type { ToolContext, ToolResult } from "../dispatch/types.js";
import type { EventBus } from "../events/event-bus.js";
import type { OpenRouterToolDeclaration } from "../openrouter/client.js";
import type { ModelClient, ModelReply } from "./model-client.js";

type LoopState = "AWAITING_MODEL" | "MODEL_RESPONDED" | "DISPATCHING_TOOL" | "DONE" | "CAPPED" | "FATAL";

export type ToolCallTrace = {
  iteration: number;
  call_id: string;
  name: string;
  arguments: string;
  ok: boolean;
  error_kind?: string;
  duration_ms: number;
};

export type TurnLoopOptions = {
  runId: string;
  systemPrompt: string;
  initialPrompt: string;
  model: ModelClient;
  dispatcher: ToolDispatcher;
  tools: readonly OpenRouterToolDeclaration[];
  toolContext: ToolContext;
  loop: BenchConfig["loop"];
  truncation: BenchConfig["truncation"];
  bus?: EventBus;
  onToolCall?: (trace: ToolCallTrace) => void;
  sleep?: (ms: number) => Promise<void>;
  signal?: AbortSignal;
};

export type TurnLoopOutcome = {
  terminal: TerminalState;
  iterations: number;
  toolCalls: number;
  /** Every turn in order, including those truncation removed from the request. */
  transcript: ConversationTurn[];
  error?: RunError;
};

export const completionNudge = (sentinel: string): string =>
  `Have you completed ALL steps including evaluation? If yes, say '${sentinel}'. If not, continue with the next step.`;

export const containsSentinel = (text: string, sentinel: string): boolean =>
  text.toUpperCase().includes(sentinel.toUpperCase());

/**
 * Drives one paper's conversation:
 * AWAITING_MODEL -> MODEL_RESPONDED -> {DISPATCHING_TOOL, DONE, CAPPED}.
 * The iteration counter grows with every model response and is checked before
 * each request, so a paper never sees more than `loop.max_iterations` replies.
 */
export const runTurnLoop = async (options: TurnLoopOptions): Promise<TurnLoopOutcome> => {
  const { loop, bus, runId } = options;
  const sleep = options.sleep ?? ((ms: number) => delay(ms));
  const policy = {
    maxTurns: options.truncation.max_turns,
    keepRecent: options.truncation.keep_recent,
    maxEstimatedTokens: options.truncation.max_estimated_tokens
  };

  const first = userText(options.initialPrompt);
  let conversation: ConversationTurn[] = [first];
  const transcript: ConversationTurn[] = [first];
  const append = (turn: ConversationTurn): void => {
    conversation.push(turn);
    transcript.push(turn);
  };

  let state: LoopState = "AWAITING_MODEL";
  let iterations = 0;
  let toolCalls = 0;
  let reply: ModelReply | null = null;
  let error: RunError | undefined;

  while (state !== "DONE" && state !== "CAPPED" && state !== "FATAL") {
    switch (state) {
      case "AWAITING_MODEL": {
        if (iterations >= loop.max_iterations) {
          state = "CAPPED";
          break;
        }
        if (iterations > 0 && loop.turn_delay_ms > 0) {
          await sleep(loop.turn_delay_ms);
        }

        const before = conversation.length;
        const truncation = truncateConversation(conversation, policy);
        if (truncation.truncated) {
          conversation = truncation.turns;
          bus?.emit({
            type: "conversation.truncated",
            payload: {
              run_id: runId,
              turns_before: before,
              turns_after: conversation.length,
              elided_total: truncation.elided
            }
          });
        }

        bus?.emit({
          type: "model.requested",
          payload: { run_id: runId, iteration: iterations + 1, turn_count: conversation.length }
        });
        try {
          reply = await options.model.complete({
            runId,
            systemPrompt: options.systemPrompt,
            turns: conversation,
            tools: options.tools,
            signal: options.signal
          });
        } catch (caught) {
          if (!(caught instanceof TransportError)) {
            throw caught;
          }
          error = { message: caught.message, code: caught.code ?? "transport_error" };
          state = "FATAL";
          break;
        }
        iterations += 1;
        state = "MODEL_RESPONDED";
        break;
      }

      case "MODEL_RESPONDED": {
        if (!reply) {
          throw new Error("Turn loop reached MODEL_RESPONDED without a reply");
        }
        const sentinelSeen = containsSentinel(reply.text, loop.sentinel);
        bus?.emit({
          type: "model.responded",
          payload: {
            run_id: runId,
            iteration: iterations,
            tool_calls: reply.toolCalls.length,
            text_chars: reply.text.length,
            sentinel: sentinelSeen
          }
        });

        if (sentinelSeen) {
          transcript.push(assistantText(reply.text));
          state = "DONE";
        } else if (reply.toolCalls.length > 0) {
          append({ kind: "tool_request", role: "assistant", text: reply.text, calls: reply.toolCalls });
          state = "DISPATCHING_TOOL";
        } else {
          append(assistantText(reply.text.length > 0 ? reply.text : "(no text)"));
          append(userText(completionNudge(loop.sentinel)));
          state = "AWAITING_MODEL";
        }
        break;
      }

      case "DISPATCHING_TOOL": {
        const calls = reply?.toolCalls ?? [];
        for (const call of calls) {
          bus?.emit({
            type: "tool.called",
            payload: { run_id: runId, iteration: iterations, call_id: call.id, name: call.name }
          });
          const started = Date.now();
          const result: ToolResult = await options.dispatcher.dispatch(
            call.name,
            call.arguments,
            options.toolContext
          );
          const durationMs = Date.now() - started;
          toolCalls += 1;

          const turn: ToolResultTurn = {
            kind: "tool_result",
            role: "tool",
            call_id: call.id,
            name: call.name,
            content: serializeToolResult(result)
          };
          append(turn);

          const errorKind = result.ok ? undefined : result.error_kind;
          bus?.emit({
            type: "tool.completed",
            payload: {
              run_id: runId,
              call_id: call.id,
              name: call.name,
              ok: result.ok,
              ...(errorKind ? { error_kind: errorKind } : {}),
              duration_ms: durationMs
            }
          });
          options.onToolCall?.({
            iteration: iterations,
            call_id: call.id,
            name: call.name,
            arguments: call.arguments,
            ok: result.ok,
            ...(errorKind ? { error_kind: errorKind } : {}),
            duration_ms: durationMs
          });
        }
        state = "AWAITING_MODEL";
        break;
      }
    }
  }

  const terminal: TerminalState = state === "DONE" ? "done" : state === "CAPPED" ? "capped" : "fatal";
  return {
    terminal,
    iterations,
    toolCalls,
    transcript,
    ...(error ? { error } : {})
  };
};
