import { describe, expect, it } from "vitest";

import { estimateTokens, truncateConversation, type TruncationPolicy } from "../truncation.js";
import { assistantText, userText, type ConversationTurn } from "../types.js";
import { toOpenRouterMessages } from "../messages.js";

const policy: TruncationPolicy = { maxTurns: 8, keepRecent: 6, maxEstimatedTokens: 100_000 };

const request = (id: string): ConversationTurn => ({
  kind: "tool_request",
  role: "assistant",
  text: "",
  calls: [{ id, name: "get_run_summary", arguments: "{}" }]
});

const result = (id: string): ConversationTurn => ({
  kind: "tool_result",
  role: "tool",
  call_id: id,
  name: "get_run_summary",
  content: '{"ok":true}'
});

describe("truncateConversation", () => {
  it("leaves short conversations untouched", () => {
    const turns = [userText("start"), assistantText("one"), userText("two")];
    const outcome = truncateConversation(turns, policy);
    expect(outcome.truncated).toBe(false);
    expect(outcome.turns).toEqual(turns);
    expect(outcome.elided).toBe(0);
  });

  it("keeps the first turn and the recent window around an elision marker", () => {
    const turns = Array.from({ length: 10 }, (_, i) => (i % 2 === 0 ? userText(`u${i}`) : assistantText(`a${i}`)));
    const outcome = truncateConversation(turns, policy);

    expect(outcome.truncated).toBe(true);
    expect(outcome.turns).toHaveLength(8);
    expect(outcome.turns[0]).toEqual(userText("u0"));
    expect(outcome.turns[1]).toEqual({ kind: "elision", role: "user", dropped: 3 });
    expect(outcome.turns[2]).toEqual(userText("u4"));
    expect(outcome.turns[7]).toEqual(assistantText("a9"));
    expect(outcome.elided).toBe(3);
  });

  it("does nothing when applied to its own output", () => {
    const turns = Array.from({ length: 10 }, (_, i) => userText(`t${i}`));
    const once = truncateConversation(turns, policy);
    const twice = truncateConversation(once.turns, policy);
    expect(twice.truncated).toBe(false);
    expect(twice.turns).toEqual(once.turns);
    expect(twice.elided).toBe(3);
  });

  it("never starts the recent window with an orphaned tool result", () => {
    const turns: ConversationTurn[] = [
      userText("u0"),
      assistantText("a1"),
      userText("u2"),
      request("c1"),
      result("c1"),
      assistantText("a5"),
      userText("u6"),
      assistantText("a7"),
      userText("u8"),
      assistantText("a9")
    ];
    const outcome = truncateConversation(turns, policy);

    expect(outcome.turns).toHaveLength(9);
    expect(outcome.turns[1]).toEqual({ kind: "elision", role: "user", dropped: 2 });
    expect(outcome.turns[2]?.kind).toBe("tool_request");
    expect(outcome.turns[3]?.kind).toBe("tool_result");
  });

  it("accumulates the dropped count across passes", () => {
    const turns: ConversationTurn[] = [
      userText("u0"),
      assistantText("a1"),
      userText("u2"),
      request("c1"),
      result("c1"),
      assistantText("a5"),
      userText("u6"),
      assistantText("a7"),
      userText("u8"),
      assistantText("a9")
    ];
    const first = truncateConversation(turns, policy);
    const grown = [...first.turns, userText("u10"), assistantText("a11")];
    const second = truncateConversation(grown, policy);

    expect(second.truncated).toBe(true);
    expect(second.turns).toHaveLength(8);
    expect(second.turns[1]).toEqual({ kind: "elision", role: "user", dropped: 5 });
    expect(second.turns[2]).toEqual(userText("u6"));
    expect(second.elided).toBe(5);
  });

  it("truncates on estimated size even below the turn limit", () => {
    const big = "x".repeat(4_000);
    const turns = Array.from({ length: 8 }, () => userText(big));
    expect(estimateTokens(turns)).toBe(8_000);

    const outcome = truncateConversation(turns, { maxTurns: 50, keepRecent: 3, maxEstimatedTokens: 5_000 });
    expect(outcome.truncated).toBe(true);
    expect(outcome.turns).toHaveLength(5);
    expect(outcome.elided).toBe(4);
  });
});

describe("toOpenRouterMessages", () => {
  it("renders the elision marker as a user message after the system prompt", () => {
    const messages = toOpenRouterMessages("system", [userText("hi"), { kind: "elision", role: "user", dropped: 1 }]);
    expect(messages[0]).toEqual({ role: "system", content: "system" });
    expect(messages[2]).toEqual({
      role: "user",
      content:
        "[1 earlier conversation turn omitted to keep the request small. " +
        "Use get_run_summary or read_run_file to recover run state.]"
    });
  });

  it("sends tool requests with a null content when the model wrote no text", () => {
    const messages = toOpenRouterMessages("system", [request("c1"), result("c1")]);
    expect(messages[1]).toEqual({
      role: "assistant",
      content: null,
      tool_calls: [{ id: "c1", type: "function", function: { name: "get_run_summary", arguments: "{}" } }]
    });
    expect(messages[2]).toEqual({ role: "tool", tool_call_id: "c1", content: '{"ok":true}' });
  });
});
