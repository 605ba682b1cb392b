import type { ConversationTurn, ElisionTurn } from "./types.js";
import { turnText } from "./types.js";

export type TruncationPolicy = {
  maxTurns: number;
  keepRecent: number;
  maxEstimatedTokens: number;
};

export type TruncationOutcome = {
  turns: ConversationTurn[];
  truncated: boolean;
  /** Total turns represented by the elision marker after this pass. */
  elided: number;
};

/** Rough request size: four characters per token. */
export const estimateTokens = (turns: readonly ConversationTurn[]): number =>
  Math.ceil(turns.reduce((sum, turn) => sum + turnText(turn).length, 0) / 4);

export const needsTruncation = (
  turns: readonly ConversationTurn[],
  policy: TruncationPolicy
): boolean =>
  turns.length > policy.maxTurns || estimateTokens(turns) > policy.maxEstimatedTokens;

const elidedCount = (turns: readonly ConversationTurn[]): number =>
  turns.reduce((sum, turn) => sum + (turn.kind === "elision" ? turn.dropped : 0), 0);

/**
 * Keeps the first turn and the most recent `keepRecent` turns, replacing the
 * interior with a single elision marker. The recent window is widened
 * backwards so it never opens with a tool result whose request was dropped.
 * Applying it to its own output changes nothing.
 */
export const truncateConversation = (
  turns: readonly ConversationTurn[],
  policy: TruncationPolicy
): TruncationOutcome => {
  const unchanged = (): TruncationOutcome => ({
    turns: [...turns],
    truncated: false,
    elided: elidedCount(turns)
  });

  if (!needsTruncation(turns, policy) || turns.length <= policy.keepRecent + 1) {
    return unchanged();
  }

  let start = turns.length - policy.keepRecent;
  while (start > 1 && turns[start]?.kind === "tool_result") {
    start -= 1;
  }

  const interior = turns.slice(1, start);
  const dropped = interior.filter((turn) => turn.kind !== "elision");
  if (dropped.length === 0) {
    return unchanged();
  }

  const first = turns[0];
  if (!first) {
    return unchanged();
  }

  const marker: ElisionTurn = {
    kind: "elision",
    role: "user",
    dropped: dropped.length + elidedCount(interior)
  };

  return {
    turns: [first, marker, ...turns.slice(start)],
    truncated: true,
    elided: marker.dropped
  };
};
