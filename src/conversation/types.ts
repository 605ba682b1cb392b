export type ToolCallRequest = {
  id: string;
  name: string;
  /** Raw JSON text as produced by the model; parsed by the dispatcher. */
  arguments: string;
};

export type TextTurn = {
  kind: "text";
  role: "user" | "assistant";
  text: string;
};

export type ToolRequestTurn = {
  kind: "tool_request";
  role: "assistant";
  text: string;
  calls: ToolCallRequest[];
};

export type ToolResultTurn = {
  kind: "tool_result";
  role: "tool";
  call_id: string;
  name: string;
  content: string;
};

/** Synthetic marker standing in for the turns truncation removed. */
export type ElisionTurn = {
  kind: "elision";
  role: "user";
  dropped: number;
};

export type ConversationTurn = TextTurn | ToolRequestTurn | ToolResultTurn | ElisionTurn;

export const userText = (text: string): TextTurn => ({ kind: "text", role: "user", text });

export const assistantText = (text: string): TextTurn => ({ kind: "text", role: "assistant", text });

export const elisionText = (dropped: number): string =>
  `[${dropped} earlier conversation turn${dropped === 1 ? "" : "s"} omitted to keep the request small. ` +
  "Use get_run_summary or read_run_file to recover run state.]";

export const turnText = (turn: ConversationTurn): string => {
  switch (turn.kind) {
    case "text":
      return turn.text;
    case "tool_request":
      return [turn.text, ...turn.calls.map((call) => `${call.name}(${call.arguments})`)].join("\n");
    case "tool_result":
      return turn.content;
    case "elision":
      return elisionText(turn.dropped);
  }
};
