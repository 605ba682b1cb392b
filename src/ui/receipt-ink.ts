import React, { useEffect } from "react";
import { Box, Text, render, useApp } from "ink";

import type { RunStatus } from "../artifacts/types.js";
import type { ReceiptModel } from "./receipt-model.js";

const STATUS_COLOR: Record<RunStatus, string> = {
  completed: "green",
  incomplete: "yellow",
  failed: "red",
  pending: "gray"
};

const ReceiptView = ({ model }: { model: ReceiptModel }): React.ReactElement => {
  const { exit } = useApp();

  useEffect(() => {
    exit();
  }, [exit]);

  const counts = `completed ${model.counts.completed}, incomplete ${model.counts.incomplete}, failed ${model.counts.failed}, pending ${model.counts.pending}`;
  const scores =
    model.scores.count > 0
      ? `mean ${model.scores.mean ?? "-"}, min ${model.scores.min ?? "-"}, max ${model.scores.max ?? "-"}`
      : "-";

  return React.createElement(
    Box,
    { flexDirection: "column" },
    React.createElement(Text, { bold: true }, `Benchmark ${model.benchmark_id}`),
    React.createElement(Text, null, `Model: ${model.model}`),
    React.createElement(Text, null, `Papers: ${counts}`),
    React.createElement(Text, null, `Scores: ${scores}`),
    React.createElement(
      Text,
      null,
      `Outputs: ${model.totals.png_files} png, ${model.totals.csv_files} csv | tool calls ${model.totals.tool_calls}`
    ),
    ...model.papers.map((paper) =>
      React.createElement(
        Text,
        { key: `${paper.index}` },
        React.createElement(Text, { color: STATUS_COLOR[paper.status] }, paper.status.padEnd(10)),
        ` ${paper.name}${paper.score ? ` (${paper.score})` : ""}`
      )
    ),
    React.createElement(Text, null, `Output: ${model.benchmark_dir}`)
  );
};

export const renderReceiptInk = async (model: ReceiptModel): Promise<void> => {
  const { waitUntilExit } = render(React.createElement(ReceiptView, { model }));
  await waitUntilExit();
};
