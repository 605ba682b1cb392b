import type { RunStatus } from "../artifacts/types.js";

export type FormatterStream = {
  isTTY?: boolean;
  columns?: number;
};

export type FormatterOptions = {
  stream?: FormatterStream;
  env?: NodeJS.ProcessEnv;
};

export type StatusLevel = "success" | "warn" | "error" | "info";

const RESET = "\x1b[0m";

const isTruthyEnv = (value: string | undefined): boolean =>
  typeof value === "string" && value !== "0" && value.trim().length > 0;

const shouldUseColor = (stream: FormatterStream | undefined, env: NodeJS.ProcessEnv): boolean => {
  if (isTruthyEnv(env.FORCE_COLOR)) {
    return true;
  }
  if (isTruthyEnv(env.NO_COLOR)) {
    return false;
  }
  return Boolean(stream?.isTTY);
};

type ColorKey = "brand" | "accent" | "success" | "error" | "warn" | "info" | "muted" | "bold";

const COLOR_CODES: Record<ColorKey, string> = {
  brand: "\x1b[36m",
  accent: "\x1b[35m",
  success: "\x1b[32m",
  error: "\x1b[31m",
  warn: "\x1b[33m",
  info: "\x1b[34m",
  muted: "\x1b[90m",
  bold: "\x1b[1m"
};

const PLAIN_PREFIX: Record<StatusLevel, string> = {
  success: "OK",
  warn: "WARN",
  error: "ERROR",
  info: "INFO"
};

const SYMBOL: Record<StatusLevel, string> = {
  success: "✔",
  warn: "▲",
  error: "✖",
  info: "●"
};

export const levelForStatus = (status: RunStatus): StatusLevel => {
  switch (status) {
    case "completed":
      return "success";
    case "incomplete":
      return "warn";
    case "failed":
      return "error";
    case "pending":
      return "info";
  }
};

export type Formatter = {
  isTTY: boolean;
  accent: (value: string) => string;
  muted: (value: string) => string;
  text: (value: string) => string;
  bold: (value: string) => string;
  header: (title: string) => string;
  statusChip: (label: string, level: StatusLevel, detail?: string) => string;
  warnBlock: (message: string) => string;
  errorBlock: (message: string, suggestion?: string) => string;
};

export const createFormatter = (options?: FormatterOptions): Formatter => {
  const stream = options?.stream ?? process.stdout;
  const env = options?.env ?? process.env;
  const tty = Boolean(stream.isTTY);
  const colorEnabled = shouldUseColor(stream, env);

  const color = (key: ColorKey, value: string): string =>
    colorEnabled ? `${COLOR_CODES[key]}${value}${RESET}` : value;

  const width = Math.max(24, Math.min(stream.columns ?? 80, 78));

  return {
    isTTY: tty,
    accent: (value) => color("accent", value),
    muted: (value) => color("muted", value),
    text: (value) => value,
    bold: (value) => color("bold", value),
    header: (title) => (tty ? `${color("bold", color("brand", title))}\n${color("muted", "─".repeat(width))}` : title),
    statusChip: (label, level, detail) => {
      if (!tty) {
        return `${PLAIN_PREFIX[level]} ${label}${detail ? ` ${detail}` : ""}`;
      }
      return `${color(level, SYMBOL[level])} ${label}${detail ? ` ${color("muted", detail)}` : ""}`;
    },
    warnBlock: (message) => (tty ? `${color("warn", `${SYMBOL.warn} warn:`)} ${message}` : `warn: ${message}`),
    errorBlock: (message, suggestion) => {
      const first = tty ? `${color("error", `${SYMBOL.error} error:`)} ${message}` : `error: ${message}`;
      if (!suggestion) {
        return first;
      }
      return `${first}\n${tty ? color("muted", suggestion) : suggestion}`;
    }
  };
};

export const createStdoutFormatter = (): Formatter =>
  createFormatter({ stream: process.stdout, env: process.env });

export const createStderrFormatter = (): Formatter =>
  createFormatter({ stream: process.stderr, env: process.env });
