import { setTimeout as delay } from "node:timers/promises";

export type OpenRouterToolCall = {
  id: string;
  type: "function";
  function: {
    name: string;
    arguments: string;
  };
};

export type OpenRouterMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | { role: "assistant"; content: string | null; tool_calls?: OpenRouterToolCall[] }
  | { role: "tool"; tool_call_id: string; content: string };

export type OpenRouterToolDeclaration = {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
};

export type ChatCompletionParams = {
  temperature?: number;
  max_tokens?: number;
};

export type TokenUsage = {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
  cost?: number;
};

export type RetryNotice = {
  attempt: number;
  delayMs: number;
  status?: number;
  reason: string;
};

/**
 * `equal` keeps half of each step fixed, so successive retries never wait
 * less than the one before while the cap is not reached; `full` spreads
 * each wait over [0.5, 1.5) of the step.
 */
export type RetryJitter = "none" | "equal" | "full";

export interface OpenRouterRequestOptions {
  apiKey?: string;
  baseUrl?: string;
  signal?: AbortSignal;
  timeoutMs?: number;
  retry?: {
    maxRetries: number;
    backoffMs: number;
    maxBackoffMs?: number;
    jitter?: RetryJitter;
  };
  onRetry?: (notice: RetryNotice) => void;
}

export type AssistantReply = {
  content: string | null;
  toolCalls: OpenRouterToolCall[];
  finishReason: string | null;
};

export interface ChatCompletionResult {
  requestPayload: Record<string, unknown>;
  responseBody: unknown;
  headers: Record<string, string>;
  latencyMs: number;
  retryCount: number;
  model: string | null;
  responseId: string | null;
  usage: TokenUsage | null;
  reply: AssistantReply;
}

export class OpenRouterError extends Error {
  status?: number;
  code?: string;
  retryable: boolean;
  modelUnavailable: boolean;
  responseBody?: unknown;
  headers?: Record<string, string>;
  latencyMs?: number;
  retryCount: number;

  constructor(message: string, options: {
    status?: number;
    code?: string;
    retryable: boolean;
    modelUnavailable: boolean;
    responseBody?: unknown;
    headers?: Record<string, string>;
    latencyMs?: number;
    retryCount: number;
  }) {
    super(message);
    this.name = "OpenRouterError";
    this.status = options.status;
    this.code = options.code;
    this.retryable = options.retryable;
    this.modelUnavailable = options.modelUnavailable;
    this.responseBody = options.responseBody;
    this.headers = options.headers;
    this.latencyMs = options.latencyMs;
    this.retryCount = options.retryCount;
  }
}

const DEFAULT_BASE_URL = "https://openrouter.ai/api/v1";

const resolveBaseUrl = (baseUrl?: string): string =>
  (baseUrl ?? process.env.OPENROUTER_BASE_URL ?? DEFAULT_BASE_URL).replace(/\/$/, "");

const resolveApiKey = (apiKey?: string): string | undefined =>
  apiKey ?? process.env.OPENROUTER_API_KEY;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const toHeaderRecord = (headers: Headers): Record<string, string> => {
  const record: Record<string, string> = {};
  headers.forEach((value, key) => {
    record[key.toLowerCase()] = value;
  });
  return record;
};

const parseJsonBody = async (response: Response): Promise<unknown> => {
  const text = await response.text();
  if (!text) {
    return null;
  }
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return text;
  }
};

const readString = (body: unknown, key: string): string | null => {
  if (!isRecord(body)) {
    return null;
  }
  const value = body[key];
  return typeof value === "string" ? value : null;
};

const toNumber = (value: unknown): number | null =>
  typeof value === "number" && Number.isFinite(value) ? value : null;

const extractUsageFromBody = (body: unknown): TokenUsage | null => {
  if (!isRecord(body) || !isRecord(body.usage)) {
    return null;
  }
  const usage = body.usage;
  const prompt = toNumber(usage.prompt_tokens);
  const completion = toNumber(usage.completion_tokens);
  const total = toNumber(usage.total_tokens);
  const cost = toNumber(usage.cost ?? usage.total_cost);

  if (prompt === null && completion === null && total === null && cost === null) {
    return null;
  }

  const normalizedPrompt = prompt ?? 0;
  const normalizedCompletion = completion ?? 0;

  return {
    prompt_tokens: normalizedPrompt,
    completion_tokens: normalizedCompletion,
    total_tokens: total ?? normalizedPrompt + normalizedCompletion,
    ...(cost !== null ? { cost } : {})
  };
};

const parseToolCall = (raw: unknown, index: number): OpenRouterToolCall | null => {
  if (!isRecord(raw) || !isRecord(raw.function)) {
    return null;
  }
  const name = raw.function.name;
  if (typeof name !== "string" || name.length === 0) {
    return null;
  }
  const rawArguments = raw.function.arguments;
  const args =
    typeof rawArguments === "string"
      ? rawArguments
      : rawArguments === undefined
        ? "{}"
        : JSON.stringify(rawArguments);
  const id = typeof raw.id === "string" && raw.id.length > 0 ? raw.id : `call_${index}`;
  return { id, type: "function", function: { name, arguments: args } };
};

/**
 * Reads the first choice of a chat-completions body. Malformed tool calls are
 * dropped; a body without choices is an error.
 */
export const extractAssistantReply = (body: unknown): AssistantReply => {
  const choices = isRecord(body) ? body.choices : undefined;
  if (!Array.isArray(choices) || choices.length === 0 || !isRecord(choices[0])) {
    throw new OpenRouterError("OpenRouter response has no choices", {
      retryable: false,
      modelUnavailable: false,
      responseBody: body,
      retryCount: 0
    });
  }
  const choice = choices[0];
  const message = isRecord(choice.message) ? choice.message : {};
  const content = typeof message.content === "string" ? message.content : null;
  const rawCalls = Array.isArray(message.tool_calls) ? message.tool_calls : [];
  const toolCalls = rawCalls
    .map((call, index) => parseToolCall(call, index))
    .filter((call): call is OpenRouterToolCall => call !== null);

  return {
    content,
    toolCalls,
    finishReason: typeof choice.finish_reason === "string" ? choice.finish_reason : null
  };
};

const classifyError = (
  status: number | undefined,
  body: unknown
): { retryable: boolean; modelUnavailable: boolean; code?: string; message?: string } => {
  let code: string | undefined;
  let message: string | undefined;

  if (isRecord(body) && isRecord(body.error)) {
    const rawCode = body.error.code;
    code = typeof rawCode === "string" ? rawCode : typeof rawCode === "number" ? String(rawCode) : undefined;
    message = typeof body.error.message === "string" ? body.error.message : undefined;
  }

  const statusRetryable = status === 429 || (status !== undefined && status >= 500);
  const modelUnavailable =
    status === 404 ||
    code === "model_not_found" ||
    code === "model_not_available" ||
    code === "model_unavailable";

  return {
    retryable: statusRetryable,
    modelUnavailable,
    code,
    message
  };
};

export const parseRetryAfterMs = (headers: Record<string, string>): number | null => {
  const raw = headers["retry-after"];
  if (!raw) {
    return null;
  }
  const numericSeconds = Number(raw);
  if (Number.isFinite(numericSeconds) && numericSeconds >= 0) {
    return Math.round(numericSeconds * 1000);
  }
  const asDate = Date.parse(raw);
  if (Number.isNaN(asDate)) {
    return null;
  }
  return Math.max(0, asDate - Date.now());
};

export const computeBackoffMs = (
  retry: { backoffMs: number; maxBackoffMs?: number; jitter?: RetryJitter },
  attempt: number
): number => {
  if (retry.backoffMs <= 0) {
    return 0;
  }
  const maxBackoffMs = retry.maxBackoffMs ?? 30_000;
  const exponential = retry.backoffMs * Math.pow(2, Math.max(0, attempt - 1));
  const capped = Math.min(maxBackoffMs, exponential);
  const jitter = retry.jitter ?? "equal";
  if (jitter === "none") {
    return capped;
  }
  if (jitter === "equal") {
    return Math.floor(capped / 2 + (Math.random() * capped) / 2);
  }
  return Math.max(0, Math.round(capped * (0.5 + Math.random())));
};

export const isAbortError = (error: unknown): boolean =>
  error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");

const fetchWithTimeout = async (
  url: string,
  init: RequestInit,
  timeoutMs: number | undefined,
  outer: AbortSignal | undefined
): Promise<Response> => {
  if (timeoutMs === undefined) {
    return fetch(url, { ...init, signal: outer });
  }
  const controller = new AbortController();
  let expired = false;
  const timer = setTimeout(() => {
    expired = true;
    controller.abort();
  }, timeoutMs);
  const forwardAbort = (): void => controller.abort();
  outer?.addEventListener("abort", forwardAbort, { once: true });
  try {
    return await fetch(url, { ...init, signal: controller.signal });
  } catch (error) {
    if (expired) {
      throw new OpenRouterError(`OpenRouter request timed out after ${timeoutMs}ms`, {
        code: "timeout",
        retryable: true,
        modelUnavailable: false,
        retryCount: 0
      });
    }
    throw error;
  } finally {
    clearTimeout(timer);
    outer?.removeEventListener("abort", forwardAbort);
  }
};

export const abortedError = (retryCount: number): OpenRouterError =>
  new OpenRouterError("OpenRouter request aborted", {
    code: "aborted",
    retryable: false,
    modelUnavailable: false,
    retryCount
  });

const requestWithRetry = async (
  path: string,
  requestPayload: Record<string, unknown>,
  options: OpenRouterRequestOptions
): Promise<{
  responseBody: unknown;
  headers: Record<string, string>;
  latencyMs: number;
  retryCount: number;
}> => {
  const apiKey = resolveApiKey(options.apiKey);
  if (!apiKey) {
    throw new OpenRouterError("OPENROUTER_API_KEY is required", {
      retryable: false,
      modelUnavailable: false,
      retryCount: 0
    });
  }
  const baseUrl = resolveBaseUrl(options.baseUrl);
  const retry = options.retry ?? { maxRetries: 0, backoffMs: 0 };
  let attempt = 0;
  const waitBackoff = async (
    reason: string,
    status?: number,
    retryAfterMs: number | null = null
  ): Promise<void> => {
    const computedBackoffMs = computeBackoffMs(retry, attempt);
    const effectiveBackoffMs =
      retryAfterMs !== null ? Math.max(computedBackoffMs, retryAfterMs) : computedBackoffMs;
    options.onRetry?.({ attempt, delayMs: effectiveBackoffMs, status, reason });
    if (effectiveBackoffMs <= 0) {
      return;
    }
    try {
      await delay(
        effectiveBackoffMs,
        undefined,
        options.signal ? { signal: options.signal } : undefined
      );
    } catch (error) {
      if (isAbortError(error)) {
        throw abortedError(attempt);
      }
      throw error;
    }
  };

  while (true) {
    const started = Date.now();
    try {
      const response = await fetchWithTimeout(
        `${baseUrl}${path}`,
        {
          method: "POST",
          headers: {
            Authorization: `Bearer ${apiKey}`,
            "Content-Type": "application/json"
          },
          body: JSON.stringify(requestPayload)
        },
        options.timeoutMs,
        options.signal
      );
      const latencyMs = Date.now() - started;
      const responseBody = await parseJsonBody(response);
      const headers = toHeaderRecord(response.headers);

      if (response.ok) {
        return {
          responseBody,
          headers,
          latencyMs,
          retryCount: attempt
        };
      }

      const classification = classifyError(response.status, responseBody);
      if (classification.retryable && attempt < retry.maxRetries) {
        attempt += 1;
        await waitBackoff(
          classification.message ?? `status ${response.status}`,
          response.status,
          parseRetryAfterMs(headers)
        );
        continue;
      }

      throw new OpenRouterError(
        classification.message ?? `OpenRouter request failed with status ${response.status}`,
        {
          status: response.status,
          code: classification.code,
          retryable: classification.retryable,
          modelUnavailable: classification.modelUnavailable,
          responseBody,
          headers,
          latencyMs,
          retryCount: attempt
        }
      );
    } catch (error) {
      if (error instanceof OpenRouterError) {
        if (error.code === "timeout" && attempt < retry.maxRetries) {
          attempt += 1;
          await waitBackoff(error.message);
          continue;
        }
        error.retryCount = attempt;
        throw error;
      }
      if (isAbortError(error) || options.signal?.aborted) {
        throw abortedError(attempt);
      }
      const message = error instanceof Error ? error.message : String(error);
      if (attempt < retry.maxRetries) {
        attempt += 1;
        await waitBackoff(message);
        continue;
      }
      throw new OpenRouterError(`OpenRouter request failed: ${message}`, {
        retryable: false,
        modelUnavailable: false,
        retryCount: attempt
      });
    }
  }
};

const cleanParams = (params?: ChatCompletionParams): Record<string, number> => {
  const cleaned: Record<string, number> = {};
  if (!params) {
    return cleaned;
  }
  if (params.temperature !== undefined) cleaned.temperature = params.temperature;
  if (params.max_tokens !== undefined) cleaned.max_tokens = params.max_tokens;
  return cleaned;
};

export const chatCompletion = async (input: {
  model: string;
  messages: OpenRouterMessage[];
  tools?: OpenRouterToolDeclaration[];
  params?: ChatCompletionParams;
  options?: OpenRouterRequestOptions;
}): Promise<ChatCompletionResult> => {
  const requestPayload: Record<string, unknown> = {
    model: input.model,
    messages: input.messages,
    ...(input.tools && input.tools.length > 0 ? { tools: input.tools, tool_choice: "auto" } : {}),
    ...cleanParams(input.params)
  };

  const result = await requestWithRetry("/chat/completions", requestPayload, input.options ?? {});

  // Some providers report failures inside a 200 body.
  if (isRecord(result.responseBody) && isRecord(result.responseBody.error)) {
    const classification = classifyError(undefined, result.responseBody);
    throw new OpenRouterError(classification.message ?? "OpenRouter returned an error body", {
      code: classification.code,
      retryable: false,
      modelUnavailable: classification.modelUnavailable,
      responseBody: result.responseBody,
      headers: result.headers,
      latencyMs: result.latencyMs,
      retryCount: result.retryCount
    });
  }

  return {
    requestPayload,
    responseBody: result.responseBody,
    headers: result.headers,
    latencyMs: result.latencyMs,
    retryCount: result.retryCount,
    model: readString(result.responseBody, "model"),
    responseId: readString(result.responseBody, "id"),
    usage: extractUsageFromBody(result.responseBody),
    reply: extractAssistantReply(result.responseBody)
  };
};
