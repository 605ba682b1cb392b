import type { BenchConfig } from "../config/types.js";
import type { ConversationTurn, ToolCallRequest } from "../conversation/types.js";
import { fromOpenRouterToolCalls, toOpenRouterMessages } from "../conversation/messages.js";
import { TransportError } from "../core/errors.js";
import {
  OpenRouterError,
  abortedError,
  chatCompletion,
  isAbortError,
  type OpenRouterToolDeclaration,
  type RetryNotice,
  type TokenUsage
} from "../openrouter/client.js";
import { createRateLimiter, type RateLimiter } from "../openrouter/rate-limiter.js";

export type ModelRequest = {
  runId: string;
  systemPrompt: string;
  turns: readonly ConversationTurn[];
  tools: readonly OpenRouterToolDeclaration[];
  signal?: AbortSignal;
};

export type ModelReply = {
  text: string;
  toolCalls: ToolCallRequest[];
  usage: TokenUsage | null;
  retryCount: number;
};

/** The turn loop's view of the remote model. Failures surface as `TransportError`. */
export interface ModelClient {
  readonly modelName: string;
  complete(request: ModelRequest): Promise<ModelReply>;
}

export type OpenRouterModelClientOptions = {
  config: BenchConfig;
  apiKey?: string;
  limiter?: RateLimiter;
  onRetry?: (runId: string, notice: RetryNotice) => void;
};

export class OpenRouterModelClient implements ModelClient {
  readonly modelName: string;
  private readonly limiter: RateLimiter;

  constructor(private readonly options: OpenRouterModelClientOptions) {
    this.modelName = options.config.model.name;
    this.limiter = options.limiter ?? createRateLimiter(options.config.model.requests_per_second);
  }

  async complete(request: ModelRequest): Promise<ModelReply> {
    const { config } = this.options;
    try {
      await this.limiter.take(request.signal);
      const result = await chatCompletion({
        model: config.model.name,
        messages: toOpenRouterMessages(request.systemPrompt, request.turns),
        tools: [...request.tools],
        params: {
          max_tokens: config.model.max_tokens,
          ...(config.model.temperature !== undefined ? { temperature: config.model.temperature } : {})
        },
        options: {
          apiKey: this.options.apiKey,
          baseUrl: config.model.base_url,
          signal: request.signal,
          timeoutMs: config.loop.request_timeout_ms,
          retry: {
            maxRetries: config.retry.max_retries,
            backoffMs: config.retry.backoff_ms,
            maxBackoffMs: config.retry.max_backoff_ms,
            jitter: config.retry.jitter
          },
          onRetry: (notice) => this.options.onRetry?.(request.runId, notice)
        }
      });
      return {
        text: result.reply.content ?? "",
        toolCalls: fromOpenRouterToolCalls(result.reply.toolCalls),
        usage: result.usage,
        retryCount: result.retryCount
      };
    } catch (caught) {
      const error = isAbortError(caught) ? abortedError(0) : caught;
      if (error instanceof OpenRouterError) {
        throw new TransportError(error.message, {
          status: error.status,
          code: error.code,
          retryCount: error.retryCount,
          cause: error
        });
      }
      throw error;
    }
  }
}
