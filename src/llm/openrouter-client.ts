import OpenAI from "openai";
import type {
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from "openai/resources/chat/completions";
import { env, type AppConfig } from "../core/config";
import { logger } from "../core/logger";
import { LLMError } from "../core/errors";
import { retryWithBackoff } from "../core/retry";
import type { ChatMessage, ChatOptions, ChatReply, LLMClient, ToolDefinition } from "./contracts";

const DEFAULT_TIMEOUT_MS = 60000;
const DEFAULT_MAX_TOKENS = 2048;
const DEFAULT_TEMPERATURE = 0.2;

const TRANSIENT_CODES = new Set(["timeout", "network_error", "request_failed"]);

function isTransient(error: unknown): boolean {
  if (!(error instanceof LLMError)) return false;
  if (TRANSIENT_CODES.has(error.code)) return true;
  const status = /^api_error_(\d+)$/.exec(error.code)?.[1];
  return status !== undefined && (Number(status) >= 500 || Number(status) === 408);
}

function toWireMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
    case "user":
      return { role: message.role, content: message.content };
    case "tool":
      return { role: "tool", tool_call_id: message.toolCallId, content: message.content };
    case "assistant":
      if (message.toolCalls && message.toolCalls.length > 0) {
        return {
          role: "assistant",
          content: message.content,
          tool_calls: message.toolCalls.map((call) => ({
            id: call.id,
            type: "function" as const,
            function: { name: call.name, arguments: call.arguments },
          })),
        };
      }
      return { role: "assistant", content: message.content ?? "" };
  }
}

function toWireTool(tool: ToolDefinition): ChatCompletionTool {
  return {
    type: "function",
    function: { name: tool.name, description: tool.description, parameters: tool.parameters },
  };
}

export interface OpenRouterOptions {
  apiKey: string | null;
  baseUrl: string;
  model: string;
  referer: string;
  appTitle: string;
}

export class OpenRouterClient implements LLMClient {
  private client: OpenAI | null;

  constructor(private options: OpenRouterOptions) {
    // Direct commands work without a key, so a missing key only fails chat calls.
    this.client = options.apiKey
      ? new OpenAI({
          apiKey: options.apiKey,
          baseURL: options.baseUrl,
          maxRetries: 0,
          defaultHeaders: {
            "HTTP-Referer": options.referer,
            "X-Title": options.appTitle,
          },
        })
      : null;
  }

  static fromConfig(config: AppConfig = env): OpenRouterClient {
    return new OpenRouterClient({
      apiKey: config.OPENROUTER_API_KEY?.trim() || null,
      baseUrl: config.OPENROUTER_BASE_URL,
      model: config.OPENROUTER_CHAT_MODEL,
      referer: config.OPENROUTER_HTTP_REFERER,
      appTitle: config.OPENROUTER_APP_TITLE,
    });
  }

  async chat(messages: ChatMessage[], tools: ToolDefinition[], options: ChatOptions = {}): Promise<ChatReply> {
    const client = this.client;
    if (!client) {
      throw new LLMError("OPENROUTER_API_KEY is required for questions to the assistant", "config_missing_api_key");
    }

    return retryWithBackoff(
      () => this.makeRequest(client, messages, tools, options),
      {
        maxAttempts: 3,
        baseDelayMs: 1000,
        maxDelayMs: 10000,
        jitterMs: 500,
        shouldRetry: isTransient,
        signal: options.signal,
      },
      "llm_chat"
    );
  }

  private async makeRequest(
    client: OpenAI,
    messages: ChatMessage[],
    tools: ToolDefinition[],
    options: ChatOptions
  ): Promise<ChatReply> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
    const onAbort = () => controller.abort();
    options.signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const response = await client.chat.completions.create(
        {
          model: options.model ?? this.options.model,
          messages: messages.map(toWireMessage),
          ...(tools.length > 0 ? { tools: tools.map(toWireTool), tool_choice: "auto" as const } : {}),
          temperature: options.temperature ?? DEFAULT_TEMPERATURE,
          max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
        },
        { signal: controller.signal }
      );

      const message = response.choices[0]?.message;
      if (!message) {
        throw new LLMError("No choices in response", "empty_response");
      }

      const toolCalls = (message.tool_calls ?? []).map((call) => ({
        id: call.id,
        name: call.function.name,
        arguments: call.function.arguments,
      }));
      return { content: message.content ?? null, toolCalls };
    } catch (error) {
      if (error instanceof LLMError) {
        throw error;
      }
      if (options.signal?.aborted) {
        throw new LLMError("Request cancelled", "cancelled");
      }
      if (error instanceof OpenAI.APIUserAbortError || (error instanceof Error && error.name === "AbortError")) {
        throw new LLMError("Request timed out", "timeout");
      }
      if (error instanceof OpenAI.APIConnectionError) {
        throw new LLMError(`OpenRouter connection failed: ${error.message}`, "network_error");
      }
      if (error instanceof OpenAI.APIError) {
        logger.error({ status: error.status, message: error.message }, "OpenRouter API error");
        throw new LLMError(`OpenRouter API error: ${error.status}`, `api_error_${error.status}`);
      }
      const message = error instanceof Error ? error.message : "Unknown error";
      throw new LLMError(`Request failed: ${message}`, "request_failed");
    } finally {
      clearTimeout(timeoutId);
      options.signal?.removeEventListener("abort", onAbort);
    }
  }
}
