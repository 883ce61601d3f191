export interface ToolCall {
  id: string;
  name: string;
  /** Raw JSON text as produced by the model. */
  arguments: string;
}

export type ChatMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | { role: "assistant"; content: string | null; toolCalls?: ToolCall[] }
  | { role: "tool"; toolCallId: string; content: string };

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export interface ChatOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface ChatReply {
  content: string | null;
  toolCalls: ToolCall[];
}

export interface LLMClient {
  chat(messages: ChatMessage[], tools: ToolDefinition[], options?: ChatOptions): Promise<ChatReply>;
}
