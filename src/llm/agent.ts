import { env } from "../core/config";
import { logger } from "../core/logger";
import type { Operations } from "../orchestration/operations";
import type { ChatMessage, LLMClient } from "./contracts";
import { buildSessionContextMessage, buildSystemPrompt } from "./prompts/system";
import { executeTool, toolDefinitions } from "./tools";

export const HISTORY_TURNS = 8;

export const STEP_LIMIT_MESSAGE =
  "Could not complete the request within the tool-step limit. Please clarify the request or share a valid profile/reel link or username.";

const EMPTY_ANSWER_MESSAGE = "The assistant returned no answer. Please rephrase the question.";

export interface AgentTurnOptions {
  llm: LLMClient;
  ops: Operations;
  maxSteps?: number;
  signal?: AbortSignal;
}

export interface AgentToolTrace {
  name: string;
  ok: boolean;
  error?: string;
}

export interface AgentTurnResult {
  answer: string;
  steps: number;
  tools: AgentToolTrace[];
  hitStepLimit: boolean;
}

/**
 * Runs one question through the tool-calling loop. Tool calls of a reply are
 * executed one at a time in the order the model listed them; the session
 * context message is rebuilt before every model call.
 */
export async function runAgentTurn(question: string, options: AgentTurnOptions): Promise<AgentTurnResult> {
  const { llm, ops, signal } = options;
  const context = ops.context;
  const maxSteps = Math.max(1, options.maxSteps ?? env.AGENT_MAX_STEPS);
  const tools = toolDefinitions();

  const conversation: ChatMessage[] = [
    ...context.recentHistory(HISTORY_TURNS).map((turn) => ({ role: turn.role, content: turn.content })),
    { role: "user", content: question },
  ];
  const trace: AgentToolTrace[] = [];

  const finish = (answer: string, steps: number, hitStepLimit: boolean): AgentTurnResult => {
    context.appendHistory("user", question);
    context.appendHistory("assistant", answer);
    return { answer, steps, tools: trace, hitStepLimit };
  };

  for (let step = 1; step <= maxSteps; step++) {
    const messages: ChatMessage[] = [
      { role: "system", content: buildSystemPrompt() },
      { role: "system", content: buildSessionContextMessage(context.toAgentContext()) },
      ...conversation,
    ];

    const reply = await llm.chat(messages, tools, { model: context.currentModel, signal });

    if (reply.toolCalls.length === 0) {
      return finish(reply.content?.trim() || EMPTY_ANSWER_MESSAGE, step, false);
    }

    conversation.push({ role: "assistant", content: reply.content, toolCalls: reply.toolCalls });
    for (const call of reply.toolCalls) {
      const outcome = await executeTool(call.name, call.arguments, { ops, signal });
      logger.debug({ step, tool: call.name, ok: outcome.ok }, "Tool executed");
      trace.push(outcome.ok ? { name: call.name, ok: true } : { name: call.name, ok: false, error: outcome.error });
      conversation.push({ role: "tool", toolCallId: call.id, content: JSON.stringify(outcome) });
    }
  }

  logger.info({ maxSteps, tools: trace.length }, "Agent stopped at the step limit");
  return finish(STEP_LIMIT_MESSAGE, maxSteps, true);
}
