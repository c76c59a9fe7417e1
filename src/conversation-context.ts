/**
 * Conversation context: the immutable per-query state threaded through
 * rounds. Each completed round derives a new context; earlier contexts stay
 * valid and can be inspected or replayed.
 */
import type { Message, RoundRecord, ToolInvocationRequest, ToolResult } from "./types";

export interface ConversationContext<TRaw = unknown> {
  readonly originalQuery: string;
  readonly historySummary?: string;
  readonly roundsRemaining: number;
  readonly roundLog: readonly RoundRecord<TRaw>[];
}

export function createContext<TRaw = unknown>(
  originalQuery: string,
  historySummary: string | undefined,
  maxRounds: number,
): ConversationContext<TRaw> {
  if (!Number.isInteger(maxRounds) || maxRounds < 1) {
    throw new RangeError(`maxRounds must be a positive integer, got ${maxRounds}`);
  }
  return Object.freeze({
    originalQuery,
    ...(historySummary ? { historySummary } : {}),
    roundsRemaining: maxRounds,
    roundLog: Object.freeze([]),
  });
}

/** Freeze a completed round so later code cannot edit it in place. */
export function createRoundRecord<TRaw>(
  rawContent: TRaw,
  requests: readonly ToolInvocationRequest[],
  toolResults: readonly ToolResult[],
): RoundRecord<TRaw> {
  return Object.freeze({
    rawContent,
    requests: Object.freeze([...requests]),
    toolResults: Object.freeze(toolResults.map((r) => Object.freeze({ ...r }))),
  });
}

/**
 * Append a round and spend one unit of budget. A context with no rounds left
 * cannot be extended.
 */
export function deriveContext<TRaw>(
  context: ConversationContext<TRaw>,
  record: RoundRecord<TRaw>,
): ConversationContext<TRaw> {
  if (context.roundsRemaining <= 0) {
    throw new RangeError("Round budget exhausted; no further tool rounds may be recorded");
  }
  return Object.freeze({
    ...context,
    roundsRemaining: context.roundsRemaining - 1,
    roundLog: Object.freeze([...context.roundLog, record]),
  });
}

export function buildSystemContent(systemPrompt: string, historySummary?: string): string {
  if (!historySummary) return systemPrompt;
  const history = `Previous conversation:\n${historySummary}`;
  return systemPrompt ? `${systemPrompt}\n\n${history}` : history;
}

/**
 * Messages for the next model call: system prompt (with history), the query,
 * then each round's assistant turn followed by its tool results.
 */
export function buildMessages<TRaw>(
  context: ConversationContext<TRaw>,
  systemPrompt: string,
): Message<TRaw>[] {
  const messages: Message<TRaw>[] = [];

  const system = buildSystemContent(systemPrompt, context.historySummary);
  if (system) {
    messages.push({ role: "system", content: system });
  }

  messages.push({ role: "user", content: context.originalQuery });

  for (const round of context.roundLog) {
    messages.push({ role: "assistant", content: round.rawContent });
    messages.push({ role: "tool", results: round.toolResults });
  }

  return messages;
}
