// Shared types for the course question-answering core.
// The round controller, dispatcher and model clients all speak these shapes.

// --- Tool invocation types ---

/** A single tool call requested by the model. `id` is unique within a round. */
export interface ToolInvocationRequest {
  id: string;
  toolName: string;
  args: Record<string, unknown>;
}

/** Attribution for a piece of course material that backed an answer. */
export interface Source {
  displayText: string;
  link?: string;
}

export interface ToolResult {
  invocationId: string;
  /** Success payload, or human-readable error text when `succeeded` is false */
  content: string;
  succeeded: boolean;
  /** Present only when the tool tagged its output as attribution-bearing */
  sources?: Source[];
}

// --- Tool definition types (advertised to the model) ---

export interface ParameterDef {
  type: "string" | "integer" | "number" | "boolean";
  description: string;
  required?: boolean;
}

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: Record<string, ParameterDef>;
}

// --- Conversation types ---

export interface RoundRecord<TRaw = unknown> {
  /** Assistant turn exactly as the model client produced it */
  readonly rawContent: TRaw;
  readonly requests: readonly ToolInvocationRequest[];
  readonly toolResults: readonly ToolResult[];
}

/**
 * Messages handed to a model client. `assistant` messages carry the client's
 * own opaque content back to it unchanged.
 */
export type Message<TRaw = unknown> =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | { role: "assistant"; content: TRaw }
  | { role: "tool"; results: readonly ToolResult[] };

// --- Model client types ---

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export type ModelResponse<TRaw = unknown> =
  | { kind: "final"; text: string; usage?: TokenUsage }
  | {
      kind: "toolRequest";
      invocations: ToolInvocationRequest[];
      rawContent: TRaw;
      /** Any text the model emitted alongside its tool calls */
      text?: string;
      usage?: TokenUsage;
    };

export interface ModelRequest<TRaw = unknown> {
  messages: Message<TRaw>[];
  tools: ToolDefinition[];
  maxOutputTokens: number;
  signal?: AbortSignal;
}

export interface ModelClient<TRaw = unknown> {
  /** Rejects with ModelCommunicationError on transport or auth failure. */
  send(request: ModelRequest<TRaw>): Promise<ModelResponse<TRaw>>;
}

// --- Results ---

export interface Ok<T> {
  ok: true;
  value: T;
}

export interface Err<E> {
  ok: false;
  error: E;
}

export type Result<T, E> = Ok<T> | Err<E>;

export interface Answer {
  text: string;
  sources: Source[];
}
