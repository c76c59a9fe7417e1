import Anthropic from "@anthropic-ai/sdk";

import { ModelCommunicationError } from "../errors";
import type {
  Message,
  ModelClient,
  ModelRequest,
  ModelResponse,
  TokenUsage,
  ToolDefinition,
  ToolInvocationRequest,
} from "../types";

/** The assistant turn, kept in request form so it can be replayed verbatim. */
export type AnthropicContent = Anthropic.ContentBlockParam[];

/** The parts of an API reply we read. Anthropic.Message satisfies it. */
export interface AnthropicReply {
  content: readonly {
    type: string;
    text?: string;
    id?: string;
    name?: string;
    input?: unknown;
  }[];
  usage?: { input_tokens: number; output_tokens: number };
}

export interface MessagesClient {
  messages: {
    create(
      params: Anthropic.MessageCreateParamsNonStreaming,
      options?: { signal?: AbortSignal },
    ): Promise<AnthropicReply>;
  };
}

export interface AnthropicConfig {
  apiKey: string;
  model?: string;
  temperature?: number;
  /** Replaces the SDK client; used by tests */
  client?: MessagesClient;
}

export const DEFAULT_ANTHROPIC_MODEL = "claude-sonnet-4-20250514";

/** Extract the system message content from the message array, if present. */
export function extractSystemMessage(messages: Message<AnthropicContent>[]): string | undefined {
  for (const m of messages) {
    if (m.role === "system") return m.content;
  }
  return undefined;
}

/** Translate our generic Message[] to Anthropic's message format. */
export function translateMessages(
  messages: Message<AnthropicContent>[],
): Anthropic.MessageParam[] {
  const result: Anthropic.MessageParam[] = [];

  for (const msg of messages) {
    switch (msg.role) {
      case "system":
        break;
      case "user":
        result.push({ role: "user", content: msg.content });
        break;
      case "assistant":
        // Replayed exactly as the previous reply produced it
        result.push({ role: "assistant", content: msg.content });
        break;
      case "tool":
        // All results of one round go back in a single user turn
        result.push({
          role: "user",
          content: msg.results.map((r) => ({
            type: "tool_result" as const,
            tool_use_id: r.invocationId,
            content: r.content,
            ...(r.succeeded ? {} : { is_error: true }),
          })),
        });
        break;
    }
  }

  return result;
}

/** Translate our generic ToolDefinition[] to Anthropic's tool format. */
export function translateTools(tools: ToolDefinition[]): Anthropic.Tool[] {
  return tools.map((t) => {
    const properties: Record<string, { type: string; description: string }> = {};
    const required: string[] = [];

    for (const [name, def] of Object.entries(t.parameters)) {
      properties[name] = { type: def.type, description: def.description };
      if (def.required) {
        required.push(name);
      }
    }

    return {
      name: t.name,
      description: t.description,
      input_schema: {
        type: "object" as const,
        properties,
        required,
      },
    };
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Map an Anthropic API reply to our tagged ModelResponse. */
export function mapResponse(response: AnthropicReply): ModelResponse<AnthropicContent> {
  const texts: string[] = [];
  const rawContent: AnthropicContent = [];
  const invocations: ToolInvocationRequest[] = [];

  for (const block of response.content) {
    if (block.type === "text" && typeof block.text === "string") {
      texts.push(block.text);
      rawContent.push({ type: "text", text: block.text });
    } else if (
      block.type === "tool_use" &&
      typeof block.id === "string" &&
      typeof block.name === "string"
    ) {
      const args = isRecord(block.input) ? block.input : {};
      invocations.push({ id: block.id, toolName: block.name, args });
      rawContent.push({ type: "tool_use", id: block.id, name: block.name, input: args });
    }
    // Skip thinking blocks and other unknown types
  }

  const text = texts.join("\n");
  const usage: TokenUsage | undefined = response.usage
    ? {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens,
      }
    : undefined;

  if (invocations.length === 0) {
    return { kind: "final", text, ...(usage ? { usage } : {}) };
  }

  return {
    kind: "toolRequest",
    invocations,
    rawContent,
    ...(text ? { text } : {}),
    ...(usage ? { usage } : {}),
  };
}

export class AnthropicModelClient implements ModelClient<AnthropicContent> {
  private client: MessagesClient;
  private model: string;
  private temperature: number;

  constructor(config: AnthropicConfig) {
    this.client = config.client ?? new Anthropic({ apiKey: config.apiKey });
    this.model = config.model ?? DEFAULT_ANTHROPIC_MODEL;
    this.temperature = config.temperature ?? 0;
  }

  async send(request: ModelRequest<AnthropicContent>): Promise<ModelResponse<AnthropicContent>> {
    const system = extractSystemMessage(request.messages);

    const params: Anthropic.MessageCreateParamsNonStreaming = {
      model: this.model,
      max_tokens: request.maxOutputTokens,
      temperature: this.temperature,
      messages: translateMessages(request.messages),
    };

    if (system) {
      params.system = system;
    }

    // An empty list means tools are withheld: the parameter is left out entirely.
    if (request.tools.length > 0) {
      params.tools = translateTools(request.tools);
      params.tool_choice = { type: "auto" };
    }

    let reply: AnthropicReply;
    try {
      reply = await this.client.messages.create(
        params,
        request.signal ? { signal: request.signal } : undefined,
      );
    } catch (err) {
      if (err instanceof Anthropic.APIError) {
        throw new ModelCommunicationError(
          `Anthropic API error: ${err.message}`,
          typeof err.status === "number" ? err.status : undefined,
          { cause: err },
        );
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new ModelCommunicationError(`Anthropic request failed: ${message}`, undefined, {
        cause: err,
      });
    }

    return mapResponse(reply);
  }
}
