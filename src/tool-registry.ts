import * as z from "zod";

import { DuplicateToolError, ToolExecutionError, UnknownToolError } from "./errors";
import type { ParameterDef, Source, ToolDefinition } from "./types";

/** What an executor hands back: plain text, or text plus attributions. */
export interface ToolOutput {
  content: string;
  sources?: Source[];
}

export interface ToolSpec<TArgs> {
  name: string;
  description: string;
  parameters: Record<string, ParameterDef>;
  inputSchema: z.ZodType<TArgs, z.ZodTypeDef, unknown>;
  execute(args: TArgs, signal?: AbortSignal): Promise<string | ToolOutput>;
}

/** Registry entry with its argument type erased behind validation. */
export interface ToolDescriptor {
  readonly definition: ToolDefinition;
  run(args: Record<string, unknown>, signal?: AbortSignal): Promise<ToolOutput>;
}

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.join(".");
  return path ? `${path}: ${issue.message}` : issue.message;
}

/**
 * Wrap a typed tool so the registry can hold it. Arguments are parsed with the
 * tool's zod schema before the executor sees them.
 */
export function defineTool<TArgs>(spec: ToolSpec<TArgs>): ToolDescriptor {
  const definition: ToolDefinition = Object.freeze({
    name: spec.name,
    description: spec.description,
    parameters: spec.parameters,
  });

  return Object.freeze({
    definition,
    async run(args: Record<string, unknown>, signal?: AbortSignal): Promise<ToolOutput> {
      const parsed = spec.inputSchema.safeParse(args);
      if (!parsed.success) {
        const details = parsed.error.issues.map(formatIssue).join("; ");
        throw new ToolExecutionError(
          spec.name,
          `Invalid arguments for ${spec.name}: ${details}`,
        );
      }
      const output = await spec.execute(parsed.data, signal);
      return typeof output === "string" ? { content: output } : output;
    },
  });
}

export class ToolRegistry {
  private tools = new Map<string, ToolDescriptor>();

  register(descriptor: ToolDescriptor): this {
    const name = descriptor.definition.name;
    if (this.tools.has(name)) {
      throw new DuplicateToolError(name);
    }
    this.tools.set(name, descriptor);
    return this;
  }

  lookup(name: string): ToolDescriptor {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new UnknownToolError(name);
    }
    return tool;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /** Definitions in registration order. Map iteration keeps insertion order. */
  exportDefinitions(): ToolDefinition[] {
    return [...this.tools.values()].map((t) => t.definition);
  }
}
