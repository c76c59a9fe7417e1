// Tool Dispatcher: runs one round's tool invocations against the registry.
// Stateless: one instance is shared by every query.

import { describeError, UnknownToolError } from "./errors";
import type { ToolRegistry } from "./tool-registry";
import type { ToolInvocationRequest, ToolResult } from "./types";

export interface DispatchHooks {
  onToolStart?: (request: ToolInvocationRequest) => void;
  onToolResult?: (request: ToolInvocationRequest, result: ToolResult) => void;
}

export class ToolDispatcher {
  constructor(private registry: ToolRegistry) {}

  /**
   * Execute every request concurrently. Never rejects: unknown tools and
   * executor failures become `succeeded: false` results. `result[i]` always
   * answers `requests[i]`.
   */
  async executeAll(
    requests: readonly ToolInvocationRequest[],
    signal?: AbortSignal,
    hooks: DispatchHooks = {},
  ): Promise<ToolResult[]> {
    return Promise.all(
      requests.map(async (request) => {
        notify(() => hooks.onToolStart?.(request));
        const result = await this.executeOne(request, signal);
        notify(() => hooks.onToolResult?.(request, result));
        return result;
      }),
    );
  }

  private async executeOne(
    request: ToolInvocationRequest,
    signal?: AbortSignal,
  ): Promise<ToolResult> {
    if (!this.registry.has(request.toolName)) {
      return {
        invocationId: request.id,
        content: `Error: ${new UnknownToolError(request.toolName).message}`,
        succeeded: false,
      };
    }

    try {
      const output = await this.registry.lookup(request.toolName).run(request.args, signal);
      const result: ToolResult = {
        invocationId: request.id,
        content: output.content,
        succeeded: true,
      };
      if (output.sources && output.sources.length > 0) {
        result.sources = output.sources;
      }
      return result;
    } catch (err) {
      return {
        invocationId: request.id,
        content: `Error: ${describeError(err)}`,
        succeeded: false,
      };
    }
  }
}

/** Observer callbacks are display-only; a throwing hook must not fail the tool. */
function notify(fn: () => void): void {
  try {
    fn();
  } catch {
    // Display errors never affect dispatch.
  }
}
