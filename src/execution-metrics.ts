// Execution metrics: token tracking and wall-clock timing for model calls
// and tool invocations. The clock is injectable.
// The activity reporter consumes these values to produce formatted output.

import type { TokenUsage } from "./types";

type ClockFn = () => number;

export class ExecutionMetrics {
  private clock: ClockFn;

  private cumulative: TokenUsage = { inputTokens: 0, outputTokens: 0, totalTokens: 0 };

  private callStartTime: number | undefined;

  // Tool calls run concurrently within a round, so they are keyed by id
  private toolCallStarts = new Map<string, number>();

  constructor(clock: ClockFn = performance.now.bind(performance)) {
    this.clock = clock;
  }

  // ── Token tracking ──────────────────────────────────────────────────────

  recordUsage(usage: TokenUsage | undefined): void {
    if (!usage) return;

    this.cumulative.inputTokens += usage.inputTokens;
    this.cumulative.outputTokens += usage.outputTokens;
    this.cumulative.totalTokens += usage.totalTokens;
  }

  getCumulativeUsage(): TokenUsage {
    return { ...this.cumulative };
  }

  // ── Model call timing ───────────────────────────────────────────────────

  startModelCall(): void {
    this.callStartTime = this.clock();
  }

  endModelCall(): number {
    if (this.callStartTime === undefined) return 0;
    const duration = this.clock() - this.callStartTime;
    this.callStartTime = undefined;
    return duration;
  }

  // ── Tool call timing ────────────────────────────────────────────────────

  startToolCall(id: string): void {
    this.toolCallStarts.set(id, this.clock());
  }

  endToolCall(id: string): number {
    const start = this.toolCallStarts.get(id);
    if (start === undefined) return 0;
    this.toolCallStarts.delete(id);
    return this.clock() - start;
  }
}
