import { describe, test, expect } from "vitest";
import { Writable } from "node:stream";
import figures from "figures";

import { createActivityReporter, summarizeToolCall } from "./activity-reporter";
import { DeadlineExceededError } from "./errors";
import { ExecutionMetrics } from "./execution-metrics";
import { stripAnsi, type ActivitySpinner } from "./terminal-formatting";
import type { ToolInvocationRequest } from "./types";

// ── Test helpers ────────────────────────────────────────────────────────────

/** Capture all writes to a writable stream as a single string. */
function createCapture(): { stream: Writable; output: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, output: () => stripAnsi(chunks.join("")) };
}

function makeClock() {
  let now = 0;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

function fakeSpinner() {
  const calls: string[] = [];
  const spinner: ActivitySpinner = {
    start: (text) => calls.push(`start:${text}`),
    update: (text) => calls.push(`update:${text}`),
    stop: () => calls.push("stop"),
    withPause: (fn) => {
      calls.push("pause");
      fn();
    },
  };
  return { spinner, calls };
}

const searchCall: ToolInvocationRequest = {
  id: "t1",
  toolName: "search_course_content",
  args: { query: "recursion" },
};

// ── summarizeToolCall ───────────────────────────────────────────────────────

describe("summarizeToolCall", () => {
  test("quotes the search query", () => {
    expect(stripAnsi(summarizeToolCall(searchCall))).toBe('search_course_content "recursion"');
  });

  test("shows the course title for outlines", () => {
    const call = { id: "t2", toolName: "get_course_outline", args: { course_title: "MCP" } };
    expect(stripAnsi(summarizeToolCall(call))).toBe("get_course_outline MCP");
  });

  test("falls back to the bare name", () => {
    expect(summarizeToolCall({ id: "t3", toolName: "other", args: { n: 1 } })).toBe("other");
  });
});

// ── createActivityReporter ──────────────────────────────────────────────────

describe("createActivityReporter", () => {
  test("prints token usage with cumulative totals and call duration", () => {
    const { stream, output } = createCapture();
    const clock = makeClock();
    const reporter = createActivityReporter({
      output: stream,
      verbose: false,
      metrics: new ExecutionMetrics(clock.now),
    });

    reporter.onModelCall?.(1, false);
    clock.advance(1500);
    reporter.onModelResponse?.(1, {
      kind: "final",
      text: "answer",
      usage: { inputTokens: 1000, outputTokens: 200, totalTokens: 1200 },
    });
    reporter.onModelCall?.(2, false);
    reporter.onModelResponse?.(2, {
      kind: "final",
      text: "answer",
      usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15 },
    });

    expect(output()).toBe(
      "  tokens: 1,000 in / 200 out / 1,200 total | cumulative: 1,200 | 1.5s\n" +
        "  tokens: 10 in / 5 out / 15 total | cumulative: 1,215\n",
    );
  });

  test("prints tool start and finish lines with durations", () => {
    const { stream, output } = createCapture();
    const clock = makeClock();
    const reporter = createActivityReporter({
      output: stream,
      verbose: false,
      metrics: new ExecutionMetrics(clock.now),
    });

    reporter.onToolStart?.(searchCall);
    clock.advance(250);
    reporter.onToolResult?.(searchCall, { invocationId: "t1", content: "hits", succeeded: true });

    expect(output()).toBe(
      `  ${figures.pointer} search_course_content "recursion"\n` +
        `  ${figures.tick} search_course_content 250ms\n`,
    );
  });

  test("prints the first line of a failing result", () => {
    const { stream, output } = createCapture();
    const reporter = createActivityReporter({ output: stream, verbose: false });
    const call = { id: "t2", toolName: "get_course_outline", args: {} };

    reporter.onToolResult?.(call, {
      invocationId: "t2",
      content: "Error: store offline\ntrace",
      succeeded: false,
    });

    expect(output()).toBe(`  ${figures.cross} get_course_outline store offline\n`);
  });

  test("warns when the forced final call starts", () => {
    const { stream, output } = createCapture();
    const reporter = createActivityReporter({ output: stream, verbose: false });

    reporter.onModelCall?.(1, false);
    reporter.onModelCall?.(3, true);

    expect(output()).toBe(`  ${figures.warning} round budget spent, asking for a final answer\n`);
  });

  test("adds argument, result and summary detail in verbose mode", () => {
    const { stream, output } = createCapture();
    const reporter = createActivityReporter({ output: stream, verbose: true });

    reporter.onModelCall?.(1, false);
    reporter.onModelResponse?.(1, {
      kind: "toolRequest",
      invocations: [searchCall],
      rawContent: [],
    });
    reporter.onToolStart?.(searchCall);
    reporter.onToolResult?.(searchCall, { invocationId: "t1", content: "hits", succeeded: true });
    reporter.onTerminated?.({
      answer: { text: "a", sources: [{ displayText: "Course A" }] },
      forced: false,
      roundsExecuted: 1,
      modelCalls: 2,
    });

    expect(output()).toBe(
      [
        "  round 1: asking model",
        "  round 1: 1 tool call(s) requested",
        `  ${figures.pointer} search_course_content "recursion"`,
        "    {",
        '      "query": "recursion"',
        "    }",
        `  ${figures.tick} search_course_content`,
        "    hits",
        "  done: 1 tool round(s), 2 model call(s), 1 source(s)",
        "",
      ].join("\n"),
    );
  });

  test("leaves controller errors to the caller and stops the spinner", () => {
    const { stream, output } = createCapture();
    const { spinner, calls } = fakeSpinner();
    const reporter = createActivityReporter({ output: stream, verbose: false, spinner });

    reporter.onError?.(new DeadlineExceededError(new Date("2026-01-01T00:00:00.000Z")));

    expect(output()).toBe("");
    expect(calls).toEqual(["stop"]);
  });

  test("names the error kind in verbose mode", () => {
    const { stream, output } = createCapture();
    const reporter = createActivityReporter({ output: stream, verbose: true });

    reporter.onError?.(new DeadlineExceededError(new Date("2026-01-01T00:00:00.000Z")));

    expect(output()).toBe("  failed: DEADLINE_EXCEEDED\n");
  });

  test("updates the spinner as work progresses", () => {
    const { stream } = createCapture();
    const { spinner, calls } = fakeSpinner();
    const reporter = createActivityReporter({ output: stream, verbose: false, spinner });

    reporter.onModelCall?.(1, false);
    reporter.onToolStart?.(searchCall);
    reporter.onModelCall?.(2, true);

    expect(calls).toEqual([
      "update:Thinking…",
      "update:Calling search_course_content…",
      "pause",
      "pause",
      "update:Writing final answer…",
    ]);
  });

  test("never throws when the output stream does", () => {
    class BrokenStream extends Writable {
      override write(): boolean {
        throw new Error("EPIPE");
      }
    }
    const reporter = createActivityReporter({ output: new BrokenStream(), verbose: true });

    expect(() => reporter.onToolStart?.(searchCall)).not.toThrow();
  });
});
