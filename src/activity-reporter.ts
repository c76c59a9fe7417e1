// Activity reporter: turns round controller callbacks into human-readable
// terminal output on an injected Writable stream.

import type { Writable } from "node:stream";

import type { ControllerError } from "./errors";
import type { ExecutionMetrics } from "./execution-metrics";
import type { RoundObserver, RunOutcome } from "./round-controller";
import type { ActivitySpinner } from "./terminal-formatting";
import {
  colors,
  symbols,
  indent,
  indentVerbose,
  formatDuration,
  formatNumber,
} from "./terminal-formatting";
import type { ModelResponse, ToolInvocationRequest, ToolResult } from "./types";

const MAX_DETAIL_LENGTH = 500;

function truncate(text: string): string {
  return text.length <= MAX_DETAIL_LENGTH ? text : text.slice(0, MAX_DETAIL_LENGTH) + "…";
}

/** One-line summary of a tool call: the tool name plus its most telling argument. */
export function summarizeToolCall(request: ToolInvocationRequest): string {
  const { args } = request;
  const detail =
    typeof args.query === "string"
      ? `"${args.query}"`
      : typeof args.course_title === "string"
        ? args.course_title
        : undefined;
  return detail ? `${request.toolName} ${colors.dim(detail)}` : request.toolName;
}

/** First line of a failing result, without the "Error: " prefix. */
function errorSummary(result: ToolResult): string {
  const firstLine = result.content.split("\n")[0] ?? "";
  return firstLine.replace(/^Error:\s*/, "") || "error";
}

export interface ActivityReporterConfig {
  output: Writable;
  verbose: boolean;
  metrics?: ExecutionMetrics;
  spinner?: ActivitySpinner;
}

export function createActivityReporter(config: ActivityReporterConfig): RoundObserver {
  const { output, verbose, metrics, spinner } = config;

  function writeLine(line: string): void {
    try {
      output.write(line + "\n");
    } catch {
      // Display failures are not reported.
    }
  }

  /** Collect lines, then flush inside a single spinner pause. */
  function flushLines(lines: string[]): void {
    if (lines.length === 0) return;

    const doWrite = () => {
      for (const line of lines) {
        writeLine(line);
      }
    };

    if (spinner) {
      spinner.withPause(doWrite);
    } else {
      doWrite();
    }
  }

  function onModelCall(round: number, forced: boolean): void {
    metrics?.startModelCall();
    if (forced) {
      flushLines([indent(`${symbols.warning} ${colors.yellow("round budget spent, asking for a final answer")}`)]);
    } else if (verbose) {
      flushLines([indent(colors.dim(`round ${round}: asking model`))]);
    }
    spinner?.update(forced ? "Writing final answer…" : "Thinking…");
  }

  function onModelResponse(round: number, response: ModelResponse): void {
    const lines: string[] = [];
    const duration = metrics?.endModelCall() ?? 0;

    if (metrics && response.usage) {
      metrics.recordUsage(response.usage);
      const { usage } = response;
      let tokenLine = `tokens: ${formatNumber(usage.inputTokens)} in / ${formatNumber(usage.outputTokens)} out / ${formatNumber(usage.totalTokens)} total`;
      tokenLine += ` | cumulative: ${formatNumber(metrics.getCumulativeUsage().totalTokens)}`;
      if (duration > 0) {
        tokenLine += ` | ${formatDuration(duration)}`;
      }
      lines.push(indent(colors.dim(tokenLine)));
    }

    if (verbose && response.kind === "toolRequest") {
      lines.push(indent(colors.dim(`round ${round}: ${response.invocations.length} tool call(s) requested`)));
    }

    flushLines(lines);
  }

  function onToolStart(request: ToolInvocationRequest): void {
    const lines = [indent(`${colors.cyan(symbols.pointer)} ${summarizeToolCall(request)}`)];
    if (verbose) {
      lines.push(indentVerbose(colors.dim(truncate(JSON.stringify(request.args, null, 2)))));
    }
    metrics?.startToolCall(request.id);
    spinner?.update(`Calling ${request.toolName}…`);
    flushLines(lines);
  }

  function onToolResult(request: ToolInvocationRequest, result: ToolResult): void {
    let durationSuffix = "";
    if (metrics) {
      const duration = metrics.endToolCall(request.id);
      if (duration > 0) {
        durationSuffix = ` ${colors.dim(formatDuration(duration))}`;
      }
    }

    const line = result.succeeded
      ? `${symbols.success} ${request.toolName}`
      : `${symbols.failure} ${request.toolName} ${colors.error(errorSummary(result))}`;
    const lines = [indent(line + durationSuffix)];

    if (verbose && result.succeeded) {
      lines.push(indentVerbose(colors.dim(truncate(result.content))));
    }
    flushLines(lines);
  }

  function onTerminated(outcome: RunOutcome): void {
    spinner?.stop();
    if (!verbose) return;
    flushLines([
      indent(
        colors.dim(
          `done: ${outcome.roundsExecuted} tool round(s), ${outcome.modelCalls} model call(s), ${outcome.answer.sources.length} source(s)`,
        ),
      ),
    ]);
  }

  /** The caller prints the error itself; only verbose mode names its kind here. */
  function onError(error: ControllerError): void {
    spinner?.stop();
    if (!verbose) return;
    flushLines([indent(colors.dim(`failed: ${error.code}`))]);
  }

  return { onModelCall, onModelResponse, onToolStart, onToolResult, onTerminated, onError };
}
