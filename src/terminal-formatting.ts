// Terminal formatting primitives: colors, symbols, indentation, and formatters.
// Composes ansis (colors), figures (symbols), and nanospinner (spinners).
// The activity reporter and the CLI build their output lines from these.

import ansis from "ansis";
import figures from "figures";
import { createSpinner, type Spinner } from "nanospinner";

import type { Source } from "./types";

// ── Colors ──────────────────────────────────────────────────────────────────

export const colors = {
  /** Tool calls in progress */
  cyan: (text: string) => ansis.cyan(text),
  /** Forced final answer notice */
  yellow: (text: string) => ansis.yellow(text),
  /** Metadata (tokens, timing, verbose details) */
  dim: (text: string) => ansis.dim(text),
  bold: (text: string) => ansis.bold(text),
  /** Errors */
  error: (text: string) => ansis.bold.red(text),
};

// ── Symbols ─────────────────────────────────────────────────────────────────

export const symbols = {
  pointer: figures.pointer,
  bullet: figures.bullet,
  /** Green tick for success */
  success: ansis.green(figures.tick),
  /** Red cross for failure */
  failure: ansis.red(figures.cross),
  warning: ansis.yellow(figures.warning),
};

// ── Indentation ─────────────────────────────────────────────────────────────

const TOOL_INDENT = "  ";
const VERBOSE_INDENT = "    ";

/** Indent text at tool-activity level (2 spaces). Handles multi-line. */
export function indent(text: string): string {
  return text.split("\n").map((line) => TOOL_INDENT + line).join("\n");
}

/** Indent text at verbose-detail level (4 spaces). Handles multi-line. */
export function indentVerbose(text: string): string {
  return text.split("\n").map((line) => VERBOSE_INDENT + line).join("\n");
}

// ── Duration / number formatting ────────────────────────────────────────────

/** Format a duration in milliseconds to human-readable: ms, s, or m. */
export function formatDuration(ms: number): string {
  const rounded = Math.round(ms);
  if (rounded < 1000) return `${rounded}ms`;
  if (rounded < 60_000) return `${(rounded / 1000).toFixed(1)}s`;
  return `${(rounded / 60_000).toFixed(1)}m`;
}

/** Format a number with comma separators (e.g. 1247 → "1,247"). */
export function formatNumber(n: number): string {
  return n.toLocaleString("en-US");
}

// ── Answers ─────────────────────────────────────────────────────────────────

/** One source per line; linked sources show the link in parentheses. */
export function formatSources(sources: readonly Source[]): string {
  if (sources.length === 0) return "";
  const lines = sources.map((s) =>
    s.link ? `- ${s.displayText} ${colors.dim(`(${s.link})`)}` : `- ${s.displayText}`,
  );
  return `${colors.bold("Sources:")}\n${lines.join("\n")}`;
}

// ── ANSI stripping ──────────────────────────────────────────────────────────

// eslint-disable-next-line no-control-regex
const ANSI_REGEX = /\x1b\[[0-9;]*m/g;

/** Remove ANSI escape codes from a string. */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_REGEX, "");
}

// ── Spinner ─────────────────────────────────────────────────────────────────

export interface ActivitySpinner {
  /** Start the spinner with the given text (e.g. "Thinking…"). */
  start(text: string): void;
  /** Update the displayed text while the spinner keeps running. */
  update(text: string): void;
  /** Stop the spinner silently (no final symbol). */
  stop(): void;
  /**
   * Pause the spinner, run `fn`, then restart. Writing while the spinner
   * animates would corrupt the current terminal line.
   */
  withPause(fn: () => void): void;
}

/**
 * Create an activity spinner backed by nanospinner.
 * The spinner writes to the provided stream (defaults to process.stderr).
 */
export function createActivitySpinner(
  stream?: NodeJS.WritableStream,
): ActivitySpinner {
  const opts = stream ? { stream: stream as NodeJS.WriteStream } : {};
  const spinner: Spinner = createSpinner("", opts);
  let lastText = "";

  return {
    start(text: string) {
      lastText = text;
      spinner.start({ text });
    },

    update(text: string) {
      lastText = text;
      spinner.update({ text });
    },

    stop() {
      if (spinner.isSpinning()) {
        spinner.stop();
      }
    },

    withPause(fn: () => void) {
      if (!spinner.isSpinning()) {
        fn();
        return;
      }
      spinner.stop();
      fn();
      spinner.start({ text: lastText });
    },
  };
}
