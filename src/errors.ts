// Error taxonomy. Registry errors are fatal at startup, tool errors are
// absorbed into failing ToolResults, and only ControllerError reaches callers
// of RoundController.run().

export type ErrorCode =
  | "DUPLICATE_TOOL"
  | "UNKNOWN_TOOL"
  | "TOOL_EXECUTION"
  | "MODEL_COMMUNICATION"
  | "DEADLINE_EXCEEDED"
  | "CONFIG";

export class LecternError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class DuplicateToolError extends LecternError {
  constructor(readonly toolName: string) {
    super("DUPLICATE_TOOL", `Tool '${toolName}' is already registered`);
  }
}

export class UnknownToolError extends LecternError {
  constructor(readonly toolName: string) {
    super("UNKNOWN_TOOL", `Tool '${toolName}' not found`);
  }
}

export class ToolExecutionError extends LecternError {
  constructor(
    readonly toolName: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super("TOOL_EXECUTION", message, options);
  }
}

export class ModelCommunicationError extends LecternError {
  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super("MODEL_COMMUNICATION", message, options);
  }
}

export class DeadlineExceededError extends LecternError {
  constructor(readonly deadline: Date) {
    super(
      "DEADLINE_EXCEEDED",
      `Query deadline exceeded at ${deadline.toISOString()}`,
    );
  }
}

export class ConfigError extends LecternError {
  constructor(message: string) {
    super("CONFIG", message);
  }
}

export type ControllerError = ModelCommunicationError | DeadlineExceededError;

const MAX_ERROR_TEXT = 500;
// eslint-disable-next-line no-control-regex
const CONTROL_CHARS = /[\u0000-\u001f\u007f]+/g;

/** Collapse any thrown value into one printable line for the model. */
export function describeError(err: unknown): string {
  const raw = err instanceof Error ? err.message : String(err);
  const line = raw.replace(CONTROL_CHARS, " ").replace(/\s+/g, " ").trim();
  const text = line || "unknown error";
  return text.length > MAX_ERROR_TEXT
    ? text.slice(0, MAX_ERROR_TEXT) + "…"
    : text;
}
