// Round Controller: drives a bounded model/tool conversation for one query.
//
//   awaitingModel ──final──────────────────────────────▶ terminated
//        │  ▲
//   toolRequest  └── derived context (one round spent) ◀── dispatchingTools
//        └──────────────────────────────────────────────▶ dispatchingTools
//
// Once the budget is spent the next model call is the forced one: tools are
// withheld and whatever comes back is taken as the answer.

import {
  createContext,
  createRoundRecord,
  deriveContext,
  buildMessages,
  type ConversationContext,
} from "./conversation-context";
import {
  DeadlineExceededError,
  ModelCommunicationError,
  describeError,
  type ControllerError,
} from "./errors";
import { aggregateSources } from "./source-aggregator";
import { ToolDispatcher } from "./tool-dispatcher";
import type { ToolRegistry } from "./tool-registry";
import type {
  Answer,
  ModelClient,
  ModelResponse,
  Result,
  RoundRecord,
  ToolDefinition,
  ToolInvocationRequest,
  ToolResult,
} from "./types";

export const DEFAULT_MAX_ROUNDS = 2;
export const DEFAULT_MAX_OUTPUT_TOKENS = 800;
export const EMPTY_ANSWER_FALLBACK =
  "I wasn't able to produce an answer from the available course material.";

export type ControllerState<TRaw> =
  | { phase: "awaitingModel"; context: ConversationContext<TRaw> }
  | {
      phase: "dispatchingTools";
      context: ConversationContext<TRaw>;
      invocations: ToolInvocationRequest[];
      rawContent: TRaw;
    }
  | { phase: "terminated"; context: ConversationContext<TRaw>; answer: Answer; forced: boolean };

export interface RunOutcome {
  answer: Answer;
  /** True when the answer came from the tool-free call after the budget ran out */
  forced: boolean;
  roundsExecuted: number;
  modelCalls: number;
}

/** Display hooks. Exceptions thrown here are ignored. */
export interface RoundObserver {
  onModelCall?(round: number, forced: boolean): void;
  onModelResponse?(round: number, response: ModelResponse): void;
  onToolStart?(request: ToolInvocationRequest): void;
  onToolResult?(request: ToolInvocationRequest, result: ToolResult): void;
  onTerminated?(outcome: RunOutcome): void;
  onError?(error: ControllerError): void;
}

export interface RoundControllerConfig<TRaw> {
  model: ModelClient<TRaw>;
  registry: ToolRegistry;
  dispatcher?: ToolDispatcher;
  systemPrompt?: string;
  maxOutputTokens?: number;
  observer?: RoundObserver;
}

export interface RunOptions {
  historySummary?: string;
  maxRounds?: number;
  deadline?: Date;
}

export class RoundController<TRaw = unknown> {
  private model: ModelClient<TRaw>;
  private registry: ToolRegistry;
  private dispatcher: ToolDispatcher;
  private systemPrompt: string;
  private maxOutputTokens: number;
  private observer: RoundObserver;

  constructor(config: RoundControllerConfig<TRaw>) {
    this.model = config.model;
    this.registry = config.registry;
    this.dispatcher = config.dispatcher ?? new ToolDispatcher(config.registry);
    this.systemPrompt = config.systemPrompt ?? "";
    this.maxOutputTokens = config.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS;
    this.observer = config.observer ?? {};
  }

  /**
   * Answer `query`, calling tools for at most `maxRounds` rounds. Resolves to
   * an error result only for model transport failures or an elapsed deadline.
   */
  async run(query: string, options: RunOptions = {}): Promise<Result<Answer, ControllerError>> {
    const maxRounds = options.maxRounds ?? DEFAULT_MAX_ROUNDS;
    const { deadline } = options;
    const initial = createContext<TRaw>(query, options.historySummary, maxRounds);

    if (deadline && deadline.getTime() <= Date.now()) {
      return this.fail(new DeadlineExceededError(deadline));
    }

    const abort = new AbortController();
    const disarm = deadline ? armDeadline(abort, deadline) : undefined;

    try {
      const outcome = await this.drive(initial, abort.signal);
      this.notify(() => this.observer.onTerminated?.(outcome));
      return { ok: true, value: outcome.answer };
    } catch (err) {
      if (err instanceof DeadlineExceededError || err instanceof ModelCommunicationError) {
        return this.fail(err);
      }
      throw err;
    } finally {
      disarm?.();
    }
  }

  private async drive(
    initial: ConversationContext<TRaw>,
    signal: AbortSignal,
  ): Promise<RunOutcome> {
    const tools = this.registry.exportDefinitions();
    let state: ControllerState<TRaw> = { phase: "awaitingModel", context: initial };
    let modelCalls = 0;

    for (;;) {
      if (state.phase === "terminated") {
        return {
          answer: state.answer,
          forced: state.forced,
          roundsExecuted: state.context.roundLog.length,
          modelCalls,
        };
      }

      if (state.phase === "awaitingModel") {
        const { context }: { context: ConversationContext<TRaw> } = state;
        const forced = context.roundsRemaining === 0;
        modelCalls++;
        const response = await this.callModel(context, forced ? [] : tools, forced, signal);

        if (response.kind === "final") {
          state = { phase: "terminated", context, answer: this.finish(response.text, context), forced };
        } else if (forced) {
          // Tools were withheld, so a tool-request shape is coerced to its text.
          state = { phase: "terminated", context, answer: this.finish(response.text ?? "", context), forced };
        } else {
          state = {
            phase: "dispatchingTools",
            context,
            invocations: response.invocations,
            rawContent: response.rawContent,
          };
        }
      } else {
        const {
          context,
          invocations,
          rawContent,
        }: Extract<ControllerState<TRaw>, { phase: "dispatchingTools" }> = state;
        const results = await raceAbort(
          this.dispatcher.executeAll(invocations, signal, {
            onToolStart: (request) => this.notify(() => this.observer.onToolStart?.(request)),
            onToolResult: (request, result) =>
              this.notify(() => this.observer.onToolResult?.(request, result)),
          }),
          signal,
        );
        const record: RoundRecord<TRaw> = createRoundRecord(rawContent, invocations, results);
        state = { phase: "awaitingModel", context: deriveContext(context, record) };
      }
    }
  }

  private async callModel(
    context: ConversationContext<TRaw>,
    tools: ToolDefinition[],
    forced: boolean,
    signal: AbortSignal,
  ): Promise<ModelResponse<TRaw>> {
    const round = context.roundLog.length + 1;
    this.notify(() => this.observer.onModelCall?.(round, forced));

    let response: ModelResponse<TRaw>;
    try {
      response = await raceAbort(
        this.model.send({
          messages: buildMessages(context, this.systemPrompt),
          tools,
          maxOutputTokens: this.maxOutputTokens,
          signal,
        }),
        signal,
      );
    } catch (err) {
      if (signal.aborted && signal.reason instanceof DeadlineExceededError) {
        throw signal.reason;
      }
      if (err instanceof ModelCommunicationError) throw err;
      throw new ModelCommunicationError(describeError(err), undefined, { cause: err });
    }

    this.notify(() => this.observer.onModelResponse?.(round, response));
    return response;
  }

  /** Sources are computed once, over the whole log, at termination. */
  private finish(text: string, context: ConversationContext<TRaw>): Answer {
    return {
      text: text.trim() ? text : EMPTY_ANSWER_FALLBACK,
      sources: aggregateSources(context.roundLog),
    };
  }

  private fail(error: ControllerError): Result<Answer, ControllerError> {
    this.notify(() => this.observer.onError?.(error));
    return { ok: false, error };
  }

  private notify(fn: () => void): void {
    try {
      fn();
    } catch {
      // Observers are display-only.
    }
  }
}

// Node fires any longer setTimeout delay after 1ms.
const MAX_TIMER_DELAY = 2 ** 31 - 1;

/**
 * Abort with DeadlineExceededError once `deadline` passes, re-arming in
 * MAX_TIMER_DELAY steps for far-off deadlines. Returns the cancel function.
 */
function armDeadline(abort: AbortController, deadline: Date): () => void {
  let timer: ReturnType<typeof setTimeout> | undefined;

  const arm = (): void => {
    const remaining = deadline.getTime() - Date.now();
    if (remaining <= 0) {
      abort.abort(new DeadlineExceededError(deadline));
      return;
    }
    timer = setTimeout(arm, Math.min(remaining, MAX_TIMER_DELAY));
  };

  arm();
  return () => clearTimeout(timer);
}

/** Settle with `promise`, or reject with the signal's reason if it aborts first. */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(signal.reason);

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}
