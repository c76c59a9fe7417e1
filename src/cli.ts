// CLI Adapter: wires config into a query service and renders answers.

import { createInterface } from "node:readline/promises";
import type { Readable, Writable } from "node:stream";

import { createActivityReporter } from "./activity-reporter";
import type { LecternConfig } from "./config";
import { ExecutionMetrics } from "./execution-metrics";
import { buildSystemPrompt } from "./prompt";
import { AnthropicModelClient, type AnthropicContent, type MessagesClient } from "./providers/anthropic";
import { QueryService } from "./query-service";
import { RoundController } from "./round-controller";
import { SessionStore } from "./session-store";
import type { ActivitySpinner } from "./terminal-formatting";
import { colors, formatSources, symbols } from "./terminal-formatting";
import { createCourseTools } from "./tool-factory";
import { InMemoryCourseCatalog, type CourseCatalog } from "./tools/course-catalog";

export interface EnvironmentDeps {
  config: LecternConfig;
  /** Where activity lines go (stderr in the CLI) */
  activity: Writable;
  verbose: boolean;
  spinner?: ActivitySpinner;
  catalog?: CourseCatalog;
  client?: MessagesClient;
}

export async function createQueryService(
  deps: EnvironmentDeps,
): Promise<QueryService<AnthropicContent>> {
  const { config } = deps;
  const catalog = deps.catalog ?? (await InMemoryCourseCatalog.fromFile(config.catalogPath));

  const controller = new RoundController<AnthropicContent>({
    model: new AnthropicModelClient({
      apiKey: config.apiKey,
      model: config.model,
      temperature: config.temperature,
      ...(deps.client ? { client: deps.client } : {}),
    }),
    registry: createCourseTools(catalog, { maxResults: config.maxResults }),
    systemPrompt: buildSystemPrompt(config.maxRounds),
    maxOutputTokens: config.maxOutputTokens,
    observer: createActivityReporter({
      output: deps.activity,
      verbose: deps.verbose,
      metrics: new ExecutionMetrics(),
      ...(deps.spinner ? { spinner: deps.spinner } : {}),
    }),
  });

  return new QueryService({
    controller,
    sessions: new SessionStore(config.maxHistory),
    catalog,
    maxRounds: config.maxRounds,
    ...(config.timeoutMs !== undefined ? { timeoutMs: config.timeoutMs } : {}),
  });
}

export interface AskDeps<TRaw> {
  service: QueryService<TRaw>;
  output: Writable;
  spinner?: ActivitySpinner;
}

/**
 * Answer one question and print it with its sources. Returns the session id
 * on success, undefined when the query failed (the error is already printed).
 */
export async function askOnce<TRaw>(
  deps: AskDeps<TRaw>,
  question: string,
  sessionId?: string,
): Promise<string | undefined> {
  deps.spinner?.start("Thinking…");
  const result = await deps.service
    .ask(question, sessionId ? { sessionId } : {})
    .finally(() => deps.spinner?.stop());

  if (!result.ok) {
    deps.output.write(`${symbols.failure} ${colors.error(result.error.message)}\n`);
    return undefined;
  }

  deps.output.write(result.value.answer + "\n");
  const sources = formatSources(result.value.sources);
  if (sources) {
    deps.output.write("\n" + sources + "\n");
  }
  return result.value.sessionId;
}

export interface ConversationDeps<TRaw> extends AskDeps<TRaw> {
  input: Readable;
}

/** Read questions line by line; every answer shares one session's history. */
export async function runConversation<TRaw>(deps: ConversationDeps<TRaw>): Promise<void> {
  const rl = createInterface({ input: deps.input, terminal: false });
  let sessionId: string | undefined;

  try {
    for await (const line of rl) {
      const question = line.trim();
      if (!question) continue;
      if (question === "exit" || question === "quit") break;

      sessionId = (await askOnce(deps, question, sessionId)) ?? sessionId;
      deps.output.write("\n");
    }
  } finally {
    rl.close();
  }
}

export async function printCourses<TRaw>(service: QueryService<TRaw>, output: Writable): Promise<void> {
  const stats = await service.courseStats();
  output.write(`${colors.bold("Courses:")} ${stats.totalCourses}\n`);
  for (const title of stats.courseTitles) {
    output.write(`${symbols.bullet} ${title}\n`);
  }
}
