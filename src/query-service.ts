import type { ControllerError } from "./errors";
import type { RoundController } from "./round-controller";
import type { SessionStore } from "./session-store";
import type { CourseCatalog } from "./tools/course-catalog";
import type { Result, Source } from "./types";

export interface QueryServiceDeps<TRaw> {
  controller: RoundController<TRaw>;
  sessions: SessionStore;
  catalog: CourseCatalog;
  maxRounds: number;
  /** Per-query timeout; turned into a deadline when a query starts */
  timeoutMs?: number;
}

export interface AskOptions {
  sessionId?: string;
  deadline?: Date;
}

export interface QueryAnswer {
  answer: string;
  sources: Source[];
  sessionId: string;
}

export interface CourseStats {
  totalCourses: number;
  courseTitles: string[];
}

/** Ties history, the round controller and the catalog together per query. */
export class QueryService<TRaw = unknown> {
  constructor(private deps: QueryServiceDeps<TRaw>) {}

  async ask(query: string, options: AskOptions = {}): Promise<Result<QueryAnswer, ControllerError>> {
    const trimmed = query.trim();
    if (!trimmed) {
      throw new Error("Query must not be empty");
    }

    const { sessions } = this.deps;
    const sessionId =
      options.sessionId && sessions.has(options.sessionId)
        ? options.sessionId
        : sessions.createSession();

    const deadline =
      options.deadline ??
      (this.deps.timeoutMs !== undefined
        ? new Date(Date.now() + this.deps.timeoutMs)
        : undefined);

    const historySummary = sessions.getHistorySummary(sessionId);
    const result = await this.deps.controller.run(trimmed, {
      maxRounds: this.deps.maxRounds,
      ...(historySummary ? { historySummary } : {}),
      ...(deadline ? { deadline } : {}),
    });

    if (!result.ok) return result;

    sessions.addExchange(sessionId, trimmed, result.value.text);
    return {
      ok: true,
      value: { answer: result.value.text, sources: result.value.sources, sessionId },
    };
  }

  async courseStats(): Promise<CourseStats> {
    const courses = await this.deps.catalog.listCourses();
    return {
      totalCourses: courses.length,
      courseTitles: courses.map((c) => c.title),
    };
  }
}
