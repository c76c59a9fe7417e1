import { describe, test, expect, vi } from "vitest";
import { Readable, Writable } from "node:stream";
import type Anthropic from "@anthropic-ai/sdk";
import figures from "figures";

import { askOnce, createQueryService, printCourses, runConversation } from "./cli";
import type { LecternConfig } from "./config";
import type { AnthropicReply, MessagesClient } from "./providers/anthropic";
import { stripAnsi, type ActivitySpinner } from "./terminal-formatting";
import { InMemoryCourseCatalog } from "./tools/course-catalog";

// ── Test helpers ────────────────────────────────────────────────────────────

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

function scriptedClient(replies: (AnthropicReply | Error)[]) {
  const create = vi.fn(
    async (
      _params: Anthropic.MessageCreateParamsNonStreaming,
      _options?: { signal?: AbortSignal },
    ): Promise<AnthropicReply> => {
      const next = replies.shift();
      if (!next) throw new Error("no scripted reply");
      if (next instanceof Error) throw next;
      return next;
    },
  );
  const client: MessagesClient = { messages: { create } };
  return { client, create };
}

const catalog = new InMemoryCourseCatalog({
  courses: [
    {
      title: "Intro to Testing",
      link: "https://t.example.com",
      lessons: [
        {
          number: 1,
          title: "Unit Tests",
          link: "https://t.example.com/1",
          content: "Unit tests check one function in isolation.",
        },
        { number: 2, title: "Mocks", content: "Mocks replace collaborators in unit tests." },
      ],
    },
    { title: "Advanced Databases", lessons: [] },
  ],
});

const config: LecternConfig = {
  apiKey: "test-secret",
  model: "claude-sonnet-4-20250514",
  maxRounds: 2,
  maxOutputTokens: 800,
  temperature: 0,
  maxHistory: 2,
  maxResults: 5,
  catalogPath: "unused.json",
};

async function setup(replies: (AnthropicReply | Error)[]) {
  const { client, create } = scriptedClient(replies);
  const activity = createCapture();
  const service = await createQueryService({
    config,
    activity: activity.stream,
    verbose: false,
    catalog,
    client,
  });
  return { service, create, activity };
}

// ── askOnce ─────────────────────────────────────────────────────────────────

describe("askOnce", () => {
  test("prints the answer followed by its sources", async () => {
    const { service, create, activity } = await setup([
      {
        content: [
          { type: "tool_use", id: "tu_1", name: "search_course_content", input: { query: "mocks" } },
        ],
      },
      { content: [{ type: "text", text: "Mocks replace collaborators." }] },
    ]);
    const out = createCapture();

    const sessionId = await askOnce({ service, output: out.stream }, "What do mocks do?");

    expect(sessionId).toBe("session_1");
    expect(out.output()).toBe(
      "Mocks replace collaborators.\n\nSources:\n- Intro to Testing - Lesson 2\n",
    );
    expect(activity.output()).toContain(`  ${figures.pointer} search_course_content "mocks"\n`);

    const first = create.mock.calls[0]?.[0];
    expect(first?.tools?.map((t) => t.name)).toEqual(["search_course_content", "get_course_outline"]);
    expect(first?.tool_choice).toEqual({ type: "auto" });
    expect(first?.max_tokens).toBe(800);
    expect(create).toHaveBeenCalledTimes(2);
  });

  test("prints the answer alone when there are no sources", async () => {
    const { service } = await setup([{ content: [{ type: "text", text: "Hello." }] }]);
    const out = createCapture();

    await askOnce({ service, output: out.stream }, "hi");

    expect(out.output()).toBe("Hello.\n");
  });

  test("prints the error and returns undefined when the model is unreachable", async () => {
    const { service, activity } = await setup([new Error("connect ECONNREFUSED")]);
    const out = createCapture();

    const sessionId = await askOnce({ service, output: out.stream }, "hi");

    expect(sessionId).toBeUndefined();
    expect(out.output()).toBe(`${figures.cross} Anthropic request failed: connect ECONNREFUSED\n`);
    expect(activity.output()).toBe("");
  });

  test("starts the spinner and always stops it", async () => {
    const { service } = await setup([{ content: [{ type: "text", text: "Hello." }] }]);
    const calls: string[] = [];
    const spinner: ActivitySpinner = {
      start: (text) => calls.push(`start:${text}`),
      update: (text) => calls.push(`update:${text}`),
      stop: () => calls.push("stop"),
      withPause: (fn) => fn(),
    };

    await askOnce({ service, output: createCapture().stream, spinner }, "hi");

    expect(calls[0]).toBe("start:Thinking…");
    expect(calls.at(-1)).toBe("stop");
  });
});

// ── runConversation ─────────────────────────────────────────────────────────

describe("runConversation", () => {
  test("answers each line in one session until quit", async () => {
    const { service, create } = await setup([
      { content: [{ type: "text", text: "A stand-in." }] },
      { content: [{ type: "text", text: "A canned responder." }] },
    ]);
    const out = createCapture();

    await runConversation({
      service,
      output: out.stream,
      input: Readable.from(["What is a mock?\n\n  \nAnd a stub?\nquit\nignored\n"]),
    });

    expect(out.output()).toBe("A stand-in.\n\nA canned responder.\n\n");
    expect(create).toHaveBeenCalledTimes(2);
    const system = create.mock.calls[1]?.[0].system;
    expect(typeof system === "string" && system.endsWith(
      "\n\nPrevious conversation:\nUser: What is a mock?\nAssistant: A stand-in.",
    )).toBe(true);
  });
});

// ── printCourses ────────────────────────────────────────────────────────────

describe("printCourses", () => {
  test("lists the catalog", async () => {
    const { service } = await setup([]);
    const out = createCapture();

    await printCourses(service, out.stream);

    expect(out.output()).toBe(
      `Courses: 2\n${figures.bullet} Intro to Testing\n${figures.bullet} Advanced Databases\n`,
    );
  });
});
