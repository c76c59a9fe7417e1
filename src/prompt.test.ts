import { describe, test, expect } from "vitest";

import { buildSystemPrompt } from "./prompt";

describe("buildSystemPrompt", () => {
  test("names both course tools", () => {
    const prompt = buildSystemPrompt(2);
    expect(prompt).toContain("- search_course_content: search lesson content.");
    expect(prompt).toContain("- get_course_outline: fetch a course's title, link and numbered lesson list.");
  });

  test("states the round budget", () => {
    expect(buildSystemPrompt(1)).toContain("You may use tools for at most one round.");
    expect(buildSystemPrompt(3)).toContain("You may use tools for at most 3 rounds.");
  });
});
