import { describe, test, expect } from "vitest";

import { ToolExecutionError } from "../errors";
import { InMemoryCourseCatalog, type CourseCatalog } from "./course-catalog";
import { COURSE_SEARCH_TOOL, createCourseSearchTool } from "./course-search";

const catalog = new InMemoryCourseCatalog({
  courses: [
    {
      title: "Intro to Testing",
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
  ],
});

describe("search_course_content", () => {
  const tool = createCourseSearchTool(catalog);

  test("advertises query as the only required parameter", () => {
    expect(tool.definition.name).toBe(COURSE_SEARCH_TOOL);
    expect(Object.keys(tool.definition.parameters)).toEqual(["query", "course_name", "lesson_number"]);
    expect(tool.definition.parameters.query?.required).toBe(true);
    expect(tool.definition.parameters.lesson_number?.type).toBe("integer");
  });

  test("formats hits with headers and attributes each one", async () => {
    expect(await tool.run({ query: "unit tests" })).toEqual({
      content:
        "[Intro to Testing - Lesson 1]\nUnit tests check one function in isolation.\n\n" +
        "[Intro to Testing - Lesson 2]\nMocks replace collaborators in unit tests.",
      sources: [
        { displayText: "Intro to Testing - Lesson 1", link: "https://t.example.com/1" },
        { displayText: "Intro to Testing - Lesson 2" },
      ],
    });
  });

  test("passes the course and lesson filters through", async () => {
    const output = await tool.run({ query: "unit", course_name: "intro", lesson_number: 2 });
    expect(output.sources).toEqual([{ displayText: "Intro to Testing - Lesson 2" }]);
  });

  test("caps hits at maxResults", async () => {
    const limited = createCourseSearchTool(catalog, 1);
    const output = await limited.run({ query: "unit tests" });
    expect(output.sources).toEqual([{ displayText: "Intro to Testing - Lesson 1", link: "https://t.example.com/1" }]);
  });

  test("says so when nothing matches", async () => {
    expect(await tool.run({ query: "quantum" })).toEqual({ content: "No relevant content found." });
  });

  test("names the filters when nothing matches", async () => {
    expect(await tool.run({ query: "quantum", course_name: "intro", lesson_number: 1 })).toEqual({
      content: "No relevant content found in course 'intro' in lesson 1.",
    });
  });

  test("returns the catalog's error text for an unknown course", async () => {
    expect(await tool.run({ query: "unit", course_name: "chemistry" })).toEqual({
      content: "No course found matching 'chemistry'",
    });
  });

  test("returns a store failure as plain text", async () => {
    const broken: CourseCatalog = {
      search: async () => ({ ok: false, error: "Search error: index unavailable" }),
      resolveCourseName: async () => undefined,
      getCourse: async () => undefined,
      getLessonLink: async () => undefined,
      listCourses: async () => [],
    };
    expect(await createCourseSearchTool(broken).run({ query: "unit" })).toEqual({
      content: "Search error: index unavailable",
    });
  });

  test("rejects a missing query", async () => {
    const run = tool.run({});
    await expect(run).rejects.toBeInstanceOf(ToolExecutionError);
    await expect(run).rejects.toThrow("Invalid arguments for search_course_content: query: Required");
  });

  test("rejects a non-integer lesson number", async () => {
    await expect(tool.run({ query: "unit", lesson_number: "2" })).rejects.toThrow(
      "Invalid arguments for search_course_content: lesson_number: Expected number, received string",
    );
  });
});
